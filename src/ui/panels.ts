import boxen from 'boxen';
import gradient from 'gradient-string';
import { boxColors, frappe, gradientColors } from './theme.js';

/**
 * Gradient title line shown before interactive output
 */
export function renderBanner(version: string): string {
  const title = gradient([...gradientColors.banner])('diff-sage');
  return `${title} ${frappe.surface2(`v${version}`)}`;
}

/**
 * The model's review in a rounded box
 */
export function renderAnalysis(markdown: string, title: string): string {
  return boxen(frappe.text(markdown.trim()), {
    borderColor: boxColors.analysis,
    borderStyle: 'round',
    padding: { bottom: 0, left: 1, right: 1, top: 0 },
    title,
    titleAlignment: 'left'
  });
}

/**
 * The suggested commit message in a styled box
 */
export function renderCommitMessage(message: string, title: string): string {
  return boxen(frappe.text(message), {
    borderColor: boxColors.primary,
    borderStyle: 'round',
    padding: { bottom: 1, left: 2, right: 2, top: 1 },
    title,
    titleAlignment: 'center'
  });
}
