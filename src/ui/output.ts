import { pathToFileURL } from 'node:url';
import * as p from '@clack/prompts';
import { t } from '../lib/i18n.js';
import type { Locale } from '../types.js';
import { renderAnalysis, renderCommitMessage } from './panels.js';
import { frappe, theme } from './theme.js';

export interface Spinner {
  stop(message?: string): void;
}

/**
 * Everything the commands print goes through this sink
 */
export interface Output {
  line(text: string): void;
  info(message: string): void;
  /** One line: localized "Error:" prefix, then the message */
  error(message: string, locale: Locale): void;
  analysis(markdown: string, title: string): void;
  commitMessage(message: string, title: string): void;
  spinner(message: string): Spinner;
}

/**
 * OSC 8 hyperlink to a local file; terminals without support show the label
 */
export function fileLink(path: string, label: string): string {
  const uri = pathToFileURL(path).href;
  return `\u001b]8;;${uri}\u0007${label}\u001b]8;;\u0007`;
}

export function createTerminalOutput(): Output {
  return {
    analysis(markdown, title) {
      console.log(renderAnalysis(markdown, title));
    },
    commitMessage(message, title) {
      console.log(renderCommitMessage(message, title));
    },
    error(message, locale) {
      console.error(`${theme.error(t('error_prefix', locale))} ${message}`);
    },
    info(message) {
      p.log.info(frappe.subtext1(message));
    },
    line(text) {
      console.log(text);
    },
    spinner(message) {
      const s = p.spinner();
      s.start(frappe.subtext1(message));
      return {
        stop(done?: string) {
          s.stop(frappe.subtext1(done ?? 'Done'));
        }
      };
    }
  };
}
