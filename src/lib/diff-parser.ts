import type { FileSegment } from '../types.js';
import { shouldIgnore } from './exclusions.js';

const FILE_HEADER = 'diff --git ';

// Large diffs are cut to this many characters before they reach the model
export const MAX_DIFF_CHARS = 30_000;

// The end of a diff often holds the final state of a change, so it survives truncation
export const TAIL_CHARS = 5_000;

export const TRUNCATION_MARKER = '\n\n... [diff truncated to save context] ...\n\n';

/**
 * Extract the path from a "diff --git a/<path> b/<path>" header.
 * Returns null for headers too short to carry both paths.
 */
export function parseHeaderPath(line: string): string | null {
  const parts = line.split(/\s+/).filter(Boolean);
  if (parts.length < 4) return null;
  const path = parts[2];
  return path.startsWith('a/') ? path.slice(2) : path;
}

/**
 * Remove every file segment whose path is ignored.
 * Lines before the first file header are dropped as well.
 */
export function filterPatch(rawPatch: string): string {
  const result: string[] = [];
  let skipping = true;

  for (const line of rawPatch.split('\n')) {
    if (line.startsWith(FILE_HEADER)) {
      const path = parseHeaderPath(line);
      skipping = path !== null && shouldIgnore(path);
    }
    if (!skipping) result.push(line);
  }

  return result.join('\n');
}

/**
 * Split a patch into per-file segments. Lines before the first header
 * form a segment with a null path.
 */
export function splitFileSegments(patch: string): FileSegment[] {
  const segments: FileSegment[] = [];
  let current: FileSegment | null = null;

  for (const line of patch.split('\n')) {
    if (line.startsWith(FILE_HEADER)) {
      current = { lines: [line], path: parseHeaderPath(line) };
      segments.push(current);
      continue;
    }
    if (!current) {
      current = { lines: [], path: null };
      segments.push(current);
    }
    current.lines.push(line);
  }

  return segments;
}

/**
 * Keep a patch within maxChars: the head, a marker, then the last tailChars characters
 */
export function boundPatch(
  text: string,
  maxChars: number = MAX_DIFF_CHARS,
  tailChars: number = TAIL_CHARS
): string {
  if (text.length <= maxChars) return text;

  const headLength = Math.max(0, maxChars - tailChars);
  const tail = tailChars > 0 ? text.slice(Math.max(0, text.length - tailChars)) : '';
  return text.slice(0, headLength) + TRUNCATION_MARKER + tail;
}
