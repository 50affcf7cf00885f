// Files and directories that never reach the model: lock files, build output, vendored code
export const IGNORED_PATTERNS: readonly string[] = [
  'package-lock.json',
  'poetry.lock',
  'Pipfile.lock',
  'yarn.lock',
  'pnpm-lock.yaml',
  'bun.lockb',
  '*.min.js',
  '*.min.css',
  '.bundle',
  'vendor/',
  'node_modules/',
  '__pycache__/',
  '.git/',
  '*.pyc',
  '*.egg-info/',
  '.eggs/',
  'dist/',
  'build/'
];

const globCache = new Map<string, RegExp>();

/**
 * Use forward slashes regardless of platform
 */
export function normalizePath(path: string): string {
  return path.replace(/\\/g, '/');
}

/**
 * Translate a shell-style glob into an anchored RegExp.
 * `*` crosses directory boundaries, as in fnmatch.
 */
export function globToRegex(glob: string): RegExp {
  const cached = globCache.get(glob);
  if (cached) return cached;

  let out = '^';
  for (let i = 0; i < glob.length; i += 1) {
    const ch = glob[i];
    if (ch === '*') {
      out += '.*';
      continue;
    }
    if (ch === '?') {
      out += '.';
      continue;
    }
    if (ch === '[') {
      let j = i + 1;
      if (glob[j] === '!') j += 1;
      if (glob[j] === ']') j += 1;
      while (j < glob.length && glob[j] !== ']') j += 1;
      if (j >= glob.length) {
        out += '\\[';
        continue;
      }
      let body = glob.slice(i + 1, j).replace(/\\/g, '\\\\');
      if (body.startsWith('!')) body = `^${body.slice(1)}`;
      else if (body.startsWith('^')) body = `\\${body}`;
      out += `[${body}]`;
      i = j;
      continue;
    }
    out += ch.replace(/[.+^${}()|\]\\/]/g, '\\$&');
  }
  out += '$';

  const regex = new RegExp(out, 's');
  globCache.set(glob, regex);
  return regex;
}

/**
 * Whether a single exclusion rule matches a normalized path
 */
export function matchesRule(path: string, rule: string): boolean {
  if (rule.endsWith('/')) {
    return path.includes(rule.replace(/\/+$/, '')) || path.startsWith(rule);
  }
  return globToRegex(rule).test(path) || path.includes(rule);
}

/**
 * Whether a path should be dropped from the diff sent to the model
 */
export function shouldIgnore(
  path: string,
  patterns: readonly string[] = IGNORED_PATTERNS
): boolean {
  const normalized = normalizePath(path);
  return patterns.some((rule) => matchesRule(normalized, rule));
}
