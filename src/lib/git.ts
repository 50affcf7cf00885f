import { spawn } from 'node:child_process';
import { statSync } from 'node:fs';
import type {
  CollectedDiff,
  CommitInfo,
  DiffScope,
  FileStat,
  GitResult,
  GitRunner
} from '../types.js';
import { boundPatch, filterPatch } from './diff-parser.js';
import { normalizePath, shouldIgnore } from './exclusions.js';

export const GIT_TIMEOUT_MS = 30_000;

/**
 * A git command failed and its output is not a usable diff
 */
export class GitError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = -1
  ) {
    super(message);
    this.name = 'GitError';
  }
}

export function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

function decode(chunks: Buffer[]): string {
  return new TextDecoder('utf-8').decode(Buffer.concat(chunks));
}

/**
 * Run git and collect its output. Never rejects: timeouts and a missing
 * binary come back as their own result kinds.
 */
export function runGit(
  args: string[],
  cwd: string,
  timeoutMs: number = GIT_TIMEOUT_MS
): Promise<GitResult> {
  return new Promise((resolve) => {
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let settled = false;

    const proc = spawn('git', args, { cwd, stdio: ['ignore', 'pipe', 'pipe'], windowsHide: true });

    const finish = (result: GitResult) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(result);
    };

    const timer = setTimeout(() => {
      proc.kill('SIGKILL');
      finish({ kind: 'timeout' });
    }, timeoutMs);

    proc.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    proc.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    proc.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'ENOENT' && !isDirectory(cwd)) {
        // spawn reports a missing cwd the same way as a missing binary
        finish({ exitCode: -1, kind: 'completed', stderr: `Directory not found: ${cwd}`, stdout: '' });
      } else if (err.code === 'ENOENT') {
        finish({ kind: 'not-found' });
      } else {
        finish({ exitCode: -1, kind: 'completed', stderr: err.message, stdout: '' });
      }
    });

    proc.on('close', (code) => {
      finish({
        exitCode: code ?? -1,
        kind: 'completed',
        stderr: decode(stderr).trim(),
        stdout: decode(stdout).trim()
      });
    });
  });
}

/**
 * Turn a failed result into a GitError
 */
export function toGitError(result: GitResult): GitError {
  switch (result.kind) {
    case 'timeout':
      return new GitError('Git command timed out.', -1);
    case 'not-found':
      return new GitError('Git not found. Install Git.', 127);
    case 'completed':
      return new GitError(result.stderr || result.stdout || 'Unknown git error', result.exitCode);
  }
}

/**
 * Resolve CLI flags into a scope; an explicit ref wins over --staged
 */
export function scopeFromOptions(options: { staged?: boolean; ref?: string }): DiffScope {
  if (options.ref) return { kind: 'revision', ref: options.ref };
  if (options.staged) return { kind: 'staged' };
  return { kind: 'working-tree' };
}

/**
 * Check if the directory is inside a git work tree
 */
export async function isInsideWorkTree(cwd: string, git: GitRunner = runGit): Promise<boolean> {
  const result = await git(['rev-parse', '--is-inside-work-tree'], cwd);
  if (result.kind === 'not-found') throw toGitError(result);
  return result.kind === 'completed' && result.exitCode === 0 && result.stdout.includes('true');
}

function diffArgs(scope: DiffScope): string[] {
  switch (scope.kind) {
    case 'revision':
      // Patch only, no commit header
      return ['show', scope.ref, '--format=', '--no-color', '--'];
    case 'staged':
      return ['diff', '--no-color', '--cached'];
    case 'working-tree':
      return ['diff', '--no-color'];
  }
}

function numstatArgs(scope: DiffScope): string[] {
  switch (scope.kind) {
    case 'revision':
      return ['show', scope.ref, '--numstat', '--format='];
    case 'staged':
      return ['diff', '--numstat', '--cached'];
    case 'working-tree':
      return ['diff', '--numstat'];
  }
}

/**
 * Get the filtered diff for a scope. Outside a repository this is an empty string.
 */
export async function getDiff(
  scope: DiffScope,
  cwd: string,
  git: GitRunner = runGit
): Promise<string> {
  if (!(await isInsideWorkTree(cwd, git))) return '';

  const result = await git(diffArgs(scope), cwd);
  if (result.kind !== 'completed' || result.exitCode !== 0) {
    throw toGitError(result);
  }

  return filterPatch(result.stdout);
}

/**
 * Get the filtered diff, bounded to fit the model's context
 */
export async function getDiffForModel(
  scope: DiffScope,
  cwd: string,
  git: GitRunner = runGit
): Promise<string> {
  return boundPatch(await getDiff(scope, cwd, git));
}

/**
 * Get the diff for a scope, falling back to the last commit when the
 * working tree is clean
 */
export async function collectDiff(
  scope: DiffScope,
  cwd: string,
  git: GitRunner = runGit
): Promise<CollectedDiff> {
  const diff = await getDiffForModel(scope, cwd, git);
  if (diff.trim() || scope.kind !== 'working-tree') {
    return { analyzingLastCommit: false, diff };
  }

  try {
    const lastCommit = await getDiffForModel({ kind: 'revision', ref: 'HEAD' }, cwd, git);
    if (lastCommit.trim()) {
      return { analyzingLastCommit: true, diff: lastCommit };
    }
  } catch (err) {
    // No HEAD yet (fresh repository) or git failed: report as no changes
    if (!(err instanceof GitError)) throw err;
  }

  return { analyzingLastCommit: false, diff };
}

function parseCount(value: string): number | null {
  if (value === '-') return 0;
  return /^\d+$/.test(value) ? Number.parseInt(value, 10) : null;
}

/**
 * Parse `--numstat` output into per-file stats, skipping ignored paths
 * and malformed records
 */
export function parseNumstat(output: string): FileStat[] {
  const stats: FileStat[] = [];

  for (const line of output.split('\n')) {
    if (!line.trim()) continue;

    // "added\tdeleted\tpath", or "-\t-\tpath" for binary files
    const first = line.indexOf('\t');
    const second = first === -1 ? -1 : line.indexOf('\t', first + 1);
    if (second === -1) continue;

    const path = normalizePath(line.slice(second + 1).trim());
    if (shouldIgnore(path)) continue;

    const added = parseCount(line.slice(0, first).trim());
    const deleted = parseCount(line.slice(first + 1, second).trim());
    if (added === null || deleted === null) continue;

    stats.push({ added, deleted, path });
  }

  return stats;
}

/**
 * Per-file added/deleted line counts for a scope. Report data only, so
 * failures yield an empty list.
 */
export async function getDiffStats(
  scope: DiffScope,
  cwd: string,
  git: GitRunner = runGit
): Promise<FileStat[]> {
  try {
    const result = await git(numstatArgs(scope), cwd);
    if (result.kind !== 'completed' || result.exitCode !== 0) return [];
    return parseNumstat(result.stdout);
  } catch {
    return [];
  }
}

/**
 * Commit metadata for a ref, or null when git cannot resolve it
 */
export async function getCommitInfo(
  ref: string,
  cwd: string,
  git: GitRunner = runGit
): Promise<CommitInfo | null> {
  const result = await git(['log', '-1', '--format=%H%n%an%n%ae%n%ai%n%s%n%b', ref], cwd);
  if (result.kind !== 'completed' || result.exitCode !== 0 || !result.stdout.trim()) {
    return null;
  }

  const lines = result.stdout.trim().split('\n');
  if (lines.length < 5) return null;

  const [hashFull, author, email, date, subject, ...body] = lines;
  return {
    author,
    body: body.join('\n'),
    date,
    email,
    hash: hashFull.slice(0, 12),
    hashFull,
    subject
  };
}
