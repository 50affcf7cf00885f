import { describe, expect, it } from 'vitest';
import { TRUNCATION_MARKER } from '../diff-parser.js';
import {
  collectDiff,
  getCommitInfo,
  getDiff,
  getDiffForModel,
  getDiffStats,
  GitError,
  isInsideWorkTree,
  parseNumstat,
  scopeFromOptions,
  toGitError
} from '../git.js';
import type { GitRunner } from '../../types.js';
import {
  APP_SEGMENT,
  failed,
  fakeGit,
  LOCKFILE_SEGMENT,
  ok,
  README_SEGMENT,
  REPO_CHECK
} from './helpers.js';

const CWD = '/work/repo';
const WORKING_TREE = 'diff --no-color';
const STAGED = 'diff --no-color --cached';
const SHOW_HEAD = 'show HEAD --format= --no-color --';

const rawPatch = [...LOCKFILE_SEGMENT, ...APP_SEGMENT].join('\n');
const appPatch = APP_SEGMENT.join('\n');

describe('scopeFromOptions', () => {
  it('prefers an explicit ref over --staged', () => {
    expect(scopeFromOptions({ ref: 'HEAD~1', staged: true })).toEqual({
      kind: 'revision',
      ref: 'HEAD~1'
    });
    expect(scopeFromOptions({ staged: true })).toEqual({ kind: 'staged' });
    expect(scopeFromOptions({})).toEqual({ kind: 'working-tree' });
  });
});

describe('toGitError', () => {
  it('maps each failure kind to its message and exit code', () => {
    expect(toGitError({ kind: 'timeout' })).toMatchObject({
      exitCode: -1,
      message: 'Git command timed out.'
    });
    expect(toGitError({ kind: 'not-found' })).toMatchObject({
      exitCode: 127,
      message: 'Git not found. Install Git.'
    });
    expect(toGitError(failed(128, 'fatal: bad revision'))).toMatchObject({
      exitCode: 128,
      message: 'fatal: bad revision'
    });
    expect(toGitError(failed(1, '', 'only stdout'))).toMatchObject({ message: 'only stdout' });
    expect(toGitError(failed(1, ''))).toMatchObject({ message: 'Unknown git error' });
  });
});

describe('isInsideWorkTree', () => {
  it('is false when git reports no repository', async () => {
    const git = fakeGit({ [REPO_CHECK]: failed(128, 'fatal: not a git repository') });
    expect(await isInsideWorkTree(CWD, git)).toBe(false);
  });

  it('raises when git is not installed', async () => {
    const git: GitRunner = async () => ({ kind: 'not-found' });
    await expect(isInsideWorkTree(CWD, git)).rejects.toThrow('Git not found. Install Git.');
  });
});

describe('getDiff', () => {
  it('filters the working tree diff', async () => {
    const git = fakeGit({ [REPO_CHECK]: ok('true'), [WORKING_TREE]: ok(rawPatch) });
    expect(await getDiff({ kind: 'working-tree' }, CWD, git)).toBe(appPatch);
    expect(git.calls).toEqual([
      ['rev-parse', '--is-inside-work-tree'],
      ['diff', '--no-color']
    ]);
  });

  it('queries the index for staged changes', async () => {
    const git = fakeGit({ [REPO_CHECK]: ok('true'), [STAGED]: ok(rawPatch) });
    expect(await getDiff({ kind: 'staged' }, CWD, git)).toBe(appPatch);
    expect(git.calls[1]).toEqual(['diff', '--no-color', '--cached']);
  });

  it('shows a single commit without its metadata', async () => {
    const git = fakeGit({
      [REPO_CHECK]: ok('true'),
      'show abc123 --format= --no-color --': ok(rawPatch)
    });
    expect(await getDiff({ kind: 'revision', ref: 'abc123' }, CWD, git)).toBe(appPatch);
  });

  it('returns an empty patch outside a repository', async () => {
    const git = fakeGit({ [REPO_CHECK]: failed(128, 'fatal: not a git repository') });
    expect(await getDiff({ kind: 'working-tree' }, CWD, git)).toBe('');
    expect(git.calls).toHaveLength(1);
  });

  it('treats a timed out repository check as no repository', async () => {
    const git: GitRunner = async () => ({ kind: 'timeout' });
    expect(await getDiff({ kind: 'staged' }, CWD, git)).toBe('');
  });

  it('raises GitError with the diagnostic and exit code', async () => {
    const git = fakeGit({
      [REPO_CHECK]: ok('true'),
      'show nope --format= --no-color --': failed(128, "fatal: bad revision 'nope'")
    });
    const result = getDiff({ kind: 'revision', ref: 'nope' }, CWD, git);
    await expect(result).rejects.toBeInstanceOf(GitError);
    await expect(result).rejects.toMatchObject({
      exitCode: 128,
      message: "fatal: bad revision 'nope'"
    });
  });

  it('reports a timeout of the diff command', async () => {
    const git = fakeGit({ [REPO_CHECK]: ok('true'), [WORKING_TREE]: { kind: 'timeout' } });
    await expect(getDiff({ kind: 'working-tree' }, CWD, git)).rejects.toMatchObject({
      exitCode: -1,
      message: 'Git command timed out.'
    });
  });
});

describe('getDiffForModel', () => {
  it('bounds large patches', async () => {
    const big = ['diff --git a/src/big.ts b/src/big.ts', `+${'x'.repeat(40_000)}`].join('\n');
    const git = fakeGit({ [REPO_CHECK]: ok('true'), [WORKING_TREE]: ok(big) });
    const diff = await getDiffForModel({ kind: 'working-tree' }, CWD, git);
    expect(diff).toHaveLength(30_000 + TRUNCATION_MARKER.length);
    expect(diff.startsWith('diff --git a/src/big.ts b/src/big.ts')).toBe(true);
  });
});

describe('collectDiff', () => {
  it('falls back to the last commit when the working tree is clean', async () => {
    const git = fakeGit({
      [REPO_CHECK]: ok('true'),
      [SHOW_HEAD]: ok(rawPatch),
      [WORKING_TREE]: ok('')
    });
    const collected = await collectDiff({ kind: 'working-tree' }, CWD, git);
    const explicit = await getDiffForModel({ kind: 'revision', ref: 'HEAD' }, CWD, git);

    expect(collected).toEqual({ analyzingLastCommit: true, diff: explicit });
    expect(collected.diff).toBe(appPatch);
  });

  it('does not fall back when there are local changes', async () => {
    const git = fakeGit({ [REPO_CHECK]: ok('true'), [WORKING_TREE]: ok(rawPatch) });
    expect(await collectDiff({ kind: 'working-tree' }, CWD, git)).toEqual({
      analyzingLastCommit: false,
      diff: appPatch
    });
    expect(git.calls.some((args) => args[0] === 'show')).toBe(false);
  });

  it('falls back when only ignored files changed', async () => {
    const git = fakeGit({
      [REPO_CHECK]: ok('true'),
      [SHOW_HEAD]: ok(README_SEGMENT.join('\n')),
      [WORKING_TREE]: ok(LOCKFILE_SEGMENT.join('\n'))
    });
    expect(await collectDiff({ kind: 'working-tree' }, CWD, git)).toEqual({
      analyzingLastCommit: true,
      diff: README_SEGMENT.join('\n')
    });
  });

  it('never falls back for staged changes or explicit revisions', async () => {
    const git = fakeGit({
      [REPO_CHECK]: ok('true'),
      [SHOW_HEAD]: ok(rawPatch),
      [STAGED]: ok(''),
      'show abc123 --format= --no-color --': ok('')
    });
    expect(await collectDiff({ kind: 'staged' }, CWD, git)).toEqual({
      analyzingLastCommit: false,
      diff: ''
    });
    expect(await collectDiff({ kind: 'revision', ref: 'abc123' }, CWD, git)).toEqual({
      analyzingLastCommit: false,
      diff: ''
    });
    expect(git.calls.some((args) => args[1] === 'HEAD')).toBe(false);
  });

  it('swallows a git failure during the fallback', async () => {
    const git = fakeGit({
      [REPO_CHECK]: ok('true'),
      [SHOW_HEAD]: failed(128, "fatal: ambiguous argument 'HEAD'"),
      [WORKING_TREE]: ok('')
    });
    expect(await collectDiff({ kind: 'working-tree' }, CWD, git)).toEqual({
      analyzingLastCommit: false,
      diff: ''
    });
  });

  it('propagates a failure of the first query', async () => {
    const git = fakeGit({
      [REPO_CHECK]: ok('true'),
      [STAGED]: failed(129, 'error: unknown option')
    });
    await expect(collectDiff({ kind: 'staged' }, CWD, git)).rejects.toMatchObject({
      exitCode: 129,
      message: 'error: unknown option'
    });
  });
});

describe('parseNumstat', () => {
  it('parses counts, treats binary markers as zero and skips bad records', () => {
    const output = [
      '3\t1\tsrc/app.ts',
      '-\t-\tbinary.png',
      '10\t0\tpackage-lock.json',
      'bad\t1\tsrc/broken.ts',
      '5\t2',
      '',
      '7\t0\tdocs/a b.md'
    ].join('\n');

    expect(parseNumstat(output)).toEqual([
      { added: 3, deleted: 1, path: 'src/app.ts' },
      { added: 0, deleted: 0, path: 'binary.png' },
      { added: 7, deleted: 0, path: 'docs/a b.md' }
    ]);
  });

  it('normalizes separators and keeps tabs inside the path', () => {
    expect(parseNumstat('1\t2\tsrc\\win.ts\n4\t0\tweird\tname.txt')).toEqual([
      { added: 1, deleted: 2, path: 'src/win.ts' },
      { added: 4, deleted: 0, path: 'weird\tname.txt' }
    ]);
  });

  it('drops ignored paths', () => {
    expect(parseNumstat('1\t1\tvendor/lib.go\n2\t2\tdist/index.js')).toEqual([]);
  });
});

describe('getDiffStats', () => {
  it('queries numstat for each scope', async () => {
    const git = fakeGit({
      'diff --numstat': ok('1\t0\ta.ts'),
      'diff --numstat --cached': ok('2\t0\tb.ts'),
      'show abc123 --numstat --format=': ok('3\t0\tc.ts')
    });
    expect(await getDiffStats({ kind: 'working-tree' }, CWD, git)).toEqual([
      { added: 1, deleted: 0, path: 'a.ts' }
    ]);
    expect(await getDiffStats({ kind: 'staged' }, CWD, git)).toEqual([
      { added: 2, deleted: 0, path: 'b.ts' }
    ]);
    expect(await getDiffStats({ kind: 'revision', ref: 'abc123' }, CWD, git)).toEqual([
      { added: 3, deleted: 0, path: 'c.ts' }
    ]);
  });

  it('returns an empty list on any failure', async () => {
    expect(await getDiffStats({ kind: 'working-tree' }, CWD, fakeGit({}))).toEqual([]);
    expect(await getDiffStats({ kind: 'staged' }, CWD, async () => ({ kind: 'timeout' }))).toEqual(
      []
    );
    const throwing: GitRunner = async () => {
      throw new Error('spawn failed');
    };
    expect(await getDiffStats({ kind: 'staged' }, CWD, throwing)).toEqual([]);
  });
});

describe('getCommitInfo', () => {
  const LOG = 'log -1 --format=%H%n%an%n%ae%n%ai%n%s%n%b';

  it('parses commit metadata', async () => {
    const git = fakeGit({
      [`${LOG} HEAD`]: ok(
        [
          'abcdef1234567890abcdef1234567890abcdef12',
          'Test Author',
          'author@example.com',
          '2024-05-01 10:00:00 +0000',
          'Add diff parser',
          'First body line',
          'Second body line'
        ].join('\n')
      )
    });

    expect(await getCommitInfo('HEAD', CWD, git)).toEqual({
      author: 'Test Author',
      body: 'First body line\nSecond body line',
      date: '2024-05-01 10:00:00 +0000',
      email: 'author@example.com',
      hash: 'abcdef123456',
      hashFull: 'abcdef1234567890abcdef1234567890abcdef12',
      subject: 'Add diff parser'
    });
  });

  it('returns null when the ref cannot be resolved or output is short', async () => {
    expect(await getCommitInfo('nope', CWD, fakeGit({}))).toBeNull();
    const short = fakeGit({ [`${LOG} HEAD`]: ok('abc\nTest Author') });
    expect(await getCommitInfo('HEAD', CWD, short)).toBeNull();
  });
});
