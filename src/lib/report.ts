import { spawn } from 'node:child_process';
import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname, posix, resolve } from 'node:path';
import rehypeStringify from 'rehype-stringify';
import remarkGfm from 'remark-gfm';
import remarkParse from 'remark-parse';
import remarkRehype from 'remark-rehype';
import { unified } from 'unified';
import type {
  CommitInfo,
  DiffScope,
  FileStat,
  GitRunner,
  Lang,
  ReportTheme
} from '../types.js';
import { getCommitInfo, getDiffStats, runGit } from './git.js';

const MAX_EXTENSIONS = 12;

const EXTENSION_COLORS = [
  'rgba(99, 102, 241, 0.8)',
  'rgba(16, 185, 129, 0.8)',
  'rgba(244, 63, 94, 0.8)',
  'rgba(234, 179, 8, 0.8)',
  'rgba(168, 85, 247, 0.8)',
  'rgba(6, 182, 212, 0.8)',
  'rgba(249, 115, 22, 0.8)',
  'rgba(132, 204, 22, 0.8)',
  'rgba(236, 72, 153, 0.8)',
  'rgba(20, 184, 166, 0.8)',
  'rgba(99, 102, 241, 0.6)',
  'rgba(244, 63, 94, 0.6)'
];

export interface ReportInput {
  diff: string;
  analysis: string;
  scope: DiffScope;
  model: string;
  lang: Lang;
  theme: ReportTheme;
  version: string;
}

export interface ExtensionCount {
  extension: string;
  count: number;
}

export interface ReportData extends ReportInput {
  scopeLabel: string;
  commitInfo: CommitInfo | null;
  fileStats: FileStat[];
  totalAdded: number;
  totalDeleted: number;
  extensions: ExtensionCount[];
  generatedAt: string;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');
}

export function scopeLabel(scope: DiffScope): string {
  switch (scope.kind) {
    case 'revision':
      return `Commit ${scope.ref}`;
    case 'staged':
      return 'Staged changes';
    case 'working-tree':
      return 'Working tree changes';
  }
}

/**
 * Most common file extensions, most frequent first
 */
export function countExtensions(stats: FileStat[], limit: number = MAX_EXTENSIONS): ExtensionCount[] {
  const counts = new Map<string, number>();
  for (const stat of stats) {
    const extension = posix.extname(stat.path) || '(no ext)';
    counts.set(extension, (counts.get(extension) ?? 0) + 1);
  }
  return [...counts.entries()]
    .map(([extension, count]) => ({ count, extension }))
    .sort((a, b) => b.count - a.count)
    .slice(0, limit);
}

export function formatGeneratedAt(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 16)} UTC`;
}

/**
 * Gather everything the report shows besides the analysis itself
 */
export async function buildReportData(
  input: ReportInput,
  cwd: string,
  git: GitRunner = runGit,
  now: Date = new Date()
): Promise<ReportData> {
  const { scope } = input;
  const commitRef = scope.kind === 'revision' ? scope.ref : scope.kind === 'staged' ? 'HEAD' : null;

  const [commitInfo, fileStats] = await Promise.all([
    commitRef ? getCommitInfo(commitRef, cwd, git) : Promise.resolve(null),
    getDiffStats(scope, cwd, git)
  ]);

  return {
    ...input,
    commitInfo,
    extensions: countExtensions(fileStats),
    fileStats,
    generatedAt: formatGeneratedAt(now),
    scopeLabel: scopeLabel(scope),
    totalAdded: fileStats.reduce((sum, f) => sum + f.added, 0),
    totalDeleted: fileStats.reduce((sum, f) => sum + f.deleted, 0)
  };
}

// Raw HTML in the model's reply is dropped, not passed through
const markdownProcessor = unified()
  .use(remarkParse)
  .use(remarkGfm)
  .use(remarkRehype)
  .use(rehypeStringify);

function renderMarkdown(markdown: string): string {
  return String(markdownProcessor.processSync(markdown));
}

function themeVariables(reportTheme: ReportTheme): string {
  if (reportTheme === 'light') {
    return '--bg: #f8fafc; --card: #ffffff; --border: #e2e8f0; --text: #1e293b; --muted: #64748b; --code: #e2e8f0; --diff-bg: #0f172a; --diff-text: #cbd5e1;';
  }
  return '--bg: #0f172a; --card: #1e293b; --border: #334155; --text: #e2e8f0; --muted: #94a3b8; --code: #334155; --diff-bg: #020617; --diff-text: #cbd5e1;';
}

function renderStyles(reportTheme: ReportTheme): string {
  return `
:root { ${themeVariables(reportTheme)} }
* { box-sizing: border-box; }
body { margin: 0; font-family: system-ui, -apple-system, Segoe UI, sans-serif; background: var(--bg); color: var(--text); line-height: 1.5; }
.wrap { max-width: 64rem; margin: 0 auto; padding: 2rem 1rem; }
.head { background: linear-gradient(135deg, #6366f1 0%, #8b5cf6 50%, #a855f7 100%); border-radius: 1rem; padding: 2rem; margin-bottom: 2rem; color: #fff; }
.head h1 { margin: 0; font-size: 1.875rem; }
.head .sub { margin-top: 0.5rem; font-size: 1.125rem; }
.head .meta { margin-top: 1rem; font-size: 0.875rem; opacity: 0.85; }
.stats { display: grid; grid-template-columns: repeat(4, 1fr); gap: 0.75rem; margin-top: 1rem; }
.stat { background: rgba(255,255,255,0.15); border-radius: 0.5rem; padding: 0.75rem; text-align: center; }
.stat .n { font-size: 1.25rem; font-weight: 700; display: block; }
.stat .l { font-size: 0.7rem; text-transform: uppercase; letter-spacing: 0.05em; }
.stat.add .n { color: #6ee7b7; }
.stat.del .n { color: #fda4af; }
section { margin-bottom: 2rem; }
h2 { font-size: 1.25rem; margin: 0 0 0.75rem 0; }
.card { background: var(--card); border: 1px solid var(--border); border-radius: 0.75rem; padding: 1.5rem; overflow-x: auto; }
table { width: 100%; font-size: 0.875rem; border-collapse: collapse; }
th, td { padding: 0.5rem 0.75rem; text-align: left; border-bottom: 1px solid var(--border); }
.muted { color: var(--muted); }
.num { text-align: right; font-variant-numeric: tabular-nums; }
.add-num { color: #059669; }
.del-num { color: #e11d48; }
.mono { font-family: ui-monospace, monospace; }
.bar { display: flex; height: 0.6rem; min-width: 8rem; border-radius: 0.3rem; overflow: hidden; background: var(--code); }
.bar .a { background: rgb(16, 185, 129); }
.bar .d { background: rgb(244, 63, 94); }
.ext { display: flex; align-items: center; gap: 0.5rem; margin: 0.25rem 0; }
.ext .swatch { width: 0.8rem; height: 0.8rem; border-radius: 0.2rem; }
.prose code { background: var(--code); padding: 0.1rem 0.3rem; border-radius: 0.25rem; }
.prose pre { background: var(--diff-bg); color: var(--diff-text); padding: 1rem; border-radius: 0.5rem; overflow-x: auto; }
.diff { background: var(--diff-bg); color: var(--diff-text); padding: 1rem; border-radius: 0.75rem; overflow: auto; max-height: 24rem; font-size: 0.85rem; white-space: pre; margin: 0; }
footer { text-align: center; color: var(--muted); font-size: 0.875rem; padding-top: 1rem; }
`;
}

function renderCommit(info: CommitInfo): string {
  const body = info.body.trim()
    ? `<pre style="white-space: pre-wrap">${escapeHtml(info.body)}</pre>`
    : '';
  return `<section>
      <h2>Commit</h2>
      <div class="card">
        <table>
          <tr><td class="muted">Hash</td><td><code class="mono">${escapeHtml(info.hash)}</code></td></tr>
          <tr><td class="muted">Author</td><td>${escapeHtml(info.author)} &lt;${escapeHtml(info.email)}&gt;</td></tr>
          <tr><td class="muted">Date</td><td>${escapeHtml(info.date)}</td></tr>
          <tr><td class="muted">Subject</td><td>${escapeHtml(info.subject)}</td></tr>
        </table>
        ${body}
      </div>
    </section>`;
}

/**
 * Largest per-file change count, at least 1
 */
export function maxChanges(stats: FileStat[]): number {
  return stats.reduce((max, f) => Math.max(max, f.added + f.deleted), 1);
}

function renderFiles(stats: FileStat[]): string {
  const largest = maxChanges(stats);
  const rows = stats
    .map((f) => {
      const addWidth = ((f.added / largest) * 100).toFixed(1);
      const delWidth = ((f.deleted / largest) * 100).toFixed(1);
      return `<tr><td class="mono" title="${escapeHtml(f.path)}">${escapeHtml(f.path)}</td><td class="num add-num">+${f.added}</td><td class="num del-num">-${f.deleted}</td><td><div class="bar"><span class="a" style="width: ${addWidth}%"></span><span class="d" style="width: ${delWidth}%"></span></div></td></tr>`;
    })
    .join('\n');
  return `<section>
      <h2>Changed files</h2>
      <div class="card">
        <table>
          <thead><tr><th>File</th><th class="num">+</th><th class="num">-</th><th></th></tr></thead>
          <tbody>
${rows}
          </tbody>
        </table>
      </div>
    </section>`;
}

function renderExtensions(extensions: ExtensionCount[]): string {
  const items = extensions
    .map(
      (e, i) =>
        `<div class="ext"><span class="swatch" style="background: ${EXTENSION_COLORS[i % EXTENSION_COLORS.length]}"></span><span class="mono">${escapeHtml(e.extension)}</span><span class="muted">${e.count}</span></div>`
    )
    .join('\n');
  return `<section>
      <h2>By extension</h2>
      <div class="card">
${items}
      </div>
    </section>`;
}

/**
 * Render a single self-contained HTML document (inline CSS, no scripts, no network)
 */
export function renderReport(data: ReportData): string {
  const net = data.totalAdded - data.totalDeleted;
  const title = escapeHtml(data.scopeLabel);

  return `<!DOCTYPE html>
<html lang="${data.lang === 'ru' ? 'ru' : 'en'}">
<head>
  <meta charset="UTF-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1.0" />
  <title>diff-sage report — ${title}</title>
  <style>${renderStyles(data.theme)}</style>
</head>
<body>
  <div class="wrap">
    <header class="head">
      <h1>diff-sage report</h1>
      <p class="sub">${title}</p>
      <p class="meta">Model: <strong>${escapeHtml(data.model)}</strong> · ${data.generatedAt}</p>
      <div class="stats">
        <div class="stat"><span class="n">${data.fileStats.length}</span><span class="l">Files</span></div>
        <div class="stat add"><span class="n">+${data.totalAdded}</span><span class="l">Added</span></div>
        <div class="stat del"><span class="n">-${data.totalDeleted}</span><span class="l">Deleted</span></div>
        <div class="stat"><span class="n">${net}</span><span class="l">Net</span></div>
      </div>
    </header>
    ${data.commitInfo ? renderCommit(data.commitInfo) : ''}
    <section>
      <h2>Analysis</h2>
      <div class="card prose">
${renderMarkdown(data.analysis)}
      </div>
    </section>
    ${data.fileStats.length > 0 ? renderFiles(data.fileStats) : ''}
    ${data.extensions.length > 0 ? renderExtensions(data.extensions) : ''}
    <section>
      <h2>Diff</h2>
      <div class="card"><pre class="diff">${escapeHtml(data.diff)}</pre></div>
    </section>
    <footer>Generated by diff-sage ${escapeHtml(data.version)} · ${data.generatedAt}</footer>
  </div>
</body>
</html>
`;
}

/**
 * Open a file with the platform's default handler. Failures are not fatal.
 */
export function openInBrowser(path: string): void {
  const [command, args]: [string, string[]] =
    process.platform === 'win32'
      ? ['cmd', ['/c', 'start', '', path]]
      : process.platform === 'darwin'
        ? ['open', [path]]
        : ['xdg-open', [path]];

  const child = spawn(command, args, { detached: true, stdio: 'ignore', windowsHide: true });
  child.on('error', () => {
    // No opener available; the path is still printed
  });
  child.unref();
}

/**
 * Write the report, creating parent directories as needed
 */
export function writeReport(
  reportPath: string,
  data: ReportData,
  options: { autoOpen?: boolean; open?: (path: string) => void } = {}
): string {
  const target = resolve(reportPath);
  mkdirSync(dirname(target), { recursive: true });
  writeFileSync(target, renderReport(data), 'utf-8');
  if (options.autoOpen ?? true) {
    (options.open ?? openInBrowser)(target);
  }
  return target;
}
