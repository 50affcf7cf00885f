import { writeFileSync } from 'node:fs';
import { basename, resolve } from 'node:path';
import { analyzeDiff, classifyModelError, generateCommitMessage } from '../lib/ai.js';
import { DEFAULT_MODEL, getConfigPath, loadConfig } from '../lib/config.js';
import { collectDiff, GitError, isDirectory, runGit, scopeFromOptions } from '../lib/git.js';
import { t, uiLocale } from '../lib/i18n.js';
import { buildReportData, writeReport } from '../lib/report.js';
import type { ChatClient, CollectedDiff, DiffScope, GitRunner, Lang, Locale } from '../types.js';
import type { Output } from '../ui/output.js';
import { fileLink } from '../ui/output.js';

export interface RunOptions {
  staged?: boolean;
  ref?: string;
  model?: string;
  lang?: Lang;
  commitMsg?: boolean;
  cwd?: string;
  outputFile?: string;
  html?: string;
}

export interface RunDeps {
  output: Output;
  client: ChatClient;
  version: string;
  git?: GitRunner;
  configPath?: string;
  openReport?: (path: string) => void;
}

/**
 * Extract error message from unknown error type
 */
function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Print a model failure with the matching hint
 */
export function reportModelError(output: Output, err: unknown, model: string, locale: Locale): void {
  switch (classifyModelError(err)) {
    case 'connection':
      output.error(t('ollama_connect', locale), locale);
      return;
    case 'model-not-found':
      output.error(t('ollama_model_not_found', locale, { model }), locale);
      return;
    case 'other':
      output.error(`${getErrorMessage(err).trim()}\n${t('ollama_hint', locale, { model })}`, locale);
  }
}

/**
 * Analyze the diff or generate a commit message. Resolves to the exit code.
 */
export async function runCommand(options: RunOptions, deps: RunDeps): Promise<number> {
  const { output, client } = deps;
  const git = deps.git ?? runGit;
  const cwd = resolve(options.cwd ?? process.cwd());
  const config = loadConfig(deps.configPath ?? getConfigPath());
  const model = options.model || config.model || DEFAULT_MODEL;
  const lang: Lang = options.lang ?? config.lang;
  const locale = uiLocale(lang);
  const scope: DiffScope = scopeFromOptions(options);

  if (!isDirectory(cwd)) {
    output.error(t('dir_not_found', locale, { path: cwd }), locale);
    return 1;
  }

  let collected: CollectedDiff;
  try {
    collected = await collectDiff(scope, cwd, git);
  } catch (err) {
    if (!(err instanceof GitError)) throw err;
    output.error(err.message, locale);
    return 1;
  }

  const { diff, analyzingLastCommit } = collected;
  if (!diff.trim()) {
    output.error(t('no_changes', locale), locale);
    return 1;
  }

  if (analyzingLastCommit) {
    output.info(t('analyzing_last', locale));
  }

  if (options.commitMsg) {
    const spinner = output.spinner(t('commit_msg_generating', locale, { model }));
    let message: string;
    try {
      message = await generateCommitMessage(client, diff, model, lang);
      spinner.stop();
    } catch (err) {
      spinner.stop();
      reportModelError(output, err, model, locale);
      return 1;
    }

    if (!options.outputFile) {
      output.commitMessage(message, t('suggested_commit', locale));
      return 0;
    }
    try {
      writeFileSync(options.outputFile, message, 'utf-8');
    } catch (err) {
      output.error(getErrorMessage(err), locale);
      return 1;
    }
    output.info(t('commit_written', locale, { path: options.outputFile }));
    return 0;
  }

  const spinner = output.spinner(t('model_label', locale, { model }));
  let analysis: string;
  try {
    analysis = await analyzeDiff(client, diff, model, lang);
    spinner.stop();
  } catch (err) {
    spinner.stop();
    reportModelError(output, err, model, locale);
    return 1;
  }

  output.analysis(analysis, t('analysis_title', locale));

  if (options.html) {
    const reportScope: DiffScope = analyzingLastCommit ? { kind: 'revision', ref: 'HEAD' } : scope;
    try {
      const data = await buildReportData(
        {
          analysis,
          diff,
          lang,
          model,
          scope: reportScope,
          theme: config.report_theme,
          version: deps.version
        },
        cwd,
        git
      );
      const written = writeReport(options.html, data, {
        autoOpen: config.report_auto_open,
        open: deps.openReport
      });
      output.info(t('html_report_written', locale, { path: fileLink(written, basename(written)) }));
    } catch (err) {
      output.error(getErrorMessage(err), locale);
      return 1;
    }
  }

  return 0;
}
