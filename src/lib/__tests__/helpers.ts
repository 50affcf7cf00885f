import type { ChatClient, ChatMessage, GitResult, GitRunner } from '../../types.js';
import type { Output } from '../../ui/output.js';

export const REPO_CHECK = 'rev-parse --is-inside-work-tree';

export function ok(stdout: string): GitResult {
  return { exitCode: 0, kind: 'completed', stderr: '', stdout };
}

export function failed(exitCode: number, stderr: string, stdout = ''): GitResult {
  return { exitCode, kind: 'completed', stderr, stdout };
}

/**
 * Git stand-in keyed by the joined argument list. Unknown commands fail like git would.
 */
export function fakeGit(responses: Record<string, GitResult>): GitRunner & { calls: string[][] } {
  const calls: string[][] = [];
  const runner = async (args: string[]): Promise<GitResult> => {
    calls.push(args);
    return responses[args.join(' ')] ?? failed(1, `unexpected git ${args.join(' ')}`);
  };
  return Object.assign(runner, { calls });
}

export interface ChatCall {
  model: string;
  messages: ChatMessage[];
  temperature: number;
}

export function fakeClient(reply: string | Error): ChatClient & { calls: ChatCall[] } {
  const calls: ChatCall[] = [];
  return {
    calls,
    async chat(model, messages, temperature) {
      calls.push({ messages, model, temperature });
      if (reply instanceof Error) throw reply;
      return reply;
    }
  };
}

export type OutputEvent =
  | { type: 'line' | 'info' | 'spinner'; text: string }
  | { type: 'error'; text: string; locale: string }
  | { type: 'analysis' | 'commitMessage'; text: string; title: string };

export function recordingOutput(): Output & { events: OutputEvent[] } {
  const events: OutputEvent[] = [];
  return {
    analysis(markdown, title) {
      events.push({ text: markdown, title, type: 'analysis' });
    },
    commitMessage(message, title) {
      events.push({ text: message, title, type: 'commitMessage' });
    },
    error(message, locale) {
      events.push({ locale, text: message, type: 'error' });
    },
    events,
    info(message) {
      events.push({ text: message, type: 'info' });
    },
    line(text) {
      events.push({ text, type: 'line' });
    },
    spinner(message) {
      events.push({ text: message, type: 'spinner' });
      return { stop() {} };
    }
  };
}

export const APP_SEGMENT = [
  'diff --git a/src/app.ts b/src/app.ts',
  'index 1111111..2222222 100644',
  '--- a/src/app.ts',
  '+++ b/src/app.ts',
  '@@ -1,2 +1,2 @@',
  '-const answer = 41;',
  '+const answer = 42;',
  ' export { answer };'
];

export const MINIFIED_SEGMENT = [
  'diff --git a/public/app.min.js b/public/app.min.js',
  'index 3333333..4444444 100644',
  '--- a/public/app.min.js',
  '+++ b/public/app.min.js',
  '@@ -1 +1 @@',
  '-var a=1;',
  '+var a=2;'
];

export const LOCKFILE_SEGMENT = [
  'diff --git a/package-lock.json b/package-lock.json',
  'index 5555555..6666666 100644',
  '--- a/package-lock.json',
  '+++ b/package-lock.json',
  '@@ -10,3 +10,3 @@',
  '-      "version": "1.0.0",',
  '+      "version": "1.0.1",'
];

export const README_SEGMENT = [
  'diff --git a/README.md b/README.md',
  'index 7777777..8888888 100644',
  '--- a/README.md',
  '+++ b/README.md',
  '@@ -1 +1,2 @@',
  ' # Project',
  '+Usage notes.'
];
