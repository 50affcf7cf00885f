import { z } from 'zod';
import type { ChatClient, ChatMessage, Lang } from '../types.js';

export const DEFAULT_OLLAMA_ENDPOINT = 'http://localhost:11434';

// Local models are slow on large diffs
export const DEFAULT_TIMEOUT_MS = 120_000;

const ANALYSIS_TEMPERATURE = 0.3;
const COMMIT_TEMPERATURE = 0.2;
const MAX_COMMIT_LENGTH = 72;

const ChatResponseSchema = z.object({
  message: z.object({ content: z.string().optional() }).optional()
});

export type ModelErrorKind = 'connection' | 'model-not-found' | 'other';

/**
 * Error raised by the Ollama client
 */
export class OllamaError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: Error
  ) {
    super(message, { cause });
    this.name = 'OllamaError';
  }
}

/**
 * Ollama chat client (self-hosted LLM)
 */
export class OllamaClient implements ChatClient {
  private readonly endpoint: string;
  private readonly timeoutMs: number;

  constructor(endpoint?: string, timeoutMs: number = DEFAULT_TIMEOUT_MS) {
    this.endpoint = (endpoint ?? resolveOllamaEndpoint()).replace(/\/+$/, '');
    this.timeoutMs = timeoutMs;
  }

  async chat(model: string, messages: ChatMessage[], temperature: number): Promise<string> {
    const url = `${this.endpoint}/api/chat`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await fetch(url, {
        body: JSON.stringify({
          messages,
          model,
          options: { temperature },
          stream: false
        }),
        headers: { 'Content-Type': 'application/json' },
        method: 'POST',
        signal: controller.signal
      });
    } catch (err) {
      const cause = err instanceof Error ? err : new Error(String(err));
      if (cause.name === 'AbortError') {
        throw new OllamaError(`Ollama did not answer within ${this.timeoutMs / 1000}s`, undefined, cause);
      }
      throw new OllamaError(`Could not connect to Ollama at ${this.endpoint}`, undefined, cause);
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      const text = await response.text();
      throw new OllamaError(
        `Ollama call failed with status ${response.status}: ${text.slice(0, 400)}`,
        response.status
      );
    }

    const parsed = ChatResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new OllamaError('Ollama response has an unexpected shape', response.status);
    }
    return parsed.data.message?.content ?? '';
  }
}

/**
 * OLLAMA_HOST as the ollama CLI reads it, with a scheme added when missing
 */
export function resolveOllamaEndpoint(): string {
  const host = process.env.OLLAMA_HOST?.trim();
  if (!host) return DEFAULT_OLLAMA_ENDPOINT;
  return /^https?:\/\//.test(host) ? host : `http://${host}`;
}

function languageInstruction(lang: Lang): string {
  if (lang === 'en') return 'Write your entire response in English.';
  if (lang === 'ru') return 'Пиши весь ответ по-русски.';
  return 'Use the same language as the code and commit messages (Russian or English).';
}

/**
 * System prompt for the change review
 */
export function buildAnalysisPrompt(lang: Lang): string {
  return `You are an experienced tech lead. Analyze the following git diff and respond in Markdown. ${languageInstruction(lang)}

Structure (required):

1. **Brief summary** — One sentence: what was done in these changes.
2. **Key changes** — List main edits (files, logic, refactoring).
3. **Potential risks** — Possible bugs, leaks, or bad practices; if none, say "None found."

Be concise. Do not repeat the diff.`;
}

/**
 * Instruction appended after the diff when asking for a commit message
 */
export function buildCommitPrompt(lang: Lang): string {
  return `Based on this git diff, write ONE short commit message line (max ${MAX_COMMIT_LENGTH} characters, imperative mood). ${languageInstruction(lang)}

Be SPECIFIC: state what was actually changed — mention files or logic (e.g. "Add JWT validation in auth.ts", "Refactor login to use server sessions"). Avoid generic phrases like "Fix code", "Update", "Add comments", "Fix code structure".

Output ONLY the message text, no quotes or explanation.`;
}

function fenced(diff: string): string {
  return `\`\`\`diff\n${diff}\n\`\`\``;
}

/**
 * Ask the model for a Markdown review of the diff
 */
export async function analyzeDiff(
  client: ChatClient,
  diff: string,
  model: string,
  lang: Lang = 'auto'
): Promise<string> {
  if (!diff.trim()) {
    return 'No changes to analyze (or diff empty after filtering).';
  }

  return client.chat(
    model,
    [
      { content: buildAnalysisPrompt(lang), role: 'system' },
      { content: fenced(diff), role: 'user' }
    ],
    ANALYSIS_TEMPERATURE
  );
}

/**
 * Ask the model for a one-line commit message
 */
export async function generateCommitMessage(
  client: ChatClient,
  diff: string,
  model: string,
  lang: Lang = 'auto'
): Promise<string> {
  if (!diff.trim()) return 'Update';

  const response = await client.chat(
    model,
    [{ content: `${fenced(diff)}\n\n${buildCommitPrompt(lang)}`, role: 'user' }],
    COMMIT_TEMPERATURE
  );
  return cleanCommitMessage(response);
}

/**
 * Reduce a model reply to a single commit line
 */
export function cleanCommitMessage(msg: string): string {
  const cleaned = msg.trim().replace(/^```\w*\n?/, '').replace(/\n?```$/, '');
  let line = cleaned
    .split('\n')
    .map((l) => l.trim())
    .find(Boolean);
  if (!line) return 'Update';

  for (const quote of ['"', "'", '`']) {
    if (line.length > 2 && line.startsWith(quote) && line.endsWith(quote)) {
      line = line.slice(1, -1).trim();
      break;
    }
  }

  return line.slice(0, MAX_COMMIT_LENGTH) || 'Update';
}

/**
 * Sort a model failure into the hint the user should see
 */
export function classifyModelError(err: unknown): ModelErrorKind {
  const message = (err instanceof Error ? err.message : String(err)).toLowerCase();
  if (message.includes('connect')) return 'connection';
  if (message.includes('404') || message.includes('not found')) return 'model-not-found';
  return 'other';
}
