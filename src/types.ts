export type DiffScope =
  | { kind: 'working-tree' }
  | { kind: 'staged' }
  | { kind: 'revision'; ref: string };

export type GitResult =
  | { kind: 'completed'; stdout: string; stderr: string; exitCode: number }
  | { kind: 'timeout' }
  | { kind: 'not-found' };

export type GitRunner = (args: string[], cwd: string) => Promise<GitResult>;

export interface FileStat {
  path: string;
  added: number;
  deleted: number;
}

export interface FileSegment {
  path: string | null;
  lines: string[];
}

export interface CollectedDiff {
  diff: string;
  analyzingLastCommit: boolean;
}

export interface CommitInfo {
  hash: string;
  hashFull: string;
  author: string;
  email: string;
  date: string;
  subject: string;
  body: string;
}

export type Lang = 'en' | 'ru' | 'auto';

export type Locale = 'en' | 'ru';

export type ReportTheme = 'dark' | 'light';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatClient {
  chat(model: string, messages: ChatMessage[], temperature: number): Promise<string>;
}
