// src/lib/config.ts

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { z } from 'zod';

export const APP_NAME = 'diff-sage';
export const CONFIG_FILENAME = 'config.json';

// Fallback when neither the flag nor the config names a model (see `ollama list`)
export const DEFAULT_MODEL = 'llama3';

export const VALID_LANGS = ['en', 'ru', 'auto'] as const;
export const REPORT_THEMES = ['dark', 'light'] as const;
export const CONFIG_KEYS = ['model', 'lang', 'report_theme', 'report_auto_open'] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

// Each key falls back on its own, so one bad value does not reset the rest
export const UserConfigSchema = z.object({
  lang: z.enum(VALID_LANGS).catch('auto'),
  model: z.string().min(1).optional().catch(undefined),
  report_auto_open: z.boolean().catch(true),
  report_theme: z.enum(REPORT_THEMES).catch('dark')
});

export type UserConfig = z.infer<typeof UserConfigSchema>;

export const DEFAULT_CONFIG: UserConfig = {
  lang: 'auto',
  report_auto_open: true,
  report_theme: 'dark'
};

export class ConfigValueError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigValueError';
  }
}

/**
 * Windows: %APPDATA%/diff-sage, elsewhere ~/.config/diff-sage
 */
export function getConfigDir(): string {
  const override = process.env.DIFF_SAGE_CONFIG_DIR?.trim();
  if (override) return override;
  if (process.platform === 'win32') {
    return join(process.env.APPDATA ?? homedir(), APP_NAME);
  }
  return join(homedir(), '.config', APP_NAME);
}

export function getConfigPath(): string {
  return join(getConfigDir(), CONFIG_FILENAME);
}

/**
 * Load the user config. A missing or unreadable file yields the defaults.
 */
export function loadConfig(path: string = getConfigPath()): UserConfig {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch {
    return { ...DEFAULT_CONFIG };
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return { ...DEFAULT_CONFIG };
  }

  const parsed = UserConfigSchema.safeParse(data);
  return parsed.success ? parsed.data : { ...DEFAULT_CONFIG };
}

/**
 * Merge updates into the stored config and write it back
 */
export function saveConfig(updates: Partial<UserConfig>, path: string = getConfigPath()): UserConfig {
  const next: UserConfig = { ...loadConfig(path), ...updates };
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, `${JSON.stringify(next, null, 2)}\n`, 'utf-8');
  return next;
}

export function isConfigKey(key: string): key is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(key);
}

/**
 * Validate a `config set` value and convert it to the stored type
 */
export function parseConfigValue(key: ConfigKey, raw: string): Partial<UserConfig> {
  switch (key) {
    case 'model': {
      const model = raw.trim();
      if (!model) throw new ConfigValueError('model must not be empty');
      return { model };
    }
    case 'lang': {
      const lang = z.enum(VALID_LANGS).safeParse(raw);
      if (!lang.success) {
        throw new ConfigValueError(`lang must be one of: ${VALID_LANGS.join(', ')}`);
      }
      return { lang: lang.data };
    }
    case 'report_theme': {
      const theme = z.enum(REPORT_THEMES).safeParse(raw);
      if (!theme.success) {
        throw new ConfigValueError(`report_theme must be: ${REPORT_THEMES.join(', ')}`);
      }
      return { report_theme: theme.data };
    }
    case 'report_auto_open':
      return { report_auto_open: ['1', 'true', 'yes'].includes(raw.trim().toLowerCase()) };
  }
}
