import {
  ConfigValueError,
  DEFAULT_MODEL,
  getConfigPath,
  isConfigKey,
  loadConfig,
  parseConfigValue,
  saveConfig
} from '../lib/config.js';
import { t } from '../lib/i18n.js';
import type { Output } from '../ui/output.js';

/**
 * `config set <key> <value>`. Resolves to the exit code.
 */
export function configSet(
  key: string,
  value: string,
  output: Output,
  path: string = getConfigPath()
): number {
  if (!isConfigKey(key)) {
    output.error(`Unknown config key: ${key}`, 'en');
    return 1;
  }

  let update: ReturnType<typeof parseConfigValue>;
  try {
    update = parseConfigValue(key, value);
  } catch (err) {
    if (!(err instanceof ConfigValueError)) throw err;
    output.error(err.message, 'en');
    return 1;
  }

  let saved: ReturnType<typeof saveConfig>;
  try {
    saved = saveConfig(update, path);
  } catch (err) {
    output.error(err instanceof Error ? err.message : String(err), 'en');
    return 1;
  }

  switch (key) {
    case 'model':
      output.line(t('config_model_set', 'en', { model: saved.model ?? DEFAULT_MODEL }));
      break;
    case 'lang':
      output.line(t('config_lang_set', 'en', { lang: saved.lang }));
      break;
    case 'report_theme':
      output.line(t('config_theme_set', 'en', { theme: saved.report_theme }));
      break;
    case 'report_auto_open':
      output.line(t('config_auto_open_set', 'en', { value: String(saved.report_auto_open) }));
      break;
  }
  return 0;
}

/**
 * `config show`
 */
export function configShow(output: Output, path: string = getConfigPath()): number {
  const config = loadConfig(path);
  output.line(`model = ${config.model ?? DEFAULT_MODEL}`);
  output.line(`lang = ${config.lang}`);
  output.line(`report_theme = ${config.report_theme}`);
  output.line(`report_auto_open = ${String(config.report_auto_open)}`);
  output.line(t('config_path', 'en', { path }));
  return 0;
}
