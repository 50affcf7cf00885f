import type { Lang, Locale } from '../types.js';

export type MessageKey =
  | 'error_prefix'
  | 'dir_not_found'
  | 'no_changes'
  | 'analyzing_last'
  | 'model_label'
  | 'commit_msg_generating'
  | 'commit_written'
  | 'suggested_commit'
  | 'analysis_title'
  | 'ollama_connect'
  | 'ollama_model_not_found'
  | 'ollama_hint'
  | 'config_model_set'
  | 'config_lang_set'
  | 'config_theme_set'
  | 'config_auto_open_set'
  | 'config_path'
  | 'html_report_written';

type MessageTable = Record<MessageKey, string>;

const en: MessageTable = {
  analysis_title: 'diff-sage — change analysis',
  analyzing_last: 'No local changes — analyzing last commit (HEAD).',
  commit_msg_generating: 'Model: {model}. Generating commit message...',
  commit_written: 'Message written to {path}',
  config_auto_open_set: 'Report auto-open set to: {value}',
  config_lang_set: 'Default language set to: {lang}',
  config_model_set: 'Default model set to: {model}',
  config_path: 'Config file: {path}',
  config_theme_set: 'Report theme set to: {theme}',
  dir_not_found: 'Directory not found: {path}',
  error_prefix: 'Error:',
  html_report_written: 'HTML report written to {path}',
  model_label: 'Model: {model}. Analyzing changes...',
  no_changes:
    'No changes. Use --staged for the index or change some files. For the last commit: diff-sage --ref HEAD',
  ollama_connect:
    'Could not connect to Ollama. Start Ollama (https://ollama.com/download) and try again.',
  ollama_hint: 'Hint: ollama list — list models, ollama pull {model} — install.',
  ollama_model_not_found:
    "Model '{model}' not found in Ollama. Install: ollama pull {model}\nOr pick an installed model: diff-sage -m <name>. List: ollama list",
  suggested_commit: 'Suggested commit message'
};

const ru: MessageTable = {
  analysis_title: 'diff-sage — разбор изменений',
  analyzing_last: 'Нет текущих изменений — анализирую последний коммит (HEAD).',
  commit_msg_generating: 'Модель: {model}. Генерация сообщения коммита...',
  commit_written: 'Сообщение записано в {path}',
  config_auto_open_set: 'Автооткрытие отчёта: {value}',
  config_lang_set: 'Язык по умолчанию: {lang}',
  config_model_set: 'Модель по умолчанию: {model}',
  config_path: 'Файл конфига: {path}',
  config_theme_set: 'Тема отчёта: {theme}',
  dir_not_found: 'Каталог не найден: {path}',
  error_prefix: 'Ошибка:',
  html_report_written: 'HTML-отчёт записан в {path}',
  model_label: 'Модель: {model}. Анализ изменений...',
  no_changes:
    'Нет изменений. Используй --staged для индекса или измени файлы. Для последнего коммита: diff-sage --ref HEAD',
  ollama_connect:
    'Не удалось подключиться к Ollama. Запусти Ollama (https://ollama.com/download) и повтори команду.',
  ollama_hint: 'Подсказка: ollama list — список моделей, ollama pull {model} — установка.',
  ollama_model_not_found:
    "Модель '{model}' не найдена в Ollama. Установи: ollama pull {model}\nЛибо укажи модель: diff-sage -m <имя>. Список: ollama list",
  suggested_commit: 'Предложенное сообщение коммита'
};

const MESSAGES: Record<Locale, MessageTable> = { en, ru };

export const FALLBACK_LOCALE: Locale = 'en';

/**
 * UI locale for a language setting; "auto" only affects the model's reply
 */
export function uiLocale(lang: Lang): Locale {
  return lang === 'ru' ? 'ru' : FALLBACK_LOCALE;
}

/**
 * Look up a message and fill its {placeholders}
 */
export function t(
  key: MessageKey,
  locale: string,
  params: Record<string, string> = {}
): string {
  const table = locale === 'ru' || locale === 'en' ? MESSAGES[locale] : MESSAGES[FALLBACK_LOCALE];
  const template = table[key];
  return template.replace(/\{(\w+)\}/g, (match, name: string) => params[name] ?? match);
}
