import type { Locale } from './types.js';

export const SEPARATOR = '-'.repeat(40);

export interface Messages {
  processing(path: string): string;
  missing(path: string): string;
  separator: string;
}

const catalogs: Record<Locale, Messages> = {
  en: {
    processing: (path) => `Processing repository: ${path}`,
    missing: (path) => `WARNING: Directory ${path} does not exist, skipping`,
    separator: SEPARATOR,
  },
  ru: {
    processing: (path) => `Обработка репозитория: ${path}`,
    missing: (path) => `ВНИМАНИЕ: Директория ${path} не существует, пропускаем`,
    separator: SEPARATOR,
  },
};

export function messagesFor(locale: Locale): Messages {
  return catalogs[locale];
}
