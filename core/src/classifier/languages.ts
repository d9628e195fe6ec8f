import { Language, SUPPORTED_LANGUAGES } from '../types';
import { UnsupportedLanguageError } from '../errors';

export const LANGUAGE_FACTORS: Readonly<Record<Language, number>> = Object.freeze({
  tamil: 0.95,
  english: 1.0,
  hindi: 0.98,
  malayalam: 0.96,
  telugu: 0.97,
});

export function isLanguage(value: string): value is Language {
  return SUPPORTED_LANGUAGES.some((language) => language === value);
}

/** Confidence multiplier for `language`; 1.0 for anything outside the table. */
export function languageFactor(language: string): number {
  return isLanguage(language) ? LANGUAGE_FACTORS[language] : 1.0;
}

/** Normalise user input ("Tamil", " english ") to a supported language. */
export function parseLanguage(value: string): Language {
  const normalized = value.trim().toLowerCase();
  if (!isLanguage(normalized)) {
    throw new UnsupportedLanguageError(value);
  }
  return normalized;
}
