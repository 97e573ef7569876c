import { CYRILLIC_PATTERN } from '../config/constants';

/**
 * Guess the synthesis language from the script the text is written in.
 * Only Cyrillic is recognized; everything else falls back to the default.
 */
export function detectLanguage(text: string, fallback: string): string {
  return CYRILLIC_PATTERN.test(text) ? 'ru' : fallback;
}

/**
 * An explicit language always wins over detection.
 */
export function resolveLanguage(text: string, requested: string | undefined, fallback: string): string {
  if (requested) {
    return requested;
  }
  return detectLanguage(text, fallback);
}
