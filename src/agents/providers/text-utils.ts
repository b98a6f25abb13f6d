import { Language } from '../../config/types';

const NON_WORD = /[^\p{L}\p{N}]+/gu;
const ARABIC_LETTER = /[؀-ۿ]/g;
const LATIN_LETTER = /[A-Za-z]/g;

/** Lowercased word tokens; punctuation and underscores split words */
export function tokenize(text: string): string[] {
  return text.toLowerCase().split(NON_WORD).filter(Boolean);
}

/** Token-normalized text padded with spaces, for whole-word phrase lookups */
export function normalizeForMatching(text: string): string {
  return ` ${tokenize(text).join(' ')} `;
}

/** True when the phrase appears in normalized text on word boundaries */
export function containsPhrase(normalized: string, phrase: string): boolean {
  const needle = tokenize(phrase).join(' ');
  return needle.length > 0 && normalized.includes(` ${needle} `);
}

export function detectLanguage(text: string, fallback: Language = 'en'): Language {
  const arabic = text.match(ARABIC_LETTER)?.length ?? 0;
  const latin = text.match(LATIN_LETTER)?.length ?? 0;
  if (arabic === 0 && latin === 0) return fallback;
  return arabic > latin ? 'ar' : 'en';
}

export function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
