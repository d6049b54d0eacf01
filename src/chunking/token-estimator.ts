import { splitIntoWords } from './utils';

/** Words shorter than this count as half a token. */
const SHORT_WORD_LENGTH = 3;
const SAFETY_FACTOR = 1.2;

/** Rough characters-per-token ratio used wherever a token budget becomes a character budget. */
export const ESTIMATED_CHARS_PER_TOKEN = 4;

const PUNCTUATION = /[^\p{L}\p{N}\s]/gu;

/**
 * Weighted word and punctuation count before the safety factor. Always a
 * multiple of 0.5, and additive over texts joined by whitespace.
 */
export function tokenWeight(text: string | null | undefined): number {
  if (!text) return 0;

  const words = splitIntoWords(text);
  const shortWords = words.filter((w) => w.length < SHORT_WORD_LENGTH).length;
  const normalWords = words.length - shortWords;
  const punctuation = text.match(PUNCTUATION)?.length ?? 0;

  return normalWords * 1.0 + shortWords * 0.5 + punctuation * 0.5;
}

export function weightToTokens(weight: number): number {
  return Math.trunc(weight * SAFETY_FACTOR);
}

/**
 * Heuristic token estimate. Over-estimates slightly on purpose so that a
 * chunk sized by this function stays under the backend limit.
 */
export function estimateTokens(text: string | null | undefined): number {
  return weightToTokens(tokenWeight(text));
}

export function fitsInBudget(text: string, budget: number): boolean {
  return estimateTokens(text) <= budget;
}
