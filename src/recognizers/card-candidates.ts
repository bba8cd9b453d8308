/**
 * Card Candidate Extractor
 * Finds card-like digit runs of every supported length.
 *
 * Matching is deliberately permissive: the same digit run may be reported by
 * several matchers when it could plausibly be a card of several lengths.
 * Issuer classification and the Luhn check decide which candidates survive.
 */

import type { Candidate } from '../types/index.js';
import { createCandidateMatcher, type CandidateMatcher } from './base.js';

/** Optional single separator between digit groups */
const SEP = '[ \\t_-]?';

function groups(...sizes: number[]): RegExp {
  const body = sizes.map((size) => `\\d{${size}}`).join(SEP);
  return new RegExp(`\\b${body}\\b`, 'g');
}

/**
 * Card-like patterns by total length.
 * All patterns allow optional separators (space, tab, dash, underscore).
 */
const CANDIDATE_PATTERNS = {
  // 4-4-4-4: Visa, Mastercard, Discover, JCB, most others
  16: groups(4, 4, 4, 4),

  // 4-6-5: American Express
  15: groups(4, 6, 5),

  // 4-4-4-4-3: Visa, UnionPay, Maestro long form
  19: groups(4, 4, 4, 4, 3),

  // 4-4-4-4-2
  18: groups(4, 4, 4, 4, 2),

  // 4-4-4-4-1
  17: groups(4, 4, 4, 4, 1),

  // 4-6-4: Diners Club
  14: groups(4, 6, 4),
} as const;

/**
 * Run order of the matchers
 */
const MATCHER_ORDER = [16, 15, 19, 18, 17, 14] as const;

/**
 * Default battery of matchers, in run order
 */
export const CANDIDATE_MATCHERS: readonly CandidateMatcher[] = MATCHER_ORDER.map((length) =>
  createCandidateMatcher({ length, pattern: CANDIDATE_PATTERNS[length] })
);

/**
 * Lengths the default battery can report
 */
export const SUPPORTED_CANDIDATE_LENGTHS: readonly number[] = [...MATCHER_ORDER];

/**
 * Lazily yields every candidate in the text.
 * Each matcher makes one pass over the full text; results are grouped by
 * matcher (in run order) and in text order within a matcher.
 */
export function* extractCandidates(
  text: string,
  matchers: readonly CandidateMatcher[] = CANDIDATE_MATCHERS
): Generator<Candidate> {
  for (const matcher of matchers) {
    yield* matcher.find(text);
  }
}
