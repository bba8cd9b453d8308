/**
 * Candidate Matcher Interface
 * Defines the contract for the pattern matchers that find card-like digit runs
 */

import type { Candidate } from '../types/index.js';

/**
 * Finds digit runs of one assumed total length
 */
export interface CandidateMatcher {
  /** Total number of digits this matcher looks for */
  readonly length: number;

  /** Human-readable name for logging/debugging */
  readonly name: string;

  /**
   * Finds all matches of this matcher in the given text, in text order
   * @param text - The text to search
   */
  find(text: string): Generator<Candidate>;
}

/**
 * Configuration for a matcher created from a pattern
 */
export interface CandidateMatcherConfig {
  length: number;
  name?: string;
  pattern: RegExp;
}

/**
 * Keeps digit characters only
 */
export function normalizeDigits(text: string): string {
  return text.replace(/\D/g, '');
}

/**
 * Creates a matcher from a pattern.
 * Matches whose digit count differs from `length` are ignored.
 */
export function createCandidateMatcher(config: CandidateMatcherConfig): CandidateMatcher {
  const { length, pattern } = config;

  // Ensure pattern has global flag for matchAll
  const globalPattern = pattern.global ? pattern : new RegExp(pattern.source, pattern.flags + 'g');

  return {
    length,
    name: config.name ?? `${length}-digit`,

    *find(text: string): Generator<Candidate> {
      for (const match of text.matchAll(globalPattern)) {
        if (match.index === undefined) continue;

        const rawText = match[0];
        const normalizedDigits = normalizeDigits(rawText);
        if (normalizedDigits.length !== length) continue;

        yield {
          rawText,
          normalizedDigits,
          startOffset: match.index,
          endOffset: match.index + rawText.length,
          assumedLength: length,
        };
      }
    },
  };
}
