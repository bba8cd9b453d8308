/**
 * Issuer Classifier
 * Resolves a normalized card number to its issuer. No checksum validation.
 */

import { BIN_LENGTH, MAX_PAN_LENGTH, MIN_PAN_LENGTH, type IssuerProfile } from '../types/index.js';
import type { IssuerDatabase } from '../issuers/database.js';

/**
 * Classification outcome
 */
export type ClassificationResult =
  | { found: true; issuer: IssuerProfile }
  | { found: false };

const NOT_FOUND: ClassificationResult = Object.freeze({ found: false });

const DIGITS_ONLY = /^\d+$/;

/**
 * Classifies a digits-only card number.
 *
 * All issuers whose ranges contain the six-digit BIN are considered; issuers
 * with a length constraint that excludes this number are dropped; the
 * highest-priority survivor wins.
 */
export function classify(normalizedDigits: string, database: IssuerDatabase): ClassificationResult {
  const length = normalizedDigits.length;
  if (length < MIN_PAN_LENGTH || length > MAX_PAN_LENGTH) {
    return NOT_FOUND;
  }
  if (!DIGITS_ONLY.test(normalizedDigits)) {
    return NOT_FOUND;
  }

  const issuer = database.lookup(normalizedDigits.slice(0, BIN_LENGTH), length);
  return issuer === undefined ? NOT_FOUND : { found: true, issuer };
}
