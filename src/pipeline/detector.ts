/**
 * Detection Pipeline
 * Extraction -> issuer classification -> Luhn validation -> line numbers
 *
 * Every valid occurrence is reported: the same number on several lines, or
 * overlapping candidates of different assumed lengths, each produce their own
 * result.
 */

import type { Detection, Finding } from '../types/index.js';
import type { IssuerDatabase } from '../issuers/database.js';
import type { CandidateMatcher } from '../recognizers/base.js';
import { CANDIDATE_MATCHERS, extractCandidates } from '../recognizers/card-candidates.js';
import { isValidLuhn } from '../utils/luhn.js';
import { maskPan } from '../utils/masking.js';
import { LineIndex, compareByPosition } from '../utils/offsets.js';
import { classify } from './classifier.js';

export interface DetectOptions {
  /** Matchers to run (default: the full 14-19 digit battery) */
  matchers?: readonly CandidateMatcher[];
}

/**
 * Yields a detection for every classified, checksum-valid candidate, in
 * extraction order. Results carry raw digits and stay in memory only.
 */
export function* detect(
  text: string,
  database: IssuerDatabase,
  options: DetectOptions = {}
): Generator<Detection> {
  let lines: LineIndex | undefined;

  for (const candidate of extractCandidates(text, options.matchers ?? CANDIDATE_MATCHERS)) {
    const classification = classify(candidate.normalizedDigits, database);
    if (!classification.found) continue;

    if (!isValidLuhn(candidate.normalizedDigits)) continue;

    // Built on first hit: most documents contain no card numbers
    if (lines === undefined) {
      lines = new LineIndex(text);
    }

    yield {
      issuer: classification.issuer.id,
      normalizedDigits: candidate.normalizedDigits,
      lineNumber: lines.lineAt(candidate.startOffset),
      startOffset: candidate.startOffset,
      endOffset: candidate.endOffset,
    };
  }
}

/**
 * Runs detection over one document and returns masked findings in
 * ascending (line, offset) order
 */
export function detectFindings(
  text: string,
  filePath: string,
  database: IssuerDatabase,
  options: DetectOptions = {}
): Finding[] {
  const findings: Finding[] = [];

  for (const detection of detect(text, database, options)) {
    findings.push({
      filePath,
      lineNumber: detection.lineNumber,
      issuer: detection.issuer,
      issuerName: database.getIssuer(detection.issuer)?.displayName ?? detection.issuer,
      maskedNumber: maskPan(detection.normalizedDigits),
      startOffset: detection.startOffset,
      endOffset: detection.endOffset,
    });
  }

  return findings.sort(compareByPosition);
}

/**
 * Detection bound to one issuer database
 */
export class DetectionPipeline {
  constructor(
    readonly database: IssuerDatabase,
    private readonly options: DetectOptions = {}
  ) {}

  detect(text: string): Generator<Detection> {
    return detect(text, this.database, this.options);
  }

  findings(text: string, filePath: string): Finding[] {
    return detectFindings(text, filePath, this.database, this.options);
  }
}
