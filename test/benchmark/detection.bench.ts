/**
 * Detection Benchmarks
 * Measures extraction, classification and full-document detection latency
 */

import { describe, bench } from 'vitest';
import { readFileSync } from 'node:fs';
import { extractCandidates } from '../../src/recognizers/card-candidates.js';
import { classify } from '../../src/pipeline/classifier.js';
import { detectFindings } from '../../src/pipeline/detector.js';
import { DEFAULT_BIN_DATABASE_PATH, loadIssuerDatabase } from '../../src/issuers/loader.js';
import { createBuiltinIssuerDatabase } from '../../src/issuers/builtin.js';

// =============================================================================
// Test Data
// =============================================================================

const TEXT_WITH_CARDS = `
Visa: 4111-1111-1111-1111
Mastercard: 5500 0000 0000 0004
Amex: 3782 822463 10005
Discover: 6011111111111117
`;

const TEXT_NO_CARDS = `
The quick brown fox jumps over the lazy dog. This sentence contains no
card numbers whatsoever. Order 123 shipped on 2024-01-15 to warehouse 456,
tracking 1Z999AA10123456784, call +1 555 123 4567 for questions.
`;

const LOG_LINE = '2024-05-01T10:00:00Z INFO request id=8f2c latency=12ms user=1042 status=200\n';

// ~80 KB log with a card number every 200 lines
const LARGE_LOG = Array.from({ length: 1000 }, (_, i) =>
  i % 200 === 0 ? `2024-05-01T10:00:00Z WARN payment card=4532015112830366\n` : LOG_LINE
).join('');

const BINS = ['411111', '550000', '378282', '601150', '622500', '650010', '508600', '999999'];

const database = loadIssuerDatabase(JSON.parse(readFileSync(DEFAULT_BIN_DATABASE_PATH, 'utf-8')));

// =============================================================================
// Extraction
// =============================================================================

describe('Extraction', () => {
  bench('extractCandidates - text with 4 cards', () => {
    Array.from(extractCandidates(TEXT_WITH_CARDS));
  });

  bench('extractCandidates - no matches', () => {
    Array.from(extractCandidates(TEXT_NO_CARDS));
  });

  bench('extractCandidates - large log', () => {
    Array.from(extractCandidates(LARGE_LOG));
  });
});

// =============================================================================
// Classification
// =============================================================================

describe('Classification', () => {
  const builtin = createBuiltinIssuerDatabase();

  bench('lookup - default table', () => {
    for (const bin of BINS) database.lookup(bin, 16);
  });

  bench('lookup - built-in table', () => {
    for (const bin of BINS) builtin.lookup(bin, 16);
  });

  bench('classify - valid Visa', () => {
    classify('4532015112830366', database);
  });
});

// =============================================================================
// Full Detection
// =============================================================================

describe('Detection', () => {
  bench('detectFindings - text with 4 cards', () => {
    detectFindings(TEXT_WITH_CARDS, 'cards.txt', database);
  });

  bench('detectFindings - no matches', () => {
    detectFindings(TEXT_NO_CARDS, 'plain.txt', database);
  });

  bench('detectFindings - large log', () => {
    detectFindings(LARGE_LOG, 'app.log', database);
  });
});
