import { describe, it, expect, beforeAll } from 'vitest';
import { detectFindings } from '../../src/pipeline/detector.js';
import { loadDefaultIssuerDatabase } from '../../src/issuers/loader.js';
import type { IssuerDatabase } from '../../src/issuers/database.js';
import { GOLDEN_TESTS, ADVERSARIAL_TESTS } from './golden-tests.js';

describe('Golden Tests', () => {
  let database: IssuerDatabase;

  beforeAll(async () => {
    database = await loadDefaultIssuerDatabase();
  });

  describe('expected findings', () => {
    for (const testCase of GOLDEN_TESTS) {
      it(`should handle: ${testCase.name} - ${testCase.description ?? ''}`, () => {
        const findings = detectFindings(testCase.input, `${testCase.name}.txt`, database);

        expect(
          findings.map(({ lineNumber, issuer, maskedNumber }) => ({ lineNumber, issuer, maskedNumber }))
        ).toEqual(testCase.expected);

        // Masked output only
        for (const finding of findings) {
          expect(finding.maskedNumber).toMatch(/^\d{6}\*+\d{4}$/);
        }
      });
    }
  });

  describe('adversarial tests (false positive prevention)', () => {
    for (const testCase of ADVERSARIAL_TESTS) {
      it(`should not falsely detect: ${testCase.name} - ${testCase.description ?? ''}`, () => {
        expect(detectFindings(testCase.input, `${testCase.name}.txt`, database)).toEqual([]);
      });
    }
  });
});
