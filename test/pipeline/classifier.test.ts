import { describe, it, expect } from 'vitest';
import { classify } from '../../src/pipeline/classifier.js';
import { loadIssuerDatabase } from '../../src/issuers/loader.js';

const database = loadIssuerDatabase({
  info: { version: 'test-1' },
  issuers: [
    {
      issuer: 'wide',
      displayName: 'Wide Network',
      ranges: [{ start: '400000', end: '699999' }],
      lengths: [13, 16, 19],
      priority: 10,
    },
    {
      issuer: 'sixty',
      displayName: 'Sixty Network',
      ranges: [{ start: '600000', end: '609999' }],
      lengths: [16],
      priority: 50,
    },
  ],
});

describe('Issuer Classifier', () => {
  it('should classify by the first six digits', () => {
    const result = classify('6000010000000006', database);

    expect(result.found).toBe(true);
    expect(result.found && result.issuer.id).toBe('sixty');
  });

  it('should apply length constraints', () => {
    const result = classify('6000010000000000000', database);

    expect(result.found && result.issuer.id).toBe('wide');
  });

  it('should report not found when no issuer accepts the length', () => {
    expect(classify('60000100000000000', database)).toEqual({ found: false });
  });

  it('should report not found for an unknown BIN', () => {
    expect(classify('9999999999999995', database)).toEqual({ found: false });
  });

  it('should reject lengths outside 13-19', () => {
    expect(classify('400000000000', database)).toEqual({ found: false });
    expect(classify('40000000000000000000', database)).toEqual({ found: false });
    expect(classify('4000000000000', database).found).toBe(true);
  });

  it('should reject input that is not digits only', () => {
    expect(classify('4000-0000-0000-0000', database)).toEqual({ found: false });
    expect(classify('', database)).toEqual({ found: false });
  });

  it('should not check the Luhn digit', () => {
    // Luhn-invalid but inside a known range
    expect(classify('4532015112830367', database).found).toBe(true);
  });
});
