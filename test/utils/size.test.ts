import { describe, it, expect } from 'vitest';
import { parseFileSize, formatBytes } from '../../src/utils/size.js';

describe('parseFileSize', () => {
  it('should parse binary multiples', () => {
    expect(parseFileSize('100B')).toBe(100);
    expect(parseFileSize('5KB')).toBe(5120);
    expect(parseFileSize('50MB')).toBe(52428800);
    expect(parseFileSize('1GB')).toBe(1073741824);
  });

  it('should be case-insensitive and tolerate whitespace', () => {
    expect(parseFileSize('512 kb')).toBe(524288);
    expect(parseFileSize('  2mb ')).toBe(2097152);
  });

  it('should treat an empty string as unlimited', () => {
    expect(parseFileSize('')).toBe(0);
    expect(parseFileSize('   ')).toBe(0);
  });

  it('should reject unknown suffixes', () => {
    expect(() => parseFileSize('10TB')).toThrow("Invalid size format '10TB': cannot parse number");
    expect(() => parseFileSize('42')).toThrow('must end with B, KB, MB, or GB');
  });

  it('should reject malformed numbers', () => {
    expect(() => parseFileSize('1.5MB')).toThrow('cannot parse number');
    expect(() => parseFileSize('MB')).toThrow('cannot parse number');
  });
});

describe('formatBytes', () => {
  it('should format bytes below one kilobyte as-is', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(1023)).toBe('1023 B');
  });

  it('should format larger sizes with two decimals', () => {
    expect(formatBytes(1536)).toBe('1.50 KB');
    expect(formatBytes(52428800)).toBe('50.00 MB');
    expect(formatBytes(1073741824)).toBe('1.00 GB');
  });
});
