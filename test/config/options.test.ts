import { describe, it, expect } from 'vitest';
import { availableParallelism } from 'node:os';
import { resolveScanOptions, defaultConcurrency, DEFAULT_PROGRESS_INTERVAL_MS } from '../../src/config/options.js';
import { InvalidOptionsError, ScanErrorCode } from '../../src/errors.js';
import { createLogger, silentLogger } from '../../src/utils/logger.js';

function invalid(input: Parameters<typeof resolveScanOptions>[0]): InvalidOptionsError {
  try {
    resolveScanOptions(input, silentLogger);
  } catch (error) {
    if (error instanceof InvalidOptionsError) return error;
    throw error;
  }
  throw new Error('Expected options to be rejected');
}

describe('Scan options', () => {
  it('should fill in defaults', () => {
    const options = resolveScanOptions({}, silentLogger);

    expect(options).toEqual({
      concurrency: defaultConcurrency(),
      maxFileSize: 50 * 1024 * 1024,
      readTimeoutMs: 0,
      deadlineMs: 0,
      progressIntervalMs: DEFAULT_PROGRESS_INTERVAL_MS,
      queueCapacity: defaultConcurrency() * 2,
      encoding: 'utf-8',
      strictDecoding: false,
    });
    expect(Object.isFrozen(options)).toBe(true);
  });

  it('should use half the available parallelism by default', () => {
    expect(defaultConcurrency()).toBe(Math.max(1, Math.floor(availableParallelism() / 2)));
  });

  it('should keep explicit values', () => {
    const options = resolveScanOptions(
      { concurrency: 1, maxFileSize: '2MB', readTimeoutMs: 500, queueCapacity: 7, encoding: 'latin1' },
      silentLogger
    );

    expect(options).toMatchObject({
      concurrency: 1,
      maxFileSize: 2097152,
      readTimeoutMs: 500,
      queueCapacity: 7,
      encoding: 'latin1',
    });
  });

  it('should accept an unlimited file size', () => {
    expect(resolveScanOptions({ maxFileSize: 0 }, silentLogger).maxFileSize).toBe(0);
    expect(resolveScanOptions({ maxFileSize: '' }, silentLogger).maxFileSize).toBe(0);
  });

  it('should cap concurrency at the available parallelism', () => {
    const lines: string[] = [];
    const logger = createLogger('Test', { level: 'warn', write: (line) => lines.push(line) });

    const options = resolveScanOptions({ concurrency: 100_000 }, logger);

    expect(options.concurrency).toBe(availableParallelism());
    expect(options.queueCapacity).toBe(availableParallelism() * 2);
    expect(lines).toHaveLength(1);
    const entry: Record<string, unknown> = JSON.parse(lines[0] ?? '{}');
    expect(entry['msg']).toBe('Concurrency exceeds available parallelism, capping');
  });

  it('should reject a zero concurrency', () => {
    const error = invalid({ concurrency: 0 });

    expect(error.code).toBe(ScanErrorCode.INVALID_OPTIONS);
    expect(error.issues.map((issue) => issue.path)).toEqual(['concurrency']);
  });

  it('should reject negative timeouts', () => {
    expect(invalid({ readTimeoutMs: -1 }).issues.map((issue) => issue.path)).toEqual(['readTimeoutMs']);
    expect(invalid({ deadlineMs: -5 }).issues.map((issue) => issue.path)).toEqual(['deadlineMs']);
  });

  it('should reject malformed size strings', () => {
    const error = invalid({ maxFileSize: '10XB' });

    expect(error.message).toBe("Invalid scan options: maxFileSize: Invalid size format '10XB': cannot parse number");
  });

  it('should list every invalid setting', () => {
    const error = invalid({ concurrency: 1.5, queueCapacity: 0 });

    expect(error.issues.map((issue) => issue.path).sort()).toEqual(['concurrency', 'queueCapacity']);
  });
});
