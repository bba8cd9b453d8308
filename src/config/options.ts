/**
 * Scan Options
 * Validated engine settings with defaults
 */

import { availableParallelism } from 'node:os';
import { z } from 'zod';
import { InvalidOptionsError, formatIssues, toValidationIssues } from '../errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { parseFileSize } from '../utils/size.js';

/**
 * Resolved scan settings
 */
export interface ScanOptions {
  /** Number of files processed at once */
  readonly concurrency: number;
  /** Largest file read, in bytes (0 = unlimited) */
  readonly maxFileSize: number;
  /** Per-file read timeout in milliseconds (0 = none) */
  readonly readTimeoutMs: number;
  /** Overall scan deadline in milliseconds (0 = none) */
  readonly deadlineMs: number;
  /** Minimum delay between progress callbacks */
  readonly progressIntervalMs: number;
  /** Jobs buffered ahead of the workers */
  readonly queueCapacity: number;
  /** Text decoding of file contents */
  readonly encoding: 'utf-8' | 'latin1';
  /** Treat malformed UTF-8 as a per-file error instead of replacing it */
  readonly strictDecoding: boolean;
}

export const DEFAULT_MAX_FILE_SIZE = '50MB';
export const DEFAULT_PROGRESS_INTERVAL_MS = 100;

/**
 * Half of the available parallelism, at least 1
 */
export function defaultConcurrency(): number {
  return Math.max(1, Math.floor(availableParallelism() / 2));
}

const fileSizeSchema = z.union([
  z.number().int().min(0),
  z.string().transform((value, ctx) => {
    try {
      return parseFileSize(value);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: error instanceof Error ? error.message : String(error),
      });
      return z.NEVER;
    }
  }),
]);

export const scanOptionsSchema = z.object({
  concurrency: z.number().int().min(1).optional(),
  maxFileSize: fileSizeSchema.default(DEFAULT_MAX_FILE_SIZE),
  readTimeoutMs: z.number().int().min(0).default(0),
  deadlineMs: z.number().int().min(0).default(0),
  progressIntervalMs: z.number().int().min(0).default(DEFAULT_PROGRESS_INTERVAL_MS),
  queueCapacity: z.number().int().min(1).optional(),
  encoding: z.enum(['utf-8', 'latin1']).default('utf-8'),
  strictDecoding: z.boolean().default(false),
});

export type ScanOptionsInput = z.input<typeof scanOptionsSchema>;

const defaultLogger = createLogger('ScanOptions');

/**
 * Validates partial options and fills in defaults.
 * Concurrency above the available parallelism is capped.
 * @throws InvalidOptionsError when a setting is invalid
 */
export function resolveScanOptions(input: ScanOptionsInput = {}, logger: Logger = defaultLogger): ScanOptions {
  const parsed = scanOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = toValidationIssues(parsed.error);
    throw new InvalidOptionsError(`Invalid scan options: ${formatIssues(issues)}`, issues);
  }

  const options = parsed.data;
  const limit = availableParallelism();
  let concurrency = options.concurrency ?? defaultConcurrency();
  if (concurrency > limit) {
    logger.warn('Concurrency exceeds available parallelism, capping', { requested: concurrency, limit });
    concurrency = limit;
  }

  return Object.freeze({
    concurrency,
    maxFileSize: options.maxFileSize,
    readTimeoutMs: options.readTimeoutMs,
    deadlineMs: options.deadlineMs,
    progressIntervalMs: options.progressIntervalMs,
    queueCapacity: options.queueCapacity ?? concurrency * 2,
    encoding: options.encoding,
    strictDecoding: options.strictDecoding,
  });
}
