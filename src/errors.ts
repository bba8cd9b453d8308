/**
 * Error types raised by the engine
 */

import type { ZodError } from 'zod';
import { FileAccessReason } from './types/index.js';

/**
 * Error codes
 */
export enum ScanErrorCode {
  MALFORMED_DATABASE = 'MALFORMED_DATABASE',
  FILE_ACCESS = 'FILE_ACCESS',
  INVALID_OPTIONS = 'INVALID_OPTIONS',
  SCAN_ABORTED = 'SCAN_ABORTED',
}

/**
 * A single problem found while validating structured input
 */
export interface ValidationIssue {
  /** Dotted path to the offending field, e.g. "issuers.2.ranges.0.start" */
  path: string;
  message: string;
}

export class PanScanError extends Error {
  readonly code: ScanErrorCode;

  constructor(code: ScanErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PanScanError';
    this.code = code;
  }
}

/**
 * The issuer table could not be read or failed structural validation.
 * Scanning cannot start without a usable table.
 */
export class MalformedDatabaseError extends PanScanError {
  readonly issues: readonly ValidationIssue[];

  constructor(message: string, issues: readonly ValidationIssue[] = [], options?: { cause?: unknown }) {
    super(ScanErrorCode.MALFORMED_DATABASE, message, options);
    this.name = 'MalformedDatabaseError';
    this.issues = issues;
  }
}

/**
 * A single file could not be opened, read or decoded
 */
export class FileAccessError extends PanScanError {
  readonly filePath: string;
  readonly reason: FileAccessReason;

  constructor(filePath: string, reason: FileAccessReason, message: string, options?: { cause?: unknown }) {
    super(ScanErrorCode.FILE_ACCESS, message, options);
    this.name = 'FileAccessError';
    this.filePath = filePath;
    this.reason = reason;
  }
}

export class InvalidOptionsError extends PanScanError {
  readonly issues: readonly ValidationIssue[];

  constructor(message: string, issues: readonly ValidationIssue[] = []) {
    super(ScanErrorCode.INVALID_OPTIONS, message);
    this.name = 'InvalidOptionsError';
    this.issues = issues;
  }
}

/**
 * The overall deadline passed or the caller aborted the scan
 */
export class ScanAbortedError extends PanScanError {
  constructor(message = 'Scan aborted', options?: { cause?: unknown }) {
    super(ScanErrorCode.SCAN_ABORTED, message, options);
    this.name = 'ScanAbortedError';
  }
}

/**
 * Formats validation issues as "path: message" lines
 */
export function formatIssues(issues: readonly ValidationIssue[]): string {
  return issues.map((issue) => (issue.path === '' ? issue.message : `${issue.path}: ${issue.message}`)).join('; ');
}

/**
 * Converts zod issues into path/message pairs
 */
export function toValidationIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}
