export * from './issuer-types.js';

/**
 * A digit sequence that looks like a card number (before classification)
 */
export interface Candidate {
  /** Matched text including separators */
  rawText: string;
  /** Digits only */
  normalizedDigits: string;
  /** Start character offset in the document (0-based, inclusive) */
  startOffset: number;
  /** End character offset in the document (0-based, exclusive) */
  endOffset: number;
  /** Total length the matching pattern was built for */
  assumedLength: number;
}

/**
 * A classified, checksum-valid candidate.
 * Carries raw digits and must never leave the process or reach a log.
 */
export interface Detection {
  /** Issuer id */
  issuer: string;
  normalizedDigits: string;
  /** 1-based line of the first character */
  lineNumber: number;
  startOffset: number;
  endOffset: number;
}

/**
 * A reportable finding. Holds the masked number only.
 */
export interface Finding {
  filePath: string;
  lineNumber: number;
  /** Issuer id */
  issuer: string;
  /** Issuer display name */
  issuerName: string;
  /** BIN + last four, interior digits replaced by '*' */
  maskedNumber: string;
  startOffset: number;
  endOffset: number;
}

/**
 * A file approved for scanning by the discovery/filtering step
 */
export interface ScanJob {
  readonly path: string;
  /** Size observed at discovery time, in bytes */
  readonly size?: number;
}

/**
 * Why a file could not be scanned
 */
export enum FileAccessReason {
  NOT_FOUND = 'not_found',
  PERMISSION_DENIED = 'permission_denied',
  IO_ERROR = 'io_error',
  DECODE_ERROR = 'decode_error',
  TIMEOUT = 'timeout',
  ABORTED = 'aborted',
}

/**
 * A per-file failure recorded in the summary (no file content)
 */
export interface FileErrorRecord {
  filePath: string;
  reason: FileAccessReason;
  message: string;
}

/**
 * Aggregate counters for a scan
 */
export interface ScanSummary {
  /** Jobs handed to the coordinator */
  filesSeen: number;
  /** Files read and run through detection */
  filesScanned: number;
  /** Files not scanned (size limit, abort) */
  filesSkipped: number;
  /** Files that failed with an access or decode error */
  filesErrored: number;
  /** Subset of filesSkipped that exceeded the size limit */
  skippedBySize: number;
  findingsCount: number;
  /** Findings per issuer id */
  findingsByIssuer: Record<string, number>;
  elapsedMs: number;
  /** Files scanned per second */
  scanRate: number;
  /** Whether the deadline or an external signal stopped the scan early */
  aborted: boolean;
  errors: FileErrorRecord[];
}

/**
 * Progress snapshot passed to progress callbacks
 */
export interface ScanProgress {
  /** Files finished (scanned, skipped or errored) */
  processed: number;
  total: number;
  findings: number;
}
