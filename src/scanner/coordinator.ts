/**
 * Scan Coordinator
 * Runs the detection pipeline over many files with a fixed number of workers
 *
 * Jobs flow through a bounded queue. Each worker reads a file, runs detection
 * without holding any lock, then takes the mutex only to update counters and
 * append that file's findings to the sink as one batch. Per-file failures are
 * recorded and never stop the scan.
 */

import {
  FileAccessReason,
  type FileErrorRecord,
  type Finding,
  type ScanJob,
  type ScanProgress,
  type ScanSummary,
} from '../types/index.js';
import { FileAccessError, ScanAbortedError } from '../errors.js';
import type { IssuerDatabase } from '../issuers/database.js';
import type { CandidateMatcher } from '../recognizers/base.js';
import { detectFindings } from '../pipeline/detector.js';
import { resolveScanOptions, type ScanOptions, type ScanOptionsInput } from '../config/options.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { readDocument } from './file-reader.js';
import { Mutex } from './mutex.js';
import { ProgressReporter, type ProgressCallback } from './progress.js';
import type { FindingSink } from './sink.js';
import { QueueClosedError, WorkQueue } from './work-queue.js';

export interface ScanCoordinatorConfig {
  /** Issuer table shared by all workers */
  database: IssuerDatabase;
  options?: ScanOptionsInput;
  logger?: Logger;
  onProgress?: ProgressCallback;
  /** Candidate matchers (default: full battery) */
  matchers?: readonly CandidateMatcher[];
}

export type ScanJobSource = Iterable<ScanJob> | AsyncIterable<ScanJob>;

/**
 * Mutable scan counters; only touched under the coordinator's mutex
 */
class ScanState {
  filesSeen = 0;
  filesScanned = 0;
  filesSkipped = 0;
  filesErrored = 0;
  skippedBySize = 0;
  findingsCount = 0;
  readonly findingsByIssuer: Record<string, number> = {};
  readonly errors: FileErrorRecord[] = [];

  constructor(private readonly knownTotal: number | undefined) {}

  addFindings(findings: readonly Finding[]): void {
    this.findingsCount += findings.length;
    for (const finding of findings) {
      this.findingsByIssuer[finding.issuer] = (this.findingsByIssuer[finding.issuer] ?? 0) + 1;
    }
  }

  /** Counts jobs of a known-length source that were never dispatched as skipped */
  skipUndispatched(): void {
    if (this.knownTotal === undefined) return;
    const remaining = this.knownTotal - this.filesSeen;
    this.filesSeen += remaining;
    this.filesSkipped += remaining;
  }

  progress(): ScanProgress {
    return {
      processed: this.filesScanned + this.filesSkipped + this.filesErrored,
      total: this.knownTotal ?? this.filesSeen,
      findings: this.findingsCount,
    };
  }
}

/**
 * Turns approved file paths into scan jobs
 */
export function createScanJobs(paths: Iterable<string>): ScanJob[] {
  return Array.from(paths, (path) => ({ path }));
}

export class ScanCoordinator {
  readonly database: IssuerDatabase;
  readonly options: ScanOptions;

  private readonly logger: Logger;
  private readonly onProgress: ProgressCallback | undefined;
  private readonly matchers: readonly CandidateMatcher[] | undefined;

  constructor(config: ScanCoordinatorConfig) {
    this.logger = config.logger ?? createLogger('ScanCoordinator');
    this.database = config.database;
    this.options = resolveScanOptions(config.options, this.logger);
    this.onProgress = config.onProgress;
    this.matchers = config.matchers;
  }

  /**
   * Scans every job and writes findings to the sink.
   *
   * Resolves with the summary even when the deadline or `signal` stops the
   * scan early (`aborted: true`). Rejects only if the sink or the job source
   * fails; remaining jobs are then abandoned.
   */
  async scan(jobs: ScanJobSource, sink: FindingSink, signal?: AbortSignal): Promise<ScanSummary> {
    const startedAt = Date.now();
    const { concurrency, deadlineMs } = this.options;

    const state = new ScanState(Array.isArray(jobs) ? jobs.length : undefined);
    const mutex = new Mutex();
    const queue = new WorkQueue<ScanJob>(this.options.queueCapacity);
    const progress = new ProgressReporter(this.onProgress, this.options.progressIntervalMs, this.logger);

    const controller = new AbortController();
    const onAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) controller.abort(signal.reason);
    signal?.addEventListener('abort', onAbort, { once: true });

    const deadline =
      deadlineMs > 0
        ? setTimeout(() => {
            this.logger.warn('Scan deadline reached, stopping', { deadlineMs });
            controller.abort(new ScanAbortedError(`Scan deadline of ${deadlineMs}ms reached`));
          }, deadlineMs)
        : undefined;

    this.logger.info('Scan started', {
      concurrency,
      maxFileSize: this.options.maxFileSize,
      issuerTable: this.database.version,
    });

    const produce = async () => {
      try {
        for await (const job of jobs) {
          if (controller.signal.aborted) break;
          await mutex.runExclusive(() => {
            state.filesSeen++;
          });
          await queue.put(job);
        }
      } catch (error) {
        // Closed by a failing worker, whose error is the one reported
        if (!(error instanceof QueueClosedError)) throw error;
      } finally {
        queue.close();
      }
    };

    const work = async () => {
      try {
        for (;;) {
          const job = await queue.take();
          if (job === undefined) return;
          await this.processJob(job, state, mutex, sink, controller.signal);
          progress.update(state.progress());
        }
      } catch (error) {
        controller.abort(error);
        queue.close();
        throw error;
      }
    };

    const workers = Array.from({ length: concurrency }, () => work());
    const results = await Promise.allSettled([produce(), ...workers]);

    if (deadline !== undefined) clearTimeout(deadline);
    signal?.removeEventListener('abort', onAbort);

    const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (failure !== undefined) {
      this.logger.error('Scan failed', { error: failure.reason });
      throw failure.reason;
    }

    if (controller.signal.aborted) {
      await mutex.runExclusive(() => state.skipUndispatched());
    }
    progress.finish(state.progress());

    const elapsedMs = Date.now() - startedAt;
    const summary: ScanSummary = {
      filesSeen: state.filesSeen,
      filesScanned: state.filesScanned,
      filesSkipped: state.filesSkipped,
      filesErrored: state.filesErrored,
      skippedBySize: state.skippedBySize,
      findingsCount: state.findingsCount,
      findingsByIssuer: { ...state.findingsByIssuer },
      elapsedMs,
      scanRate: elapsedMs > 0 ? state.filesScanned / (elapsedMs / 1000) : 0,
      aborted: controller.signal.aborted,
      errors: [...state.errors],
    };

    this.logger.info('Scan complete', {
      filesSeen: summary.filesSeen,
      filesScanned: summary.filesScanned,
      filesSkipped: summary.filesSkipped,
      filesErrored: summary.filesErrored,
      findings: summary.findingsCount,
      elapsedMs,
      aborted: summary.aborted,
    });

    return summary;
  }

  private async processJob(
    job: ScanJob,
    state: ScanState,
    mutex: Mutex,
    sink: FindingSink,
    signal: AbortSignal
  ): Promise<void> {
    if (signal.aborted) {
      await mutex.runExclusive(() => {
        state.filesSkipped++;
      });
      return;
    }

    let findings: Finding[];
    try {
      const document = await readDocument(job.path, {
        maxBytes: this.options.maxFileSize,
        timeoutMs: this.options.readTimeoutMs,
        encoding: this.options.encoding,
        strictDecoding: this.options.strictDecoding,
        signal,
      });

      if (document.status === 'too_large') {
        this.logger.info('File exceeds size limit, skipped', {
          filePath: job.path,
          bytes: document.bytes,
          limit: this.options.maxFileSize,
        });
        await mutex.runExclusive(() => {
          state.filesSkipped++;
          state.skippedBySize++;
        });
        return;
      }

      findings = detectFindings(document.text, job.path, this.database, {
        ...(this.matchers !== undefined ? { matchers: this.matchers } : {}),
      });
    } catch (error) {
      await this.recordFailure(job, error, state, mutex);
      return;
    }

    if (findings.length > 0) {
      this.logger.debug('Findings in file', { filePath: job.path, count: findings.length });
    }

    await mutex.runExclusive(async () => {
      state.filesScanned++;
      state.addFindings(findings);
      if (findings.length > 0) {
        await sink.write(findings);
      }
    });
  }

  private async recordFailure(job: ScanJob, error: unknown, state: ScanState, mutex: Mutex): Promise<void> {
    const failure =
      error instanceof FileAccessError
        ? error
        : new FileAccessError(
            job.path,
            FileAccessReason.IO_ERROR,
            error instanceof Error ? error.message : String(error),
            { cause: error }
          );

    if (failure.reason === FileAccessReason.ABORTED) {
      await mutex.runExclusive(() => {
        state.filesSkipped++;
      });
      return;
    }

    this.logger.warn('File could not be scanned', {
      filePath: failure.filePath,
      reason: failure.reason,
      message: failure.message,
    });

    await mutex.runExclusive(() => {
      state.filesErrored++;
      state.errors.push({ filePath: failure.filePath, reason: failure.reason, message: failure.message });
    });
  }
}
