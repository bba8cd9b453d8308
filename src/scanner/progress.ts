/**
 * Throttled Progress Reporting
 * Updates within the interval are dropped; the final update is always delivered.
 */

import type { ScanProgress } from '../types/index.js';
import type { Logger } from '../utils/logger.js';

export type ProgressCallback = (progress: ScanProgress) => void;

export class ProgressReporter {
  private lastEmit = Number.NEGATIVE_INFINITY;

  constructor(
    private readonly callback: ProgressCallback | undefined,
    private readonly intervalMs: number,
    private readonly logger: Logger,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Reports progress unless the previous report is too recent
   * @returns whether the callback was invoked
   */
  update(progress: ScanProgress): boolean {
    if (this.callback === undefined) return false;

    const now = this.now();
    if (now - this.lastEmit < this.intervalMs) return false;

    this.lastEmit = now;
    this.emit(progress);
    return true;
  }

  /**
   * Reports the final state regardless of throttling
   */
  finish(progress: ScanProgress): void {
    if (this.callback === undefined) return;
    this.lastEmit = this.now();
    this.emit(progress);
  }

  private emit(progress: ScanProgress): void {
    try {
      this.callback?.({ ...progress });
    } catch (error) {
      this.logger.warn('Progress callback failed', { error });
    }
  }
}
