/**
 * Finding Sinks
 * Destinations for findings produced during a scan
 */

import type { Finding } from '../types/index.js';

/**
 * Receives one file's findings at a time, as a contiguous batch in
 * ascending line order. Calls are never concurrent.
 */
export interface FindingSink {
  write(findings: readonly Finding[]): void | Promise<void>;
}

/**
 * Keeps every finding in memory, in arrival order and grouped by file
 */
export class MemoryFindingSink implements FindingSink {
  readonly findings: Finding[] = [];
  readonly byFile = new Map<string, Finding[]>();

  write(findings: readonly Finding[]): void {
    for (const finding of findings) {
      this.findings.push(finding);

      const existing = this.byFile.get(finding.filePath) ?? [];
      existing.push(finding);
      this.byFile.set(finding.filePath, existing);
    }
  }

  get size(): number {
    return this.findings.length;
  }

  /** Files with at least one finding */
  files(): string[] {
    return Array.from(this.byFile.keys());
  }
}
