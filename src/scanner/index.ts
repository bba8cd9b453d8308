/**
 * Scanner Module
 * Exports the scan coordinator and its building blocks
 */

export * from './coordinator.js';
export { readDocument, classifyReadError, type ReadDocumentOptions, type ReadDocumentResult } from './file-reader.js';
export { Mutex } from './mutex.js';
export { ProgressReporter, type ProgressCallback } from './progress.js';
export { MemoryFindingSink, type FindingSink } from './sink.js';
export { WorkQueue, QueueClosedError } from './work-queue.js';
