/**
 * Guarded File Reading
 * Reads one document with a size guard, a timeout and abort support
 */

import { constants, open, stat, type FileHandle } from 'node:fs/promises';
import { FileAccessReason } from '../types/index.js';
import { FileAccessError } from '../errors.js';

export interface ReadDocumentOptions {
  /** Largest accepted size in bytes (0 = unlimited) */
  maxBytes: number;
  /** Abort the read after this many milliseconds (0 = never) */
  timeoutMs: number;
  encoding: 'utf-8' | 'latin1';
  /** Reject malformed UTF-8 instead of substituting U+FFFD */
  strictDecoding: boolean;
  signal?: AbortSignal;
}

/** For `too_large`, `bytes` is the size reported by `stat`, or the bytes read before the limit was crossed */
export type ReadDocumentResult =
  | { status: 'ok'; text: string; bytes: number }
  | { status: 'too_large'; bytes: number };

const READ_CHUNK_BYTES = 64 * 1024;

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Maps a filesystem or decoding failure to a FileAccessError reason
 */
export function classifyReadError(error: unknown): FileAccessReason {
  switch (errorCode(error)) {
    case 'ENOENT':
    case 'ENOTDIR':
      return FileAccessReason.NOT_FOUND;
    case 'EACCES':
    case 'EPERM':
      return FileAccessReason.PERMISSION_DENIED;
    case 'ERR_ENCODING_INVALID_ENCODED_DATA':
      return FileAccessReason.DECODE_ERROR;
    case 'ABORT_ERR':
      return FileAccessReason.ABORTED;
    default:
      return FileAccessReason.IO_ERROR;
  }
}

function decode(buffer: Buffer, options: ReadDocumentOptions): string {
  if (options.encoding === 'latin1') {
    return buffer.toString('latin1');
  }
  return new TextDecoder('utf-8', { fatal: options.strictDecoding }).decode(buffer);
}

/**
 * Opens a file without blocking on FIFOs and settles as soon as `signal`
 * aborts, even while `open()` itself is still pending
 */
function openReadable(filePath: string, signal: AbortSignal): Promise<FileHandle> {
  const opening = open(filePath, constants.O_RDONLY | constants.O_NONBLOCK);

  return new Promise<FileHandle>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    opening.then(
      (handle) => {
        signal.removeEventListener('abort', onAbort);
        if (signal.aborted) {
          // The caller has already given up on this file
          handle.close().catch(() => undefined);
          return;
        }
        resolve(handle);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Reads until EOF or until `limit` bytes are in hand
 */
async function readAtMost(handle: FileHandle, limit: number, signal: AbortSignal): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let total = 0;

  while (total < limit) {
    signal.throwIfAborted();
    const length = Math.min(READ_CHUNK_BYTES, limit - total);
    const { bytesRead, buffer } = await handle.read(Buffer.alloc(length), 0, length, null);
    if (bytesRead === 0) break;
    chunks.push(buffer.subarray(0, bytesRead));
    total += bytesRead;
  }

  return Buffer.concat(chunks, total);
}

/**
 * Checks, opens, reads and decodes a file.
 * Anything other than a regular file is refused before it is opened. At most
 * `maxBytes + 1` bytes are read, so a file that grew after it was approved is
 * reported as too large without being loaded whole.
 *
 * @throws FileAccessError for any failure
 */
export async function readDocument(filePath: string, options: ReadDocumentOptions): Promise<ReadDocumentResult> {
  const { signal, maxBytes } = options;
  const controller = new AbortController();
  let timedOut = false;

  const onAbort = () => controller.abort(signal?.reason);
  signal?.addEventListener('abort', onAbort, { once: true });

  const timer =
    options.timeoutMs > 0
      ? setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, options.timeoutMs)
      : undefined;

  let handle: FileHandle | undefined;
  try {
    if (signal?.aborted) {
      throw new FileAccessError(filePath, FileAccessReason.ABORTED, 'Scan aborted before read');
    }

    const stats = await stat(filePath);
    if (!stats.isFile()) {
      throw new FileAccessError(filePath, FileAccessReason.IO_ERROR, 'Not a regular file');
    }
    if (maxBytes > 0 && stats.size > maxBytes) {
      return { status: 'too_large', bytes: stats.size };
    }

    handle = await openReadable(filePath, controller.signal);
    const buffer = await readAtMost(handle, maxBytes > 0 ? maxBytes + 1 : Infinity, controller.signal);
    if (maxBytes > 0 && buffer.byteLength > maxBytes) {
      return { status: 'too_large', bytes: buffer.byteLength };
    }

    return { status: 'ok', text: decode(buffer, options), bytes: buffer.byteLength };
  } catch (error) {
    if (error instanceof FileAccessError) throw error;

    if (timedOut) {
      throw new FileAccessError(
        filePath,
        FileAccessReason.TIMEOUT,
        `Read timed out after ${options.timeoutMs}ms`,
        { cause: error }
      );
    }
    if (controller.signal.aborted) {
      throw new FileAccessError(filePath, FileAccessReason.ABORTED, 'Scan aborted during read', { cause: error });
    }
    throw new FileAccessError(filePath, classifyReadError(error), errorMessage(error), { cause: error });
  } finally {
    if (timer !== undefined) clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
    await handle?.close();
  }
}
