/**
 * Byte Size Helpers
 */

const SIZE_SUFFIXES: ReadonlyArray<readonly [string, number]> = [
  ['GB', 1024 * 1024 * 1024],
  ['MB', 1024 * 1024],
  ['KB', 1024],
  ['B', 1],
];

/**
 * Parses sizes like "50MB", "512 kb" or "100B" into bytes.
 * An empty string means no limit and yields 0.
 * @throws Error for unknown suffixes or malformed numbers
 */
export function parseFileSize(input: string): number {
  const value = input.trim().toUpperCase();
  if (value === '') return 0;

  for (const [suffix, multiplier] of SIZE_SUFFIXES) {
    if (!value.endsWith(suffix)) continue;

    const numberPart = value.slice(0, -suffix.length).trim();
    if (!/^\d+$/.test(numberPart)) {
      throw new Error(`Invalid size format '${input}': cannot parse number`);
    }

    const bytes = Number(numberPart) * multiplier;
    if (!Number.isSafeInteger(bytes)) {
      throw new Error(`Invalid size '${input}': value too large`);
    }
    return bytes;
  }

  throw new Error(`Invalid size format '${input}': must end with B, KB, MB, or GB`);
}

/**
 * Formats a byte count, e.g. 1536 -> "1.50 KB"
 */
export function formatBytes(bytes: number): string {
  const unit = 1024;
  if (bytes < unit) return `${bytes} B`;

  const sizes = ['KB', 'MB', 'GB', 'TB'];
  let value = bytes / unit;
  let exponent = 0;
  while (value >= unit && exponent < sizes.length - 1) {
    value /= unit;
    exponent++;
  }
  return `${value.toFixed(2)} ${sizes[exponent] ?? 'TB'}`;
}
