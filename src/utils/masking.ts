/**
 * PAN Masking
 * Display form that keeps the BIN and the last four digits only
 */

const VISIBLE_PREFIX = 6;
const VISIBLE_SUFFIX = 4;

/**
 * Masks the interior digits of a card number.
 * Inputs of ten characters or fewer are returned unchanged.
 *
 * @example maskPan('4532015112830366') // '453201******0366'
 */
export function maskPan(normalizedDigits: string): string {
  const length = normalizedDigits.length;
  if (length <= VISIBLE_PREFIX + VISIBLE_SUFFIX) {
    return normalizedDigits;
  }

  return (
    normalizedDigits.slice(0, VISIBLE_PREFIX) +
    '*'.repeat(length - VISIBLE_PREFIX - VISIBLE_SUFFIX) +
    normalizedDigits.slice(length - VISIBLE_SUFFIX)
  );
}
