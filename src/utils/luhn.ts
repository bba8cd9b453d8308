/**
 * Luhn Algorithm (Mod 10) Implementation
 * Checksum validation for card numbers
 */

import { MAX_PAN_LENGTH, MIN_PAN_LENGTH } from '../types/index.js';

const DIGITS_ONLY = /^\d+$/;

/**
 * Validates a card number using the Luhn algorithm
 * @param normalizedDigits - Digits only, 13 to 19 of them
 * @returns true if the length is acceptable and the checksum is valid
 */
export function isValidLuhn(normalizedDigits: string): boolean {
  const length = normalizedDigits.length;
  if (length < MIN_PAN_LENGTH || length > MAX_PAN_LENGTH) {
    return false;
  }
  if (!DIGITS_ONLY.test(normalizedDigits)) {
    return false;
  }

  return luhnSum(normalizedDigits, false) % 10 === 0;
}

/**
 * Calculates the Luhn check digit for a partial number
 * @param partialNumber - Digits without the check digit
 * @returns The check digit (0-9)
 */
export function calculateLuhnCheckDigit(partialNumber: string): number {
  const digits = partialNumber.replace(/\D/g, '');

  // The check digit will take the rightmost position, so doubling starts here
  return (10 - (luhnSum(digits, true) % 10)) % 10;
}

function luhnSum(digits: string, doubleFirst: boolean): number {
  let sum = 0;
  let isEven = doubleFirst;

  // Process digits from right to left
  for (let i = digits.length - 1; i >= 0; i--) {
    let digit = digits.charCodeAt(i) - 48;

    if (isEven) {
      digit *= 2;
      if (digit > 9) {
        digit -= 9;
      }
    }

    sum += digit;
    isEven = !isEven;
  }

  return sum;
}
