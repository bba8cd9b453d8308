/**
 * PAN Discovery
 * Finds, classifies and masks payment card numbers in text files
 */

export * from './types/index.js';
export * from './errors.js';
export * from './issuers/index.js';
export * from './recognizers/index.js';
export * from './pipeline/index.js';
export * from './config/index.js';
export * from './scanner/index.js';
export { createLogger, silentLogger, redactDigits, REDACTED, type Logger, type LogLevel, type LoggerOptions } from './utils/logger.js';
export { isValidLuhn, calculateLuhnCheckDigit } from './utils/luhn.js';
export { maskPan } from './utils/masking.js';
export { LineIndex, compareByPosition } from './utils/offsets.js';
