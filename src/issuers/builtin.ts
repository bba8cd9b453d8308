/**
 * Built-in Issuer Table
 * Minimal table for callers that choose to run without external issuer data.
 * Covers the five major networks only and resolves no regional overlaps.
 */

import type { IssuerDatabaseSourceInput } from './schema.js';
import type { IssuerDatabase } from './database.js';
import { loadIssuerDatabase, type LoadOptions } from './loader.js';

export const BUILTIN_ISSUER_SOURCE: IssuerDatabaseSourceInput = {
  info: { version: 'builtin-1', lastUpdated: '' },
  issuers: [
    {
      issuer: 'amex',
      displayName: 'American Express',
      ranges: [
        { start: '340000', end: '349999' },
        { start: '370000', end: '379999' },
      ],
      lengths: [15],
      priority: 60,
    },
    {
      issuer: 'discover',
      displayName: 'Discover',
      ranges: [
        { start: '601100', end: '601199' },
        { start: '650000', end: '659999' },
      ],
      lengths: [16],
      priority: 50,
    },
    {
      issuer: 'diners',
      displayName: 'Diners Club',
      ranges: [
        { start: '300000', end: '305999' },
        { start: '360000', end: '369999' },
        { start: '380000', end: '399999' },
      ],
      lengths: [14],
      priority: 50,
    },
    {
      issuer: 'mastercard',
      displayName: 'Mastercard',
      ranges: [
        { start: '222100', end: '272099' },
        { start: '510000', end: '559999' },
      ],
      lengths: [16],
      priority: 40,
    },
    {
      // Checked last: widest range
      issuer: 'visa',
      displayName: 'Visa',
      ranges: [{ start: '400000', end: '499999' }],
      lengths: [16],
      priority: 10,
    },
  ],
};

/**
 * Creates the minimal built-in database. Never selected implicitly.
 */
export function createBuiltinIssuerDatabase(options: LoadOptions = {}): IssuerDatabase {
  return loadIssuerDatabase(BUILTIN_ISSUER_SOURCE, options);
}
