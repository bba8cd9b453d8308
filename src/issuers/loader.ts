/**
 * Issuer Database Loading
 * Validates issuer data and builds an IssuerDatabase from it
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import type { IssuerProfile } from '../types/index.js';
import { MalformedDatabaseError, formatIssues, toValidationIssues } from '../errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { IssuerDatabase } from './database.js';
import { issuerDatabaseSourceSchema, type IssuerSource } from './schema.js';

/**
 * Location of the issuer table shipped with the package
 */
export const DEFAULT_BIN_DATABASE_PATH = fileURLToPath(
  new URL('../../data/bin-ranges.json', import.meta.url)
);

export interface LoadOptions {
  logger?: Logger;
}

const defaultLogger = createLogger('IssuerDatabase');

function toProfile(source: IssuerSource): IssuerProfile {
  return Object.freeze({
    id: source.issuer,
    displayName: source.displayName,
    ranges: Object.freeze(
      source.ranges.map((range) => Object.freeze({ start: Number(range.start), end: Number(range.end) }))
    ),
    validLengths: new Set(source.lengths),
    priority: source.priority,
    region: source.region,
    active: source.active,
    ...(source.notes !== undefined ? { notes: source.notes } : {}),
  });
}

/**
 * Builds a database from structured issuer data (e.g. parsed JSON)
 * @throws MalformedDatabaseError when the data fails validation
 */
export function loadIssuerDatabase(source: unknown, options: LoadOptions = {}): IssuerDatabase {
  const logger = options.logger ?? defaultLogger;
  const parsed = issuerDatabaseSourceSchema.safeParse(source);

  if (!parsed.success) {
    const issues = toValidationIssues(parsed.error);
    throw new MalformedDatabaseError(`Invalid issuer table: ${formatIssues(issues)}`, issues);
  }

  const { info, issuers } = parsed.data;
  const database = new IssuerDatabase(issuers.map(toProfile), {
    version: info.version,
    lastUpdated: info.lastUpdated,
  });

  const inactive = issuers.length - database.issuerCount;
  logger.debug('Issuer database loaded', {
    version: database.version,
    issuers: database.issuerCount,
    ranges: database.rangeCount,
    inactive,
  });

  return database;
}

/**
 * Reads and validates an issuer table from a JSON file
 * @throws MalformedDatabaseError when the file cannot be read, parsed or validated
 */
export async function loadIssuerDatabaseFile(
  filePath: string,
  options: LoadOptions = {}
): Promise<IssuerDatabase> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new MalformedDatabaseError(`Failed to read issuer table '${filePath}'`, [], { cause: error });
  }

  if (raw.trim() === '') {
    throw new MalformedDatabaseError(`Issuer table '${filePath}' is empty`);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new MalformedDatabaseError(`Issuer table '${filePath}' is not valid JSON`, [], { cause: error });
  }

  return loadIssuerDatabase(data, options);
}

/**
 * Loads the issuer table shipped with the package
 */
export function loadDefaultIssuerDatabase(options: LoadOptions = {}): Promise<IssuerDatabase> {
  return loadIssuerDatabaseFile(DEFAULT_BIN_DATABASE_PATH, options);
}
