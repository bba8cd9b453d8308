/**
 * Issuers Module
 * Issuer table schema, database and loaders
 */

export * from './schema.js';
export { IssuerDatabase, acceptsLength } from './database.js';
export {
  DEFAULT_BIN_DATABASE_PATH,
  loadIssuerDatabase,
  loadIssuerDatabaseFile,
  loadDefaultIssuerDatabase,
  type LoadOptions,
} from './loader.js';
export { BUILTIN_ISSUER_SOURCE, createBuiltinIssuerDatabase } from './builtin.js';
