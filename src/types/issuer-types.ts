/**
 * Issuer Types
 * Shapes of the issuer identification (BIN) table used for classification
 */

/** Number of leading digits that identify the issuer */
export const BIN_LENGTH = 6;

/** Shortest PAN accepted by classification and checksum validation */
export const MIN_PAN_LENGTH = 13;

/** Longest PAN accepted by classification and checksum validation */
export const MAX_PAN_LENGTH = 19;

/** Bounds for the card lengths an issuer may declare */
export const MIN_ISSUER_LENGTH = 12;
export const MAX_ISSUER_LENGTH = 19;

/**
 * Inclusive six-digit BIN interval
 */
export interface IssuerRange {
  readonly start: number;
  readonly end: number;
}

/**
 * A card issuer (network/brand) and the prefixes it owns
 */
export interface IssuerProfile {
  /** Short identifier, e.g. "visa" */
  readonly id: string;
  /** Human-readable name, e.g. "Visa" */
  readonly displayName: string;
  /** BIN ranges in source order */
  readonly ranges: readonly IssuerRange[];
  /** Accepted total card lengths; empty means any length is accepted */
  readonly validLengths: ReadonlySet<number>;
  /** Higher value wins when ranges of several issuers contain a BIN */
  readonly priority: number;
  /** Region the issuer operates in ("global", "IN", ...) */
  readonly region: string;
  readonly active: boolean;
  readonly notes?: string;
}

/**
 * Metadata header of an issuer table
 */
export interface IssuerDatabaseInfo {
  readonly version: string;
  readonly lastUpdated: string;
}
