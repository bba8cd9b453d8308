/**
 * Issuer Database
 * Immutable BIN range table with priority-based overlap resolution
 */

import { BIN_LENGTH, type IssuerDatabaseInfo, type IssuerProfile } from '../types/index.js';
import { MalformedDatabaseError, type ValidationIssue } from '../errors.js';

/**
 * One range of the flattened lookup index
 */
interface IndexedRange {
  start: number;
  end: number;
  /** Position of the owning issuer in priority order */
  issuerIndex: number;
}

/**
 * An issuer whose ranges contain a BIN, with the narrowest such range
 */
interface RangeHit {
  issuerIndex: number;
  span: number;
}

const MAX_BIN = 999_999;

/**
 * Checks profile ranges the schema would otherwise have caught
 */
function checkProfiles(profiles: readonly IssuerProfile[]): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  profiles.forEach((profile, index) => {
    profile.ranges.forEach((range, rangeIndex) => {
      const path = `issuers.${index}.ranges.${rangeIndex}`;
      if (!Number.isInteger(range.start) || !Number.isInteger(range.end)) {
        issues.push({ path, message: 'range bounds must be integers' });
      } else if (range.start < 0 || range.end > MAX_BIN) {
        issues.push({ path, message: 'range bounds must be six-digit prefixes' });
      } else if (range.start > range.end) {
        issues.push({ path, message: 'start must not be greater than end' });
      }
    });
  });

  return issues;
}

/**
 * Read-only issuer table shared by every worker.
 *
 * Issuers are kept in priority order (descending, stable). Ranges are
 * flattened into a start-sorted index with a running maximum of range ends,
 * so a containment query binary-searches the last range starting at or
 * before the BIN and walks back only while some earlier range can still
 * reach it.
 */
export class IssuerDatabase {
  readonly info: IssuerDatabaseInfo;

  private readonly ordered: readonly IssuerProfile[];
  private readonly byId: ReadonlyMap<string, IssuerProfile>;
  private readonly index: readonly IndexedRange[];
  private readonly maxEnd: readonly number[];

  constructor(profiles: readonly IssuerProfile[], info: IssuerDatabaseInfo) {
    const issues = checkProfiles(profiles);
    if (issues.length > 0) {
      throw new MalformedDatabaseError('Issuer table contains invalid ranges', issues);
    }

    // Array.prototype.sort is stable, so load order survives among equal priorities
    const ordered = profiles
      .filter((profile) => profile.active)
      .sort((a, b) => b.priority - a.priority);

    if (ordered.length === 0) {
      throw new MalformedDatabaseError('Issuer table contains no active issuers', [
        { path: 'issuers', message: 'no active issuers' },
      ]);
    }

    const index: IndexedRange[] = [];
    ordered.forEach((profile, issuerIndex) => {
      for (const range of profile.ranges) {
        index.push({ start: range.start, end: range.end, issuerIndex });
      }
    });
    index.sort((a, b) => a.start - b.start || a.issuerIndex - b.issuerIndex);

    const maxEnd: number[] = [];
    let runningMax = -1;
    for (const entry of index) {
      runningMax = Math.max(runningMax, entry.end);
      maxEnd.push(runningMax);
    }

    this.info = Object.freeze({ ...info });
    this.ordered = Object.freeze(ordered);
    this.byId = new Map(ordered.map((profile) => [profile.id, profile]));
    this.index = Object.freeze(index);
    this.maxEnd = Object.freeze(maxEnd);
  }

  get version(): string {
    return this.info.version;
  }

  get lastUpdated(): string {
    return this.info.lastUpdated;
  }

  /** Active issuers in priority order */
  get issuers(): readonly IssuerProfile[] {
    return this.ordered;
  }

  get issuerCount(): number {
    return this.ordered.length;
  }

  get rangeCount(): number {
    return this.index.length;
  }

  getIssuer(id: string): IssuerProfile | undefined {
    return this.byId.get(id);
  }

  issuerIds(): string[] {
    return this.ordered.map((profile) => profile.id);
  }

  /**
   * Every active issuer whose ranges contain the BIN, best match first.
   * Ordering: priority descending, then narrowest containing range, then load order.
   */
  lookupAll(bin: number | string): IssuerProfile[] {
    const value = toBinValue(bin);
    if (value === null) return [];

    return this.collectHits(value)
      .sort((a, b) => this.compareHits(a, b))
      .flatMap((hit) => {
        const profile = this.ordered[hit.issuerIndex];
        return profile === undefined ? [] : [profile];
      });
  }

  /**
   * Best issuer for a BIN whose length constraint accepts the card length
   */
  lookup(bin: number | string, cardLength: number): IssuerProfile | undefined {
    return this.lookupAll(bin).find((profile) => acceptsLength(profile, cardLength));
  }

  private collectHits(bin: number): RangeHit[] {
    const hits = new Map<number, number>();

    for (let i = this.lastStartAtOrBefore(bin); i >= 0; i--) {
      const reach = this.maxEnd[i];
      if (reach === undefined || reach < bin) break;

      const entry = this.index[i];
      if (entry === undefined || entry.end < bin) continue;

      const span = entry.end - entry.start;
      const known = hits.get(entry.issuerIndex);
      if (known === undefined || span < known) {
        hits.set(entry.issuerIndex, span);
      }
    }

    return Array.from(hits, ([issuerIndex, span]) => ({ issuerIndex, span }));
  }

  private compareHits(a: RangeHit, b: RangeHit): number {
    const priorityA = this.ordered[a.issuerIndex]?.priority ?? 0;
    const priorityB = this.ordered[b.issuerIndex]?.priority ?? 0;
    if (priorityA !== priorityB) return priorityB - priorityA;
    if (a.span !== b.span) return a.span - b.span;
    return a.issuerIndex - b.issuerIndex;
  }

  private lastStartAtOrBefore(bin: number): number {
    let lo = 0;
    let hi = this.index.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const entry = this.index[mid];
      if (entry !== undefined && entry.start <= bin) lo = mid + 1;
      else hi = mid;
    }
    return lo - 1;
  }
}

/**
 * Whether the issuer accepts a card of this total length
 */
export function acceptsLength(profile: IssuerProfile, cardLength: number): boolean {
  return profile.validLengths.size === 0 || profile.validLengths.has(cardLength);
}

function toBinValue(bin: number | string): number | null {
  if (typeof bin === 'number') {
    return Number.isInteger(bin) && bin >= 0 && bin <= MAX_BIN ? bin : null;
  }
  const prefix = bin.slice(0, BIN_LENGTH);
  if (!/^\d{6}$/.test(prefix)) return null;
  return Number(prefix);
}
