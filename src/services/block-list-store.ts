import { CountryCode } from "../models/geo-data";

/**
 * Optional load/save seam for composing the store with durable storage.
 * The service itself runs without one: the list lives in memory and is
 * empty again after a restart.
 */
export interface BlockListPersistence {
  load(): Promise<CountryCode[]>;
  save(countries: readonly CountryCode[]): Promise<void>;
}

export function normalizeCountryCode(code: string): CountryCode {
  return code.trim().toUpperCase();
}

function toCodeSet(countries: Iterable<string>): Set<CountryCode> {
  const codes = new Set<CountryCode>();
  for (const code of countries) {
    const normalized = normalizeCountryCode(code);
    if (normalized) {
      codes.add(normalized);
    }
  }
  return codes;
}

/**
 * Process-wide set of blocked country codes.
 *
 * The set is never modified in place: every replace builds a new set and
 * swaps the reference, so a reader always sees either the old or the new
 * list in full.
 */
export class BlockListStore {
  private blocked: ReadonlySet<CountryCode> = new Set<CountryCode>();

  constructor(private readonly persistence?: BlockListPersistence) {}

  /**
   * Replace the entire list. Returns the normalized, de-duplicated codes in input order.
   * With persistence, the live list only changes once the save succeeded.
   */
  async setBlocked(countries: Iterable<string>): Promise<CountryCode[]> {
    const next = toCodeSet(countries);
    const codes = [...next];
    if (this.persistence) {
      await this.persistence.save(codes);
    }
    this.blocked = next;
    return codes;
  }

  isBlocked(code: string): boolean {
    return this.blocked.has(normalizeCountryCode(code));
  }

  /**
   * Current codes, sorted
   */
  list(): CountryCode[] {
    return [...this.blocked].sort();
  }

  /**
   * Replace the list with whatever the persistence layer holds
   */
  async hydrate(): Promise<CountryCode[]> {
    if (!this.persistence) {
      return this.list();
    }
    const stored = toCodeSet(await this.persistence.load());
    this.blocked = stored;
    return [...stored];
  }
}
