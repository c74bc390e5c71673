import { randomUUID } from 'crypto';
import { config } from '../config/env.js';
import type { DayTrip, DayTripResults } from '../types/flight.js';

export interface StoredResult extends DayTrip {
  key: string;
}

export interface ResultPage {
  searchId: string;
  page: number;
  perPage: number;
  totalPages: number;
  totalResults: number;
  results: StoredResult[];
}

interface StoreEntry {
  results: StoredResult[];
  expiresAt: number;
}

export interface SearchStoreOptions {
  ttlMinutes?: number;
  perPage?: number;
  now?: () => number;
}

/**
 * Holds finished searches under a random id so a client can page through
 * them later. Owned by the HTTP layer; the search itself never reads it.
 */
export class SearchStore {
  private readonly entries = new Map<string, StoreEntry>();
  private readonly ttlMs: number;
  private readonly perPage: number;
  private readonly now: () => number;

  constructor(options: SearchStoreOptions = {}) {
    this.ttlMs = (options.ttlMinutes ?? config.search.ttlMinutes) * 60 * 1000;
    this.perPage = options.perPage ?? config.search.resultsPerPage;
    this.now = options.now ?? Date.now;
  }

  save(results: DayTripResults): string {
    this.evictExpired();
    const searchId = randomUUID();
    this.entries.set(searchId, {
      results: [...results.entries()].map(([key, trip]) => ({ key, ...trip })),
      expiresAt: this.now() + this.ttlMs
    });
    return searchId;
  }

  /** One page of a stored search, 1-based. Undefined for unknown or expired ids. */
  getPage(searchId: string, page = 1): ResultPage | undefined {
    const entry = this.entries.get(searchId);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(searchId);
      return undefined;
    }

    const current = Math.max(1, Math.floor(page));
    const start = (current - 1) * this.perPage;
    return {
      searchId,
      page: current,
      perPage: this.perPage,
      totalPages: Math.ceil(entry.results.length / this.perPage),
      totalResults: entry.results.length,
      results: entry.results.slice(start, start + this.perPage)
    };
  }

  get size(): number {
    return this.entries.size;
  }

  private evictExpired() {
    const now = this.now();
    for (const [id, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(id);
      }
    }
  }
}
