import { config } from '../config/env.js';
import type { Fare, FareApi } from '../types/flight.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { eachDay } from '../utils/date.js';
import { logFareSearch, searchLogger } from '../utils/logger.js';

export interface FareFetcherOptions {
  concurrency?: number;
}

/** Collects outbound fares from an origin, one API call per day. */
export class FareFetcher {
  private readonly concurrency: number;

  constructor(private readonly api: FareApi, options: FareFetcherOptions = {}) {
    this.concurrency = options.concurrency ?? config.search.concurrency;
  }

  async fetchOutboundFares(originIata: string, startDate: string, endDate: string, currency: string): Promise<Fare[]> {
    const days = eachDay(startDate, endDate);
    if (!days) {
      searchLogger.warn('Invalid date range, no fares fetched', {
        tags: ['fetch', 'outbound'],
        originIata,
        startDate,
        endDate
      });
      return [];
    }

    const faresByDay = await mapWithConcurrency(days, this.concurrency, async day => {
      try {
        return await this.api.searchOneWayFares({ origin: originIata, date: day, currency });
      } catch (error) {
        logFareSearch.dayFailed(day, error);
        return [];
      }
    });

    const fares = faresByDay.flat();
    logFareSearch.daysFetched(originIata, days.length, fares.length);
    return fares;
  }
}
