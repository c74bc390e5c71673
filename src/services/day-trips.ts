import { config } from '../config/env.js';
import type {
  DayTrip,
  DayTripResults,
  Fare,
  FareApi,
  FareLeg,
  PairedFlights,
  ResultKey
} from '../types/flight.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { calendarDate, formatDisplay } from '../utils/date.js';
import { InvalidBudgetError } from '../utils/errors.js';
import { logFareSearch } from '../utils/logger.js';
import { FareFetcher } from './fare-fetcher.js';
import { PairingFilter, type PairingOptions } from './pairing.js';
import { ReturnMatcher } from './return-matcher.js';

const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

export interface DayTripFinderOptions {
  outboundCurrency?: string;
  concurrency?: number;
  resultKey?: ResultKey;
}

export type DayTripServiceOptions = DayTripFinderOptions & PairingOptions;

/**
 * Converts a budget given as a number or a decimal string. Throws
 * InvalidBudgetError for anything else, including blank strings.
 */
export function parseBudget(budget: unknown): number {
  if (typeof budget === 'number' && Number.isFinite(budget)) {
    return budget;
  }
  if (typeof budget === 'string') {
    const trimmed = budget.trim();
    if (DECIMAL_PATTERN.test(trimmed)) {
      const value = Number(trimmed);
      if (Number.isFinite(value)) {
        return value;
      }
    }
  }
  throw new InvalidBudgetError(budget);
}

export const roundPrice = (price: number): number => Math.round(price * 100) / 100;

export function toFareLeg(fare: Fare): FareLeg {
  return {
    ...fare,
    departureDisplay: formatDisplay(fare.departureDate),
    arrivalDisplay: formatDisplay(fare.arrivalDate)
  };
}

export function resultKeyFor(fare: Fare, resultKey: ResultKey): string {
  if (resultKey === 'route') {
    const day = calendarDate(fare.departureDate) ?? fare.departureDate;
    return `${fare.departureAirport.iataCode}-${fare.arrivalAirport.iataCode}:${day}`;
  }
  return fare.arrivalAirport.name;
}

/** New map with the entries ordered by ascending price; ties keep their order. */
export function sortByPrice(results: DayTripResults): DayTripResults {
  return new Map([...results.entries()].sort(([, a], [, b]) => a.price - b.price));
}

export class DayTripFinder {
  private readonly outboundCurrency: string;
  private readonly concurrency: number;
  private readonly resultKey: ResultKey;

  constructor(
    private readonly fetcher: FareFetcher,
    private readonly pairing: PairingFilter,
    options: DayTripFinderOptions = {}
  ) {
    this.outboundCurrency = options.outboundCurrency ?? config.search.outboundCurrency;
    this.concurrency = options.concurrency ?? config.search.concurrency;
    this.resultKey = options.resultKey ?? 'destinationName';
  }

  /**
   * Finds same-day round trips from `originIata` departing between
   * `dateStart` and `dateEnd` (inclusive) whose total price is within
   * `budget`. Results are keyed by destination name (or route, see
   * `resultKey`) and ordered by ascending price.
   */
  async findDayTrips(
    originIata: string,
    budget: string | number,
    dateStart: string,
    dateEnd: string,
    options: { resultKey?: ResultKey } = {}
  ): Promise<DayTripResults> {
    const resultKey = options.resultKey ?? this.resultKey;
    const maxPrice = parseBudget(budget);
    const outboundFares = await this.fetcher.fetchOutboundFares(
      originIata,
      dateStart,
      dateEnd,
      this.outboundCurrency
    );

    const pairs = await mapWithConcurrency(outboundFares, this.concurrency, fare => this.pairing.pairFlights(fare));

    const results: DayTripResults = new Map();
    for (const pair of pairs) {
      if (!pair) {
        continue;
      }

      const trip = this.toDayTrip(pair);
      if (pair.totalPrice > maxPrice) {
        continue;
      }

      results.set(resultKeyFor(pair.outbound, resultKey), trip);
      this.logAccepted(trip);
    }

    return sortByPrice(results);
  }

  private toDayTrip(pair: PairedFlights): DayTrip {
    return {
      departureFare: toFareLeg(pair.outbound),
      returnFare: toFareLeg(pair.inbound),
      price: roundPrice(pair.totalPrice),
      currency: pair.currency,
      currencyMismatch: pair.currencyMismatch,
      layoverHours: pair.layoverHours
    };
  }

  private logAccepted(trip: DayTrip) {
    const { departureFare: out, returnFare: back } = trip;
    logFareSearch.pairAccepted(
      [
        `Depart ${out.departureAirport.name}, arrive ${out.arrivalAirport.name}, ` +
          `depart at time ${out.departureDisplay}, arrive at time ${out.arrivalDisplay}`,
        `Depart ${back.departureAirport.name}, arrive ${back.arrivalAirport.name}, ` +
          `depart at time ${back.departureDisplay}, arrive at time ${back.arrivalDisplay}`,
        `Total cost ${trip.currency}${trip.price}`
      ],
      {
        destination: out.arrivalAirport.iataCode,
        price: trip.price,
        currency: trip.currency,
        currencyMismatch: trip.currencyMismatch
      }
    );
  }
}

/** Wires the fetcher, matcher and pairing filter around one fare API. */
export function createDayTripFinder(api: FareApi, options: DayTripServiceOptions = {}): DayTripFinder {
  const fetcher = new FareFetcher(api, { concurrency: options.concurrency });
  const matcher = new ReturnMatcher(api);
  const pairing = new PairingFilter(matcher, {
    returnCurrency: options.returnCurrency,
    minLayoverHours: options.minLayoverHours
  });
  return new DayTripFinder(fetcher, pairing, options);
}
