import { config } from '../config/env.js';
import type { Fare, PairedFlights } from '../types/flight.js';
import { hoursBetween, parseNaiveTimestamp } from '../utils/date.js';
import type { ReturnMatcher } from './return-matcher.js';

/** Minimum time on the ground between outbound arrival and return departure, in hours. */
export const MIN_LAYOVER_HOURS = 4;

export interface PairingOptions {
  returnCurrency?: string;
  minLayoverHours?: number;
}

export class PairingFilter {
  private readonly returnCurrency: string;
  private readonly minLayoverHours: number;

  constructor(private readonly matcher: ReturnMatcher, options: PairingOptions = {}) {
    this.returnCurrency = options.returnCurrency ?? config.search.returnCurrency;
    this.minLayoverHours = options.minLayoverHours ?? MIN_LAYOVER_HOURS;
  }

  /**
   * Pairs an outbound fare with its same-day return. Undefined when there is
   * no return or the return leaves less than the minimum layover after the
   * outbound arrives. Prices are summed as-is, without currency conversion.
   */
  async pairFlights(outbound: Fare): Promise<PairedFlights | undefined> {
    const inbound = await this.matcher.findReturnFare(outbound, this.returnCurrency);
    if (!inbound) {
      return undefined;
    }

    const arrival = parseNaiveTimestamp(outbound.arrivalDate);
    const returnDeparture = parseNaiveTimestamp(inbound.departureDate);
    if (!arrival || !returnDeparture) {
      return undefined;
    }

    const layoverHours = hoursBetween(arrival, returnDeparture);
    if (layoverHours < this.minLayoverHours) {
      return undefined;
    }

    return {
      outbound,
      inbound,
      totalPrice: outbound.price.value + inbound.price.value,
      layoverHours,
      currency: inbound.price.currencyCode,
      currencyMismatch: outbound.price.currencyCode !== inbound.price.currencyCode
    };
  }
}
