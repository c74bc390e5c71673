import type { Fare, FareApi, ReturnWindow } from '../types/flight.js';
import { addHours, calendarDate, endOfDay, parseNaiveTimestamp, toIsoTimestamp } from '../utils/date.js';
import { FareApiError } from '../utils/errors.js';
import { logFareSearch, searchLogger } from '../utils/logger.js';

/** Earliest return departure suggested after the outbound arrival, in hours. */
export const PREFERRED_RETURN_GAP_HOURS = 6;

const routeLabel = (fare: Fare) => `${fare.arrivalAirport.iataCode}-${fare.departureAirport.iataCode}`;

/**
 * Window in which a same-day return may depart: from the outbound arrival
 * plus {@link PREFERRED_RETURN_GAP_HOURS} to the end of the arrival day.
 * Undefined when the arrival timestamp cannot be parsed.
 */
export function returnWindow(outbound: Fare, gapHours = PREFERRED_RETURN_GAP_HOURS): ReturnWindow | undefined {
  const arrival = parseNaiveTimestamp(outbound.arrivalDate);
  if (!arrival) {
    return undefined;
  }

  return {
    earliest: toIsoTimestamp(addHours(arrival, gapHours)),
    latest: toIsoTimestamp(endOfDay(arrival))
  };
}

/**
 * Looks up the return flight for a same-day round trip. Only the calendar
 * day of the outbound arrival is sent to the API and the first fare it
 * returns is taken, or none when that fare is malformed. The minimum time
 * on the ground is checked by the pairing step.
 */
export class ReturnMatcher {
  constructor(private readonly api: FareApi) {}

  async findReturnFare(outbound: Fare, currency: string): Promise<Fare | undefined> {
    const departureDay = calendarDate(outbound.departureDate);
    const arrivalDay = calendarDate(outbound.arrivalDate);
    if (!arrivalDay || departureDay !== arrivalDay) {
      return undefined;
    }

    const route = routeLabel(outbound);
    const window = returnWindow(outbound);
    if (window) {
      logFareSearch.returnWindow(route, window.earliest, window.latest);
    }

    let fares: Fare[];
    try {
      fares = await this.api.searchOneWayFares({
        origin: outbound.arrivalAirport.iataCode,
        destination: outbound.departureAirport.iataCode,
        date: arrivalDay,
        currency,
        limit: 1
      });
    } catch (error) {
      if (error instanceof FareApiError && error.hasResponse) {
        if (!error.isClientError) {
          searchLogger.warn('Return fare lookup failed', {
            tags: ['match', 'return'],
            route,
            status: error.status
          });
        }
        logFareSearch.returnUnavailable(route, error.message, error.status);
        return undefined;
      }
      throw error;
    }

    const [first] = fares;
    if (!first) {
      logFareSearch.returnUnavailable(route, 'No usable fare returned');
      return undefined;
    }
    return first;
  }
}
