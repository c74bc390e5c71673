import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { API_CONFIG, type RyanairEndpoint } from '../config/api.js';
import { config } from '../config/env.js';
import type { Fare, FareApi, FareQuery } from '../types/flight.js';
import {
  type OneWayFaresParams,
  type RyanairFare,
  ryanairFareSchema,
  ryanairFaresResponseSchema
} from '../types/ryanair.js';
import { FareApiError } from '../utils/errors.js';
import { logFareSearch, logger } from '../utils/logger.js';

export interface RyanairServiceOptions {
  baseUrl?: string;
  market?: string;
  timeoutMs?: number;
  // Minimum delay between two consecutive requests
  requestDelayMs?: number;
  adapter?: AxiosAdapter;
}

export function toFare(fare: RyanairFare): Fare {
  const { outbound } = fare;
  return {
    departureAirport: {
      iataCode: outbound.departureAirport.iataCode,
      name: outbound.departureAirport.name
    },
    arrivalAirport: {
      iataCode: outbound.arrivalAirport.iataCode,
      name: outbound.arrivalAirport.name
    },
    departureDate: outbound.departureDate,
    arrivalDate: outbound.arrivalDate,
    price: {
      value: outbound.price.value,
      currencyCode: outbound.price.currencyCode
    },
    ...(outbound.flightNumber ? { flightNumber: outbound.flightNumber } : {})
  };
}

/**
 * Extracts the fares of a fare finder response. Fares that do not match the
 * expected shape are dropped; a body without a fares list yields none. With a
 * limit only that many raw fares are read, so a dropped fare is not replaced
 * by the one after it.
 */
export function parseFaresResponse(data: unknown, limit?: number): Fare[] {
  const response = ryanairFaresResponseSchema.safeParse(data);
  if (!response.success) {
    logFareSearch.invalidFare(response.error.issues.map(issue => issue.message));
    return [];
  }

  const fares: Fare[] = [];
  const candidates = limit === undefined ? response.data.fares : response.data.fares.slice(0, limit);
  for (const candidate of candidates) {
    const parsed = ryanairFareSchema.safeParse(candidate);
    if (parsed.success) {
      fares.push(toFare(parsed.data));
    } else {
      logFareSearch.invalidFare(
        parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
      );
    }
  }
  return fares;
}

export class RyanairService implements FareApi {
  private readonly http: AxiosInstance;
  private readonly market: string;
  private readonly requestDelayMs: number;
  private lastRequestTime = 0;

  constructor(options: RyanairServiceOptions = {}) {
    this.market = options.market ?? config.ryanair.market;
    this.requestDelayMs = options.requestDelayMs ?? config.ryanair.requestDelayMs;
    this.http = axios.create({
      baseURL: options.baseUrl ?? config.ryanair.baseUrl,
      timeout: options.timeoutMs ?? config.ryanair.timeoutMs,
      headers: { ...API_CONFIG.HEADERS },
      adapter: options.adapter
    });
  }

  /**
   * Fares departing on a single day. Without a destination this is the broad
   * search from the origin to every destination, priced for the configured
   * market; with one it is the route search priced in the given currency.
   */
  async searchOneWayFares(query: FareQuery): Promise<Fare[]> {
    const endpoint: RyanairEndpoint = query.destination ? 'ONE_WAY_FARES_BY_ROUTE' : 'ONE_WAY_FARES';
    const params: OneWayFaresParams = query.destination
      ? {
          departureAirportIataCode: query.origin,
          arrivalAirportIataCode: query.destination,
          outboundDepartureDateFrom: query.date,
          outboundDepartureDateTo: query.date,
          currency: query.currency
        }
      : {
          departureAirportIataCode: query.origin,
          outboundDepartureDateFrom: query.date,
          outboundDepartureDateTo: query.date,
          currency: query.currency,
          market: this.market
        };

    const data = await this.makeRequest(endpoint, params);
    return parseFaresResponse(data, query.limit);
  }

  private async rateLimit(): Promise<void> {
    if (this.requestDelayMs <= 0) {
      return;
    }

    const timeSinceLastRequest = Date.now() - this.lastRequestTime;
    if (timeSinceLastRequest < this.requestDelayMs) {
      const waitTime = this.requestDelayMs - timeSinceLastRequest;
      await new Promise(resolve => setTimeout(resolve, waitTime));
    }

    this.lastRequestTime = Date.now();
  }

  private async makeRequest(endpoint: RyanairEndpoint, params: OneWayFaresParams): Promise<unknown> {
    await this.rateLimit();
    const url = API_CONFIG.RYANAIR[endpoint];

    try {
      const response = await this.http.get<unknown>(url, { params });
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        logger.debug('Ryanair API request failed', {
          tags: ['ryanair', 'http'],
          url,
          params,
          status,
          code: error.code
        });
        throw new FareApiError(
          status !== undefined
            ? `Ryanair API responded with status ${status}`
            : `Ryanair API request failed: ${error.message}`,
          { status, url, cause: error }
        );
      }
      throw error;
    }
  }
}
