import { z } from 'zod';
import { parseNaiveTimestamp } from '../utils/date.js';

// Wire format of the Ryanair fare finder ("farfnd") API

const naiveTimestamp = z.string().refine(
  value => parseNaiveTimestamp(value) !== undefined,
  { message: 'Expected a naive ISO-8601 timestamp' }
);

export const ryanairAirportSchema = z.object({
  iataCode: z.string().min(3),
  name: z.string(),
  countryName: z.string().optional(),
  city: z.object({
    name: z.string(),
    code: z.string().optional()
  }).optional()
});

export const ryanairPriceSchema = z.object({
  value: z.number(),
  currencyCode: z.string()
});

export const ryanairFareSchema = z.object({
  outbound: z.object({
    departureAirport: ryanairAirportSchema,
    arrivalAirport: ryanairAirportSchema,
    departureDate: naiveTimestamp,
    arrivalDate: naiveTimestamp,
    price: ryanairPriceSchema,
    flightNumber: z.string().optional()
  })
});

export const ryanairFaresResponseSchema = z.object({
  fares: z.array(z.unknown()).default([])
});

export type RyanairFare = z.infer<typeof ryanairFareSchema>;

export interface OneWayFaresParams {
  departureAirportIataCode: string;
  arrivalAirportIataCode?: string;
  outboundDepartureDateFrom: string;
  outboundDepartureDateTo: string;
  currency?: string;
  market?: string;
}
