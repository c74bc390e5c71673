export interface AirportRef {
  iataCode: string;
  name: string;
}

export interface FarePrice {
  value: number;
  currencyCode: string;
}

/**
 * A one-way flight offer. Timestamps are naive local ISO-8601
 * (`YYYY-MM-DDTHH:MM:SS`) as returned by the fare API.
 */
export interface Fare {
  departureAirport: AirportRef;
  arrivalAirport: AirportRef;
  departureDate: string;
  arrivalDate: string;
  price: FarePrice;
  flightNumber?: string;
}

/** A fare with its timestamps rendered for display. */
export interface FareLeg extends Fare {
  departureDisplay?: string;
  arrivalDisplay?: string;
}

export interface ReturnWindow {
  earliest: string;
  latest: string;
}

export interface PairedFlights {
  outbound: Fare;
  inbound: Fare;
  totalPrice: number;
  layoverHours: number;
  // Currency of the return leg; the total is a plain sum of both legs
  currency: string;
  currencyMismatch: boolean;
}

export interface DayTrip {
  departureFare: FareLeg;
  returnFare: FareLeg;
  price: number;
  currency: string;
  currencyMismatch: boolean;
  layoverHours: number;
}

export type ResultKey = 'destinationName' | 'route';

export type DayTripResults = Map<string, DayTrip>;

export interface FareQuery {
  origin: string;
  destination?: string;
  date: string;
  currency: string;
  // Read at most this many fares from the head of the response
  limit?: number;
}

/** Source of one-way fares for a single day. */
export interface FareApi {
  searchOneWayFares(query: FareQuery): Promise<Fare[]>;
}
