export const API_CONFIG = {
  ENDPOINTS: {
    DAY_TRIPS: '/api/day-trips',
    AIRPORTS: '/api/airports',
    HEALTH: '/api/health'
  },
  RYANAIR: {
    // Broad search by origin and date, priced for a market
    ONE_WAY_FARES: '/farfnd/v4/oneWayFares',
    // Narrow search by origin, destination and date, priced in a currency
    ONE_WAY_FARES_BY_ROUTE: '/farfnd/3/oneWayFares'
  },
  HEADERS: {
    'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64)',
    'Accept': 'application/json'
  }
} as const;

export type RyanairEndpoint = keyof typeof API_CONFIG.RYANAIR;
