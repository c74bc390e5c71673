import fs from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { calculateStringSimilarity } from '../utils/string.js';
import { logger } from '../utils/logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const DEFAULT_DATA_DIR = path.join(__dirname, '../../data');

export const airportSchema = z.object({
  code: z.string().regex(/^[A-Z0-9]{3}$/),
  name: z.string().min(1),
  city: z.string(),
  country: z.string()
});

export type Airport = z.infer<typeof airportSchema>;

export interface AirportSuggestion extends Airport {
  score: number;
}

const SUGGESTION_THRESHOLD = 0.3;

/**
 * Lookup over the full airport registry joined with the list of airports
 * Ryanair serves.
 */
export class AirportRegistry {
  private readonly byCode = new Map<string, Airport>();
  private readonly served: Airport[];

  constructor(registry: readonly Airport[], servedCodes: readonly string[]) {
    for (const airport of registry) {
      this.byCode.set(airport.code, airport);
    }

    this.served = servedCodes.flatMap(code => {
      const airport = this.byCode.get(code);
      return airport ? [airport] : [];
    });
  }

  /** IATA code of the airport with exactly this name. */
  getIata(name: string): string | undefined {
    for (const airport of this.byCode.values()) {
      if (airport.name === name) {
        return airport.code;
      }
    }
    return undefined;
  }

  getAirport(code: string): Airport | undefined {
    return this.byCode.get(code.toUpperCase());
  }

  listServedAirports(): Airport[] {
    return [...this.served];
  }

  /** Served airports whose name or city resembles `query`, best match first. */
  suggest(query: string, limit = 5): AirportSuggestion[] {
    return this.served
      .map(airport => ({
        ...airport,
        score: Math.max(
          calculateStringSimilarity(query, airport.name),
          calculateStringSimilarity(query, airport.city)
        )
      }))
      .filter(suggestion => suggestion.score >= SUGGESTION_THRESHOLD)
      .sort((a, b) => b.score - a.score)
      .slice(0, limit);
  }
}

async function readJson(file: string): Promise<unknown> {
  const raw = await fs.readFile(file, 'utf-8');
  return JSON.parse(raw);
}

/**
 * Loads `airports.json` (full registry) and `ryanair-airports.json` (served
 * codes) from `dataDir`.
 */
export async function loadAirportRegistry(dataDir = DEFAULT_DATA_DIR): Promise<AirportRegistry> {
  const [registry, served] = await Promise.all([
    readJson(path.join(dataDir, 'airports.json')),
    readJson(path.join(dataDir, 'ryanair-airports.json'))
  ]);

  const airports = z.array(airportSchema).parse(registry);
  const servedCodes = z.array(z.string()).parse(served);

  logger.info('Airport registry loaded', {
    tags: ['airports'],
    airports: airports.length,
    served: servedCodes.length
  });

  return new AirportRegistry(airports, servedCodes);
}
