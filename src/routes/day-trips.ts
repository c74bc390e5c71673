import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { AirportRegistry } from '../services/airports.js';
import type { DayTripFinder } from '../services/day-trips.js';
import type { SearchStore } from '../services/search-store.js';
import { errorMessage, InvalidBudgetError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface DayTripsRouterDeps {
  finder: DayTripFinder;
  store: SearchStore;
  airports: AirportRegistry;
}

const calendarDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');

export const searchDayTripsSchema = z.object({
  origin: z.string().trim().toUpperCase().regex(/^[A-Z0-9]{3}$/, 'Expected an IATA airport code').optional(),
  originName: z.string().trim().min(1).optional(),
  budget: z.union([z.number(), z.string()]),
  dateStart: calendarDate,
  dateEnd: calendarDate,
  resultKey: z.enum(['destinationName', 'route']).optional()
}).refine(body => body.origin || body.originName, {
  message: 'Either origin or originName is required',
  path: ['origin']
});

const pageQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1)
});

export function createDayTripsRouter({ finder, store, airports }: DayTripsRouterDeps): Router {
  const router = Router();

  // Run a search and keep its results for paging
  router.post('/', async (req: Request, res: Response) => {
    const parsed = searchDayTripsSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({
        success: false,
        error: 'Invalid search parameters',
        details: parsed.error.flatten().fieldErrors
      });
    }

    const { origin, originName, budget, dateStart, dateEnd, resultKey } = parsed.data;
    const originIata = origin ?? (originName ? airports.getIata(originName) : undefined);
    if (!originIata) {
      return res.status(404).json({
        success: false,
        error: `Unknown origin airport: ${originName}`,
        suggestions: originName ? airports.suggest(originName) : []
      });
    }

    logger.info('[Day Trips Route] Received search request:', {
      originIata,
      budget,
      dateStart,
      dateEnd,
      resultKey
    });

    try {
      const results = await finder.findDayTrips(originIata, budget, dateStart, dateEnd, { resultKey });
      const searchId = store.save(results);
      const page = store.getPage(searchId, 1);

      logger.info('[Day Trips Route] Search completed:', {
        searchId,
        originIata,
        totalResults: results.size
      });

      return res.status(201).json({
        success: true,
        data: page
      });
    } catch (error) {
      if (error instanceof InvalidBudgetError) {
        return res.status(400).json({
          success: false,
          error: error.message
        });
      }

      logger.error('[Day Trips Route] Error searching day trips:', {
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
        requestBody: req.body
      });

      return res.status(502).json({
        success: false,
        error: 'Failed to search day trips',
        details: errorMessage(error)
      });
    }
  });

  // Page through a finished search
  router.get('/:searchId', (req: Request<{ searchId: string }>, res: Response) => {
    const query = pageQuerySchema.safeParse(req.query);
    if (!query.success) {
      return res.status(400).json({
        success: false,
        error: 'Invalid page',
        details: query.error.flatten().fieldErrors
      });
    }

    const page = store.getPage(req.params.searchId, query.data.page);
    if (!page) {
      return res.status(404).json({
        success: false,
        error: 'Search not found or expired'
      });
    }

    return res.json({
      success: true,
      data: page
    });
  });

  return router;
}
