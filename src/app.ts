import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import morgan from 'morgan';
import { API_CONFIG } from './config/api.js';
import { createAirportsRouter } from './routes/airports.js';
import { createDayTripsRouter } from './routes/day-trips.js';
import type { AirportRegistry } from './services/airports.js';
import type { DayTripFinder } from './services/day-trips.js';
import type { SearchStore } from './services/search-store.js';
import { httpLogStream, logger } from './utils/logger.js';

export interface AppDeps {
  finder: DayTripFinder;
  store: SearchStore;
  airports: AirportRegistry;
}

export function createApp({ finder, store, airports }: AppDeps) {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());
  app.use(morgan('dev', { stream: httpLogStream }));

  // Routes
  app.use(API_CONFIG.ENDPOINTS.DAY_TRIPS, createDayTripsRouter({ finder, store, airports }));
  app.use(API_CONFIG.ENDPOINTS.AIRPORTS, createAirportsRouter(airports));

  app.get(API_CONFIG.ENDPOINTS.HEALTH, (req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      storedSearches: store.size
    });
  });

  // Handle 404
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      error: 'Not Found',
      message: 'The requested endpoint does not exist',
      path: req.url
    });
  });

  // Error handling
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed') {
      logger.warn('Malformed JSON body', { url: req.url, method: req.method, error: err.message });
      res.status(400).json({
        success: false,
        error: 'Request body is not valid JSON'
      });
      return;
    }

    logger.error('Unhandled error:', {
      error: err.message,
      stack: err.stack,
      url: req.url,
      method: req.method
    });
    res.status(500).json({
      error: 'Internal server error',
      message: err.message
    });
  });

  return app;
}

export default createApp;
