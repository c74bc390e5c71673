import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { AirportRegistry } from '../services/airports.js';

const lookupQuerySchema = z.object({
  name: z.string().trim().min(1)
});

export function createAirportsRouter(airports: AirportRegistry): Router {
  const router = Router();

  // Airports Ryanair flies from
  router.get('/', (req: Request, res: Response) => {
    const served = airports.listServedAirports();
    res.json({
      success: true,
      data: served,
      count: served.length
    });
  });

  // Airport name to IATA code
  router.get('/lookup', (req: Request, res: Response) => {
    const query = lookupQuerySchema.safeParse(req.query);
    if (!query.success) {
      return res.status(400).json({
        success: false,
        error: 'Query parameter "name" is required'
      });
    }

    const { name } = query.data;
    const code = airports.getIata(name);
    if (!code) {
      return res.status(404).json({
        success: false,
        error: `No airport named ${name}`,
        suggestions: airports.suggest(name)
      });
    }

    return res.json({
      success: true,
      data: { code, name }
    });
  });

  router.get('/:code', (req: Request<{ code: string }>, res: Response) => {
    const airport = airports.getAirport(req.params.code);
    if (!airport) {
      return res.status(404).json({
        success: false,
        error: `Unknown airport code: ${req.params.code}`
      });
    }

    return res.json({
      success: true,
      data: airport
    });
  });

  return router;
}
