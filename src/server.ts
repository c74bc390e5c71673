import { createApp } from './app.js';
import { config } from './config/env.js';
import { loadAirportRegistry } from './services/airports.js';
import { createDayTripFinder } from './services/day-trips.js';
import { RyanairService } from './services/ryanair.js';
import { SearchStore } from './services/search-store.js';
import { logger } from './utils/logger.js';

async function main() {
  const airports = await loadAirportRegistry();
  const finder = createDayTripFinder(new RyanairService());
  const store = new SearchStore();
  const app = createApp({ finder, store, airports });

  app.listen(config.port, () => {
    logger.info(`Server running on port ${config.port}`, {
      environment: config.env,
      ryanairApi: config.ryanair.baseUrl,
      outboundCurrency: config.search.outboundCurrency,
      returnCurrency: config.search.returnCurrency,
      concurrency: config.search.concurrency
    });
  });
}

main().catch(error => {
  logger.error('Failed to start server', {
    error: error instanceof Error ? error.message : String(error)
  });
  process.exit(1);
});
