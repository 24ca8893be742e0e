// Load environment variables first
import 'dotenv/config';

import { loadConfig } from './config/index.js';
import { configureLogger, createLogger } from './utils/logger.js';
import { NwsForecastAdapter } from './adapters/nws/NwsForecastAdapter.js';
import { WeatherService } from './core/weather/WeatherService.js';
import { startServer } from './server.js';

async function main(): Promise<void> {
  const config = loadConfig();
  configureLogger(config.logLevel);

  const logger = createLogger({ component: 'index' });
  logger.info('Starting weather service');

  try {
    const forecastAdapter = new NwsForecastAdapter(config);
    const weatherService = new WeatherService(forecastAdapter);

    await startServer(weatherService, config.port, config.host);

    logger.info({ host: config.host, port: config.port }, 'Server started successfully');
  } catch (error) {
    logger.error({ error }, 'Failed to start application');
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
