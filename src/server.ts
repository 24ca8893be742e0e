import type { Server } from 'node:http';
import express from 'express';
import type { WeatherService } from './core/weather/WeatherService.js';
import { createWeatherRouter } from './http/weatherRouter.js';
import { createLogger, generateRequestId, runWithRequestId } from './utils/logger.js';

export function createApp(weatherService: WeatherService): express.Express {
  const logger = createLogger({ component: 'server' });
  const app = express();

  app.disable('x-powered-by');

  // Request logging middleware; everything logged downstream carries the request id
  app.use((req, res, next) => {
    const requestId = generateRequestId();
    const startedAt = Date.now();
    res.on('finish', () => {
      runWithRequestId(requestId, () => {
        logger.info(
          { method: req.method, path: req.path, status: res.statusCode, durationMs: Date.now() - startedAt },
          'Request completed'
        );
      });
    });
    runWithRequestId(requestId, () => {
      logger.info({ method: req.method, path: req.path }, 'Incoming request');
      next();
    });
  });

  // Routes
  app.use(createWeatherRouter(weatherService));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handling
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error({ error: err }, 'Unhandled error in Express');
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export async function startServer(
  weatherService: WeatherService,
  port: number,
  host: string = '0.0.0.0'
): Promise<Server> {
  const logger = createLogger({ component: 'server' });
  const app = createApp(weatherService);

  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'HTTP server started');
      resolve(server);
    });
    server.once('error', reject);
  });
}
