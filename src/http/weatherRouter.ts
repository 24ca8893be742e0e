import type { Response, Router } from 'express';
import express from 'express';
import type { WeatherService, WeatherSummary } from '../core/weather/WeatherService.js';
import { parseCoordinate } from '../core/weather/coordinateParser.js';
import { BadRequestError } from '../utils/errors.js';
import { renderUsagePage } from './usagePage.js';

export type WeatherResponse = WeatherSummary | { error: string };

function sendWeather(res: Response, status: number, body: WeatherResponse): void {
  res.status(status).json(body);
}

export function createWeatherRouter(weatherService: WeatherService): Router {
  const router = express.Router();

  router.get('/weather', async (req, res, next) => {
    try {
      const coordinate = parseCoordinate(req.query.lat, req.query.lon);
      const result = await weatherService.getWeather(coordinate);

      if (!result.ok) {
        sendWeather(res, result.status, { error: result.message });
        return;
      }

      sendWeather(res, 200, result.summary);
    } catch (error) {
      if (error instanceof BadRequestError) {
        sendWeather(res, error.statusCode, { error: error.message });
        return;
      }
      next(error);
    }
  });

  router.get('/health', (_req, res) => {
    res.status(200).type('text/plain').send('Weather service is running');
  });

  router.get('/', (_req, res) => {
    res.status(200).type('text/html').send(renderUsagePage());
  });

  return router;
}
