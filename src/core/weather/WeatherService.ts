import type { ForecastPort } from '../../ports/ForecastPort.js';
import { isClientFacing } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import type { Coordinate } from './coordinateParser.js';
import { formatCoordinate } from './coordinateParser.js';
import type { TemperatureLabel } from './temperatureClassifier.js';
import { classifyTemperature } from './temperatureClassifier.js';

export const GENERIC_FAILURE_MESSAGE = 'Failed to retrieve weather data';

export interface WeatherSummary {
  forecast: string;
  temperature: TemperatureLabel;
  coordinates: string;
}

export type WeatherLookup =
  | { ok: true; summary: WeatherSummary }
  | { ok: false; status: 400 | 500; message: string };

export class WeatherService {
  private readonly logger = createLogger({ service: 'WeatherService' });

  constructor(private readonly forecastPort: ForecastPort) {}

  async getWeather(coordinate: Coordinate): Promise<WeatherLookup> {
    const { latitude, longitude } = coordinate;
    const outcome = await this.forecastPort.resolve(latitude, longitude);

    if (!outcome.ok) {
      const { error } = outcome;
      this.logger.error(
        { kind: error.kind, code: error.code, error, latitude, longitude },
        'Error getting weather data'
      );

      if (isClientFacing(error.kind)) {
        return { ok: false, status: 400, message: error.message };
      }
      return { ok: false, status: 500, message: GENERIC_FAILURE_MESSAGE };
    }

    return {
      ok: true,
      summary: {
        forecast: outcome.value.shortForecast,
        temperature: classifyTemperature(outcome.value.temperatureF),
        coordinates: formatCoordinate(latitude, longitude),
      },
    };
  }
}
