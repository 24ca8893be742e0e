import type { ForecastError } from '../utils/errors.js';

export interface ForecastResult {
  shortForecast: string;
  temperatureValue: number;
  temperatureUnit: string;
}

export interface ResolvedForecast {
  shortForecast: string;
  /** Whole degrees Fahrenheit, converted from Celsius when needed. */
  temperatureF: number;
}

export type ForecastOutcome =
  | { ok: true; value: ResolvedForecast }
  | { ok: false; error: ForecastError };

export interface ForecastPort {
  resolve(lat: number, lon: number): Promise<ForecastOutcome>;
}
