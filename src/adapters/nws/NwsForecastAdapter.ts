import type pino from 'pino';
import type { ZodType, ZodTypeDef } from 'zod';
import type { Config } from '../../config/index.js';
import type { ForecastOutcome, ForecastPort, ForecastResult } from '../../ports/ForecastPort.js';
import { findCoverageRegion } from '../../core/weather/coverageChecker.js';
import { formatCoordinate, toFixed4 } from '../../core/weather/coordinateParser.js';
import { toFahrenheit } from '../../core/weather/temperatureClassifier.js';
import { ForecastError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import {
  nwsForecastPeriodSchema,
  nwsForecastResponseSchema,
  nwsPointsResponseSchema,
} from './nwsSchemas.js';

export type NwsAdapterConfig = Pick<Config, 'nwsBaseUrl' | 'nwsUserAgent' | 'upstreamTimeoutMs'>;

type FetchResult<T> = { ok: true; body: T } | { ok: false; error: ForecastError };

interface UpstreamCall<T> {
  /** Label used in logs and error messages, e.g. "grid points". */
  name: string;
  url: string;
  schema: ZodType<T, ZodTypeDef, unknown>;
  onStatus: (status: number) => ForecastError;
}

function fail(error: ForecastError): { ok: false; error: ForecastError } {
  return { ok: false, error };
}

/**
 * Resolves a coordinate to its current forecast through the National Weather
 * Service: a points lookup yields the forecast URL, which is then fetched.
 * Never throws; every failure comes back as a tagged {@link ForecastError}.
 */
export class NwsForecastAdapter implements ForecastPort {
  private readonly logger = createLogger({ adapter: 'NwsForecastAdapter' });
  private readonly baseUrl: string;

  constructor(
    private readonly config: NwsAdapterConfig,
    private readonly fetchImpl: typeof fetch = fetch
  ) {
    this.baseUrl = config.nwsBaseUrl.replace(/\/+$/, '');
  }

  async resolve(lat: number, lon: number): Promise<ForecastOutcome> {
    const logger = this.logger.child({ method: 'resolve', lat, lon });
    const coordinates = formatCoordinate(lat, lon);

    const region = findCoverageRegion(lat, lon);
    if (!region) {
      return fail(
        new ForecastError(
          'OutOfCoverage',
          `coordinates (${coordinates}) are outside NWS coverage area (US and territories only)`
        )
      );
    }

    logger.info({ region: region.name }, 'Fetching weather for coordinates');

    const points = await this.fetchJson(logger, {
      name: 'grid points',
      url: `${this.baseUrl}/points/${toFixed4(lat)},${toFixed4(lon)}`,
      schema: nwsPointsResponseSchema,
      onStatus: (status) =>
        status === 404
          ? new ForecastError(
              'GridNotFound',
              `coordinates (${coordinates}) not found in NWS grid system - may be outside coverage area`
            )
          : new ForecastError('UpstreamError', `grid points API returned status: ${status}`),
    });
    if (!points.ok) return points;

    const forecastUrl = points.body.properties?.forecast;
    if (!forecastUrl) {
      return fail(new ForecastError('MalformedUpstreamResponse', 'no forecast URL found in grid response'));
    }

    logger.debug({ forecastUrl }, 'Resolved forecast URL');

    const forecast = await this.fetchJson(logger, {
      name: 'forecast',
      url: forecastUrl,
      schema: nwsForecastResponseSchema,
      onStatus: (status) =>
        new ForecastError('ForecastUnavailable', `forecast API returned status: ${status}`),
    });
    if (!forecast.ok) return forecast;

    const periods = forecast.body.properties?.periods ?? [];
    if (periods.length === 0) {
      return fail(new ForecastError('NoForecastPeriods', 'no forecast periods found'));
    }

    const period = nwsForecastPeriodSchema.safeParse(periods[0]);
    if (!period.success) {
      return fail(
        new ForecastError('MalformedUpstreamResponse', 'failed to parse forecast response: invalid first period', {
          cause: period.error,
        })
      );
    }

    const result: ForecastResult = {
      shortForecast: period.data.shortForecast,
      temperatureValue: period.data.temperature,
      temperatureUnit: period.data.temperatureUnit,
    };
    const temperatureF = toFahrenheit(result.temperatureValue, result.temperatureUnit);

    logger.info(
      {
        shortForecast: result.shortForecast,
        temperature: result.temperatureValue,
        unit: result.temperatureUnit,
        temperatureF,
      },
      'Retrieved forecast'
    );

    return { ok: true, value: { shortForecast: result.shortForecast, temperatureF } };
  }

  private async fetchJson<T>(logger: pino.Logger, call: UpstreamCall<T>): Promise<FetchResult<T>> {
    const text = await this.fetchText(logger, call);
    if (!text.ok) return text;

    let json: unknown;
    try {
      json = JSON.parse(text.body);
    } catch (error) {
      return fail(
        new ForecastError('MalformedUpstreamResponse', `failed to parse ${call.name} response: ${describe(error)}`, {
          cause: error,
        })
      );
    }

    const parsed = call.schema.safeParse(json);
    if (!parsed.success) {
      return fail(
        new ForecastError('MalformedUpstreamResponse', `failed to parse ${call.name} response: unexpected shape`, {
          cause: parsed.error,
        })
      );
    }

    return { ok: true, body: parsed.data };
  }

  private async fetchText(
    logger: pino.Logger,
    call: Omit<UpstreamCall<unknown>, 'schema'>
  ): Promise<FetchResult<string>> {
    logger.debug({ url: call.url }, `Calling NWS ${call.name} API`);

    try {
      const response = await this.fetchImpl(call.url, {
        headers: {
          'User-Agent': this.config.nwsUserAgent,
          Accept: 'application/geo+json',
        },
        signal: AbortSignal.timeout(this.config.upstreamTimeoutMs),
      });

      logger.debug({ status: response.status }, `NWS ${call.name} API responded`);

      if (response.status !== 200) {
        // Release the connection; the body is not needed.
        await response.body?.cancel();
        return fail(call.onStatus(response.status));
      }

      return { ok: true, body: await response.text() };
    } catch (error) {
      return fail(
        new ForecastError('UpstreamUnreachable', `failed to get ${call.name}: ${describe(error)}`, {
          cause: error,
        })
      );
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
