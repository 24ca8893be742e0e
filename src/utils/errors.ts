export class WeatherServiceError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'WeatherServiceError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export type ForecastErrorKind =
  | 'OutOfCoverage'
  | 'GridNotFound'
  | 'UpstreamError'
  | 'UpstreamUnreachable'
  | 'MalformedUpstreamResponse'
  | 'ForecastUnavailable'
  | 'NoForecastPeriods';

/** Kinds whose message is safe to show the caller; everything else is a 500. */
const CLIENT_FACING_KINDS: ReadonlySet<ForecastErrorKind> = new Set(['OutOfCoverage', 'GridNotFound']);

export function isClientFacing(kind: ForecastErrorKind): boolean {
  return CLIENT_FACING_KINDS.has(kind);
}

export class ForecastError extends WeatherServiceError {
  public readonly kind: ForecastErrorKind;

  constructor(kind: ForecastErrorKind, message: string, options?: ErrorOptions) {
    super(message, `FORECAST_${kind.replace(/([a-z])([A-Z])/g, '$1_$2').toUpperCase()}`, options);
    this.name = 'ForecastError';
    this.kind = kind;
  }
}

export class BadRequestError extends WeatherServiceError {
  public readonly statusCode = 400;

  constructor(message: string, options?: ErrorOptions) {
    super(message, 'BAD_REQUEST', options);
    this.name = 'BadRequestError';
  }
}

export class ConfigError extends WeatherServiceError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}
