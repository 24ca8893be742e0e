import { BadRequestError } from '../../utils/errors.js';

export interface Coordinate {
  readonly latitude: number;
  readonly longitude: number;
}

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
// Hex floats need a binary exponent: 0x1p4, -0x1.8P-1
const HEX_PATTERN = /^([+-]?)0[xX]([0-9a-fA-F]*)(?:\.([0-9a-fA-F]*))?[pP]([+-]?\d+)$/;
const INFINITY_PATTERN = /^([+-]?)(inf|infinity)$/i;
const NAN_PATTERN = /^nan$/i;

function parseHex(value: string): number | undefined {
  const match = HEX_PATTERN.exec(value);
  if (!match) return undefined;
  const [, sign = '', whole = '', fraction = '', exponent = '0'] = match;
  const digits = whole + fraction;
  if (digits.length === 0) return undefined;
  const mantissa = Number.parseInt(digits, 16);
  const magnitude = mantissa === 0 ? 0 : mantissa * 2 ** (Number(exponent) - 4 * fraction.length);
  return sign === '-' ? -magnitude : magnitude;
}

/**
 * Parses a floating-point literal: decimal, hex with a `p` exponent, or an
 * infinity / NaN spelling (any case). Returns undefined for anything else
 * and for finite literals that overflow.
 */
export function parseFloatLiteral(value: string): number | undefined {
  if (NAN_PATTERN.test(value)) return Number.NaN;

  const infinity = INFINITY_PATTERN.exec(value);
  if (infinity) {
    return infinity[1] === '-' ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  }

  const parsed = DECIMAL_PATTERN.test(value) ? Number(value) : parseHex(value);
  if (parsed === undefined || !Number.isFinite(parsed)) return undefined;
  return parsed;
}

function firstValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

/**
 * Builds a coordinate from raw `lat` / `lon` query values.
 * Checks run in a fixed order (presence, latitude format, longitude format,
 * latitude range, longitude range) and the first failure is thrown.
 * NaN passes the range checks; the coverage check rejects it later.
 *
 * @throws BadRequestError
 */
export function parseCoordinate(rawLat: unknown, rawLon: unknown): Coordinate {
  const lat = firstValue(rawLat);
  const lon = firstValue(rawLon);

  if (!lat || !lon) {
    throw new BadRequestError('Missing required parameters: lat and lon');
  }

  const latitude = parseFloatLiteral(lat);
  if (latitude === undefined) {
    throw new BadRequestError('Invalid latitude format');
  }

  const longitude = parseFloatLiteral(lon);
  if (longitude === undefined) {
    throw new BadRequestError('Invalid longitude format');
  }

  if (latitude < -90 || latitude > 90) {
    throw new BadRequestError('Latitude must be between -90 and 90');
  }

  if (longitude < -180 || longitude > 180) {
    throw new BadRequestError('Longitude must be between -180 and 180');
  }

  return Object.freeze({ latitude, longitude });
}

/**
 * Four-decimal rendering of a number. Exact binary ties round half to even
 * (25.03125 gives 25.0312); everything else matches `toFixed(4)`.
 */
export function toFixed4(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (!Number.isFinite(value)) return value > 0 ? '+Inf' : '-Inf';

  const sign = value < 0 || Object.is(value, -0) ? '-' : '';
  const abs = Math.abs(value);

  // A value lands exactly halfway between two 4-decimal steps only when it
  // is an odd multiple of 1/32.
  const thirtySeconds = abs * 32;
  if (!Number.isInteger(thirtySeconds) || thirtySeconds % 2 === 0) {
    return `${sign}${abs.toFixed(4)}`;
  }

  const lower = Math.floor(abs * 10000);
  const steps = lower % 2 === 0 ? lower : lower + 1;
  const whole = Math.floor(steps / 10000);
  const fraction = String(steps % 10000).padStart(4, '0');
  return `${sign}${whole}.${fraction}`;
}

/** Formats a coordinate as `"<lat>, <lon>"` with four decimals each. */
export function formatCoordinate(latitude: number, longitude: number): string {
  return `${toFixed4(latitude)}, ${toFixed4(longitude)}`;
}
