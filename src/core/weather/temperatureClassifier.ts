export type TemperatureLabel = 'hot' | 'cold' | 'moderate';

export const HOT_THRESHOLD_F = 80;
export const COLD_THRESHOLD_F = 40;

export function classifyTemperature(tempF: number): TemperatureLabel {
  if (tempF >= HOT_THRESHOLD_F) return 'hot';
  if (tempF <= COLD_THRESHOLD_F) return 'cold';
  return 'moderate';
}

/**
 * Normalises an upstream temperature to whole degrees Fahrenheit.
 * Only a "C" unit (any case) is converted; every other unit, unknown ones
 * included, is taken to already be Fahrenheit. Results truncate toward zero.
 */
export function toFahrenheit(value: number, unit: string): number {
  if (unit.toUpperCase() === 'C') {
    return Math.trunc((value * 9) / 5 + 32);
  }
  return Math.trunc(value);
}
