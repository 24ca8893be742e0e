import { z } from 'zod';

// Only the fields this service reads; NWS sends far more.

export const nwsPointsResponseSchema = z.object({
  properties: z
    .object({
      forecast: z.string().nullish(),
    })
    .nullish(),
});

// Absent or null fields decode to zero values ("" and 0); a field of the
// wrong type is still rejected.
export const nwsForecastPeriodSchema = z.object({
  shortForecast: z
    .string()
    .nullish()
    .transform((value) => value ?? ''),
  temperature: z
    .number()
    .int()
    .nullish()
    .transform((value) => value ?? 0),
  temperatureUnit: z
    .string()
    .nullish()
    .transform((value) => value ?? ''),
});

export const nwsForecastResponseSchema = z.object({
  properties: z
    .object({
      // Only the first period is read, so later ones are not validated.
      periods: z.array(z.unknown()).nullish(),
    })
    .nullish(),
});
