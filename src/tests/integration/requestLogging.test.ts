import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import request from 'supertest';
import { NwsForecastAdapter } from '../../adapters/nws/NwsForecastAdapter.js';
import { WeatherService } from '../../core/weather/WeatherService.js';
import { createApp } from '../../server.js';
import { configureLogger } from '../../utils/logger.js';
import { FORECAST_URL, POINTS_URL_NYC, createFakeFetch, forecastBody, jsonResponse } from '../helpers/fakeFetch.js';

interface LogLine {
  msg: string;
  requestId?: string;
}

const CHICAGO_POINTS_URL = 'https://api.weather.gov/points/41.8781,-87.6298';
const CHICAGO_FORECAST_URL = 'http://x/chicago';

describe('request logging', () => {
  let lines: LogLine[];

  beforeEach(() => {
    lines = [];
    configureLogger('info', {
      write: (line: string) => {
        lines.push(JSON.parse(line) as LogLine);
      },
    });
  });

  afterEach(() => {
    configureLogger('silent');
  });

  function buildApp() {
    const fetchMock = createFakeFetch({
      [POINTS_URL_NYC]: () => jsonResponse({ properties: { forecast: FORECAST_URL } }),
      [FORECAST_URL]: () =>
        jsonResponse(forecastBody([{ shortForecast: 'Sunny', temperature: 85, temperatureUnit: 'F' }])),
      [CHICAGO_POINTS_URL]: () => jsonResponse({ properties: { forecast: CHICAGO_FORECAST_URL } }),
      [CHICAGO_FORECAST_URL]: () => jsonResponse(forecastBody([])),
    });
    const adapter = new NwsForecastAdapter(
      { nwsBaseUrl: 'https://api.weather.gov', nwsUserAgent: 'test-agent', upstreamTimeoutMs: 5000 },
      fetchMock
    );
    return createApp(new WeatherService(adapter));
  }

  function idsOf(msg: string): Array<string | undefined> {
    return lines.filter((line) => line.msg === msg).map((line) => line.requestId);
  }

  it('tags service and adapter logs with the id of the request that caused them', async () => {
    const app = buildApp();

    await request(app).get('/weather?lat=40.7128&lon=-74.0060').expect(200);

    const [requestId] = idsOf('Incoming request');
    expect(requestId).toMatch(/^\d+-[a-z0-9]+$/);
    expect(idsOf('Fetching weather for coordinates')).toEqual([requestId]);
    expect(idsOf('Retrieved forecast')).toEqual([requestId]);
  });

  it('keeps ids apart for concurrent requests', async () => {
    const app = buildApp();

    await Promise.all([
      request(app).get('/weather?lat=40.7128&lon=-74.0060').expect(200),
      request(app).get('/weather?lat=41.8781&lon=-87.6298').expect(500),
    ]);

    const incoming = idsOf('Incoming request');
    expect(new Set(incoming).size).toBe(2);

    const [succeeded] = idsOf('Retrieved forecast');
    const [failed] = idsOf('Error getting weather data');
    expect(succeeded).toBeDefined();
    expect(failed).toBeDefined();
    expect(succeeded).not.toBe(failed);
    expect(incoming).toEqual(expect.arrayContaining([succeeded, failed]));
  });
});
