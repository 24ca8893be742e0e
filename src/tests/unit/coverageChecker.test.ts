import { describe, it, expect } from 'vitest';
import { COVERAGE_REGIONS, findCoverageRegion, isCovered } from '../../core/weather/coverageChecker.js';

describe('coverageChecker', () => {
  it.each([
    ['New York City', 40.7128, -74.006, 'Continental US'],
    ['Anchorage', 61.2181, -149.9003, 'Alaska'],
    ['Honolulu', 21.3069, -157.8583, 'Hawaii'],
    ['Caribbean box only', 17, -78, 'Puerto Rico/Caribbean'],
  ])('covers %s', (_label, lat, lon, region) => {
    expect(isCovered(lat, lon)).toBe(true);
    expect(findCoverageRegion(lat, lon)?.name).toBe(region);
  });

  it.each([
    ['London', 51.5074, -0.1278],
    ['Tokyo', 35.6762, 139.6503],
    ['Sydney', -33.8688, 151.2093],
    ['Mexico City', 19.4326, -99.1332],
    ['South Pole', -90, 0],
    ['Antimeridian east', 60, 180],
  ])('rejects %s', (_label, lat, lon) => {
    expect(isCovered(lat, lon)).toBe(false);
    expect(findCoverageRegion(lat, lon)).toBeUndefined();
  });

  it('treats every box edge as inclusive', () => {
    for (const region of COVERAGE_REGIONS) {
      expect(isCovered(region.minLat, region.minLon)).toBe(true);
      expect(isCovered(region.maxLat, region.maxLon)).toBe(true);
      expect(isCovered(region.minLat, region.maxLon)).toBe(true);
      expect(isCovered(region.maxLat, region.minLon)).toBe(true);
    }
  });

  it('rejects points just outside the continental box', () => {
    expect(isCovered(24.99, -100)).toBe(false);
    expect(isCovered(40, -64.99)).toBe(false);
    expect(isCovered(40, -125.01)).toBe(false);
  });
});
