export interface CoverageRegion {
  name: string;
  minLat: number;
  maxLat: number;
  minLon: number;
  maxLon: number;
}

/**
 * Rough bounding boxes of the area the National Weather Service forecasts for.
 * Bounds are inclusive.
 */
export const COVERAGE_REGIONS: readonly CoverageRegion[] = [
  { name: 'Continental US', minLat: 25, maxLat: 50, minLon: -125, maxLon: -65 },
  { name: 'Alaska', minLat: 50, maxLat: 75, minLon: -180, maxLon: -140 },
  { name: 'Hawaii', minLat: 19, maxLat: 23, minLon: -162, maxLon: -154 },
  { name: 'Puerto Rico/Caribbean', minLat: 15, maxLat: 20, minLon: -80, maxLon: -68 },
];

export function findCoverageRegion(lat: number, lon: number): CoverageRegion | undefined {
  return COVERAGE_REGIONS.find(
    (region) =>
      lat >= region.minLat && lat <= region.maxLat && lon >= region.minLon && lon <= region.maxLon
  );
}

export function isCovered(lat: number, lon: number): boolean {
  return findCoverageRegion(lat, lon) !== undefined;
}
