export const EARTH_RADIUS_METERS = 6_371_000;
export const METERS_PER_DEGREE_LATITUDE = 111_320;

export interface Coordinates {
  latitude: number;
  longitude: number;
}

export interface BoundingBox {
  minLatitude: number;
  maxLatitude: number;
  minLongitude: number;
  maxLongitude: number;
}

const toRadians = (degrees: number) => (degrees * Math.PI) / 180;

/** Approximate box around a point, used to narrow candidates before the exact distance check. */
export function boundingBox(center: Coordinates, radiusMeters: number): BoundingBox {
  const latRange = radiusMeters / METERS_PER_DEGREE_LATITUDE;
  const lonRange = radiusMeters / (METERS_PER_DEGREE_LATITUDE * Math.cos(toRadians(center.latitude)));

  return {
    minLatitude: center.latitude - latRange,
    maxLatitude: center.latitude + latRange,
    minLongitude: center.longitude - lonRange,
    maxLongitude: center.longitude + lonRange,
  };
}

export function haversineDistance(a: Coordinates, b: Coordinates): number {
  const dLat = toRadians(b.latitude - a.latitude);
  const dLon = toRadians(b.longitude - a.longitude);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(a.latitude)) * Math.cos(toRadians(b.latitude)) * Math.sin(dLon / 2) ** 2;
  return EARTH_RADIUS_METERS * 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

export function nearestWithin<T extends Coordinates>(
  origin: Coordinates,
  candidates: readonly T[],
  radiusMeters: number,
): T | undefined {
  let best: { item: T; distance: number } | undefined;
  for (const candidate of candidates) {
    const distance = haversineDistance(origin, candidate);
    if (distance > radiusMeters) continue;
    if (!best || distance < best.distance) best = { item: candidate, distance };
  }
  return best?.item;
}
