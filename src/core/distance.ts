import { Coordinate } from './types';

export const METERS_IN_MILE = 1609.34;
export const EARTH_RADIUS_MILES = 3958.8;

export type DistanceFn = (from: Coordinate, to: Coordinate) => number;

const toRadians = (deg: number): number => (deg * Math.PI) / 180;

export const isResolved = (coord: Coordinate | null | undefined): coord is Coordinate =>
  !!coord && Number.isFinite(coord.latitude) && Number.isFinite(coord.longitude);

export const milesToMeters = (miles: number): number => Math.trunc(miles * METERS_IN_MILE);

// Haversine great-circle distance.
export const haversineMiles: DistanceFn = (from, to) => {
  const dLat = toRadians(to.latitude - from.latitude);
  const dLon = toRadians(to.longitude - from.longitude);
  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(from.latitude)) * Math.cos(toRadians(to.latitude)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_MILES * Math.asin(Math.min(1, Math.sqrt(a)));
};
