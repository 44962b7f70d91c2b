import { EARTH_RADIUS_METERS, LATITUDE_LIMIT, LONGITUDE_LIMIT } from '../constants/geo.constants';
import { Coordinates } from '../types/geo.types';

const toRad = (deg: number): number => (deg * Math.PI) / 180;

/**
 * Great-circle distance in meters between two WGS84 points (haversine).
 */
export function haversineDistance(from: Coordinates, to: Coordinates): number {
  const dLat = toRad(to.latitude - from.latitude);
  const dLon = toRad(to.longitude - from.longitude);

  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRad(from.latitude)) * Math.cos(toRad(to.latitude)) * Math.sin(dLon / 2) * Math.sin(dLon / 2);

  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
  return EARTH_RADIUS_METERS * c;
}

export function isValidLatitude(value: number): boolean {
  return Number.isFinite(value) && Math.abs(value) <= LATITUDE_LIMIT;
}

export function isValidLongitude(value: number): boolean {
  return Number.isFinite(value) && Math.abs(value) <= LONGITUDE_LIMIT;
}

export function isValidCoordinates(coords: Coordinates): boolean {
  return isValidLatitude(coords.latitude) && isValidLongitude(coords.longitude);
}
