import type { GeoPosition } from "../poi/poi.types";

export const EARTH_RADIUS_METERS = 6371000;

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

/**
 * Great-circle (haversine) distance in meters.
 */
export const distanceMeters = (a: GeoPosition, b: GeoPosition): number => {
  const dLat = toRadians(b.latitude - a.latitude);
  const dLon = toRadians(b.longitude - a.longitude);

  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(a.latitude)) * Math.cos(toRadians(b.latitude)) * Math.sin(dLon / 2) ** 2;

  // clamp: rounding can push h slightly above 1 for antipodal points
  return 2 * EARTH_RADIUS_METERS * Math.asin(Math.sqrt(Math.min(1, h)));
};

export const isValidPosition = (position: GeoPosition): boolean =>
  Number.isFinite(position.latitude) &&
  Number.isFinite(position.longitude) &&
  position.latitude >= -90 &&
  position.latitude <= 90 &&
  position.longitude >= -180 &&
  position.longitude <= 180;
