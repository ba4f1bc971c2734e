import type { Coordinate } from "@/types";
import { ValidationError } from "@/utils/errors";

const EARTH_RADIUS_KM = 6371;
const EARTH_RADIUS_METERS = EARTH_RADIUS_KM * 1000;

export function toRadians(value: number): number {
  return (value * Math.PI) / 180;
}

function toDegrees(value: number): number {
  return (value * 180) / Math.PI;
}

export function isValidCoordinate(point: Coordinate): boolean {
  return (
    Number.isFinite(point.lat) &&
    Number.isFinite(point.lng) &&
    point.lat >= -90 &&
    point.lat <= 90 &&
    point.lng >= -180 &&
    point.lng <= 180
  );
}

export function assertCoordinate(point: Coordinate, label = "coordinate"): void {
  if (!Number.isFinite(point.lat) || point.lat < -90 || point.lat > 90) {
    throw new ValidationError(`Invalid ${label} latitude`, "latitude");
  }

  if (!Number.isFinite(point.lng) || point.lng < -180 || point.lng > 180) {
    throw new ValidationError(`Invalid ${label} longitude`, "longitude");
  }
}

/**
 * Great-circle distance using the Haversine formula.
 */
export function distanceKm(a: Coordinate, b: Coordinate): number {
  assertCoordinate(a);
  assertCoordinate(b);

  const dLat = toRadians(b.lat - a.lat);
  const dLng = toRadians(b.lng - a.lng);
  const lat1 = toRadians(a.lat);
  const lat2 = toRadians(b.lat);

  const sinLat = Math.sin(dLat / 2);
  const sinLng = Math.sin(dLng / 2);
  const part =
    sinLat * sinLat + Math.cos(lat1) * Math.cos(lat2) * sinLng * sinLng;

  return (
    2 * EARTH_RADIUS_KM * Math.atan2(Math.sqrt(part), Math.sqrt(1 - part))
  );
}

export function distanceMeters(a: Coordinate, b: Coordinate): number {
  return distanceKm(a, b) * 1000;
}

/**
 * Initial bearing from `a` towards `b`, in [0, 360).
 */
export function bearingDegrees(a: Coordinate, b: Coordinate): number {
  assertCoordinate(a);
  assertCoordinate(b);

  const lat1 = toRadians(a.lat);
  const lat2 = toRadians(b.lat);
  const dLng = toRadians(b.lng - a.lng);

  const y = Math.sin(dLng) * Math.cos(lat2);
  const x =
    Math.cos(lat1) * Math.sin(lat2) -
    Math.sin(lat1) * Math.cos(lat2) * Math.cos(dLng);

  const bearing = (toDegrees(Math.atan2(y, x)) + 360) % 360;
  return bearing >= 360 ? 0 : bearing;
}

/**
 * Point at `fraction` of the way from `a` to `b`. Uses the same
 * equirectangular approximation as the segment projection below, which
 * is accurate for the short inter-stop distances it is applied to.
 */
export function interpolate(
  a: Coordinate,
  b: Coordinate,
  fraction: number,
): Coordinate {
  assertCoordinate(a);
  assertCoordinate(b);
  if (!Number.isFinite(fraction) || fraction < 0 || fraction > 1) {
    throw new ValidationError("Interpolation fraction must be in [0, 1]");
  }

  return {
    lat: a.lat + (b.lat - a.lat) * fraction,
    lng: a.lng + (b.lng - a.lng) * fraction,
  };
}

function toXY(point: Coordinate, refLatRad: number): { x: number; y: number } {
  return {
    x: EARTH_RADIUS_METERS * toRadians(point.lng) * Math.cos(refLatRad),
    y: EARTH_RADIUS_METERS * toRadians(point.lat),
  };
}

/**
 * Perpendicular distance in meters from `point` to the segment `start`-`end`,
 * clamped to the segment ends.
 */
export function distanceToSegmentMeters(
  point: Coordinate,
  start: Coordinate,
  end: Coordinate,
): number {
  const refLatRad = toRadians((start.lat + end.lat) / 2);
  const startXY = toXY(start, refLatRad);
  const endXY = toXY(end, refLatRad);
  const pointXY = toXY(point, refLatRad);

  const segmentX = endXY.x - startXY.x;
  const segmentY = endXY.y - startXY.y;
  const segmentLengthSq = segmentX * segmentX + segmentY * segmentY;

  let t = 0;
  if (segmentLengthSq > 0) {
    t =
      ((pointXY.x - startXY.x) * segmentX +
        (pointXY.y - startXY.y) * segmentY) /
      segmentLengthSq;
    t = Math.min(1, Math.max(0, t));
  }

  const closestX = startXY.x + t * segmentX;
  const closestY = startXY.y + t * segmentY;
  return Math.hypot(pointXY.x - closestX, pointXY.y - closestY);
}

export function distanceToPolylineMeters(
  point: Coordinate,
  polyline: Coordinate[],
): number {
  if (polyline.length === 0) return Number.POSITIVE_INFINITY;
  if (polyline.length === 1) return distanceMeters(point, polyline[0]);

  let closest = Number.POSITIVE_INFINITY;
  for (let i = 1; i < polyline.length; i += 1) {
    const distance = distanceToSegmentMeters(point, polyline[i - 1], polyline[i]);
    if (distance < closest) closest = distance;
  }
  return closest;
}

export function polylineLengthKm(points: readonly Coordinate[]): number {
  let total = 0;
  for (let i = 1; i < points.length; i += 1) {
    total += distanceKm(points[i - 1], points[i]);
  }
  return total;
}
