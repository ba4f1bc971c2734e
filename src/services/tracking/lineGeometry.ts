import type { Coordinate, LineSnapshot, LineStop, RouteSegment } from "@/types";
import { distanceKm, distanceMeters, distanceToPolylineMeters } from "@/utils/geo";

export type LegGeometry = {
  geometry: Coordinate[];
  source: "segment" | "straight_line";
  distanceKm: number;
  durationMinutes: number | null;
};

export function findSegment(
  line: LineSnapshot,
  fromStopId: string,
  toStopId: string,
): RouteSegment | null {
  return (
    line.segments.find(
      (segment) =>
        segment.fromStopId === fromStopId && segment.toStopId === toStopId,
    ) ?? null
  );
}

/**
 * Geometry between two consecutive stops: the precomputed segment when the
 * line has one, otherwise the straight line between the stop coordinates.
 */
export function legBetween(
  line: LineSnapshot,
  from: LineStop,
  to: LineStop,
): LegGeometry {
  const segment = findSegment(line, from.id, to.id);
  if (segment && Number.isFinite(segment.distanceKm) && segment.distanceKm >= 0) {
    const geometry =
      segment.path.length >= 2 ? segment.path : [from.coordinate, to.coordinate];
    return {
      geometry,
      source: "segment",
      distanceKm: segment.distanceKm,
      durationMinutes: segment.durationMinutes,
    };
  }

  return {
    geometry: [from.coordinate, to.coordinate],
    source: "straight_line",
    distanceKm: distanceKm(from.coordinate, to.coordinate),
    durationMinutes: null,
  };
}

export function lineLegs(line: LineSnapshot): Array<LegGeometry & { from: LineStop; to: LineStop }> {
  const legs: Array<LegGeometry & { from: LineStop; to: LineStop }> = [];
  for (let i = 1; i < line.stops.length; i += 1) {
    const from = line.stops[i - 1];
    const to = line.stops[i];
    legs.push({ ...legBetween(line, from, to), from, to });
  }
  return legs;
}

/**
 * Distance in meters from `point` to the nearest part of the line's route,
 * or null for a line without stops.
 */
export function deviationFromLine(
  line: LineSnapshot,
  point: Coordinate,
): number | null {
  if (line.stops.length === 0) return null;
  if (line.stops.length === 1) {
    return distanceMeters(point, line.stops[0].coordinate);
  }

  let closest = Number.POSITIVE_INFINITY;
  for (const leg of lineLegs(line)) {
    const distance = distanceToPolylineMeters(point, leg.geometry);
    if (distance < closest) closest = distance;
  }
  return Number.isFinite(closest) ? closest : null;
}

export function nearestStop(
  line: LineSnapshot,
  point: Coordinate,
): { stop: LineStop; distanceMeters: number } | null {
  let best: { stop: LineStop; distanceMeters: number } | null = null;
  for (const stop of line.stops) {
    const distance = distanceMeters(point, stop.coordinate);
    if (!best || distance < best.distanceMeters) {
      best = { stop, distanceMeters: distance };
    }
  }
  return best;
}
