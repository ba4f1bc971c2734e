import type {
  ActiveBusMarker,
  Bounds,
  CachedVisualization,
  Coordinate,
  LineSnapshot,
  StopMarker,
  TripSnapshot,
  VisualizationSegment,
} from "@/types";
import type { TrackingRules } from "@/config/tracking";
import type { TrackingRepositories } from "@/services/repository/types";
import { NotFoundError, errorMessage } from "@/utils/errors";
import { createDeadline, withTimeout } from "@/utils/helpers/timeout";
import { lineLegs } from "./lineGeometry";
import type { RouteEstimator } from "./routeEstimator";
import type { VisualizationCache } from "./visualizationCache";

type VisualizationServiceOptions = {
  repositories: Pick<TrackingRepositories, "buses" | "drivers" | "lines" | "trips">;
  estimator: RouteEstimator;
  cache: VisualizationCache;
  rules: Pick<
    TrackingRules,
    "readTimeoutMs" | "visualizationTtlMs" | "defaultAverageSpeedKmh"
  >;
  now?: () => number;
};

export type VisualizationService = {
  getVisualization: (lineId: string) => Promise<CachedVisualization>;
};

export function computeBounds(points: readonly Coordinate[]): Bounds | null {
  if (points.length === 0) return null;

  let north = -90;
  let south = 90;
  let east = -180;
  let west = 180;
  for (const point of points) {
    north = Math.max(north, point.lat);
    south = Math.min(south, point.lat);
    east = Math.max(east, point.lng);
    west = Math.min(west, point.lng);
  }
  return { north, south, east, west };
}

export function buildRoute(
  line: LineSnapshot,
  defaultSpeedKmh: number,
): CachedVisualization["route"] {
  const segments: VisualizationSegment[] = lineLegs(line).map((leg) => ({
    fromStopId: leg.from.id,
    toStopId: leg.to.id,
    polyline: leg.geometry,
    source: leg.source,
    distanceKm: leg.distanceKm,
    durationMinutes: leg.durationMinutes,
  }));

  let totalDistanceKm = 0;
  let estimatedDurationMinutes = 0;
  for (const segment of segments) {
    totalDistanceKm += segment.distanceKm;
    estimatedDurationMinutes +=
      segment.durationMinutes ?? (segment.distanceKm / defaultSpeedKmh) * 60;
  }

  return { segments, totalDistanceKm, estimatedDurationMinutes };
}

export function buildMarkers(line: LineSnapshot): StopMarker[] {
  const lastIndex = line.stops.length - 1;
  return line.stops.map((stop, index) => ({
    id: stop.id,
    name: stop.name,
    position: stop.coordinate,
    ordinal: stop.ordinal,
    isTerminal: index === 0 || index === lastIndex,
  }));
}

export function createVisualizationService(
  options: VisualizationServiceOptions,
): VisualizationService {
  const now = options.now ?? Date.now;
  const { buses, drivers, lines, trips } = options.repositories;

  async function readCache(lineId: string): Promise<CachedVisualization | null> {
    try {
      return await options.cache.get(lineId);
    } catch (error) {
      console.warn("[viz-cache] read failed", { lineId, error: errorMessage(error) });
      return null;
    }
  }

  async function readGeneration(lineId: string): Promise<number | null> {
    try {
      return await options.cache.generation(lineId);
    } catch (error) {
      console.warn("[viz-cache] generation read failed", {
        lineId,
        error: errorMessage(error),
      });
      return null;
    }
  }

  async function buildActiveBus(
    trip: TripSnapshot,
    line: LineSnapshot,
  ): Promise<ActiveBusMarker> {
    const [bus, driver] = await Promise.all([
      buses.getBus(trip.busId),
      drivers.getDriver(trip.driverId),
    ]);
    const estimate = options.estimator.estimateFor({ trip, line, bus });
    const nextStop = estimate.remainingStops[0] ?? null;

    return {
      tripId: trip.id,
      busId: trip.busId,
      busNumber: bus?.number ?? null,
      driverName: driver?.name ?? null,
      position: { lat: estimate.currentLocation.lat, lng: estimate.currentLocation.lng },
      heading: estimate.currentLocation.heading,
      speed: estimate.currentLocation.speed,
      currentStopOrdinal: estimate.trip.currentStopOrdinal,
      progressPercent: estimate.trip.progressPercent,
      nextStopId: nextStop?.stopId ?? null,
      nextStopEta: nextStop?.eta ?? null,
      lastUpdate: estimate.currentLocation.timestamp,
    };
  }

  async function getVisualization(lineId: string): Promise<CachedVisualization> {
    const cached = await readCache(lineId);
    if (cached) return cached;

    const deadline = createDeadline(options.rules.readTimeoutMs, now);
    const generation = await readGeneration(lineId);
    const line = await lines.getLine(lineId);
    if (!line) {
      throw new NotFoundError("Line", lineId);
    }

    // trips without a position fix have nothing to place on the map yet
    const active = (await trips.listTrips({ state: "ACTIVE", lineId })).filter(
      (trip) => trip.recentUpdates.length > 0,
    );

    const markers = await Promise.all(
      active.map(async (trip) => {
        try {
          return await withTimeout(
            buildActiveBus(trip, line),
            deadline.remainingMs(),
            `visualization marker for trip ${trip.id}`,
          );
        } catch (error) {
          console.warn("[visualization] skipping trip", {
            lineId,
            tripId: trip.id,
            error: errorMessage(error),
          });
          return null;
        }
      }),
    );
    const activeBuses = markers.filter(
      (marker): marker is ActiveBusMarker => marker !== null,
    );
    const complete = activeBuses.length === markers.length;

    const route = buildRoute(line, options.rules.defaultAverageSpeedKmh);
    const boundsPoints: Coordinate[] = [
      ...line.stops.map((stop) => stop.coordinate),
      ...route.segments.flatMap((segment) => segment.polyline),
      ...activeBuses.map((bus) => bus.position),
    ];

    const snapshot: CachedVisualization = {
      line: {
        id: line.id,
        name: line.name,
        color: line.color,
        totalStops: line.stops.length,
      },
      route,
      markers: buildMarkers(line),
      activeBuses,
      bounds: computeBounds(boundsPoints),
      generatedAt: now(),
    };

    // partial snapshots are served but never cached
    if (complete && generation !== null) {
      try {
        await options.cache.put(lineId, snapshot, {
          ttlMs: options.rules.visualizationTtlMs,
          generation,
        });
      } catch (error) {
        console.warn("[viz-cache] write failed", { lineId, error: errorMessage(error) });
      }
    }

    return snapshot;
  }

  return { getVisualization };
}
