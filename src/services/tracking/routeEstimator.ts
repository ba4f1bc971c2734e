import type {
  BusSnapshot,
  Coordinate,
  EstimatedLeg,
  LineSnapshot,
  RemainingStop,
  RouteEstimate,
  TrafficConditions,
  TripSnapshot,
} from "@/types";
import type { TrackingRules } from "@/config/tracking";
import type { TrackingRepositories } from "@/services/repository/types";
import { NotFoundError, ValidationError } from "@/utils/errors";
import { distanceKm } from "@/utils/geo";
import { legBetween } from "./lineGeometry";

export const MIN_TRAFFIC_FACTOR = 0.3;
export const MAX_TRAFFIC_FACTOR = 1.5;

type RouteEstimatorOptions = {
  repositories: Pick<TrackingRepositories, "trips" | "lines" | "buses">;
  rules: Pick<TrackingRules, "trafficFactor" | "defaultAverageSpeedKmh">;
  // external congestion signal; the configured factor is used without one
  trafficFactor?: (line: LineSnapshot) => number;
};

export type EstimateContext = {
  trip: TripSnapshot;
  line: LineSnapshot;
  bus: BusSnapshot | null;
};

export type RouteEstimator = {
  estimate: (tripId: string, destinationStopId?: string) => Promise<RouteEstimate>;
  estimateFor: (context: EstimateContext, destinationStopId?: string) => RouteEstimate;
  loadContext: (tripId: string) => Promise<EstimateContext>;
};

export function clampTrafficFactor(factor: number): number {
  if (!Number.isFinite(factor)) return 1;
  return Math.min(MAX_TRAFFIC_FACTOR, Math.max(MIN_TRAFFIC_FACTOR, factor));
}

export function describeTraffic(factor: number): TrafficConditions {
  if (factor > 1) {
    return { factor, level: "light", description: "Traffic lighter than usual" };
  }
  if (factor < 1) {
    return { factor, level: "heavy", description: "Traffic heavier than usual" };
  }
  return { factor, level: "normal", description: "Normal traffic" };
}

export function progressPercent(pointer: number, stopCount: number): number {
  const raw = (pointer / Math.max(stopCount - 1, 1)) * 100;
  const clamped = Math.min(100, Math.max(0, raw));
  return Math.round(clamped * 100) / 100;
}

type PlannedLeg = Pick<
  EstimatedLeg,
  "fromStopId" | "from" | "geometry" | "source" | "distanceKm"
>;

function legFromPreviousStop(line: LineSnapshot, index: number): PlannedLeg {
  const previousStop = line.stops[index - 1];
  const leg = legBetween(line, previousStop, line.stops[index]);
  return {
    fromStopId: previousStop.id,
    from: previousStop.coordinate,
    geometry: leg.geometry,
    source: leg.source,
    distanceKm: leg.distanceKm,
  };
}

function minutesFor(distance: number, speedKmh: number): number {
  return (distance / speedKmh) * 60;
}

export function createRouteEstimator(options: RouteEstimatorOptions): RouteEstimator {
  const { trips, lines, buses } = options.repositories;

  function effectiveSpeedKmh(bus: BusSnapshot | null, factor: number): number {
    const base =
      bus && Number.isFinite(bus.averageSpeedKmh) && bus.averageSpeedKmh > 0
        ? bus.averageSpeedKmh
        : options.rules.defaultAverageSpeedKmh;
    return base * factor;
  }

  async function loadContext(tripId: string): Promise<EstimateContext> {
    const trip = await trips.getTrip(tripId);
    if (!trip) throw new NotFoundError("Trip", tripId);

    const [line, bus] = await Promise.all([
      lines.getLine(trip.lineId),
      buses.getBus(trip.busId),
    ]);
    if (!line) throw new NotFoundError("Line", trip.lineId);

    return { trip, line, bus };
  }

  function estimateFor(
    context: EstimateContext,
    destinationStopId?: string,
  ): RouteEstimate {
    const { trip, line, bus } = context;
    if (line.stops.length === 0) {
      throw new ValidationError(`Line ${line.id} has no stops`, "lineId");
    }

    const lastIndex = line.stops.length - 1;
    const pointer = Math.min(Math.max(trip.currentStopOrdinal, 0), lastIndex);

    let destinationIndex = lastIndex;
    if (destinationStopId !== undefined) {
      const destination = line.stops.find((stop) => stop.id === destinationStopId);
      if (!destination) {
        throw new NotFoundError("Stop", `${destinationStopId} on line ${line.id}`);
      }
      if (destination.ordinal < pointer) {
        throw new ValidationError(
          `Stop ${destinationStopId} is behind the trip's current stop`,
          "destinationStopId",
        );
      }
      destinationIndex = destination.ordinal;
    }

    const lastFix = trip.recentUpdates[trip.recentUpdates.length - 1] ?? null;
    const synthesized = lastFix === null;
    const position: Coordinate = lastFix
      ? { lat: lastFix.lat, lng: lastFix.lng }
      : line.stops[pointer].coordinate;
    const anchor = lastFix ? lastFix.timestamp : trip.startedAt ?? trip.createdAt;

    const factor = clampTrafficFactor(
      options.trafficFactor ? options.trafficFactor(line) : options.rules.trafficFactor,
    );
    const speedKmh = effectiveSpeedKmh(bus, factor);

    const estimatedPath: EstimatedLeg[] = [];
    const remainingStops: RemainingStop[] = [];
    let cumulativeKm = 0;
    let cumulativeMinutes = 0;

    for (let index = pointer; index <= destinationIndex; index += 1) {
      const target = line.stops[index];
      const leg: PlannedLeg =
        index === pointer
          ? {
              fromStopId: null,
              from: position,
              geometry: [position, target.coordinate],
              source: "straight_line",
              distanceKm: distanceKm(position, target.coordinate),
            }
          : legFromPreviousStop(line, index);

      const legMinutes = minutesFor(leg.distanceKm, speedKmh);
      cumulativeKm += leg.distanceKm;
      cumulativeMinutes += legMinutes;
      const eta = anchor + Math.round(cumulativeMinutes * 60_000);

      estimatedPath.push({
        fromStopId: leg.fromStopId,
        toStopId: target.id,
        from: leg.from,
        to: target.coordinate,
        geometry: leg.geometry,
        source: leg.source,
        distanceKm: leg.distanceKm,
        durationMinutes: legMinutes,
        estimatedArrival: eta,
      });

      remainingStops.push({
        stopId: target.id,
        name: target.name,
        ordinal: target.ordinal,
        location: target.coordinate,
        distanceKm: cumulativeKm,
        travelTimeMinutes: cumulativeMinutes,
        eta,
      });
    }

    return {
      tripId: trip.id,
      busId: trip.busId,
      lineId: line.id,
      currentLocation: {
        lat: position.lat,
        lng: position.lng,
        speed: lastFix?.speed ?? null,
        heading: lastFix?.heading ?? null,
        accuracy: lastFix?.accuracy ?? null,
        timestamp: anchor,
        synthesized,
      },
      trip: {
        id: trip.id,
        lineName: line.name,
        state: trip.state,
        startedAt: trip.startedAt,
        currentStopOrdinal: pointer,
        progressPercent: synthesized ? 0 : progressPercent(pointer, line.stops.length),
      },
      remainingStops,
      estimatedPath,
      totalDistanceKm: cumulativeKm,
      totalDurationMinutes: cumulativeMinutes,
      trafficConditions: describeTraffic(factor),
    };
  }

  async function estimate(
    tripId: string,
    destinationStopId?: string,
  ): Promise<RouteEstimate> {
    return estimateFor(await loadContext(tripId), destinationStopId);
  }

  return { estimate, estimateFor, loadContext };
}
