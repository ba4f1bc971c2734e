import type {
  Anomaly,
  LineSnapshot,
  LocationReport,
  LocationUpdate,
  RecordResult,
  TripSnapshot,
} from "@/types";
import type { TrackingRules } from "@/config/tracking";
import type { LineRepository, TripRepository } from "@/services/repository/types";
import {
  InvalidStateError,
  NotFoundError,
  StaleTimestampError,
  ValidationError,
  errorMessage,
} from "@/utils/errors";
import { assertCoordinate, distanceKm } from "@/utils/geo";
import type { AnomalyDetector, InspectInput } from "./anomalyDetector";
import { evaluateSpeed } from "./anomalyDetector";
import { nearestStop } from "./lineGeometry";
import type { KeyedLock } from "./tripLock";
import type { VisualizationCache } from "./visualizationCache";

type IngestorRules = Pick<TrackingRules, "maxClockSkewMs" | "maxAccuracyMeters">;

type LocationIngestorOptions = {
  trips: TripRepository;
  lines: LineRepository;
  detector: AnomalyDetector;
  cache: VisualizationCache;
  lock: KeyedLock;
  rules: IngestorRules;
  now?: () => number;
};

export type RecordHooks = {
  // runs under the trip lock, before the next queued report is read
  onTerminus?: (trip: TripSnapshot) => Promise<void>;
};

export type LocationIngestor = {
  record: (
    tripId: string,
    report: LocationReport,
    hooks?: RecordHooks,
  ) => Promise<RecordResult>;
};

function isPresent(value: number | null | undefined): value is number {
  return value !== null && value !== undefined;
}

export function validateReport(
  report: LocationReport,
  rules: IngestorRules,
  nowMs: number,
): void {
  assertCoordinate(report, "report");

  if (!Number.isFinite(report.accuracy) || report.accuracy <= 0) {
    throw new ValidationError("Accuracy must be a positive number", "accuracy");
  }

  if (report.accuracy > rules.maxAccuracyMeters) {
    throw new ValidationError(
      `Accuracy ${report.accuracy}m exceeds the ${rules.maxAccuracyMeters}m ceiling`,
      "accuracy",
    );
  }

  if (!Number.isFinite(report.timestamp) || report.timestamp <= 0) {
    throw new ValidationError("Invalid timestamp", "timestamp");
  }

  if (report.timestamp > nowMs + rules.maxClockSkewMs) {
    throw new ValidationError(
      "Timestamp is too far ahead of server time",
      "timestamp",
    );
  }

  if (isPresent(report.speed) && (!Number.isFinite(report.speed) || report.speed < 0)) {
    throw new ValidationError("Invalid speed", "speed");
  }

  if (
    isPresent(report.heading) &&
    (!Number.isFinite(report.heading) || report.heading < 0 || report.heading > 360)
  ) {
    throw new ValidationError("Invalid heading", "heading");
  }
}

/**
 * Moves the pointer forward while the position is closer to the following
 * stop than to the stop under the pointer. Never moves it back.
 */
export function advanceStopPointer(
  line: LineSnapshot,
  pointer: number,
  position: { lat: number; lng: number },
): number {
  let next = Math.min(Math.max(pointer, 0), Math.max(line.stops.length - 1, 0));
  while (next + 1 < line.stops.length) {
    const toCurrent = distanceKm(position, line.stops[next].coordinate);
    const toFollowing = distanceKm(position, line.stops[next + 1].coordinate);
    if (toFollowing >= toCurrent) break;
    next += 1;
  }
  return Math.max(next, pointer);
}

export function createLocationIngestor(
  options: LocationIngestorOptions,
): LocationIngestor {
  const now = options.now ?? Date.now;

  async function detectAnomalies(input: InspectInput): Promise<Anomaly[]> {
    try {
      return await options.detector.inspect(input);
    } catch (error) {
      console.warn("[anomaly] detection failed", {
        tripId: input.trip.id,
        error: errorMessage(error),
      });
      return [];
    }
  }

  async function invalidateLine(lineId: string): Promise<void> {
    try {
      await options.cache.invalidate(lineId);
    } catch (error) {
      console.warn("[viz-cache] invalidation failed", {
        lineId,
        error: errorMessage(error),
      });
    }
  }

  async function record(
    tripId: string,
    report: LocationReport,
    hooks: RecordHooks = {},
  ): Promise<RecordResult> {
    validateReport(report, options.rules, now());

    return options.lock.runExclusive(tripId, async () => {
      const trip = await options.trips.getTrip(tripId);
      if (!trip) {
        throw new NotFoundError("Trip", tripId);
      }
      if (trip.state !== "ACTIVE") {
        throw new InvalidStateError(
          `Trip ${tripId} is ${trip.state} and accepts no updates`,
        );
      }
      if (trip.lastUpdateAt !== null && report.timestamp < trip.lastUpdateAt) {
        throw new StaleTimestampError(
          "Location timestamp is older than the last recorded update",
        );
      }

      const line = await options.lines.getLine(trip.lineId);
      if (!line) {
        throw new NotFoundError("Line", trip.lineId);
      }

      const previous = trip.recentUpdates[trip.recentUpdates.length - 1] ?? null;
      const position = { lat: report.lat, lng: report.lng };
      const pointer = advanceStopPointer(line, trip.currentStopOrdinal, position);
      const nearest = nearestStop(line, position);

      const derivedSpeed = previous
        ? evaluateSpeed(previous, report).speedKmh
        : null;

      const update: LocationUpdate = {
        tripId,
        sequence: trip.updateCount,
        lat: report.lat,
        lng: report.lng,
        accuracy: report.accuracy,
        speed: isPresent(report.speed) ? report.speed : derivedSpeed,
        heading: isPresent(report.heading) ? report.heading : null,
        timestamp: report.timestamp,
        nearestStopId: nearest?.stop.id ?? null,
        distanceToStopMeters: nearest?.distanceMeters ?? null,
        receivedAt: now(),
      };

      const stored = await options.trips.appendLocation(tripId, update, pointer);
      const anomalies = await detectAnomalies({
        trip: stored,
        line,
        previous,
        current: update,
      });
      await invalidateLine(line.id);

      const reachedTerminus =
        line.stops.length > 0 &&
        stored.currentStopOrdinal >= line.stops.length - 1;
      if (reachedTerminus && hooks.onTerminus) {
        await hooks.onTerminus(stored);
      }

      return {
        update,
        previousStopOrdinal: trip.currentStopOrdinal,
        currentStopOrdinal: stored.currentStopOrdinal,
        reachedTerminus,
        anomalies,
      };
    });
  }

  return { record };
}
