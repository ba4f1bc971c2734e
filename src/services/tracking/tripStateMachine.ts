import type {
  Anomaly,
  LocationReport,
  LocationUpdate,
  RecordResult,
  TripEndReason,
  TripSnapshot,
  TripState,
  TripSummary,
} from "@/types";
import type { TrackingRules } from "@/config/tracking";
import type { TrackingRepositories } from "@/services/repository/types";
import {
  InvalidStateError,
  NotFoundError,
  ValidationError,
  errorMessage,
} from "@/utils/errors";
import { polylineLengthKm } from "@/utils/geo";
import type { LocationIngestor } from "./locationIngestor";
import type { KeyedLock } from "./tripLock";
import type { VisualizationCache } from "./visualizationCache";

export type CreateTripRequest = {
  busId: string;
  driverId: string;
  lineId: string;
};

export type IngestResult = RecordResult & {
  state: TripState;
};

export type TripStateMachine = {
  create: (request: CreateTripRequest) => Promise<TripSnapshot>;
  start: (tripId: string) => Promise<TripSnapshot>;
  ingest: (tripId: string, report: LocationReport) => Promise<IngestResult>;
  complete: (tripId: string, reason?: Extract<TripEndReason, "driver" | "terminus">) => Promise<TripSnapshot>;
  expire: (tripId: string) => Promise<TripSnapshot>;
  sweepInactive: (nowMs?: number) => Promise<string[]>;
  getTrip: (tripId: string) => Promise<TripSnapshot>;
  listAnomalies: (tripId: string, since?: number) => Promise<Anomaly[]>;
};

type TripStateMachineOptions = {
  repositories: Pick<
    TrackingRepositories,
    "buses" | "drivers" | "lines" | "trips" | "anomalies"
  >;
  ingestor: LocationIngestor;
  cache: VisualizationCache;
  lock: KeyedLock;
  rules: Pick<TrackingRules, "inactivityTimeoutMs">;
  now?: () => number;
};

export function summarizeTrip(
  updates: readonly LocationUpdate[],
  startedAt: number | null,
  endedAt: number,
): TripSummary {
  const travelled = polylineLengthKm(updates);

  const durationMs = startedAt === null ? 0 : Math.max(0, endedAt - startedAt);
  const hours = durationMs / 3_600_000;

  return {
    distanceKm: travelled,
    averageSpeedKmh: hours > 0 ? travelled / hours : null,
    durationMs,
  };
}

/**
 * Last activity of an ACTIVE trip: the newest update, or the start time
 * while it has none.
 */
export function lastActivityAt(trip: TripSnapshot): number | null {
  return trip.lastUpdateAt ?? trip.startedAt;
}

export function createTripStateMachine(
  options: TripStateMachineOptions,
): TripStateMachine {
  const now = options.now ?? Date.now;
  const { buses, drivers, lines, trips, anomalies } = options.repositories;

  async function requireTrip(tripId: string): Promise<TripSnapshot> {
    const trip = await trips.getTrip(tripId);
    if (!trip) {
      throw new NotFoundError("Trip", tripId);
    }
    return trip;
  }

  function notInState(trip: TripSnapshot, expected: TripState, action: string): InvalidStateError {
    return new InvalidStateError(
      `Cannot ${action} trip ${trip.id}: it is ${trip.state}, expected ${expected}`,
    );
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

  async function create(request: CreateTripRequest): Promise<TripSnapshot> {
    const [bus, driver, line] = await Promise.all([
      buses.getBus(request.busId),
      drivers.getDriver(request.driverId),
      lines.getLine(request.lineId),
    ]);

    if (!bus) throw new NotFoundError("Bus", request.busId);
    if (!driver) throw new NotFoundError("Driver", request.driverId);
    if (!line) throw new NotFoundError("Line", request.lineId);
    if (line.stops.length === 0) {
      throw new ValidationError(`Line ${line.id} has no stops`, "lineId");
    }

    const trip = await trips.createTrip({
      busId: bus.id,
      driverId: driver.id,
      lineId: line.id,
      createdAt: now(),
    });
    console.log("[tracking] trip created", {
      tripId: trip.id,
      busId: trip.busId,
      lineId: trip.lineId,
    });
    return trip;
  }

  async function start(tripId: string): Promise<TripSnapshot> {
    return options.lock.runExclusive(tripId, async () => {
      const trip = await requireTrip(tripId);
      if (trip.state !== "PENDING") {
        throw notInState(trip, "PENDING", "start");
      }

      const started = await trips.transition(tripId, "PENDING", {
        state: "ACTIVE",
        startedAt: now(),
      });
      if (!started) {
        throw notInState(await requireTrip(tripId), "PENDING", "start");
      }

      await invalidateLine(started.lineId);
      console.log("[tracking] trip started", { tripId, lineId: started.lineId });
      return started;
    });
  }

  // caller holds the trip lock and has checked the trip is ACTIVE
  async function finishTrip(
    trip: TripSnapshot,
    state: Extract<TripState, "COMPLETED" | "ABORTED">,
    reason: TripEndReason,
  ): Promise<TripSnapshot> {
    const endedAt = now();
    const updates = await trips.listLocationUpdates(trip.id);
    const summary = summarizeTrip(updates, trip.startedAt, endedAt);

    const finished = await trips.transition(trip.id, "ACTIVE", {
      state,
      endedAt,
      endReason: reason,
      summary,
    });
    if (!finished) {
      throw notInState(await requireTrip(trip.id), "ACTIVE", "finish");
    }

    await invalidateLine(finished.lineId);
    console.log("[tracking] trip finished", {
      tripId: trip.id,
      state,
      reason,
      distanceKm: Number(summary.distanceKm.toFixed(3)),
    });
    return finished;
  }

  async function finish(
    tripId: string,
    state: Extract<TripState, "COMPLETED" | "ABORTED">,
    reason: TripEndReason,
    guard?: (trip: TripSnapshot) => boolean,
  ): Promise<TripSnapshot | null> {
    return options.lock.runExclusive(tripId, async () => {
      const trip = await requireTrip(tripId);
      if (trip.state !== "ACTIVE") {
        throw notInState(trip, "ACTIVE", state === "COMPLETED" ? "complete" : "expire");
      }
      if (guard && !guard(trip)) {
        return null;
      }
      return finishTrip(trip, state, reason);
    });
  }

  async function complete(
    tripId: string,
    reason: Extract<TripEndReason, "driver" | "terminus"> = "driver",
  ): Promise<TripSnapshot> {
    const finished = await finish(tripId, "COMPLETED", reason);
    if (!finished) {
      throw new InvalidStateError(`Trip ${tripId} could not be completed`);
    }
    return finished;
  }

  async function expire(tripId: string): Promise<TripSnapshot> {
    const finished = await finish(tripId, "ABORTED", "inactivity");
    if (!finished) {
      throw new InvalidStateError(`Trip ${tripId} could not be expired`);
    }
    return finished;
  }

  async function ingest(
    tripId: string,
    report: LocationReport,
  ): Promise<IngestResult> {
    let state: TripState = "ACTIVE";
    const result = await options.ingestor.record(tripId, report, {
      onTerminus: async (trip) => {
        const completed = await finishTrip(trip, "COMPLETED", "terminus");
        state = completed.state;
      },
    });
    return { ...result, state };
  }

  async function sweepInactive(nowMs: number = now()): Promise<string[]> {
    const cutoff = nowMs - options.rules.inactivityTimeoutMs;
    const isStale = (trip: TripSnapshot): boolean => {
      const last = lastActivityAt(trip);
      return last !== null && last < cutoff;
    };

    const active = await trips.listTrips({ state: "ACTIVE" });
    const expired: string[] = [];

    for (const candidate of active.filter(isStale)) {
      try {
        // rechecked under the trip lock against the latest snapshot
        const finished = await finish(candidate.id, "ABORTED", "inactivity", isStale);
        if (finished) {
          expired.push(candidate.id);
        }
      } catch (error) {
        if (error instanceof InvalidStateError) continue;
        console.warn("[tracking] failed to expire trip", {
          tripId: candidate.id,
          error: errorMessage(error),
        });
      }
    }

    return expired;
  }

  async function getTrip(tripId: string): Promise<TripSnapshot> {
    return requireTrip(tripId);
  }

  async function listAnomalies(tripId: string, since?: number): Promise<Anomaly[]> {
    await requireTrip(tripId);
    return anomalies.listForTrip(tripId, since);
  }

  return {
    create,
    start,
    ingest,
    complete,
    expire,
    sweepInactive,
    getTrip,
    listAnomalies,
  };
}
