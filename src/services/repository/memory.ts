import { randomUUID } from "crypto";
import type {
  Anomaly,
  BusSnapshot,
  DriverSnapshot,
  LineSnapshot,
  LineStop,
  LocationUpdate,
  RouteSegment,
  Stop,
  TripSnapshot,
  WaitingPassengerReport,
} from "@/types";
import {
  InvalidStateError,
  NotFoundError,
  StaleTimestampError,
  ValidationError,
} from "@/utils/errors";
import { isValidCoordinate } from "@/utils/geo";
import type {
  CreateTripInput,
  NewAnomaly,
  TrackingRepositories,
  TripFilter,
  TripTransition,
} from "./types";

export type LineSeed = {
  id: string;
  name: string;
  color?: string | null;
  stops: LineStop[];
  segments?: RouteSegment[];
};

export type MemoryStore = TrackingRepositories & {
  seedBus: (bus: BusSnapshot) => void;
  seedDriver: (driver: DriverSnapshot) => void;
  seedLine: (line: LineSeed) => LineSnapshot;
  seedWaitingReport: (report: WaitingPassengerReport) => void;
};

type TripEntry = {
  snapshot: TripSnapshot;
  updates: LocationUpdate[];
};

function freezeTrip(snapshot: TripSnapshot): TripSnapshot {
  return Object.freeze({
    ...snapshot,
    recentUpdates: Object.freeze([...snapshot.recentUpdates]),
  });
}

export function normalizeLine(line: LineSeed): LineSnapshot {
  const stops = [...line.stops].sort((a, b) => a.ordinal - b.ordinal);

  for (let i = 0; i < stops.length; i += 1) {
    const stop = stops[i];
    // the stop pointer indexes stops directly, so ordinals run 0..n-1
    if (stop.ordinal !== i) {
      throw new ValidationError(
        `Line ${line.id} expects ordinal ${i}, got ${stop.ordinal} for stop ${stop.id}`,
      );
    }
    if (!isValidCoordinate(stop.coordinate)) {
      throw new ValidationError(`Stop ${stop.id} has an invalid coordinate`);
    }
  }

  return {
    id: line.id,
    name: line.name,
    color: line.color ?? null,
    stops,
    segments: line.segments ?? [],
  };
}

/**
 * Process-local store. Trip snapshots are frozen and replaced on every
 * write, so readers keep a consistent copy without holding any lock.
 */
export function createMemoryStore(): MemoryStore {
  const buses = new Map<string, BusSnapshot>();
  const drivers = new Map<string, DriverSnapshot>();
  const lines = new Map<string, LineSnapshot>();
  const trips = new Map<string, TripEntry>();
  const anomalies: Anomaly[] = [];
  const waitingReports: WaitingPassengerReport[] = [];

  function requireTrip(tripId: string): TripEntry {
    const entry = trips.get(tripId);
    if (!entry) throw new NotFoundError("Trip", tripId);
    return entry;
  }

  function matchesFilter(trip: TripSnapshot, filter: TripFilter): boolean {
    if (filter.state && trip.state !== filter.state) return false;
    if (filter.lineId && trip.lineId !== filter.lineId) return false;
    return true;
  }

  return {
    seedBus(bus) {
      buses.set(bus.id, { ...bus });
    },

    seedDriver(driver) {
      drivers.set(driver.id, { ...driver });
    },

    seedLine(seed) {
      const line = normalizeLine(seed);
      lines.set(line.id, line);
      return line;
    },

    seedWaitingReport(report) {
      waitingReports.push({ ...report });
    },

    buses: {
      async getBus(busId) {
        return buses.get(busId) ?? null;
      },
    },

    drivers: {
      async getDriver(driverId) {
        return drivers.get(driverId) ?? null;
      },
    },

    lines: {
      async getLine(lineId) {
        return lines.get(lineId) ?? null;
      },

      async getStop(stopId): Promise<Stop | null> {
        for (const line of lines.values()) {
          const stop = line.stops.find((entry) => entry.id === stopId);
          if (stop) {
            return { id: stop.id, name: stop.name, coordinate: stop.coordinate };
          }
        }
        return null;
      },

      async listLinesForStop(stopId) {
        return Array.from(lines.values()).filter((line) =>
          line.stops.some((stop) => stop.id === stopId),
        );
      },
    },

    trips: {
      async createTrip(input: CreateTripInput) {
        const snapshot = freezeTrip({
          id: randomUUID(),
          busId: input.busId,
          driverId: input.driverId,
          lineId: input.lineId,
          state: "PENDING",
          createdAt: input.createdAt,
          startedAt: null,
          endedAt: null,
          endReason: null,
          currentStopOrdinal: 0,
          lastUpdateAt: null,
          updateCount: 0,
          recentUpdates: [],
          summary: null,
        });
        trips.set(snapshot.id, { snapshot, updates: [] });
        return snapshot;
      },

      async getTrip(tripId) {
        return trips.get(tripId)?.snapshot ?? null;
      },

      async listTrips(filter) {
        return Array.from(trips.values())
          .map((entry) => entry.snapshot)
          .filter((trip) => matchesFilter(trip, filter));
      },

      async listLocationUpdates(tripId) {
        return [...requireTrip(tripId).updates];
      },

      async appendLocation(tripId, update, currentStopOrdinal) {
        const entry = requireTrip(tripId);
        const current = entry.snapshot;

        if (current.state !== "ACTIVE") {
          throw new InvalidStateError(
            `Trip ${tripId} is ${current.state} and accepts no updates`,
          );
        }
        if (current.lastUpdateAt !== null && update.timestamp < current.lastUpdateAt) {
          throw new StaleTimestampError(
            "Location timestamp is older than the last recorded update",
          );
        }

        const recentUpdates = [...current.recentUpdates, update].slice(-2);
        const next = freezeTrip({
          ...current,
          currentStopOrdinal: Math.max(current.currentStopOrdinal, currentStopOrdinal),
          lastUpdateAt: update.timestamp,
          updateCount: current.updateCount + 1,
          recentUpdates,
        });

        entry.updates.push(update);
        entry.snapshot = next;
        return next;
      },

      async transition(tripId, from, patch: TripTransition) {
        const entry = requireTrip(tripId);
        if (entry.snapshot.state !== from) return null;

        entry.snapshot = freezeTrip({
          ...entry.snapshot,
          state: patch.state,
          startedAt: patch.startedAt ?? entry.snapshot.startedAt,
          endedAt: patch.endedAt ?? entry.snapshot.endedAt,
          endReason: patch.endReason ?? entry.snapshot.endReason,
          summary: patch.summary ?? entry.snapshot.summary,
        });
        return entry.snapshot;
      },
    },

    anomalies: {
      async append(anomaly: NewAnomaly) {
        const stored: Anomaly = Object.freeze({ ...anomaly, id: randomUUID() });
        anomalies.push(stored);
        return stored;
      },

      async listForTrip(tripId, since) {
        return anomalies.filter(
          (anomaly) =>
            anomaly.tripId === tripId &&
            (since === undefined || anomaly.detectedAt >= since),
        );
      },
    },

    waitingPassengers: {
      async listForStop(stopId, since) {
        return waitingReports.filter(
          (report) => report.stopId === stopId && report.timestamp >= since,
        );
      },
    },
  };
}
