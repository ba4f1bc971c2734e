import { DEFAULT_RULES, type TrackingRules } from "@/config/tracking";
import { createMemoryStore, type MemoryStore } from "@/services/repository/memory";
import { createTrackingEngine, type TrackingEngine } from "@/services/tracking";
import type { LocationReport } from "@/types";

export const T0 = Date.UTC(2024, 0, 15, 8, 0, 0);
export const MINUTE = 60_000;

export type TestClock = {
  now: () => number;
  set: (value: number) => void;
  advance: (ms: number) => void;
};

export function createClock(start = T0): TestClock {
  let current = start;
  return {
    now: () => current,
    set: (value) => {
      current = value;
    },
    advance: (ms) => {
      current += ms;
    },
  };
}

/**
 * Line along the meridian: stops every 0.03 degrees of latitude. The first
 * leg has a precomputed 4 km / 7 min segment with a slight bend east.
 */
export function seedStore(store: MemoryStore = createMemoryStore()): MemoryStore {
  store.seedDriver({ id: "driver-1", name: "Ana", rating: 4.5 });
  store.seedDriver({ id: "driver-2", name: "Ben", rating: null });
  store.seedBus({ id: "bus-1", number: "101", capacity: 60, averageSpeedKmh: 30 });
  store.seedBus({ id: "bus-2", number: "102", capacity: 40, averageSpeedKmh: 30 });
  store.seedLine({
    id: "line-1",
    name: "Central",
    color: "#1e88e5",
    stops: [
      { id: "stop-a", name: "Depot", coordinate: { lat: 0, lng: 0 }, ordinal: 0 },
      { id: "stop-b", name: "Market", coordinate: { lat: 0.03, lng: 0 }, ordinal: 1 },
      { id: "stop-c", name: "Library", coordinate: { lat: 0.06, lng: 0 }, ordinal: 2 },
      { id: "stop-d", name: "Harbour", coordinate: { lat: 0.09, lng: 0 }, ordinal: 3 },
    ],
    segments: [
      {
        fromStopId: "stop-a",
        toStopId: "stop-b",
        path: [
          { lat: 0, lng: 0 },
          { lat: 0.015, lng: 0.002 },
          { lat: 0.03, lng: 0 },
        ],
        distanceKm: 4,
        durationMinutes: 7,
      },
    ],
  });
  store.seedLine({
    id: "line-2",
    name: "Crosstown",
    color: null,
    stops: [
      { id: "stop-x", name: "West", coordinate: { lat: 1, lng: 1 }, ordinal: 0 },
      { id: "stop-y", name: "East", coordinate: { lat: 1, lng: 1.05 }, ordinal: 1 },
    ],
  });
  return store;
}

export type TestContext = {
  clock: TestClock;
  store: MemoryStore;
  engine: TrackingEngine;
};

export function createTestContext(rules: Partial<TrackingRules> = {}): TestContext {
  const clock = createClock();
  const store = seedStore();
  const engine = createTrackingEngine({
    repositories: store,
    rules: { ...DEFAULT_RULES, ...rules },
    now: clock.now,
  });
  return { clock, store, engine };
}

export function report(
  lat: number,
  lng: number,
  timestamp: number,
  extra: Partial<LocationReport> = {},
): LocationReport {
  return { lat, lng, accuracy: 10, timestamp, ...extra };
}

/**
 * Creates and starts a trip at the clock's current time.
 */
export async function startTrip(
  context: TestContext,
  request: { busId?: string; driverId?: string; lineId?: string } = {},
) {
  const trip = await context.engine.trips.create({
    busId: request.busId ?? "bus-1",
    driverId: request.driverId ?? "driver-1",
    lineId: request.lineId ?? "line-1",
  });
  return context.engine.trips.start(trip.id);
}

export function silenceConsole(): void {
  jest.spyOn(console, "log").mockImplementation(() => undefined);
  jest.spyOn(console, "warn").mockImplementation(() => undefined);
  jest.spyOn(console, "error").mockImplementation(() => undefined);
}
