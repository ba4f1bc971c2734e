import { DEFAULT_RULES } from "@/config/tracking";
import {
  createMemoryVisualizationCache,
  isCachedVisualization,
} from "@/services/tracking/visualizationCache";
import {
  buildMarkers,
  computeBounds,
  createVisualizationService,
} from "@/services/tracking/visualizationService";
import type { BusRepository } from "@/services/repository/types";
import type { CachedVisualization } from "@/types";
import { NotFoundError } from "@/utils/errors";
import {
  MINUTE,
  T0,
  createClock,
  createTestContext,
  report,
  silenceConsole,
  startTrip,
  type TestContext,
} from "./fixtures";

const KM_PER_DEGREE = (6371 * Math.PI) / 180;
const STOP_SPACING_KM = 0.03 * KM_PER_DEGREE;

function snapshot(lineId: string, generatedAt = T0): CachedVisualization {
  return {
    line: { id: lineId, name: "Central", color: null, totalStops: 0 },
    route: { segments: [], totalDistanceKm: 0, estimatedDurationMinutes: 0 },
    markers: [],
    activeBuses: [],
    bounds: null,
    generatedAt,
  };
}

beforeEach(() => {
  silenceConsole();
});

describe("memory visualization cache", () => {
  test("drops a write computed before an invalidation", async () => {
    const cache = createMemoryVisualizationCache({ ttlMs: 60_000, now: () => T0 });
    const generation = await cache.generation("line-1");

    await cache.invalidate("line-1");

    await expect(cache.put("line-1", snapshot("line-1"), { generation })).resolves.toBe(false);
    await expect(cache.get("line-1")).resolves.toBeNull();
    await expect(cache.generation("line-1")).resolves.toBe(1);
    await expect(cache.put("line-1", snapshot("line-1"), { generation: 1 })).resolves.toBe(true);
    await expect(cache.get("line-1")).resolves.toEqual(snapshot("line-1"));
  });

  test("invalidation removes the stored snapshot", async () => {
    const cache = createMemoryVisualizationCache({ ttlMs: 60_000, now: () => T0 });
    await cache.put("line-1", snapshot("line-1"));

    await cache.invalidate("line-1");

    await expect(cache.get("line-1")).resolves.toBeNull();
  });

  test("expires entries after their ttl", async () => {
    const clock = createClock();
    const cache = createMemoryVisualizationCache({ ttlMs: 60_000, now: clock.now });
    await cache.put("line-1", snapshot("line-1"), { ttlMs: 1000 });

    clock.advance(999);
    await expect(cache.get("line-1")).resolves.not.toBeNull();
    clock.advance(1);
    await expect(cache.get("line-1")).resolves.toBeNull();
  });

  test("prune removes only expired entries", async () => {
    const clock = createClock();
    const cache = createMemoryVisualizationCache({ ttlMs: 60_000, now: clock.now });
    await cache.put("line-1", snapshot("line-1"), { ttlMs: 1000 });
    await cache.put("line-2", snapshot("line-2"));

    clock.advance(5000);

    await expect(cache.prune()).resolves.toBe(1);
    expect(cache.status()).toEqual({ backend: "memory", entries: 1, ttlMs: 60_000 });
  });
});

describe("isCachedVisualization", () => {
  test("accepts a stored snapshot", () => {
    expect(isCachedVisualization(JSON.parse(JSON.stringify(snapshot("line-1"))))).toBe(true);
  });

  test("rejects other values", () => {
    expect(isCachedVisualization(null)).toBe(false);
    expect(isCachedVisualization({ line: { id: "line-1" } })).toBe(false);
    expect(isCachedVisualization([snapshot("line-1")])).toBe(false);
  });
});

describe("visualization service", () => {
  async function withMovingBus(context: TestContext) {
    const moving = await startTrip(context);
    await startTrip(context, { busId: "bus-2", driverId: "driver-2" });
    await context.engine.trips.create({ busId: "bus-1", driverId: "driver-1", lineId: "line-1" });
    context.clock.set(T0 + MINUTE);
    await context.engine.trips.ingest(moving.id, report(0.01, 0, T0 + MINUTE, { heading: 0 }));
    return moving;
  }

  function serviceWithBuses(context: TestContext, buses: BusRepository) {
    return createVisualizationService({
      repositories: { ...context.store, buses },
      estimator: context.engine.routes,
      cache: context.engine.cache,
      rules: DEFAULT_RULES,
      now: context.clock.now,
    });
  }

  test("unknown lines are not found", async () => {
    const { engine } = createTestContext();
    await expect(engine.visualization.getVisualization("missing")).rejects.toThrow(
      NotFoundError,
    );
  });

  test("draws the route, the stops and the buses that have reported", async () => {
    const context = createTestContext();
    const moving = await withMovingBus(context);

    const view = await context.engine.visualization.getVisualization("line-1");

    expect(view.line).toEqual({ id: "line-1", name: "Central", color: "#1e88e5", totalStops: 4 });
    expect(view.markers.map((marker) => [marker.id, marker.isTerminal])).toEqual([
      ["stop-a", true],
      ["stop-b", false],
      ["stop-c", false],
      ["stop-d", true],
    ]);
    expect(view.route.segments.map((segment) => segment.source)).toEqual([
      "segment",
      "straight_line",
      "straight_line",
    ]);
    expect(view.route.totalDistanceKm).toBeCloseTo(4 + 2 * STOP_SPACING_KM, 9);
    expect(view.route.estimatedDurationMinutes).toBeCloseTo(7 + 4 * STOP_SPACING_KM, 9);
    expect(view.bounds).toEqual({ north: 0.09, south: 0, east: 0.002, west: 0 });
    expect(view.generatedAt).toBe(T0 + MINUTE);

    expect(view.activeBuses).toEqual([
      {
        tripId: moving.id,
        busId: "bus-1",
        busNumber: "101",
        driverName: "Ana",
        position: { lat: 0.01, lng: 0 },
        heading: 0,
        speed: null,
        currentStopOrdinal: 0,
        progressPercent: 0,
        nextStopId: "stop-a",
        nextStopEta: T0 + MINUTE + 133_434,
        lastUpdate: T0 + MINUTE,
      },
    ]);
  });

  test("serves a cached snapshot until a location update lands", async () => {
    const context = createTestContext();
    const moving = await withMovingBus(context);

    const first = await context.engine.visualization.getVisualization("line-1");
    const second = await context.engine.visualization.getVisualization("line-1");
    expect(second).toBe(first);

    context.clock.set(T0 + 2 * MINUTE);
    await context.engine.trips.ingest(moving.id, report(0.015, 0, T0 + 2 * MINUTE));
    const third = await context.engine.visualization.getVisualization("line-1");

    expect(third).not.toBe(first);
    expect(third.activeBuses[0].position).toEqual({ lat: 0.015, lng: 0 });
  });

  test("a trip ending drops the cached snapshot", async () => {
    const context = createTestContext();
    const moving = await withMovingBus(context);
    await context.engine.visualization.getVisualization("line-1");

    await context.engine.trips.complete(moving.id);
    const view = await context.engine.visualization.getVisualization("line-1");

    expect(view.activeBuses).toEqual([]);
  });

  test("a partial snapshot is served but not cached", async () => {
    const context = createTestContext();
    await withMovingBus(context);
    const service = serviceWithBuses(context, {
      getBus: async () => {
        throw new Error("bus lookup failed");
      },
    });

    const view = await service.getVisualization("line-1");

    expect(view.activeBuses).toEqual([]);
    expect(view.markers).toHaveLength(4);
    expect(context.engine.cache.status().entries).toBe(0);
  });

  test("a snapshot computed across an invalidation is not cached", async () => {
    const context = createTestContext();
    await withMovingBus(context);
    const service = serviceWithBuses(context, {
      getBus: async (busId) => {
        await context.engine.cache.invalidate("line-1");
        return context.store.buses.getBus(busId);
      },
    });

    const view = await service.getVisualization("line-1");

    expect(view.activeBuses).toHaveLength(1);
    expect(context.engine.cache.status().entries).toBe(0);
  });
});

describe("visualization helpers", () => {
  test("computeBounds has no bounds without points", () => {
    expect(computeBounds([])).toBeNull();
  });

  test("a single stop line marks its only stop as terminal", () => {
    const markers = buildMarkers({
      id: "line-9",
      name: "Shuttle",
      color: null,
      stops: [{ id: "s0", name: "Only", coordinate: { lat: 0, lng: 0 }, ordinal: 0 }],
      segments: [],
    });
    expect(markers.map((marker) => marker.isTerminal)).toEqual([true]);
  });
});
