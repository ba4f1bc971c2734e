import { DEFAULT_RULES } from "@/config/tracking";
import {
  clampTrafficFactor,
  createRouteEstimator,
  describeTraffic,
  progressPercent,
} from "@/services/tracking/routeEstimator";
import { NotFoundError, ValidationError } from "@/utils/errors";
import {
  MINUTE,
  T0,
  createTestContext,
  report,
  silenceConsole,
  startTrip,
} from "./fixtures";

const KM_PER_DEGREE = (6371 * Math.PI) / 180;
const STOP_SPACING_KM = 0.03 * KM_PER_DEGREE;

beforeEach(() => {
  silenceConsole();
});

describe("route estimate", () => {
  test("synthesizes a position at the current stop before the first fix", async () => {
    const context = createTestContext();
    const trip = await startTrip(context);

    const estimate = await context.engine.routes.estimate(trip.id);

    expect(estimate.currentLocation).toEqual({
      lat: 0,
      lng: 0,
      speed: null,
      heading: null,
      accuracy: null,
      timestamp: T0,
      synthesized: true,
    });
    expect(estimate.trip.progressPercent).toBe(0);
    expect(estimate.remainingStops.map((stop) => stop.stopId)).toEqual([
      "stop-a",
      "stop-b",
      "stop-c",
      "stop-d",
    ]);
    expect(estimate.remainingStops.map((stop) => stop.eta)).toEqual([
      T0,
      T0 + 480_000,
      T0 + 880_302,
      T0 + 1_280_603,
    ]);
    expect(estimate.totalDistanceKm).toBeCloseTo(4 + 2 * STOP_SPACING_KM, 9);
    expect(estimate.totalDurationMinutes).toBeCloseTo(8 + 4 * STOP_SPACING_KM, 9);
    expect(estimate.trafficConditions.level).toBe("normal");
  });

  test("uses the precomputed segment between stops", async () => {
    const context = createTestContext();
    const trip = await startTrip(context);
    context.clock.set(T0 + MINUTE);
    await context.engine.trips.ingest(trip.id, report(0, 0, T0 + MINUTE));

    const estimate = await context.engine.routes.estimate(trip.id, "stop-b");

    expect(estimate.currentLocation.synthesized).toBe(false);
    expect(estimate.currentLocation.accuracy).toBe(10);
    expect(estimate.estimatedPath).toHaveLength(2);
    const [approach, segment] = estimate.estimatedPath;
    expect(approach).toMatchObject({
      fromStopId: null,
      toStopId: "stop-a",
      source: "straight_line",
      distanceKm: 0,
      estimatedArrival: T0 + MINUTE,
    });
    expect(segment).toMatchObject({
      fromStopId: "stop-a",
      toStopId: "stop-b",
      source: "segment",
      distanceKm: 4,
      durationMinutes: 8,
      estimatedArrival: T0 + MINUTE + 480_000,
    });
    expect(segment.geometry).toHaveLength(3);
    expect(estimate.totalDistanceKm).toBe(4);
    expect(estimate.totalDurationMinutes).toBe(8);
  });

  test("starts from the stop under the pointer", async () => {
    const context = createTestContext();
    const trip = await startTrip(context);
    context.clock.set(T0 + 10 * MINUTE);
    await context.engine.trips.ingest(trip.id, report(0.03, 0, T0 + 10 * MINUTE));

    const estimate = await context.engine.routes.estimate(trip.id);

    expect(estimate.trip.currentStopOrdinal).toBe(1);
    expect(estimate.trip.progressPercent).toBe(33.33);
    expect(estimate.remainingStops.map((stop) => stop.ordinal)).toEqual([1, 2, 3]);
    expect(estimate.remainingStops[0].distanceKm).toBe(0);
    expect(estimate.remainingStops[2].distanceKm).toBeCloseTo(2 * STOP_SPACING_KM, 9);
  });

  test("rejects a destination the bus has already passed", async () => {
    const context = createTestContext();
    const trip = await startTrip(context);
    context.clock.set(T0 + 10 * MINUTE);
    await context.engine.trips.ingest(trip.id, report(0.03, 0, T0 + 10 * MINUTE));

    await expect(context.engine.routes.estimate(trip.id, "stop-a")).rejects.toThrow(
      ValidationError,
    );
  });

  test("reports destinations that are not on the line", async () => {
    const context = createTestContext();
    const trip = await startTrip(context);

    await expect(context.engine.routes.estimate(trip.id, "stop-y")).rejects.toThrow(
      NotFoundError,
    );
    await expect(context.engine.routes.estimate("missing")).rejects.toThrow(NotFoundError);
  });

  test("scales travel time by the clamped traffic factor", async () => {
    const context = createTestContext({ trafficFactor: 5 });
    const trip = await startTrip(context);

    const estimate = await context.engine.routes.estimate(trip.id, "stop-b");

    expect(estimate.trafficConditions.factor).toBe(1.5);
    expect(estimate.trafficConditions.level).toBe("light");
    expect(estimate.remainingStops[1].eta).toBe(T0 + 320_000);
  });

  test("takes an external congestion signal", async () => {
    const context = createTestContext();
    const trip = await startTrip(context);
    const estimator = createRouteEstimator({
      repositories: context.store,
      rules: DEFAULT_RULES,
      trafficFactor: () => 0.1,
    });

    const estimate = await estimator.estimate(trip.id, "stop-b");

    expect(estimate.trafficConditions.factor).toBe(0.3);
    expect(estimate.trafficConditions.level).toBe("heavy");
    expect(estimate.totalDurationMinutes).toBeCloseTo((4 / 9) * 60, 9);
  });

  test("falls back to the default speed for a bus without one", async () => {
    const context = createTestContext({ defaultAverageSpeedKmh: 24 });
    context.store.seedBus({ id: "bus-3", number: null, capacity: 30, averageSpeedKmh: 0 });
    const trip = await startTrip(context, { busId: "bus-3" });

    const estimate = await context.engine.routes.estimate(trip.id, "stop-b");

    expect(estimate.totalDurationMinutes).toBe(10);
  });
});

describe("estimate helpers", () => {
  test("clampTrafficFactor keeps factors within bounds", () => {
    expect(clampTrafficFactor(0.1)).toBe(0.3);
    expect(clampTrafficFactor(2)).toBe(1.5);
    expect(clampTrafficFactor(0.8)).toBe(0.8);
    expect(clampTrafficFactor(Number.NaN)).toBe(1);
  });

  test("describeTraffic names the level", () => {
    expect(describeTraffic(1).level).toBe("normal");
    expect(describeTraffic(0.8).level).toBe("heavy");
  });

  test("a one-stop line reports no progress", () => {
    expect(progressPercent(0, 1)).toBe(0);
    expect(progressPercent(0, 0)).toBe(0);
  });

  test("progressPercent rounds to two decimals", () => {
    expect(progressPercent(2, 4)).toBe(66.67);
    expect(progressPercent(3, 4)).toBe(100);
  });
});
