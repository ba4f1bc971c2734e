import { createInactivitySweeper } from "@/services/tracking/inactivitySweeper";
import { createMemoryVisualizationCache } from "@/services/tracking/visualizationCache";
import { MINUTE, T0, createTestContext, silenceConsole, startTrip } from "./fixtures";

beforeEach(() => {
  silenceConsole();
});

describe("inactivity sweeper", () => {
  test("expires silent trips and prunes the cache", async () => {
    const context = createTestContext();
    const trip = await startTrip(context);
    await context.engine.visualization.getVisualization("line-1");
    context.clock.set(T0 + 20 * MINUTE);

    const sweeper = createInactivitySweeper({
      stateMachine: context.engine.trips,
      cache: context.engine.cache,
      intervalMs: MINUTE,
      now: context.clock.now,
    });
    await sweeper.sweepOnce();

    expect((await context.engine.trips.getTrip(trip.id)).state).toBe("ABORTED");
    expect(sweeper.getStats()).toEqual({
      enabled: true,
      isRunning: false,
      totalRuns: 1,
      totalExpired: 1,
      lastRunAt: T0 + 20 * MINUTE,
      lastDurationMs: 0,
      lastExpired: 1,
      lastPruned: 0,
      lastError: null,
    });
  });

  test("counts expired cache entries it removes", async () => {
    let now = T0;
    const cache = createMemoryVisualizationCache({ ttlMs: 1000, now: () => now });
    await cache.put("line-1", {
      line: { id: "line-1", name: "Central", color: null, totalStops: 0 },
      route: { segments: [], totalDistanceKm: 0, estimatedDurationMinutes: 0 },
      markers: [],
      activeBuses: [],
      bounds: null,
      generatedAt: T0,
    });
    now = T0 + 2000;

    const sweeper = createInactivitySweeper({
      stateMachine: { sweepInactive: async () => [] },
      cache,
      intervalMs: MINUTE,
      now: () => now,
    });
    await sweeper.sweepOnce();

    expect(sweeper.getStats().lastPruned).toBe(1);
  });

  test("records a failed run without throwing", async () => {
    const sweeper = createInactivitySweeper({
      stateMachine: {
        sweepInactive: async () => {
          throw new Error("store unavailable");
        },
      },
      cache: { prune: async () => 0 },
      intervalMs: MINUTE,
      now: () => T0,
    });

    await expect(sweeper.sweepOnce()).resolves.toBeUndefined();
    expect(sweeper.getStats().lastError).toBe("store unavailable");
    expect(sweeper.getStats().totalRuns).toBe(0);
  });

  test("stays idle when disabled", async () => {
    const sweepInactive = jest.fn(async () => []);
    const sweeper = createInactivitySweeper({
      stateMachine: { sweepInactive },
      cache: { prune: async () => 0 },
      intervalMs: 0,
    });

    await sweeper.start();

    expect(sweepInactive).not.toHaveBeenCalled();
    expect(sweeper.getStats().enabled).toBe(false);
  });

  test("runs once on start and stops its timer", async () => {
    const sweepInactive = jest.fn(async (): Promise<string[]> => []);
    const sweeper = createInactivitySweeper({
      stateMachine: { sweepInactive },
      cache: { prune: async () => 0 },
      intervalMs: MINUTE,
    });

    await sweeper.start();
    await sweeper.stop();

    expect(sweepInactive).toHaveBeenCalledTimes(1);
    expect(sweeper.getStats().totalRuns).toBe(1);
  });

  test("stop waits for the sweep in progress", async () => {
    let finishSweep: (expired: string[]) => void = () => undefined;
    const sweepInactive = jest.fn(
      () =>
        new Promise<string[]>((resolve) => {
          finishSweep = resolve;
        }),
    );
    const sweeper = createInactivitySweeper({
      stateMachine: { sweepInactive },
      cache: { prune: async () => 0 },
      intervalMs: MINUTE,
      now: () => T0,
    });

    const running = sweeper.sweepOnce();
    const overlapping = sweeper.sweepOnce();
    expect(sweeper.getStats().isRunning).toBe(true);

    let stopped = false;
    const stopping = sweeper.stop().then(() => {
      stopped = true;
    });
    await Promise.resolve();
    expect(stopped).toBe(false);

    finishSweep(["trip-1"]);
    await Promise.all([running, overlapping, stopping]);

    expect(stopped).toBe(true);
    expect(sweepInactive).toHaveBeenCalledTimes(1);
    expect(sweeper.getStats()).toMatchObject({ isRunning: false, totalRuns: 1, totalExpired: 1 });
  });
});
