import { errorMessage } from "@/utils/errors";
import type { TripStateMachine } from "./tripStateMachine";
import type { VisualizationCache } from "./visualizationCache";

type SweepOptions = {
  stateMachine: Pick<TripStateMachine, "sweepInactive">;
  cache: Pick<VisualizationCache, "prune">;
  intervalMs: number;
  now?: () => number;
};

export type SweepStats = {
  enabled: boolean;
  isRunning: boolean;
  totalRuns: number;
  totalExpired: number;
  lastRunAt: number | null;
  lastDurationMs: number | null;
  lastExpired: number;
  lastPruned: number;
  lastError: string | null;
};

export type InactivitySweeper = {
  start: () => Promise<void>;
  stop: () => Promise<void>;
  sweepOnce: () => Promise<void>;
  getStats: () => SweepStats;
};

export function createInactivitySweeper(options: SweepOptions): InactivitySweeper {
  const now = options.now ?? Date.now;
  let timer: NodeJS.Timeout | null = null;
  let inFlight: Promise<void> | null = null;

  const stats: SweepStats = {
    enabled: options.intervalMs > 0,
    isRunning: false,
    totalRuns: 0,
    totalExpired: 0,
    lastRunAt: null,
    lastDurationMs: null,
    lastExpired: 0,
    lastPruned: 0,
    lastError: null,
  };

  async function runSweep(): Promise<void> {
    stats.isRunning = true;
    const startedAt = now();

    try {
      const expired = await options.stateMachine.sweepInactive(startedAt);
      const pruned = await options.cache.prune();

      stats.totalRuns += 1;
      stats.totalExpired += expired.length;
      stats.lastRunAt = now();
      stats.lastDurationMs = stats.lastRunAt - startedAt;
      stats.lastExpired = expired.length;
      stats.lastPruned = pruned;
      stats.lastError = null;

      if (expired.length > 0) {
        console.log("[inactivity-sweep] expired trips", {
          expired,
          pruned,
          durationMs: stats.lastDurationMs,
        });
      }
    } catch (error) {
      stats.lastError = errorMessage(error);
      console.warn("[inactivity-sweep] failed", { error: stats.lastError });
    } finally {
      stats.isRunning = false;
    }
  }

  // overlapping calls share the run in progress
  function sweepOnce(): Promise<void> {
    if (!inFlight) {
      inFlight = runSweep().finally(() => {
        inFlight = null;
      });
    }
    return inFlight;
  }

  async function start(): Promise<void> {
    if (options.intervalMs <= 0 || timer) {
      return;
    }

    await sweepOnce();
    timer = setInterval(() => {
      void sweepOnce();
    }, Math.max(1000, options.intervalMs));
  }

  async function stop(): Promise<void> {
    if (timer) {
      clearInterval(timer);
      timer = null;
    }
    if (inFlight) {
      await inFlight;
    }
  }

  function getStats(): SweepStats {
    return {
      ...stats,
      isRunning: inFlight !== null,
    };
  }

  return { start, stop, sweepOnce, getStats };
}
