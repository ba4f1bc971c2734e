import type Redis from "ioredis";
import type { CachedVisualization } from "@/types";

export type CachePutOptions = {
  ttlMs?: number;
  // generation read before the snapshot was computed
  generation?: number;
};

export type VisualizationCacheStatus = {
  backend: "memory" | "keydb";
  entries: number | null;
  ttlMs: number;
};

export type VisualizationCache = {
  get: (lineId: string) => Promise<CachedVisualization | null>;
  /**
   * Stores a snapshot. Returns false when the line was invalidated after
   * `options.generation` was read; the snapshot is dropped in that case.
   */
  put: (
    lineId: string,
    value: CachedVisualization,
    options?: CachePutOptions,
  ) => Promise<boolean>;
  invalidate: (lineId: string) => Promise<void>;
  generation: (lineId: string) => Promise<number>;
  prune: () => Promise<number>;
  status: () => VisualizationCacheStatus;
};

type MemoryCacheOptions = {
  ttlMs: number;
  now?: () => number;
};

type MemoryEntry = {
  value: CachedVisualization;
  expiresAt: number;
};

export function createMemoryVisualizationCache(
  options: MemoryCacheOptions,
): VisualizationCache {
  const now = options.now ?? Date.now;
  const entries = new Map<string, MemoryEntry>();
  const generations = new Map<string, number>();

  function currentGeneration(lineId: string): number {
    return generations.get(lineId) ?? 0;
  }

  return {
    async get(lineId) {
      const entry = entries.get(lineId);
      if (!entry) return null;
      if (entry.expiresAt <= now()) {
        entries.delete(lineId);
        return null;
      }
      return entry.value;
    },

    async put(lineId, value, putOptions) {
      if (
        putOptions?.generation !== undefined &&
        putOptions.generation !== currentGeneration(lineId)
      ) {
        return false;
      }

      const ttlMs = putOptions?.ttlMs ?? options.ttlMs;
      entries.set(lineId, { value, expiresAt: now() + ttlMs });
      return true;
    },

    async invalidate(lineId) {
      generations.set(lineId, currentGeneration(lineId) + 1);
      entries.delete(lineId);
    },

    async generation(lineId) {
      return currentGeneration(lineId);
    },

    async prune() {
      const cutoff = now();
      let removed = 0;
      for (const [lineId, entry] of entries) {
        if (entry.expiresAt <= cutoff) {
          entries.delete(lineId);
          removed += 1;
        }
      }
      return removed;
    },

    status() {
      return { backend: "memory", entries: entries.size, ttlMs: options.ttlMs };
    },
  };
}

type KeydbCacheOptions = {
  keydb: Redis;
  ttlMs: number;
  keyPrefix?: string;
};

// SET only when the generation counter still matches
const PUT_IF_GENERATION_SCRIPT = `
local current = redis.call("GET", KEYS[2]) or "0"
if current ~= ARGV[1] then
  return 0
end
redis.call("SET", KEYS[1], ARGV[2], "PX", ARGV[3])
return 1
`;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isCachedVisualization(
  value: unknown,
): value is CachedVisualization {
  if (!isRecord(value)) return false;
  if (!isRecord(value.line) || typeof value.line.id !== "string") return false;
  if (!isRecord(value.route) || !Array.isArray(value.route.segments)) {
    return false;
  }
  return (
    Array.isArray(value.markers) &&
    Array.isArray(value.activeBuses) &&
    typeof value.generatedAt === "number"
  );
}

export function createKeydbVisualizationCache(
  options: KeydbCacheOptions,
): VisualizationCache {
  const prefix = options.keyPrefix ?? "viz";
  const valueKey = (lineId: string) => `${prefix}:line:${lineId}`;
  const generationKey = (lineId: string) => `${prefix}:line:${lineId}:gen`;

  async function readGeneration(lineId: string): Promise<number> {
    const raw = await options.keydb.get(generationKey(lineId));
    const parsed = Number.parseInt(raw ?? "0", 10);
    return Number.isFinite(parsed) ? parsed : 0;
  }

  return {
    async get(lineId) {
      const raw = await options.keydb.get(valueKey(lineId));
      if (!raw) return null;

      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (error) {
        console.warn("[viz-cache] dropping unreadable entry", { lineId, error });
        await options.keydb.del(valueKey(lineId));
        return null;
      }

      return isCachedVisualization(parsed) ? parsed : null;
    },

    async put(lineId, value, putOptions) {
      const ttlMs = putOptions?.ttlMs ?? options.ttlMs;
      const payload = JSON.stringify(value);

      if (putOptions?.generation === undefined) {
        await options.keydb.set(valueKey(lineId), payload, "PX", ttlMs);
        return true;
      }

      const stored = await options.keydb.eval(
        PUT_IF_GENERATION_SCRIPT,
        2,
        valueKey(lineId),
        generationKey(lineId),
        String(putOptions.generation),
        payload,
        String(ttlMs),
      );
      return Number(stored) === 1;
    },

    async invalidate(lineId) {
      await options.keydb
        .multi()
        .incr(generationKey(lineId))
        .del(valueKey(lineId))
        .exec();
    },

    generation: readGeneration,

    // keydb expires entries itself
    async prune() {
      return 0;
    },

    status() {
      return { backend: "keydb", entries: null, ttlMs: options.ttlMs };
    },
  };
}
