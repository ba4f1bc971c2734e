import { readFile } from "fs/promises";
import type { BusSnapshot, Coordinate, DriverSnapshot, RouteSegment } from "@/types";
import { ValidationError } from "@/utils/errors";
import { polylineLengthKm } from "@/utils/geo";
import type { LineSeed, MemoryStore } from "./memory";

type SeedStop = { id: string; name: string; lat: number; lng: number };

type SeedLine = LineSeed & { segments: RouteSegment[] };

export type SeedData = {
  drivers: DriverSnapshot[];
  buses: BusSnapshot[];
  lines: SeedLine[];
};

type Fields = Record<string, unknown>;

function isFields(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function list(value: unknown, path: string): unknown[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) throw new ValidationError(`${path} must be an array`, path);
  return value;
}

function fields(value: unknown, path: string): Fields {
  if (!isFields(value)) throw new ValidationError(`${path} must be an object`, path);
  return value;
}

function text(value: unknown, path: string): string {
  if (typeof value !== "string" || !value.trim()) {
    throw new ValidationError(`${path} must be a non-empty string`, path);
  }
  return value;
}

function num(value: unknown, path: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ValidationError(`${path} must be a number`, path);
  }
  return value;
}

function coordinate(value: unknown, path: string): Coordinate {
  const entry = fields(value, path);
  return { lat: num(entry.lat, `${path}.lat`), lng: num(entry.lng, `${path}.lng`) };
}

function parseDriver(value: unknown, path: string): DriverSnapshot {
  const entry = fields(value, path);
  return {
    id: text(entry.id, `${path}.id`),
    name: text(entry.name, `${path}.name`),
    rating: entry.rating === undefined || entry.rating === null
      ? null
      : num(entry.rating, `${path}.rating`),
  };
}

function parseBus(value: unknown, path: string): BusSnapshot {
  const entry = fields(value, path);
  return {
    id: text(entry.id, `${path}.id`),
    number: typeof entry.number === "string" ? entry.number : null,
    capacity: entry.capacity === undefined ? 0 : num(entry.capacity, `${path}.capacity`),
    averageSpeedKmh:
      entry.averageSpeedKmh === undefined
        ? 0
        : num(entry.averageSpeedKmh, `${path}.averageSpeedKmh`),
  };
}

function parseStop(value: unknown, path: string): SeedStop {
  const entry = fields(value, path);
  return {
    id: text(entry.id, `${path}.id`),
    name: text(entry.name, `${path}.name`),
    ...coordinate(entry, path),
  };
}

function parseSegment(value: unknown, path: string): RouteSegment {
  const entry = fields(value, path);
  const segmentPath = list(entry.path, `${path}.path`).map((point, index) =>
    coordinate(point, `${path}.path[${index}]`),
  );
  if (segmentPath.length < 2) {
    throw new ValidationError(`${path}.path needs at least two points`, `${path}.path`);
  }

  return {
    fromStopId: text(entry.fromStopId, `${path}.fromStopId`),
    toStopId: text(entry.toStopId, `${path}.toStopId`),
    path: segmentPath,
    distanceKm:
      entry.distanceKm === undefined
        ? polylineLengthKm(segmentPath)
        : num(entry.distanceKm, `${path}.distanceKm`),
    durationMinutes:
      entry.durationMinutes === undefined || entry.durationMinutes === null
        ? null
        : num(entry.durationMinutes, `${path}.durationMinutes`),
  };
}

function parseLine(value: unknown, path: string): SeedLine {
  const entry = fields(value, path);
  const stops = list(entry.stops, `${path}.stops`).map((stop, index) => {
    const parsed = parseStop(stop, `${path}.stops[${index}]`);
    return {
      id: parsed.id,
      name: parsed.name,
      coordinate: { lat: parsed.lat, lng: parsed.lng },
      ordinal: index,
    };
  });

  return {
    id: text(entry.id, `${path}.id`),
    name: text(entry.name, `${path}.name`),
    color: typeof entry.color === "string" ? entry.color : null,
    stops,
    segments: list(entry.segments, `${path}.segments`).map((segment, index) =>
      parseSegment(segment, `${path}.segments[${index}]`),
    ),
  };
}

/**
 * Validates seed JSON. Stops take their ordinal from their position in
 * the line's `stops` array.
 */
export function parseSeed(value: unknown): SeedData {
  const root = fields(value, "seed");
  return {
    drivers: list(root.drivers, "drivers").map((entry, i) => parseDriver(entry, `drivers[${i}]`)),
    buses: list(root.buses, "buses").map((entry, i) => parseBus(entry, `buses[${i}]`)),
    lines: list(root.lines, "lines").map((entry, i) => parseLine(entry, `lines[${i}]`)),
  };
}

export function applySeed(store: MemoryStore, seed: SeedData): void {
  seed.drivers.forEach((driver) => store.seedDriver(driver));
  seed.buses.forEach((bus) => store.seedBus(bus));
  seed.lines.forEach((line) => store.seedLine(line));
}

export async function loadSeedFile(store: MemoryStore, file: string): Promise<SeedData> {
  const raw = await readFile(file, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ValidationError(`Seed file ${file} is not valid JSON`);
  }
  const seed = parseSeed(parsed);
  applySeed(store, seed);
  return seed;
}
