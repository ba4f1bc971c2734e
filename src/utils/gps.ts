import type { LocationReport } from "@/types";
import { ValidationError } from "@/utils/errors";

export function readNumber(value: unknown): number {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") return Number(value);
  return Number.NaN;
}

function readOptionalNumber(value: unknown): number | null {
  return value === undefined || value === null ? null : readNumber(value);
}

/**
 * Epoch milliseconds from a number, a numeric string, or an ISO-8601
 * string. NaN when the value is none of those.
 */
export function readTimestamp(value: unknown): number {
  if (typeof value === "number") return value;
  if (typeof value !== "string" || value.trim() === "") return Number.NaN;

  const numeric = Number(value);
  if (Number.isFinite(numeric)) return numeric;
  return Date.parse(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Builds a report from loosely typed input. Range checks are left to the
 * ingestor; this only rejects input that is not an object.
 */
export function toLocationReport(
  input: unknown,
  keys: { lat: string; lng: string } = { lat: "lat", lng: "lng" },
): LocationReport {
  if (!isRecord(input)) {
    throw new ValidationError("Location payload must be a JSON object");
  }

  return {
    lat: readNumber(input[keys.lat]),
    lng: readNumber(input[keys.lng]),
    accuracy: readNumber(input.accuracy),
    speed: readOptionalNumber(input.speed),
    heading: readOptionalNumber(input.heading),
    timestamp: readTimestamp(input.timestamp),
  };
}

export function parseGpsPayload(payloadBuffer: Buffer): LocationReport {
  let payload: unknown;
  try {
    payload = JSON.parse(payloadBuffer.toString("utf8"));
  } catch {
    throw new ValidationError("Location payload is not valid JSON");
  }
  return toLocationReport(payload);
}

/**
 * Trip id from a `{prefix}/{tripId}` topic, or null for anything else.
 */
export function parseGpsTopic(topic: string, prefix = "gps"): string | null {
  if (topic.includes("#") || topic.includes("+")) return null;

  const parts = topic.split("/");
  if (parts.length !== 2) return null;

  const [topicPrefix, tripId] = parts;
  if (topicPrefix !== prefix || !tripId) return null;
  return tripId;
}

export function toBuffer(payload: Buffer | string | Array<Buffer | string>): Buffer {
  if (Buffer.isBuffer(payload)) return payload;
  if (Array.isArray(payload)) {
    return Buffer.concat(
      payload.map((item) => (Buffer.isBuffer(item) ? item : Buffer.from(String(item)))),
    );
  }
  return Buffer.from(String(payload ?? ""), "utf8");
}
