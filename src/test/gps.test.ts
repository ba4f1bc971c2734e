import { classifyRejectReason, logRejectedReport } from "@/services/tracking/rejects";
import { parseGpsPayload, parseGpsTopic, readTimestamp, toBuffer, toLocationReport } from "@/utils/gps";
import { createGpsHandler } from "@/utils/gpsHandler";
import {
  InvalidStateError,
  NotFoundError,
  StaleTimestampError,
  ValidationError,
} from "@/utils/errors";
import { T0, silenceConsole } from "./fixtures";

beforeEach(() => {
  silenceConsole();
});

describe("parseGpsTopic", () => {
  test("extracts the trip id", () => {
    expect(parseGpsTopic("gps/trip-42")).toBe("trip-42");
    expect(parseGpsTopic("fleet/trip-42", "fleet")).toBe("trip-42");
  });

  test("rejects other shapes", () => {
    expect(parseGpsTopic("gps/+")).toBeNull();
    expect(parseGpsTopic("gps/#")).toBeNull();
    expect(parseGpsTopic("gps/route/trip-42")).toBeNull();
    expect(parseGpsTopic("telemetry/trip-42")).toBeNull();
    expect(parseGpsTopic("gps/")).toBeNull();
  });
});

describe("parseGpsPayload", () => {
  test("reads coordinates and an ISO timestamp", () => {
    const payload = Buffer.from(
      JSON.stringify({
        lat: 8.98,
        lng: -79.52,
        accuracy: 12,
        timestamp: "2024-01-15T08:00:00.000Z",
      }),
    );

    expect(parseGpsPayload(payload)).toEqual({
      lat: 8.98,
      lng: -79.52,
      accuracy: 12,
      speed: null,
      heading: null,
      timestamp: T0,
    });
  });

  test("reads numeric strings", () => {
    const report = toLocationReport({
      lat: "1.5",
      lng: "2",
      accuracy: "5",
      speed: "12",
      heading: 90,
      timestamp: String(T0),
    });

    expect(report).toEqual({
      lat: 1.5,
      lng: 2,
      accuracy: 5,
      speed: 12,
      heading: 90,
      timestamp: T0,
    });
  });

  test("leaves missing numbers as NaN for the range checks", () => {
    const report = toLocationReport({ lat: 1 });
    expect(report.lng).toBeNaN();
    expect(report.accuracy).toBeNaN();
    expect(report.timestamp).toBeNaN();
  });

  test("rejects payloads that are not JSON objects", () => {
    expect(() => parseGpsPayload(Buffer.from("{not json"))).toThrow(ValidationError);
    expect(() => parseGpsPayload(Buffer.from("[1,2]"))).toThrow(ValidationError);
  });

  test("readTimestamp rejects empty values", () => {
    expect(readTimestamp("")).toBeNaN();
    expect(readTimestamp(undefined)).toBeNaN();
    expect(readTimestamp("yesterday")).toBeNaN();
  });
});

describe("toBuffer", () => {
  test("joins chunked payloads", () => {
    expect(toBuffer([Buffer.from("ab"), "cd"]).toString()).toBe("abcd");
    expect(toBuffer("plain").toString()).toBe("plain");
  });
});

describe("classifyRejectReason", () => {
  test("maps error kinds to reject reasons", () => {
    expect(classifyRejectReason(new StaleTimestampError("old"))).toBe("stale_timestamp");
    expect(classifyRejectReason(new ValidationError("bad"))).toBe("invalid_payload");
    expect(classifyRejectReason(new InvalidStateError("done"))).toBe("invalid_state");
    expect(classifyRejectReason(new NotFoundError("Trip", "t1"))).toBe("not_found");
    expect(classifyRejectReason(new Error("write failed"))).toBe("persistence_error");
  });

  test("logs rejected reports with their reason", () => {
    logRejectedReport("invalid_topic", { topic: "gps", source: "mqtt", timestamp: T0 });

    expect(console.warn).toHaveBeenCalledWith("[ingestion.reject]", {
      reason: "invalid_topic",
      tripId: null,
      source: "mqtt",
      topic: "gps",
      message: null,
      timestamp: T0,
    });
  });
});

describe("gps message handler", () => {
  const payload = Buffer.from(
    JSON.stringify({ lat: 0.01, lng: 0, accuracy: 10, timestamp: T0 }),
  );

  test("ingests a well-formed message", async () => {
    const ingest = jest.fn(async () => ({
      update: {
        tripId: "trip-1",
        sequence: 0,
        lat: 0.01,
        lng: 0,
        accuracy: 10,
        speed: null,
        heading: null,
        timestamp: T0,
        nearestStopId: null,
        distanceToStopMeters: null,
        receivedAt: T0,
      },
      previousStopOrdinal: 0,
      currentStopOrdinal: 0,
      reachedTerminus: false,
      anomalies: [],
      state: "ACTIVE" as const,
    }));
    const handle = createGpsHandler({ stateMachine: { ingest } });

    const result = await handle("gps/trip-1", payload);

    expect(result?.state).toBe("ACTIVE");
    expect(ingest).toHaveBeenCalledWith("trip-1", {
      lat: 0.01,
      lng: 0,
      accuracy: 10,
      speed: null,
      heading: null,
      timestamp: T0,
    });
  });

  test("drops messages on an unexpected topic", async () => {
    const ingest = jest.fn();
    const handle = createGpsHandler({ stateMachine: { ingest } });

    await expect(handle("gps/a/b", payload)).resolves.toBeNull();
    expect(ingest).not.toHaveBeenCalled();
  });

  test("logs ingestion failures instead of throwing", async () => {
    const handle = createGpsHandler({
      stateMachine: {
        ingest: async () => {
          throw new InvalidStateError("Trip trip-1 is COMPLETED and accepts no updates");
        },
      },
    });

    await expect(handle("gps/trip-1", payload)).resolves.toBeNull();
    expect(console.warn).toHaveBeenCalledWith(
      "[ingestion.reject]",
      expect.objectContaining({ reason: "invalid_state", tripId: "trip-1", source: "mqtt" }),
    );
  });
});
