import request from "supertest";
import { createServer } from "@/server";
import { MINUTE, T0, createTestContext, silenceConsole, type TestContext } from "./fixtures";

const api = "/api/v1";

function setup() {
  const context = createTestContext();
  const app = createServer(context.engine, {
    health: async () => ({ database: { backend: "memory" } }),
  });
  return { context, app };
}

async function createStartedTrip(app: ReturnType<typeof createServer>): Promise<string> {
  const created = await request(app)
    .post(`${api}/trips`)
    .send({ busId: "bus-1", driverId: "driver-1", lineId: "line-1" });
  const tripId: string = created.body.id;
  await request(app).post(`${api}/trips/${tripId}/start`);
  return tripId;
}

function locationBody(tripId: string, overrides: Record<string, unknown> = {}) {
  return {
    tripId,
    latitude: 0.01,
    longitude: 0,
    accuracy: 10,
    timestamp: new Date(T0 + MINUTE).toISOString(),
    ...overrides,
  };
}

describe("http api", () => {
  let context: TestContext;
  let app: ReturnType<typeof createServer>;

  beforeEach(() => {
    silenceConsole();
    ({ context, app } = setup());
  });

  describe("trips", () => {
    test("creates and starts a trip", async () => {
      const created = await request(app)
        .post(`${api}/trips`)
        .send({ busId: "bus-1", driverId: "driver-1", lineId: "line-1" });

      expect(created.status).toBe(201);
      expect(created.body).toMatchObject({
        bus_id: "bus-1",
        driver_id: "driver-1",
        line_id: "line-1",
        state: "PENDING",
        created_at: "2024-01-15T08:00:00.000Z",
        started_at: null,
        last_location: null,
      });

      const started = await request(app).post(`${api}/trips/${created.body.id}/start`);
      expect(started.status).toBe(200);
      expect(started.body.state).toBe("ACTIVE");
      expect(started.body.started_at).toBe("2024-01-15T08:00:00.000Z");
    });

    test("rejects a trip without a driver", async () => {
      const res = await request(app)
        .post(`${api}/trips`)
        .send({ busId: "bus-1", lineId: "line-1" });

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("VALIDATION_ERROR");
    });

    test("returns 404 for an unknown bus", async () => {
      const res = await request(app)
        .post(`${api}/trips`)
        .send({ busId: "bus-9", driverId: "driver-1", lineId: "line-1" });

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: "NOT_FOUND", message: "Bus bus-9 not found" });
    });

    test("returns 409 when starting an active trip twice", async () => {
      const tripId = await createStartedTrip(app);

      const res = await request(app).post(`${api}/trips/${tripId}/start`);

      expect(res.status).toBe(409);
      expect(res.body.error).toBe("INVALID_STATE");
    });

    test("completes a trip with a summary", async () => {
      const tripId = await createStartedTrip(app);
      context.clock.advance(30 * MINUTE);

      const res = await request(app).post(`${api}/trips/${tripId}/complete`);

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        state: "COMPLETED",
        end_reason: "driver",
        ended_at: "2024-01-15T08:30:00.000Z",
        summary: { distance_km: 0, average_speed_kmh: 0, duration_ms: 30 * MINUTE },
      });
    });

    test("lists anomalies and validates the since filter", async () => {
      const tripId = await createStartedTrip(app);

      const listed = await request(app).get(`${api}/trips/${tripId}/anomalies`);
      expect(listed.status).toBe(200);
      expect(listed.body).toEqual({ data: [] });

      const invalid = await request(app)
        .get(`${api}/trips/${tripId}/anomalies`)
        .query({ since: "last week" });
      expect(invalid.status).toBe(400);
    });
  });

  describe("location updates", () => {
    test("accepts a fix for an active trip", async () => {
      const tripId = await createStartedTrip(app);

      const res = await request(app)
        .post(`${api}/location-update`)
        .send(locationBody(tripId, { speed: 25, heading: 0 }));

      expect(res.status).toBe(202);
      expect(res.body).toMatchObject({
        accepted: true,
        state: "ACTIVE",
        reached_terminus: false,
        anomalies: [],
        update: {
          trip_id: tripId,
          sequence: 0,
          lat: 0.01,
          lng: 0,
          speed: 25,
          heading: 0,
          timestamp: "2024-01-15T08:01:00.000Z",
        },
      });

      const trip = await request(app).get(`${api}/trips/${tripId}`);
      expect(trip.body.update_count).toBe(1);
      expect(trip.body.last_location.timestamp).toBe("2024-01-15T08:01:00.000Z");
    });

    test("rejects an imprecise fix", async () => {
      const tripId = await createStartedTrip(app);

      const res = await request(app)
        .post(`${api}/location-update`)
        .send(locationBody(tripId, { accuracy: 500 }));

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        error: "VALIDATION_ERROR",
        message: "Accuracy 500m exceeds the 200m ceiling",
      });
      expect(console.warn).toHaveBeenCalledWith(
        "[ingestion.reject]",
        expect.objectContaining({ reason: "invalid_payload", tripId, source: "http" }),
      );
    });

    test("rejects fixes for a pending trip", async () => {
      const created = await request(app)
        .post(`${api}/trips`)
        .send({ busId: "bus-1", driverId: "driver-1", lineId: "line-1" });

      const res = await request(app)
        .post(`${api}/location-update`)
        .send(locationBody(created.body.id));

      expect(res.status).toBe(409);
    });

    test("requires coordinates", async () => {
      const res = await request(app)
        .post(`${api}/location-update`)
        .send(locationBody("trip-1", { latitude: "north" }));

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("VALIDATION_ERROR");
    });

    test("answers malformed JSON with 400", async () => {
      const res = await request(app)
        .post(`${api}/location-update`)
        .set("Content-Type", "application/json")
        .send('{"tripId": ');

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("INVALID_JSON");
    });
  });

  describe("read endpoints", () => {
    test("estimates the route of an active trip", async () => {
      const tripId = await createStartedTrip(app);
      await request(app).post(`${api}/location-update`).send(locationBody(tripId));

      const res = await request(app).get(`${api}/route-estimate`).query({ tripId });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        trip_id: tripId,
        bus_id: "bus-1",
        line_id: "line-1",
        current_location: { lat: 0.01, lng: 0, synthesized: false },
      });
    });

    test("returns 404 for arrivals at an unknown stop", async () => {
      const res = await request(app).get(`${api}/arrivals`).query({ stopId: "stop-z" });

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: "NOT_FOUND", message: "Stop stop-z not found" });
    });

    test("requires a stop for arrivals", async () => {
      const res = await request(app).get(`${api}/arrivals`);
      expect(res.status).toBe(400);
    });

    test("returns an empty list when no bus serves the stop", async () => {
      const res = await request(app).get(`${api}/arrivals`).query({ stopId: "stop-x" });

      expect(res.status).toBe(200);
      expect(res.body).toEqual([]);
    });

    test("renders a line for the map", async () => {
      const res = await request(app).get(`${api}/visualization`).query({ lineId: "line-1" });

      expect(res.status).toBe(200);
      expect(res.body.line).toEqual({
        id: "line-1",
        name: "Central",
        color: "#1e88e5",
        total_stops: 4,
      });
      expect(res.body.markers.map((marker: { id: string }) => marker.id)).toEqual([
        "stop-a",
        "stop-b",
        "stop-c",
        "stop-d",
      ]);
      expect(res.body.active_buses).toEqual([]);
    });

    test("returns 404 for an unknown line", async () => {
      const res = await request(app).get(`${api}/visualization`).query({ lineId: "line-9" });
      expect(res.status).toBe(404);
    });
  });

  test("reports health", async () => {
    const res = await request(app).get(`${api}/health`);

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      status: "ok",
      pendingTripLocks: 0,
      cache: { backend: "memory", entries: 0, ttlMs: 5 * MINUTE },
      database: { backend: "memory" },
    });
  });

  test("answers unknown routes with 404", async () => {
    const res = await request(app).get(`${api}/buses`);

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "NOT_FOUND", message: "Route not found" });
  });
});
