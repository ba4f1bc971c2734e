import { isValidObjectId, Types } from "mongoose";
import type {
  Anomaly,
  BusSnapshot,
  Coordinate,
  DriverSnapshot,
  LineSnapshot,
  LocationUpdate,
  RouteSegment,
  Stop,
  TripEndReason,
  TripSnapshot,
  TripState,
  TripSummary,
  WaitingPassengerReport,
} from "@/types";
import Bus from "@/models/Bus/bus";
import Driver from "@/models/Bus/driver";
import Line from "@/models/Line/line";
import RouteSegmentModel from "@/models/Line/routeSegment";
import StopModel from "@/models/Line/stop";
import AnomalyModel from "@/models/Tracking/anomaly";
import LocationUpdateModel from "@/models/Tracking/locationUpdate";
import Trip from "@/models/Tracking/trip";
import WaitingPassengers from "@/models/Tracking/waitingPassengers";
import {
  InvalidStateError,
  NotFoundError,
  StaleTimestampError,
} from "@/utils/errors";
import { normalizeLine } from "./memory";
import type {
  NewAnomaly,
  TrackingRepositories,
  TripFilter,
  TripTransition,
} from "./types";

type GeoPoint = { type?: string; coordinates: number[] };
type GeoLine = { type?: string; coordinates: number[][] };

type BusLean = {
  _id: Types.ObjectId;
  number: string;
  capacity?: number | null;
  average_speed_kmh?: number | null;
};

type DriverLean = {
  _id: Types.ObjectId;
  name: string;
  rating?: number | null;
};

type StopLean = {
  _id: Types.ObjectId;
  name: string;
  location: GeoPoint;
};

type LineLean = {
  _id: Types.ObjectId;
  name: string;
  color?: string | null;
  stops: Array<{ stop: Types.ObjectId; ordinal: number }>;
};

type SegmentLean = {
  line: Types.ObjectId;
  from_stop: Types.ObjectId;
  to_stop: Types.ObjectId;
  path: GeoLine;
  distance_km: number;
  duration_minutes?: number | null;
};

type LocationUpdateLean = {
  sequence: number;
  lat: number;
  lng: number;
  accuracy: number;
  speed?: number | null;
  heading?: number | null;
  timestamp: Date;
  nearest_stop?: Types.ObjectId | null;
  distance_to_stop_m?: number | null;
  received_at: Date;
};

type TripLean = {
  _id: Types.ObjectId;
  bus: Types.ObjectId;
  driver: Types.ObjectId;
  line: Types.ObjectId;
  state: TripState;
  started_at?: Date | null;
  ended_at?: Date | null;
  end_reason?: TripEndReason | null;
  current_stop_ordinal: number;
  last_update_at?: Date | null;
  update_count: number;
  recent_updates?: LocationUpdateLean[];
  summary?: {
    distance_km: number;
    average_speed_kmh?: number | null;
    duration_ms: number;
  } | null;
  created_at: Date;
};

type AnomalyLean = {
  _id: Types.ObjectId;
  trip: Types.ObjectId;
  bus: Types.ObjectId;
  kind: Anomaly["kind"];
  update_sequence: number;
  detected_at: Date;
  severity: Anomaly["severity"];
  location: GeoPoint;
  observed_speed_kmh?: number | null;
  distance_km?: number | null;
  elapsed_ms?: number | null;
  threshold_kmh?: number | null;
  distance_off_route_m?: number | null;
  previous_distance_off_route_m?: number | null;
  threshold_m?: number | null;
};

type WaitingLean = {
  stop: Types.ObjectId;
  line?: Types.ObjectId | null;
  count: number;
  reported_at: Date;
};

// the trip document keeps this many fixes; the rest live in tr_location_updates
const RECENT_UPDATES_KEPT = 2;

function toPoint(coordinate: Coordinate): { type: "Point"; coordinates: number[] } {
  return { type: "Point", coordinates: [coordinate.lng, coordinate.lat] };
}

function fromPoint(point: GeoPoint): Coordinate {
  return { lat: Number(point.coordinates[1]), lng: Number(point.coordinates[0]) };
}

function toMillis(value: Date | null | undefined): number | null {
  return value ? value.getTime() : null;
}

function toLocationUpdate(tripId: string, entry: LocationUpdateLean): LocationUpdate {
  return {
    tripId,
    sequence: entry.sequence,
    lat: entry.lat,
    lng: entry.lng,
    accuracy: entry.accuracy,
    speed: entry.speed ?? null,
    heading: entry.heading ?? null,
    timestamp: entry.timestamp.getTime(),
    nearestStopId: entry.nearest_stop ? String(entry.nearest_stop) : null,
    distanceToStopMeters: entry.distance_to_stop_m ?? null,
    receivedAt: entry.received_at.getTime(),
  };
}

function toSummary(summary: TripLean["summary"]): TripSummary | null {
  if (!summary) return null;
  return {
    distanceKm: summary.distance_km,
    averageSpeedKmh: summary.average_speed_kmh ?? null,
    durationMs: summary.duration_ms,
  };
}

function toTripSnapshot(doc: TripLean): TripSnapshot {
  const id = String(doc._id);
  return Object.freeze({
    id,
    busId: String(doc.bus),
    driverId: String(doc.driver),
    lineId: String(doc.line),
    state: doc.state,
    createdAt: doc.created_at.getTime(),
    startedAt: toMillis(doc.started_at),
    endedAt: toMillis(doc.ended_at),
    endReason: doc.end_reason ?? null,
    currentStopOrdinal: doc.current_stop_ordinal,
    lastUpdateAt: toMillis(doc.last_update_at),
    updateCount: doc.update_count,
    recentUpdates: Object.freeze(
      (doc.recent_updates ?? []).map((entry) => toLocationUpdate(id, entry)),
    ),
    summary: toSummary(doc.summary),
  });
}

function toAnomaly(doc: AnomalyLean): Anomaly {
  const base = {
    id: String(doc._id),
    tripId: String(doc.trip),
    busId: String(doc.bus),
    updateSequence: doc.update_sequence,
    detectedAt: doc.detected_at.getTime(),
    severity: doc.severity,
    location: fromPoint(doc.location),
  };

  if (doc.kind === "SpeedAnomaly") {
    return {
      ...base,
      kind: "SpeedAnomaly",
      observedSpeedKmh: doc.observed_speed_kmh ?? null,
      distanceKm: doc.distance_km ?? 0,
      elapsedMs: doc.elapsed_ms ?? 0,
      thresholdKmh: doc.threshold_kmh ?? 0,
    };
  }

  return {
    ...base,
    kind: "RouteDeviation",
    distanceOffRouteMeters: doc.distance_off_route_m ?? 0,
    previousDistanceOffRouteMeters: doc.previous_distance_off_route_m ?? 0,
    thresholdMeters: doc.threshold_m ?? 0,
  };
}

function toAnomalyRecord(anomaly: NewAnomaly): Record<string, unknown> {
  const base = {
    trip: anomaly.tripId,
    bus: anomaly.busId,
    kind: anomaly.kind,
    update_sequence: anomaly.updateSequence,
    detected_at: new Date(anomaly.detectedAt),
    severity: anomaly.severity,
    location: toPoint(anomaly.location),
  };

  if (anomaly.kind === "SpeedAnomaly") {
    return {
      ...base,
      observed_speed_kmh: anomaly.observedSpeedKmh,
      distance_km: anomaly.distanceKm,
      elapsed_ms: anomaly.elapsedMs,
      threshold_kmh: anomaly.thresholdKmh,
    };
  }

  return {
    ...base,
    distance_off_route_m: anomaly.distanceOffRouteMeters,
    previous_distance_off_route_m: anomaly.previousDistanceOffRouteMeters,
    threshold_m: anomaly.thresholdMeters,
  };
}

function tripQuery(filter: TripFilter): Record<string, unknown> {
  const query: Record<string, unknown> = {};
  if (filter.state) query.state = filter.state;
  if (filter.lineId) {
    if (!isValidObjectId(filter.lineId)) return { _id: null };
    query.line = filter.lineId;
  }
  return query;
}

/**
 * Repositories over the mongoose models. Lines are joined in code from
 * the line, stop and route segment collections.
 */
export function createMongoRepositories(): TrackingRepositories {
  async function assembleLines(docs: LineLean[]): Promise<LineSnapshot[]> {
    if (docs.length === 0) return [];

    const stopIds = docs.flatMap((doc) => doc.stops.map((entry) => entry.stop));
    const [stops, segments] = await Promise.all([
      StopModel.find({ _id: { $in: stopIds } }).lean<StopLean[]>().exec(),
      RouteSegmentModel.find({ line: { $in: docs.map((doc) => doc._id) } })
        .lean<SegmentLean[]>()
        .exec(),
    ]);
    const stopsById = new Map(stops.map((stop) => [String(stop._id), stop]));

    return docs.map((doc) => {
      const lineId = String(doc._id);
      const lineStops = doc.stops.flatMap((entry) => {
        const stop = stopsById.get(String(entry.stop));
        if (!stop) {
          console.warn("[repository] line references a missing stop", {
            lineId,
            stopId: String(entry.stop),
          });
          return [];
        }
        return [
          {
            id: String(stop._id),
            name: stop.name,
            coordinate: fromPoint(stop.location),
            ordinal: entry.ordinal,
          },
        ];
      });

      const lineSegments: RouteSegment[] = segments
        .filter((segment) => String(segment.line) === lineId)
        .map((segment) => ({
          fromStopId: String(segment.from_stop),
          toStopId: String(segment.to_stop),
          path: segment.path.coordinates.map(([lng, lat]) => ({ lat, lng })),
          distanceKm: segment.distance_km,
          durationMinutes: segment.duration_minutes ?? null,
        }));

      return normalizeLine({
        id: lineId,
        name: doc.name,
        color: doc.color ?? null,
        stops: lineStops,
        segments: lineSegments,
      });
    });
  }

  async function findTrip(tripId: string): Promise<TripLean | null> {
    if (!isValidObjectId(tripId)) return null;
    return Trip.findById(tripId).lean<TripLean | null>().exec();
  }

  async function committedCount(tripId: string): Promise<number> {
    const doc = await Trip.findById(tripId, { update_count: 1 })
      .lean<Pick<TripLean, "_id" | "update_count"> | null>()
      .exec();
    return doc ? doc.update_count : 0;
  }

  async function explainRejectedAppend(tripId: string, timestamp: number): Promise<never> {
    const current = await findTrip(tripId);
    if (!current) {
      throw new NotFoundError("Trip", tripId);
    }
    if (current.state !== "ACTIVE") {
      throw new InvalidStateError(
        `Trip ${tripId} is ${current.state} and accepts no updates`,
      );
    }
    const last = toMillis(current.last_update_at);
    throw new StaleTimestampError(
      last !== null && timestamp < last
        ? "Location timestamp is older than the last recorded update"
        : "Location update was not recorded",
    );
  }

  return {
    buses: {
      async getBus(busId): Promise<BusSnapshot | null> {
        if (!isValidObjectId(busId)) return null;
        const doc = await Bus.findById(busId).lean<BusLean | null>().exec();
        if (!doc) return null;
        return {
          id: String(doc._id),
          number: doc.number,
          capacity: doc.capacity ?? 0,
          averageSpeedKmh: doc.average_speed_kmh ?? 0,
        };
      },
    },

    drivers: {
      async getDriver(driverId): Promise<DriverSnapshot | null> {
        if (!isValidObjectId(driverId)) return null;
        const doc = await Driver.findById(driverId).lean<DriverLean | null>().exec();
        if (!doc) return null;
        return { id: String(doc._id), name: doc.name, rating: doc.rating ?? null };
      },
    },

    lines: {
      async getLine(lineId) {
        if (!isValidObjectId(lineId)) return null;
        const doc = await Line.findById(lineId).lean<LineLean | null>().exec();
        if (!doc) return null;
        const [line] = await assembleLines([doc]);
        return line ?? null;
      },

      async getStop(stopId): Promise<Stop | null> {
        if (!isValidObjectId(stopId)) return null;
        const doc = await StopModel.findById(stopId).lean<StopLean | null>().exec();
        if (!doc) return null;
        return { id: String(doc._id), name: doc.name, coordinate: fromPoint(doc.location) };
      },

      async listLinesForStop(stopId) {
        if (!isValidObjectId(stopId)) return [];
        const docs = await Line.find({ "stops.stop": stopId }).lean<LineLean[]>().exec();
        return assembleLines(docs);
      },
    },

    trips: {
      async createTrip(input) {
        const created = await Trip.create({
          bus: input.busId,
          driver: input.driverId,
          line: input.lineId,
          state: "PENDING",
          created_at: new Date(input.createdAt),
        });
        const doc = await findTrip(String(created._id));
        if (!doc) {
          throw new NotFoundError("Trip", String(created._id));
        }
        return toTripSnapshot(doc);
      },

      async getTrip(tripId) {
        const doc = await findTrip(tripId);
        return doc ? toTripSnapshot(doc) : null;
      },

      async listTrips(filter) {
        const docs = await Trip.find(tripQuery(filter))
          .lean<TripLean[]>()
          .exec();
        return docs.map(toTripSnapshot);
      },

      async listLocationUpdates(tripId) {
        if (!isValidObjectId(tripId)) throw new NotFoundError("Trip", tripId);
        const doc = await Trip.findById(tripId, { update_count: 1 })
          .lean<Pick<TripLean, "_id" | "update_count"> | null>()
          .exec();
        if (!doc) throw new NotFoundError("Trip", tripId);
        const entries = await LocationUpdateModel.find({
          trip: tripId,
          sequence: { $lt: doc.update_count },
        })
          .sort({ sequence: 1 })
          .lean<LocationUpdateLean[]>()
          .exec();
        return entries.map((entry) => toLocationUpdate(tripId, entry));
      },

      async appendLocation(tripId, update, currentStopOrdinal) {
        if (!isValidObjectId(tripId)) throw new NotFoundError("Trip", tripId);
        const timestamp = new Date(update.timestamp);
        const entry: LocationUpdateLean = {
          sequence: update.sequence,
          lat: update.lat,
          lng: update.lng,
          accuracy: update.accuracy,
          speed: update.speed,
          heading: update.heading,
          timestamp,
          nearest_stop:
            update.nearestStopId && isValidObjectId(update.nearestStopId)
              ? new Types.ObjectId(update.nearestStopId)
              : null,
          distance_to_stop_m: update.distanceToStopMeters,
          received_at: new Date(update.receivedAt),
        };

        // history first; the trip's update_count decides which sequences count
        await LocationUpdateModel.replaceOne(
          { trip: tripId, sequence: update.sequence },
          { trip: tripId, ...entry },
          { upsert: true },
        ).exec();

        // one conditional write: state, sequence, monotonic timestamp, pointer max
        const doc = await Trip.findOneAndUpdate(
          {
            _id: tripId,
            state: "ACTIVE",
            update_count: update.sequence,
            $or: [{ last_update_at: null }, { last_update_at: { $lte: timestamp } }],
          },
          {
            $push: { recent_updates: { $each: [entry], $slice: -RECENT_UPDATES_KEPT } },
            $max: { current_stop_ordinal: currentStopOrdinal },
            $set: { last_update_at: timestamp },
            $inc: { update_count: 1 },
          },
          { new: true },
        )
          .lean<TripLean | null>()
          .exec();

        if (!doc) {
          if (update.sequence >= (await committedCount(tripId))) {
            await LocationUpdateModel.deleteOne({ trip: tripId, sequence: update.sequence }).exec();
          }
          return explainRejectedAppend(tripId, update.timestamp);
        }
        return toTripSnapshot(doc);
      },

      async transition(tripId, from, patch: TripTransition) {
        if (!isValidObjectId(tripId)) throw new NotFoundError("Trip", tripId);

        const set: Record<string, unknown> = { state: patch.state };
        if (patch.startedAt !== undefined) set.started_at = new Date(patch.startedAt);
        if (patch.endedAt !== undefined) set.ended_at = new Date(patch.endedAt);
        if (patch.endReason !== undefined) set.end_reason = patch.endReason;
        if (patch.summary !== undefined) {
          set.summary = {
            distance_km: patch.summary.distanceKm,
            average_speed_kmh: patch.summary.averageSpeedKmh,
            duration_ms: patch.summary.durationMs,
          };
        }

        const doc = await Trip.findOneAndUpdate(
          { _id: tripId, state: from },
          { $set: set },
          { new: true },
        )
          .lean<TripLean | null>()
          .exec();
        if (doc) return toTripSnapshot(doc);

        const exists = await Trip.exists({ _id: tripId }).exec();
        if (!exists) throw new NotFoundError("Trip", tripId);
        return null;
      },
    },

    anomalies: {
      async append(anomaly) {
        const created = await AnomalyModel.create(toAnomalyRecord(anomaly));
        const stored: Anomaly = { ...anomaly, id: String(created._id) };
        return Object.freeze(stored);
      },

      async listForTrip(tripId, since) {
        if (!isValidObjectId(tripId)) return [];
        const query: Record<string, unknown> = { trip: tripId };
        if (since !== undefined) query.detected_at = { $gte: new Date(since) };
        const docs = await AnomalyModel.find(query)
          .sort({ detected_at: 1 })
          .lean<AnomalyLean[]>()
          .exec();
        return docs.map(toAnomaly);
      },
    },

    waitingPassengers: {
      async listForStop(stopId, since): Promise<WaitingPassengerReport[]> {
        if (!isValidObjectId(stopId)) return [];
        const docs = await WaitingPassengers.find({
          stop: stopId,
          reported_at: { $gte: new Date(since) },
        })
          .lean<WaitingLean[]>()
          .exec();
        return docs.map((doc) => ({
          stopId: String(doc.stop),
          lineId: doc.line ? String(doc.line) : null,
          count: doc.count,
          timestamp: doc.reported_at.getTime(),
        }));
      },
    },
  };
}
