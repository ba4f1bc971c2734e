import { InferSchemaType, model, Schema } from "mongoose";
import type { ObjectIdExtendType } from "@/types";
import { modelName as BusModelName } from "@/models/Bus/bus";
import { modelName as DriverModelName } from "@/models/Bus/driver";
import { modelName as LineModelName } from "@/models/Line/line";
import { modelName as StopModelName } from "@/models/Line/stop";

export const TRIP_STATES = ["PENDING", "ACTIVE", "COMPLETED", "ABORTED"] as const;
export const TRIP_END_REASONS = ["driver", "terminus", "inactivity"] as const;

export const locationFields = {
  sequence: { type: Number, required: true, min: 0 },
  lat: { type: Number, required: true, min: -90, max: 90 },
  lng: { type: Number, required: true, min: -180, max: 180 },
  accuracy: { type: Number, required: true, min: 0 },
  speed: { type: Number, min: 0, default: null },
  heading: { type: Number, min: 0, max: 360, default: null },
  timestamp: { type: Date, required: true },
  nearest_stop: { type: Schema.Types.ObjectId, ref: StopModelName, default: null },
  distance_to_stop_m: { type: Number, default: null },
  received_at: { type: Date, required: true },
};

const locationUpdateSchema = new Schema(locationFields, { _id: false });

const summarySchema = new Schema(
  {
    distance_km: { type: Number, required: true, min: 0 },
    average_speed_kmh: { type: Number, default: null },
    duration_ms: { type: Number, required: true, min: 0 },
  },
  { _id: false },
);

export const schema = new Schema(
  {
    bus: { type: Schema.Types.ObjectId, ref: BusModelName, required: true, index: true },
    driver: { type: Schema.Types.ObjectId, ref: DriverModelName, required: true, index: true },
    line: { type: Schema.Types.ObjectId, ref: LineModelName, required: true },
    state: { type: String, enum: TRIP_STATES, required: true, default: "PENDING" },
    started_at: { type: Date, default: null },
    ended_at: { type: Date, default: null },
    end_reason: { type: String, enum: [...TRIP_END_REASONS, null], default: null },
    current_stop_ordinal: { type: Number, required: true, min: 0, default: 0 },
    last_update_at: { type: Date, default: null },
    update_count: { type: Number, required: true, min: 0, default: 0 },
    // the last two fixes; the history lives in tr_location_updates
    recent_updates: { type: [locationUpdateSchema], default: [] },
    summary: { type: summarySchema, default: null },
  },
  {
    timestamps: { createdAt: "created_at", updatedAt: "updated_at" },
  },
);

schema.index({ state: 1, line: 1 });
schema.index({ state: 1, last_update_at: 1 });

type TripType = InferSchemaType<typeof schema> & ObjectIdExtendType;

const modelName = "tr_trips";
export default model(modelName, schema, modelName);
export type { TripType };
export { modelName };
