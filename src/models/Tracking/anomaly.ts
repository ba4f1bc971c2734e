import { InferSchemaType, model, Schema } from "mongoose";
import type { ObjectIdExtendType } from "@/types";
import { modelName as BusModelName } from "@/models/Bus/bus";
import { pointSchema } from "@/models/geometry";
import { modelName as TripModelName } from "./trip";

export const ANOMALY_KINDS = ["SpeedAnomaly", "RouteDeviation"] as const;
export const ANOMALY_SEVERITIES = ["low", "medium", "high"] as const;

// fields a kind carries are required only on documents of that kind
function requiredFor(kind: (typeof ANOMALY_KINDS)[number]) {
  return function (this: { kind?: string | null }): boolean {
    return this.kind === kind;
  };
}

export const schema = new Schema(
  {
    trip: { type: Schema.Types.ObjectId, ref: TripModelName, required: true },
    bus: { type: Schema.Types.ObjectId, ref: BusModelName, required: true, index: true },
    kind: { type: String, enum: ANOMALY_KINDS, required: true },
    update_sequence: { type: Number, required: true, min: 0 },
    detected_at: { type: Date, required: true },
    severity: { type: String, enum: ANOMALY_SEVERITIES, required: true },
    location: { type: pointSchema, required: true },

    // SpeedAnomaly
    observed_speed_kmh: { type: Number, default: null },
    distance_km: { type: Number, required: requiredFor("SpeedAnomaly") },
    elapsed_ms: { type: Number, required: requiredFor("SpeedAnomaly") },
    threshold_kmh: { type: Number, required: requiredFor("SpeedAnomaly") },

    // RouteDeviation
    distance_off_route_m: { type: Number, required: requiredFor("RouteDeviation") },
    previous_distance_off_route_m: { type: Number, required: requiredFor("RouteDeviation") },
    threshold_m: { type: Number, required: requiredFor("RouteDeviation") },
  },
  {
    timestamps: { createdAt: "created_at", updatedAt: false },
  },
);

schema.index({ trip: 1, detected_at: -1 });

type AnomalyType = InferSchemaType<typeof schema> & ObjectIdExtendType;

const modelName = "tr_anomalies";
export default model(modelName, schema, modelName);
export type { AnomalyType };
export { modelName };
