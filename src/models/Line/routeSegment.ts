import { InferSchemaType, model, Schema } from "mongoose";
import type { ObjectIdExtendType } from "@/types";
import { lineStringSchema } from "@/models/geometry";
import { modelName as LineModelName } from "./line";
import { modelName as StopModelName } from "./stop";

export const schema = new Schema(
  {
    line: { type: Schema.Types.ObjectId, ref: LineModelName, required: true, index: true },
    from_stop: { type: Schema.Types.ObjectId, ref: StopModelName, required: true },
    to_stop: { type: Schema.Types.ObjectId, ref: StopModelName, required: true },
    path: { type: lineStringSchema, required: true },
    distance_km: { type: Number, required: true, min: 0 },
    duration_minutes: { type: Number, min: 0, default: null },
  },
  {
    timestamps: { createdAt: "created_at", updatedAt: "updated_at" },
  },
);

schema.index({ line: 1, from_stop: 1, to_stop: 1 }, { unique: true });

type RouteSegmentType = InferSchemaType<typeof schema> & ObjectIdExtendType;

const modelName = "bu_route_segments";
export default model(modelName, schema, modelName);
export type { RouteSegmentType };
export { modelName };
