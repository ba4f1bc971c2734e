import { InferSchemaType, model, Schema } from "mongoose";
import type { ObjectIdExtendType } from "@/types";
import { modelName as LineModelName } from "@/models/Line/line";
import { modelName as StopModelName } from "@/models/Line/stop";

export const schema = new Schema(
  {
    stop: { type: Schema.Types.ObjectId, ref: StopModelName, required: true },
    line: { type: Schema.Types.ObjectId, ref: LineModelName, default: null },
    count: { type: Number, required: true, min: 0 },
    reported_at: { type: Date, required: true },
  },
  {
    timestamps: { createdAt: "created_at", updatedAt: false },
  },
);

schema.index({ stop: 1, reported_at: -1 });

type WaitingPassengersType = InferSchemaType<typeof schema> & ObjectIdExtendType;

const modelName = "tr_waiting_passengers";
export default model(modelName, schema, modelName);
export type { WaitingPassengersType };
export { modelName };
