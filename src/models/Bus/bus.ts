import { InferSchemaType, model, Schema } from "mongoose";
import type { ObjectIdExtendType } from "@/types";
import { modelName as DriverModelName } from "./driver";

export const schema = new Schema(
  {
    driver: {
      type: Schema.Types.ObjectId,
      ref: DriverModelName,
      index: true,
      default: null,
    },
    number: { type: String, required: true, trim: true },
    plate: { type: String, trim: true },
    capacity: { type: Number, min: 0, default: 0 },
    average_speed_kmh: { type: Number, min: 0, default: 30 },
    status: { type: Number, index: true, default: 1, enum: [-1, 0, 1] },
  },
  {
    timestamps: { createdAt: "created_at", updatedAt: "updated_at" },
  },
);

schema.index({ number: 1 }, { unique: true });

type BusType = InferSchemaType<typeof schema> & ObjectIdExtendType;

const modelName = "bu_bus";
export default model(modelName, schema, modelName);
export type { BusType };
export { modelName };
