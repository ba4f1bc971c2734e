import { InferSchemaType, model, Schema } from "mongoose";
import type { ObjectIdExtendType } from "@/types";
import { pointSchema } from "@/models/geometry";

export const schema = new Schema(
  {
    name: { type: String, required: true, trim: true },
    code: { type: String, trim: true },
    location: { type: pointSchema, required: true },
  },
  {
    timestamps: { createdAt: "created_at", updatedAt: "updated_at" },
  },
);

schema.index({ location: "2dsphere" });

type StopType = InferSchemaType<typeof schema> & ObjectIdExtendType;

const modelName = "bu_stops";
export default model(modelName, schema, modelName);
export type { StopType };
export { modelName };
