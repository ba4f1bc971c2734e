import { InferSchemaType, model, Schema } from "mongoose";
import type { ObjectIdExtendType } from "@/types";

export const schema = new Schema(
  {
    name: { type: String, required: true, trim: true },
    phone: { type: String, trim: true },
    // historical rating on a 0-5 scale; unrated drivers have none
    rating: { type: Number, min: 0, max: 5, default: null },
  },
  {
    timestamps: { createdAt: "created_at", updatedAt: "updated_at" },
  },
);

type DriverType = InferSchemaType<typeof schema> & ObjectIdExtendType;

const modelName = "bu_drivers";
export default model(modelName, schema, modelName);
export type { DriverType };
export { modelName };
