import { InferSchemaType, model, Schema } from "mongoose";
import type { ObjectIdExtendType } from "@/types";
import { modelName as StopModelName } from "./stop";

const lineStopSchema = new Schema(
  {
    stop: { type: Schema.Types.ObjectId, ref: StopModelName, required: true },
    ordinal: { type: Number, required: true, min: 0 },
  },
  { _id: false },
);

export function hasContiguousOrdinals(value: unknown): boolean {
  if (!Array.isArray(value)) {
    return false;
  }

  const ordinals = value
    .map((entry: unknown) =>
      typeof entry === "object" && entry !== null && "ordinal" in entry
        ? Number(entry.ordinal)
        : Number.NaN,
    )
    .sort((a, b) => a - b);
  return ordinals.every((ordinal, index) => ordinal === index);
}

export const schema = new Schema(
  {
    name: { type: String, required: true, trim: true },
    number: { type: String, trim: true },
    color: { type: String, trim: true, match: /^#[0-9a-fA-F]{6}$/ },
    stops: {
      type: [lineStopSchema],
      default: [],
      validate: {
        validator: hasContiguousOrdinals,
        message: "Stop ordinals must run 0..n-1 without gaps",
      },
    },
  },
  {
    timestamps: { createdAt: "created_at", updatedAt: "updated_at" },
  },
);

schema.index({ "stops.stop": 1 });

type LineType = InferSchemaType<typeof schema> & ObjectIdExtendType;

const modelName = "bu_lines";
export default model(modelName, schema, modelName);
export type { LineType };
export { modelName };
