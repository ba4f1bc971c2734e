import { InferSchemaType, model, Schema } from "mongoose";
import type { ObjectIdExtendType } from "@/types";
import { locationFields, modelName as TripModelName } from "./trip";

// full history, one document per fix; a trip counts only sequences below its update_count
export const schema = new Schema(
  {
    trip: { type: Schema.Types.ObjectId, ref: TripModelName, required: true },
    ...locationFields,
  },
  {
    timestamps: { createdAt: "created_at", updatedAt: false },
  },
);

schema.index({ trip: 1, sequence: 1 }, { unique: true });

type LocationUpdateType = InferSchemaType<typeof schema> & ObjectIdExtendType;

const modelName = "tr_location_updates";
export default model(modelName, schema, modelName);
export type { LocationUpdateType };
export { modelName };
