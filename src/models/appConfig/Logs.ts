import { model, Schema, InferSchemaType } from "mongoose";
import type { ObjectIdExtendType } from "@/types";

const REQUEST_LOG_RETENTION_SECONDS = 30 * 24 * 60 * 60;

// failed requests only; see libs/Logging
export const schema = new Schema(
  {
    requestId: { type: String, index: true },
    method: { type: String },
    url: { type: String },
    origin: { type: String },
    req_ip: { type: String },
    trip_id: { type: String, index: true, default: null },
    error_code: { type: String, default: null },
    responseCode: { type: Number, required: true },
    data: { type: Object },
    query: { type: Object },
    param: { type: Object },
    headers: { type: Object },
    responseData: { type: Object },
    timeTaken: { type: Number },
    cpuUsageStartUser: { type: Number },
    cpuUsageStartSystem: { type: Number },
    cpuUsageEndUser: { type: Number },
    cpuUsageEndSystem: { type: Number },
    memoryRssStart: { type: Number },
    memoryRssEnd: { type: Number },
    memoryHeapUsedStart: { type: Number },
    memoryHeapUsedEnd: { type: Number },
    startAt: { type: Date },
    endAt: { type: Date },
  },
  {
    timestamps: { createdAt: "created_at", updatedAt: false },
  },
);

schema.index({ created_at: 1 }, { expireAfterSeconds: REQUEST_LOG_RETENTION_SECONDS });

export const modelName = "app_request_logs";
export type RequestLogType = InferSchemaType<typeof schema> & ObjectIdExtendType;
export default model(modelName, schema, modelName);
