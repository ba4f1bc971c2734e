import {
  InvalidStateError,
  NotFoundError,
  StaleTimestampError,
  ValidationError,
} from "@/utils/errors";

export type RejectReason =
  | "invalid_topic"
  | "invalid_payload"
  | "invalid_state"
  | "not_found"
  | "stale_timestamp"
  | "persistence_error";

export function classifyRejectReason(
  error: unknown,
): Exclude<RejectReason, "invalid_topic"> {
  if (error instanceof StaleTimestampError) {
    return "stale_timestamp";
  }

  if (error instanceof ValidationError) {
    return "invalid_payload";
  }

  if (error instanceof InvalidStateError) {
    return "invalid_state";
  }

  if (error instanceof NotFoundError) {
    return "not_found";
  }

  return "persistence_error";
}

type RejectLogContext = {
  tripId?: string;
  source?: "http" | "mqtt";
  topic?: string;
  message?: string;
  timestamp?: number;
};

export function logRejectedReport(
  reason: RejectReason,
  context: RejectLogContext,
): void {
  console.warn("[ingestion.reject]", {
    reason,
    tripId: context.tripId ?? null,
    source: context.source ?? null,
    topic: context.topic ?? null,
    message: context.message ?? null,
    timestamp: context.timestamp ?? Date.now(),
  });
}
