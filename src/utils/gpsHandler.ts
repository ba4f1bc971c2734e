import type { IngestResult, TripStateMachine } from "@/services/tracking/tripStateMachine";
import { classifyRejectReason, logRejectedReport } from "@/services/tracking/rejects";
import { errorMessage } from "@/utils/errors";
import { parseGpsPayload, parseGpsTopic } from "./gps";

type GpsHandlerOptions = {
  stateMachine: Pick<TripStateMachine, "ingest">;
  topicPrefix?: string;
};

/**
 * Turns one broker message into an ingest call. Rejected messages are
 * logged and resolve to null; the broker loop never sees an error.
 */
export function createGpsHandler(options: GpsHandlerOptions) {
  const prefix = options.topicPrefix ?? "gps";

  return async function handleGpsMessage(
    topic: string,
    payload: Buffer,
  ): Promise<IngestResult | null> {
    const tripId = parseGpsTopic(topic, prefix);
    if (!tripId) {
      logRejectedReport("invalid_topic", {
        source: "mqtt",
        topic,
        message: `Topic must match ${prefix}/{tripId}`,
      });
      return null;
    }

    try {
      const report = parseGpsPayload(payload);
      return await options.stateMachine.ingest(tripId, report);
    } catch (error) {
      logRejectedReport(classifyRejectReason(error), {
        tripId,
        source: "mqtt",
        topic,
        message: errorMessage(error),
      });
      return null;
    }
  };
}
