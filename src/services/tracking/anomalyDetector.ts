import type {
  Anomaly,
  AnomalySeverity,
  LineSnapshot,
  LocationUpdate,
  TripSnapshot,
} from "@/types";
import type { AnomalyRepository, NewAnomaly } from "@/services/repository/types";
import { distanceKm } from "@/utils/geo";
import { deviationFromLine } from "./lineGeometry";

export type AnomalyRules = {
  maxPlausibleSpeedKmh: number;
  maxDeviationMeters: number;
};

export type SpeedEvaluation = {
  distanceKm: number;
  elapsedMs: number;
  // null when both fixes share a timestamp
  speedKmh: number | null;
};

export type InspectInput = {
  trip: TripSnapshot;
  line: LineSnapshot;
  previous: LocationUpdate | null;
  current: LocationUpdate;
};

export type AnomalyDetector = {
  inspect: (input: InspectInput) => Promise<Anomaly[]>;
};

type AnomalyDetectorOptions = {
  anomalies: AnomalyRepository;
  rules: AnomalyRules;
  now?: () => number;
};

const MS_PER_HOUR = 3_600_000;

export function evaluateSpeed(
  previous: Pick<LocationUpdate, "lat" | "lng" | "timestamp">,
  current: Pick<LocationUpdate, "lat" | "lng" | "timestamp">,
): SpeedEvaluation {
  const distance = distanceKm(previous, current);
  const elapsedMs = current.timestamp - previous.timestamp;
  if (elapsedMs <= 0) {
    return { distanceKm: distance, elapsedMs, speedKmh: null };
  }

  return {
    distanceKm: distance,
    elapsedMs,
    speedKmh: distance / (elapsedMs / MS_PER_HOUR),
  };
}

function severityFor(observed: number | null, threshold: number): AnomalySeverity {
  if (observed === null || observed >= threshold * 2) return "high";
  return "medium";
}

/**
 * Flags implausible speed between the last two fixes and sustained
 * distance from the line's route. Purely observational: findings are
 * appended to the anomaly log and never reject the update itself.
 */
export function createAnomalyDetector(
  options: AnomalyDetectorOptions,
): AnomalyDetector {
  const now = options.now ?? Date.now;

  function detectSpeed(input: InspectInput, previous: LocationUpdate): NewAnomaly | null {
    const evaluation = evaluateSpeed(previous, input.current);
    const threshold = options.rules.maxPlausibleSpeedKmh;

    const implausible =
      evaluation.speedKmh === null
        ? evaluation.distanceKm > 0
        : evaluation.speedKmh > threshold;
    if (!implausible) return null;

    return {
      kind: "SpeedAnomaly",
      tripId: input.trip.id,
      busId: input.trip.busId,
      updateSequence: input.current.sequence,
      detectedAt: now(),
      severity: severityFor(evaluation.speedKmh, threshold),
      location: { lat: input.current.lat, lng: input.current.lng },
      observedSpeedKmh: evaluation.speedKmh,
      distanceKm: evaluation.distanceKm,
      elapsedMs: evaluation.elapsedMs,
      thresholdKmh: threshold,
    };
  }

  function detectDeviation(input: InspectInput, previous: LocationUpdate): NewAnomaly | null {
    const threshold = options.rules.maxDeviationMeters;
    const currentDeviation = deviationFromLine(input.line, input.current);
    if (currentDeviation === null || currentDeviation <= threshold) return null;

    // a single off-route fix is treated as GPS noise
    const previousDeviation = deviationFromLine(input.line, previous);
    if (previousDeviation === null || previousDeviation <= threshold) return null;

    return {
      kind: "RouteDeviation",
      tripId: input.trip.id,
      busId: input.trip.busId,
      updateSequence: input.current.sequence,
      detectedAt: now(),
      severity: severityFor(currentDeviation, threshold),
      location: { lat: input.current.lat, lng: input.current.lng },
      distanceOffRouteMeters: currentDeviation,
      previousDistanceOffRouteMeters: previousDeviation,
      thresholdMeters: threshold,
    };
  }

  async function inspect(input: InspectInput): Promise<Anomaly[]> {
    if (!input.previous) return [];

    const findings = [
      detectSpeed(input, input.previous),
      detectDeviation(input, input.previous),
    ].filter((finding): finding is NewAnomaly => finding !== null);

    const stored: Anomaly[] = [];
    for (const finding of findings) {
      stored.push(await options.anomalies.append(finding));
      console.warn("[anomaly] detected", {
        kind: finding.kind,
        tripId: finding.tripId,
        severity: finding.severity,
        updateSequence: finding.updateSequence,
      });
    }
    return stored;
  }

  return { inspect };
}
