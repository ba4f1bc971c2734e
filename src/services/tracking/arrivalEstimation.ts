import type {
  ArrivalEstimate,
  LineSnapshot,
  TripSnapshot,
  WaitingPassengerReport,
} from "@/types";
import type { TrackingRules } from "@/config/tracking";
import type { TrackingRepositories } from "@/services/repository/types";
import { NotFoundError, errorMessage } from "@/utils/errors";
import { createDeadline, withTimeout } from "@/utils/helpers/timeout";
import type { RouteEstimator } from "./routeEstimator";

type ArrivalEstimationOptions = {
  repositories: Pick<
    TrackingRepositories,
    "buses" | "drivers" | "lines" | "trips" | "anomalies" | "waitingPassengers"
  >;
  estimator: RouteEstimator;
  rules: Pick<
    TrackingRules,
    "readTimeoutMs" | "anomalyWindowMs" | "anomalyPenalty" | "waitingReportWindowMs"
  >;
  now?: () => number;
};

export type ArrivalEstimationService = {
  arrivalsForStop: (stopId: string, lineId?: string) => Promise<ArrivalEstimate[]>;
};

const UNRATED_SCORE = 50;

export function reliabilityScore(
  rating: number | null,
  recentAnomalies: number,
  penalty: number,
): number {
  const base =
    rating === null || !Number.isFinite(rating)
      ? UNRATED_SCORE
      : Math.min(5, Math.max(0, rating)) * 20;
  const score = base - penalty * recentAnomalies;
  return Math.round(Math.min(100, Math.max(0, score)));
}

/**
 * Sums the newest report per line. Older reports for the same line are
 * superseded, not added.
 */
export function countWaitingPassengers(
  reports: readonly WaitingPassengerReport[],
): number {
  const latestByLine = new Map<string, WaitingPassengerReport>();
  for (const report of reports) {
    const key = report.lineId ?? "";
    const current = latestByLine.get(key);
    if (!current || report.timestamp > current.timestamp) {
      latestByLine.set(key, report);
    }
  }

  let total = 0;
  for (const report of latestByLine.values()) {
    total += Math.max(0, report.count);
  }
  return total;
}

export function compareArrivals(a: ArrivalEstimate, b: ArrivalEstimate): number {
  if (a.eta !== b.eta) return a.eta - b.eta;
  return a.currentLocation.distanceToStopKm - b.currentLocation.distanceToStopKm;
}

type Candidate = {
  trip: TripSnapshot;
  line: LineSnapshot;
};

export function createArrivalEstimationService(
  options: ArrivalEstimationOptions,
): ArrivalEstimationService {
  const now = options.now ?? Date.now;
  const { buses, drivers, lines, trips, anomalies, waitingPassengers } =
    options.repositories;

  async function findCandidates(
    stopId: string,
    lineId?: string,
  ): Promise<Candidate[]> {
    const servingLines = (await lines.listLinesForStop(stopId)).filter(
      (line) => lineId === undefined || line.id === lineId,
    );

    const candidates: Candidate[] = [];
    for (const line of servingLines) {
      const stop = line.stops.find((entry) => entry.id === stopId);
      if (!stop) continue;

      const active = await trips.listTrips({ state: "ACTIVE", lineId: line.id });
      for (const trip of active) {
        if (stop.ordinal >= trip.currentStopOrdinal) {
          candidates.push({ trip, line });
        }
      }
    }
    return candidates;
  }

  async function estimateArrival(
    candidate: Candidate,
    stopId: string,
    waiting: number,
    nowMs: number,
  ): Promise<ArrivalEstimate> {
    const { trip, line } = candidate;
    const [bus, driver, recent] = await Promise.all([
      buses.getBus(trip.busId),
      drivers.getDriver(trip.driverId),
      anomalies.listForTrip(trip.id, nowMs - options.rules.anomalyWindowMs),
    ]);

    const estimate = options.estimator.estimateFor({ trip, line, bus }, stopId);
    const target = estimate.remainingStops.find((stop) => stop.stopId === stopId);
    if (!target) {
      throw new NotFoundError("Stop", `${stopId} on line ${line.id}`);
    }

    return {
      tripId: trip.id,
      bus: {
        id: trip.busId,
        number: bus?.number ?? null,
        capacity: bus?.capacity ?? 0,
      },
      driver: {
        id: trip.driverId,
        name: driver?.name ?? null,
        rating: driver?.rating ?? null,
      },
      line: { id: line.id, name: line.name, color: line.color },
      currentLocation: {
        lat: estimate.currentLocation.lat,
        lng: estimate.currentLocation.lng,
        distanceToStopKm: target.distanceKm,
      },
      eta: target.eta,
      etaMinutes: Math.max(0, Math.round((target.eta - nowMs) / 60_000)),
      reliability: reliabilityScore(
        driver?.rating ?? null,
        recent.length,
        options.rules.anomalyPenalty,
      ),
      waitingPassengers: waiting,
      lastUpdate: trip.lastUpdateAt,
    };
  }

  async function arrivalsForStop(
    stopId: string,
    lineId?: string,
  ): Promise<ArrivalEstimate[]> {
    const deadline = createDeadline(options.rules.readTimeoutMs, now);
    const stop = await lines.getStop(stopId);
    if (!stop) {
      throw new NotFoundError("Stop", stopId);
    }

    const nowMs = now();
    const candidates = await findCandidates(stopId, lineId);
    if (candidates.length === 0) {
      return [];
    }

    const reports = await waitingPassengers.listForStop(
      stopId,
      nowMs - options.rules.waitingReportWindowMs,
    );
    const waiting = countWaitingPassengers(reports);

    const settled = await Promise.all(
      candidates.map(async (candidate) => {
        try {
          return await withTimeout(
            estimateArrival(candidate, stopId, waiting, nowMs),
            deadline.remainingMs(),
            `arrival estimate for trip ${candidate.trip.id}`,
          );
        } catch (error) {
          console.warn("[arrivals] skipping trip", {
            stopId,
            tripId: candidate.trip.id,
            error: errorMessage(error),
          });
          return null;
        }
      }),
    );

    return settled
      .filter((arrival): arrival is ArrivalEstimate => arrival !== null)
      .sort(compareArrivals);
  }

  return { arrivalsForStop };
}
