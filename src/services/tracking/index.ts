import type { TrackingRules } from "@/config/tracking";
import type { TrackingRepositories } from "@/services/repository/types";
import type { AnomalyDetector } from "./anomalyDetector";
import { createAnomalyDetector } from "./anomalyDetector";
import type { ArrivalEstimationService } from "./arrivalEstimation";
import { createArrivalEstimationService } from "./arrivalEstimation";
import type { LocationIngestor } from "./locationIngestor";
import { createLocationIngestor } from "./locationIngestor";
import type { RouteEstimator } from "./routeEstimator";
import { createRouteEstimator } from "./routeEstimator";
import type { KeyedLock } from "./tripLock";
import { createKeyedLock } from "./tripLock";
import type { TripStateMachine } from "./tripStateMachine";
import { createTripStateMachine } from "./tripStateMachine";
import type { VisualizationCache } from "./visualizationCache";
import { createMemoryVisualizationCache } from "./visualizationCache";
import type { VisualizationService } from "./visualizationService";
import { createVisualizationService } from "./visualizationService";

export type TrackingEngineOptions = {
  repositories: TrackingRepositories;
  rules: TrackingRules;
  cache?: VisualizationCache;
  now?: () => number;
};

export type TrackingEngine = {
  rules: TrackingRules;
  lock: KeyedLock;
  cache: VisualizationCache;
  detector: AnomalyDetector;
  ingestor: LocationIngestor;
  trips: TripStateMachine;
  routes: RouteEstimator;
  arrivals: ArrivalEstimationService;
  visualization: VisualizationService;
};

export function createTrackingEngine(options: TrackingEngineOptions): TrackingEngine {
  const { repositories, rules } = options;
  const now = options.now ?? Date.now;
  const lock = createKeyedLock();
  const cache =
    options.cache ??
    createMemoryVisualizationCache({ ttlMs: rules.visualizationTtlMs, now });

  const detector = createAnomalyDetector({
    anomalies: repositories.anomalies,
    rules,
    now,
  });
  const ingestor = createLocationIngestor({
    trips: repositories.trips,
    lines: repositories.lines,
    detector,
    cache,
    lock,
    rules,
    now,
  });
  const trips = createTripStateMachine({
    repositories,
    ingestor,
    cache,
    lock,
    rules,
    now,
  });
  const routes = createRouteEstimator({ repositories, rules });
  const arrivals = createArrivalEstimationService({
    repositories,
    estimator: routes,
    rules,
    now,
  });
  const visualization = createVisualizationService({
    repositories,
    estimator: routes,
    cache,
    rules,
    now,
  });

  return {
    rules,
    lock,
    cache,
    detector,
    ingestor,
    trips,
    routes,
    arrivals,
    visualization,
  };
}

export { createInactivitySweeper } from "./inactivitySweeper";
export type { InactivitySweeper, SweepStats } from "./inactivitySweeper";
export {
  createKeydbVisualizationCache,
  createMemoryVisualizationCache,
} from "./visualizationCache";
export type { VisualizationCache } from "./visualizationCache";
