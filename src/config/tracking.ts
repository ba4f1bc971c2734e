export type TrackingRules = {
  maxClockSkewMs: number;
  maxAccuracyMeters: number;
  maxPlausibleSpeedKmh: number;
  maxDeviationMeters: number;
  inactivityTimeoutMs: number;
  visualizationTtlMs: number;
  trafficFactor: number;
  defaultAverageSpeedKmh: number;
  readTimeoutMs: number;
  anomalyWindowMs: number;
  anomalyPenalty: number;
  waitingReportWindowMs: number;
};

export type InfrastructureConfig = {
  port: number;
  mongoConnection: string | null;
  seedFile: string | null;
  keydbUrl: string | null;
  keydbClientName: string;
  sweepIntervalMs: number;
  mqtt: {
    brokerUrl: string | null;
    clientId: string;
    username: string | undefined;
    password: string | undefined;
    topic: string;
  };
};

export type TrackingConfig = {
  rules: TrackingRules;
  infrastructure: InfrastructureConfig;
};

export const DEFAULT_RULES: TrackingRules = {
  maxClockSkewMs: 5 * 60 * 1000,
  maxAccuracyMeters: 200,
  maxPlausibleSpeedKmh: 120,
  maxDeviationMeters: 500,
  inactivityTimeoutMs: 15 * 60 * 1000,
  visualizationTtlMs: 5 * 60 * 1000,
  trafficFactor: 1,
  defaultAverageSpeedKmh: 30,
  readTimeoutMs: 2000,
  anomalyWindowMs: 30 * 60 * 1000,
  anomalyPenalty: 10,
  waitingReportWindowMs: 15 * 60 * 1000,
};

type Env = Record<string, string | undefined>;

function positiveInt(raw: string | undefined, fallback: number): number {
  const value = Number.parseInt(raw ?? "", 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

function nonNegativeFloat(raw: string | undefined, fallback: number): number {
  const value = Number.parseFloat(raw ?? "");
  return Number.isFinite(value) && value >= 0 ? value : fallback;
}

function positiveFloat(raw: string | undefined, fallback: number): number {
  const value = Number.parseFloat(raw ?? "");
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

function optionalString(raw: string | undefined): string | null {
  const value = raw?.trim();
  return value ? value : null;
}

export function loadTrackingConfig(env: Env = process.env): TrackingConfig {
  return {
    rules: {
      maxClockSkewMs: nonNegativeFloat(
        env.MAX_CLOCK_SKEW_MS,
        DEFAULT_RULES.maxClockSkewMs,
      ),
      maxAccuracyMeters: positiveFloat(
        env.MAX_ACCURACY_METERS,
        DEFAULT_RULES.maxAccuracyMeters,
      ),
      maxPlausibleSpeedKmh: positiveFloat(
        env.MAX_PLAUSIBLE_SPEED_KMH,
        DEFAULT_RULES.maxPlausibleSpeedKmh,
      ),
      maxDeviationMeters: positiveFloat(
        env.MAX_DEVIATION_METERS,
        DEFAULT_RULES.maxDeviationMeters,
      ),
      inactivityTimeoutMs: positiveInt(
        env.INACTIVITY_TIMEOUT_MS,
        DEFAULT_RULES.inactivityTimeoutMs,
      ),
      visualizationTtlMs: positiveInt(
        env.VISUALIZATION_TTL_MS,
        DEFAULT_RULES.visualizationTtlMs,
      ),
      trafficFactor: positiveFloat(
        env.TRAFFIC_FACTOR,
        DEFAULT_RULES.trafficFactor,
      ),
      defaultAverageSpeedKmh: positiveFloat(
        env.DEFAULT_AVERAGE_SPEED_KMH,
        DEFAULT_RULES.defaultAverageSpeedKmh,
      ),
      readTimeoutMs: positiveInt(
        env.READ_TIMEOUT_MS,
        DEFAULT_RULES.readTimeoutMs,
      ),
      anomalyWindowMs: positiveInt(
        env.ANOMALY_WINDOW_MS,
        DEFAULT_RULES.anomalyWindowMs,
      ),
      anomalyPenalty: nonNegativeFloat(
        env.ANOMALY_PENALTY,
        DEFAULT_RULES.anomalyPenalty,
      ),
      waitingReportWindowMs: positiveInt(
        env.WAITING_REPORT_WINDOW_MS,
        DEFAULT_RULES.waitingReportWindowMs,
      ),
    },
    infrastructure: {
      port: positiveInt(env.PORT, 8080),
      mongoConnection: optionalString(env.MONGO_CONNECTION),
      seedFile: optionalString(env.SEED_FILE),
      keydbUrl: optionalString(env.KEYDB_URL),
      keydbClientName: env.KEYDB_CLIENT_NAME ?? "transit_tracker",
      sweepIntervalMs: positiveInt(env.SWEEP_INTERVAL_MS, 60 * 1000),
      mqtt: {
        brokerUrl: optionalString(env.MQTT_BROKER_URL),
        clientId: env.MQTT_CLIENT_ID ?? "transit_tracker_ingestion",
        username: optionalString(env.MQTT_USERNAME) ?? undefined,
        password: optionalString(env.MQTT_PASSWORD) ?? undefined,
        topic: env.MQTT_SUBSCRIBE_TOPIC ?? "gps/+",
      },
    },
  };
}
