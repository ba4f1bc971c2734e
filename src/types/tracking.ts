export type Coordinate = {
  lat: number;
  lng: number;
};

export type BusSnapshot = {
  id: string;
  number: string | null;
  capacity: number;
  averageSpeedKmh: number;
};

export type DriverSnapshot = {
  id: string;
  name: string;
  rating: number | null;
};

export type Stop = {
  id: string;
  name: string;
  coordinate: Coordinate;
};

export type LineStop = Stop & {
  ordinal: number;
};

export type RouteSegment = {
  fromStopId: string;
  toStopId: string;
  path: Coordinate[];
  distanceKm: number;
  durationMinutes: number | null;
};

export type LineSnapshot = {
  id: string;
  name: string;
  color: string | null;
  // ordered by ordinal, strictly increasing
  stops: LineStop[];
  segments: RouteSegment[];
};

export type TripState = "PENDING" | "ACTIVE" | "COMPLETED" | "ABORTED";

export type TripEndReason = "driver" | "terminus" | "inactivity";

export type LocationReport = {
  lat: number;
  lng: number;
  accuracy: number;
  speed?: number | null;
  heading?: number | null;
  timestamp: number;
};

export type LocationUpdate = {
  tripId: string;
  sequence: number;
  lat: number;
  lng: number;
  accuracy: number;
  speed: number | null;
  heading: number | null;
  timestamp: number;
  nearestStopId: string | null;
  distanceToStopMeters: number | null;
  receivedAt: number;
};

export type TripSummary = {
  distanceKm: number;
  averageSpeedKmh: number | null;
  durationMs: number;
};

export type TripSnapshot = {
  id: string;
  busId: string;
  driverId: string;
  lineId: string;
  state: TripState;
  createdAt: number;
  startedAt: number | null;
  endedAt: number | null;
  endReason: TripEndReason | null;
  currentStopOrdinal: number;
  lastUpdateAt: number | null;
  updateCount: number;
  // last two updates, oldest first
  recentUpdates: readonly LocationUpdate[];
  summary: TripSummary | null;
};

export type AnomalySeverity = "low" | "medium" | "high";

type AnomalyBase = {
  id: string;
  tripId: string;
  busId: string;
  updateSequence: number;
  detectedAt: number;
  severity: AnomalySeverity;
  location: Coordinate;
};

export type SpeedAnomaly = AnomalyBase & {
  kind: "SpeedAnomaly";
  // null when the two fixes share a timestamp
  observedSpeedKmh: number | null;
  distanceKm: number;
  elapsedMs: number;
  thresholdKmh: number;
};

export type RouteDeviation = AnomalyBase & {
  kind: "RouteDeviation";
  distanceOffRouteMeters: number;
  previousDistanceOffRouteMeters: number;
  thresholdMeters: number;
};

export type Anomaly = SpeedAnomaly | RouteDeviation;

export type WaitingPassengerReport = {
  stopId: string;
  lineId: string | null;
  count: number;
  timestamp: number;
};

export type RecordResult = {
  update: LocationUpdate;
  previousStopOrdinal: number;
  currentStopOrdinal: number;
  reachedTerminus: boolean;
  anomalies: Anomaly[];
};

export type TrafficConditions = {
  factor: number;
  level: "light" | "normal" | "heavy";
  description: string;
};

export type EstimatedLeg = {
  fromStopId: string | null;
  toStopId: string;
  from: Coordinate;
  to: Coordinate;
  geometry: Coordinate[];
  source: "segment" | "straight_line";
  distanceKm: number;
  durationMinutes: number;
  estimatedArrival: number;
};

export type RemainingStop = {
  stopId: string;
  name: string;
  ordinal: number;
  location: Coordinate;
  distanceKm: number;
  travelTimeMinutes: number;
  eta: number;
};

export type RouteEstimate = {
  tripId: string;
  busId: string;
  lineId: string;
  currentLocation: {
    lat: number;
    lng: number;
    speed: number | null;
    heading: number | null;
    accuracy: number | null;
    timestamp: number;
    synthesized: boolean;
  };
  trip: {
    id: string;
    lineName: string;
    state: TripState;
    startedAt: number | null;
    currentStopOrdinal: number;
    progressPercent: number;
  };
  remainingStops: RemainingStop[];
  estimatedPath: EstimatedLeg[];
  totalDistanceKm: number;
  totalDurationMinutes: number;
  trafficConditions: TrafficConditions;
};

export type ArrivalEstimate = {
  tripId: string;
  bus: { id: string; number: string | null; capacity: number };
  driver: { id: string; name: string | null; rating: number | null };
  line: { id: string; name: string; color: string | null };
  currentLocation: { lat: number; lng: number; distanceToStopKm: number };
  eta: number;
  etaMinutes: number;
  reliability: number;
  waitingPassengers: number;
  lastUpdate: number | null;
};

export type StopMarker = {
  id: string;
  name: string;
  position: Coordinate;
  ordinal: number;
  isTerminal: boolean;
};

export type VisualizationSegment = {
  fromStopId: string;
  toStopId: string;
  polyline: Coordinate[];
  source: "segment" | "straight_line";
  distanceKm: number;
  durationMinutes: number | null;
};

export type ActiveBusMarker = {
  tripId: string;
  busId: string;
  busNumber: string | null;
  driverName: string | null;
  position: Coordinate;
  heading: number | null;
  speed: number | null;
  currentStopOrdinal: number;
  progressPercent: number;
  nextStopId: string | null;
  nextStopEta: number | null;
  lastUpdate: number;
};

export type Bounds = {
  north: number;
  south: number;
  east: number;
  west: number;
};

export type CachedVisualization = {
  line: { id: string; name: string; color: string | null; totalStops: number };
  route: {
    segments: VisualizationSegment[];
    totalDistanceKm: number;
    estimatedDurationMinutes: number;
  };
  markers: StopMarker[];
  activeBuses: ActiveBusMarker[];
  bounds: Bounds | null;
  generatedAt: number;
};
