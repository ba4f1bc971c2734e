import type {
  Anomaly,
  BusSnapshot,
  DriverSnapshot,
  LineSnapshot,
  LocationUpdate,
  RouteDeviation,
  SpeedAnomaly,
  Stop,
  TripEndReason,
  TripSnapshot,
  TripState,
  TripSummary,
  WaitingPassengerReport,
} from "@/types";

export type BusRepository = {
  getBus: (busId: string) => Promise<BusSnapshot | null>;
};

export type DriverRepository = {
  getDriver: (driverId: string) => Promise<DriverSnapshot | null>;
};

export type LineRepository = {
  getLine: (lineId: string) => Promise<LineSnapshot | null>;
  getStop: (stopId: string) => Promise<Stop | null>;
  listLinesForStop: (stopId: string) => Promise<LineSnapshot[]>;
};

export type CreateTripInput = {
  busId: string;
  driverId: string;
  lineId: string;
  createdAt: number;
};

export type TripFilter = {
  state?: TripState;
  lineId?: string;
};

export type TripTransition = {
  state: TripState;
  startedAt?: number;
  endedAt?: number;
  endReason?: TripEndReason;
  summary?: TripSummary;
};

export type TripRepository = {
  createTrip: (input: CreateTripInput) => Promise<TripSnapshot>;
  getTrip: (tripId: string) => Promise<TripSnapshot | null>;
  listTrips: (filter: TripFilter) => Promise<TripSnapshot[]>;
  listLocationUpdates: (tripId: string) => Promise<LocationUpdate[]>;
  /**
   * Appends one update and raises the stop pointer in a single write.
   * Rejects when the trip is missing, not ACTIVE, or already has a newer
   * update; nothing is written in that case.
   */
  appendLocation: (
    tripId: string,
    update: LocationUpdate,
    currentStopOrdinal: number,
  ) => Promise<TripSnapshot>;
  /**
   * Compare-and-set on the trip state. Returns null when the trip is not
   * in `from` any more.
   */
  transition: (
    tripId: string,
    from: TripState,
    patch: TripTransition,
  ) => Promise<TripSnapshot | null>;
};

export type NewAnomaly = Omit<SpeedAnomaly, "id"> | Omit<RouteDeviation, "id">;

export type AnomalyRepository = {
  append: (anomaly: NewAnomaly) => Promise<Anomaly>;
  listForTrip: (tripId: string, since?: number) => Promise<Anomaly[]>;
};

export type WaitingPassengerRepository = {
  listForStop: (
    stopId: string,
    since: number,
  ) => Promise<WaitingPassengerReport[]>;
};

export type TrackingRepositories = {
  buses: BusRepository;
  drivers: DriverRepository;
  lines: LineRepository;
  trips: TripRepository;
  anomalies: AnomalyRepository;
  waitingPassengers: WaitingPassengerRepository;
};
