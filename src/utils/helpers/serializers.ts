import { round } from "lodash";
import type {
  Anomaly,
  ArrivalEstimate,
  CachedVisualization,
  Coordinate,
  LocationUpdate,
  RouteEstimate,
  TripSnapshot,
} from "@/types";
import type { IngestResult } from "@/services/tracking/tripStateMachine";

export function isoTime(value: number): string;
export function isoTime(value: number | null): string | null;
export function isoTime(value: number | null): string | null {
  return value === null ? null : new Date(value).toISOString();
}

function km(value: number): number {
  return round(value, 3);
}

function minutes(value: number): number {
  return round(value, 1);
}

function point(coordinate: Coordinate) {
  return { lat: coordinate.lat, lng: coordinate.lng };
}

export function serializeUpdate(update: LocationUpdate) {
  return {
    trip_id: update.tripId,
    sequence: update.sequence,
    lat: update.lat,
    lng: update.lng,
    accuracy: update.accuracy,
    speed: update.speed === null ? null : round(update.speed, 2),
    heading: update.heading,
    timestamp: isoTime(update.timestamp),
    nearest_stop_id: update.nearestStopId,
    distance_to_stop_m:
      update.distanceToStopMeters === null ? null : round(update.distanceToStopMeters, 1),
    received_at: isoTime(update.receivedAt),
  };
}

export function serializeTrip(trip: TripSnapshot) {
  const last = trip.recentUpdates[trip.recentUpdates.length - 1] ?? null;
  return {
    id: trip.id,
    bus_id: trip.busId,
    driver_id: trip.driverId,
    line_id: trip.lineId,
    state: trip.state,
    created_at: isoTime(trip.createdAt),
    started_at: isoTime(trip.startedAt),
    ended_at: isoTime(trip.endedAt),
    end_reason: trip.endReason,
    current_stop_ordinal: trip.currentStopOrdinal,
    last_update_at: isoTime(trip.lastUpdateAt),
    update_count: trip.updateCount,
    last_location: last ? serializeUpdate(last) : null,
    summary: trip.summary
      ? {
          distance_km: km(trip.summary.distanceKm),
          average_speed_kmh:
            trip.summary.averageSpeedKmh === null
              ? null
              : round(trip.summary.averageSpeedKmh, 2),
          duration_ms: trip.summary.durationMs,
        }
      : null,
  };
}

export function serializeAnomaly(anomaly: Anomaly) {
  const base = {
    id: anomaly.id,
    trip_id: anomaly.tripId,
    bus_id: anomaly.busId,
    kind: anomaly.kind,
    update_sequence: anomaly.updateSequence,
    detected_at: isoTime(anomaly.detectedAt),
    severity: anomaly.severity,
    location: point(anomaly.location),
  };

  if (anomaly.kind === "SpeedAnomaly") {
    return {
      ...base,
      observed_speed_kmh:
        anomaly.observedSpeedKmh === null ? null : round(anomaly.observedSpeedKmh, 2),
      distance_km: km(anomaly.distanceKm),
      elapsed_ms: anomaly.elapsedMs,
      threshold_kmh: anomaly.thresholdKmh,
    };
  }

  return {
    ...base,
    distance_off_route_m: round(anomaly.distanceOffRouteMeters, 1),
    previous_distance_off_route_m: round(anomaly.previousDistanceOffRouteMeters, 1),
    threshold_m: anomaly.thresholdMeters,
  };
}

export function serializeIngestResult(result: IngestResult) {
  return {
    accepted: true,
    state: result.state,
    update: serializeUpdate(result.update),
    previous_stop_ordinal: result.previousStopOrdinal,
    current_stop_ordinal: result.currentStopOrdinal,
    reached_terminus: result.reachedTerminus,
    anomalies: result.anomalies.map(serializeAnomaly),
  };
}

export function serializeRouteEstimate(estimate: RouteEstimate) {
  return {
    trip_id: estimate.tripId,
    bus_id: estimate.busId,
    line_id: estimate.lineId,
    current_location: {
      lat: estimate.currentLocation.lat,
      lng: estimate.currentLocation.lng,
      speed: estimate.currentLocation.speed,
      heading: estimate.currentLocation.heading,
      accuracy: estimate.currentLocation.accuracy,
      timestamp: isoTime(estimate.currentLocation.timestamp),
      synthesized: estimate.currentLocation.synthesized,
    },
    trip: {
      id: estimate.trip.id,
      line_name: estimate.trip.lineName,
      state: estimate.trip.state,
      started_at: isoTime(estimate.trip.startedAt),
      current_stop_ordinal: estimate.trip.currentStopOrdinal,
      progress_percent: estimate.trip.progressPercent,
    },
    remaining_stops: estimate.remainingStops.map((stop) => ({
      stop_id: stop.stopId,
      name: stop.name,
      ordinal: stop.ordinal,
      location: point(stop.location),
      distance_km: km(stop.distanceKm),
      travel_time_minutes: minutes(stop.travelTimeMinutes),
      eta: isoTime(stop.eta),
    })),
    estimated_path: estimate.estimatedPath.map((leg) => ({
      from_stop_id: leg.fromStopId,
      to_stop_id: leg.toStopId,
      from: point(leg.from),
      to: point(leg.to),
      geometry: leg.geometry.map(point),
      source: leg.source,
      distance_km: km(leg.distanceKm),
      duration_minutes: minutes(leg.durationMinutes),
      estimated_arrival: isoTime(leg.estimatedArrival),
    })),
    total_distance_km: km(estimate.totalDistanceKm),
    total_duration_minutes: minutes(estimate.totalDurationMinutes),
    traffic_conditions: estimate.trafficConditions,
  };
}

export function serializeArrival(arrival: ArrivalEstimate) {
  return {
    trip_id: arrival.tripId,
    bus: arrival.bus,
    driver: arrival.driver,
    line: arrival.line,
    current_location: {
      lat: arrival.currentLocation.lat,
      lng: arrival.currentLocation.lng,
      distance_to_stop: km(arrival.currentLocation.distanceToStopKm),
    },
    eta: isoTime(arrival.eta),
    eta_minutes: arrival.etaMinutes,
    reliability: arrival.reliability,
    waiting_passengers: arrival.waitingPassengers,
    last_update: isoTime(arrival.lastUpdate),
  };
}

export function serializeVisualization(snapshot: CachedVisualization) {
  return {
    line: {
      id: snapshot.line.id,
      name: snapshot.line.name,
      color: snapshot.line.color,
      total_stops: snapshot.line.totalStops,
    },
    route: {
      segments: snapshot.route.segments.map((segment) => ({
        from_stop_id: segment.fromStopId,
        to_stop_id: segment.toStopId,
        polyline: segment.polyline.map(point),
        source: segment.source,
        distance_km: km(segment.distanceKm),
        duration_minutes:
          segment.durationMinutes === null ? null : minutes(segment.durationMinutes),
      })),
      total_distance_km: km(snapshot.route.totalDistanceKm),
      estimated_duration_minutes: minutes(snapshot.route.estimatedDurationMinutes),
    },
    markers: snapshot.markers.map((marker) => ({
      id: marker.id,
      name: marker.name,
      position: point(marker.position),
      ordinal: marker.ordinal,
      is_terminal: marker.isTerminal,
    })),
    active_buses: snapshot.activeBuses.map((bus) => ({
      trip_id: bus.tripId,
      bus_id: bus.busId,
      bus_number: bus.busNumber,
      driver_name: bus.driverName,
      position: point(bus.position),
      heading: bus.heading,
      speed: bus.speed,
      current_stop_ordinal: bus.currentStopOrdinal,
      progress_percent: bus.progressPercent,
      next_stop_id: bus.nextStopId,
      next_stop_eta: isoTime(bus.nextStopEta),
      last_update: isoTime(bus.lastUpdate),
    })),
    bounds: snapshot.bounds,
    generated_at: isoTime(snapshot.generatedAt),
  };
}
