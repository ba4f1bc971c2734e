import { Schema } from "mongoose";

export function isCoordinatePair(entry: unknown): boolean {
  if (!Array.isArray(entry) || entry.length !== 2) {
    return false;
  }

  const lng = Number(entry[0]);
  const lat = Number(entry[1]);
  return (
    Number.isFinite(lng) &&
    Number.isFinite(lat) &&
    lng >= -180 &&
    lng <= 180 &&
    lat >= -90 &&
    lat <= 90
  );
}

function hasMinCoordinatePairs(value: unknown, minPairs: number): boolean {
  if (!Array.isArray(value)) {
    return false;
  }

  return value.length >= minPairs && value.every((entry) => isCoordinatePair(entry));
}

// GeoJSON order: [lng, lat]
export const pointSchema = new Schema(
  {
    type: { type: String, enum: ["Point"], required: true, default: "Point" },
    coordinates: {
      type: [Number],
      required: true,
      validate: {
        validator: (value: unknown) => isCoordinatePair(value),
        message: "Invalid point coordinates",
      },
    },
  },
  { _id: false },
);

export const lineStringSchema = new Schema(
  {
    type: { type: String, enum: ["LineString"], required: true, default: "LineString" },
    coordinates: {
      type: [[Number]],
      required: true,
      validate: {
        validator: (value: unknown) => hasMinCoordinatePairs(value, 2),
        message: "Invalid path coordinates",
      },
    },
  },
  { _id: false },
);
