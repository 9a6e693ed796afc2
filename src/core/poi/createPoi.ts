import { randomUUID } from "crypto";
import { isValidPosition } from "../geo/distance";
import {
  DEFAULT_NOTIFICATION_RADIUS_M,
  POI_PRIORITIES,
  type GeoPosition,
  type Poi,
  type PoiCategory,
  type PoiPriority,
  type PoiSource
} from "./poi.types";

export class InvalidPoiError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidPoiError";
  }
}

export type PoiInput = {
  id?: string;
  name: string;
  description?: string;
  position: GeoPosition;
  category?: PoiCategory;
  notificationRadius?: number;
  priority?: number;
  createdAt?: Date;
  source: PoiSource;
  tags?: Record<string, string>;
  isActive?: boolean;
};

const parsePriority = (value: number | undefined): PoiPriority => {
  if (value == null) return 0;
  const priority = POI_PRIORITIES.find((p) => p === value);
  if (priority === undefined) {
    throw new InvalidPoiError(`Invalid POI: priority must be one of -1, 0, 1, 2 (got ${value})`);
  }
  return priority;
};

const parseRadius = (value: number | undefined): number => {
  if (value == null) return DEFAULT_NOTIFICATION_RADIUS_M;
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidPoiError("Invalid POI: notificationRadius must be a positive integer");
  }
  return value;
};

/**
 * Builds a canonical POI from normalizer output, applying defaults and
 * rejecting values that break the POI invariants.
 */
export const createPoi = (input: PoiInput): Poi => {
  const name = input.name.trim();
  if (name.length === 0) {
    throw new InvalidPoiError("Invalid POI: name is empty");
  }
  if (!isValidPosition(input.position)) {
    throw new InvalidPoiError("Invalid POI: coordinates out of range");
  }

  const poi: Poi = {
    id: input.id ?? randomUUID(),
    name,
    position: { latitude: input.position.latitude, longitude: input.position.longitude },
    category: input.category ?? "UNKNOWN",
    notificationRadius: parseRadius(input.notificationRadius),
    priority: parsePriority(input.priority),
    visited: false,
    createdAt: input.createdAt ?? new Date(),
    source: input.source,
    tags: input.tags ?? {},
    isActive: input.isActive ?? true
  };
  if (input.description != null && input.description !== "") {
    poi.description = input.description;
  }
  return poi;
};
