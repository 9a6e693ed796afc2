import { createPoi, InvalidPoiError } from "../../poi/createPoi";
import type { Poi, PoiPriority } from "../../poi/poi.types";
import { fromItems, sourceFailed, toErrorMessage, type SourceResult } from "../../source/sourceResult";
import { isRecord, logSkippedItem, optionalNumber, optionalString } from "../skip";
import type { GeoJsonFeatureCollection } from "./geojson.types";

const SOURCE = "bikeshare_geojson";

export const capacityPriority = (capacity: string | undefined): PoiPriority => {
  const docks = capacity != null && /^\d+$/.test(capacity) ? Number.parseInt(capacity, 10) : undefined;
  if (docks == null) return 0;
  if (docks >= 40) return 2;
  if (docks >= 20) return 1;
  return 0;
};

export const priorityRadius = (priority: PoiPriority): number => {
  switch (priority) {
    case 2:
      return 75;
    case 1:
      return 50;
    default:
      return 40;
  }
};

export const describeStation = (operator?: string, capacity?: string, network?: string): string => {
  let description = operator ?? "";
  if (capacity != null) {
    description += description === "" ? `${capacity} docks` : ` - ${capacity} docks`;
  }
  if (network != null) {
    description += description === "" ? `(${network})` : ` (${network})`;
  }
  return description === "" ? "Bike Share Station" : description;
};

// Returns null for features that are not points; those are ignored, not counted as invalid.
const featureToPoi = (feature: unknown, index: number): Poi | null => {
  if (!isRecord(feature)) {
    throw new InvalidPoiError("Invalid POI: feature is not an object");
  }
  const geometry = feature.geometry;
  const properties = feature.properties;
  if (!isRecord(geometry) || !isRecord(properties)) return null;
  if (geometry.type !== "Point") return null;

  const coordinates = geometry.coordinates;
  if (!Array.isArray(coordinates) || coordinates.length < 2) {
    throw new InvalidPoiError("Invalid POI: point has no coordinates");
  }
  const longitude = optionalNumber(coordinates[0]);
  const latitude = optionalNumber(coordinates[1]);
  if (latitude == null || longitude == null) {
    throw new InvalidPoiError("Invalid POI: point coordinates are not numeric");
  }

  const capacity = optionalString(properties.capacity);
  const operator = optionalString(properties.operator);
  const network = optionalString(properties.network);
  const amenity = optionalString(properties.amenity);
  const bicycleParking = optionalString(properties.bicycle_parking);

  const tags: Record<string, string> = {};
  if (capacity != null) tags.capacity = capacity;
  if (operator != null) tags.operator = operator;
  if (network != null) tags.network = network;
  if (amenity != null) tags.amenity = amenity;
  if (bicycleParking != null) tags.bicycle_parking = bicycleParking;

  const nativeId = optionalString(feature.id);
  const priority = capacityPriority(capacity);

  return createPoi({
    id: nativeId != null ? `${SOURCE}_${nativeId}` : undefined,
    name: optionalString(properties.name) ?? `Bike Station #${index + 1}`,
    description: describeStation(operator, capacity, network),
    position: { latitude, longitude },
    category: "PUBLIC_TRANSPORT",
    notificationRadius: priorityRadius(priority),
    priority,
    source: SOURCE,
    tags
  });
};

/**
 * Maps the Point features of a bike-share feature collection to docking
 * station POIs.
 */
export const normalizeBikeShareFeatures = (collection: GeoJsonFeatureCollection): SourceResult<Poi> => {
  const pois: Poi[] = [];
  let skipped = 0;

  collection.features.forEach((feature, index) => {
    try {
      const poi = featureToPoi(feature, index);
      if (poi) pois.push(poi);
    } catch (err) {
      skipped += 1;
      logSkippedItem(SOURCE, index, err);
    }
  });

  return fromItems(pois, skipped);
};

export const normalizeBikeShareGeoJson = (text: string): SourceResult<Poi> => {
  const trimmed = text.trim();
  if (trimmed === "") {
    return sourceFailed("unreadable_payload", "GeoJSON document is empty");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (err) {
    return sourceFailed("unreadable_payload", `GeoJSON document is not valid JSON: ${toErrorMessage(err)}`, {
      cause: err
    });
  }

  if (!isRecord(parsed) || !Array.isArray(parsed.features)) {
    return sourceFailed("unexpected_shape", "GeoJSON document has no features array");
  }
  return normalizeBikeShareFeatures({ type: optionalString(parsed.type), features: parsed.features });
};
