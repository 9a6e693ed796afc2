import { createPoi, InvalidPoiError } from "../../poi/createPoi";
import type { Poi } from "../../poi/poi.types";
import { fromItems, sourceFailed, type SourceResult } from "../../source/sourceResult";
import { isRecord, logSkippedItem, optionalNumber, optionalString } from "../skip";
import type { OverpassElement, OverpassElementType, OverpassResponse } from "./overpass.types";

const SOURCE = "overpass";
export const DEFAULT_STATION_NAME = "Docking Station";

const ELEMENT_TYPES: readonly OverpassElementType[] = ["node", "way", "relation"];

export const overpassPoiId = (type: OverpassElementType, id: number): string => `${SOURCE}_${type}_${id}`;

const parseTags = (value: unknown): Record<string, string> => {
  if (!isRecord(value)) return {};
  const tags: Record<string, string> = {};
  for (const [key, tag] of Object.entries(value)) {
    if (typeof tag === "string") tags[key] = tag;
  }
  return tags;
};

export const parseOverpassElement = (raw: unknown): OverpassElement => {
  if (!isRecord(raw)) {
    throw new InvalidPoiError("Invalid POI: element is not an object");
  }
  const type = ELEMENT_TYPES.find((t) => t === raw.type);
  if (type === undefined) {
    throw new InvalidPoiError("Invalid POI: unknown element type");
  }
  const id = raw.id;
  if (typeof id !== "number" || !Number.isSafeInteger(id)) {
    throw new InvalidPoiError("Invalid POI: element id is not an integer");
  }

  const element: OverpassElement = { type, id, tags: parseTags(raw.tags) };
  const lat = optionalNumber(raw.lat);
  const lon = optionalNumber(raw.lon);
  if (lat != null) element.lat = lat;
  if (lon != null) element.lon = lon;
  if (isRecord(raw.center)) {
    const centerLat = optionalNumber(raw.center.lat);
    const centerLon = optionalNumber(raw.center.lon);
    if (centerLat != null && centerLon != null) {
      element.center = { lat: centerLat, lon: centerLon };
    }
  }
  return element;
};

export const describeDockingStation = (tags: Record<string, string>): string => {
  const lines = ["Bicycle Rental Docking Station"];
  if (tags.capacity != null) lines.push(`Capacity: ${tags.capacity}`);
  if (tags.network != null) lines.push(`Network: ${tags.network}`);
  return lines.join("\n");
};

// Nodes carry lat/lon; ways and relations only come with a center from `out center`.
const elementPosition = (element: OverpassElement): { latitude: number; longitude: number } | null => {
  if (element.lat != null && element.lon != null) return { latitude: element.lat, longitude: element.lon };
  if (element.center) return { latitude: element.center.lat, longitude: element.center.lon };
  return null;
};

const elementToPoi = (element: OverpassElement): Poi | null => {
  const position = elementPosition(element);
  if (position == null) return null;

  const tags = element.tags ?? {};
  return createPoi({
    id: overpassPoiId(element.type, element.id),
    name: optionalString(tags.name) ?? DEFAULT_STATION_NAME,
    description: describeDockingStation(tags),
    position,
    category: "PUBLIC_TRANSPORT",
    source: SOURCE,
    tags
  });
};

export const isOverpassResponse = (payload: unknown): payload is OverpassResponse =>
  isRecord(payload) && Array.isArray(payload.elements);

/**
 * Maps the elements of a docking-station query to POIs. Ids are derived from
 * the element type and id, so importing the same response twice yields the
 * same POI ids.
 */
export const normalizeOverpassResponse = (payload: unknown): SourceResult<Poi> => {
  if (!isOverpassResponse(payload)) {
    return sourceFailed("unexpected_shape", "Overpass response has no elements array");
  }

  const pois: Poi[] = [];
  let skipped = 0;
  payload.elements.forEach((raw, index) => {
    try {
      const poi = elementToPoi(parseOverpassElement(raw));
      if (poi) {
        pois.push(poi);
      } else {
        skipped += 1;
      }
    } catch (err) {
      skipped += 1;
      logSkippedItem(SOURCE, index, err);
    }
  });

  return fromItems(pois, skipped);
};
