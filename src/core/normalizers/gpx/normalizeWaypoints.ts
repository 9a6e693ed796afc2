import { classifyCategory } from "../../poi/category";
import { createPoi, InvalidPoiError } from "../../poi/createPoi";
import type { Poi, PoiSource } from "../../poi/poi.types";
import { fromItems, type SourceResult } from "../../source/sourceResult";
import { logSkippedItem } from "../skip";
import type { GpxWaypoint } from "./gpx.types";
import { parseGpx } from "./parseGpx";

export type WaypointNormalizeOptions = {
  source?: PoiSource;
  now?: () => Date;
};

const waypointToPoi = (waypoint: GpxWaypoint, index: number, source: PoiSource, now: () => Date): Poi => {
  if (waypoint.latitude == null || waypoint.longitude == null) {
    throw new InvalidPoiError("Invalid POI: waypoint has no coordinates");
  }

  const name = waypoint.name ?? `Waypoint ${index + 1}`;
  const tags: Record<string, string> = {};
  if (waypoint.type != null) tags.type = waypoint.type;
  if (waypoint.elevation != null) tags.elevation = String(waypoint.elevation);

  return createPoi({
    name,
    description: waypoint.description,
    position: { latitude: waypoint.latitude, longitude: waypoint.longitude },
    category: classifyCategory(waypoint.type, name),
    createdAt: waypoint.time ?? now(),
    source,
    tags
  });
};

/**
 * One POI per waypoint record. Records without usable coordinates are
 * skipped; the rest of the batch is kept.
 */
export const normalizeWaypoints = (
  waypoints: GpxWaypoint[],
  options: WaypointNormalizeOptions = {}
): SourceResult<Poi> => {
  const source = options.source ?? "gpx";
  const now = options.now ?? (() => new Date());

  const pois: Poi[] = [];
  let skipped = 0;
  waypoints.forEach((waypoint, index) => {
    try {
      pois.push(waypointToPoi(waypoint, index, source, now));
    } catch (err) {
      skipped += 1;
      logSkippedItem(source, index, err);
    }
  });

  return fromItems(pois, skipped);
};

export const normalizeGpx = (xml: string, options: WaypointNormalizeOptions = {}): SourceResult<Poi> => {
  const parsed = parseGpx(xml);
  if (parsed.kind === "failed") {
    return parsed;
  }
  return normalizeWaypoints(parsed.document.waypoints, options);
};
