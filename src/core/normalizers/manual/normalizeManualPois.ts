import { parsePoiCategory } from "../../poi/category";
import { createPoi, InvalidPoiError } from "../../poi/createPoi";
import type { Poi } from "../../poi/poi.types";
import { fromItems, type SourceResult } from "../../source/sourceResult";
import { isRecord, logSkippedItem, optionalNumber, optionalString } from "../skip";

const SOURCE = "manual";

const entryToPoi = (entry: unknown): Poi => {
  if (!isRecord(entry)) {
    throw new InvalidPoiError("Invalid POI: entry is not an object");
  }
  const latitude = optionalNumber(entry.latitude);
  const longitude = optionalNumber(entry.longitude);
  const name = optionalString(entry.name);
  if (latitude == null || longitude == null) {
    throw new InvalidPoiError("Invalid POI: entry has no coordinates");
  }
  if (name == null) {
    throw new InvalidPoiError("Invalid POI: entry has no name");
  }
  const category = optionalString(entry.category);

  return createPoi({
    id: optionalString(entry.id),
    name,
    description: optionalString(entry.description),
    position: { latitude, longitude },
    category: category != null ? parsePoiCategory(category) : undefined,
    notificationRadius: optionalNumber(entry.notificationRadius),
    priority: optionalNumber(entry.priority),
    source: SOURCE
  });
};

/** Hand-entered POIs, e.g. the bundled sample set. */
export const normalizeManualPois = (entries: unknown[]): SourceResult<Poi> => {
  const pois: Poi[] = [];
  let skipped = 0;
  entries.forEach((entry, index) => {
    try {
      pois.push(entryToPoi(entry));
    } catch (err) {
      skipped += 1;
      logSkippedItem(SOURCE, index, err);
    }
  });
  return fromItems(pois, skipped);
};
