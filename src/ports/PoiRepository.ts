import type { Poi, PoiSource } from "../core/poi/poi.types";

export type PoiStats = {
  total: number;
  visited: number;
};

export interface PoiRepository {
  insert(poi: Poi): Promise<void>;
  insertMany(pois: Poi[]): Promise<{ upserted: number; modified: number }>;
  queryAll(): Promise<Poi[]>;
  /** Deletes the POIs of `source`, except those whose id is in `keepIds`. */
  deleteAllFromSource(source: PoiSource, keepIds?: string[]): Promise<number>;
  stats(): Promise<PoiStats>;
  markVisited(poiId: string): Promise<void>;
  updateLastNotifiedAt(poiId: string, atMillis: number): Promise<void>;
  /** Clears every visited flag and notification time. */
  clearSurveyState(): Promise<void>;
}
