import type { Poi, PoiSource } from "../poi/poi.types";
import { createMutex } from "../../shared/concurrency/limiter";

export type RegistryStats = {
  total: number;
  active: number;
  visited: number;
};

/**
 * In-memory view of the normalized POI set, keyed by POI id. Writes go
 * through one lock; reads return snapshots.
 */
export class PoiRegistry {
  private readonly byId = new Map<string, Poi>();
  private readonly lock = createMutex();

  constructor(initial: Poi[] = []) {
    for (const poi of initial) this.byId.set(poi.id, poi);
  }

  async upsertMany(pois: Poi[]): Promise<number> {
    return this.lock(async () => {
      for (const poi of pois) this.byId.set(poi.id, poi);
      return pois.length;
    });
  }

  /** Drops every POI of `source`, then stores `pois`. */
  async replaceSource(source: PoiSource, pois: Poi[]): Promise<{ removed: number; stored: number }> {
    return this.lock(async () => {
      const removed = this.deleteSource(source);
      for (const poi of pois) this.byId.set(poi.id, poi);
      return { removed, stored: pois.length };
    });
  }

  async removeSource(source: PoiSource): Promise<number> {
    return this.lock(async () => this.deleteSource(source));
  }

  async markVisited(poiId: string): Promise<boolean> {
    return this.lock(async () => {
      const poi = this.byId.get(poiId);
      if (!poi) return false;
      this.byId.set(poiId, { ...poi, visited: true });
      return true;
    });
  }

  async recordNotified(poiId: string, atMillis: number): Promise<boolean> {
    return this.lock(async () => {
      const poi = this.byId.get(poiId);
      if (!poi) return false;
      if (poi.lastNotifiedAtMillis != null && poi.lastNotifiedAtMillis > atMillis) return false;
      this.byId.set(poiId, { ...poi, lastNotifiedAtMillis: atMillis });
      return true;
    });
  }

  async clearSurveyState(): Promise<void> {
    return this.lock(async () => {
      for (const [id, poi] of this.byId) {
        const { lastNotifiedAtMillis: _dropped, ...rest } = poi;
        this.byId.set(id, { ...rest, visited: false });
      }
    });
  }

  get(poiId: string): Poi | undefined {
    return this.byId.get(poiId);
  }

  all(): Poi[] {
    return Array.from(this.byId.values());
  }

  active(): Poi[] {
    return this.all().filter((poi) => poi.isActive);
  }

  stats(): RegistryStats {
    let active = 0;
    let visited = 0;
    for (const poi of this.byId.values()) {
      if (poi.isActive) active += 1;
      if (poi.visited) visited += 1;
    }
    return { total: this.byId.size, active, visited };
  }

  private deleteSource(source: PoiSource): number {
    let removed = 0;
    for (const [id, poi] of this.byId) {
      if (poi.source === source) {
        this.byId.delete(id);
        removed += 1;
      }
    }
    return removed;
  }
}
