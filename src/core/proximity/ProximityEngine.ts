import { distanceMeters } from "../geo/distance";
import type { GeoPosition, Poi } from "../poi/poi.types";
import { InMemoryProximityStateStore, type ProximityStateStore } from "./proximityState";

export const DEFAULT_COOLDOWN_MS = 5 * 60 * 1000;
export const DEFAULT_NEARBY_MAX_DISTANCE_M = 500;

export type ProximityHit = {
  poi: Poi;
  distanceMeters: number;
};

export type ProximityEngineOptions = {
  cooldownMs?: number;
  state?: ProximityStateStore;
};

export class ProximityEngine {
  readonly cooldownMs: number;
  private readonly state: ProximityStateStore;

  constructor(options: ProximityEngineOptions = {}) {
    const cooldownMs = options.cooldownMs ?? DEFAULT_COOLDOWN_MS;
    if (!Number.isInteger(cooldownMs) || cooldownMs < 0) {
      throw new Error("cooldownMs must be an integer >= 0");
    }
    this.cooldownMs = cooldownMs;
    this.state = options.state ?? new InMemoryProximityStateStore();
  }

  /**
   * Returns the POIs that should notify for this fix and records `nowMillis`
   * as their last notification. A POI fires when the observer is within its
   * radius, it is not marked visited and it has never fired or its cooldown
   * has elapsed.
   */
  evaluate(observer: GeoPosition, pois: Poi[], nowMillis: number): ProximityHit[] {
    const fired = this.due(observer, pois, nowMillis);
    for (const hit of fired) {
      this.state.recordNotified(hit.poi.id, nowMillis);
    }
    return fired;
  }

  /**
   * Same selection as `evaluate` without recording anything. Callers that
   * deliver hits themselves commit each one with `recordNotified`.
   */
  due(observer: GeoPosition, pois: Poi[], nowMillis: number): ProximityHit[] {
    const hits: ProximityHit[] = [];

    for (const poi of pois) {
      if (!poi.isActive) continue;

      const distance = distanceMeters(observer, poi.position);
      if (distance > poi.notificationRadius) continue;
      if (!this.canFire(poi.id, nowMillis)) continue;

      hits.push({ poi: { ...poi, lastNotifiedAtMillis: nowMillis }, distanceMeters: distance });
    }

    return hits;
  }

  /** POIs within `maxDistanceMeters`, closest first. Read-only. */
  nearby(observer: GeoPosition, pois: Poi[], maxDistanceMeters = DEFAULT_NEARBY_MAX_DISTANCE_M): ProximityHit[] {
    return pois
      .map((poi) => ({ poi, distanceMeters: distanceMeters(observer, poi.position) }))
      .filter((hit) => hit.distanceMeters <= maxDistanceMeters)
      .sort((a, b) => a.distanceMeters - b.distanceMeters);
  }

  markVisited(poiId: string): void {
    this.state.markVisited(poiId);
  }

  isVisited(poiId: string): boolean {
    return this.state.isVisited(poiId);
  }

  recordNotified(poiId: string, atMillis: number): void {
    this.state.recordNotified(poiId, atMillis);
  }

  lastNotifiedAt(poiId: string): number | undefined {
    return this.state.lastNotifiedAt(poiId);
  }

  /** Clears every visited latch and notification time, e.g. for a new survey session. */
  reset(): void {
    this.state.clear();
  }

  private canFire(poiId: string, nowMillis: number): boolean {
    if (this.state.isVisited(poiId)) return false;
    const last = this.state.lastNotifiedAt(poiId);
    return last == null || nowMillis - last >= this.cooldownMs;
  }
}
