import { distanceMeters } from "../../core/geo/distance";
import type { GeoPosition } from "../../core/poi/poi.types";
import { ProximityEngine, type ProximityHit } from "../../core/proximity/ProximityEngine";
import type { ProximityStateStore } from "../../core/proximity/proximityState";
import type { PoiRegistry } from "../../core/registry/PoiRegistry";
import type { NotificationSink } from "../../ports/NotificationSink";
import type { PoiRepository } from "../../ports/PoiRepository";
import type { PositionFix } from "../../ports/PositionSource";
import { createMutex } from "../../shared/concurrency/limiter";
import { logDeliveryFailure, NotificationDeliveryError, type DeliveryFailure } from "./survey.errors";
import { resolveSurveyConfig, type SurveyConfig, type SurveyConfigInput } from "./survey.config";

export type FixOutcome =
  | { accepted: false; reason: "too_soon" | "too_close" }
  | { accepted: true; hits: ProximityHit[] };

export type SurveySessionDeps = {
  registry: PoiRegistry;
  repo: PoiRepository;
  sink: NotificationSink;
  config?: SurveyConfigInput;
  state?: ProximityStateStore;
};

/**
 * One survey run: feeds position fixes to a proximity engine of its own and
 * hands every firing to the notification sink. Fix handling, mark-visited
 * and reset are serialized through one lock.
 */
export class SurveySession {
  readonly config: SurveyConfig;
  private readonly engine: ProximityEngine;
  private readonly lock = createMutex();
  private lastAccepted?: PositionFix;

  constructor(private readonly deps: SurveySessionDeps) {
    this.config = resolveSurveyConfig(deps.config);
    this.engine = new ProximityEngine({ cooldownMs: this.config.cooldownMs, state: deps.state });

    // carry over survey state persisted with the POIs
    for (const poi of deps.registry.all()) {
      if (poi.visited) this.engine.markVisited(poi.id);
      if (poi.lastNotifiedAtMillis != null) this.engine.recordNotified(poi.id, poi.lastNotifiedAtMillis);
    }
  }

  /**
   * Hits are delivered one by one. A hit's cooldown is committed once the
   * sink has taken it, so a sink failure leaves that POI due for the next
   * fix. Failures are collected and raised together after the last hit.
   */
  async handleFix(fix: PositionFix): Promise<FixOutcome> {
    return this.lock(async () => {
      const rejection = this.rejectFix(fix);
      if (rejection) return { accepted: false, reason: rejection };
      this.lastAccepted = fix;

      const now = fix.timestampMillis;
      const delivered: ProximityHit[] = [];
      const failures: DeliveryFailure[] = [];

      for (const hit of this.engine.due(fix, this.deps.registry.active(), now)) {
        const poiId = hit.poi.id;
        try {
          await this.deps.sink.notify(hit);
        } catch (error) {
          failures.push({ poiId, stage: "notify", error });
          continue;
        }

        this.engine.recordNotified(poiId, now);
        delivered.push(hit);
        // eslint-disable-next-line no-console
        console.log(JSON.stringify({
          event: "proximity.fired",
          poiId,
          distanceMeters: Math.round(hit.distanceMeters),
          radius: hit.poi.notificationRadius
        }));

        try {
          await this.deps.registry.recordNotified(poiId, now);
          await this.deps.repo.updateLastNotifiedAt(poiId, now);
        } catch (error) {
          failures.push({ poiId, stage: "persist", error });
        }
      }

      if (failures.length > 0) {
        failures.forEach(logDeliveryFailure);
        throw new NotificationDeliveryError(delivered, failures);
      }
      return { accepted: true, hits: delivered };
    });
  }

  nearby(position: GeoPosition, maxDistanceMeters = this.config.nearbyMaxDistanceMeters): ProximityHit[] {
    return this.engine.nearby(position, this.deps.registry.active(), maxDistanceMeters);
  }

  async markVisited(poiId: string): Promise<void> {
    return this.lock(async () => {
      this.engine.markVisited(poiId);
      await this.deps.registry.markVisited(poiId);
      await this.deps.repo.markVisited(poiId);
    });
  }

  /** Starts the survey over: clears visited latches, notification times and the fix filter. */
  async reset(): Promise<void> {
    return this.lock(async () => {
      this.engine.reset();
      this.lastAccepted = undefined;
      await this.deps.registry.clearSurveyState();
      await this.deps.repo.clearSurveyState();
    });
  }

  isVisited(poiId: string): boolean {
    return this.engine.isVisited(poiId);
  }

  private rejectFix(fix: PositionFix): "too_soon" | "too_close" | undefined {
    const last = this.lastAccepted;
    if (!last) return undefined;
    if (fix.timestampMillis - last.timestampMillis < this.config.minFixIntervalMs) return "too_soon";
    if (distanceMeters(last, fix) < this.config.minFixDisplacementMeters) return "too_close";
    return undefined;
  }
}
