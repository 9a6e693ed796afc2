import type { ProximityHit } from "../../core/proximity/ProximityEngine";
import { toErrorMessage } from "../../core/source/sourceResult";

export type DeliveryStage = "notify" | "persist";

export type DeliveryFailure = {
  poiId: string;
  stage: DeliveryStage;
  error: unknown;
};

/**
 * Raised after every hit of a fix has been tried. `delivered` holds the hits
 * that reached the sink; their cooldown is committed. Hits that failed at
 * the `notify` stage stay due and fire again on the next accepted fix.
 */
export class NotificationDeliveryError extends Error {
  readonly delivered: ProximityHit[];
  readonly failures: DeliveryFailure[];

  constructor(delivered: ProximityHit[], failures: DeliveryFailure[]) {
    const first = failures[0];
    super(
      `Proximity delivery failed for ${failures.length} POI(s)` +
        (first ? `; first: ${first.poiId} (${first.stage}): ${toErrorMessage(first.error)}` : "")
    );
    this.name = "NotificationDeliveryError";
    this.delivered = delivered;
    this.failures = failures;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const logDeliveryFailure = (failure: DeliveryFailure): void => {
  // eslint-disable-next-line no-console
  console.warn(JSON.stringify({
    event: "proximity.delivery_failed",
    poiId: failure.poiId,
    stage: failure.stage,
    reason: toErrorMessage(failure.error)
  }));
};
