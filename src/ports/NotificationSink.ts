import type { ProximityHit } from "../core/proximity/ProximityEngine";

export interface NotificationSink {
  notify(hit: ProximityHit): Promise<void>;
}
