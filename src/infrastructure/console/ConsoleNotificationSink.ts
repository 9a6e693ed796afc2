import type { ProximityHit } from "../../core/proximity/ProximityEngine";
import type { NotificationSink } from "../../ports/NotificationSink";

/** Writes one JSON line per proximity notification to stdout. */
export class ConsoleNotificationSink implements NotificationSink {
  async notify(hit: ProximityHit): Promise<void> {
    // eslint-disable-next-line no-console
    console.log(JSON.stringify({
      event: "survey.notification",
      poiId: hit.poi.id,
      name: hit.poi.name,
      category: hit.poi.category,
      distanceMeters: Math.round(hit.distanceMeters)
    }));
  }
}
