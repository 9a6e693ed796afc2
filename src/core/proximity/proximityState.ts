/**
 * Per-POI survey state owned by one proximity engine: when each POI last
 * fired and which POIs the surveyor has marked as visited.
 */
export interface ProximityStateStore {
  lastNotifiedAt(poiId: string): number | undefined;
  recordNotified(poiId: string, atMillis: number): void;
  isVisited(poiId: string): boolean;
  markVisited(poiId: string): void;
  clear(): void;
}

export class InMemoryProximityStateStore implements ProximityStateStore {
  private readonly lastNotified = new Map<string, number>();
  private readonly visited = new Set<string>();

  lastNotifiedAt(poiId: string): number | undefined {
    return this.lastNotified.get(poiId);
  }

  recordNotified(poiId: string, atMillis: number): void {
    const previous = this.lastNotified.get(poiId);
    if (previous != null && previous > atMillis) return;
    this.lastNotified.set(poiId, atMillis);
  }

  isVisited(poiId: string): boolean {
    return this.visited.has(poiId);
  }

  markVisited(poiId: string): void {
    this.visited.add(poiId);
  }

  clear(): void {
    this.lastNotified.clear();
    this.visited.clear();
  }
}
