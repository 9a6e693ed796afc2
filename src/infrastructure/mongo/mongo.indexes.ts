/**
 * Index plan for the POI collection:
 * - `source` for bulk delete / re-import scoping
 * - `visited` for stats
 * - 2dsphere on `location` for area lookups
 */
export const mongoIndexes = {
  poiCollection: [
    { keys: { source: 1 }, options: {} },
    { keys: { visited: 1 }, options: {} },
    { keys: { location: "2dsphere" }, options: {} }
  ]
} as const;
