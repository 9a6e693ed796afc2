export type AreaQuery = {
  latitude: number;
  longitude: number;
  radiusMeters: number;
};

export const DEFAULT_QUERY_RADIUS_M = 1000;

/**
 * Bicycle-rental docking stations around a point. Ways are returned with a
 * `center` so every element resolves to one coordinate.
 */
export const buildDockingStationQuery = ({ latitude, longitude, radiusMeters }: AreaQuery): string =>
  [
    "[out:json][timeout:25];",
    "(",
    `  node["bicycle_rental"="docking_station"](around:${radiusMeters},${latitude},${longitude});`,
    `  way["bicycle_rental"="docking_station"](around:${radiusMeters},${latitude},${longitude});`,
    ");",
    "out center;"
  ].join("\n");
