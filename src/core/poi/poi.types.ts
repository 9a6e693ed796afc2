export type GeoPosition = {
  latitude: number;
  longitude: number;
};

export const POI_SOURCES = ["gpx", "bikeshare_geojson", "overpass", "manual"] as const;

export type PoiSource = (typeof POI_SOURCES)[number];

export const isPoiSource = (value: unknown): value is PoiSource =>
  POI_SOURCES.some((source) => source === value);

export const POI_CATEGORIES = [
  "SHOP",
  "RESTAURANT",
  "TOURIST_ATTRACTION",
  "PUBLIC_TRANSPORT",
  "AMENITY",
  "HISTORIC",
  "NATURAL",
  "INFRASTRUCTURE",
  "UNKNOWN"
] as const;

export type PoiCategory = (typeof POI_CATEGORIES)[number];

/** Notification priority: -1 low, 0 normal, 1 high, 2 highest. */
export const POI_PRIORITIES = [-1, 0, 1, 2] as const;

export type PoiPriority = (typeof POI_PRIORITIES)[number];

export type Poi = {
  id: string;
  name: string;
  description?: string;
  position: GeoPosition;
  category: PoiCategory;
  notificationRadius: number; // meters
  priority: PoiPriority;
  visited: boolean;
  lastNotifiedAtMillis?: number;
  createdAt: Date;
  source: PoiSource;
  tags: Record<string, string>;
  isActive: boolean;
};

export const DEFAULT_NOTIFICATION_RADIUS_M = 50;
