export * from "./core/poi/poi.types";
export { categoryInfo, classifyCategory, parsePoiCategory } from "./core/poi/category";
export { createPoi, InvalidPoiError, type PoiInput } from "./core/poi/createPoi";
export { distanceMeters, EARTH_RADIUS_METERS, isValidPosition } from "./core/geo/distance";
export * from "./core/source/sourceResult";

export { parseGpx, type GpxParseResult } from "./core/normalizers/gpx/parseGpx";
export type { GpxDocument, GpxTrackPoint, GpxWaypoint } from "./core/normalizers/gpx/gpx.types";
export { normalizeGpx, normalizeWaypoints } from "./core/normalizers/gpx/normalizeWaypoints";
export {
  capacityPriority,
  describeStation,
  normalizeBikeShareFeatures,
  normalizeBikeShareGeoJson,
  priorityRadius
} from "./core/normalizers/geojson/normalizeBikeShareFeatures";
export { buildDockingStationQuery, type AreaQuery } from "./core/normalizers/overpass/dockingStationQuery";
export { normalizeOverpassResponse, overpassPoiId } from "./core/normalizers/overpass/normalizeOverpassResponse";
export { normalizeManualPois } from "./core/normalizers/manual/normalizeManualPois";

export { ProximityEngine, type ProximityHit, type ProximityEngineOptions } from "./core/proximity/ProximityEngine";
export { InMemoryProximityStateStore, type ProximityStateStore } from "./core/proximity/proximityState";
export { PoiRegistry } from "./core/registry/PoiRegistry";

export type { PoiRepository, PoiStats } from "./ports/PoiRepository";
export type { OverpassClient } from "./ports/OverpassClient";
export type { NotificationSink } from "./ports/NotificationSink";
export type { PositionFix } from "./ports/PositionSource";

export { fetchDockingStations } from "./application/discover-stations/fetchDockingStations";
export { importPois, type ImportRequest } from "./application/import-pois/importPois.usecase";
export { ImportFatalError, type ImportRunSummary } from "./application/import-pois/import.error-handler";
export { SurveySession, type FixOutcome } from "./application/survey/SurveySession";
export { NotificationDeliveryError, type DeliveryFailure, type DeliveryStage } from "./application/survey/survey.errors";

export { MongoPoiRepository } from "./infrastructure/mongo/MongoPoiRepository";
export { OverpassHttpClient } from "./infrastructure/overpass/OverpassHttpClient";
export { ConsoleNotificationSink } from "./infrastructure/console/ConsoleNotificationSink";
