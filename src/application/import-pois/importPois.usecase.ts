import { fetchDockingStations } from "../discover-stations/fetchDockingStations";
import { normalizeBikeShareGeoJson } from "../../core/normalizers/geojson/normalizeBikeShareFeatures";
import { normalizeGpx } from "../../core/normalizers/gpx/normalizeWaypoints";
import { normalizeManualPois } from "../../core/normalizers/manual/normalizeManualPois";
import type { Poi, PoiSource } from "../../core/poi/poi.types";
import type { PoiRegistry } from "../../core/registry/PoiRegistry";
import type { SourceResult } from "../../core/source/sourceResult";
import type { OverpassClient } from "../../ports/OverpassClient";
import type { PoiRepository } from "../../ports/PoiRepository";
import { createLimiter, createMutex } from "../../shared/concurrency/limiter";
import type { ImporterConfigInput } from "./importer.config";
import { resolveImporterConfig } from "./importer.config";
import {
  logSourceFailure,
  summarizeOutcomes,
  type ImportOutcome,
  type ImportRunSummary,
  wrapRepositoryFailure
} from "./import.error-handler";

export type ImportRequest =
  | { kind: "gpx"; xml: string; source?: PoiSource }
  | { kind: "geojson"; json: string }
  | { kind: "overpass"; latitude: number; longitude: number; radiusMeters?: number }
  | { kind: "manual"; entries: unknown[] };

export type ImportDeps = {
  repo: PoiRepository;
  registry: PoiRegistry;
  overpass: OverpassClient;
  config?: ImporterConfigInput;
  now?: () => Date;
};

export const requestSource = (request: ImportRequest): PoiSource => {
  switch (request.kind) {
    case "gpx":
      return request.source ?? "gpx";
    case "geojson":
      return "bikeshare_geojson";
    case "overpass":
      return "overpass";
    case "manual":
      return "manual";
  }
};

/**
 * Imports each request's source and persists the normalized POIs. Sources
 * are read in parallel up to `config.concurrency`. A source that cannot be
 * read is reported in the summary; a repository write failure fails the run
 * once every other request has settled.
 */
export const importPois = async (deps: ImportDeps, requests: ImportRequest[]): Promise<ImportRunSummary> => {
  const { repo, registry, overpass } = deps;
  const config = resolveImporterConfig(deps.config);

  const normalize = (request: ImportRequest): Promise<SourceResult<Poi>> | SourceResult<Poi> => {
    switch (request.kind) {
      case "gpx":
        return normalizeGpx(request.xml, { source: requestSource(request), now: deps.now });
      case "geojson":
        return normalizeBikeShareGeoJson(request.json);
      case "overpass":
        return fetchDockingStations(overpass, {
          latitude: request.latitude,
          longitude: request.longitude,
          radiusMeters: request.radiusMeters ?? config.overpassRadiusMeters
        });
      case "manual":
        return normalizeManualPois(request.entries);
    }
  };

  // sources are read in parallel; repository and registry writes run one at a time
  const limit = createLimiter(config.concurrency);
  const persistLock = createMutex();

  const importOne = async (request: ImportRequest, index: number): Promise<ImportOutcome> => {
    const source = requestSource(request);
    const result = await normalize(request);

    if (result.kind === "failed") {
      logSourceFailure(source, result.failure);
      return { source, status: "failed", failure: result.failure };
    }
    // An empty answer never clears existing POIs of the source.
    if (result.kind === "empty") {
      return { source, status: "empty", skipped: result.skipped };
    }

    const pois = result.items;
    return persistLock(async (): Promise<ImportOutcome> => {
      // upsert first, then prune the source's ids outside this batch
      try {
        await repo.insertMany(pois);
      } catch (error) {
        throw wrapRepositoryFailure(error, { source, index });
      }

      let removed = 0;
      if (config.replaceExisting) {
        try {
          removed = await repo.deleteAllFromSource(source, pois.map((poi) => poi.id));
        } catch (error) {
          await registry.upsertMany(pois);
          throw wrapRepositoryFailure(error, { source, index });
        }
        await registry.replaceSource(source, pois);
      } else {
        await registry.upsertMany(pois);
      }
      return { source, status: "imported", imported: pois.length, skipped: result.skipped, removed };
    });
  };

  const settled = await Promise.allSettled(requests.map((request, index) => limit(() => importOne(request, index))));

  const rejected = settled.find((r): r is PromiseRejectedResult => r.status === "rejected");
  if (rejected) {
    throw rejected.reason;
  }
  const outcomes = settled.flatMap((r) => (r.status === "fulfilled" ? [r.value] : []));

  const summary = summarizeOutcomes(outcomes);
  // eslint-disable-next-line no-console
  console.log(JSON.stringify({ event: "import.completed", ...summary }));
  return summary;
};
