import { buildDockingStationQuery, type AreaQuery } from "../../core/normalizers/overpass/dockingStationQuery";
import { normalizeOverpassResponse } from "../../core/normalizers/overpass/normalizeOverpassResponse";
import type { Poi } from "../../core/poi/poi.types";
import { sourceFailed, toErrorMessage, type SourceResult } from "../../core/source/sourceResult";
import { isRequestError, type OverpassClient } from "../../ports/OverpassClient";

const toFailure = (err: unknown): SourceResult<Poi> => {
  const message = toErrorMessage(err);
  if (isRequestError(err)) {
    if (err.isTimeout) return sourceFailed("timeout", message, { cause: err });
    if (err.isEmptyBody) return sourceFailed("empty_body", message, { cause: err });
    if (err.isMalformedBody) return sourceFailed("unexpected_shape", message, { cause: err });
    if (err.status != null) return sourceFailed("http_error", message, { status: err.status, cause: err });
  }
  return sourceFailed("network_error", message, { cause: err });
};

/**
 * Queries docking stations around a point. Never rejects: transport and
 * payload problems come back as a `failed` result.
 */
export const fetchDockingStations = async (client: OverpassClient, area: AreaQuery): Promise<SourceResult<Poi>> => {
  let payload: unknown;
  try {
    payload = await client.query(buildDockingStationQuery(area));
  } catch (err) {
    return toFailure(err);
  }
  return normalizeOverpassResponse(payload);
};
