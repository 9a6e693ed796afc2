export type OverpassRequestError = Error & {
  status?: number;
  isTimeout?: boolean;
  isEmptyBody?: boolean;
  isMalformedBody?: boolean;
  retryDelayMs?: number;
  requestUrl?: string;
};

export interface OverpassClient {
  /** Runs an Overpass QL query and resolves with the decoded JSON body. */
  query(overpassQl: string): Promise<unknown>;
}

export const isRequestError = (err: unknown): err is OverpassRequestError =>
  err instanceof Error &&
  ("status" in err || "isTimeout" in err || "isEmptyBody" in err || "isMalformedBody" in err);
