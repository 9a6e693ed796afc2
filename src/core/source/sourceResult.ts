export type SourceFailureCode =
  | "unreadable_payload"
  | "unexpected_shape"
  | "http_error"
  | "timeout"
  | "network_error"
  | "empty_body";

export type SourceFailure = {
  code: SourceFailureCode;
  message: string;
  status?: number;
  cause?: unknown;
};

/**
 * Outcome of reading one source. `empty` means the source answered and had
 * nothing usable; `failed` means it could not be read at all.
 */
export type SourceResult<T> =
  | { kind: "items"; items: T[]; skipped: number }
  | { kind: "empty"; skipped: number }
  | { kind: "failed"; failure: SourceFailure };

export const fromItems = <T>(items: T[], skipped = 0): SourceResult<T> =>
  items.length > 0 ? { kind: "items", items, skipped } : { kind: "empty", skipped };

export const sourceFailed = <T>(
  code: SourceFailureCode,
  message: string,
  extra: Pick<SourceFailure, "status" | "cause"> = {}
): SourceResult<T> => ({ kind: "failed", failure: { code, message, ...extra } });

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};
