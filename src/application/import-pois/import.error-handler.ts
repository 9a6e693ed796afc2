import type { PoiSource } from "../../core/poi/poi.types";
import { toErrorMessage, type SourceFailure } from "../../core/source/sourceResult";

export type ImportFailureCode = "repository_write_failed";

export type ImportErrorContext = {
  source: PoiSource;
  index: number;
};

export class ImportFatalError extends Error {
  readonly code: ImportFailureCode;
  readonly context: ImportErrorContext;
  readonly cause?: unknown;

  constructor(args: { code: ImportFailureCode; message: string; context: ImportErrorContext; cause?: unknown }) {
    super(args.message);
    this.name = "ImportFatalError";
    this.code = args.code;
    this.context = args.context;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const wrapRepositoryFailure = (reason: unknown, context: ImportErrorContext) => {
  const message = `Repository write failed for source=${context.source}, request=${context.index}: ${toErrorMessage(reason)}`;
  const cause = reason instanceof Error ? reason.cause ?? reason : reason;
  return new ImportFatalError({
    code: "repository_write_failed",
    message,
    context,
    cause
  });
};

type SourceFailedLog = {
  event: "import.source_failed";
  source: PoiSource;
  code: SourceFailure["code"];
  reason: string;
  status?: number;
};

// Only the failure code and message are logged; `cause` may hold payload text.
export const logSourceFailure = (source: PoiSource, failure: SourceFailure): void => {
  const log: SourceFailedLog = {
    event: "import.source_failed",
    source,
    code: failure.code,
    reason: failure.message
  };
  if (failure.status != null) log.status = failure.status;
  // eslint-disable-next-line no-console
  console.warn(JSON.stringify(log));
};

export type ImportOutcome =
  | { source: PoiSource; status: "imported"; imported: number; skipped: number; removed: number }
  | { source: PoiSource; status: "empty"; skipped: number }
  | { source: PoiSource; status: "failed"; failure: SourceFailure };

export type ImportRunSummary = {
  requests: number;
  imported: number;
  skipped: number;
  removed: number;
  emptySources: PoiSource[];
  failedSources: PoiSource[];
};

export const summarizeOutcomes = (outcomes: ImportOutcome[]): ImportRunSummary => {
  const summary: ImportRunSummary = {
    requests: outcomes.length,
    imported: 0,
    skipped: 0,
    removed: 0,
    emptySources: [],
    failedSources: []
  };

  for (const outcome of outcomes) {
    switch (outcome.status) {
      case "imported":
        summary.imported += outcome.imported;
        summary.skipped += outcome.skipped;
        summary.removed += outcome.removed;
        break;
      case "empty":
        summary.skipped += outcome.skipped;
        summary.emptySources.push(outcome.source);
        break;
      case "failed":
        summary.failedSources.push(outcome.source);
        break;
    }
  }

  return summary;
};
