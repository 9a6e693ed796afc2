import { InvalidPoiError } from "../poi/createPoi";
import type { PoiSource } from "../poi/poi.types";
import { toErrorMessage } from "../source/sourceResult";

export type SkippedItemLog = {
  event: "normalize.item_skipped";
  source: PoiSource;
  index: number;
  reason: string;
  unexpected?: true;
};

/**
 * Logs one item dropped from a batch. Only the reason and position are
 * logged, never the payload itself.
 */
export const logSkippedItem = (source: PoiSource, index: number, reason: unknown): void => {
  const log: SkippedItemLog = {
    event: "normalize.item_skipped",
    source,
    index,
    reason: toErrorMessage(reason)
  };
  if (!(reason instanceof InvalidPoiError)) {
    log.unexpected = true;
  }
  // eslint-disable-next-line no-console
  console.warn(JSON.stringify(log));
};

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const optionalString = (value: unknown): string | undefined => {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed === "" ? undefined : trimmed;
  }
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return undefined;
};

export const optionalNumber = (value: unknown): number | undefined => {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
};
