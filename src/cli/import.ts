import { readFile } from "fs/promises";
import type { ImportRequest } from "../application/import-pois/importPois.usecase";
import { loadSamplePoiEntries } from "../application/import-pois/samplePois";
import { runImport } from "../composition/root";
import { buildCliErrorEnvelope, isDebugMode } from "./errorEnvelope";

export const USAGE = [
  "usage: survey-import [--replace] <command>",
  "  gpx <file> [--source=<gpx|manual>]",
  "  geojson <file>",
  "  overpass <lat> <lon> [radiusMeters]",
  "  samples"
].join("\n");

export type ImportCommand =
  | { kind: "gpx"; file: string; source?: "gpx" | "manual" }
  | { kind: "geojson"; file: string }
  | { kind: "overpass"; latitude: number; longitude: number; radiusMeters?: number }
  | { kind: "samples" };

export type ImportCliArgs = {
  replaceExisting: boolean;
  command: ImportCommand;
};

class UsageError extends Error {
  constructor(message: string) {
    super(`${message}\n${USAGE}`);
    this.name = "UsageError";
  }
}

const parseNumberArg = (name: string, raw: string | undefined): number => {
  const value = raw == null ? Number.NaN : Number(raw);
  if (!Number.isFinite(value)) throw new UsageError(`${name} must be a number. Received: ${String(raw)}`);
  return value;
};

export const parseImportArgs = (argv: string[]): ImportCliArgs => {
  const flags = argv.filter((arg) => arg.startsWith("--"));
  const positional = argv.filter((arg) => !arg.startsWith("--"));
  const replaceExisting = flags.includes("--replace");
  const sourceFlag = flags.find((flag) => flag.startsWith("--source="))?.slice("--source=".length);

  const [kind, ...rest] = positional;
  switch (kind) {
    case "gpx": {
      const file = rest[0];
      if (!file) throw new UsageError("gpx needs a file");
      if (sourceFlag == null) return { replaceExisting, command: { kind: "gpx", file } };
      const source = sourceFlag === "gpx" || sourceFlag === "manual" ? sourceFlag : undefined;
      if (source == null) {
        throw new UsageError(`--source must be gpx or manual. Received: ${sourceFlag}`);
      }
      return { replaceExisting, command: { kind: "gpx", file, source } };
    }
    case "geojson": {
      const file = rest[0];
      if (!file) throw new UsageError("geojson needs a file");
      return { replaceExisting, command: { kind: "geojson", file } };
    }
    case "overpass": {
      const latitude = parseNumberArg("lat", rest[0]);
      const longitude = parseNumberArg("lon", rest[1]);
      const radiusMeters = rest[2] == null ? undefined : parseNumberArg("radiusMeters", rest[2]);
      return { replaceExisting, command: { kind: "overpass", latitude, longitude, radiusMeters } };
    }
    case "samples":
      return { replaceExisting, command: { kind: "samples" } };
    default:
      throw new UsageError(kind ? `unknown command: ${kind}` : "missing command");
  }
};

export const toImportRequest = async (command: ImportCommand): Promise<ImportRequest> => {
  switch (command.kind) {
    case "gpx":
      return {
        kind: "gpx",
        xml: await readFile(command.file, "utf8"),
        source: command.source
      };
    case "geojson":
      return { kind: "geojson", json: await readFile(command.file, "utf8") };
    case "overpass":
      return {
        kind: "overpass",
        latitude: command.latitude,
        longitude: command.longitude,
        radiusMeters: command.radiusMeters
      };
    case "samples":
      return { kind: "manual", entries: await loadSamplePoiEntries() };
  }
};

export const executeImportCli = async (argv: string[] = process.argv.slice(2)): Promise<void> => {
  try {
    const args = parseImportArgs(argv);
    const request = await toImportRequest(args.command);
    const summary = await runImport([request], { replaceExisting: args.replaceExisting });
    if (summary.failedSources.length > 0) {
      process.exitCode = 2;
    }
  } catch (err) {
    const envelope = buildCliErrorEnvelope("import.failed", err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeImportCli();
}
