import { readFile } from "fs/promises";
import type { GpxTrackPoint } from "../core/normalizers/gpx/gpx.types";
import { parseGpx } from "../core/normalizers/gpx/parseGpx";
import { runSurveyReplay } from "../composition/root";
import type { PositionFix } from "../ports/PositionSource";
import { buildCliErrorEnvelope, isDebugMode } from "./errorEnvelope";

export const USAGE = "usage: survey-replay <track.gpx> [--reset] [--step-ms=<ms>]";

/**
 * Turns recorded track points into position fixes. Points without a
 * timestamp are spaced `stepMs` after the previous fix.
 */
export const trackToFixes = (points: GpxTrackPoint[], stepMs: number, startMillis = 0): PositionFix[] => {
  const fixes: PositionFix[] = [];
  let previous = startMillis - stepMs;
  for (const point of points) {
    const timestampMillis = point.time?.getTime() ?? previous + stepMs;
    fixes.push({ latitude: point.latitude, longitude: point.longitude, timestampMillis });
    previous = timestampMillis;
  }
  return fixes;
};

export const executeSurveyCli = async (argv: string[] = process.argv.slice(2)): Promise<void> => {
  try {
    const file = argv.find((arg) => !arg.startsWith("--"));
    if (!file) throw new Error(USAGE);
    const stepFlag = argv.find((arg) => arg.startsWith("--step-ms="));
    const stepMs = stepFlag ? Number(stepFlag.slice("--step-ms=".length)) : 5000;
    if (!Number.isInteger(stepMs) || stepMs < 0) throw new Error(`--step-ms must be an integer >= 0\n${USAGE}`);

    const parsed = parseGpx(await readFile(file, "utf8"));
    if (parsed.kind === "failed") {
      throw Object.assign(new Error(parsed.failure.message), { code: parsed.failure.code });
    }
    await runSurveyReplay(trackToFixes(parsed.document.trackPoints, stepMs, Date.now()), {
      reset: argv.includes("--reset")
    });
  } catch (err) {
    const envelope = buildCliErrorEnvelope("survey.failed", err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeSurveyCli();
}
