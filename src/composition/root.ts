import { importPois, type ImportRequest } from "../application/import-pois/importPois.usecase";
import type { ImportRunSummary } from "../application/import-pois/import.error-handler";
import { SurveySession } from "../application/survey/SurveySession";
import { PoiRegistry } from "../core/registry/PoiRegistry";
import { ConsoleNotificationSink } from "../infrastructure/console/ConsoleNotificationSink";
import { MongoPoiRepository } from "../infrastructure/mongo/MongoPoiRepository";
import { OverpassHttpClient } from "../infrastructure/overpass/OverpassHttpClient";
import type { PositionFix } from "../ports/PositionSource";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";

export type ImportRunOptions = {
  replaceExisting?: boolean;
};

export const runImport = async (requests: ImportRequest[], options: ImportRunOptions = {}): Promise<ImportRunSummary> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();

  const overpass = new OverpassHttpClient(env.OVERPASS_BASE_URL, runtime.timeoutMs, runtime.retries);
  const repo = new MongoPoiRepository(env.MONGO_URI);
  const registry = new PoiRegistry();
  const config = {
    ...runtime.importerConfig,
    replaceExisting: options.replaceExisting ?? runtime.importerConfig.replaceExisting
  };

  try {
    return await importPois({ repo, registry, overpass, config }, requests);
  } finally {
    await repo.close();
  }
};

export type SurveyReplaySummary = {
  fixes: number;
  accepted: number;
  notifications: number;
};

/** Replays recorded fixes against the stored POIs, as a live survey would see them. */
export const runSurveyReplay = async (
  fixes: PositionFix[],
  options: { reset?: boolean } = {}
): Promise<SurveyReplaySummary> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();
  const repo = new MongoPoiRepository(env.MONGO_URI);

  try {
    const registry = new PoiRegistry(await repo.queryAll());
    const session = new SurveySession({
      registry,
      repo,
      sink: new ConsoleNotificationSink(),
      config: runtime.surveyConfig
    });
    if (options.reset) await session.reset();

    const summary: SurveyReplaySummary = { fixes: fixes.length, accepted: 0, notifications: 0 };
    for (const fix of fixes) {
      const outcome = await session.handleFix(fix);
      if (outcome.accepted) {
        summary.accepted += 1;
        summary.notifications += outcome.hits.length;
      }
    }
    // eslint-disable-next-line no-console
    console.log(JSON.stringify({ event: "survey.replay_completed", ...summary }));
    return summary;
  } finally {
    await repo.close();
  }
};
