import {
  defaultImporterConfig,
  importerCaps,
  type ImporterConfig,
  validateImporterConfig
} from "../../application/import-pois/importer.config";
import {
  defaultSurveyConfig,
  surveyCaps,
  type SurveyConfig,
  validateSurveyConfig
} from "../../application/survey/survey.config";

export const runtimeCaps = {
  timeoutMs: { min: 1000, max: 60000 },
  retries: { min: 0, max: 5 }
} as const;

export type RuntimeConfig = {
  importerConfig: ImporterConfig;
  surveyConfig: SurveyConfig;
  timeoutMs: number;
  retries: number;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalBoolean = (env: NodeJS.ProcessEnv, name: string): boolean | undefined => {
  const raw = env[name]?.trim().toLowerCase();
  if (raw == null || raw === "") return undefined;
  if (raw === "1" || raw === "true") return true;
  if (raw === "0" || raw === "false") return false;
  throw new Error(`${name}=${env[name] ?? ""} must be one of true, false, 1, 0`);
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const importerConfig = validateImporterConfig({
    concurrency: parseOptionalIntInRange(env, "IMPORT_CONCURRENCY", importerCaps.concurrency) ?? defaultImporterConfig.concurrency,
    overpassRadiusMeters:
      parseOptionalIntInRange(env, "OVERPASS_RADIUS_M", importerCaps.overpassRadiusMeters) ??
      defaultImporterConfig.overpassRadiusMeters,
    replaceExisting: parseOptionalBoolean(env, "IMPORT_REPLACE_EXISTING") ?? defaultImporterConfig.replaceExisting
  });

  const surveyConfig = validateSurveyConfig({
    cooldownMs: parseOptionalIntInRange(env, "PROXIMITY_COOLDOWN_MS", surveyCaps.cooldownMs) ?? defaultSurveyConfig.cooldownMs,
    nearbyMaxDistanceMeters:
      parseOptionalIntInRange(env, "NEARBY_MAX_DISTANCE_M", surveyCaps.nearbyMaxDistanceMeters) ??
      defaultSurveyConfig.nearbyMaxDistanceMeters,
    minFixIntervalMs:
      parseOptionalIntInRange(env, "SURVEY_MIN_INTERVAL_MS", surveyCaps.minFixIntervalMs) ??
      defaultSurveyConfig.minFixIntervalMs,
    minFixDisplacementMeters:
      parseOptionalIntInRange(env, "SURVEY_MIN_DISPLACEMENT_M", surveyCaps.minFixDisplacementMeters) ??
      defaultSurveyConfig.minFixDisplacementMeters
  });

  const timeoutMs = parseOptionalIntInRange(env, "OVERPASS_TIMEOUT_MS", runtimeCaps.timeoutMs) ?? 30000;
  const retries = parseOptionalIntInRange(env, "OVERPASS_RETRIES", runtimeCaps.retries) ?? 0;

  return { importerConfig, surveyConfig, timeoutMs, retries };
};
