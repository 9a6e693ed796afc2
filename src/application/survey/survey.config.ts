import { DEFAULT_COOLDOWN_MS, DEFAULT_NEARBY_MAX_DISTANCE_M } from "../../core/proximity/ProximityEngine";
import { assertIntegerInRange } from "../import-pois/importer.config";

export type SurveyConfig = {
  cooldownMs: number;
  nearbyMaxDistanceMeters: number;
  // a fix is dropped when it is closer than either threshold to the last accepted fix
  minFixIntervalMs: number;
  minFixDisplacementMeters: number;
};

export type SurveyConfigInput = Partial<SurveyConfig>;

export const defaultSurveyConfig: SurveyConfig = {
  cooldownMs: DEFAULT_COOLDOWN_MS,
  nearbyMaxDistanceMeters: DEFAULT_NEARBY_MAX_DISTANCE_M,
  minFixIntervalMs: 5000,
  minFixDisplacementMeters: 10
};

export const surveyCaps = {
  cooldownMs: { min: 0, max: 24 * 60 * 60 * 1000 },
  nearbyMaxDistanceMeters: { min: 1, max: 100000 },
  minFixIntervalMs: { min: 0, max: 600000 },
  minFixDisplacementMeters: { min: 0, max: 10000 }
} as const;

export const validateSurveyConfig = (config: SurveyConfig): SurveyConfig => {
  assertIntegerInRange("cooldownMs", config.cooldownMs, surveyCaps.cooldownMs.min, surveyCaps.cooldownMs.max);
  assertIntegerInRange(
    "nearbyMaxDistanceMeters",
    config.nearbyMaxDistanceMeters,
    surveyCaps.nearbyMaxDistanceMeters.min,
    surveyCaps.nearbyMaxDistanceMeters.max
  );
  assertIntegerInRange(
    "minFixIntervalMs",
    config.minFixIntervalMs,
    surveyCaps.minFixIntervalMs.min,
    surveyCaps.minFixIntervalMs.max
  );
  assertIntegerInRange(
    "minFixDisplacementMeters",
    config.minFixDisplacementMeters,
    surveyCaps.minFixDisplacementMeters.min,
    surveyCaps.minFixDisplacementMeters.max
  );
  return config;
};

export const resolveSurveyConfig = (input: SurveyConfigInput = {}): SurveyConfig =>
  validateSurveyConfig({ ...defaultSurveyConfig, ...input });
