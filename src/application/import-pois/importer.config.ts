import { DEFAULT_QUERY_RADIUS_M } from "../../core/normalizers/overpass/dockingStationQuery";

export type ImporterConfig = {
  concurrency: number;
  overpassRadiusMeters: number;
  replaceExisting: boolean;
};

export type ImporterConfigInput = Partial<ImporterConfig>;

export const defaultImporterConfig: ImporterConfig = {
  concurrency: 3,
  overpassRadiusMeters: DEFAULT_QUERY_RADIUS_M,
  replaceExisting: false
};

export const importerCaps = {
  concurrency: { min: 1, max: 10 },
  overpassRadiusMeters: { min: 1, max: 50000 }
} as const;

export const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateImporterConfig = (config: ImporterConfig): ImporterConfig => {
  assertIntegerInRange("concurrency", config.concurrency, importerCaps.concurrency.min, importerCaps.concurrency.max);
  assertIntegerInRange(
    "overpassRadiusMeters",
    config.overpassRadiusMeters,
    importerCaps.overpassRadiusMeters.min,
    importerCaps.overpassRadiusMeters.max
  );
  return config;
};

export const resolveImporterConfig = (input: ImporterConfigInput = {}): ImporterConfig =>
  validateImporterConfig({ ...defaultImporterConfig, ...input });
