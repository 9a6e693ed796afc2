import { readFile } from "fs/promises";
import path from "path";

export const SAMPLE_POIS_PATH = path.resolve(__dirname, "../../../data/sample-pois.json");

export const loadSamplePoiEntries = async (filePath = SAMPLE_POIS_PATH): Promise<unknown[]> => {
  const parsed: unknown = JSON.parse(await readFile(filePath, "utf8"));
  if (!Array.isArray(parsed)) {
    throw new Error(`${filePath} must contain a JSON array`);
  }
  return parsed;
};
