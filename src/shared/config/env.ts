export type Env = {
  MONGO_URI: string;
  OVERPASS_BASE_URL: string;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const MONGO_URI = env.MONGO_URI ?? "mongodb://localhost:27017/survey";
  const OVERPASS_BASE_URL = validateHttpUrl(
    "OVERPASS_BASE_URL",
    env.OVERPASS_BASE_URL ?? "https://overpass-api.de/api/interpreter"
  );

  return { MONGO_URI, OVERPASS_BASE_URL };
};
