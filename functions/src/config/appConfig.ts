import * as logger from "firebase-functions/logger";

export interface AppConfig {
  region: string;
  maxInstances: number;
  databaseId?: string;
}

const DEFAULTS: AppConfig = {
  region: "us-central1",
  maxInstances: 10
};

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const region = env.API_REGION?.trim() || DEFAULTS.region;
  const databaseId = env.FIRESTORE_DATABASE_ID?.trim() || undefined;

  return {
    region,
    maxInstances: parsePositiveInt(env.API_MAX_INSTANCES, "API_MAX_INSTANCES", DEFAULTS.maxInstances),
    ...(databaseId ? { databaseId } : {})
  };
}

function parsePositiveInt(raw: string | undefined, name: string, fallback: number): number {
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    logger.warn(`Ignoring ${name}="${raw}": expected a positive integer, using ${fallback}`);
    return fallback;
  }
  return value;
}
