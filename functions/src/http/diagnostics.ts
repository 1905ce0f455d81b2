import * as logger from "firebase-functions/logger";
import { StorageUnavailableError } from "../storage/errors";
import type { StorageGateway } from "../storage/gateway";

export interface Diagnostics {
  backend: "running";
  database: string;
  collections?: string[];
}

export async function handleDiagnostics(gateway: StorageGateway): Promise<Diagnostics> {
  try {
    const collections = await gateway.listCollections();
    return { backend: "running", database: "connected", collections };
  } catch (error) {
    logger.warn("Database connectivity check failed", error);
    if (error instanceof StorageUnavailableError) {
      return { backend: "running", database: "not available" };
    }
    const message = error instanceof Error ? error.message : String(error);
    return { backend: "running", database: `error: ${message.slice(0, 80)}` };
  }
}
