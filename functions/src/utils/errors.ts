import * as logger from "firebase-functions/logger";
import { HttpsError } from "firebase-functions/v2/https";
import { InvalidIdentifierError, StorageUnavailableError } from "../storage/errors";

const truthy = new Set(["true", "t", "1", "yes", "y", "on"]);
const falsy = new Set(["false", "f", "0", "no", "n", "off"]);

export function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new HttpsError("invalid-argument", `Invalid ${field}`);
  }
  return value.length > 0 ? value : undefined;
}

export function parseBooleanFlag(value: unknown, field: string): boolean {
  if (value === undefined) {
    return false;
  }
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (truthy.has(normalized)) {
      return true;
    }
    if (falsy.has(normalized)) {
      return false;
    }
  }
  throw new HttpsError("invalid-argument", `Invalid ${field}`);
}

export function toHttpsError(error: unknown): HttpsError {
  if (error instanceof HttpsError) {
    return error;
  }
  if (error instanceof InvalidIdentifierError) {
    return new HttpsError("invalid-argument", error.message);
  }
  if (error instanceof StorageUnavailableError) {
    logger.error("Document store unavailable", error);
    return new HttpsError("unavailable", "Database not available");
  }

  logger.error("Unhandled request failure", error);
  return new HttpsError("internal", "Internal error");
}
