import * as logger from "firebase-functions/logger";
import { HttpsError } from "firebase-functions/v2/https";
import { scopeToFilters, type MomentScope } from "../access/timelineAccess";
import { where, type StorageGateway, type StoredDocument } from "../storage/gateway";
import type { KidInput, KidRecord, MomentInput, MomentRecord, Stored } from "./records";
import { describeErrors, validateKid, validateMoment } from "./schemaValidators";

export const KID_COLLECTION = "kid";
export const MOMENT_COLLECTION = "moment";

export async function createKid(gateway: StorageGateway, input: KidInput): Promise<string> {
  const record: Record<string, unknown> = { ...input };
  if (!validateKid(record)) {
    throw new HttpsError("invalid-argument", `Invalid kid: ${describeErrors(validateKid.errors)}`);
  }
  return gateway.insert(KID_COLLECTION, record);
}

export async function createMoment(gateway: StorageGateway, input: MomentInput): Promise<string> {
  const record: Record<string, unknown> = { ...input };
  if (!validateMoment(record)) {
    throw new HttpsError(
      "invalid-argument",
      `Invalid moment: ${describeErrors(validateMoment.errors)}`
    );
  }
  return gateway.insert(MOMENT_COLLECTION, record);
}

export async function loadKid(gateway: StorageGateway, kidId: string): Promise<Stored<KidRecord> | null> {
  const doc = await gateway.findById(KID_COLLECTION, kidId);
  if (!doc) {
    return null;
  }

  const kid = decodeKid(doc);
  if (!kid) {
    logger.error(`Stored kid ${doc.id} does not match the kid schema`, {
      errors: describeErrors(validateKid.errors)
    });
    throw new HttpsError("internal", "Stored kid record is malformed");
  }
  return kid;
}

export async function listKids(gateway: StorageGateway, grandparent?: string): Promise<Stored<KidRecord>[]> {
  const filters = grandparent ? [where("allowedGrandparents", "array-contains", grandparent)] : [];
  const docs = await gateway.query(KID_COLLECTION, filters);
  return keepValid(docs, decodeKid, KID_COLLECTION);
}

export async function listMoments(gateway: StorageGateway, scope: MomentScope): Promise<Stored<MomentRecord>[]> {
  const docs = await gateway.query(MOMENT_COLLECTION, scopeToFilters(scope));
  return keepValid(docs, decodeMoment, MOMENT_COLLECTION);
}

function decodeKid(doc: StoredDocument): Stored<KidRecord> | null {
  const data = { ...doc.data };
  return validateKid(data) ? { id: doc.id, record: data } : null;
}

function decodeMoment(doc: StoredDocument): Stored<MomentRecord> | null {
  const data = { ...doc.data };
  return validateMoment(data) ? { id: doc.id, record: data } : null;
}

function keepValid<T>(
  docs: StoredDocument[],
  decode: (doc: StoredDocument) => Stored<T> | null,
  collection: string
): Stored<T>[] {
  const valid: Stored<T>[] = [];
  for (const doc of docs) {
    const decoded = decode(doc);
    if (decoded) {
      valid.push(decoded);
    } else {
      logger.warn(`Skipping malformed ${collection} document ${doc.id}`);
    }
  }
  return valid;
}
