import { HttpsError } from "firebase-functions/v2/https";
import { decideTimelineAccess } from "../access/timelineAccess";
import { listMoments, loadKid } from "../family/familyStore";
import { toPublic, type KidRecord, type PublicKid, type PublicMoment, type Stored } from "../family/records";
import { InvalidIdentifierError } from "../storage/errors";
import type { StorageGateway } from "../storage/gateway";

export interface TimelineInput {
  kidId: string;
  includePrivate: boolean;
  grandparent?: string;
}

export interface TimelineResult {
  kid: PublicKid;
  moments: PublicMoment[];
  includesPrivate: boolean;
}

export async function handleGetKidTimeline(
  gateway: StorageGateway,
  input: TimelineInput
): Promise<TimelineResult> {
  if (input.kidId.trim().length === 0) {
    throw new HttpsError("invalid-argument", "Invalid kid id");
  }

  const kid = await findKid(gateway, input.kidId);
  const access = decideTimelineAccess({
    kidId: kid.id,
    kid: kid.record,
    includePrivate: input.includePrivate,
    grandparentEmail: input.grandparent
  });

  const moments = await listMoments(gateway, access.scope);

  return {
    kid: toPublic(kid),
    moments: sortNewestFirst(moments).map(toPublic),
    includesPrivate: access.includesPrivate
  };
}

/**
 * Newest first by `createdAt`, compared as instants rather than strings.
 * Undated entries sink below every dated one and keep the order the store
 * returned them in.
 */
export function sortNewestFirst<T extends { createdAt?: string }>(items: Stored<T>[]): Stored<T>[] {
  return [...items].sort((a, b) => {
    const left = instantOf(a.record);
    const right = instantOf(b.record);
    if (left === undefined || right === undefined) {
      return Number(left === undefined) - Number(right === undefined);
    }
    return right - left;
  });
}

function instantOf(record: { createdAt?: string }): number | undefined {
  if (record.createdAt === undefined) {
    return undefined;
  }
  const millis = Date.parse(record.createdAt);
  return Number.isNaN(millis) ? undefined : millis;
}

async function findKid(gateway: StorageGateway, kidId: string): Promise<Stored<KidRecord>> {
  let kid: Stored<KidRecord> | null;
  try {
    kid = await loadKid(gateway, kidId);
  } catch (error) {
    if (error instanceof InvalidIdentifierError) {
      throw new HttpsError("invalid-argument", "Invalid kid id");
    }
    throw error;
  }

  if (!kid) {
    throw new HttpsError("not-found", "Kid not found");
  }
  return kid;
}
