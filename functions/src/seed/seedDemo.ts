import * as logger from "firebase-functions/logger";
import { createKid, createMoment, KID_COLLECTION, MOMENT_COLLECTION } from "../family/familyStore";
import type { KidInput, MomentInput } from "../family/records";
import { where, type StorageGateway } from "../storage/gateway";

export const DEMO_KID_NAME = "Ava";

export interface SeedResult {
  inserted: string[];
}

const demoKid: KidInput = {
  name: DEMO_KID_NAME,
  nickname: "Aves",
  avatarUrl: "https://images.unsplash.com/photo-1503454537195-1dcabb73ffb9?w=640",
  parentEmail: "parent@littleyears.demo",
  allowedGrandparents: ["grandma@family.demo"]
};

const demoMoments: Omit<MomentInput, "kidId">[] = [
  {
    type: "photo",
    title: "First bike ride!",
    description: "Sunset cruise in the park",
    mediaUrl: "https://images.unsplash.com/photo-1492724441997-5dc865305da7?w=1200",
    thumbnailUrl: "https://images.unsplash.com/photo-1492724441997-5dc865305da7?w=400",
    visibility: "public",
    tags: ["milestone", "outdoors"]
  },
  {
    type: "art",
    title: "Finger painting",
    description: "Blue and yellow masterpiece",
    mediaUrl: "https://images.unsplash.com/photo-1582719478250-c89cae4dc85b?w=1200",
    thumbnailUrl: "https://images.unsplash.com/photo-1582719478250-c89cae4dc85b?w=400",
    visibility: "private",
    tags: ["art", "home"]
  },
  {
    type: "audio",
    title: "Goodnight message",
    description: "Ava says goodnight to Grandma",
    mediaUrl: "https://www.soundhelix.com/examples/mp3/SoundHelix-Song-1.mp3",
    visibility: "public",
    tags: ["voice"]
  }
];

/**
 * Replaces any previous demo family with a fresh one. Not safe to run
 * concurrently with itself: two calls can interleave their delete and insert
 * steps.
 */
export async function handleSeedDemo(gateway: StorageGateway): Promise<SeedResult> {
  const previous = await gateway.query(KID_COLLECTION, [where("name", "==", DEMO_KID_NAME)]);
  let removedMoments = 0;
  for (const kid of previous) {
    removedMoments += await gateway.deleteWhere(MOMENT_COLLECTION, [where("kidId", "==", kid.id)]);
  }
  const removedKids = await gateway.deleteWhere(KID_COLLECTION, [where("name", "==", DEMO_KID_NAME)]);

  const kidId = await createKid(gateway, demoKid);
  const inserted = [kidId];
  for (const moment of demoMoments) {
    inserted.push(await createMoment(gateway, { ...moment, kidId }));
  }

  logger.info("Seeded demo family", { kidId, removedKids, removedMoments, inserted: inserted.length });
  return { inserted };
}
