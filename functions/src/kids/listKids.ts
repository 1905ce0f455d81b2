import { listKids } from "../family/familyStore";
import { toPublic, type PublicKid } from "../family/records";
import type { StorageGateway } from "../storage/gateway";

export interface ListKidsInput {
  grandparent?: string;
}

export async function handleListKids(gateway: StorageGateway, input: ListKidsInput): Promise<PublicKid[]> {
  const kids = await listKids(gateway, input.grandparent);
  return kids.map(toPublic);
}
