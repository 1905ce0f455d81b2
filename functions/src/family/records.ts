export type MomentType = "photo" | "art" | "audio" | "video" | "note";
export type Visibility = "public" | "private";

export interface KidRecord {
  name: string;
  nickname?: string;
  birthdate?: string;
  avatarUrl?: string;
  parentEmail: string;
  allowedGrandparents: string[];
  createdAt?: string;
  updatedAt?: string;
}

export interface MomentRecord {
  kidId: string;
  type: MomentType;
  title: string;
  description?: string;
  mediaUrl?: string;
  thumbnailUrl?: string;
  visibility: Visibility;
  tags: string[];
  createdAt?: string;
  updatedAt?: string;
}

type StampedFields = "createdAt" | "updatedAt";

export type KidInput = Omit<KidRecord, StampedFields | "allowedGrandparents"> & {
  allowedGrandparents?: string[];
};

export type MomentInput = Omit<MomentRecord, StampedFields | "type" | "visibility" | "tags"> & {
  type?: MomentType;
  visibility?: Visibility;
  tags?: string[];
};

export interface Stored<T> {
  id: string;
  record: T;
}

export type PublicRecord<T> = T & { id: string };
export type PublicKid = PublicRecord<KidRecord>;
export type PublicMoment = PublicRecord<MomentRecord>;

export function toPublic<T extends object>(doc: Stored<T>): PublicRecord<T> {
  return { ...doc.record, id: doc.id };
}
