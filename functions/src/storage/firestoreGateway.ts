import type { DocumentData, WhereFilterOp } from "firebase-admin/firestore";
import { assertDocumentId, toStorageError } from "./errors";
import type {
  CollectionName,
  DocumentFields,
  FieldFilter,
  StorageGateway,
  StoredDocument
} from "./gateway";

const MAX_BATCH_WRITES = 500;

// The slice of the Admin SDK's Firestore this gateway uses. `Firestore` itself
// satisfies it structurally.
export interface DocumentSnapshotLike {
  readonly id: string;
  readonly exists: boolean;
  data(): DocumentData | undefined;
}

export interface DocumentRefLike {
  readonly id: string;
  get(): Promise<DocumentSnapshotLike>;
}

export interface QueryDocumentLike {
  readonly id: string;
  readonly ref: DocumentRefLike;
  data(): DocumentData;
}

export interface QuerySnapshotLike {
  readonly size: number;
  readonly docs: QueryDocumentLike[];
}

export interface QueryLike {
  where(fieldPath: string, opStr: WhereFilterOp, value: unknown): QueryLike;
  get(): Promise<QuerySnapshotLike>;
}

export interface CollectionLike extends QueryLike {
  doc(documentPath: string): DocumentRefLike;
  add(data: DocumentData): Promise<{ readonly id: string }>;
}

export interface WriteBatchLike {
  delete(documentRef: DocumentRefLike): unknown;
  commit(): Promise<unknown>;
}

export interface FirestoreClient {
  collection(collectionPath: string): CollectionLike;
  batch(): WriteBatchLike;
  listCollections(): Promise<{ readonly id: string }[]>;
  terminate(): Promise<void>;
}

export class FirestoreGateway implements StorageGateway {
  constructor(private readonly firestore: FirestoreClient) {}

  async insert(collection: CollectionName, record: DocumentFields): Promise<string> {
    const now = new Date().toISOString();
    const ref = await this.run(() =>
      this.firestore.collection(collection).add({ ...record, createdAt: now, updatedAt: now })
    );
    return ref.id;
  }

  async findById(collection: CollectionName, id: string): Promise<StoredDocument | null> {
    const docId = assertDocumentId(id);
    const snap = await this.run(() => this.firestore.collection(collection).doc(docId).get());
    if (!snap.exists) {
      return null;
    }
    return { id: snap.id, data: snap.data() ?? {} };
  }

  async query(collection: CollectionName, filters: FieldFilter[]): Promise<StoredDocument[]> {
    const snap = await this.run(() => this.buildQuery(collection, filters).get());
    return snap.docs.map((d) => ({ id: d.id, data: d.data() }));
  }

  async deleteWhere(collection: CollectionName, filters: FieldFilter[]): Promise<number> {
    const snap = await this.run(() => this.buildQuery(collection, filters).get());

    for (let start = 0; start < snap.docs.length; start += MAX_BATCH_WRITES) {
      const batch = this.firestore.batch();
      for (const doc of snap.docs.slice(start, start + MAX_BATCH_WRITES)) {
        batch.delete(doc.ref);
      }
      await this.run(() => batch.commit());
    }

    return snap.size;
  }

  async listCollections(): Promise<string[]> {
    const collections = await this.run(() => this.firestore.listCollections());
    return collections.map((c) => c.id);
  }

  async close(): Promise<void> {
    await this.firestore.terminate();
  }

  private buildQuery(collection: CollectionName, filters: FieldFilter[]): QueryLike {
    let query: QueryLike = this.firestore.collection(collection);
    for (const filter of filters) {
      query = query.where(filter.field, filter.op, filter.value);
    }
    return query;
  }

  private async run<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw toStorageError(error);
    }
  }
}
