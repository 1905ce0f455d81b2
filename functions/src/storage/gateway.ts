export type CollectionName = "kid" | "moment";

export type FilterOp = "==" | "array-contains";

export interface FieldFilter {
  field: string;
  op: FilterOp;
  value: string;
}

export type DocumentFields = Record<string, unknown>;

export interface StoredDocument {
  id: string;
  data: DocumentFields;
}

export interface StorageGateway {
  insert(collection: CollectionName, record: DocumentFields): Promise<string>;
  findById(collection: CollectionName, id: string): Promise<StoredDocument | null>;
  query(collection: CollectionName, filters: FieldFilter[]): Promise<StoredDocument[]>;
  deleteWhere(collection: CollectionName, filters: FieldFilter[]): Promise<number>;
  listCollections(): Promise<string[]>;
  close(): Promise<void>;
}

export function where(field: string, op: FilterOp, value: string): FieldFilter {
  return { field, op, value };
}
