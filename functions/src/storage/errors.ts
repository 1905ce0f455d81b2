export class StorageUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageUnavailableError";
  }
}

export class InvalidIdentifierError extends Error {
  constructor(readonly identifier: string) {
    super(`Invalid document id: ${JSON.stringify(identifier)}`);
    this.name = "InvalidIdentifierError";
  }
}

const MAX_ID_BYTES = 1500;
const reservedId = /^__.*__$/;

// gRPC status codes the Firestore client reports when it cannot reach the backend.
const UNAVAILABLE = 14;
const DEADLINE_EXCEEDED = 4;

export function assertDocumentId(id: string): string {
  if (
    id.length === 0 ||
    id === "." ||
    id === ".." ||
    id.includes("/") ||
    reservedId.test(id) ||
    Buffer.byteLength(id, "utf8") > MAX_ID_BYTES
  ) {
    throw new InvalidIdentifierError(id);
  }
  return id;
}

export function isUnavailable(error: unknown): boolean {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return false;
  }
  return error.code === UNAVAILABLE || error.code === DEADLINE_EXCEEDED;
}

export function toStorageError(error: unknown): unknown {
  if (isUnavailable(error)) {
    const detail = error instanceof Error ? error.message : "unknown cause";
    return new StorageUnavailableError(`Document store unavailable: ${detail}`, { cause: error });
  }
  return error;
}
