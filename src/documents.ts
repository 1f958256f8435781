export type Document = { id: string } & Record<string, unknown>;

export type FilterValue = string | number | boolean;

export type OrderBy = { field: string; direction: 'asc' | 'desc' };

export type DocumentQuery = {
  // every entry must match a top-level key of the document
  where: Record<string, FilterValue>;
  // missing values sort last
  orderBy?: OrderBy[];
  limit?: number;
};

export type PatchOperation = { op: 'set'; path: string; value: unknown };

/**
 * The four primitives the verifier needs from a document store. Each call is a single
 * atomic operation; there are no multi-call transactions.
 */
export interface DocumentCollection {
  /** Point read. Rejects with DocumentNotFoundError when nothing is stored under the key. */
  read(id: string, partitionKey: string): Promise<Document>;
  /** Equality-filtered scan across all partitions. */
  query(query: DocumentQuery): Promise<Document[]>;
  /** Creates the document, or fully replaces the one with the same id. */
  upsert(document: Document): Promise<Document>;
  /** Applies the operations to the stored document. Rejects with DocumentNotFoundError on a miss. */
  patch(id: string, partitionKey: string, operations: PatchOperation[]): Promise<Document>;
}

export class DocumentNotFoundError extends Error {
  readonly id: string;
  readonly partitionKey: string;

  constructor(id: string, partitionKey: string) {
    super(`Document ${id} not found in partition ${partitionKey}`);
    this.name = 'DocumentNotFoundError';
    this.id = id;
    this.partitionKey = partitionKey;
  }
}

export function isDocumentNotFound(err: unknown): err is DocumentNotFoundError {
  return err instanceof DocumentNotFoundError;
}

/** "/role" -> ["role"], "/profile/name" -> ["profile", "name"] */
export function pointerSegments(path: string) {
  if (!path.startsWith('/')) throw new Error(`Invalid patch path: ${path}`);
  return path
    .slice(1)
    .split('/')
    .map((s) => s.replace(/~1/g, '/').replace(/~0/g, '~'));
}
