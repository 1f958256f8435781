import {
  DocumentNotFoundError,
  pointerSegments,
  type Document,
  type DocumentCollection,
  type DocumentQuery,
  type PatchOperation,
} from '../src/documents.js';
import { UserVerifier } from '../src/verifier.js';
import { buildUser, toDocument, type NewUser } from '../src/users.js';

type Call = { op: 'read' | 'query' | 'upsert' | 'patch'; id?: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function compare(a: unknown, b: unknown) {
  const missingA = a === undefined || a === null;
  const missingB = b === undefined || b === null;
  if (missingA || missingB) return missingA === missingB ? 0 : missingA ? 1 : -1;
  return String(a).localeCompare(String(b));
}

/**
 * In-process document collection. Every call yields once before touching the map, so
 * concurrent callers interleave the way they would against a remote store.
 */
export class MemoryCollection implements DocumentCollection {
  readonly docs = new Map<string, Document>();
  readonly calls: Call[] = [];
  failure: Error | null = null;

  constructor(private readonly partitionField = 'user_id') {}

  private key(id: string, partitionKey: string) {
    return `${partitionKey}\u0000${id}`;
  }

  private async enter(call: Call) {
    this.calls.push(call);
    await Promise.resolve();
    if (this.failure) throw this.failure;
  }

  async read(id: string, partitionKey: string) {
    await this.enter({ op: 'read', id });
    const doc = this.docs.get(this.key(id, partitionKey));
    if (!doc) throw new DocumentNotFoundError(id, partitionKey);
    return structuredClone(doc);
  }

  async query(query: DocumentQuery) {
    await this.enter({ op: 'query' });
    const matches = [...this.docs.values()].filter((doc) =>
      Object.entries(query.where).every(([field, value]) => doc[field] === value)
    );
    matches.sort((a, b) => {
      for (const o of query.orderBy ?? []) {
        const c = compare(a[o.field], b[o.field]);
        if (c !== 0) return o.direction === 'desc' && a[o.field] != null && b[o.field] != null ? -c : c;
      }
      return a.id.localeCompare(b.id);
    });
    return matches.slice(0, query.limit ?? matches.length).map((doc) => structuredClone(doc));
  }

  async upsert(document: Document) {
    await this.enter({ op: 'upsert', id: document.id });
    const pk = String(document[this.partitionField]);
    this.docs.set(this.key(document.id, pk), structuredClone(document));
    return structuredClone(document);
  }

  async patch(id: string, partitionKey: string, operations: PatchOperation[]) {
    await this.enter({ op: 'patch', id });
    const doc = this.docs.get(this.key(id, partitionKey));
    if (!doc) throw new DocumentNotFoundError(id, partitionKey);
    for (const operation of operations) {
      const segments = pointerSegments(operation.path);
      const last = segments.pop();
      if (last === undefined) continue;
      let target: Record<string, unknown> = doc;
      for (const segment of segments) {
        const next = target[segment];
        if (!isRecord(next)) {
          const created: Record<string, unknown> = {};
          target[segment] = created;
          target = created;
        } else {
          target = next;
        }
      }
      target[last] = operation.value;
    }
    return structuredClone(doc);
  }

  /** Stores a user directly, bypassing the call log. */
  seed(input: NewUser) {
    const doc = toDocument(buildUser(input));
    this.docs.set(this.key(doc.id, doc.user_id), doc);
    return doc;
  }

  count(op: Call['op']) {
    return this.calls.filter((c) => c.op === op).length;
  }
}

export function setup() {
  const collection = new MemoryCollection();
  const verifier = new UserVerifier(collection);
  return { collection, verifier };
}
