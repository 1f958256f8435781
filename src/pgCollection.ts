import type { QueryResult, QueryResultRow } from 'pg';
import {
  DocumentNotFoundError,
  pointerSegments,
  type Document,
  type DocumentCollection,
  type DocumentQuery,
  type PatchOperation,
} from './documents.js';

/** The slice of pg's Pool / Client the collection uses. */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export type PgCollectionOptions = {
  table: string;
  // top-level document key whose value becomes the partition_key column
  partitionKey: string;
};

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function identifier(name: string, what: string) {
  if (!IDENTIFIER.test(name)) throw new Error(`Invalid ${what}: ${name}`);
  return name;
}

function isDocument(value: unknown): value is Document {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && 'id' in value && typeof value.id === 'string';
}

function single(result: QueryResult<{ body: unknown }>) {
  const body = result.rows[0]?.body;
  if (body === undefined) return null;
  if (!isDocument(body)) throw new Error('Stored document is malformed');
  return body;
}

/**
 * Document collection kept in one Postgres table: (id, partition_key) primary key and the
 * whole document in a jsonb `body` column.
 */
export class PgDocumentCollection implements DocumentCollection {
  private readonly table: string;
  private readonly partitionField: string;

  constructor(
    private readonly client: Queryable,
    options: PgCollectionOptions
  ) {
    this.table = identifier(options.table, 'table name');
    this.partitionField = identifier(options.partitionKey, 'partition key');
  }

  async ensureTable(indexedFields: string[] = []) {
    await this.client.query(`
      create table if not exists ${this.table} (
        id text not null,
        partition_key text not null,
        body jsonb not null,
        primary key (id, partition_key)
      )
    `);
    for (const field of indexedFields) {
      const f = identifier(field, 'field name');
      await this.client.query(`create index if not exists ${this.table}_${f}_idx on ${this.table} ((body->>'${f}'))`);
    }
  }

  async read(id: string, partitionKey: string) {
    const r = await this.client.query<{ body: unknown }>(
      `select body from ${this.table} where id = $1 and partition_key = $2`,
      [id, partitionKey]
    );
    const doc = single(r);
    if (!doc) throw new DocumentNotFoundError(id, partitionKey);
    return doc;
  }

  async query(query: DocumentQuery) {
    const values: unknown[] = [];
    const clauses = Object.entries(query.where).map(([field, value]) => {
      values.push(String(value));
      return `body->>'${identifier(field, 'field name')}' = $${values.length}`;
    });
    const order = (query.orderBy ?? []).map(
      (o) => `body->>'${identifier(o.field, 'field name')}' ${o.direction === 'desc' ? 'desc' : 'asc'} nulls last`
    );
    order.push('id asc');

    let sql = `select body from ${this.table}`;
    if (clauses.length) sql += ` where ${clauses.join(' and ')}`;
    sql += ` order by ${order.join(', ')}`;
    if (query.limit !== undefined) {
      values.push(query.limit);
      sql += ` limit $${values.length}`;
    }

    const r = await this.client.query<{ body: unknown }>(sql, values);
    return r.rows.map((row) => {
      if (!isDocument(row.body)) throw new Error('Stored document is malformed');
      return row.body;
    });
  }

  async upsert(document: Document) {
    const pk = document[this.partitionField];
    if (typeof pk !== 'string' && typeof pk !== 'number') {
      throw new Error(`Document ${document.id} has no ${this.partitionField} partition key`);
    }
    const r = await this.client.query<{ body: unknown }>(
      `insert into ${this.table} (id, partition_key, body) values ($1, $2, $3::jsonb)
       on conflict (id, partition_key) do update set body = excluded.body
       returning body`,
      [document.id, String(pk), JSON.stringify(document)]
    );
    return single(r) ?? document;
  }

  async patch(id: string, partitionKey: string, operations: PatchOperation[]) {
    if (operations.length === 0) throw new Error('patch needs at least one operation');

    const values: unknown[] = [id, partitionKey];
    let expr = 'body';
    for (const op of operations) {
      values.push(pointerSegments(op.path), JSON.stringify(op.value ?? null));
      expr = `jsonb_set(${expr}, $${values.length - 1}::text[], $${values.length}::jsonb, true)`;
    }

    const r = await this.client.query<{ body: unknown }>(
      `update ${this.table} set body = ${expr} where id = $1 and partition_key = $2 returning body`,
      values
    );
    const doc = single(r);
    if (!doc) throw new DocumentNotFoundError(id, partitionKey);
    return doc;
  }
}
