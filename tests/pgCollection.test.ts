import type { QueryResult, QueryResultRow } from 'pg';
import { describe, expect, it } from 'vitest';
import { DocumentNotFoundError } from '../src/documents.js';
import { PgDocumentCollection, type Queryable } from '../src/pgCollection.js';

type Sent = { text: string; values: unknown[] };

// Records every statement and answers with the queued rows, oldest first.
class RecordingClient implements Queryable {
  readonly sent: Sent[] = [];
  private readonly replies: unknown[][] = [];

  reply(...rows: unknown[]) {
    this.replies.push(rows);
    return this;
  }

  async query<R extends QueryResultRow = QueryResultRow>(text: string, values: unknown[] = []): Promise<QueryResult<R>> {
    this.sent.push({ text: text.replace(/\s+/g, ' ').trim(), values });
    const rows = (this.replies.shift() ?? []).filter((r): r is R => typeof r === 'object' && r !== null);
    return { command: '', rowCount: rows.length, oid: 0, fields: [], rows };
  }
}

const doc = { id: 'user_a@b.com', type: 'user', user_id: 'a@b.com', role: 'user' };

function collection(client: RecordingClient) {
  return new PgDocumentCollection(client, { table: 'user_documents', partitionKey: 'user_id' });
}

describe('PgDocumentCollection', () => {
  it('refuses unsafe identifiers', () => {
    const client = new RecordingClient();
    expect(() => new PgDocumentCollection(client, { table: 'users; drop table x', partitionKey: 'user_id' })).toThrow(
      'Invalid table name: users; drop table x'
    );
    expect(() => new PgDocumentCollection(client, { table: 'users', partitionKey: 'user-id' })).toThrow(
      'Invalid partition key: user-id'
    );
  });

  it('reads by id and partition', async () => {
    const client = new RecordingClient().reply({ body: doc });
    expect(await collection(client).read('user_a@b.com', 'a@b.com')).toEqual(doc);
    expect(client.sent).toEqual([
      { text: 'select body from user_documents where id = $1 and partition_key = $2', values: ['user_a@b.com', 'a@b.com'] },
    ]);
  });

  it('signals a missing document distinctly', async () => {
    const client = new RecordingClient().reply();
    await expect(collection(client).read('user_x', 'x')).rejects.toBeInstanceOf(DocumentNotFoundError);
  });

  it('refuses a stored body that is not a document', async () => {
    const client = new RecordingClient().reply({ body: ['not', 'a', 'doc'] });
    await expect(collection(client).read('user_a@b.com', 'a@b.com')).rejects.toThrow('Stored document is malformed');
  });

  it('builds an equality query with ordering and a bound limit', async () => {
    const client = new RecordingClient().reply({ body: doc });
    const docs = await collection(client).query({
      where: { username: 'a', type: 'user' },
      orderBy: [{ field: 'created_at', direction: 'asc' }],
      limit: 1,
    });

    expect(docs).toEqual([doc]);
    expect(client.sent[0]).toEqual({
      text:
        "select body from user_documents where body->>'username' = $1 and body->>'type' = $2" +
        " order by body->>'created_at' asc nulls last, id asc limit $3",
      values: ['a', 'user', 1],
    });
  });

  it('binds non-string filter values as text', async () => {
    const client = new RecordingClient().reply();
    await collection(client).query({ where: { is_active: false } });
    expect(client.sent[0]).toEqual({
      text: "select body from user_documents where body->>'is_active' = $1 order by id asc",
      values: ['false'],
    });
  });

  it('refuses unsafe field names in a query', async () => {
    const client = new RecordingClient();
    await expect(collection(client).query({ where: { "x' or '1'='1": 'y' } })).rejects.toThrow('Invalid field name');
    expect(client.sent).toEqual([]);
  });

  it('upserts on the composite key', async () => {
    const client = new RecordingClient().reply({ body: doc });
    expect(await collection(client).upsert(doc)).toEqual(doc);
    expect(client.sent[0]).toEqual({
      text:
        'insert into user_documents (id, partition_key, body) values ($1, $2, $3::jsonb)' +
        ' on conflict (id, partition_key) do update set body = excluded.body returning body',
      values: ['user_a@b.com', 'a@b.com', JSON.stringify(doc)],
    });
  });

  it('needs the partition key on the document', async () => {
    const client = new RecordingClient();
    await expect(collection(client).upsert({ id: 'user_x' })).rejects.toThrow('Document user_x has no user_id partition key');
  });

  it('patches with nested jsonb_set calls', async () => {
    const client = new RecordingClient().reply({ body: { ...doc, role: 'admin', is_active: false } });
    const patched = await collection(client).patch('user_a@b.com', 'a@b.com', [
      { op: 'set', path: '/role', value: 'admin' },
      { op: 'set', path: '/is_active', value: false },
    ]);

    expect(patched.role).toBe('admin');
    expect(client.sent[0]).toEqual({
      text:
        'update user_documents set body = jsonb_set(jsonb_set(body, $3::text[], $4::jsonb, true), $5::text[], $6::jsonb, true)' +
        ' where id = $1 and partition_key = $2 returning body',
      values: ['user_a@b.com', 'a@b.com', ['role'], '"admin"', ['is_active'], 'false'],
    });
  });

  it('signals a patch on a missing document', async () => {
    const client = new RecordingClient().reply();
    await expect(
      collection(client).patch('user_x', 'x', [{ op: 'set', path: '/role', value: 'admin' }])
    ).rejects.toBeInstanceOf(DocumentNotFoundError);
  });

  it('creates the table and expression indexes', async () => {
    const client = new RecordingClient();
    await collection(client).ensureTable(['username']);
    expect(client.sent.map((s) => s.text)).toEqual([
      'create table if not exists user_documents ( id text not null, partition_key text not null, body jsonb not null, primary key (id, partition_key) )',
      "create index if not exists user_documents_username_idx on user_documents ((body->>'username'))",
    ]);
  });
});
