import { describe, it, expect, vi } from 'vitest';
import { pino } from 'pino';
import { PostgresDocumentStore } from '../../src/postgres/store.js';
import { DocumentIndex } from '../../src/postgres/queries.js';
import { Field } from '../../src/query/field.js';
import { InvalidArgumentError } from '../../src/errors.js';

const logger = pino({ level: 'silent' });

function makeStore(...results: Array<{ rows: unknown[]; rowCount: number | null }>) {
  const query = vi.fn();
  for (const result of results) query.mockResolvedValueOnce(result);
  const client = { query };
  return { client, store: new PostgresDocumentStore({ pool: client, logger }) };
}

const empty = { rows: [], rowCount: 0 };

function sent(client: { query: ReturnType<typeof vi.fn> }, index = 0) {
  const config = client.query.mock.calls[index]![0];
  return { text: config.text, values: config.values };
}

describe('PostgresDocumentStore (unit)', () => {
  it('requires a pool or a connection', () => {
    expect(() => new PostgresDocumentStore({ logger })).toThrow(InvalidArgumentError);
  });

  it('ensureTable creates the table then the key index', async () => {
    const { client, store } = makeStore(empty, empty);
    await store.ensureTable('customer');
    expect(sent(client, 0).text).toBe('CREATE TABLE IF NOT EXISTS customer (data JSONB NOT NULL)');
    expect(sent(client, 1).text).toBe(
      "CREATE UNIQUE INDEX IF NOT EXISTS idx_customer_key ON customer ((data ->> 'Id'))",
    );
  });

  it('ensureDocumentIndex', async () => {
    const { client, store } = makeStore(empty);
    await store.ensureDocumentIndex('customer', DocumentIndex.Optimized);
    expect(sent(client)).toEqual({
      text: 'CREATE INDEX IF NOT EXISTS idx_customer_document ON customer USING GIN (data jsonb_path_ops)',
      values: [],
    });
  });

  it('insert binds the serialized document', async () => {
    const { client, store } = makeStore({ rows: [], rowCount: 1 });
    await store.insert('customer', { Id: 'one', Value: 'FIRST!' });
    expect(sent(client)).toEqual({
      text: 'INSERT INTO customer VALUES ($1)',
      values: ['{"Id":"one","Value":"FIRST!"}'],
    });
  });

  it('countByField casts the field for numeric values and binds the number as text', async () => {
    const { client, store } = makeStore({ rows: [{ it: '2' }], rowCount: 1 });
    expect(await store.countByField('customer', Field.GT('NumValue', 10))).toBe(2);
    expect(sent(client)).toEqual({
      text: "SELECT COUNT(*) AS it FROM customer WHERE (data ->> 'NumValue')::numeric > $1",
      values: ['10'],
    });
  });

  it('existsByField with an existence test binds nothing', async () => {
    const { client, store } = makeStore({ rows: [{ it: true }], rowCount: 1 });
    expect(await store.existsByField('customer', Field.EXISTS('Sub'))).toBe(true);
    expect(sent(client).values).toEqual([]);
  });

  it('findById returns undefined when nothing matched', async () => {
    const { store } = makeStore(empty);
    expect(await store.findById('customer', 'missing')).toBeUndefined();
  });

  it('findByContains serializes the criteria', async () => {
    const { client, store } = makeStore({ rows: [{ data: '{"Id":"four","Value":"purple"}' }], rowCount: 1 });
    const found = await store.findByContains<{ Id: string; Value: string }>('customer', { Value: 'purple' });
    expect(found).toEqual([{ Id: 'four', Value: 'purple' }]);
    expect(sent(client)).toEqual({
      text: 'SELECT data FROM customer WHERE data @> $1',
      values: ['{"Value":"purple"}'],
    });
  });

  it('findFirstByJsonPath binds the path as text', async () => {
    const { client, store } = makeStore(empty);
    await store.findFirstByJsonPath('customer', '$.NumValue ? (@ > 10)');
    expect(sent(client)).toEqual({
      text: 'SELECT data FROM customer WHERE data @? $1::jsonpath LIMIT 1',
      values: ['$.NumValue ? (@ > 10)'],
    });
  });

  it('patchByField binds booleans as text', async () => {
    const { client, store } = makeStore(empty);
    await store.patchByField('customer', Field.EQ('Active', true), { NumValue: 1 });
    expect(sent(client)).toEqual({
      text: "UPDATE customer SET data = data || $1 WHERE data ->> 'Active' = $2",
      values: ['{"NumValue":1}', 'true'],
    });
  });

  it('removeFieldsById binds the field names as one array', async () => {
    const { client, store } = makeStore({ rows: [], rowCount: 1 });
    await store.removeFieldsById('customer', 'two', ['Sub', 'Value']);
    expect(sent(client)).toEqual({
      text: "UPDATE customer SET data = data - $1::text[] WHERE data ->> 'Id' = $2",
      values: [['Sub', 'Value'], 'two'],
    });
  });

  it('removeFieldsByContains', async () => {
    const { client, store } = makeStore(empty);
    await store.removeFieldsByContains('customer', { Value: 'purple' }, ['Sub']);
    expect(sent(client)).toEqual({
      text: 'UPDATE customer SET data = data - $1::text[] WHERE data @> $2',
      values: [['Sub'], '{"Value":"purple"}'],
    });
  });

  it('rejects an empty field list without touching the database', async () => {
    const { client, store } = makeStore(empty);
    await expect(store.removeFieldsByField('customer', Field.EXISTS('Sub'), [])).rejects.toThrow(
      'removeFields: at least one field name is required',
    );
    expect(client.query).not.toHaveBeenCalled();
  });

  it('updateByFunc takes the id from the document', async () => {
    const { client, store } = makeStore({ rows: [], rowCount: 1 });
    await store.updateByFunc('customer', (doc: { Id: number }) => doc.Id, { Id: 7 });
    expect(sent(client)).toEqual({
      text: "UPDATE customer SET data = $1 WHERE data ->> 'Id' = $2",
      values: ['{"Id":7}', '7'],
    });
  });

  it('uses a configured id field', async () => {
    const query = vi.fn().mockResolvedValue(empty);
    const store = new PostgresDocumentStore({ pool: { query }, logger, idField: 'key' });
    await store.deleteById('customer', 'abc');
    expect(query.mock.calls[0]![0].text).toBe("DELETE FROM customer WHERE data ->> 'key' = $1");
  });

  it('withConnection runs on the new connection with the same configuration', async () => {
    const { client, store } = makeStore();
    const execute = vi.fn().mockResolvedValue({ rows: [{ it: 4 }], rowCount: 1 });
    const bound = store.withConnection({ execute, close: vi.fn() });
    expect(bound.config).toEqual(store.config);
    expect(await bound.countAll('customer')).toBe(4);
    expect(execute).toHaveBeenCalledWith('SELECT COUNT(*) AS it FROM customer', {});
    expect(client.query).not.toHaveBeenCalled();
  });

  it('re-throws database errors unchanged', async () => {
    const failure = new Error('duplicate key value violates unique constraint "idx_customer_key"');
    const query = vi.fn().mockRejectedValue(failure);
    const store = new PostgresDocumentStore({ pool: { query }, logger });
    await expect(store.insert('customer', { Id: 'one' })).rejects.toBe(failure);
  });
});
