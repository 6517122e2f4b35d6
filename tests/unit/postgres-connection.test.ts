import { describe, it, expect, vi } from 'vitest';
import { JSONB_OID, JSON_OID, PostgresConnection } from '../../src/postgres/connection.js';

function makeClient(result: { rows: unknown[]; rowCount: number | null }) {
  return { query: vi.fn().mockResolvedValue(result), end: vi.fn() };
}

describe('PostgresConnection', () => {
  it('sends positional SQL and values to the client', async () => {
    const client = makeClient({ rows: [], rowCount: 0 });
    const connection = new PostgresConnection(client);
    await connection.execute("UPDATE t SET data = data || @data WHERE data ->> 'Id' = @id", {
      '@id': 'one',
      '@data': '{"NumValue":1}',
    });
    expect(client.query).toHaveBeenCalledWith(
      expect.objectContaining({
        text: "UPDATE t SET data = data || $1 WHERE data ->> 'Id' = $2",
        values: ['{"NumValue":1}', 'one'],
      }),
    );
  });

  it('asks pg to hand json and jsonb back as text', async () => {
    const client = makeClient({ rows: [], rowCount: 0 });
    await new PostgresConnection(client).execute('SELECT data FROM t', {});
    const config = client.query.mock.calls[0]![0];
    expect(config.types.getTypeParser(JSONB_OID, 'text')('{"a":1}')).toBe('{"a":1}');
    expect(config.types.getTypeParser(JSON_OID, 'text')('[1]')).toBe('[1]');
  });

  it('returns rows and the affected row count', async () => {
    const client = makeClient({ rows: [{ data: '{}' }], rowCount: 1 });
    const result = await new PostgresConnection(client).execute('SELECT data FROM t', {});
    expect(result).toEqual({ rows: [{ data: '{}' }], rowCount: 1 });
  });

  it('reports a null rowCount as zero', async () => {
    const client = makeClient({ rows: [], rowCount: null });
    const result = await new PostgresConnection(client).execute('CREATE TABLE t (data JSONB)', {});
    expect(result.rowCount).toBe(0);
  });

  it('does not end a client it was handed', async () => {
    const client = makeClient({ rows: [], rowCount: 0 });
    await new PostgresConnection(client).close();
    expect(client.end).not.toHaveBeenCalled();
  });
});
