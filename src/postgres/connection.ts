import pg from 'pg';
import { bindPositional } from '../store/bind.js';
import type { FieldValue } from '../query/field.js';
import type { Parameters, QueryResult, SqlConnection, SqlValue } from '../types.js';

export const JSON_OID = 114;
export const JSONB_OID = 3802;

/** Anything pg can run a query config on: a Pool, a Client or a checked-out PoolClient. */
export interface Queryable {
  query(config: pg.QueryConfig): Promise<pg.QueryResult>;
}

// Documents go to the serializer as text, not as pg's pre-parsed objects
const jsonAsText = new pg.TypeOverrides();
jsonAsText.setTypeParser(JSON_OID, (value: string) => value);
jsonAsText.setTypeParser(JSONB_OID, (value: string) => value);

/**
 * `->>` yields text in PostgreSQL, so comparison values are bound as text.
 */
export function renderPostgresValue(value: FieldValue): SqlValue {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint') return value.toString();
  return value ? 'true' : 'false';
}

export class PostgresConnection implements SqlConnection {
  constructor(private readonly client: Queryable) {}

  async execute(sql: string, parameters: Parameters): Promise<QueryResult> {
    const { text, values } = bindPositional(sql, parameters);
    const result = await this.client.query({ text, values, types: jsonAsText });
    return { rows: result.rows, rowCount: result.rowCount ?? 0 };
  }

  /** Ends the pool when this connection owns one; clients are left to their caller. */
  async close(): Promise<void> {
    if (this.client instanceof pg.Pool) {
      await this.client.end();
    }
  }
}
