import type { Client, InValue } from '@libsql/client';
import { InvalidArgumentError } from '../errors.js';
import type { FieldValue } from '../query/field.js';
import type { Parameters, QueryResult, Row, SqlConnection, SqlValue } from '../types.js';

/** SQLite compares `->>` results by their JSON type; only booleans need mapping. */
export function renderSqliteValue(value: FieldValue): SqlValue {
  if (typeof value === 'boolean') return value ? 1 : 0;
  return value;
}

/** Named arguments keyed without their `@` prefix. */
function toArgs(parameters: Parameters): Record<string, InValue> {
  const args: Record<string, InValue> = {};
  for (const [key, value] of Object.entries(parameters)) {
    if (typeof value === 'object' && value !== null) {
      throw new InvalidArgumentError(`SQLite cannot bind an array to ${key}`);
    }
    args[key.startsWith('@') ? key.slice(1) : key] = value;
  }
  return args;
}

/** SqlConnection over a libSQL client (a local file or `:memory:`). */
export class SqliteConnection implements SqlConnection {
  constructor(readonly client: Client) {}

  async execute(sql: string, parameters: Parameters): Promise<QueryResult> {
    const result = await this.client.execute({ sql, args: toArgs(parameters) });
    const rows = result.rows.map((row) => {
      const copy: Row = {};
      for (const column of result.columns) copy[column] = row[column];
      return copy;
    });
    return { rows, rowCount: result.rowsAffected };
  }

  async close(): Promise<void> {
    this.client.close();
  }
}
