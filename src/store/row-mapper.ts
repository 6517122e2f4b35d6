import { QueryError } from '../errors.js';
import type { DocumentSerializer, Row } from '../types.js';

/** Maps a row to a domain value. */
export type RowMapper<T> = (row: Row) => T;

/** Deserializes the JSON text found in `column`. */
export function fromDocument<T>(serializer: DocumentSerializer, column: string): RowMapper<T> {
  return (row) => {
    const json = row[column];
    if (typeof json !== 'string') {
      throw new QueryError(`Expected JSON text in column "${column}", got ${typeof json}`);
    }
    return serializer.deserialize<T>(json);
  };
}

/** Deserializes the `data` column. */
export function fromData<T>(serializer: DocumentSerializer): RowMapper<T> {
  return fromDocument<T>(serializer, 'data');
}

/** Reads `it` as a count. pg returns BIGINT as a string, SQLite as a number. */
export function toCount(row: Row): number {
  const value = row['it'];
  if (typeof value === 'number') return value;
  if (typeof value === 'string' || typeof value === 'bigint') return Number(value);
  throw new QueryError(`Expected a count in column "it", got ${typeof value}`);
}

/** Reads `it` as a boolean. PostgreSQL returns a boolean, SQLite 0 or 1. */
export function toExists(row: Row): boolean {
  const value = row['it'];
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number' || typeof value === 'bigint') return value > 0;
  if (typeof value === 'string') return value === 't' || value === 'true' || value === '1';
  throw new QueryError(`Expected a boolean in column "it", got ${typeof value}`);
}
