import { createClient } from '@libsql/client';
import { resolveConfig } from '../config.js';
import { InvalidArgumentError } from '../errors.js';
import { SqlDocumentStore } from '../store/document-store.js';
import type { DocumentOptions, Parameters, SqlConnection } from '../types.js';
import { SqliteConnection, renderSqliteValue } from './connection.js';
import { SqliteQueries } from './queries.js';

export interface SqliteDocumentStoreConfig extends DocumentOptions {
  connection: SqlConnection;
}

/**
 * Document store over a TEXT column of JSON.
 *
 * Patches merge recursively: patching `{ a: { x: 1 } }` onto
 * `{ a: { x: 1, y: 2 } }` keeps `y`. Containment and JSON Path queries
 * are PostgreSQL-only and have no counterpart here.
 */
export class SqliteDocumentStore extends SqlDocumentStore<SqliteQueries> {
  constructor(config: SqliteDocumentStoreConfig) {
    const resolved = resolveConfig(config);
    super(config.connection, resolved, new SqliteQueries(resolved.idField), renderSqliteValue);
  }

  /**
   * Opens (or creates) a database with foreign keys enforced.
   * `url` is a libSQL URL such as `file:customers.db`, or `':memory:'`.
   */
  static async open(url: string, options: DocumentOptions = {}): Promise<SqliteDocumentStore> {
    const connection = new SqliteConnection(createClient({ url }));
    await connection.execute('PRAGMA foreign_keys = ON', {});
    return new SqliteDocumentStore({ ...options, connection });
  }

  withConnection(connection: SqlConnection): SqliteDocumentStore {
    return new SqliteDocumentStore({ ...this.config, connection });
  }

  /** Each name is quoted as one top-level key, so `a.b` does not reach into `a`. */
  protected fieldNameParams(fieldNames: readonly string[]): Parameters {
    const params: Record<string, string> = {};
    fieldNames.forEach((name, index) => {
      if (name.includes('"')) {
        throw new InvalidArgumentError(`removeFields: field name ${name} cannot contain a double quote`);
      }
      params[`@name${index}`] = `$."${name}"`;
    });
    return params;
  }
}
