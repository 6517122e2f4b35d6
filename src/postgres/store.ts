import pg from 'pg';
import { resolveConfig } from '../config.js';
import { InvalidArgumentError } from '../errors.js';
import { noParams } from '../query/parameters.js';
import { SqlDocumentStore } from '../store/document-store.js';
import { fromData, toCount, toExists } from '../store/row-mapper.js';
import type { DocumentOptions, DocumentStore, Parameters, SqlConnection } from '../types.js';
import { PostgresConnection, renderPostgresValue } from './connection.js';
import type { Queryable } from './connection.js';
import { PostgresQueries, ensureDocumentIndex } from './queries.js';
import type { DocumentIndex } from './queries.js';

/** Operations only PostgreSQL's jsonb operators can serve. */
export interface JsonbDocumentStore extends DocumentStore {
  ensureDocumentIndex(tableName: string, kind: DocumentIndex): Promise<void>;

  countByContains<C>(tableName: string, criteria: C): Promise<number>;
  countByJsonPath(tableName: string, jsonPath: string): Promise<number>;

  existsByContains<C>(tableName: string, criteria: C): Promise<boolean>;
  existsByJsonPath(tableName: string, jsonPath: string): Promise<boolean>;

  findByContains<T, C = Partial<T>>(tableName: string, criteria: C): Promise<T[]>;
  findByJsonPath<T>(tableName: string, jsonPath: string): Promise<T[]>;
  /** Any one matching document; no ordering is applied. */
  findFirstByContains<T, C = Partial<T>>(tableName: string, criteria: C): Promise<T | undefined>;
  /** Any one matching document; no ordering is applied. */
  findFirstByJsonPath<T>(tableName: string, jsonPath: string): Promise<T | undefined>;

  patchByContains<C, P>(tableName: string, criteria: C, patch: P): Promise<void>;
  patchByJsonPath<P>(tableName: string, jsonPath: string, patch: P): Promise<void>;

  removeFieldsByContains<C>(tableName: string, criteria: C, fieldNames: readonly string[]): Promise<void>;
  removeFieldsByJsonPath(tableName: string, jsonPath: string, fieldNames: readonly string[]): Promise<void>;

  deleteByContains<C>(tableName: string, criteria: C): Promise<void>;
  deleteByJsonPath(tableName: string, jsonPath: string): Promise<void>;
}

export interface PostgresDocumentStoreConfig extends DocumentOptions {
  /** A pg Pool, Client or PoolClient; the store ends it on close() only if it is a Pool. */
  pool?: Queryable;
  /** Any other SqlConnection speaking PostgreSQL. Takes precedence over `pool`. */
  connection?: SqlConnection;
}

function connectionFor(config: PostgresDocumentStoreConfig): SqlConnection {
  if (config.connection !== undefined) return config.connection;
  if (config.pool !== undefined) return new PostgresConnection(config.pool);
  throw new InvalidArgumentError('PostgresDocumentStore: either pool or connection is required');
}

/**
 * Document store over a JSONB column.
 *
 * Patches merge with `||`: top-level keys of the patch replace the stored ones,
 * nested objects are not merged. Patching `{ a: { x: 1 } }` onto
 * `{ a: { x: 1, y: 2 } }` stores `{ a: { x: 1 } }`.
 */
export class PostgresDocumentStore
  extends SqlDocumentStore<PostgresQueries>
  implements JsonbDocumentStore
{
  constructor(config: PostgresDocumentStoreConfig) {
    const resolved = resolveConfig(config);
    super(connectionFor(config), resolved, new PostgresQueries(resolved.idField), renderPostgresValue);
  }

  /** Opens a pool for `connectionString`; close() ends it. */
  static connect(connectionString: string, options: DocumentOptions = {}): PostgresDocumentStore {
    return new PostgresDocumentStore({ ...options, pool: new pg.Pool({ connectionString }) });
  }

  withConnection(connection: SqlConnection): PostgresDocumentStore {
    return new PostgresDocumentStore({ ...this.config, connection });
  }

  async ensureDocumentIndex(tableName: string, kind: DocumentIndex): Promise<void> {
    await this.custom.nonQuery(ensureDocumentIndex(tableName, kind), noParams);
  }

  countByContains<C>(tableName: string, criteria: C): Promise<number> {
    return this.custom.scalar(this.queries.countByContains(tableName), this.criteriaParam(criteria), toCount);
  }

  countByJsonPath(tableName: string, jsonPath: string): Promise<number> {
    return this.custom.scalar(this.queries.countByJsonPath(tableName), { '@path': jsonPath }, toCount);
  }

  existsByContains<C>(tableName: string, criteria: C): Promise<boolean> {
    return this.custom.scalar(this.queries.existsByContains(tableName), this.criteriaParam(criteria), toExists);
  }

  existsByJsonPath(tableName: string, jsonPath: string): Promise<boolean> {
    return this.custom.scalar(this.queries.existsByJsonPath(tableName), { '@path': jsonPath }, toExists);
  }

  findByContains<T, C = Partial<T>>(tableName: string, criteria: C): Promise<T[]> {
    return this.custom.list(
      this.queries.findByContains(tableName),
      this.criteriaParam(criteria),
      fromData<T>(this.config.serializer),
    );
  }

  findByJsonPath<T>(tableName: string, jsonPath: string): Promise<T[]> {
    return this.custom.list(
      this.queries.findByJsonPath(tableName),
      { '@path': jsonPath },
      fromData<T>(this.config.serializer),
    );
  }

  findFirstByContains<T, C = Partial<T>>(tableName: string, criteria: C): Promise<T | undefined> {
    return this.custom.single(
      this.queries.findFirstByContains(tableName),
      this.criteriaParam(criteria),
      fromData<T>(this.config.serializer),
    );
  }

  findFirstByJsonPath<T>(tableName: string, jsonPath: string): Promise<T | undefined> {
    return this.custom.single(
      this.queries.findFirstByJsonPath(tableName),
      { '@path': jsonPath },
      fromData<T>(this.config.serializer),
    );
  }

  async patchByContains<C, P>(tableName: string, criteria: C, patch: P): Promise<void> {
    await this.custom.nonQuery(this.queries.patchByContains(tableName), {
      ...this.criteriaParam(criteria),
      ...this.dataParam(patch),
    });
  }

  async patchByJsonPath<P>(tableName: string, jsonPath: string, patch: P): Promise<void> {
    await this.custom.nonQuery(this.queries.patchByJsonPath(tableName), {
      '@path': jsonPath,
      ...this.dataParam(patch),
    });
  }

  async removeFieldsByContains<C>(
    tableName: string,
    criteria: C,
    fieldNames: readonly string[],
  ): Promise<void> {
    await this.custom.nonQuery(this.queries.removeFieldsByContains(tableName), {
      ...this.criteriaParam(criteria),
      ...this.namesToRemove(fieldNames),
    });
  }

  async removeFieldsByJsonPath(
    tableName: string,
    jsonPath: string,
    fieldNames: readonly string[],
  ): Promise<void> {
    await this.custom.nonQuery(this.queries.removeFieldsByJsonPath(tableName), {
      '@path': jsonPath,
      ...this.namesToRemove(fieldNames),
    });
  }

  async deleteByContains<C>(tableName: string, criteria: C): Promise<void> {
    await this.custom.nonQuery(this.queries.deleteByContains(tableName), this.criteriaParam(criteria));
  }

  async deleteByJsonPath(tableName: string, jsonPath: string): Promise<void> {
    await this.custom.nonQuery(this.queries.deleteByJsonPath(tableName), { '@path': jsonPath });
  }

  protected fieldNameParams(fieldNames: readonly string[]): Parameters {
    return { '@name': [...fieldNames] };
  }

  private criteriaParam<C>(criteria: C): Parameters {
    return { '@criteria': this.config.serializer.serialize(criteria) };
  }
}
