import type { Logger } from 'pino';
import type { FieldCriterion, FieldValue } from './query/field.js';
import type { CustomQueries } from './store/custom.js';

/** Converts documents to and from their stored JSON text. */
export interface DocumentSerializer {
  serialize<T>(value: T): string;
  deserialize<T>(json: string): T;
}

export interface DocumentOptions {
  /** Serialized name of the identifier field. Defaults to "Id". */
  idField?: string;
  serializer?: DocumentSerializer;
  logger?: Logger;
}

/** Resolved configuration, fixed for the lifetime of a store. */
export interface DocumentConfig {
  readonly idField: string;
  readonly serializer: DocumentSerializer;
  readonly logger: Logger;
}

export type DocumentId = string | number;

/** A value bound to a named SQL parameter. */
export type SqlValue = string | number | bigint | null | readonly string[];

/** Named parameters keyed by their placeholder, e.g. `{ '@id': 'one' }`. */
export type Parameters = Readonly<Record<string, SqlValue>>;

export type Row = Record<string, unknown>;

export interface QueryResult {
  rows: Row[];
  rowCount: number;
}

/**
 * The one seam to the database: anything that can run parameterized SQL
 * with `@name` placeholders and hand back rows.
 */
export interface SqlConnection {
  execute(sql: string, parameters: Parameters): Promise<QueryResult>;
  close(): Promise<void>;
}

/** Renders a field or id value into the parameter form a dialect compares against. */
export type ValueRenderer = (value: FieldValue) => SqlValue;

/** Operations available on every backend. */
export interface DocumentStore {
  readonly config: DocumentConfig;
  readonly custom: CustomQueries;

  ensureTable(name: string): Promise<void>;
  ensureKey(name: string): Promise<void>;
  ensureFieldIndex(tableName: string, indexName: string, fields: readonly string[]): Promise<void>;

  insert<T>(tableName: string, document: T): Promise<void>;
  save<T>(tableName: string, document: T): Promise<void>;

  countAll(tableName: string): Promise<number>;
  countByField(tableName: string, field: FieldCriterion): Promise<number>;

  existsById(tableName: string, id: DocumentId): Promise<boolean>;
  existsByField(tableName: string, field: FieldCriterion): Promise<boolean>;

  findAll<T>(tableName: string): Promise<T[]>;
  findById<T>(tableName: string, id: DocumentId): Promise<T | undefined>;
  findByField<T>(tableName: string, field: FieldCriterion): Promise<T[]>;
  /** Any one matching document; no ordering is applied. */
  findFirstByField<T>(tableName: string, field: FieldCriterion): Promise<T | undefined>;

  updateById<T>(tableName: string, id: DocumentId, document: T): Promise<void>;
  updateByFunc<T>(tableName: string, idFunc: (document: T) => DocumentId, document: T): Promise<void>;

  patchById<P>(tableName: string, id: DocumentId, patch: P): Promise<void>;
  patchByField<P>(tableName: string, field: FieldCriterion, patch: P): Promise<void>;

  removeFieldsById(tableName: string, id: DocumentId, fieldNames: readonly string[]): Promise<void>;
  removeFieldsByField(
    tableName: string,
    field: FieldCriterion,
    fieldNames: readonly string[],
  ): Promise<void>;

  deleteById(tableName: string, id: DocumentId): Promise<void>;
  deleteByField(tableName: string, field: FieldCriterion): Promise<void>;

  close(): Promise<void>;
}
