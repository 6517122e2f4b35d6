import { InvalidArgumentError } from '../errors.js';
import type { DocumentQueries } from '../query/common.js';
import { countAll, ensureIndexOn, insert, selectFromTable } from '../query/common.js';
import type { FieldCriterion } from '../query/field.js';
import { fieldParams, idParam, jsonParam, noParams } from '../query/parameters.js';
import type {
  DocumentConfig,
  DocumentId,
  DocumentStore,
  Parameters,
  SqlConnection,
  ValueRenderer,
} from '../types.js';
import { CustomQueries } from './custom.js';
import { fromData, toCount, toExists } from './row-mapper.js';

/**
 * Document API shared by the dialect stores. Each call issues exactly one
 * statement on the store's connection; nothing is retried or wrapped.
 * Writes that match no rows complete silently.
 */
export abstract class SqlDocumentStore<Q extends DocumentQueries> implements DocumentStore {
  readonly custom: CustomQueries;

  protected constructor(
    protected readonly connection: SqlConnection,
    readonly config: DocumentConfig,
    protected readonly queries: Q,
    protected readonly render: ValueRenderer,
  ) {
    this.custom = new CustomQueries(connection, config.logger);
  }

  /** The same store bound to another connection, e.g. a client inside a caller's transaction. */
  abstract withConnection(connection: SqlConnection): SqlDocumentStore<Q>;

  /** Parameters naming the fields to strip, in the form the dialect's remove statement expects. */
  protected abstract fieldNameParams(fieldNames: readonly string[]): Parameters;

  async ensureTable(name: string): Promise<void> {
    await this.custom.nonQuery(this.queries.ensureTable(name), noParams);
    await this.custom.nonQuery(this.queries.ensureKey(name), noParams);
  }

  async ensureKey(name: string): Promise<void> {
    await this.custom.nonQuery(this.queries.ensureKey(name), noParams);
  }

  async ensureFieldIndex(tableName: string, indexName: string, fields: readonly string[]): Promise<void> {
    await this.custom.nonQuery(ensureIndexOn(tableName, indexName, fields), noParams);
  }

  /** Fails with the database's uniqueness violation when the id is already stored. */
  async insert<T>(tableName: string, document: T): Promise<void> {
    await this.custom.nonQuery(insert(tableName), this.dataParam(document));
  }

  /** Insert-or-replace keyed on the id field; needs the key index from ensureTable/ensureKey. */
  async save<T>(tableName: string, document: T): Promise<void> {
    await this.custom.nonQuery(this.queries.save(tableName), this.dataParam(document));
  }

  countAll(tableName: string): Promise<number> {
    return this.custom.scalar(countAll(tableName), noParams, toCount);
  }

  countByField(tableName: string, field: FieldCriterion): Promise<number> {
    return this.custom.scalar(
      this.queries.countByField(tableName, field),
      fieldParams(field, this.render),
      toCount,
    );
  }

  existsById(tableName: string, id: DocumentId): Promise<boolean> {
    return this.custom.scalar(this.queries.existsById(tableName), idParam(id, this.render), toExists);
  }

  existsByField(tableName: string, field: FieldCriterion): Promise<boolean> {
    return this.custom.scalar(
      this.queries.existsByField(tableName, field),
      fieldParams(field, this.render),
      toExists,
    );
  }

  findAll<T>(tableName: string): Promise<T[]> {
    return this.custom.list(selectFromTable(tableName), noParams, fromData<T>(this.config.serializer));
  }

  findById<T>(tableName: string, id: DocumentId): Promise<T | undefined> {
    return this.custom.single(
      this.queries.findById(tableName),
      idParam(id, this.render),
      fromData<T>(this.config.serializer),
    );
  }

  findByField<T>(tableName: string, field: FieldCriterion): Promise<T[]> {
    return this.custom.list(
      this.queries.findByField(tableName, field),
      fieldParams(field, this.render),
      fromData<T>(this.config.serializer),
    );
  }

  findFirstByField<T>(tableName: string, field: FieldCriterion): Promise<T | undefined> {
    return this.custom.single(
      this.queries.findFirstByField(tableName, field),
      fieldParams(field, this.render),
      fromData<T>(this.config.serializer),
    );
  }

  async updateById<T>(tableName: string, id: DocumentId, document: T): Promise<void> {
    await this.custom.nonQuery(this.queries.update(tableName), {
      ...idParam(id, this.render),
      ...this.dataParam(document),
    });
  }

  updateByFunc<T>(tableName: string, idFunc: (document: T) => DocumentId, document: T): Promise<void> {
    return this.updateById(tableName, idFunc(document), document);
  }

  async patchById<P>(tableName: string, id: DocumentId, patch: P): Promise<void> {
    await this.custom.nonQuery(this.queries.patchById(tableName), {
      ...idParam(id, this.render),
      ...this.dataParam(patch),
    });
  }

  async patchByField<P>(tableName: string, field: FieldCriterion, patch: P): Promise<void> {
    await this.custom.nonQuery(this.queries.patchByField(tableName, field), {
      ...fieldParams(field, this.render),
      ...this.dataParam(patch),
    });
  }

  /** Removing a field the document does not have leaves it unchanged. */
  async removeFieldsById(tableName: string, id: DocumentId, fieldNames: readonly string[]): Promise<void> {
    const names = this.namesToRemove(fieldNames);
    await this.custom.nonQuery(this.queries.removeFieldsById(tableName, Object.keys(names)), {
      ...idParam(id, this.render),
      ...names,
    });
  }

  async removeFieldsByField(
    tableName: string,
    field: FieldCriterion,
    fieldNames: readonly string[],
  ): Promise<void> {
    const names = this.namesToRemove(fieldNames);
    await this.custom.nonQuery(this.queries.removeFieldsByField(tableName, field, Object.keys(names)), {
      ...fieldParams(field, this.render),
      ...names,
    });
  }

  async deleteById(tableName: string, id: DocumentId): Promise<void> {
    await this.custom.nonQuery(this.queries.deleteById(tableName), idParam(id, this.render));
  }

  async deleteByField(tableName: string, field: FieldCriterion): Promise<void> {
    await this.custom.nonQuery(this.queries.deleteByField(tableName, field), fieldParams(field, this.render));
  }

  async close(): Promise<void> {
    await this.connection.close();
  }

  protected dataParam<T>(document: T): Parameters {
    return jsonParam('@data', document, this.config.serializer);
  }

  protected namesToRemove(fieldNames: readonly string[]): Parameters {
    if (fieldNames.length === 0) {
      throw new InvalidArgumentError('removeFields: at least one field name is required');
    }
    return this.fieldNameParams(fieldNames);
  }
}
