import { isComparison } from './field.js';
import type { FieldCriterion } from './field.js';
import { opToSql } from './op.js';

/** SELECT clause retrieving the document column from a table. */
export function selectFromTable(tableName: string): string {
  return `SELECT data FROM ${tableName}`;
}

/**
 * WHERE fragment comparing a JSON field. Existence tests carry no parameter.
 * Field names are quoted as-is; callers supply safe identifiers.
 */
export function whereByField(field: FieldCriterion, paramName: string): string {
  const rest = isComparison(field) ? `${opToSql(field.op)} ${paramName}` : opToSql(field.op);
  return `data ->> '${field.name}' ${rest}`;
}

/** Table-local part of a possibly schema-qualified name (text after the first dot). */
export function tableOnly(tableName: string): string {
  const parts = tableName.split('.');
  return parts.length === 1 ? tableName : (parts[1] ?? tableName);
}

export function ensureTableFor(name: string, dataType: string): string {
  return `CREATE TABLE IF NOT EXISTS ${name} (data ${dataType} NOT NULL)`;
}

/**
 * Index over one or more document fields. Each entry may carry a direction,
 * e.g. `"Name DESC"`.
 */
export function ensureIndexOn(tableName: string, indexName: string, fields: readonly string[]): string {
  const jsonFields = fields
    .map((it) => {
      const [fieldName, direction] = it.split(' ');
      const suffix = direction === undefined ? '' : ` ${direction}`;
      return `(data ->> '${fieldName ?? it}')${suffix}`;
    })
    .join(', ');
  return `CREATE INDEX IF NOT EXISTS idx_${tableOnly(tableName)}_${indexName} ON ${tableName} (${jsonFields})`;
}

export function insert(tableName: string): string {
  return `INSERT INTO ${tableName} VALUES (@data)`;
}

export function countAll(tableName: string): string {
  return `SELECT COUNT(*) AS it FROM ${tableName}`;
}

/**
 * Statements shared by both dialects. Anything that depends on the id field
 * lives here so the configured name is fixed at construction.
 * Dialects fill in the table type and the patch/remove statements, whose
 * semantics differ between backends.
 */
export abstract class DocumentQueries {
  constructor(readonly idField: string) {}

  abstract ensureTable(name: string): string;

  abstract patchById(tableName: string): string;
  abstract patchByField(tableName: string, field: FieldCriterion): string;

  abstract removeFieldsById(tableName: string, paramNames: readonly string[]): string;
  abstract removeFieldsByField(
    tableName: string,
    field: FieldCriterion,
    paramNames: readonly string[],
  ): string;

  whereById(paramName: string): string {
    return `data ->> '${this.idField}' = ${paramName}`;
  }

  /** WHERE fragment for a field criterion; dialects may type the extracted value. */
  whereField(field: FieldCriterion, paramName: string): string {
    return whereByField(field, paramName);
  }

  /** Unique index on the id field; `save` relies on it as its conflict target. */
  ensureKey(tableName: string): string {
    return ensureIndexOn(tableName, 'key', [this.idField]).replace('INDEX', 'UNIQUE INDEX');
  }

  save(tableName: string): string {
    return (
      `INSERT INTO ${tableName} VALUES (@data) ` +
      `ON CONFLICT ((data ->> '${this.idField}')) DO UPDATE SET data = EXCLUDED.data`
    );
  }

  update(tableName: string): string {
    return `UPDATE ${tableName} SET data = @data WHERE ${this.whereById('@id')}`;
  }

  countByField(tableName: string, field: FieldCriterion): string {
    return `${countAll(tableName)} WHERE ${this.whereField(field, '@field')}`;
  }

  existsById(tableName: string): string {
    return `SELECT EXISTS (SELECT 1 FROM ${tableName} WHERE ${this.whereById('@id')}) AS it`;
  }

  existsByField(tableName: string, field: FieldCriterion): string {
    return `SELECT EXISTS (SELECT 1 FROM ${tableName} WHERE ${this.whereField(field, '@field')}) AS it`;
  }

  findById(tableName: string): string {
    return `${selectFromTable(tableName)} WHERE ${this.whereById('@id')}`;
  }

  findByField(tableName: string, field: FieldCriterion): string {
    return `${selectFromTable(tableName)} WHERE ${this.whereField(field, '@field')}`;
  }

  /** No ORDER BY: which match comes back is up to the database. */
  findFirstByField(tableName: string, field: FieldCriterion): string {
    return `${this.findByField(tableName, field)} LIMIT 1`;
  }

  deleteById(tableName: string): string {
    return `DELETE FROM ${tableName} WHERE ${this.whereById('@id')}`;
  }

  deleteByField(tableName: string, field: FieldCriterion): string {
    return `DELETE FROM ${tableName} WHERE ${this.whereField(field, '@field')}`;
  }
}
