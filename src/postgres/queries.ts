import { DocumentQueries, ensureTableFor, selectFromTable, tableOnly, whereByField } from '../query/common.js';
import { isComparison } from '../query/field.js';
import type { FieldCriterion } from '../query/field.js';
import { opToSql } from '../query/op.js';

/** Type of GIN index to build over the whole document. */
export const DocumentIndex = {
  /** Default operator class; supports every jsonb operator. */
  Full: 'Full',
  /** `jsonb_path_ops`; smaller, serves only @>, @? and @@. */
  Optimized: 'Optimized',
} as const;

export type DocumentIndex = (typeof DocumentIndex)[keyof typeof DocumentIndex];

/** WHERE fragment for JSON containment (@>). */
export function whereDataContains(paramName: string): string {
  return `data @> ${paramName}`;
}

/** WHERE fragment for a JSON Path match (@?). */
export function whereJsonPathMatches(paramName: string): string {
  return `data @? ${paramName}::jsonpath`;
}

export function ensureDocumentIndex(tableName: string, kind: DocumentIndex): string {
  const extraOps = kind === DocumentIndex.Full ? '' : ' jsonb_path_ops';
  return (
    `CREATE INDEX IF NOT EXISTS idx_${tableOnly(tableName)}_document ` +
    `ON ${tableName} USING GIN (data${extraOps})`
  );
}

const CONTAINS = whereDataContains('@criteria');
const JSON_PATH = whereJsonPathMatches('@path');

/**
 * PostgreSQL statements. Patches use `||`, which merges top-level keys only:
 * a nested object in the patch replaces the stored one wholesale.
 */
export class PostgresQueries extends DocumentQueries {
  ensureTable(name: string): string {
    return ensureTableFor(name, 'JSONB');
  }

  /**
   * `->>` yields text, so numeric comparisons cast the field to numeric.
   * A stored value that is not a number then fails the statement.
   */
  override whereField(field: FieldCriterion, paramName: string): string {
    if (isComparison(field) && (typeof field.value === 'number' || typeof field.value === 'bigint')) {
      return `(data ->> '${field.name}')::numeric ${opToSql(field.op)} ${paramName}`;
    }
    return whereByField(field, paramName);
  }

  countByContains(tableName: string): string {
    return `SELECT COUNT(*) AS it FROM ${tableName} WHERE ${CONTAINS}`;
  }

  countByJsonPath(tableName: string): string {
    return `SELECT COUNT(*) AS it FROM ${tableName} WHERE ${JSON_PATH}`;
  }

  existsByContains(tableName: string): string {
    return `SELECT EXISTS (SELECT 1 FROM ${tableName} WHERE ${CONTAINS}) AS it`;
  }

  existsByJsonPath(tableName: string): string {
    return `SELECT EXISTS (SELECT 1 FROM ${tableName} WHERE ${JSON_PATH}) AS it`;
  }

  findByContains(tableName: string): string {
    return `${selectFromTable(tableName)} WHERE ${CONTAINS}`;
  }

  findByJsonPath(tableName: string): string {
    return `${selectFromTable(tableName)} WHERE ${JSON_PATH}`;
  }

  findFirstByContains(tableName: string): string {
    return `${this.findByContains(tableName)} LIMIT 1`;
  }

  findFirstByJsonPath(tableName: string): string {
    return `${this.findByJsonPath(tableName)} LIMIT 1`;
  }

  patchById(tableName: string): string {
    return this.patch(tableName, this.whereById('@id'));
  }

  patchByField(tableName: string, field: FieldCriterion): string {
    return this.patch(tableName, this.whereField(field, '@field'));
  }

  patchByContains(tableName: string): string {
    return this.patch(tableName, CONTAINS);
  }

  patchByJsonPath(tableName: string): string {
    return this.patch(tableName, JSON_PATH);
  }

  /** `@name` is bound to a text[] of top-level keys, so no per-field parameter names are needed. */
  removeFieldsById(tableName: string): string {
    return this.removeFields(tableName, this.whereById('@id'));
  }

  removeFieldsByField(tableName: string, field: FieldCriterion): string {
    return this.removeFields(tableName, this.whereField(field, '@field'));
  }

  removeFieldsByContains(tableName: string): string {
    return this.removeFields(tableName, CONTAINS);
  }

  removeFieldsByJsonPath(tableName: string): string {
    return this.removeFields(tableName, JSON_PATH);
  }

  deleteByContains(tableName: string): string {
    return `DELETE FROM ${tableName} WHERE ${CONTAINS}`;
  }

  deleteByJsonPath(tableName: string): string {
    return `DELETE FROM ${tableName} WHERE ${JSON_PATH}`;
  }

  private patch(tableName: string, where: string): string {
    return `UPDATE ${tableName} SET data = data || @data WHERE ${where}`;
  }

  private removeFields(tableName: string, where: string): string {
    return `UPDATE ${tableName} SET data = data - @name::text[] WHERE ${where}`;
  }
}
