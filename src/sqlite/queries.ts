import { DocumentQueries, ensureTableFor } from '../query/common.js';
import type { FieldCriterion } from '../query/field.js';

/**
 * SQLite statements over a TEXT column holding JSON.
 * Patches go through `json_patch` (RFC 7396), which merges nested objects
 * recursively and drops keys whose patch value is null.
 */
export class SqliteQueries extends DocumentQueries {
  ensureTable(name: string): string {
    return ensureTableFor(name, 'TEXT');
  }

  patchById(tableName: string): string {
    return this.patch(tableName, this.whereById('@id'));
  }

  patchByField(tableName: string, field: FieldCriterion): string {
    return this.patch(tableName, this.whereField(field, '@field'));
  }

  /** One path parameter per field, e.g. `@name0, @name1` bound to `$."Value", $."Sub"`. */
  removeFieldsById(tableName: string, paramNames: readonly string[]): string {
    return this.removeFields(tableName, this.whereById('@id'), paramNames);
  }

  removeFieldsByField(tableName: string, field: FieldCriterion, paramNames: readonly string[]): string {
    return this.removeFields(tableName, this.whereField(field, '@field'), paramNames);
  }

  private patch(tableName: string, where: string): string {
    return `UPDATE ${tableName} SET data = json_patch(data, json(@data)) WHERE ${where}`;
  }

  private removeFields(tableName: string, where: string, paramNames: readonly string[]): string {
    return `UPDATE ${tableName} SET data = json_remove(data, ${paramNames.join(', ')}) WHERE ${where}`;
  }
}
