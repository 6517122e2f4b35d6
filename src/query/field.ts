import { InvalidArgumentError } from '../errors.js';
import { isExistenceOp, opToSql } from './op.js';
import type { ComparisonOp, ExistenceOp, Op } from './op.js';

/** Values a field may be compared against. */
export type FieldValue = string | number | bigint | boolean;

export interface ComparisonCriterion {
  /** Name of the field, read with `->>` from the document's top level. */
  readonly name: string;
  readonly op: ComparisonOp;
  readonly value: FieldValue;
}

export interface ExistenceCriterion {
  readonly name: string;
  readonly op: ExistenceOp;
}

/**
 * Criterion for a field-based WHERE clause. A value is carried exactly
 * when the operation is a comparison.
 */
export type FieldCriterion = ComparisonCriterion | ExistenceCriterion;

export function isComparison(criterion: FieldCriterion): criterion is ComparisonCriterion {
  return !isExistenceOp(criterion.op);
}

/**
 * Builds a validated FieldCriterion.
 * Throws InvalidArgumentError if the name is blank, if a comparison has no value,
 * or if an existence test is given one.
 */
export function field(name: string, op: ComparisonOp, value: FieldValue): ComparisonCriterion;
export function field(name: string, op: ExistenceOp): ExistenceCriterion;
export function field(name: string, op: Op, value?: FieldValue): FieldCriterion;
export function field(name: string, op: Op, value?: FieldValue): FieldCriterion {
  if (name.trim() === '') {
    throw new InvalidArgumentError('field: name must be a non-empty string');
  }
  if (isExistenceOp(op)) {
    if (value !== undefined) {
      throw new InvalidArgumentError(
        `field: "${name}" uses ${opToSql(op)}, which takes no comparison value`,
      );
    }
    return { name, op };
  }
  if (value === undefined) {
    throw new InvalidArgumentError(`field: "${name}" uses ${opToSql(op)} and requires a value`);
  }
  return { name, op, value };
}

/**
 * Shorthand constructors, one per operation.
 *
 * @example
 * store.findByField('customer', Field.EQ('Status', 'active'))
 */
export const Field = {
  EQ: (name: string, value: FieldValue): ComparisonCriterion => field(name, 'EQ', value),
  GT: (name: string, value: FieldValue): ComparisonCriterion => field(name, 'GT', value),
  GE: (name: string, value: FieldValue): ComparisonCriterion => field(name, 'GE', value),
  LT: (name: string, value: FieldValue): ComparisonCriterion => field(name, 'LT', value),
  LE: (name: string, value: FieldValue): ComparisonCriterion => field(name, 'LE', value),
  NE: (name: string, value: FieldValue): ComparisonCriterion => field(name, 'NE', value),
  EXISTS: (name: string): ExistenceCriterion => field(name, 'EXISTS'),
  NOT_EXISTS: (name: string): ExistenceCriterion => field(name, 'NOT_EXISTS'),
};
