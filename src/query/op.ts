/** Logical operations available for comparisons on JSON fields. */
export const Op = {
  EQ: 'EQ',
  GT: 'GT',
  GE: 'GE',
  LT: 'LT',
  LE: 'LE',
  NE: 'NE',
  EXISTS: 'EXISTS',
  NOT_EXISTS: 'NOT_EXISTS',
} as const;

export type Op = (typeof Op)[keyof typeof Op];

/** Operations that compare the field against a bound value. */
export type ComparisonOp = 'EQ' | 'GT' | 'GE' | 'LT' | 'LE' | 'NE';

/** Operations that only test whether the field is present. */
export type ExistenceOp = 'EXISTS' | 'NOT_EXISTS';

const OP_SQL: Readonly<Record<Op, string>> = {
  EQ: '=',
  GT: '>',
  GE: '>=',
  LT: '<',
  LE: '<=',
  NE: '<>',
  EXISTS: 'IS NOT NULL',
  NOT_EXISTS: 'IS NULL',
};

export function opToSql(op: Op): string {
  return OP_SQL[op];
}

export function isExistenceOp(op: Op): op is ExistenceOp {
  return op === 'EXISTS' || op === 'NOT_EXISTS';
}
