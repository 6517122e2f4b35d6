import { InvalidArgumentError } from '../errors.js';
import type { Parameters, SqlValue } from '../types.js';

export interface PositionalQuery {
  text: string;
  values: SqlValue[];
}

const PARAM_START = /[A-Za-z_]/;
const PARAM_PART = /[A-Za-z0-9_]/;

/** Index just past the quote that closes the literal opened at `start`. Doubled quotes are escapes. */
function closingQuote(sql: string, start: number, quote: string): number {
  let i = start + 1;
  while (i < sql.length) {
    if (sql.charAt(i) === quote) {
      if (sql.charAt(i + 1) === quote) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i += 1;
  }
  return sql.length;
}

/**
 * Rewrites `@name` placeholders into `$1`, `$2`, ... in order of first appearance.
 * A name used twice binds once. Quoted literals and identifiers are left alone,
 * as are the `@>`, `@?` and `@@` operators.
 * Throws InvalidArgumentError when the SQL references a parameter with no value.
 */
export function bindPositional(sql: string, parameters: Parameters): PositionalQuery {
  const positions = new Map<string, number>();
  const values: SqlValue[] = [];
  let text = '';
  let i = 0;

  while (i < sql.length) {
    const ch = sql.charAt(i);

    if (ch === "'" || ch === '"') {
      const end = closingQuote(sql, i, ch);
      text += sql.slice(i, end);
      i = end;
      continue;
    }

    if (ch === '@' && PARAM_START.test(sql.charAt(i + 1))) {
      let end = i + 2;
      while (end < sql.length && PARAM_PART.test(sql.charAt(end))) end += 1;
      const name = sql.slice(i, end);

      let position = positions.get(name);
      if (position === undefined) {
        const value = parameters[name];
        if (value === undefined) {
          throw new InvalidArgumentError(`No value supplied for parameter ${name}`);
        }
        values.push(value);
        position = values.length;
        positions.set(name, position);
      }
      text += `$${position}`;
      i = end;
      continue;
    }

    text += ch;
    i += 1;
  }

  return { text, values };
}
