import { describe, it, expect } from 'vitest';
import { bindPositional } from '../../src/store/bind.js';
import { InvalidArgumentError } from '../../src/errors.js';

describe('bindPositional', () => {
  it('rewrites a named parameter to $1', () => {
    const result = bindPositional("SELECT data FROM customer WHERE data ->> 'Id' = @id", { '@id': 'one' });
    expect(result).toEqual({
      text: "SELECT data FROM customer WHERE data ->> 'Id' = $1",
      values: ['one'],
    });
  });

  it('numbers parameters in order of first appearance and reuses repeated names', () => {
    const result = bindPositional('SELECT @b, @a, @b', { '@a': 1, '@b': 2 });
    expect(result).toEqual({ text: 'SELECT $1, $2, $1', values: [2, 1] });
  });

  it('leaves the @> and @? operators alone', () => {
    expect(bindPositional('data @> @criteria', { '@criteria': '{}' }).text).toBe('data @> $1');
    expect(bindPositional('data @? @path::jsonpath', { '@path': '$.a' }).text).toBe('data @? $1::jsonpath');
  });

  it('skips quoted literals, including doubled quotes', () => {
    const result = bindPositional("SELECT 'it''s @x', \"@y\", @z", { '@z': 'ok' });
    expect(result).toEqual({ text: "SELECT 'it''s @x', \"@y\", $1", values: ['ok'] });
  });

  it('passes null and array values through', () => {
    const result = bindPositional('SELECT @a, @b', { '@a': null, '@b': ['Sub', 'Value'] });
    expect(result.values).toEqual([null, ['Sub', 'Value']]);
  });

  it('ignores parameters the statement does not use', () => {
    expect(bindPositional('SELECT 1', { '@unused': 'x' })).toEqual({ text: 'SELECT 1', values: [] });
  });

  it('throws InvalidArgumentError when a referenced parameter has no value', () => {
    expect(() => bindPositional('SELECT @id', {})).toThrow(InvalidArgumentError);
    expect(() => bindPositional('SELECT @id', {})).toThrow('No value supplied for parameter @id');
  });
});
