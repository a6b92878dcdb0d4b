import { describe, it, expect } from 'vitest';
import { getDialect } from '../../src/emitter/dialect.js';
import { EmitError } from '../../src/core/errors.js';

describe('getDialect', () => {
  it('numbers postgres placeholders and uses ? elsewhere', () => {
    expect(getDialect('postgres').placeholder(3)).toBe('$3');
    expect(getDialect('mysql').placeholder(3)).toBe('?');
    expect(getDialect('sqlite').placeholder(3)).toBe('?');
  });

  it('leaves simple identifiers bare', () => {
    expect(getDialect('postgres').quoteIdentifier('order_total')).toBe('order_total');
  });

  it('quotes reserved words, mixed case and odd characters', () => {
    const pg = getDialect('postgres');
    expect(pg.quoteIdentifier('user')).toBe('"user"');
    expect(pg.quoteIdentifier('Name')).toBe('"Name"');
    expect(pg.quoteIdentifier('2nd')).toBe('"2nd"');
    expect(pg.quoteIdentifier('a"b')).toBe('"a""b"');
  });

  it('quotes with backticks in mysql', () => {
    const my = getDialect('mysql');
    expect(my.quoteIdentifier('order')).toBe('`order`');
    expect(my.quoteIdentifier('a`b')).toBe('`a``b`');
  });

  it('supports ILIKE only in postgres', () => {
    expect(getDialect('postgres').supportsOperator('ILIKE')).toBe(true);
    expect(getDialect('mysql').supportsOperator('ILIKE')).toBe(false);
    expect(getDialect('sqlite').supportsOperator('ILIKE')).toBe(false);
    expect(getDialect('sqlite').supportsOperator('LIKE')).toBe(true);
  });

  it('binds booleans as integers in sqlite', () => {
    expect(getDialect('sqlite').bindValue(true)).toBe(1);
    expect(getDialect('sqlite').bindValue(false)).toBe(0);
    expect(getDialect('postgres').bindValue(true)).toBe(true);
    expect(getDialect('sqlite').bindValue('x')).toBe('x');
  });

  it('rejects unknown dialects', () => {
    expect(() => getDialect('oracle')).toThrow(EmitError);
    expect(() => getDialect('oracle')).toThrow("unknown dialect 'oracle' (expected one of postgres, mysql, sqlite)");
  });
});
