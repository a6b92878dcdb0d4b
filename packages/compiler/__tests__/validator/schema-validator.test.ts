import { describe, it, expect } from 'vitest';
import { collectSchemaIssues, validateSpec } from '../../src/validator/schema-validator.js';
import { parseSpec } from '../../src/parser/spec-parser.js';
import { SchemaError } from '../../src/core/errors.js';

function source(overrides: Record<string, string> = {}, extra = ''): string {
  const sections: Record<string, string> = {
    S: 'id:int, name:text, amount:float',
    n: '3',
    V: 'name, amount',
    F: 'sales',
    sigma: 'amount > 100',
    G: '',
    ...overrides,
  };
  const text = Object.entries(sections)
    .map(([field, body]) => `${field}: ${body}`.trimEnd())
    .join('\n');
  return extra ? `${text}\n${extra}` : text;
}

function issuesOf(overrides: Record<string, string> = {}, extra = '') {
  return collectSchemaIssues(parseSpec(source(overrides, extra)));
}

describe('validateSpec', () => {
  it('returns a valid spec unchanged', () => {
    const spec = parseSpec(source());
    expect(validateSpec(spec)).toBe(spec);
  });

  it('throws one SchemaError with every issue', () => {
    const spec = parseSpec(source({ n: '5', V: 'region' }));

    expect(() => validateSpec(spec)).toThrow(SchemaError);
    try {
      validateSpec(spec);
    } catch (err) {
      if (!(err instanceof SchemaError)) throw err;
      expect(err.issues.map((i) => i.code)).toEqual(['arity-mismatch', 'unknown-attribute']);
    }
  });
});

describe('S and n', () => {
  it('reports an arity mismatch on the n line', () => {
    expect(issuesOf({ n: '2' })).toEqual([
      {
        severity: 'error',
        code: 'arity-mismatch',
        field: 'n',
        message: 'arity n = 2 but S declares 3 attribute(s)',
        line: 2,
      },
    ]);
  });

  it('reports attributes declared twice', () => {
    expect(issuesOf({ S: 'id:int, id:text', n: '2', V: 'id', sigma: '' })).toEqual([
      {
        severity: 'error',
        code: 'duplicate-attribute',
        field: 'S',
        message: "attribute 'id' is declared more than once",
        line: 1,
      },
    ]);
  });

  it('requires aliases once F has several relations', () => {
    const issues = issuesOf({
      S: 'id:int, s.amount:float',
      n: '2',
      V: 's.amount',
      F: 'sales s, customers c',
      sigma: '',
    });

    expect(issues.map((i) => [i.code, i.message])).toEqual([
      ['unresolved-alias', "attribute 'id' has no alias but F declares 2 relations; write it as <alias>.id"],
      ['unused-alias', "alias 'c' (customers) is not used by any attribute in S"],
    ]);
  });

  it('reports aliases F does not declare', () => {
    const issues = issuesOf({ S: 'x.id:int', n: '1', V: '', sigma: '' });

    expect(issues.map((i) => [i.code, i.field, i.message])).toEqual([
      ['unknown-alias', 'S', "attribute 'x.id' uses alias 'x', which F does not declare"],
      ['unused-alias', 'F', "alias 'sales' (sales) is not used by any attribute in S"],
    ]);
  });
});

describe('F', () => {
  it('reports an alias bound twice', () => {
    const issues = issuesOf({ S: 's.id:int', n: '1', V: 's.id', F: 'sales s, orders s', sigma: '' });

    expect(issues).toEqual([
      {
        severity: 'error',
        code: 'duplicate-alias',
        field: 'F',
        message: "alias 's' is bound more than once",
        line: 4,
      },
    ]);
  });
});

describe('V', () => {
  it('reports attributes missing from S', () => {
    expect(issuesOf({ V: 'name, region' })).toEqual([
      {
        severity: 'error',
        code: 'unknown-attribute',
        field: 'V',
        message: "attribute 'region' is not declared in S",
        line: 3,
      },
    ]);
  });

  it('reports two outputs that resolve to the same attribute', () => {
    const issues = issuesOf({ V: 's.name, name', F: 'sales s' });
    expect(issues.map((i) => [i.code, i.message])).toEqual([
      ['duplicate-output', "'name' duplicates output 's.name'"],
    ]);
  });

  it('reports numeric aggregates over text', () => {
    const issues = issuesOf({ V: 'name, sum(name)', G: 'name' });
    expect(issues.map((i) => [i.code, i.message])).toEqual([
      ['type-mismatch', "sum(name) needs a numeric attribute but 'name' is text"],
    ]);
  });

  it('allows min and max over text', () => {
    expect(issuesOf({ V: 'id, max(name) AS last_name', G: 'id' })).toEqual([]);
  });
});

describe('sigma', () => {
  it('reports a literal of the wrong type', () => {
    expect(issuesOf({ sigma: 'name > 100' }).map((i) => i.message)).toEqual([
      "'name > 100' compares text with a number literal",
    ]);
  });

  it('reports attributes of incomparable types', () => {
    expect(issuesOf({ sigma: 'id = name' }).map((i) => i.message)).toEqual(["'id = name' compares integer with text"]);
  });

  it('reports LIKE on non-text operands', () => {
    expect(issuesOf({ sigma: "amount LIKE 'x%'" }).map((i) => i.message)).toEqual([
      "'amount LIKE 'x%'': LIKE needs text operands",
    ]);
  });

  it('reports two literals of different types', () => {
    const issues = issuesOf({ sigma: "1 = 'x'" });
    expect(issues.map((i) => [i.code, i.message])).toEqual([
      ['type-mismatch', "'1 = 'x'' compares a number literal with a string literal"],
    ]);
  });

  it('accepts two literals of the same type', () => {
    expect(issuesOf({ sigma: 'amount > 1 and 2 > 1' })).toEqual([]);
  });

  it('accepts numeric comparisons across integer and float', () => {
    expect(issuesOf({ sigma: "id < amount and name LIKE 'A%'" })).toEqual([]);
  });

  it('reports unknown attributes inside nested predicates', () => {
    const issues = issuesOf({ sigma: 'not (amount > 1 or region = 2)' });
    expect(issues.map((i) => [i.code, i.field, i.line])).toEqual([['unknown-attribute', 'sigma', 5]]);
  });
});

describe('G and having', () => {
  it('reports grouping keys missing from S', () => {
    expect(issuesOf({ G: 'region' }).map((i) => [i.code, i.field])).toEqual([['unknown-attribute', 'G']]);
  });

  it('requires visible grouping keys to be projected', () => {
    expect(issuesOf({ V: 'sum(amount) AS total', G: 'name' }).map((i) => i.message)).toEqual([
      "grouping key 'name' is not in V; write '~name' to group without projecting it",
    ]);
    expect(issuesOf({ V: 'sum(amount) AS total', G: '~name' })).toEqual([]);
  });

  it('does not require projection when V is empty', () => {
    expect(issuesOf({ V: '', sigma: '', G: 'name' })).toEqual([]);
  });

  it('reports repeated grouping keys', () => {
    expect(issuesOf({ V: 'name, sum(amount)', G: 'name, name' }).map((i) => i.code)).toEqual([
      'duplicate-grouping-key',
    ]);
  });

  it('requires having references to be grouped or aggregated', () => {
    const issues = issuesOf({ V: 'name, sum(amount)', G: 'name' }, 'having: amount > 10 and count(*) > 2');
    expect(issues).toEqual([
      {
        severity: 'error',
        code: 'ungrouped-having-reference',
        field: 'having',
        message: "'amount' is neither a grouping key nor inside an aggregate",
        line: 7,
      },
    ]);
  });
});

describe('order', () => {
  it('accepts output names and attributes', () => {
    expect(
      issuesOf({ V: 'name, sum(amount) AS total', G: 'name' }, 'order: total DESC, name'),
    ).toEqual([]);
  });

  it('reports unknown attributes', () => {
    expect(issuesOf({}, 'order: region').map((i) => [i.code, i.field, i.line])).toEqual([
      ['unknown-attribute', 'order', 7],
    ]);
  });
});
