import { EmitError } from '../core/errors.js';
import { DIALECT_NAMES, isDialectName, type DialectName } from '../core/config.js';
import type { ComparisonOperator, LiteralValue } from '../core/types.js';
import reservedWords from './reserved-words.json' with { type: 'json' };

// ── Dialect ──────────────────────────────────────────────────────────

export interface Dialect {
  readonly name: DialectName;
  /** Bound-parameter marker for the 1-based position `index` */
  placeholder(index: number): string;
  quoteIdentifier(name: string): string;
  supportsOperator(op: ComparisonOperator): boolean;
  /** Convert a literal to a value the driver can bind */
  bindValue(value: LiteralValue): LiteralValue;
}

const RESERVED: ReadonlySet<string> = new Set(reservedWords);
const SIMPLE_IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

function needsQuoting(name: string): boolean {
  return !SIMPLE_IDENTIFIER.test(name) || RESERVED.has(name);
}

function quoteWith(quote: string): (name: string) => string {
  return (name) => (needsQuoting(name) ? `${quote}${name.split(quote).join(quote + quote)}${quote}` : name);
}

// ── Built-in dialects ───────────────────────────────────────────────

const postgres: Dialect = {
  name: 'postgres',
  placeholder: (index) => `$${index}`,
  quoteIdentifier: quoteWith('"'),
  supportsOperator: () => true,
  bindValue: (value) => value,
};

const mysql: Dialect = {
  name: 'mysql',
  placeholder: () => '?',
  quoteIdentifier: quoteWith('`'),
  supportsOperator: (op) => op !== 'ILIKE',
  bindValue: (value) => value,
};

// better-sqlite3 binds no booleans; SQLite stores them as 0/1
const sqlite: Dialect = {
  name: 'sqlite',
  placeholder: () => '?',
  quoteIdentifier: quoteWith('"'),
  supportsOperator: (op) => op !== 'ILIKE',
  bindValue: (value) => (typeof value === 'boolean' ? Number(value) : value),
};

const DIALECTS: Readonly<Record<DialectName, Dialect>> = { postgres, mysql, sqlite };

export function getDialect(name: string): Dialect {
  if (!isDialectName(name)) {
    throw new EmitError(
      `unknown dialect '${name}' (expected one of ${DIALECT_NAMES.join(', ')})`,
      name,
    );
  }
  return DIALECTS[name];
}
