import { describe, it, expect } from 'vitest';
import { emitProgram } from '../../src/emitter/program-emitter.js';
import { buildQuery } from '../../src/builder/query-builder.js';
import { parseSpec } from '../../src/parser/spec-parser.js';
import { validateSpec } from '../../src/validator/schema-validator.js';
import { EmitError } from '../../src/core/errors.js';

const tree = buildQuery(
  validateSpec(parseSpec('S: id:int, name:text, amount:float\nn: 3\nV: name, amount\nF: sales\nsigma: amount > 100\nG:')),
);

describe('emitProgram', () => {
  it('returns the SQL, parameters and columns alongside the program', () => {
    const artifact = emitProgram(tree, { dialect: 'postgres' });

    expect(artifact.dialect).toBe('postgres');
    expect(artifact.sql).toBe('SELECT name, amount\nFROM sales\nWHERE amount > $1');
    expect(artifact.params).toEqual([100]);
    expect(artifact.columns).toEqual(['name', 'amount']);
  });

  it('embeds the query as exported constants', () => {
    const lines = emitProgram(tree, { dialect: 'postgres' }).program.split('\n');

    expect(lines.slice(0, 6)).toEqual([
      '// phiql query program (postgres)',
      '// Requires: npm install pg pg-cursor',
      '// Environment: DB_HOST, DB_PORT, DB_NAME, DB_USER, DB_PASSWORD',
      "import { pathToFileURL } from 'node:url';",
      "import pg from 'pg';",
      "import Cursor from 'pg-cursor';",
    ]);
    expect(lines).toContain('export const QUERY = "SELECT name, amount\\nFROM sales\\nWHERE amount > $1";');
    expect(lines).toContain('export const PARAMS = [100];');
    expect(lines).toContain('export const COLUMNS = ["name","amount"];');
    expect(lines).toContain('const BATCH_SIZE = 500;');
    expect(lines).toContain('export async function run(config, write) {');
    expect(lines).toContain('export function configFromEnv(env) {');
  });

  it('reads connection settings under the configured prefix', () => {
    const { program } = emitProgram(tree, { dialect: 'mysql', envPrefix: 'SHOP' });
    const lines = program.split('\n');

    expect(lines[1]).toBe('// Requires: npm install mysql2');
    expect(lines[2]).toBe('// Environment: SHOP_HOST, SHOP_PORT, SHOP_NAME, SHOP_USER, SHOP_PASSWORD');
    expect(lines).toContain("  const missing = ['SHOP_HOST', 'SHOP_NAME', 'SHOP_USER'].filter((key) => !env[key]);");
    expect(lines).toContain('    port: env.SHOP_PORT ? Number(env.SHOP_PORT) : 3306,');
    expect(lines).toContain('export const QUERY = "SELECT name, amount\\nFROM sales\\nWHERE amount > ?";');
  });

  it('opens a database file for sqlite', () => {
    const lines = emitProgram(tree, { dialect: 'sqlite' }).program.split('\n');

    expect(lines[2]).toBe('// Environment: DB_FILE');
    expect(lines).toContain("import Database from 'better-sqlite3';");
    expect(lines).toContain('  return { filename: env.DB_FILE };');
  });

  it('runs itself only as the entry script', () => {
    const { program } = emitProgram(tree, { dialect: 'postgres' });
    expect(program).toContain(
      'if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {',
    );
    expect(program.endsWith('}\n')).toBe(true);
  });

  it('is deterministic', () => {
    expect(emitProgram(tree, { dialect: 'sqlite' }).program).toBe(emitProgram(tree, { dialect: 'sqlite' }).program);
  });

  it('rejects an invalid prefix', () => {
    expect(() => emitProgram(tree, { dialect: 'postgres', envPrefix: 'db' })).toThrow(
      new EmitError("environment prefix 'db' is not a valid variable prefix", 'envPrefix'),
    );
  });

  it('rejects an unknown dialect', () => {
    expect(() => emitProgram(tree, { dialect: 'oracle' })).toThrow(EmitError);
  });
});
