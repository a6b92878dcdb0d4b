import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { runCompile } from '../commands/compile.js';

const SALES_SPEC = `S: id:int, name:text, amount:float
n: 3
V: name, amount
F: sales
sigma: amount > 100
G:
`;

describe('phiql compile', () => {
  let testDir: string;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'phiql-compile-test-'));
    writeFileSync(join(testDir, 'sales.phi'), SALES_SPEC);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    rmSync(testDir, { recursive: true, force: true });
  });

  function errorLine(): string {
    return String(errorSpy.mock.calls[0]?.[0]);
  }

  it('writes the query program', async () => {
    const result = await runCompile('sales.phi', 'out/sales.mjs', { projectDir: testDir });

    expect(result).not.toBeNull();
    const written = readFileSync(join(testDir, 'out/sales.mjs'), 'utf-8');
    expect(written).toBe(result?.artifact.program);
    expect(written).toContain('export const PARAMS = [100];');
    expect(process.exitCode).toBeUndefined();
  });

  it('writes plain SQL with --format sql', async () => {
    await runCompile('sales.phi', 'sales.sql', { projectDir: testDir, format: 'sql' });

    expect(readFileSync(join(testDir, 'sales.sql'), 'utf-8')).toBe(
      'SELECT name, amount\nFROM sales\nWHERE amount > $1;\n-- params: [100]\n',
    );
  });

  it('writes the plan as JSON with --format plan', async () => {
    await runCompile('sales.phi', 'sales.json', { projectDir: testDir, format: 'plan', dialect: 'mysql' });

    const plan: unknown = JSON.parse(readFileSync(join(testDir, 'sales.json'), 'utf-8'));
    expect(plan).toMatchObject({
      dialect: 'mysql',
      sql: 'SELECT name, amount\nFROM sales\nWHERE amount > ?',
      params: [100],
      columns: ['name', 'amount'],
      tree: { kind: 'project', id: 'project_0', input: { kind: 'filter', id: 'filter_0' } },
    });
  });

  it('reads phiql.config.ts', async () => {
    writeFileSync(join(testDir, 'phiql.config.ts'), "export default { dialect: 'sqlite', envPrefix: 'SHOP' };\n");

    const result = await runCompile('sales.phi', 'sales.mjs', { projectDir: testDir });

    expect(result?.config).toEqual({ dialect: 'sqlite', envPrefix: 'SHOP', defaultAggregate: 'sum' });
    expect(readFileSync(join(testDir, 'sales.mjs'), 'utf-8')).toContain('// Environment: SHOP_FILE');
  });

  it('lets --dialect override the config file', async () => {
    writeFileSync(join(testDir, 'phiql.config.ts'), "export default { dialect: 'sqlite' };\n");

    const result = await runCompile('sales.phi', 'sales.mjs', { projectDir: testDir, dialect: 'mysql' });
    expect(result?.artifact.dialect).toBe('mysql');
  });

  it('replaces an existing output file', async () => {
    writeFileSync(join(testDir, 'sales.sql'), 'old');

    await runCompile('sales.phi', 'sales.sql', { projectDir: testDir, format: 'sql' });
    expect(readFileSync(join(testDir, 'sales.sql'), 'utf-8')).toMatch(/^SELECT name, amount/);
  });

  it('reports a parse error with exit code 2 and writes nothing', async () => {
    writeFileSync(join(testDir, 'bad.phi'), SALES_SPEC.replace('n: 3', 'n: x'));

    const result = await runCompile('bad.phi', 'bad.mjs', { projectDir: testDir });

    expect(result).toBeNull();
    expect(process.exitCode).toBe(2);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorLine()).toContain(
      "error[parse] n (line 2, column 4): arity must be a non-negative integer, found 'x'",
    );
    expect(existsSync(join(testDir, 'bad.mjs'))).toBe(false);
  });

  it('reports a validation error with exit code 3', async () => {
    writeFileSync(join(testDir, 'bad.phi'), SALES_SPEC.replace('V: name, amount', 'V: name, region'));

    await runCompile('bad.phi', 'bad.mjs', { projectDir: testDir });

    expect(process.exitCode).toBe(3);
    expect(errorLine()).toContain("error[validate] 1 problem: V (line 3): attribute 'region' is not declared in S");
  });

  it('reports a build error with exit code 4', async () => {
    writeFileSync(join(testDir, 'bad.phi'), 'S: s.id:int, c.cid:int\nn: 2\nV: s.id\nF: sales s, customers c\nsigma:\nG:\n');

    await runCompile('bad.phi', 'bad.mjs', { projectDir: testDir });
    expect(process.exitCode).toBe(4);
    expect(errorLine()).toContain('error[build] relation');
  });

  it('reports an emit error with exit code 5', async () => {
    writeFileSync(join(testDir, 'bad.phi'), SALES_SPEC.replace('sigma: amount > 100', "sigma: name ILIKE 'a%'"));

    await runCompile('bad.phi', 'bad.mjs', { projectDir: testDir, dialect: 'sqlite' });
    expect(process.exitCode).toBe(5);
    expect(errorLine()).toContain('error[emit] ILIKE has no sqlite mapping');
  });

  it('reports a missing spec file with exit code 1', async () => {
    await runCompile('missing.phi', 'out.mjs', { projectDir: testDir });

    expect(process.exitCode).toBe(1);
    expect(errorLine()).toContain('error[io] spec file not found: missing.phi');
  });

  it('reports an unknown format with exit code 1', async () => {
    await runCompile('sales.phi', 'out.txt', { projectDir: testDir, format: 'xml' });

    expect(process.exitCode).toBe(1);
    expect(errorLine()).toContain("error[config] unknown format 'xml' (expected one of program, sql, plan)");
  });

  it('leaves no temporary file behind when the write fails', async () => {
    mkdirSync(join(testDir, 'taken.mjs'));
    writeFileSync(join(testDir, 'taken.mjs', 'keep.txt'), 'x');

    const result = await runCompile('sales.phi', 'taken.mjs', { projectDir: testDir });

    expect(result).toBeNull();
    expect(process.exitCode).toBe(1);
    expect(readdirSync(testDir).filter((f) => f.endsWith('.tmp'))).toEqual([]);
  });
});
