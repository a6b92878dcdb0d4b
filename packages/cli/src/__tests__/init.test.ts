import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { compileSpec } from '@phiql/compiler';
import { runInit, scaffoldProject } from '../commands/init.js';
import { makeEnvExample, makePackageJson, projectFiles } from '../templates/project.js';

describe('phiql init', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'phiql-init-test-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    rmSync(testDir, { recursive: true, force: true });
  });

  it('scaffolds a project with defaults when --yes is given', async () => {
    const options = await runInit('shop', { yes: true, cwd: testDir });

    expect(options).toEqual({ projectName: 'shop', dialect: 'postgres', envPrefix: 'DB', example: true });
    const projectDir = join(testDir, 'shop');
    for (const file of ['package.json', 'phiql.config.ts', '.gitignore', '.env.example', 'specs/sales.phi']) {
      expect(existsSync(join(projectDir, file))).toBe(true);
    }
  });

  it('takes dialect and prefix from flags', async () => {
    const options = await runInit('local', { yes: true, cwd: testDir, dialect: 'sqlite', envPrefix: 'LOCAL', example: false });

    expect(options).toEqual({ projectName: 'local', dialect: 'sqlite', envPrefix: 'LOCAL', example: false });
    expect(readFileSync(join(testDir, 'local', '.env.example'), 'utf-8')).toBe('LOCAL_FILE=./data.db\n');
    expect(existsSync(join(testDir, 'local', 'specs'))).toBe(false);
  });

  it('refuses an existing directory', async () => {
    mkdirSync(join(testDir, 'taken'));

    const options = await runInit('taken', { yes: true, cwd: testDir });

    expect(options).toBeNull();
    expect(process.exitCode).toBe(1);
  });

  it('refuses an unknown dialect', async () => {
    const options = await runInit('shop', { yes: true, cwd: testDir, dialect: 'oracle' });

    expect(options).toBeNull();
    expect(process.exitCode).toBe(1);
    expect(existsSync(join(testDir, 'shop'))).toBe(false);
  });

  it('writes an example spec that compiles', () => {
    scaffoldProject(join(testDir, 'demo'), { projectName: 'demo', dialect: 'mysql', envPrefix: 'DB', example: true });

    const source = readFileSync(join(testDir, 'demo', 'specs/sales.phi'), 'utf-8');
    const result = compileSpec(source, { dialect: 'mysql' });

    expect(result.artifact.sql).toBe(
      'SELECT name, SUM(amount) AS total\nFROM sales\nWHERE amount > ?\nGROUP BY name\nORDER BY total DESC',
    );
  });
});

describe('project templates', () => {
  it('declares the driver packages of the dialect', () => {
    const pkg: unknown = JSON.parse(
      makePackageJson({ projectName: 'shop', dialect: 'postgres', envPrefix: 'DB', example: false }),
    );

    expect(pkg).toEqual({
      name: 'shop',
      version: '0.1.0',
      private: true,
      type: 'module',
      dependencies: { pg: '^8.13.0', 'pg-cursor': '^2.12.0' },
      devDependencies: { '@phiql/cli': '^0.1.0', '@phiql/compiler': '^0.1.0' },
    });
  });

  it('adds scripts with the example', () => {
    const pkg: unknown = JSON.parse(
      makePackageJson({ projectName: 'shop', dialect: 'sqlite', envPrefix: 'DB', example: true }),
    );

    expect(pkg).toMatchObject({
      scripts: { compile: 'phiql compile specs/sales.phi dist/sales.mjs' },
      dependencies: { 'better-sqlite3': '^11.5.0' },
    });
  });

  it('lists network connection variables for mysql', () => {
    expect(makeEnvExample({ projectName: 'shop', dialect: 'mysql', envPrefix: 'SHOP', example: false })).toBe(
      'SHOP_HOST=localhost\nSHOP_PORT=3306\nSHOP_NAME=app\nSHOP_USER=app\nSHOP_PASSWORD=\n',
    );
  });

  it('lists the files to write', () => {
    expect(
      projectFiles({ projectName: 'shop', dialect: 'postgres', envPrefix: 'DB', example: false }).map((f) => f.path),
    ).toEqual(['package.json', 'phiql.config.ts', '.gitignore', '.env.example']);
  });
});
