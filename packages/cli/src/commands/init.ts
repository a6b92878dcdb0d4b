import { Command } from 'commander';
import * as clack from '@clack/prompts';
import pc from 'picocolors';
import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import {
  DEFAULT_CONFIG,
  DIALECT_NAMES,
  isDialectName,
  isValidEnvPrefix,
  type DialectName,
} from '@phiql/compiler';
import { projectFiles } from '../templates/project.js';
import { CliError, reportFailure } from '../diagnostics.js';

export interface ScaffoldOptions {
  readonly projectName: string;
  readonly dialect: DialectName;
  readonly envPrefix: string;
  /** Include specs/sales.phi */
  readonly example: boolean;
}

export interface TemplateFile {
  readonly path: string;
  readonly content: string;
}

export interface InitCommandOptions {
  readonly dialect?: string;
  readonly envPrefix?: string;
  readonly yes?: boolean;
  readonly example?: boolean;
  /** Directory the project directory is created in (default: cwd) */
  readonly cwd?: string;
}

const DIALECT_HINTS: Readonly<Record<DialectName, string>> = {
  postgres: 'pg + pg-cursor',
  mysql: 'mysql2',
  sqlite: 'better-sqlite3',
};

// ── Command registration ────────────────────────────────────────────

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .argument('<project-name>', 'Name of the new project')
    .option('-d, --dialect <dialect>', 'Target dialect (postgres, mysql, sqlite)')
    .option('--env-prefix <prefix>', 'Prefix of the connection environment variables')
    .option('-y, --yes', 'Use defaults, skip prompts')
    .option('--no-example', 'Skip the example specification')
    .description('Create a new phiql project')
    .action(async (projectName: string, opts: InitCommandOptions) => {
      await runInit(projectName, opts);
    });
}

// ── Command logic ───────────────────────────────────────────────────

export async function runInit(
  projectName: string,
  opts: InitCommandOptions = {},
): Promise<ScaffoldOptions | null> {
  const projectDir = resolve(opts.cwd ?? process.cwd(), projectName);

  try {
    if (existsSync(projectDir)) {
      throw new CliError('io', `directory "${projectName}" already exists`);
    }

    const options = opts.yes === true
      ? defaultOptions(projectName, opts)
      : await collectOptions(projectName, opts);
    if (!options) return null;

    scaffoldProject(projectDir, options);

    console.log('');
    console.log(pc.green('Project created successfully!'));
    console.log('');
    console.log(`  ${pc.dim('cd')} ${projectName}`);
    console.log(`  ${pc.dim('npm')} install`);
    if (options.example) {
      console.log(`  ${pc.dim('npm')} run compile`);
    }
    console.log('');
    return options;
  } catch (err) {
    reportFailure(err);
    return null;
  }
}

function defaultOptions(projectName: string, opts: InitCommandOptions): ScaffoldOptions {
  return {
    projectName,
    dialect: parseDialect(opts.dialect) ?? DEFAULT_CONFIG.dialect,
    envPrefix: parseEnvPrefix(opts.envPrefix) ?? DEFAULT_CONFIG.envPrefix,
    example: opts.example !== false,
  };
}

// ── Interactive prompts ─────────────────────────────────────────────

async function collectOptions(
  projectName: string,
  cliOpts: InitCommandOptions,
): Promise<ScaffoldOptions | null> {
  clack.intro(pc.bgCyan(pc.black(' phiql init ')));

  const dialect = parseDialect(cliOpts.dialect) ?? await promptDialect();
  if (clack.isCancel(dialect)) {
    clack.cancel('Operation cancelled.');
    return null;
  }

  const envPrefix = parseEnvPrefix(cliOpts.envPrefix) ?? await clack.text({
    message: 'Prefix for the connection environment variables?',
    placeholder: DEFAULT_CONFIG.envPrefix,
    defaultValue: DEFAULT_CONFIG.envPrefix,
    validate: (value) => (value === '' || isValidEnvPrefix(value) ? undefined : 'Use upper-case letters, digits and _'),
  });
  if (clack.isCancel(envPrefix)) {
    clack.cancel('Operation cancelled.');
    return null;
  }

  const example = cliOpts.example === false ? false : await clack.confirm({
    message: 'Add an example specification?',
    initialValue: true,
  });
  if (clack.isCancel(example)) {
    clack.cancel('Operation cancelled.');
    return null;
  }

  clack.outro(pc.green('Scaffolding project...'));

  return { projectName, dialect, envPrefix, example };
}

async function promptDialect(): Promise<DialectName | symbol> {
  return clack.select<DialectName>({
    message: 'Which database will the program query?',
    options: DIALECT_NAMES.map((name) => ({ value: name, label: name, hint: DIALECT_HINTS[name] })),
  });
}

// ── Validation ──────────────────────────────────────────────────────

function parseDialect(value: string | undefined): DialectName | undefined {
  if (value === undefined) return undefined;
  if (!isDialectName(value)) {
    throw new CliError('config', `unknown dialect '${value}' (expected one of ${DIALECT_NAMES.join(', ')})`);
  }
  return value;
}

function parseEnvPrefix(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  if (!isValidEnvPrefix(value)) {
    throw new CliError('config', `invalid env prefix '${value}' (use upper-case letters, digits and _)`);
  }
  return value;
}

// ── Scaffolding ─────────────────────────────────────────────────────

export function scaffoldProject(projectDir: string, options: ScaffoldOptions): void {
  for (const file of projectFiles(options)) {
    const filePath = join(projectDir, file.path);
    const dir = join(filePath, '..');
    mkdirSync(dir, { recursive: true });
    writeFileSync(filePath, file.content, 'utf-8');
  }
}
