import { existsSync } from 'node:fs';
import { isAbsolute, join, resolve } from 'node:path';
import { createJiti } from 'jiti';
import {
  defineConfig,
  isDefaultAggregate,
  isDialectName,
  resolveConfig,
  DIALECT_NAMES,
  type PhiqlConfig,
  type ResolvedConfig,
  type DialectName,
  type DefaultAggregate,
} from '@phiql/compiler';
import { CliError } from './diagnostics.js';

// jiti handles the .ts config at runtime without a build step
const jiti = createJiti(import.meta.url);

export const CONFIG_FILE = 'phiql.config.ts';

// ── Config loading ──────────────────────────────────────────────────

/**
 * Load the project config from phiql.config.ts (or `configPath`).
 * Returns null when no default config file exists; an explicit
 * `configPath` that does not exist is an error.
 */
export async function loadConfig(
  projectDir: string,
  configPath?: string,
): Promise<PhiqlConfig | null> {
  const path = configPath
    ? (isAbsolute(configPath) ? configPath : resolve(projectDir, configPath))
    : join(projectDir, CONFIG_FILE);

  if (!existsSync(path)) {
    if (configPath) {
      throw new CliError('config', `config file not found: ${configPath}`);
    }
    return null;
  }

  let mod: unknown;
  try {
    mod = await jiti.import(resolve(path), { default: true });
  } catch (err) {
    throw new CliError('config', `cannot load ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return toConfig(mod, path);
}

// ── Flag overrides ──────────────────────────────────────────────────

export interface ConfigFlags {
  readonly dialect?: string;
  /** Path to a config file other than phiql.config.ts */
  readonly config?: string;
}

/** Defaults, then the project config file, then command-line flags. */
export async function resolveProjectConfig(
  projectDir: string,
  flags: ConfigFlags,
): Promise<ResolvedConfig> {
  const fileConfig = await loadConfig(projectDir, flags.config);

  let flagConfig: PhiqlConfig | undefined;
  if (flags.dialect !== undefined) {
    if (!isDialectName(flags.dialect)) {
      throw new CliError(
        'config',
        `unknown dialect '${flags.dialect}' (expected one of ${DIALECT_NAMES.join(', ')})`,
      );
    }
    flagConfig = { dialect: flags.dialect };
  }

  return resolveConfig(fileConfig, flagConfig);
}

// ── Shape checks ────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toConfig(value: unknown, path: string): PhiqlConfig {
  if (!isRecord(value)) {
    throw new CliError('config', `${path} must export a config object as its default export`);
  }

  const { dialect, envPrefix, defaultAggregate } = value;
  const config: { dialect?: DialectName; envPrefix?: string; defaultAggregate?: DefaultAggregate } = {};

  if (dialect !== undefined) {
    if (typeof dialect !== 'string' || !isDialectName(dialect)) {
      throw new CliError('config', `${path}: unknown dialect '${String(dialect)}'`);
    }
    config.dialect = dialect;
  }
  if (envPrefix !== undefined) {
    if (typeof envPrefix !== 'string') {
      throw new CliError('config', `${path}: envPrefix must be a string`);
    }
    config.envPrefix = envPrefix;
  }
  if (defaultAggregate !== undefined) {
    if (typeof defaultAggregate !== 'string' || !isDefaultAggregate(defaultAggregate)) {
      throw new CliError('config', `${path}: unknown defaultAggregate '${String(defaultAggregate)}'`);
    }
    config.defaultAggregate = defaultAggregate;
  }

  try {
    return defineConfig(config);
  } catch (err) {
    throw new CliError('config', `${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
}
