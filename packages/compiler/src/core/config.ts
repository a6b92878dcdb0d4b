import type { AggregateFunction } from './types.js';

// ── Dialects ─────────────────────────────────────────────────────────

export type DialectName = 'postgres' | 'mysql' | 'sqlite';

export const DIALECT_NAMES: readonly DialectName[] = ['postgres', 'mysql', 'sqlite'];

export function isDialectName(value: string): value is DialectName {
  return DIALECT_NAMES.some((d) => d === value);
}

// ── Default aggregates ───────────────────────────────────────────────

export type DefaultAggregate = Exclude<AggregateFunction, 'count'>;

const DEFAULT_AGGREGATES: readonly DefaultAggregate[] = ['sum', 'avg', 'min', 'max'];

export function isDefaultAggregate(value: string): value is DefaultAggregate {
  return DEFAULT_AGGREGATES.some((a) => a === value);
}

// ── PhiqlConfig ──────────────────────────────────────────────────────

export interface PhiqlConfig {
  /** Target store; decides placeholders, quoting and the driver the program imports */
  readonly dialect?: DialectName;
  /** Prefix of the environment variables the generated program reads */
  readonly envPrefix?: string;
  /** Aggregate applied to non-grouped numeric attributes when V is empty */
  readonly defaultAggregate?: DefaultAggregate;
}

export interface ResolvedConfig {
  readonly dialect: DialectName;
  readonly envPrefix: string;
  readonly defaultAggregate: DefaultAggregate;
}

export const DEFAULT_CONFIG: ResolvedConfig = Object.freeze({
  dialect: 'postgres',
  envPrefix: 'DB',
  defaultAggregate: 'sum',
});

const ENV_PREFIX_PATTERN = /^[A-Z][A-Z0-9_]*$/;

export function isValidEnvPrefix(value: string): boolean {
  return ENV_PREFIX_PATTERN.test(value);
}

// ── defineConfig ─────────────────────────────────────────────────────

export function defineConfig(config: PhiqlConfig): PhiqlConfig {
  if (config.dialect !== undefined && !isDialectName(config.dialect)) {
    throw new Error(
      `Unknown dialect '${String(config.dialect)}' (expected one of ${DIALECT_NAMES.join(', ')})`,
    );
  }

  if (config.envPrefix !== undefined && !isValidEnvPrefix(config.envPrefix)) {
    throw new Error(`envPrefix '${config.envPrefix}' must match ${ENV_PREFIX_PATTERN.source}`);
  }

  if (config.defaultAggregate !== undefined && !isDefaultAggregate(config.defaultAggregate)) {
    throw new Error(
      `defaultAggregate must be one of ${DEFAULT_AGGREGATES.join(', ')}`,
    );
  }

  return Object.freeze({ ...config });
}

/**
 * Merge configuration layers; later layers win. Each layer is validated
 * through `defineConfig` first.
 */
export function resolveConfig(...layers: readonly (PhiqlConfig | null | undefined)[]): ResolvedConfig {
  const merged: { dialect: DialectName; envPrefix: string; defaultAggregate: DefaultAggregate } = {
    ...DEFAULT_CONFIG,
  };

  for (const layer of layers) {
    if (!layer) continue;
    const checked = defineConfig(layer);
    if (checked.dialect !== undefined) merged.dialect = checked.dialect;
    if (checked.envPrefix !== undefined) merged.envPrefix = checked.envPrefix;
    if (checked.defaultAggregate !== undefined) merged.defaultAggregate = checked.defaultAggregate;
  }

  return Object.freeze(merged);
}
