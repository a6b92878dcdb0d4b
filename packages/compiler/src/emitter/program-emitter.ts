/**
 * Code Emitter — renders a query tree into a QueryArtifact: the SQL text,
 * its bound parameters and a standalone ES module program that runs it.
 */
import { EmitError } from '../core/errors.js';
import { DEFAULT_CONFIG, isValidEnvPrefix, type DialectName } from '../core/config.js';
import type { LiteralValue } from '../core/types.js';
import { projectionOf, type QueryNode } from '../builder/query-tree.js';
import { getDialect } from './dialect.js';
import { DRIVER_TEMPLATES, mainGuard } from './program-templates.js';
import { renderQuery } from './sql-renderer.js';

// ── Public API ──────────────────────────────────────────────────────

export interface EmitOptions {
  readonly dialect: string;
  /** Prefix of the connection variables the program reads (default: DB) */
  readonly envPrefix?: string;
}

export interface QueryArtifact {
  readonly dialect: DialectName;
  readonly sql: string;
  readonly params: readonly LiteralValue[];
  /** Result column names, in projection order */
  readonly columns: readonly string[];
  /** Source of the generated ES module */
  readonly program: string;
}

/** Rows the generated program fetches per round trip */
const BATCH_SIZE = 500;

export function emitProgram(tree: QueryNode, options: EmitOptions): QueryArtifact {
  const dialect = getDialect(options.dialect);
  const envPrefix = options.envPrefix ?? DEFAULT_CONFIG.envPrefix;
  if (!isValidEnvPrefix(envPrefix)) {
    throw new EmitError(`environment prefix '${envPrefix}' is not a valid variable prefix`, 'envPrefix');
  }

  const query = renderQuery(tree, dialect.name);
  const columns = projectionOf(tree).columns.map((c) => c.name);
  const template = DRIVER_TEMPLATES[dialect.name];

  const program = [
    `// phiql query program (${dialect.name})`,
    `// Requires: npm install ${template.packages.join(' ')}`,
    `// Environment: ${template.variables.map((v) => `${envPrefix}_${v}`).join(', ')}`,
    `import { pathToFileURL } from 'node:url';`,
    template.imports(),
    '',
    `export const QUERY = ${JSON.stringify(query.text)};`,
    `export const PARAMS = ${JSON.stringify(query.params)};`,
    `export const COLUMNS = ${JSON.stringify(columns)};`,
    `const BATCH_SIZE = ${BATCH_SIZE};`,
    '',
    template.configFromEnv(envPrefix),
    '',
    template.run(),
    '',
    mainGuard(),
    '',
  ].join('\n');

  return {
    dialect: dialect.name,
    sql: query.text,
    params: query.params,
    columns,
    program,
  };
}
