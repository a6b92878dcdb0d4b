import { resolveConfig, type PhiqlConfig, type ResolvedConfig } from './core/config.js';
import type { Diagnostic, QuerySpec } from './core/types.js';
import { parseSpec } from './parser/spec-parser.js';
import { validateSpec } from './validator/schema-validator.js';
import { buildQuery } from './builder/query-builder.js';
import type { QueryNode } from './builder/query-tree.js';
import { emitProgram, type QueryArtifact } from './emitter/program-emitter.js';

// ── compileSpec types ───────────────────────────────────────────────

export interface CompileResult {
  readonly config: ResolvedConfig;
  readonly spec: QuerySpec;
  readonly tree: QueryNode;
  readonly artifact: QueryArtifact;
  readonly warnings: readonly Diagnostic[];
}

// ── compileSpec ─────────────────────────────────────────────────────

/**
 * Run parse → validate → build → emit. Each stage throws its own
 * CompileError subclass; the same source and options always yield the
 * same artifact.
 */
export function compileSpec(source: string, options?: PhiqlConfig): CompileResult {
  const config = resolveConfig(options);

  const spec = validateSpec(parseSpec(source));
  const tree = buildQuery(spec, { defaultAggregate: config.defaultAggregate });
  const artifact = emitProgram(tree, { dialect: config.dialect, envPrefix: config.envPrefix });

  return {
    config,
    spec,
    tree,
    artifact,
    warnings: spec.warnings,
  };
}
