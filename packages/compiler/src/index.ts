// ── Core: types ──────────────────────────────────────────────────────
export {
  AttributeType,
  ALWAYS_TRUE,
  AGGREGATE_FUNCTIONS,
  CORE_FIELDS,
  OPTIONAL_FIELDS,
  isAlwaysTrue,
  formatRef,
  formatAggregate,
  formatOperand,
} from './core/types.js';
export type {
  SourcePosition,
  SpecField,
  AttributeDecl,
  AttributeRef,
  AggregateFunction,
  AggregateCall,
  LiteralValue,
  Literal,
  Operand,
  ComparisonOperator,
  Comparison,
  And,
  Or,
  Not,
  Predicate,
  OutputItem,
  RelationBinding,
  GroupingKey,
  SortDirection,
  OrderItem,
  Diagnostic,
  QuerySpec,
} from './core/types.js';

// ── Core: schema types ───────────────────────────────────────────────
export { resolveAttributeType, isNumericType, areComparableTypes, acceptsLiteral } from './core/schema.js';

// ── Core: errors ─────────────────────────────────────────────────────
export {
  CompileError,
  ParseError,
  SchemaError,
  BuildError,
  EmitError,
  STAGE_EXIT_CODES,
  formatIssue,
  isCompileError,
} from './core/errors.js';
export type { CompileStage } from './core/errors.js';

// ── Core: config ─────────────────────────────────────────────────────
export {
  defineConfig,
  resolveConfig,
  isDialectName,
  isDefaultAggregate,
  isValidEnvPrefix,
  DEFAULT_CONFIG,
  DIALECT_NAMES,
} from './core/config.js';
export type { PhiqlConfig, ResolvedConfig, DialectName, DefaultAggregate } from './core/config.js';

// ── Spec Parser ──────────────────────────────────────────────────────
export { parseSpec, parseDocument } from './parser/spec-parser.js';
export type { SpecDocument, SpecSection } from './parser/ast.js';

// ── Schema Validator ─────────────────────────────────────────────────
export { validateSpec, collectSchemaIssues } from './validator/schema-validator.js';

// ── Query Builder ────────────────────────────────────────────────────
export { buildQuery } from './builder/query-builder.js';
export type { BuildOptions } from './builder/query-builder.js';
export {
  walkTree,
  findNodes,
  childrenOf,
  projectionOf,
  formatColumn,
  formatAggregateExpr,
} from './builder/query-tree.js';
export type {
  QueryNode,
  QueryNodeKind,
  ScanNode,
  JoinNode,
  FilterNode,
  GroupNode,
  ProjectNode,
  SortNode,
  LimitNode,
  ColumnRef,
  AggregateExpr,
  OutputRef,
  TreeOperand,
  TreePredicate,
  ProjectionColumn,
  JoinCondition,
  SortKey,
} from './builder/query-tree.js';

// ── Code Emitter ─────────────────────────────────────────────────────
export { renderQuery } from './emitter/sql-renderer.js';
export type { RenderedQuery } from './emitter/sql-renderer.js';
export { emitProgram } from './emitter/program-emitter.js';
export type { EmitOptions, QueryArtifact } from './emitter/program-emitter.js';
export { getDialect } from './emitter/dialect.js';
export type { Dialect } from './emitter/dialect.js';

// ── Compiler ─────────────────────────────────────────────────────────
export { compileSpec } from './compiler.js';
export type { CompileResult } from './compiler.js';
