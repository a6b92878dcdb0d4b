/**
 * SQL Renderer — structural traversal of a query tree into parameterized
 * SQL text. Literals never reach the text: each one is bound and replaced
 * by the dialect's placeholder, numbered in text order.
 */
import { EmitError } from '../core/errors.js';
import { isAlwaysTrue, type LiteralValue } from '../core/types.js';
import type {
  AggregateExpr,
  ColumnRef,
  FilterNode,
  GroupNode,
  JoinNode,
  LimitNode,
  ProjectNode,
  QueryNode,
  ScanNode,
  SortKey,
  SortNode,
  TreeOperand,
  TreePredicate,
} from '../builder/query-tree.js';
import { getDialect, type Dialect } from './dialect.js';

export interface RenderedQuery {
  readonly text: string;
  readonly params: readonly LiteralValue[];
}

/** Render a query tree for one dialect. */
export function renderQuery(tree: QueryNode, dialectName: string): RenderedQuery {
  const dialect = getDialect(dialectName);
  const parts = decompose(tree);
  const ctx: RenderContext = {
    dialect,
    params: [],
    qualify: parts.joins.length > 0,
  };

  const lines: string[] = [];
  lines.push(`SELECT ${parts.project.columns.map((c) => renderProjection(c.name, c.expression, ctx)).join(', ')}`);
  lines.push(`FROM ${renderTable(parts.from, ctx)}`);

  for (const join of parts.joins) {
    const on = join.conditions
      .map((c) => `${renderColumn(c.left, ctx)} = ${renderColumn(c.right, ctx)}`)
      .join(' AND ');
    lines.push(`JOIN ${renderTable(join.right, ctx)} ON ${on}`);
  }

  if (parts.filter) {
    lines.push(`WHERE ${renderPredicate(parts.filter.predicate, ctx, 0)}`);
  }

  if (parts.group) {
    if (parts.group.keys.length > 0) {
      lines.push(`GROUP BY ${parts.group.keys.map((k) => renderColumn(k, ctx)).join(', ')}`);
    }
    if (!isAlwaysTrue(parts.group.having)) {
      lines.push(`HAVING ${renderPredicate(parts.group.having, ctx, 0)}`);
    }
  }

  if (parts.sort) {
    lines.push(`ORDER BY ${parts.sort.keys.map((k) => renderSortKey(k, ctx)).join(', ')}`);
  }

  if (parts.limit) {
    lines.push(`LIMIT ${parts.limit.count}`);
  }

  return { text: lines.join('\n'), params: ctx.params };
}

// ── Tree shape ──────────────────────────────────────────────────────

interface QueryParts {
  limit?: LimitNode;
  sort?: SortNode;
  project: ProjectNode;
  group?: GroupNode;
  filter?: FilterNode;
  /** In join order, outermost last */
  joins: JoinNode[];
  from: ScanNode;
}

/**
 * Split the single input chain `limit? → sort? → project → group? →
 * filter? → join* → scan` into its clauses.
 */
function decompose(root: QueryNode): QueryParts {
  let node = root;
  let limit: LimitNode | undefined;
  let sort: SortNode | undefined;
  let group: GroupNode | undefined;
  let filter: FilterNode | undefined;

  if (node.kind === 'limit') {
    limit = node;
    node = node.input;
  }
  if (node.kind === 'sort') {
    sort = node;
    node = node.input;
  }
  if (node.kind !== 'project') {
    throw malformed(node, 'a project node');
  }
  const project = node;
  node = node.input;

  if (node.kind === 'group') {
    group = node;
    node = node.input;
  }
  if (node.kind === 'filter') {
    filter = node;
    node = node.input;
  }

  const joins: JoinNode[] = [];
  while (node.kind === 'join') {
    joins.unshift(node);
    node = node.left;
  }
  if (node.kind !== 'scan') {
    throw malformed(node, 'a scan or join node');
  }

  return { limit, sort, project, group, filter, joins, from: node };
}

function malformed(node: QueryNode, expected: string): EmitError {
  return new EmitError(`malformed query tree: expected ${expected} but found '${node.kind}' (${node.id})`, node.kind);
}

// ── Expressions ─────────────────────────────────────────────────────

interface RenderContext {
  readonly dialect: Dialect;
  readonly params: LiteralValue[];
  /** Qualify columns with their alias (only when joining) */
  readonly qualify: boolean;
}

function renderTable(scan: ScanNode, ctx: RenderContext): string {
  const table = ctx.dialect.quoteIdentifier(scan.relation);
  return scan.alias === scan.relation ? table : `${table} AS ${ctx.dialect.quoteIdentifier(scan.alias)}`;
}

function renderColumn(column: ColumnRef, ctx: RenderContext): string {
  const name = ctx.dialect.quoteIdentifier(column.name);
  return ctx.qualify ? `${ctx.dialect.quoteIdentifier(column.alias)}.${name}` : name;
}

function renderAggregate(expr: AggregateExpr, ctx: RenderContext): string {
  const argument = expr.argument ? renderColumn(expr.argument, ctx) : '*';
  return `${expr.func.toUpperCase()}(${argument})`;
}

function renderProjection(name: string, expression: ColumnRef | AggregateExpr, ctx: RenderContext): string {
  if (expression.kind === 'column') {
    const column = renderColumn(expression, ctx);
    return name === expression.name ? column : `${column} AS ${ctx.dialect.quoteIdentifier(name)}`;
  }
  return `${renderAggregate(expression, ctx)} AS ${ctx.dialect.quoteIdentifier(name)}`;
}

function renderSortKey(key: SortKey, ctx: RenderContext): string {
  return `${renderSortExpression(key.expression, ctx)} ${key.direction}`;
}

function renderSortExpression(expression: SortKey['expression'], ctx: RenderContext): string {
  switch (expression.kind) {
    case 'output': return ctx.dialect.quoteIdentifier(expression.name);
    case 'column': return renderColumn(expression, ctx);
    case 'aggregate': return renderAggregate(expression, ctx);
  }
}

function renderOperand(operand: TreeOperand, ctx: RenderContext): string {
  switch (operand.kind) {
    case 'column': return renderColumn(operand, ctx);
    case 'aggregate': return renderAggregate(operand, ctx);
    case 'literal':
      ctx.params.push(ctx.dialect.bindValue(operand.value));
      return ctx.dialect.placeholder(ctx.params.length);
  }
}

// ── Predicates ──────────────────────────────────────────────────────

const PRECEDENCE = {
  or: 1,
  and: 2,
  not: 3,
  comparison: 4,
} as const;

/** Render with parentheses only when the node binds looser than its parent. */
function renderPredicate(predicate: TreePredicate, ctx: RenderContext, parent: number): string {
  const own = PRECEDENCE[predicate.kind];
  const text = renderConnective(predicate, ctx, own);
  return own < parent ? `(${text})` : text;
}

function renderConnective(predicate: TreePredicate, ctx: RenderContext, own: number): string {
  switch (predicate.kind) {
    case 'and':
    case 'or': {
      if (predicate.operands.length === 0) {
        throw new EmitError(`malformed query tree: empty '${predicate.kind}' inside a predicate`, predicate.kind);
      }
      const joiner = predicate.kind === 'and' ? ' AND ' : ' OR ';
      return predicate.operands.map((p) => renderPredicate(p, ctx, own)).join(joiner);
    }
    case 'not':
      return `NOT ${renderPredicate(predicate.operand, ctx, own)}`;
    case 'comparison':
      if (!ctx.dialect.supportsOperator(predicate.op)) {
        throw new EmitError(`${predicate.op} has no ${ctx.dialect.name} mapping`, predicate.op);
      }
      return `${renderOperand(predicate.left, ctx)} ${predicate.op} ${renderOperand(predicate.right, ctx)}`;
  }
}
