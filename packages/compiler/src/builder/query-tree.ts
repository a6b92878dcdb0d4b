import type {
  AggregateFunction,
  AttributeType,
  Literal,
  Predicate,
  SortDirection,
} from '../core/types.js';

// ── Leaf expressions ─────────────────────────────────────────────────

/** An attribute of S bound to the F alias that provides it */
export interface ColumnRef {
  readonly kind: 'column';
  readonly alias: string;
  readonly name: string;
  readonly type: AttributeType;
}

export interface AggregateExpr {
  readonly kind: 'aggregate';
  readonly func: AggregateFunction;
  /** `null` for `count(*)` */
  readonly argument: ColumnRef | null;
  /** Result type: integer for count, float for avg, the argument's type otherwise */
  readonly type: AttributeType;
}

/** A reference to a projected column by its output name (order only) */
export interface OutputRef {
  readonly kind: 'output';
  readonly name: string;
}

export type TreeOperand = ColumnRef | AggregateExpr | Literal;

export type TreePredicate = Predicate<TreeOperand>;

export interface ProjectionColumn {
  /** Column name in the result set */
  readonly name: string;
  readonly expression: ColumnRef | AggregateExpr;
}

export interface JoinCondition {
  readonly left: ColumnRef;
  readonly right: ColumnRef;
}

export interface SortKey {
  readonly expression: ColumnRef | AggregateExpr | OutputRef;
  readonly direction: SortDirection;
}

// ── Nodes ────────────────────────────────────────────────────────────

interface NodeBase {
  /** Stable within one build: `<kind>_<n>` in construction order */
  readonly id: string;
}

export interface ScanNode extends NodeBase {
  readonly kind: 'scan';
  readonly relation: string;
  readonly alias: string;
}

export interface JoinNode extends NodeBase {
  readonly kind: 'join';
  readonly left: QueryNode;
  readonly right: ScanNode;
  readonly conditions: readonly JoinCondition[];
}

export interface FilterNode extends NodeBase {
  readonly kind: 'filter';
  readonly input: QueryNode;
  readonly predicate: TreePredicate;
}

export interface GroupNode extends NodeBase {
  readonly kind: 'group';
  readonly input: QueryNode;
  /** In G order; hidden keys included */
  readonly keys: readonly ColumnRef[];
  /** Every distinct aggregate the projection, having and order use */
  readonly aggregates: readonly AggregateExpr[];
  readonly having: TreePredicate;
}

export interface ProjectNode extends NodeBase {
  readonly kind: 'project';
  readonly input: QueryNode;
  readonly columns: readonly ProjectionColumn[];
}

export interface SortNode extends NodeBase {
  readonly kind: 'sort';
  readonly input: QueryNode;
  readonly keys: readonly SortKey[];
}

export interface LimitNode extends NodeBase {
  readonly kind: 'limit';
  readonly input: QueryNode;
  readonly count: number;
}

export type QueryNode =
  | ScanNode
  | JoinNode
  | FilterNode
  | GroupNode
  | ProjectNode
  | SortNode
  | LimitNode;

export type QueryNodeKind = QueryNode['kind'];

// ── Traversal ────────────────────────────────────────────────────────

export function childrenOf(node: QueryNode): readonly QueryNode[] {
  switch (node.kind) {
    case 'scan': return [];
    case 'join': return [node.left, node.right];
    default: return [node.input];
  }
}

/** Pre-order walk; returning false from the callback skips the node's inputs. */
export function walkTree(root: QueryNode, callback: (node: QueryNode) => void | false): void {
  const result = callback(root);
  if (result === false) return;

  for (const child of childrenOf(root)) {
    walkTree(child, callback);
  }
}

export function findNodes<K extends QueryNodeKind>(
  root: QueryNode,
  kind: K,
): Extract<QueryNode, { kind: K }>[] {
  const results: Extract<QueryNode, { kind: K }>[] = [];
  walkTree(root, (node) => {
    if (isKind(node, kind)) {
      results.push(node);
    }
  });
  return results;
}

export function isKind<K extends QueryNodeKind>(
  node: QueryNode,
  kind: K,
): node is Extract<QueryNode, { kind: K }> {
  return node.kind === kind;
}

/** The projection every well-formed tree carries; throws when it has none. */
export function projectionOf(root: QueryNode): ProjectNode {
  const [project] = findNodes(root, 'project');
  if (!project) {
    throw new Error(`query tree rooted at '${root.id}' has no project node`);
  }
  return project;
}

// ── Formatting ───────────────────────────────────────────────────────

export function formatColumn(column: ColumnRef): string {
  return `${column.alias}.${column.name}`;
}

export function formatAggregateExpr(expr: AggregateExpr): string {
  return `${expr.func}(${expr.argument ? formatColumn(expr.argument) : '*'})`;
}

/** Identity key for an aggregate; equal keys render to the same SQL */
export function aggregateKey(expr: AggregateExpr): string {
  return formatAggregateExpr(expr);
}
