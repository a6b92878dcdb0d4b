/**
 * Query Builder — turns a validated QuerySpec into a query expression tree.
 *
 * Flow: F → scans + left-deep joins → filter (sigma) → group (G, having)
 *       → project (V) → sort (order) → limit
 */
import { BuildError } from '../core/errors.js';
import { DEFAULT_CONFIG, type DefaultAggregate } from '../core/config.js';
import { areComparableTypes, isNumericType } from '../core/schema.js';
import {
  AttributeType,
  formatRef,
  isAlwaysTrue,
  type AggregateCall,
  type AttributeRef,
  type Operand,
  type OrderItem,
  type OutputItem,
  type Predicate,
  type QuerySpec,
} from '../core/types.js';
import { AttributeScope } from '../validator/scope.js';
import {
  aggregateKey,
  formatColumn,
  type AggregateExpr,
  type ColumnRef,
  type JoinCondition,
  type ProjectionColumn,
  type QueryNode,
  type ScanNode,
  type SortKey,
  type TreeOperand,
  type TreePredicate,
} from './query-tree.js';

// ── Public API ──────────────────────────────────────────────────────

export interface BuildOptions {
  /** Aggregate for non-grouped numeric attributes when V is empty (default: sum) */
  readonly defaultAggregate?: DefaultAggregate;
}

/** Build the query tree for a spec that has passed validation. */
export function buildQuery(spec: QuerySpec, options: BuildOptions = {}): QueryNode {
  return new QueryBuilder(spec, options.defaultAggregate ?? DEFAULT_CONFIG.defaultAggregate).build();
}

// ── QueryBuilder ────────────────────────────────────────────────────

class QueryBuilder {
  private readonly scope: AttributeScope;
  private readonly counters = new Map<string, number>();
  private readonly aggregates = new Map<string, AggregateExpr>();

  constructor(
    private readonly spec: QuerySpec,
    private readonly defaultAggregate: DefaultAggregate,
  ) {
    this.scope = new AttributeScope(spec.schema, spec.relations);
  }

  build(): QueryNode {
    let node = this.buildJoins();

    if (!isAlwaysTrue(this.spec.selection)) {
      node = { kind: 'filter', id: this.nextId('filter'), input: node, predicate: this.resolvePredicate(this.spec.selection, 'sigma') };
    }

    const keys = this.spec.grouping.map((key) => this.resolveRef(key.attribute, 'G'));
    const grouped = keys.length > 0
      || this.spec.outputs.some((o) => o.expression.kind === 'aggregate')
      || this.spec.ordering.some((o) => o.expression.kind === 'aggregate')
      || !isAlwaysTrue(this.spec.having);

    const columns = this.spec.outputs.length > 0
      ? this.explicitColumns(grouped ? keys : undefined)
      : this.defaultColumns(grouped ? keys : undefined);
    checkColumnNames(columns);

    if (grouped) {
      const having = this.resolvePredicate(this.spec.having, 'having');
      checkHavingReferences(having, keys);
      const sortKeys = this.sortKeys(columns, keys);
      node = {
        kind: 'group',
        id: this.nextId('group'),
        input: node,
        keys,
        aggregates: [...this.aggregates.values()],
        having,
      };
      node = { kind: 'project', id: this.nextId('project'), input: node, columns };
      node = this.wrapSort(node, sortKeys);
    } else {
      node = { kind: 'project', id: this.nextId('project'), input: node, columns };
      node = this.wrapSort(node, this.sortKeys(columns, undefined));
    }

    if (this.spec.limit !== undefined) {
      node = { kind: 'limit', id: this.nextId('limit'), input: node, count: this.spec.limit };
    }
    return node;
  }

  private nextId(kind: string): string {
    const n = this.counters.get(kind) ?? 0;
    this.counters.set(kind, n + 1);
    return `${kind}_${n}`;
  }

  // ── F: scans and joins ───────────────────────────────────────────

  private buildJoins(): QueryNode {
    const scans: ScanNode[] = this.spec.relations.map((binding) => ({
      kind: 'scan',
      id: this.nextId('scan'),
      relation: binding.relation,
      alias: binding.alias,
    }));

    const [first, ...rest] = scans;
    if (!first) {
      throw new BuildError('F declares no relation to scan', 'F');
    }

    let node: QueryNode = first;
    rest.forEach((scan, offset) => {
      const index = offset + 1;
      const conditions = this.joinConditions(scan, index);
      if (conditions.length === 0) {
        const earlier = scans.slice(0, index).map((s) => s.alias).join(', ');
        throw new BuildError(
          `relation '${scan.alias}' shares no attribute name with ${earlier}; cross products are not supported`,
          scan.alias,
        );
      }
      node = { kind: 'join', id: this.nextId('join'), left: node, right: scan, conditions };
    });
    return node;
  }

  /** Natural-join conditions pairing each attribute of `scan` with its first earlier declaration */
  private joinConditions(scan: ScanNode, index: number): JoinCondition[] {
    const conditions: JoinCondition[] = [];

    for (const attribute of this.scope.attributesOf(scan.alias)) {
      const earlier = this.scope
        .declarationsOf(attribute.name)
        .find((d) => this.scope.aliasIndex(d.alias) < index);
      if (!earlier) continue;

      if (!areComparableTypes(earlier.type, attribute.type)) {
        throw new BuildError(
          `join key '${attribute.name}' is ${earlier.type} in '${earlier.alias}' but ${attribute.type} in '${scan.alias}'`,
          `${scan.alias}.${attribute.name}`,
        );
      }
      conditions.push({ left: toColumn(earlier), right: toColumn(attribute) });
    }
    return conditions;
  }

  // ── References ───────────────────────────────────────────────────

  private resolveRef(ref: AttributeRef, clause: string): ColumnRef {
    const resolution = this.scope.resolve(ref);
    if (!resolution.ok) {
      throw new BuildError(`${clause}: ${resolution.message}`, formatRef(ref));
    }
    return toColumn(resolution.attribute);
  }

  private resolveAggregate(call: AggregateCall, clause: string): AggregateExpr {
    const argument = call.argument === null ? null : this.resolveRef(call.argument, clause);
    return this.registerAggregate(call.func, argument);
  }

  /** Intern an aggregate so equal calls share one entry on the group node */
  private registerAggregate(func: AggregateCall['func'], argument: ColumnRef | null): AggregateExpr {
    const expr: AggregateExpr = { kind: 'aggregate', func, argument, type: aggregateType(func, argument) };
    const key = aggregateKey(expr);
    const existing = this.aggregates.get(key);
    if (existing) return existing;
    this.aggregates.set(key, expr);
    return expr;
  }

  private resolvePredicate(predicate: Predicate, clause: string): TreePredicate {
    switch (predicate.kind) {
      case 'and':
      case 'or':
        return { kind: predicate.kind, operands: predicate.operands.map((p) => this.resolvePredicate(p, clause)) };
      case 'not':
        return { kind: 'not', operand: this.resolvePredicate(predicate.operand, clause) };
      case 'comparison': {
        const resolveOperand = (operand: Operand): TreeOperand => {
          switch (operand.kind) {
            case 'literal': return operand;
            case 'attribute': return this.resolveRef(operand, clause);
            case 'aggregate': return this.resolveAggregate(operand, clause);
          }
        };
        return { kind: 'comparison', op: predicate.op, left: resolveOperand(predicate.left), right: resolveOperand(predicate.right) };
      }
    }
  }

  // ── V: projection ────────────────────────────────────────────────

  private explicitColumns(keys: readonly ColumnRef[] | undefined): ProjectionColumn[] {
    return this.spec.outputs.map((item) => this.outputColumn(item, keys));
  }

  private outputColumn(item: OutputItem, keys: readonly ColumnRef[] | undefined): ProjectionColumn {
    const expression = item.expression;

    if (expression.kind === 'aggregate') {
      const aggregate = this.resolveAggregate(expression, 'V');
      return { name: item.alias ?? aggregateName(aggregate), expression: aggregate };
    }

    const column = this.resolveRef(expression, 'V');
    if (keys && !keys.some((k) => sameColumn(k, column))) {
      throw new BuildError(
        `V: '${formatRef(expression)}' is neither a grouping key nor aggregated`,
        formatRef(expression),
      );
    }
    return { name: item.alias ?? column.name, expression: column };
  }

  /** Empty V: one column per distinct attribute name of S, in declaration order */
  private defaultColumns(keys: readonly ColumnRef[] | undefined): ProjectionColumn[] {
    const columns: ProjectionColumn[] = [];
    const seen = new Set<string>();

    for (const attribute of this.scope.allAttributes()) {
      if (seen.has(attribute.name)) continue;
      seen.add(attribute.name);

      const column = this.resolveRef({ kind: 'attribute', name: attribute.name, line: 0, column: 0 }, 'V');
      if (!keys || keys.some((k) => k.name === column.name)) {
        columns.push({ name: column.name, expression: column });
        continue;
      }

      if (!isNumericType(column.type)) {
        throw new BuildError(
          `'${column.name}' is ${column.type}, not a grouping key, and has no default aggregate; list it in G or write V explicitly`,
          formatColumn(column),
        );
      }
      const aggregate = this.registerAggregate(this.defaultAggregate, column);
      columns.push({ name: aggregateName(aggregate), expression: aggregate });
    }
    return columns;
  }

  // ── order ────────────────────────────────────────────────────────

  private sortKeys(columns: readonly ProjectionColumn[], keys: readonly ColumnRef[] | undefined): SortKey[] {
    return this.spec.ordering.map((item) => ({
      expression: this.sortExpression(item, columns, keys),
      direction: item.direction,
    }));
  }

  private sortExpression(
    item: OrderItem,
    columns: readonly ProjectionColumn[],
    keys: readonly ColumnRef[] | undefined,
  ): SortKey['expression'] {
    const expression = item.expression;
    if (expression.kind === 'aggregate') {
      return this.resolveAggregate(expression, 'order');
    }

    const named = this.spec.outputs.find((o) => o.alias === expression.name);
    if (expression.qualifier === undefined && named && columns.some((c) => c.name === expression.name)) {
      return { kind: 'output', name: expression.name };
    }

    const column = this.resolveRef(expression, 'order');
    if (keys && !keys.some((k) => sameColumn(k, column))) {
      throw new BuildError(
        `order: '${formatRef(expression)}' is neither a grouping key nor an output name`,
        formatRef(expression),
      );
    }
    return column;
  }

  private wrapSort(node: QueryNode, keys: readonly SortKey[]): QueryNode {
    if (keys.length === 0) return node;
    return { kind: 'sort', id: this.nextId('sort'), input: node, keys };
  }
}

// ── Helpers ─────────────────────────────────────────────────────────

function toColumn(attribute: { readonly alias: string; readonly name: string; readonly type: AttributeType }): ColumnRef {
  return { kind: 'column', alias: attribute.alias, name: attribute.name, type: attribute.type };
}

function sameColumn(a: ColumnRef, b: ColumnRef): boolean {
  return a.alias === b.alias && a.name === b.name;
}

function aggregateType(func: AggregateCall['func'], argument: ColumnRef | null): AttributeType {
  if (func === 'count') return AttributeType.INTEGER;
  if (func === 'avg') return AttributeType.FLOAT;
  if (argument === null) {
    throw new BuildError(`${func}(*) has no argument to aggregate`, `${func}(*)`);
  }
  return argument.type;
}

/** Output name of an unnamed aggregate: `sum_amount`, or `count` for count(*) */
function aggregateName(expr: AggregateExpr): string {
  return expr.argument ? `${expr.func}_${expr.argument.name}` : expr.func;
}

function checkColumnNames(columns: readonly ProjectionColumn[]): void {
  const seen = new Set<string>();
  for (const column of columns) {
    if (seen.has(column.name)) {
      throw new BuildError(
        `output column '${column.name}' is produced more than once; give one of them an AS name`,
        column.name,
      );
    }
    seen.add(column.name);
  }
}

/** Plain columns in having must be grouping keys */
function checkHavingReferences(predicate: TreePredicate, keys: readonly ColumnRef[]): void {
  switch (predicate.kind) {
    case 'and':
    case 'or':
      for (const operand of predicate.operands) checkHavingReferences(operand, keys);
      return;
    case 'not':
      checkHavingReferences(predicate.operand, keys);
      return;
    case 'comparison':
      for (const operand of [predicate.left, predicate.right]) {
        if (operand.kind === 'column' && !keys.some((k) => sameColumn(k, operand))) {
          throw new BuildError(
            `having: '${formatColumn(operand)}' is neither a grouping key nor inside an aggregate`,
            formatColumn(operand),
          );
        }
      }
      return;
  }
}
