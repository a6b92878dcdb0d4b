import { SchemaError } from '../core/errors.js';
import { acceptsLiteral, areComparableTypes, isNumericType } from '../core/schema.js';
import {
  AttributeType,
  formatAggregate,
  formatOperand,
  formatRef,
  type AggregateCall,
  type AttributeRef,
  type Diagnostic,
  type Operand,
  type Predicate,
  type QuerySpec,
  type SpecField,
} from '../core/types.js';
import { AttributeScope, type ResolvedAttribute } from './scope.js';

// ── Public API ──────────────────────────────────────────────────────

/**
 * Check every field of the spec and return it unchanged, or throw one
 * SchemaError listing all problems found.
 */
export function validateSpec(spec: QuerySpec): QuerySpec {
  const issues = collectSchemaIssues(spec);
  if (issues.length > 0) {
    throw new SchemaError(issues);
  }
  return spec;
}

/** Every schema problem in the spec, in field order (S, n, F, V, sigma, G, having, order). */
export function collectSchemaIssues(spec: QuerySpec): Diagnostic[] {
  const checker = new SpecChecker(spec);
  checker.checkSchema();
  checker.checkArity();
  checker.checkRelations();
  checker.checkOutputs();
  checker.checkSelection();
  checker.checkGrouping();
  checker.checkHaving();
  checker.checkOrdering();
  return checker.issues;
}

// ── SpecChecker ─────────────────────────────────────────────────────

class SpecChecker {
  readonly issues: Diagnostic[] = [];
  private readonly scope: AttributeScope;

  constructor(private readonly spec: QuerySpec) {
    this.scope = new AttributeScope(spec.schema, spec.relations);
  }

  private report(code: string, field: SpecField, message: string, line?: number): void {
    this.issues.push({ severity: 'error', code, field, message, line: line ?? this.spec.sections[field] });
  }

  private resolve(ref: AttributeRef, field: SpecField): ResolvedAttribute | undefined {
    const resolution = this.scope.resolve(ref);
    if (!resolution.ok) {
      this.report(resolution.code, field, resolution.message, ref.line);
      return undefined;
    }
    return resolution.attribute;
  }

  // ── S ──────────────────────────────────────────────────────────

  checkSchema(): void {
    const seen = new Set<string>();
    const multiple = this.spec.relations.length > 1;

    for (const decl of this.spec.schema) {
      const key = `${decl.qualifier ?? ''}.${decl.name}`;
      const label = decl.qualifier ? `${decl.qualifier}.${decl.name}` : decl.name;
      if (seen.has(key)) {
        this.report('duplicate-attribute', 'S', `attribute '${label}' is declared more than once`, decl.line);
        continue;
      }
      seen.add(key);

      if (decl.qualifier === undefined && multiple) {
        this.report(
          'unresolved-alias',
          'S',
          `attribute '${decl.name}' has no alias but F declares ${this.spec.relations.length} relations; write it as <alias>.${decl.name}`,
          decl.line,
        );
      } else if (decl.qualifier !== undefined && !this.scope.hasAlias(decl.qualifier)) {
        this.report('unknown-alias', 'S', `attribute '${label}' uses alias '${decl.qualifier}', which F does not declare`, decl.line);
      }
    }
  }

  // ── n ──────────────────────────────────────────────────────────

  checkArity(): void {
    if (this.spec.arity !== this.spec.schema.length) {
      this.report(
        'arity-mismatch',
        'n',
        `arity n = ${this.spec.arity} but S declares ${this.spec.schema.length} attribute(s)`,
      );
    }
  }

  // ── F ──────────────────────────────────────────────────────────

  checkRelations(): void {
    const seen = new Set<string>();
    for (const binding of this.spec.relations) {
      if (seen.has(binding.alias)) {
        this.report('duplicate-alias', 'F', `alias '${binding.alias}' is bound more than once`, binding.line);
        continue;
      }
      seen.add(binding.alias);

      if (this.scope.attributesOf(binding.alias).length === 0) {
        this.report(
          'unused-alias',
          'F',
          `alias '${binding.alias}' (${binding.relation}) is not used by any attribute in S`,
          binding.line,
        );
      }
    }
  }

  // ── V ──────────────────────────────────────────────────────────

  checkOutputs(): void {
    const names = new Map<string, string>();

    for (const item of this.spec.outputs) {
      const expression = item.expression;
      let resolvedKey: string | undefined;

      if (expression.kind === 'aggregate') {
        const attribute = this.checkAggregate(expression, 'V');
        resolvedKey = attribute === null
          ? `${expression.func}(*)`
          : attribute && `${expression.func}(${attribute.alias}.${attribute.name})`;
      } else {
        const attribute = this.resolve(expression, 'V');
        resolvedKey = attribute && `${attribute.alias}.${attribute.name}`;
      }

      const label = expression.kind === 'aggregate' ? formatAggregate(expression) : formatRef(expression);
      const key = item.alias !== undefined ? `as ${item.alias}` : resolvedKey;
      if (key === undefined) continue;

      const previous = names.get(key);
      if (previous !== undefined) {
        this.report('duplicate-output', 'V', `'${label}' duplicates output '${previous}'`, item.line);
      } else {
        names.set(key, label);
      }
    }
  }

  /**
   * Resolve an aggregate's argument. Returns null for `count(*)`, the
   * attribute when it resolves, and undefined after reporting an issue.
   */
  private checkAggregate(call: AggregateCall, field: SpecField): ResolvedAttribute | null | undefined {
    if (call.argument === null) return null;

    const attribute = this.resolve(call.argument, field);
    if (attribute && (call.func === 'sum' || call.func === 'avg') && !isNumericType(attribute.type)) {
      this.report(
        'type-mismatch',
        field,
        `${formatAggregate(call)} needs a numeric attribute but '${formatRef(call.argument)}' is ${attribute.type}`,
        call.line,
      );
      return undefined;
    }
    return attribute;
  }

  // ── sigma ──────────────────────────────────────────────────────

  checkSelection(): void {
    this.checkPredicate(this.spec.selection, 'sigma');
  }

  private checkPredicate(predicate: Predicate, field: SpecField): void {
    switch (predicate.kind) {
      case 'and':
      case 'or':
        for (const operand of predicate.operands) this.checkPredicate(operand, field);
        return;
      case 'not':
        this.checkPredicate(predicate.operand, field);
        return;
      case 'comparison': {
        const left = this.operandType(predicate.left, field);
        const right = this.operandType(predicate.right, field);
        this.checkComparisonTypes(predicate.op, predicate.left, left, predicate.right, right, field);
        return;
      }
    }
  }

  /** Type of an operand, or undefined when unresolved or a literal */
  private operandType(operand: Operand, field: SpecField): AttributeType | undefined {
    switch (operand.kind) {
      case 'literal':
        return undefined;
      case 'attribute':
        return this.resolve(operand, field)?.type;
      case 'aggregate': {
        const attribute = this.checkAggregate(operand, field);
        if (operand.func === 'count') return AttributeType.INTEGER;
        if (operand.func === 'avg') return AttributeType.FLOAT;
        return attribute?.type;
      }
    }
  }

  private checkComparisonTypes(
    op: string,
    left: Operand,
    leftType: AttributeType | undefined,
    right: Operand,
    rightType: AttributeType | undefined,
    field: SpecField,
  ): void {
    const line = left.line;
    const text = `${formatOperand(left)} ${op} ${formatOperand(right)}`;

    if (op === 'LIKE' || op === 'ILIKE') {
      const leftOk = left.kind === 'literal' ? typeof left.value === 'string' : leftType === undefined || leftType === AttributeType.TEXT;
      const rightOk = right.kind === 'literal' ? typeof right.value === 'string' : rightType === undefined || rightType === AttributeType.TEXT;
      if (!leftOk || !rightOk) {
        this.report('type-mismatch', field, `'${text}': ${op} needs text operands`, line);
      }
      return;
    }

    if (left.kind === 'literal' && right.kind === 'literal') {
      if (typeof left.value !== typeof right.value) {
        this.report('type-mismatch', field, `'${text}' compares a ${typeof left.value} literal with a ${typeof right.value} literal`, line);
      }
      return;
    }

    if (leftType !== undefined && rightType !== undefined) {
      if (!areComparableTypes(leftType, rightType)) {
        this.report('type-mismatch', field, `'${text}' compares ${leftType} with ${rightType}`, line);
      }
      return;
    }

    if (leftType !== undefined && right.kind === 'literal' && !acceptsLiteral(leftType, right.value)) {
      this.report('type-mismatch', field, `'${text}' compares ${leftType} with a ${typeof right.value} literal`, line);
    } else if (rightType !== undefined && left.kind === 'literal' && !acceptsLiteral(rightType, left.value)) {
      this.report('type-mismatch', field, `'${text}' compares a ${typeof left.value} literal with ${rightType}`, line);
    }
  }

  // ── G ──────────────────────────────────────────────────────────

  checkGrouping(): void {
    const projected = new Set<string>();
    for (const item of this.spec.outputs) {
      if (item.expression.kind !== 'attribute') continue;
      const resolution = this.scope.resolve(item.expression);
      if (resolution.ok) projected.add(`${resolution.attribute.alias}.${resolution.attribute.name}`);
    }

    const seen = new Set<string>();
    for (const key of this.spec.grouping) {
      const attribute = this.resolve(key.attribute, 'G');
      if (!attribute) continue;

      const id = `${attribute.alias}.${attribute.name}`;
      if (seen.has(id)) {
        this.report('duplicate-grouping-key', 'G', `grouping key '${formatRef(key.attribute)}' is listed more than once`, key.line);
        continue;
      }
      seen.add(id);

      if (this.spec.outputs.length > 0 && !key.hidden && !projected.has(id)) {
        this.report(
          'grouping-key-not-projected',
          'G',
          `grouping key '${formatRef(key.attribute)}' is not in V; write '~${formatRef(key.attribute)}' to group without projecting it`,
          key.line,
        );
      }
    }
  }

  // ── having ─────────────────────────────────────────────────────

  checkHaving(): void {
    this.checkPredicate(this.spec.having, 'having');

    const grouped = new Set<string>();
    for (const key of this.spec.grouping) {
      const resolution = this.scope.resolve(key.attribute);
      if (resolution.ok) grouped.add(`${resolution.attribute.alias}.${resolution.attribute.name}`);
    }

    for (const ref of plainReferences(this.spec.having)) {
      const resolution = this.scope.resolve(ref);
      if (!resolution.ok) continue;
      if (!grouped.has(`${resolution.attribute.alias}.${resolution.attribute.name}`)) {
        this.report(
          'ungrouped-having-reference',
          'having',
          `'${formatRef(ref)}' is neither a grouping key nor inside an aggregate`,
          ref.line,
        );
      }
    }
  }

  // ── order ──────────────────────────────────────────────────────

  checkOrdering(): void {
    const outputNames = new Set(
      this.spec.outputs.flatMap((o) => (o.alias !== undefined ? [o.alias] : [])),
    );

    for (const item of this.spec.ordering) {
      const expression = item.expression;
      if (expression.kind === 'aggregate') {
        this.checkAggregate(expression, 'order');
      } else if (expression.qualifier !== undefined || !outputNames.has(expression.name)) {
        this.resolve(expression, 'order');
      }
    }
  }
}

// ── Helpers ─────────────────────────────────────────────────────────

/** Attribute references that appear outside aggregate calls */
function plainReferences(predicate: Predicate): AttributeRef[] {
  switch (predicate.kind) {
    case 'and':
    case 'or':
      return predicate.operands.flatMap(plainReferences);
    case 'not':
      return plainReferences(predicate.operand);
    case 'comparison':
      return [predicate.left, predicate.right].flatMap((o) => (o.kind === 'attribute' ? [o] : []));
  }
}
