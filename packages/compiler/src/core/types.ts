// ── Attribute types ──────────────────────────────────────────────────

export enum AttributeType {
  INTEGER = 'integer',
  FLOAT = 'float',
  DECIMAL = 'decimal',
  TEXT = 'text',
  BOOLEAN = 'boolean',
  DATE = 'date',
  TIMESTAMP = 'timestamp',
}

// ── Source positions ─────────────────────────────────────────────────

export interface SourcePosition {
  readonly line: number;
  readonly column: number;
}

// ── Spec fields ──────────────────────────────────────────────────────

export type SpecField = 'S' | 'n' | 'V' | 'F' | 'sigma' | 'G' | 'having' | 'order' | 'limit';

export const CORE_FIELDS: readonly SpecField[] = ['S', 'n', 'V', 'F', 'sigma', 'G'];
export const OPTIONAL_FIELDS: readonly SpecField[] = ['having', 'order', 'limit'];

// ── S: attribute declarations ────────────────────────────────────────

export interface AttributeDecl extends SourcePosition {
  readonly qualifier?: string;
  readonly name: string;
  readonly type: AttributeType;
  /** Type as written, e.g. `varchar(20)` */
  readonly declaredType: string;
}

// ── References and operands ──────────────────────────────────────────

export interface AttributeRef extends SourcePosition {
  readonly kind: 'attribute';
  readonly qualifier?: string;
  readonly name: string;
}

export type AggregateFunction = 'sum' | 'count' | 'avg' | 'min' | 'max';

export const AGGREGATE_FUNCTIONS: readonly AggregateFunction[] = ['sum', 'count', 'avg', 'min', 'max'];

export interface AggregateCall extends SourcePosition {
  readonly kind: 'aggregate';
  readonly func: AggregateFunction;
  /** `null` stands for `*` and is only valid with `count` */
  readonly argument: AttributeRef | null;
}

export type LiteralValue = string | number | boolean;

export interface Literal extends SourcePosition {
  readonly kind: 'literal';
  readonly value: LiteralValue;
}

export type Operand = AttributeRef | AggregateCall | Literal;

// ── Predicates ───────────────────────────────────────────────────────

export type ComparisonOperator = '=' | '<>' | '<' | '<=' | '>' | '>=' | 'LIKE' | 'ILIKE';

export interface Comparison<O> {
  readonly kind: 'comparison';
  readonly op: ComparisonOperator;
  readonly left: O;
  readonly right: O;
}

export interface And<O> {
  readonly kind: 'and';
  readonly operands: readonly Predicate<O>[];
}

export interface Or<O> {
  readonly kind: 'or';
  readonly operands: readonly Predicate<O>[];
}

export interface Not<O> {
  readonly kind: 'not';
  readonly operand: Predicate<O>;
}

/**
 * Boolean expression tree, generic over its leaf operands so the same
 * shape carries parsed references and, after building, resolved columns.
 */
export type Predicate<O = Operand> = Comparison<O> | And<O> | Or<O> | Not<O>;

export const ALWAYS_TRUE: And<never> = { kind: 'and', operands: [] };

export function isAlwaysTrue<O>(predicate: Predicate<O>): boolean {
  return predicate.kind === 'and' && predicate.operands.length === 0;
}

// ── V, F, G, order ───────────────────────────────────────────────────

export interface OutputItem extends SourcePosition {
  readonly expression: AttributeRef | AggregateCall;
  readonly alias?: string;
}

export interface RelationBinding extends SourcePosition {
  readonly relation: string;
  readonly alias: string;
}

export interface GroupingKey extends SourcePosition {
  readonly attribute: AttributeRef;
  /** Written `~attr`: group by it without projecting it */
  readonly hidden: boolean;
}

export type SortDirection = 'ASC' | 'DESC';

export interface OrderItem extends SourcePosition {
  readonly expression: AttributeRef | AggregateCall;
  readonly direction: SortDirection;
}

// ── Diagnostics ──────────────────────────────────────────────────────

export interface Diagnostic {
  readonly severity: 'error' | 'warning';
  readonly code: string;
  readonly message: string;
  readonly field?: SpecField;
  readonly line?: number;
}

// ── QuerySpec ────────────────────────────────────────────────────────

export interface QuerySpec {
  readonly schema: readonly AttributeDecl[];
  readonly arity: number;
  readonly outputs: readonly OutputItem[];
  readonly relations: readonly RelationBinding[];
  readonly selection: Predicate;
  readonly grouping: readonly GroupingKey[];
  readonly having: Predicate;
  readonly ordering: readonly OrderItem[];
  readonly limit?: number;
  /** Line on which each present section starts */
  readonly sections: Readonly<Partial<Record<SpecField, number>>>;
  readonly warnings: readonly Diagnostic[];
}

// ── Formatting helpers ───────────────────────────────────────────────

export function formatRef(ref: AttributeRef): string {
  return ref.qualifier ? `${ref.qualifier}.${ref.name}` : ref.name;
}

export function formatAggregate(call: AggregateCall): string {
  return `${call.func}(${call.argument ? formatRef(call.argument) : '*'})`;
}

export function formatOperand(operand: Operand): string {
  switch (operand.kind) {
    case 'attribute': return formatRef(operand);
    case 'aggregate': return formatAggregate(operand);
    case 'literal':
      return typeof operand.value === 'string'
        ? `'${operand.value.replace(/'/g, "''")}'`
        : String(operand.value);
  }
}
