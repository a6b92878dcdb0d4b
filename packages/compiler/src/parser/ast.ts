import type {
  AttributeDecl,
  GroupingKey,
  OrderItem,
  OutputItem,
  Predicate,
  RelationBinding,
} from '../core/types.js';

// ── Section AST ──────────────────────────────────────────────────────
// One tagged variant per section kind; `parseDocument` yields these in
// source order before they are assembled into a QuerySpec.

interface SectionBase {
  readonly line: number;
}

export interface SchemaSection extends SectionBase {
  readonly field: 'S';
  readonly attributes: readonly AttributeDecl[];
}

export interface AritySection extends SectionBase {
  readonly field: 'n';
  readonly arity: number;
}

export interface OutputSection extends SectionBase {
  readonly field: 'V';
  readonly outputs: readonly OutputItem[];
}

export interface RangeSection extends SectionBase {
  readonly field: 'F';
  readonly relations: readonly RelationBinding[];
}

export interface SelectionSection extends SectionBase {
  readonly field: 'sigma';
  readonly predicate: Predicate;
}

export interface GroupingSection extends SectionBase {
  readonly field: 'G';
  readonly keys: readonly GroupingKey[];
}

export interface HavingSection extends SectionBase {
  readonly field: 'having';
  readonly predicate: Predicate;
}

export interface OrderSection extends SectionBase {
  readonly field: 'order';
  readonly items: readonly OrderItem[];
}

export interface LimitSection extends SectionBase {
  readonly field: 'limit';
  readonly count: number;
}

export type SpecSection =
  | SchemaSection
  | AritySection
  | OutputSection
  | RangeSection
  | SelectionSection
  | GroupingSection
  | HavingSection
  | OrderSection
  | LimitSection;

export interface SpecDocument {
  readonly sections: readonly SpecSection[];
}
