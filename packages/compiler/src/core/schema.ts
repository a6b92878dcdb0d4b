import { AttributeType, type LiteralValue } from './types.js';

// ── Type name resolution ─────────────────────────────────────────────

const TYPE_ALIASES: ReadonlyMap<string, AttributeType> = new Map([
  ['int', AttributeType.INTEGER],
  ['integer', AttributeType.INTEGER],
  ['smallint', AttributeType.INTEGER],
  ['bigint', AttributeType.INTEGER],
  ['float', AttributeType.FLOAT],
  ['real', AttributeType.FLOAT],
  ['double', AttributeType.FLOAT],
  ['numeric', AttributeType.DECIMAL],
  ['decimal', AttributeType.DECIMAL],
  ['text', AttributeType.TEXT],
  ['string', AttributeType.TEXT],
  ['varchar', AttributeType.TEXT],
  ['char', AttributeType.TEXT],
  ['bool', AttributeType.BOOLEAN],
  ['boolean', AttributeType.BOOLEAN],
  ['date', AttributeType.DATE],
  ['timestamp', AttributeType.TIMESTAMP],
]);

/** Types that accept a parenthesized length or precision, e.g. `varchar(20)` */
const PARAMETERIZED_TYPES: ReadonlySet<string> = new Set(['varchar', 'char', 'numeric', 'decimal']);

export function resolveAttributeType(name: string): AttributeType | undefined {
  return TYPE_ALIASES.get(name.toLowerCase());
}

export function acceptsTypeParameters(name: string): boolean {
  return PARAMETERIZED_TYPES.has(name.toLowerCase());
}

export function knownTypeNames(): string[] {
  return [...TYPE_ALIASES.keys()];
}

// ── Type families ────────────────────────────────────────────────────

const NUMERIC_TYPES: ReadonlySet<AttributeType> = new Set([
  AttributeType.INTEGER,
  AttributeType.FLOAT,
  AttributeType.DECIMAL,
]);

export function isNumericType(type: AttributeType): boolean {
  return NUMERIC_TYPES.has(type);
}

/**
 * Two attribute types can be compared when they are both numeric or
 * identical. Dates and timestamps compare with each other.
 */
export function areComparableTypes(a: AttributeType, b: AttributeType): boolean {
  if (a === b) return true;
  if (isNumericType(a) && isNumericType(b)) return true;
  const temporal = new Set([AttributeType.DATE, AttributeType.TIMESTAMP]);
  return temporal.has(a) && temporal.has(b);
}

/**
 * Whether a literal may be compared with an attribute of the given type.
 * Date and timestamp attributes take string literals, which the store
 * casts on comparison.
 */
export function acceptsLiteral(type: AttributeType, value: LiteralValue): boolean {
  if (typeof value === 'number') return isNumericType(type);
  if (typeof value === 'boolean') return type === AttributeType.BOOLEAN;
  return type === AttributeType.TEXT || type === AttributeType.DATE || type === AttributeType.TIMESTAMP;
}
