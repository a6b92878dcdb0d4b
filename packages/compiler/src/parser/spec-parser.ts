/**
 * Spec Parser — reads the sectioned text format into a QuerySpec.
 *
 * Flow: text → RawSection[] (sections.ts) → tokens per section (lexer.ts)
 *       → SpecSection AST → QuerySpec
 */
import { ParseError } from '../core/errors.js';
import { acceptsTypeParameters, knownTypeNames, resolveAttributeType } from '../core/schema.js';
import {
  ALWAYS_TRUE,
  formatAggregate,
  formatRef,
  type AttributeDecl,
  type Diagnostic,
  type GroupingKey,
  type OrderItem,
  type OutputItem,
  type QuerySpec,
  type RelationBinding,
  type SortDirection,
  type SpecField,
} from '../core/types.js';
import type {
  SpecDocument,
  SpecSection,
  SchemaSection,
  AritySection,
  OutputSection,
  RangeSection,
  SelectionSection,
  GroupingSection,
  HavingSection,
  OrderSection,
  LimitSection,
} from './ast.js';
import { splitSections, type RawSection } from './sections.js';
import { tokenizeLines, TokenType } from './lexer.js';
import { TokenStream } from './token-stream.js';
import {
  isAggregateStart,
  parseAggregateCall,
  parseAttributeRef,
  parsePredicate,
} from './expressions.js';

// ── Public API ──────────────────────────────────────────────────────

/** Parse specification text into its section AST. */
export function parseDocument(source: string): SpecDocument {
  const sections = splitSections(source).map(parseSection);
  return { sections };
}

/** Parse specification text into an immutable QuerySpec. */
export function parseSpec(source: string): QuerySpec {
  return assembleSpec(parseDocument(source));
}

// ── Section dispatch ────────────────────────────────────────────────

function parseSection(raw: RawSection): SpecSection {
  const stream = new TokenStream(tokenizeLines(raw.body, raw.field, raw.line), raw.field);

  switch (raw.field) {
    case 'S': return parseSchemaSection(stream, raw.line);
    case 'n': return parseAritySection(stream, raw.line);
    case 'V': return parseOutputSection(stream, raw.line);
    case 'F': return parseRangeSection(stream, raw.line);
    case 'sigma': return parseSelectionSection(stream, raw.line);
    case 'G': return parseGroupingSection(stream, raw.line);
    case 'having': return parseHavingSection(stream, raw.line);
    case 'order': return parseOrderSection(stream, raw.line);
    case 'limit': return parseLimitSection(stream, raw.line);
  }
}

// ── S ────────────────────────────────────────────────────────────────

function parseSchemaSection(stream: TokenStream, line: number): SchemaSection {
  const attributes: AttributeDecl[] = [];

  while (!stream.atEnd()) {
    const ref = parseAttributeRef(stream);
    stream.expect(TokenType.COLON, `':' and a type after attribute '${formatRef(ref)}'`);

    const typeToken = stream.expect(TokenType.IDENTIFIER, `a type for attribute '${formatRef(ref)}'`);
    const type = resolveAttributeType(typeToken.value);
    if (type === undefined) {
      stream.fail(
        `unknown type '${typeToken.value}' for attribute '${formatRef(ref)}' (known: ${knownTypeNames().join(', ')})`,
        typeToken,
      );
    }

    let declaredType = typeToken.value.toLowerCase();
    if (stream.check(TokenType.LPAREN)) {
      if (!acceptsTypeParameters(typeToken.value)) {
        stream.fail(`type '${typeToken.value}' takes no parameters`);
      }
      stream.next();
      const params = [stream.expect(TokenType.NUMBER, 'a type parameter').value];
      if (stream.match(TokenType.COMMA)) {
        params.push(stream.expect(TokenType.NUMBER, 'a type parameter').value);
      }
      stream.expect(TokenType.RPAREN, "')' after type parameters");
      declaredType = `${declaredType}(${params.join(',')})`;
    }

    attributes.push({
      qualifier: ref.qualifier,
      name: ref.name,
      type,
      declaredType,
      line: ref.line,
      column: ref.column,
    });
    stream.skipComma();
  }

  return { field: 'S', line, attributes };
}

// ── n ────────────────────────────────────────────────────────────────

function parseAritySection(stream: TokenStream, line: number): AritySection {
  const token = stream.peek();
  if (token.type !== TokenType.NUMBER || token.value.includes('.')) {
    stream.fail(`arity must be a non-negative integer, found ${token.type === TokenType.EOF ? 'nothing' : `'${token.value}'`}`);
  }
  stream.next();
  stream.expectEnd();
  return { field: 'n', line, arity: Number(token.value) };
}

// ── V ────────────────────────────────────────────────────────────────

function parseOutputSection(stream: TokenStream, line: number): OutputSection {
  const outputs: OutputItem[] = [];

  while (!stream.atEnd()) {
    const start = stream.peek();
    const expression = isAggregateStart(stream) ? parseAggregateCall(stream) : parseAttributeRef(stream);

    let alias: string | undefined;
    if (stream.matchKeyword('AS')) {
      alias = stream.expect(TokenType.IDENTIFIER, "an output name after 'AS'").value;
    }

    outputs.push({ expression, alias, line: start.line, column: start.column });
    stream.skipComma();
  }

  return { field: 'V', line, outputs };
}

// ── F ────────────────────────────────────────────────────────────────

function parseRangeSection(stream: TokenStream, line: number): RangeSection {
  const relations: RelationBinding[] = [];

  while (!stream.atEnd()) {
    const relation = stream.expect(TokenType.IDENTIFIER, 'a relation name');

    let alias = relation.value;
    if (stream.matchKeyword('AS')) {
      alias = stream.expect(TokenType.IDENTIFIER, "an alias after 'AS'").value;
    } else if (stream.check(TokenType.IDENTIFIER)) {
      alias = stream.next().value;
    }

    relations.push({ relation: relation.value, alias, line: relation.line, column: relation.column });
    // Commas are mandatory here: `sales s` already means relation + alias
    if (!stream.atEnd()) {
      stream.expect(TokenType.COMMA, "',' between relations");
    }
  }

  if (relations.length === 0) {
    stream.fail('at least one relation is required');
  }

  return { field: 'F', line, relations };
}

// ── sigma / having ───────────────────────────────────────────────────

function parseSelectionSection(stream: TokenStream, line: number): SelectionSection {
  if (stream.atEnd()) {
    return { field: 'sigma', line, predicate: ALWAYS_TRUE };
  }
  const predicate = parsePredicate(stream, { allowAggregates: false });
  stream.expectEnd();
  return { field: 'sigma', line, predicate };
}

function parseHavingSection(stream: TokenStream, line: number): HavingSection {
  if (stream.atEnd()) {
    return { field: 'having', line, predicate: ALWAYS_TRUE };
  }
  const predicate = parsePredicate(stream, { allowAggregates: true });
  stream.expectEnd();
  return { field: 'having', line, predicate };
}

// ── G ────────────────────────────────────────────────────────────────

function parseGroupingSection(stream: TokenStream, line: number): GroupingSection {
  const keys: GroupingKey[] = [];

  while (!stream.atEnd()) {
    const tilde = stream.match(TokenType.TILDE);
    const attribute = parseAttributeRef(stream);
    keys.push({
      attribute,
      hidden: tilde !== undefined,
      line: tilde?.line ?? attribute.line,
      column: tilde?.column ?? attribute.column,
    });
    stream.skipComma();
  }

  return { field: 'G', line, keys };
}

// ── order / limit ────────────────────────────────────────────────────

function parseOrderSection(stream: TokenStream, line: number): OrderSection {
  const items: OrderItem[] = [];

  while (!stream.atEnd()) {
    const start = stream.peek();
    const expression = isAggregateStart(stream) ? parseAggregateCall(stream) : parseAttributeRef(stream);

    let direction: SortDirection = 'ASC';
    if (stream.matchKeyword('DESC')) {
      direction = 'DESC';
    } else {
      stream.matchKeyword('ASC');
    }

    items.push({ expression, direction, line: start.line, column: start.column });
    stream.skipComma();
  }

  return { field: 'order', line, items };
}

function parseLimitSection(stream: TokenStream, line: number): LimitSection {
  const token = stream.peek();
  if (token.type !== TokenType.NUMBER || token.value.includes('.') || !Number.isSafeInteger(Number(token.value))) {
    stream.fail('limit must be a non-negative integer');
  }
  stream.next();
  stream.expectEnd();
  return { field: 'limit', line, count: Number(token.value) };
}

// ── Assembly ─────────────────────────────────────────────────────────

function assembleSpec(document: SpecDocument): QuerySpec {
  const sections: Partial<Record<SpecField, number>> = {};
  const warnings: Diagnostic[] = [];

  let schema: readonly AttributeDecl[] = [];
  let arity: number | undefined;
  let outputs: readonly OutputItem[] = [];
  let relations: readonly RelationBinding[] = [];
  let selection: QuerySpec['selection'] = ALWAYS_TRUE;
  let grouping: readonly GroupingKey[] = [];
  let having: QuerySpec['having'] = ALWAYS_TRUE;
  let ordering: readonly OrderItem[] = [];
  let limit: number | undefined;

  for (const section of document.sections) {
    sections[section.field] = section.line;
    switch (section.field) {
      case 'S': schema = section.attributes; break;
      case 'n': arity = section.arity; break;
      case 'V': outputs = dedupeOutputs(section.outputs, warnings); break;
      case 'F': relations = section.relations; break;
      case 'sigma': selection = section.predicate; break;
      case 'G': grouping = section.keys; break;
      case 'having': having = section.predicate; break;
      case 'order': ordering = section.items; break;
      case 'limit': limit = section.count; break;
    }
  }

  if (arity === undefined) {
    throw new ParseError("missing section 'n:'", { field: 'n' });
  }

  return deepFreeze({
    schema,
    arity,
    outputs,
    relations,
    selection,
    grouping,
    having,
    ordering,
    ...(limit !== undefined ? { limit } : {}),
    sections,
    warnings,
  });
}

/** Drop textual repeats in V, keeping the first occurrence. */
function dedupeOutputs(outputs: readonly OutputItem[], warnings: Diagnostic[]): OutputItem[] {
  const seen = new Set<string>();
  const result: OutputItem[] = [];

  for (const item of outputs) {
    const expr = item.expression.kind === 'aggregate'
      ? formatAggregate(item.expression)
      : formatRef(item.expression);
    const key = `${expr} as ${item.alias ?? ''}`;
    if (seen.has(key)) {
      warnings.push({
        severity: 'warning',
        code: 'duplicate-output',
        message: `'${expr}' is listed more than once; keeping the first occurrence`,
        field: 'V',
        line: item.line,
      });
      continue;
    }
    seen.add(key);
    result.push(item);
  }

  return result;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
