import {
  AGGREGATE_FUNCTIONS,
  type AggregateCall,
  type AggregateFunction,
  type AttributeRef,
  type ComparisonOperator,
  type Literal,
  type Operand,
  type Predicate,
} from '../core/types.js';
import { TokenType } from './lexer.js';
import type { TokenStream } from './token-stream.js';

const PREDICATE_KEYWORDS: ReadonlySet<string> = new Set(['AND', 'OR', 'NOT', 'LIKE', 'ILIKE', 'TRUE', 'FALSE']);

const OPERATOR_ALIASES: ReadonlyMap<string, ComparisonOperator> = new Map([
  ['=', '='],
  ['==', '='],
  ['!=', '<>'],
  ['<>', '<>'],
  ['<', '<'],
  ['<=', '<='],
  ['>', '>'],
  ['>=', '>='],
]);

function asAggregateFunction(name: string): AggregateFunction | undefined {
  const lower = name.toLowerCase();
  return AGGREGATE_FUNCTIONS.find((f) => f === lower);
}

// ── Attribute references ─────────────────────────────────────────────

export function parseAttributeRef(stream: TokenStream): AttributeRef {
  const first = stream.expect(TokenType.IDENTIFIER, 'an attribute name');
  if (PREDICATE_KEYWORDS.has(first.value.toUpperCase())) {
    stream.fail(`'${first.value}' is a reserved word, not an attribute`, first);
  }

  if (stream.match(TokenType.DOT)) {
    const name = stream.expect(TokenType.IDENTIFIER, `an attribute name after '${first.value}.'`);
    return { kind: 'attribute', qualifier: first.value, name: name.value, line: first.line, column: first.column };
  }

  return { kind: 'attribute', name: first.value, line: first.line, column: first.column };
}

// ── Aggregate calls ──────────────────────────────────────────────────

export function isAggregateStart(stream: TokenStream): boolean {
  return stream.check(TokenType.IDENTIFIER)
    && stream.check(TokenType.LPAREN, 1)
    && asAggregateFunction(stream.peek().value) !== undefined;
}

export function parseAggregateCall(stream: TokenStream): AggregateCall {
  const nameToken = stream.expect(TokenType.IDENTIFIER, 'an aggregate function');
  const func = asAggregateFunction(nameToken.value);
  if (func === undefined) {
    stream.fail(
      `unknown aggregate '${nameToken.value}' (expected one of ${AGGREGATE_FUNCTIONS.join(', ')})`,
      nameToken,
    );
  }
  stream.expect(TokenType.LPAREN, `'(' after '${nameToken.value}'`);

  let argument: AttributeRef | null;
  const star = stream.match(TokenType.STAR);
  if (star) {
    if (func !== 'count') {
      stream.fail(`'*' is only allowed in count(*), not ${func}(*)`, star);
    }
    argument = null;
  } else {
    argument = parseAttributeRef(stream);
  }

  stream.expect(TokenType.RPAREN, `')' to close ${func}(`);
  return { kind: 'aggregate', func, argument, line: nameToken.line, column: nameToken.column };
}

// ── Operands ─────────────────────────────────────────────────────────

/** A double holds any decimal of up to 15 significant digits exactly. */
const MAX_DECIMAL_DIGITS = 15;

function significantDigits(digits: string): number {
  return digits.replace('.', '').replace(/^0+/, '').replace(/0+$/, '').length;
}

function parseLiteral(stream: TokenStream): Literal | undefined {
  const token = stream.peek();

  if (token.type === TokenType.STRING) {
    stream.next();
    return { kind: 'literal', value: token.value, line: token.line, column: token.column };
  }

  if (token.type === TokenType.NUMBER || (token.type === TokenType.MINUS && stream.check(TokenType.NUMBER, 1))) {
    const negative = stream.match(TokenType.MINUS) !== undefined;
    const digits = stream.next();
    const value = Number(digits.value) * (negative ? -1 : 1);
    if (!digits.value.includes('.') && !Number.isSafeInteger(value)) {
      stream.fail(`integer literal ${digits.value} is out of range`, digits);
    }
    if (digits.value.includes('.') && significantDigits(digits.value) > MAX_DECIMAL_DIGITS) {
      stream.fail(
        `decimal literal ${digits.value} has more than ${MAX_DECIMAL_DIGITS} significant digits and cannot be bound exactly`,
        digits,
      );
    }
    return { kind: 'literal', value, line: token.line, column: token.column };
  }

  if (stream.checkKeyword('TRUE') || stream.checkKeyword('FALSE')) {
    stream.next();
    return { kind: 'literal', value: token.value.toUpperCase() === 'TRUE', line: token.line, column: token.column };
  }

  return undefined;
}

function parseOperand(stream: TokenStream, allowAggregates: boolean): Operand {
  const literal = parseLiteral(stream);
  if (literal) return literal;

  if (isAggregateStart(stream)) {
    if (!allowAggregates) {
      stream.fail(`aggregate '${stream.peek().value}(...)' is not allowed in ${stream.field}; use having:`);
    }
    return parseAggregateCall(stream);
  }

  return parseAttributeRef(stream);
}

// ── Predicates ───────────────────────────────────────────────────────

export interface PredicateOptions {
  /** Whether aggregate calls may appear as operands (having only) */
  readonly allowAggregates: boolean;
}

/**
 * Parse a boolean expression. Precedence from loosest to tightest:
 * OR, AND, NOT, comparison.
 */
export function parsePredicate(stream: TokenStream, options: PredicateOptions): Predicate {
  return parseOr(stream, options);
}

function parseOr(stream: TokenStream, options: PredicateOptions): Predicate {
  const operands = [parseAnd(stream, options)];
  while (stream.matchKeyword('OR')) {
    operands.push(parseAnd(stream, options));
  }
  return operands.length === 1 ? operands[0] : { kind: 'or', operands };
}

function parseAnd(stream: TokenStream, options: PredicateOptions): Predicate {
  const operands = [parseNot(stream, options)];
  while (stream.matchKeyword('AND')) {
    operands.push(parseNot(stream, options));
  }
  return operands.length === 1 ? operands[0] : { kind: 'and', operands };
}

function parseNot(stream: TokenStream, options: PredicateOptions): Predicate {
  if (stream.matchKeyword('NOT')) {
    return { kind: 'not', operand: parseNot(stream, options) };
  }
  return parsePrimary(stream, options);
}

function parsePrimary(stream: TokenStream, options: PredicateOptions): Predicate {
  if (stream.match(TokenType.LPAREN)) {
    const inner = parseOr(stream, options);
    stream.expect(TokenType.RPAREN, "')'");
    return inner;
  }
  return parseComparison(stream, options);
}

function parseComparison(stream: TokenStream, options: PredicateOptions): Predicate {
  const left = parseOperand(stream, options.allowAggregates);
  const token = stream.peek();

  let op: ComparisonOperator | undefined;
  if (token.type === TokenType.OPERATOR) {
    op = OPERATOR_ALIASES.get(token.value);
  } else if (stream.checkKeyword('LIKE')) {
    op = 'LIKE';
  } else if (stream.checkKeyword('ILIKE')) {
    op = 'ILIKE';
  }

  if (op === undefined) {
    stream.fail(`expected a comparison operator after operand but found '${token.value || 'end of section'}'`, token);
  }
  stream.next();

  const right = parseOperand(stream, options.allowAggregates);
  return { kind: 'comparison', op, left, right };
}
