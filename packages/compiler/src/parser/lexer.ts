import { ParseError } from '../core/errors.js';
import type { SpecField } from '../core/types.js';

// ── Tokens ───────────────────────────────────────────────────────────

export enum TokenType {
  IDENTIFIER = 'IDENTIFIER',
  NUMBER = 'NUMBER',
  STRING = 'STRING',
  OPERATOR = 'OPERATOR',
  COMMA = 'COMMA',
  DOT = 'DOT',
  COLON = 'COLON',
  LPAREN = 'LPAREN',
  RPAREN = 'RPAREN',
  STAR = 'STAR',
  MINUS = 'MINUS',
  TILDE = 'TILDE',
  EOF = 'EOF',
}

export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly line: number;
  readonly column: number;
}

/** One physical line of a section body */
export interface SourceLine {
  readonly text: string;
  readonly line: number;
  /** 1-based column of `text[0]` in the original line */
  readonly column: number;
}

const OPERATORS = ['<=', '>=', '<>', '!=', '==', '=', '<', '>'];

const SINGLE_CHAR_TOKENS: ReadonlyMap<string, TokenType> = new Map([
  [',', TokenType.COMMA],
  ['.', TokenType.DOT],
  [':', TokenType.COLON],
  ['(', TokenType.LPAREN],
  [')', TokenType.RPAREN],
  ['*', TokenType.STAR],
  ['-', TokenType.MINUS],
  ['~', TokenType.TILDE],
]);

// ── Lexer ────────────────────────────────────────────────────────────

export class Lexer {
  private position = 0;

  constructor(
    private readonly source: SourceLine,
    private readonly field: SpecField,
  ) {}

  private peek(offset = 0): string | undefined {
    return this.source.text[this.position + offset];
  }

  private token(type: TokenType, value: string, start: number): Token {
    return { type, value, line: this.source.line, column: this.source.column + start };
  }

  private fail(message: string, start: number): never {
    throw new ParseError(message, {
      field: this.field,
      line: this.source.line,
      column: this.source.column + start,
    });
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];
    const text = this.source.text;

    while (this.position < text.length) {
      const char = text[this.position];
      const start = this.position;

      if (/\s/.test(char)) {
        this.position++;
        continue;
      }

      if (/[A-Za-z_]/.test(char)) {
        while (this.position < text.length && /[A-Za-z0-9_]/.test(text[this.position])) {
          this.position++;
        }
        tokens.push(this.token(TokenType.IDENTIFIER, text.slice(start, this.position), start));
        continue;
      }

      if (/[0-9]/.test(char)) {
        tokens.push(this.readNumber(start));
        continue;
      }

      if (char === "'") {
        tokens.push(this.readString(start));
        continue;
      }

      const operator = OPERATORS.find((op) => text.startsWith(op, this.position));
      if (operator) {
        this.position += operator.length;
        tokens.push(this.token(TokenType.OPERATOR, operator, start));
        continue;
      }

      const single = SINGLE_CHAR_TOKENS.get(char);
      if (single) {
        this.position++;
        tokens.push(this.token(single, char, start));
        continue;
      }

      this.fail(`unexpected character '${char}'`, start);
    }

    return tokens;
  }

  private readNumber(start: number): Token {
    const text = this.source.text;
    while (/[0-9]/.test(this.peek() ?? '')) this.position++;
    if (this.peek() === '.' && /[0-9]/.test(this.peek(1) ?? '')) {
      this.position++;
      while (/[0-9]/.test(this.peek() ?? '')) this.position++;
    }
    if (/[A-Za-z_]/.test(this.peek() ?? '')) {
      this.fail(`malformed number '${text.slice(start, this.position + 1)}'`, start);
    }
    return this.token(TokenType.NUMBER, text.slice(start, this.position), start);
  }

  private readString(start: number): Token {
    let value = '';
    this.position++;

    for (;;) {
      const char = this.peek();
      if (char === undefined) {
        this.fail('unterminated string literal', start);
      }
      if (char === "'") {
        if (this.peek(1) === "'") {
          value += "'";
          this.position += 2;
          continue;
        }
        this.position++;
        return this.token(TokenType.STRING, value, start);
      }
      value += char;
      this.position++;
    }
  }
}

/** Tokenize every line of a section body and terminate the stream with EOF. */
export function tokenizeLines(lines: readonly SourceLine[], field: SpecField, headerLine: number): Token[] {
  const tokens: Token[] = [];
  for (const line of lines) {
    tokens.push(...new Lexer(line, field).tokenize());
  }
  const last = lines[lines.length - 1];
  tokens.push({
    type: TokenType.EOF,
    value: '',
    line: last?.line ?? headerLine,
    column: last ? last.column + last.text.length : 1,
  });
  return tokens;
}
