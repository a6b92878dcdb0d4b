import { ParseError } from '../core/errors.js';
import type { SpecField } from '../core/types.js';
import { TokenType, type Token } from './lexer.js';

// ── TokenStream ──────────────────────────────────────────────────────

export class TokenStream {
  private index = 0;

  constructor(
    private readonly tokens: readonly Token[],
    readonly field: SpecField,
  ) {}

  peek(offset = 0): Token {
    const token = this.tokens[Math.min(this.index + offset, this.tokens.length - 1)];
    if (!token) {
      throw new ParseError('empty token stream', { field: this.field });
    }
    return token;
  }

  next(): Token {
    const token = this.peek();
    if (token.type !== TokenType.EOF) this.index++;
    return token;
  }

  atEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  check(type: TokenType, offset = 0): boolean {
    return this.peek(offset).type === type;
  }

  /** Case-insensitive keyword test against an identifier token */
  checkKeyword(keyword: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.type === TokenType.IDENTIFIER && token.value.toUpperCase() === keyword;
  }

  match(type: TokenType): Token | undefined {
    return this.check(type) ? this.next() : undefined;
  }

  matchKeyword(keyword: string): Token | undefined {
    return this.checkKeyword(keyword) ? this.next() : undefined;
  }

  expect(type: TokenType, what: string): Token {
    const token = this.peek();
    if (token.type !== type) {
      this.fail(`expected ${what} but found ${describeToken(token)}`, token);
    }
    return this.next();
  }

  /** Skip an optional list separator */
  skipComma(): void {
    this.match(TokenType.COMMA);
  }

  expectEnd(): void {
    const token = this.peek();
    if (token.type !== TokenType.EOF) {
      this.fail(`unexpected ${describeToken(token)}`, token);
    }
  }

  fail(message: string, token: Token = this.peek()): never {
    throw new ParseError(message, { field: this.field, line: token.line, column: token.column });
  }
}

export function describeToken(token: Token): string {
  switch (token.type) {
    case TokenType.EOF: return 'end of section';
    case TokenType.STRING: return `string '${token.value}'`;
    case TokenType.NUMBER: return `number ${token.value}`;
    case TokenType.IDENTIFIER: return `'${token.value}'`;
    default: return `'${token.value}'`;
  }
}
