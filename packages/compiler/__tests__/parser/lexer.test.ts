import { describe, it, expect } from 'vitest';
import { Lexer, TokenType, tokenizeLines } from '../../src/parser/lexer.js';

function lex(text: string, column = 1) {
  return new Lexer({ text, line: 5, column }, 'sigma').tokenize();
}

describe('Lexer', () => {
  it('splits identifiers, operators and literals', () => {
    const tokens = lex("s.amount >= 10.5 and name <> 'x'");

    expect(tokens.map((t) => [t.type, t.value])).toEqual([
      [TokenType.IDENTIFIER, 's'],
      [TokenType.DOT, '.'],
      [TokenType.IDENTIFIER, 'amount'],
      [TokenType.OPERATOR, '>='],
      [TokenType.NUMBER, '10.5'],
      [TokenType.IDENTIFIER, 'and'],
      [TokenType.IDENTIFIER, 'name'],
      [TokenType.OPERATOR, '<>'],
      [TokenType.STRING, 'x'],
    ]);
  });

  it('reports columns relative to the original line', () => {
    const tokens = lex('a = 1', 8);

    expect(tokens.map((t) => t.column)).toEqual([8, 10, 12]);
    expect(tokens.every((t) => t.line === 5)).toBe(true);
  });

  it('prefers two-character operators', () => {
    expect(lex('a<=b!=c==d').map((t) => t.value)).toEqual(['a', '<=', 'b', '!=', 'c', '==', 'd']);
  });

  it('unescapes doubled quotes in strings', () => {
    const [token] = lex("'O''Brien'");
    expect(token).toEqual({ type: TokenType.STRING, value: "O'Brien", line: 5, column: 1 });
  });

  it('keeps a leading minus as its own token', () => {
    expect(lex('-5').map((t) => t.type)).toEqual([TokenType.MINUS, TokenType.NUMBER]);
  });

  it('rejects unknown characters', () => {
    expect(() => lex('a ! b')).toThrow("sigma (line 5, column 3): unexpected character '!'");
  });

  it('rejects numbers running into letters', () => {
    expect(() => lex('12ab')).toThrow("sigma (line 5, column 1): malformed number '12a'");
  });

  it('rejects unterminated strings', () => {
    expect(() => lex("name = 'abc")).toThrow('sigma (line 5, column 8): unterminated string literal');
  });
});

describe('tokenizeLines', () => {
  it('joins lines and ends with EOF after the last character', () => {
    const tokens = tokenizeLines(
      [
        { text: 'a,', line: 1, column: 4 },
        { text: 'b', line: 2, column: 3 },
      ],
      'V',
      1,
    );

    expect(tokens.map((t) => t.type)).toEqual([
      TokenType.IDENTIFIER,
      TokenType.COMMA,
      TokenType.IDENTIFIER,
      TokenType.EOF,
    ]);
    expect(tokens[3]).toEqual({ type: TokenType.EOF, value: '', line: 2, column: 4 });
  });

  it('places EOF of an empty body on the header line', () => {
    expect(tokenizeLines([], 'G', 7)).toEqual([{ type: TokenType.EOF, value: '', line: 7, column: 1 }]);
  });
});
