import { TokenType, Token, ParseError } from './types.js';

const KEYWORDS: ReadonlyMap<string, TokenType> = new Map([
  ['and', TokenType.AND],
  ['or', TokenType.OR],
  ['not', TokenType.NOT],
  ['true', TokenType.TRUE],
  ['false', TokenType.FALSE],
  ['null', TokenType.NULL],
  ['all', TokenType.ALL],
  ['sort', TokenType.SORT],
  ['limit', TokenType.LIMIT],
  ['asc', TokenType.ASC],
  ['desc', TokenType.DESC],
]);

const ESCAPES: Readonly<Record<string, string>> = {
  n: '\n',
  r: '\r',
  t: '\t',
};

/**
 * Scanner (lexer) for filter expressions.
 * Turns a source string into a flat token list ending with an EOF token.
 */
export class Scanner {
  private readonly source: string;
  private position: number = 0;
  private tokens: Token[] = [];

  constructor(source: string) {
    this.source = source;
  }

  /**
   * Tokenize the entire source string
   * @throws ParseError on an unexpected character or an unterminated string
   */
  tokenize(): Token[] {
    this.tokens = [];
    this.position = 0;

    while (this.position < this.source.length) {
      this.skipWhitespace();
      if (this.position >= this.source.length) break;
      this.scanToken();
    }

    this.tokens.push({
      type: TokenType.EOF,
      value: '',
      position: this.source.length,
    });

    return [...this.tokens];
  }

  private scanToken(): void {
    const start = this.position;
    const char = this.source[start];

    switch (char) {
      case '(':
        return this.addSymbol(TokenType.LPAREN, start, 1);
      case ')':
        return this.addSymbol(TokenType.RPAREN, start, 1);
      case '.':
        return this.addSymbol(TokenType.DOT, start, 1);
      case ',':
        return this.addSymbol(TokenType.COMMA, start, 1);
      case '|':
        return this.addSymbol(TokenType.PIPE, start, 1);
      case '=':
        if (this.peekAt(1) === '=') return this.addSymbol(TokenType.EQ, start, 2);
        break;
      case '!':
        if (this.peekAt(1) === '=') return this.addSymbol(TokenType.NEQ, start, 2);
        break;
      case '<':
        return this.peekAt(1) === '='
          ? this.addSymbol(TokenType.LTE, start, 2)
          : this.addSymbol(TokenType.LT, start, 1);
      case '>':
        return this.peekAt(1) === '='
          ? this.addSymbol(TokenType.GTE, start, 2)
          : this.addSymbol(TokenType.GT, start, 1);
      case '"':
      case "'":
        return this.scanString(char, start);
    }

    if (isDigit(char)) {
      return this.scanNumber(start);
    }
    if (isIdentifierStart(char)) {
      return this.scanIdentifierOrKeyword(start);
    }

    throw new ParseError('lexical', `Unexpected character '${char}'`, start, this.source);
  }

  /**
   * Skip whitespace characters
   */
  private skipWhitespace(): void {
    while (
      this.position < this.source.length &&
      /\s/.test(this.source[this.position])
    ) {
      this.position++;
    }
  }

  private scanString(quote: string, start: number): void {
    let value = '';
    this.position++;

    while (this.position < this.source.length && this.source[this.position] !== quote) {
      const char = this.source[this.position];

      if (char === '\\' && this.position + 1 < this.source.length) {
        const escaped = this.source[this.position + 1];
        // Unknown escapes keep the escaped character
        value += ESCAPES[escaped] ?? escaped;
        this.position += 2;
        continue;
      }

      value += char;
      this.position++;
    }

    if (this.position >= this.source.length) {
      throw new ParseError('lexical', 'Unterminated string', start, this.source);
    }

    // closing quote
    this.position++;
    this.tokens.push({ type: TokenType.STRING, value, position: start });
  }

  private scanNumber(start: number): void {
    while (this.position < this.source.length && isDigit(this.source[this.position])) {
      this.position++;
    }

    let type = TokenType.INTEGER;
    if (this.source[this.position] === '.' && isDigit(this.peekAt(1))) {
      type = TokenType.DECIMAL;
      this.position++;
      while (this.position < this.source.length && isDigit(this.source[this.position])) {
        this.position++;
      }
    }

    this.tokens.push({
      type,
      value: this.source.substring(start, this.position),
      position: start,
    });
  }

  /**
   * Scan an identifier or keyword token
   */
  private scanIdentifierOrKeyword(start: number): void {
    while (this.position < this.source.length && isIdentifierPart(this.source[this.position])) {
      this.position++;
    }

    const value = this.source.substring(start, this.position);

    // Keywords are case-insensitive
    this.tokens.push({
      type: KEYWORDS.get(value.toLowerCase()) ?? TokenType.IDENT,
      value,
      position: start,
    });
  }

  private addSymbol(type: TokenType, start: number, length: number): void {
    this.position = start + length;
    this.tokens.push({
      type,
      value: this.source.substring(start, this.position),
      position: start,
    });
  }

  private peekAt(offset: number): string {
    return this.source.charAt(this.position + offset);
  }

  /**
   * Get the tokens produced by the last tokenize() call
   */
  getTokens(): Token[] {
    return [...this.tokens];
  }
}

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9';
}

function isIdentifierStart(char: string): boolean {
  return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z') || char === '_';
}

function isIdentifierPart(char: string): boolean {
  return isIdentifierStart(char) || isDigit(char);
}

/**
 * Tokenize a filter source string.
 *
 * @example
 * ```ts
 * tokenize('exif.iso >= 800').map(t => t.type);
 * // [IDENT, DOT, IDENT, GTE, INTEGER, EOF]
 * ```
 */
export function tokenize(source: string): Token[] {
  return new Scanner(source).tokenize();
}
