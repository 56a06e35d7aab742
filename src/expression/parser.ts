import {
  TokenType,
  Token,
  ParseError,
  describeToken,
  BinaryOperator,
  FilterNode,
  FilterQuery,
  SortClause,
  SortDirection,
  CallNode,
  PropertyNode,
} from './types.js';
import { tokenize } from './scanner.js';

const COMPARISON_OPERATORS: ReadonlyMap<TokenType, BinaryOperator> = new Map([
  [TokenType.EQ, 'Equal'],
  [TokenType.NEQ, 'NotEqual'],
  [TokenType.LT, 'LessThan'],
  [TokenType.LTE, 'LessOrEqual'],
  [TokenType.GT, 'GreaterThan'],
  [TokenType.GTE, 'GreaterOrEqual'],
]);

/**
 * Deepest tree the parser builds; parentheses, calls, `not` and each
 * `and`/`or` operand in a chain count one level
 */
export const MAX_NESTING_DEPTH = 256;

/**
 * Recursive descent parser for filter queries.
 *
 * Grammar:
 *   query        := ( 'all' | or_expr ) sort_clause? limit_clause? EOF
 *   sort_clause  := '|' 'sort' property ( 'asc' | 'desc' )?
 *   limit_clause := '|' 'limit' INTEGER
 *   or_expr      := and_expr ( 'or' and_expr )*
 *   and_expr     := unary ( 'and' unary )*
 *   unary        := 'not' unary | comparison
 *   comparison   := primary ( cmp_op primary )?
 *   primary      := literal | '(' or_expr ')' | IDENT ( '(' args? ')' | ( '.' IDENT )* )
 *   args         := or_expr ( ',' or_expr )*
 *
 * Precedence (highest to lowest):
 *   1. comparison (==, !=, <, <=, >, >=), never chained
 *   2. not (unary)
 *   3. and (binary, left-associative)
 *   4. or (binary, left-associative)
 */
export class Parser {
  private readonly tokens: readonly Token[];
  private readonly source: string;
  private current: number = 0;
  private depth: number = 0;

  /**
   * @param tokens - Scanner output, terminated by an EOF token
   * @param source - The original source, kept for diagnostics
   */
  constructor(tokens: readonly Token[], source: string) {
    if (tokens.length === 0 || tokens[tokens.length - 1].type !== TokenType.EOF) {
      throw new Error('Token list must end with an EOF token');
    }
    this.tokens = tokens;
    this.source = source;
  }

  /**
   * Parse the tokens into a query.
   * @throws ParseError on any malformed input
   */
  parse(): FilterQuery {
    this.current = 0;
    this.depth = 0;

    if (this.isAtEnd()) {
      throw this.error('Empty filter expression', 0);
    }

    const predicate = this.match(TokenType.ALL) ? null : this.parseOrExpr();
    const sort = this.parseSortClause();
    const limit = this.parseLimitClause();

    // Ensure we consumed all tokens
    if (!this.isAtEnd()) {
      const token = this.peek();
      throw this.error(`Unexpected token '${describeToken(token)}'`, token.position);
    }

    return { predicate, sort, limit };
  }

  private parseSortClause(): SortClause | null {
    if (!this.check(TokenType.PIPE) || this.peekNext().type !== TokenType.SORT) {
      return null;
    }
    this.advance();
    const sortToken = this.advance();

    if (!this.check(TokenType.IDENT)) {
      throw this.error("Expected property name after 'sort'", this.peek().position);
    }
    const path = this.parsePropertyPath(this.advance()).path;

    let direction: SortDirection = 'asc';
    if (this.match(TokenType.DESC)) {
      direction = 'desc';
    } else {
      this.match(TokenType.ASC);
    }

    return { path, direction, position: sortToken.position };
  }

  private parseLimitClause(): number | null {
    if (!this.match(TokenType.PIPE)) {
      return null;
    }

    if (!this.match(TokenType.LIMIT)) {
      throw this.error("Expected 'sort' or 'limit' after '|'", this.peek().position);
    }

    if (!this.check(TokenType.INTEGER)) {
      throw this.error("Expected number after 'limit'", this.peek().position);
    }

    const token = this.advance();
    const limit = Number(token.value);

    if (limit <= 0) {
      throw this.error('Limit must be a positive number', token.position);
    }
    if (!Number.isSafeInteger(limit)) {
      throw this.error(`Limit ${token.value} is too large`, token.position);
    }

    return limit;
  }

  /**
   * Parse OR expression (lowest precedence)
   */
  private parseOrExpr(): FilterNode {
    const depth = this.depth;
    let left = this.parseAndExpr();

    while (this.match(TokenType.OR)) {
      const op = this.previous();
      this.enter(op.position);
      const right = this.parseAndExpr();
      left = { type: 'Binary', operator: 'Or', left, right, position: op.position };
    }

    this.depth = depth;
    return left;
  }

  private parseAndExpr(): FilterNode {
    const depth = this.depth;
    let left = this.parseUnary();

    while (this.match(TokenType.AND)) {
      const op = this.previous();
      this.enter(op.position);
      const right = this.parseUnary();
      left = { type: 'Binary', operator: 'And', left, right, position: op.position };
    }

    this.depth = depth;
    return left;
  }

  private parseUnary(): FilterNode {
    if (this.match(TokenType.NOT)) {
      const op = this.previous();
      this.enter(op.position);
      const operand = this.parseUnary();
      this.depth--;
      return { type: 'Unary', operator: 'Not', operand, position: op.position };
    }

    return this.parseComparison();
  }

  /**
   * A single comparison; `a < b < c` leaves the second operator unconsumed
   */
  private parseComparison(): FilterNode {
    const left = this.parsePrimary();
    const operator = COMPARISON_OPERATORS.get(this.peek().type);

    if (operator === undefined) {
      return left;
    }

    const op = this.advance();
    const right = this.parsePrimary();
    return { type: 'Binary', operator, left, right, position: op.position };
  }

  private parsePrimary(): FilterNode {
    const token = this.peek();

    switch (token.type) {
      case TokenType.LPAREN: {
        this.advance();
        this.enter(token.position);
        const expr = this.parseOrExpr();
        this.consume(TokenType.RPAREN, "Expected ')' after expression");
        this.depth--;
        return expr;
      }

      case TokenType.STRING:
        this.advance();
        return { type: 'Constant', kind: 'string', value: token.value, position: token.position };

      case TokenType.INTEGER: {
        this.advance();
        const value = Number(token.value);
        if (!Number.isSafeInteger(value)) {
          throw this.error(`Integer ${token.value} is too large`, token.position);
        }
        return { type: 'Constant', kind: 'integer', value, position: token.position };
      }

      case TokenType.DECIMAL:
        this.advance();
        return {
          type: 'Constant',
          kind: 'decimal',
          value: Number(token.value),
          position: token.position,
        };

      case TokenType.TRUE:
      case TokenType.FALSE:
        this.advance();
        return {
          type: 'Constant',
          kind: 'boolean',
          value: token.type === TokenType.TRUE,
          position: token.position,
        };

      case TokenType.NULL:
        this.advance();
        return { type: 'Constant', kind: 'null', value: null, position: token.position };

      case TokenType.IDENT:
        this.advance();
        if (this.match(TokenType.LPAREN)) {
          return this.parseCall(token);
        }
        return this.parsePropertyPath(token);

      default:
        throw this.error(`Expected expression, got '${describeToken(token)}'`, token.position);
    }
  }

  private parseCall(name: Token): CallNode {
    const args: FilterNode[] = [];
    this.enter(name.position);

    if (!this.check(TokenType.RPAREN)) {
      do {
        args.push(this.parseOrExpr());
      } while (this.match(TokenType.COMMA));
    }

    this.consume(TokenType.RPAREN, `Expected ')' after arguments to '${name.value}'`);
    this.depth--;

    return { type: 'Call', name: name.value, args, position: name.position };
  }

  private parsePropertyPath(first: Token): PropertyNode {
    const path = [first.value];

    while (this.match(TokenType.DOT)) {
      path.push(this.consume(TokenType.IDENT, "Expected property name after '.'").value);
    }

    return { type: 'Property', path, position: first.position };
  }

  /**
   * Go one level deeper; the caller restores `depth` once the nested part is parsed
   */
  private enter(position: number): void {
    if (this.depth >= MAX_NESTING_DEPTH) {
      throw this.error('Expression nested too deeply', position);
    }
    this.depth++;
  }

  private peek(): Token {
    return this.tokens[this.current];
  }

  private peekNext(): Token {
    return this.tokens[Math.min(this.current + 1, this.tokens.length - 1)];
  }

  private previous(): Token {
    return this.tokens[this.current - 1];
  }

  /**
   * Consume and return the current token; EOF is never consumed
   */
  private advance(): Token {
    const token = this.tokens[this.current];
    if (token.type !== TokenType.EOF) {
      this.current++;
    }
    return token;
  }

  private isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  private check(type: TokenType): boolean {
    return this.peek().type === type;
  }

  private match(type: TokenType): boolean {
    if (this.check(type)) {
      this.advance();
      return true;
    }
    return false;
  }

  private consume(type: TokenType, message: string): Token {
    if (this.check(type)) {
      return this.advance();
    }
    throw this.error(message, this.peek().position);
  }

  private error(message: string, position: number): ParseError {
    return new ParseError('syntax', message, position, this.source);
  }
}

/**
 * Scan and parse a filter source string.
 *
 * @example
 * ```ts
 * const query = parse('all | sort dateTaken desc | limit 5');
 * query.predicate; // null
 * query.sort;      // { path: ['dateTaken'], direction: 'desc', position: 6 }
 * query.limit;     // 5
 * ```
 */
export function parse(source: string): FilterQuery {
  return new Parser(tokenize(source), source).parse();
}
