import type { ImageRecord } from '../types/index.js';

/**
 * Token types for the filter scanner
 */
export enum TokenType {
  EOF = 'EOF',
  IDENT = 'IDENT',
  STRING = 'STRING',
  INTEGER = 'INTEGER',
  DECIMAL = 'DECIMAL',
  DOT = 'DOT',
  LPAREN = 'LPAREN',
  RPAREN = 'RPAREN',
  COMMA = 'COMMA',
  PIPE = 'PIPE',
  EQ = 'EQ',
  NEQ = 'NEQ',
  LT = 'LT',
  LTE = 'LTE',
  GT = 'GT',
  GTE = 'GTE',
  AND = 'AND',
  OR = 'OR',
  NOT = 'NOT',
  TRUE = 'TRUE',
  FALSE = 'FALSE',
  NULL = 'NULL',
  ALL = 'ALL',
  SORT = 'SORT',
  LIMIT = 'LIMIT',
  ASC = 'ASC',
  DESC = 'DESC',
}

/**
 * A token produced by the scanner.
 * For string literals `value` holds the unescaped text.
 */
export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly position: number;
}

/**
 * Render a token the way it appears in error messages
 */
export function describeToken(token: Token): string {
  switch (token.type) {
    case TokenType.EOF:
      return 'end of expression';
    case TokenType.STRING:
      return `'${token.value}'`;
    default:
      return token.value;
  }
}

export type BinaryOperator =
  | 'And'
  | 'Or'
  | 'Equal'
  | 'NotEqual'
  | 'LessThan'
  | 'LessOrEqual'
  | 'GreaterThan'
  | 'GreaterOrEqual';

export type UnaryOperator = 'Not';

/**
 * Base interface for all AST nodes
 */
export interface ASTNode {
  readonly type: string;
  /** Offset in the source string, used for diagnostics */
  readonly position: number;
}

export interface BinaryNode extends ASTNode {
  readonly type: 'Binary';
  readonly operator: BinaryOperator;
  readonly left: FilterNode;
  readonly right: FilterNode;
}

export interface UnaryNode extends ASTNode {
  readonly type: 'Unary';
  readonly operator: UnaryOperator;
  readonly operand: FilterNode;
}

export interface CallNode extends ASTNode {
  readonly type: 'Call';
  /** Function name as written in the source */
  readonly name: string;
  readonly args: readonly FilterNode[];
}

/**
 * Dotted accessor such as `exif.iso` or `exif.raw.Rating`
 */
export interface PropertyNode extends ASTNode {
  readonly type: 'Property';
  readonly path: readonly string[];
}

export type ConstantNode = ASTNode &
  { readonly type: 'Constant' } & (
    | { readonly kind: 'string'; readonly value: string }
    | { readonly kind: 'integer' | 'decimal'; readonly value: number }
    | { readonly kind: 'boolean'; readonly value: boolean }
    | { readonly kind: 'null'; readonly value: null }
  );

/**
 * Union type of all filter node types
 */
export type FilterNode = BinaryNode | UnaryNode | CallNode | PropertyNode | ConstantNode;

/**
 * Visitor over the closed set of filter nodes
 */
export interface FilterNodeVisitor<T> {
  visitBinary(node: BinaryNode): T;
  visitUnary(node: UnaryNode): T;
  visitCall(node: CallNode): T;
  visitProperty(node: PropertyNode): T;
  visitConstant(node: ConstantNode): T;
}

/**
 * Dispatch a node to the matching visitor method.
 */
export function acceptNode<T>(node: FilterNode, visitor: FilterNodeVisitor<T>): T {
  switch (node.type) {
    case 'Binary':
      return visitor.visitBinary(node);
    case 'Unary':
      return visitor.visitUnary(node);
    case 'Call':
      return visitor.visitCall(node);
    case 'Property':
      return visitor.visitProperty(node);
    case 'Constant':
      return visitor.visitConstant(node);
    default: {
      // TypeScript exhaustiveness check
      const _exhaustive: never = node;
      throw new Error(`Unknown node type: ${(_exhaustive as FilterNode).type}`);
    }
  }
}

export type SortDirection = 'asc' | 'desc';

/**
 * `| sort <path> [asc|desc]`
 */
export interface SortClause {
  readonly path: readonly string[];
  readonly direction: SortDirection;
  readonly position: number;
}

/**
 * A parsed query: predicate plus optional pipe clauses
 */
export interface FilterQuery {
  /**
   * The predicate AST, or null when the query starts with `all`
   */
  readonly predicate: FilterNode | null;
  readonly sort: SortClause | null;
  /**
   * Positive result count, or null when there is no limit clause
   */
  readonly limit: number | null;
}

/**
 * Reads a value from an image record; null means absent
 */
export type Evaluator<T> = (image: ImageRecord) => T | null;

interface CompiledBase {
  /** Whether evaluation can yield null */
  readonly optional: boolean;
  readonly position: number;
}

/**
 * A node compiled to a closure, tagged with its result kind. Integer and
 * decimal values are both numbers; the distinction only matters for type checking.
 */
export type CompiledExpression =
  | (CompiledBase & { readonly kind: 'string'; readonly evaluate: Evaluator<string> })
  | (CompiledBase & { readonly kind: 'integer' | 'decimal'; readonly evaluate: Evaluator<number> })
  | (CompiledBase & { readonly kind: 'boolean'; readonly evaluate: Evaluator<boolean> })
  | (CompiledBase & { readonly kind: 'date'; readonly evaluate: Evaluator<Date> })
  | (CompiledBase & { readonly kind: 'null'; readonly evaluate: Evaluator<never> });

/**
 * A compiled filter predicate
 */
export type Predicate = (image: ImageRecord) => boolean;

export type ParseErrorKind = 'lexical' | 'syntax' | 'semantic';

/**
 * Error thrown when a filter cannot be scanned, parsed or compiled
 */
export class ParseError extends Error {
  constructor(
    public readonly kind: ParseErrorKind,
    public readonly reason: string,
    public readonly position: number,
    public readonly source: string
  ) {
    super(`${reason} at position ${position}`);
    this.name = 'ParseError';
  }

  /**
   * The source line holding the failing offset, then a caret under it.
   */
  formatPointer(): string {
    const { text, column } = this.sourceLine();
    return `${text}\n${' '.repeat(column)}^`;
  }

  /**
   * Message plus the pointer rendering, as shown to users.
   *
   * @example
   * ```text
   * Filter error: Expected expression, got 'end of expression' at position 11
   *
   *   filename ==
   *              ^
   * ```
   */
  getDetailedMessage(): string {
    if (this.source.length === 0) {
      return this.message;
    }
    const { text, column } = this.sourceLine();
    return `Filter error: ${this.message}\n\n  ${text}\n  ${' '.repeat(column)}^`;
  }

  /**
   * The line of a multi-line source that holds the offset, tabs shown as
   * single spaces so the caret column lines up
   */
  private sourceLine(): { text: string; column: number } {
    const start = this.position === 0 ? 0 : this.source.lastIndexOf('\n', this.position - 1) + 1;
    const newline = this.source.indexOf('\n', this.position);
    const end = newline === -1 ? this.source.length : newline;
    const text = this.source.slice(start, end).replace(/\r$/, '').replace(/\t/g, ' ');
    return { text, column: this.position - start };
  }
}
