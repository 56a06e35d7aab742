export { TokenType, ParseError, acceptNode, describeToken } from './types.js';
export type {
  Token,
  ASTNode,
  BinaryNode,
  BinaryOperator,
  UnaryNode,
  UnaryOperator,
  CallNode,
  PropertyNode,
  ConstantNode,
  FilterNode,
  FilterNodeVisitor,
  FilterQuery,
  SortClause,
  SortDirection,
  Evaluator,
  CompiledExpression,
  Predicate,
  ParseErrorKind,
} from './types.js';

export { Scanner, tokenize } from './scanner.js';
export { Parser, parse, MAX_NESTING_DEPTH } from './parser.js';
export { PredicateCompiler, compilePredicate } from './compiler.js';
export { resolveProperty, IMAGE_PROPERTY_NAMES, EXIF_PROPERTY_NAMES } from './properties.js';
export { lookupFunction, FUNCTION_NAMES } from './functions.js';
