import {
  acceptNode,
  ParseError,
  BinaryNode,
  CallNode,
  CompiledExpression,
  ConstantNode,
  Evaluator,
  FilterNode,
  FilterNodeVisitor,
  Predicate,
  PropertyNode,
  UnaryNode,
} from './types.js';
import { resolveProperty } from './properties.js';
import { lookupFunction } from './functions.js';

type ComparisonOperator = Exclude<BinaryNode['operator'], 'And' | 'Or'>;

const ORDERING: Readonly<Record<ComparisonOperator, (order: number) => boolean>> = {
  Equal: (order) => order === 0,
  NotEqual: (order) => order !== 0,
  LessThan: (order) => order < 0,
  LessOrEqual: (order) => order <= 0,
  GreaterThan: (order) => order > 0,
  GreaterOrEqual: (order) => order >= 0,
};

const SYMBOLS: Readonly<Record<ComparisonOperator, string>> = {
  Equal: '==',
  NotEqual: '!=',
  LessThan: '<',
  LessOrEqual: '<=',
  GreaterThan: '>',
  GreaterOrEqual: '>=',
};

/**
 * Both sides must be present; absence on either side is false for every operator.
 */
function comparePresent<T>(
  left: Evaluator<T>,
  right: Evaluator<T>,
  order: (a: T, b: T) => number,
  accept: (order: number) => boolean
): Evaluator<boolean> {
  return (image) => {
    const a = left(image);
    if (a === null) return false;
    const b = right(image);
    if (b === null) return false;
    return accept(order(a, b));
  };
}

function orderNumbers(a: number, b: number): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function orderStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function orderDates(a: Date, b: Date): number {
  return orderNumbers(a.getTime(), b.getTime());
}

function orderBooleans(a: boolean, b: boolean): number {
  return a === b ? 0 : a ? 1 : -1;
}

/**
 * Compiles filter ASTs to predicates in one bottom-up pass.
 *
 * Every node becomes a closure over already-resolved metadata, so evaluating
 * the result never revisits the tree and holds no mutable state.
 */
export class PredicateCompiler implements FilterNodeVisitor<CompiledExpression> {
  private readonly source: string;

  /**
   * @param source - The filter source, used in error messages
   */
  constructor(source: string) {
    this.source = source;
  }

  /**
   * Compile a predicate AST.
   * @throws ParseError if the tree is not a well-typed boolean expression
   */
  compile(node: FilterNode): Predicate {
    const compiled = this.compileNode(node);

    if (compiled.kind !== 'boolean') {
      throw this.error('Filter expression must evaluate to a boolean', node.position);
    }

    const evaluate = compiled.evaluate;
    return (image) => evaluate(image) === true;
  }

  /**
   * Compile any node to a typed closure
   */
  compileNode(node: FilterNode): CompiledExpression {
    return acceptNode(node, this);
  }

  visitBinary(node: BinaryNode): CompiledExpression {
    const left = this.compileNode(node.left);
    const right = this.compileNode(node.right);

    if (node.operator === 'And' || node.operator === 'Or') {
      return this.compileLogical(node, node.operator, left, right);
    }

    return this.compileComparison(node, node.operator, left, right);
  }

  visitUnary(node: UnaryNode): CompiledExpression {
    const operand = this.compileNode(node.operand);

    if (operand.kind !== 'boolean') {
      throw this.error("'not' operator requires a boolean operand", node.operand.position);
    }

    const evaluate = operand.evaluate;
    return {
      kind: 'boolean',
      optional: false,
      position: node.position,
      evaluate: (image) => evaluate(image) !== true,
    };
  }

  visitCall(node: CallNode): CompiledExpression {
    const build = lookupFunction(node, this.source);
    return build(node.args.map((arg) => this.compileNode(arg)));
  }

  visitProperty(node: PropertyNode): CompiledExpression {
    return resolveProperty(node.path, node.position, this.source);
  }

  visitConstant(node: ConstantNode): CompiledExpression {
    const position = node.position;

    switch (node.kind) {
      case 'string': {
        const value = node.value;
        return { kind: 'string', optional: false, position, evaluate: () => value };
      }
      case 'integer':
      case 'decimal': {
        const value = node.value;
        return { kind: node.kind, optional: false, position, evaluate: () => value };
      }
      case 'boolean': {
        const value = node.value;
        return { kind: 'boolean', optional: false, position, evaluate: () => value };
      }
      case 'null':
        return { kind: 'null', optional: true, position, evaluate: () => null };
    }
  }

  private compileLogical(
    node: BinaryNode,
    operator: 'And' | 'Or',
    left: CompiledExpression,
    right: CompiledExpression
  ): CompiledExpression {
    const word = operator === 'And' ? 'and' : 'or';

    if (left.kind !== 'boolean') {
      throw this.error(`Left side of '${word}' must be boolean`, node.left.position);
    }
    if (right.kind !== 'boolean') {
      throw this.error(`Right side of '${word}' must be boolean`, node.right.position);
    }

    const l = left.evaluate;
    const r = right.evaluate;
    const evaluate: Evaluator<boolean> =
      operator === 'And'
        ? (image) => l(image) === true && r(image) === true
        : (image) => l(image) === true || r(image) === true;

    return { kind: 'boolean', optional: false, position: node.position, evaluate };
  }

  private compileComparison(
    node: BinaryNode,
    operator: ComparisonOperator,
    left: CompiledExpression,
    right: CompiledExpression
  ): CompiledExpression {
    const compiled = (evaluate: Evaluator<boolean>): CompiledExpression => ({
      kind: 'boolean',
      optional: false,
      position: node.position,
      evaluate,
    });

    // Against the null literal only presence can be tested
    if (left.kind === 'null' || right.kind === 'null') {
      if (operator !== 'Equal' && operator !== 'NotEqual') {
        throw this.error(`Operator '${SYMBOLS[operator]}' cannot be used with null`, node.position);
      }
      const wantAbsent = operator === 'Equal';
      const other = left.kind === 'null' ? right : left;
      const read: Evaluator<unknown> = other.evaluate;
      return compiled((image) => (read(image) === null) === wantAbsent);
    }

    const accept = ORDERING[operator];

    // integer and decimal unify to number
    if (isNumeric(left) && isNumeric(right)) {
      return compiled(comparePresent(left.evaluate, right.evaluate, orderNumbers, accept));
    }

    if (left.kind === 'string' && right.kind === 'string') {
      return compiled(comparePresent(left.evaluate, right.evaluate, orderStrings, accept));
    }

    if (left.kind === 'date' && right.kind === 'date') {
      return compiled(comparePresent(left.evaluate, right.evaluate, orderDates, accept));
    }

    if (left.kind === 'boolean' && right.kind === 'boolean') {
      if (operator !== 'Equal' && operator !== 'NotEqual') {
        throw this.error(
          `Operator '${SYMBOLS[operator]}' cannot be used with boolean values`,
          node.position
        );
      }
      return compiled(comparePresent(left.evaluate, right.evaluate, orderBooleans, accept));
    }

    throw this.error(`Cannot compare '${left.kind}' with '${right.kind}'`, node.position);
  }

  private error(message: string, position: number): ParseError {
    return new ParseError('semantic', message, position, this.source);
  }
}

type NumericExpression = Extract<CompiledExpression, { kind: 'integer' | 'decimal' }>;

function isNumeric(expression: CompiledExpression): expression is NumericExpression {
  return expression.kind === 'integer' || expression.kind === 'decimal';
}

/**
 * Compile a predicate AST against the image record shape.
 *
 * @param node - Root of the predicate AST
 * @param source - The filter source, used in error messages
 * @throws ParseError on unknown properties or functions and on type errors
 */
export function compilePredicate(node: FilterNode, source: string): Predicate {
  return new PredicateCompiler(source).compile(node);
}
