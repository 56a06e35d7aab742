import type { CallNode, CompiledExpression, Evaluator } from './types.js';
import { ParseError } from './types.js';

/**
 * Builds a compiled expression from already-compiled arguments.
 * `fail` creates a semantic error positioned at the call.
 */
type FunctionBuilder = (
  node: CallNode,
  args: readonly CompiledExpression[],
  fail: (message: string) => ParseError
) => CompiledExpression;

function requireArity(
  node: CallNode,
  args: readonly CompiledExpression[],
  count: number,
  fail: (message: string) => ParseError
): void {
  if (args.length !== count) {
    const noun = count === 1 ? 'argument' : 'arguments';
    throw fail(`'${node.name}' function requires exactly ${count} ${noun}`);
  }
}

function datePart(read: (date: Date) => number): FunctionBuilder {
  return (node, args, fail) => {
    requireArity(node, args, 1, fail);
    const [arg] = args;
    if (arg.kind !== 'date') {
      throw fail(`'${node.name}' function requires a date argument`);
    }
    const evaluate = arg.evaluate;
    return {
      kind: 'integer',
      optional: arg.optional,
      position: node.position,
      evaluate: (image) => {
        const date = evaluate(image);
        return date === null ? null : read(date);
      },
    };
  };
}

function stringTest(test: (value: string, search: string) => boolean): FunctionBuilder {
  return (node, args, fail) => {
    requireArity(node, args, 2, fail);
    const [value, search] = args;
    if (value.kind !== 'string') {
      throw fail(`First argument to '${node.name}' must be a string`);
    }
    if (search.kind !== 'string') {
      throw fail(`Second argument to '${node.name}' must be a string`);
    }
    const readValue = value.evaluate;
    const readSearch = search.evaluate;
    return {
      kind: 'boolean',
      optional: false,
      position: node.position,
      evaluate: (image) => {
        const text = readValue(image);
        if (text === null) return false;
        const needle = readSearch(image);
        if (needle === null) return false;
        return test(text.toLowerCase(), needle.toLowerCase());
      },
    };
  };
}

function stringMap(map: (value: string) => string): FunctionBuilder {
  return (node, args, fail) => {
    requireArity(node, args, 1, fail);
    const [arg] = args;
    if (arg.kind !== 'string') {
      throw fail(`Argument to '${node.name}' must be a string`);
    }
    const evaluate: Evaluator<string> = arg.evaluate;
    return {
      kind: 'string',
      optional: arg.optional,
      position: node.position,
      evaluate: (image) => {
        const value = evaluate(image);
        return value === null ? null : map(value);
      },
    };
  };
}

/**
 * Built-in functions, keyed by lower-cased name.
 *
 * Date parts use UTC. String tests ignore case and are false when either
 * argument is absent; the other functions pass absence through.
 */
const FUNCTIONS: ReadonlyMap<string, FunctionBuilder> = new Map([
  ['year', datePart((date) => date.getUTCFullYear())],
  ['month', datePart((date) => date.getUTCMonth() + 1)],
  ['day', datePart((date) => date.getUTCDate())],
  ['contains', stringTest((value, search) => value.includes(search))],
  ['starts_with', stringTest((value, search) => value.startsWith(search))],
  ['ends_with', stringTest((value, search) => value.endsWith(search))],
  ['lower', stringMap((value) => value.toLowerCase())],
  ['upper', stringMap((value) => value.toUpperCase())],
]);

/**
 * Names of the built-in functions
 */
export const FUNCTION_NAMES: readonly string[] = [...FUNCTIONS.keys()];

/**
 * Look up the builder for a call before its arguments are compiled.
 * @throws ParseError for unknown functions
 */
export function lookupFunction(
  node: CallNode,
  source: string
): (args: readonly CompiledExpression[]) => CompiledExpression {
  const fail = (message: string): ParseError =>
    new ParseError('semantic', message, node.position, source);

  const builder = FUNCTIONS.get(node.name.toLowerCase());
  if (builder === undefined) {
    throw fail(`Unknown function '${node.name}' (expected one of: ${FUNCTION_NAMES.join(', ')})`);
  }

  return (args) => builder(node, args, fail);
}
