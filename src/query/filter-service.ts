import type { ImageRecord } from '../types/index.js';
import { FilterQuery, ParseError, Predicate, SortClause } from '../expression/types.js';
import { parse } from '../expression/parser.js';
import { compilePredicate } from '../expression/compiler.js';
import { createKeyReader, compareWithDirection, sortImages, type SortKey } from './sort.js';

/**
 * A compiled filter query, safe to reuse and to share
 */
export interface CompiledQuery {
  /**
   * The original source string
   */
  readonly source: string;

  /**
   * The parsed query
   */
  readonly query: FilterQuery;

  /**
   * The compiled predicate; always true for `all`
   */
  readonly predicate: Predicate;

  readonly sort: SortClause | null;
  readonly limit: number | null;

  /**
   * True when the query starts with `all`
   */
  readonly selectsAll: boolean;

  /**
   * Test a single image against the predicate
   */
  matches(image: ImageRecord): boolean;

  /**
   * Order two images by the sort clause; 0 when there is none
   */
  compare(a: ImageRecord, b: ImageRecord): number;

  /**
   * Filter, then sort, then truncate. The input is not modified.
   */
  apply<T extends ImageRecord>(images: Iterable<T>): T[];
}

export type CompileResult =
  | { readonly success: true; readonly query: CompiledQuery }
  | { readonly success: false; readonly error: ParseError };

export type ValidationResult =
  | { readonly valid: true; readonly error: null }
  | { readonly valid: false; readonly error: string };

const matchAll: Predicate = () => true;

/**
 * A compiled query implementation
 */
class CompiledFilterQuery implements CompiledQuery {
  readonly source: string;
  readonly query: FilterQuery;
  readonly predicate: Predicate;
  private readonly readSortKey: ((image: ImageRecord) => SortKey) | null;

  constructor(source: string, query: FilterQuery) {
    this.source = source;
    this.query = query;
    this.predicate = query.predicate === null ? matchAll : compilePredicate(query.predicate, source);
    this.readSortKey =
      query.sort === null ? null : createKeyReader(query.sort.path, query.sort.position, source);
  }

  get sort(): SortClause | null {
    return this.query.sort;
  }

  get limit(): number | null {
    return this.query.limit;
  }

  get selectsAll(): boolean {
    return this.query.predicate === null;
  }

  matches(image: ImageRecord): boolean {
    return this.predicate(image);
  }

  compare(a: ImageRecord, b: ImageRecord): number {
    if (this.readSortKey === null || this.query.sort === null) {
      return 0;
    }
    return compareWithDirection(this.readSortKey(a), this.readSortKey(b), this.query.sort.direction);
  }

  apply<T extends ImageRecord>(images: Iterable<T>): T[] {
    let result = Array.from(images).filter((image) => this.predicate(image));

    if (this.readSortKey !== null && this.query.sort !== null) {
      result = sortImages(result, this.readSortKey, this.query.sort.direction);
    }

    if (this.query.limit !== null) {
      result = result.slice(0, this.query.limit);
    }

    return result;
  }
}

/**
 * Compile a source string into a reusable query with its sort and limit.
 *
 * @param source - The filter source string
 * @returns A compiled query
 * @throws ParseError if the source is invalid
 *
 * @example
 * ```ts
 * const query = compileQuery("exif.iso >= 3200 | sort dateTaken desc | limit 5");
 * const picks = query.apply(images);
 * ```
 */
export function compileQuery(source: string): CompiledQuery {
  return new CompiledFilterQuery(source, parse(source));
}

/**
 * Compile a source string, returning failures as a value instead of throwing.
 *
 * @example
 * ```ts
 * const result = tryCompileQuery(gallery.filter);
 * if (!result.success) {
 *   console.error(result.error.getDetailedMessage());
 * }
 * ```
 */
export function tryCompileQuery(source: string): CompileResult {
  try {
    return { success: true, query: compileQuery(source) };
  } catch (error) {
    if (error instanceof ParseError) {
      return { success: false, error };
    }
    throw error;
  }
}

/**
 * Compile a source string into a predicate.
 * Sort and limit clauses are checked but not part of the predicate.
 *
 * @throws ParseError if the source is invalid
 */
export function compile(source: string): Predicate {
  return compileQuery(source).predicate;
}

/**
 * Filter images with a query, then apply its sort and limit clauses.
 *
 * @throws ParseError if the source is invalid
 */
export function apply<T extends ImageRecord>(images: Iterable<T>, source: string): T[] {
  return compileQuery(source).apply(images);
}

/**
 * Check whether a source string compiles. Empty input is invalid.
 */
export function validate(source: string): boolean {
  return tryValidate(source).valid;
}

/**
 * Check whether a source string compiles, with the detailed error message
 * when it does not.
 */
export function tryValidate(source: string): ValidationResult {
  if (source.trim().length === 0) {
    return { valid: false, error: 'Filter expression cannot be empty' };
  }

  const result = tryCompileQuery(source);
  if (result.success) {
    return { valid: true, error: null };
  }
  return { valid: false, error: result.error.getDetailedMessage() };
}
