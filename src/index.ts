// Main entry point for gallery-query

// Query facade
export {
  compile,
  compileQuery,
  tryCompileQuery,
  apply,
  validate,
  tryValidate,
  createSortComparator,
  sortImages,
} from './query/index.js';
export type { CompiledQuery, CompileResult, ValidationResult, SortKey } from './query/index.js';

// Re-export expression internals for advanced usage
export { tokenize, parse, compilePredicate, ParseError, TokenType } from './expression/index.js';
export type {
  Token,
  FilterNode,
  FilterQuery,
  SortClause,
  SortDirection,
  Predicate,
  ParseErrorKind,
} from './expression/index.js';

// Gallery selection
export {
  selectGalleryImages,
  sortGalleryImages,
  applySortOverride,
  resolveGalleryOptions,
  DEFAULT_IMAGE_SORT,
} from './gallery.js';

// Re-export types
export type { ImageRecord, ExifData, ImageSortConfig, GalleryOptions } from './types/index.js';
