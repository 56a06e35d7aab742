export {
  compile,
  compileQuery,
  tryCompileQuery,
  apply,
  validate,
  tryValidate,
} from './filter-service.js';
export type { CompiledQuery, CompileResult, ValidationResult } from './filter-service.js';

export {
  compareSortKeys,
  compareWithDirection,
  createKeyReader,
  createSortComparator,
  sortImages,
} from './sort.js';
export type { SortKey, ImageComparator } from './sort.js';
