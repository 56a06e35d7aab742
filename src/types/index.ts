import type { SortDirection } from '../expression/types.js';

export type { CompiledQuery, ValidationResult, CompileResult } from '../query/filter-service.js';
export type { FilterQuery, SortClause, SortDirection, Predicate } from '../expression/types.js';

/**
 * EXIF metadata extracted from a photo. Any field may be missing.
 */
export interface ExifData {
  make?: string | null;
  model?: string | null;
  lensModel?: string | null;
  dateTaken?: Date | null;
  fNumber?: number | null;
  exposureTime?: number | null;
  iso?: number | null;
  focalLength?: number | null;
  gpsLatitude?: number | null;
  gpsLongitude?: number | null;

  /**
   * Every EXIF tag as read from the file, keyed by tag name
   */
  raw?: Readonly<Record<string, string>> | null;
}

/**
 * An image as seen by filter expressions.
 * Records are produced by the content pipeline and never mutated here.
 */
export interface ImageRecord {
  filename: string;
  width: number;
  height: number;
  dateTaken?: Date | null;
  exif?: ExifData | null;
}

/**
 * Site-wide image ordering for galleries
 */
export interface ImageSortConfig {
  /**
   * Property path to sort by, e.g. 'dateTaken' or 'exif.focalLength'
   */
  field: string;

  direction: SortDirection;

  /**
   * Property path used when the primary field is absent or empty
   */
  fallback: string;
}

/**
 * Options for selectGalleryImages
 */
export interface GalleryOptions {
  /**
   * Filter query from the gallery's metadata.
   * Example: "exif.make == 'Canon' | sort dateTaken desc | limit 12"
   */
  filter?: string;

  /**
   * Gallery sort override, "field" or "field:direction"
   */
  sort?: string;

  /**
   * Site-wide image sort; missing fields use the defaults
   */
  imageSort?: Partial<ImageSortConfig>;

  /**
   * Enable debug logging
   */
  debug?: boolean;
}
