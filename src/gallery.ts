import type { GalleryOptions, ImageRecord, ImageSortConfig } from './types/index.js';
import type { SortDirection } from './expression/types.js';
import { ParseError } from './expression/types.js';
import { compileQuery, type CompiledQuery } from './query/filter-service.js';
import { compareSortKeys, createKeyReader, type SortKey } from './query/sort.js';

/**
 * Site-wide image ordering used when a gallery does not sort itself
 */
export const DEFAULT_IMAGE_SORT: Readonly<ImageSortConfig> = {
  field: 'dateTaken',
  direction: 'desc',
  fallback: 'filename',
};

interface ResolvedGalleryOptions {
  filter: string | null;
  sort: ImageSortConfig;
  debug: boolean;
}

/**
 * Log a message if debug is enabled
 */
function log(options: ResolvedGalleryOptions, message: string): void {
  if (options.debug) {
    console.log(`[gallery-query] ${message}`);
  }
}

function parseDirection(value: string): SortDirection | null {
  switch (value.trim().toLowerCase()) {
    case 'asc':
      return 'asc';
    case 'desc':
      return 'desc';
    default:
      return null;
  }
}

/**
 * Apply a gallery sort override to the site-wide sort.
 *
 * The override is "field" or "field:direction". An unknown direction or an
 * empty field keeps the configured one.
 *
 * @example
 * ```ts
 * applySortOverride(DEFAULT_IMAGE_SORT, 'filename:asc');
 * // { field: 'filename', direction: 'asc', fallback: 'filename' }
 * ```
 */
export function applySortOverride(config: ImageSortConfig, override: string | undefined): ImageSortConfig {
  if (override === undefined || override.trim().length === 0) {
    return config;
  }

  const separator = override.indexOf(':');
  if (separator === -1) {
    return { ...config, field: override.trim() };
  }

  const field = override.substring(0, separator).trim();
  const direction = parseDirection(override.substring(separator + 1));
  return {
    ...config,
    field: field.length > 0 ? field : config.field,
    direction: direction ?? config.direction,
  };
}

/**
 * Resolve gallery options against defaults and the environment.
 *
 * `debug` falls back to the GALLERY_QUERY_DEBUG environment variable.
 */
export function resolveGalleryOptions(
  options: GalleryOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedGalleryOptions {
  const envDebug = env.GALLERY_QUERY_DEBUG === 'true' || env.GALLERY_QUERY_DEBUG === '1';
  const filter = options.filter !== undefined && options.filter.trim().length > 0 ? options.filter : null;
  const base: ImageSortConfig = { ...DEFAULT_IMAGE_SORT, ...options.imageSort };

  return {
    filter,
    sort: applySortOverride(base, options.sort),
    debug: options.debug ?? envDebug,
  };
}

function compileFilter(options: ResolvedGalleryOptions, filter: string): CompiledQuery {
  try {
    return compileQuery(filter);
  } catch (error) {
    if (error instanceof ParseError) {
      log(options, `Invalid filter:\n${error.getDetailedMessage()}`);
    }
    throw error;
  }
}

function splitPath(field: string): string[] {
  return field.split('.').filter((segment) => segment.length > 0);
}

/**
 * Sort images by a gallery sort configuration.
 *
 * An absent or empty primary key falls back to the fallback field. Images
 * without either key go last. Ties break on filename, ignoring case.
 *
 * @throws ParseError if a configured field is not a known property
 */
export function sortGalleryImages<T extends ImageRecord>(images: readonly T[], config: ImageSortConfig): T[] {
  const readPrimary = createKeyReader(splitPath(config.field));
  const readFallback = createKeyReader(splitPath(config.fallback));
  const sign = config.direction === 'desc' ? -1 : 1;

  const keyOf = (image: ImageRecord): SortKey => {
    const primary = readPrimary(image);
    return primary === null || primary === '' ? readFallback(image) : primary;
  };

  return images
    .map((image) => ({ image, key: keyOf(image), name: image.filename.toLowerCase() }))
    .sort((a, b) => {
      if (a.key !== null && b.key !== null) {
        const order = compareSortKeys(a.key, b.key) * sign;
        if (order !== 0) return order;
      } else if (a.key !== b.key) {
        return a.key === null ? 1 : -1;
      }
      return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
    })
    .map((entry) => entry.image);
}

/**
 * Select and order the images shown in a gallery.
 *
 * With a filter, images are selected from every image on the site and the
 * query's own sort wins over the gallery sort. Without one, the gallery
 * shows its own folder images in gallery sort order.
 *
 * @param allImages - Every image on the site
 * @param folderImages - Images in the gallery's own folder
 * @param options - Gallery filter, sort override and debug flag
 * @throws ParseError if the filter or a sort field is invalid
 *
 * @example
 * ```ts
 * const images = selectGalleryImages(siteImages, [], {
 *   filter: "exif.make == 'Canon' | sort dateTaken desc | limit 12",
 * });
 * ```
 */
export function selectGalleryImages<T extends ImageRecord>(
  allImages: readonly T[],
  folderImages: readonly T[],
  options?: GalleryOptions
): T[] {
  const resolved = resolveGalleryOptions(options);

  if (resolved.filter === null) {
    log(resolved, `No filter, sorting ${folderImages.length} folder image(s) by ${resolved.sort.field} ${resolved.sort.direction}`);
    return sortGalleryImages(folderImages, resolved.sort);
  }

  log(resolved, `Filter: ${resolved.filter}`);

  const query = compileFilter(resolved, resolved.filter);
  const selected = query.apply(allImages);
  log(resolved, `Filter matched ${selected.length} of ${allImages.length} image(s)`);

  if (query.sort !== null) {
    log(resolved, `Keeping order from filter sort on ${query.sort.path.join('.')}`);
    return selected;
  }

  return sortGalleryImages(selected, resolved.sort);
}
