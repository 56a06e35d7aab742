import type { ExifData, ImageRecord } from '../types/index.js';
import { CompiledExpression, ParseError } from './types.js';

type Source<S> = (image: ImageRecord) => S | null;
type FieldReader<S, T> = (source: S) => T | null | undefined;
type FieldFactory<S> = (source: Source<S>, position: number) => CompiledExpression;

function stringField<S>(read: FieldReader<S, string>, optional = true): FieldFactory<S> {
  return (source, position) => ({
    kind: 'string',
    optional,
    position,
    evaluate: (image) => {
      const owner = source(image);
      return owner === null ? null : read(owner) ?? null;
    },
  });
}

function numberField<S>(
  kind: 'integer' | 'decimal',
  read: FieldReader<S, number>,
  optional = true
): FieldFactory<S> {
  return (source, position) => ({
    kind,
    optional,
    position,
    evaluate: (image) => {
      const owner = source(image);
      return owner === null ? null : read(owner) ?? null;
    },
  });
}

function dateField<S>(read: FieldReader<S, Date>): FieldFactory<S> {
  return (source, position) => ({
    kind: 'date',
    optional: true,
    position,
    evaluate: (image) => {
      const owner = source(image);
      return owner === null ? null : read(owner) ?? null;
    },
  });
}

/**
 * Scalar fields of an image record, keyed by lower-cased name
 */
const IMAGE_FIELDS: ReadonlyMap<string, FieldFactory<ImageRecord>> = new Map([
  ['filename', stringField<ImageRecord>((image) => image.filename, false)],
  ['width', numberField<ImageRecord>('integer', (image) => image.width, false)],
  ['height', numberField<ImageRecord>('integer', (image) => image.height, false)],
  ['datetaken', dateField<ImageRecord>((image) => image.dateTaken)],
]);

/**
 * Scalar fields of the EXIF block, keyed by lower-cased name
 */
const EXIF_FIELDS: ReadonlyMap<string, FieldFactory<ExifData>> = new Map([
  ['make', stringField<ExifData>((exif) => exif.make)],
  ['model', stringField<ExifData>((exif) => exif.model)],
  ['lensmodel', stringField<ExifData>((exif) => exif.lensModel)],
  ['datetaken', dateField<ExifData>((exif) => exif.dateTaken)],
  ['fnumber', numberField<ExifData>('decimal', (exif) => exif.fNumber)],
  ['exposuretime', numberField<ExifData>('decimal', (exif) => exif.exposureTime)],
  ['iso', numberField<ExifData>('integer', (exif) => exif.iso)],
  ['focallength', numberField<ExifData>('decimal', (exif) => exif.focalLength)],
  ['gpslatitude', numberField<ExifData>('decimal', (exif) => exif.gpsLatitude)],
  ['gpslongitude', numberField<ExifData>('decimal', (exif) => exif.gpsLongitude)],
]);

const imageSource: Source<ImageRecord> = (image) => image;
const exifSource: Source<ExifData> = (image) => image.exif ?? null;

/**
 * Names accepted as the first segment of a property path
 */
export const IMAGE_PROPERTY_NAMES: readonly string[] = [
  'filename',
  'width',
  'height',
  'dateTaken',
  'exif',
];

/**
 * Names accepted after `exif.`
 */
export const EXIF_PROPERTY_NAMES: readonly string[] = [
  'make',
  'model',
  'lensModel',
  'dateTaken',
  'fNumber',
  'exposureTime',
  'iso',
  'focalLength',
  'gpsLatitude',
  'gpsLongitude',
  'raw',
];

/**
 * Resolve a dotted property path against the image record shape.
 *
 * Segments match case-insensitively. `exif.raw.<Key>` looks `Key` up in the
 * raw EXIF map as written. Every path through `exif` yields null when the
 * record has no EXIF block.
 *
 * @param path - Path segments, e.g. `['exif', 'iso']`
 * @param position - Source offset reported on failure
 * @param source - The filter source, reported on failure
 * @throws ParseError for unknown or incomplete paths
 */
export function resolveProperty(
  path: readonly string[],
  position: number,
  source: string
): CompiledExpression {
  const unknown = (length: number, known?: readonly string[]): ParseError => {
    const hint = known === undefined ? '' : ` (expected one of: ${known.join(', ')})`;
    return new ParseError(
      'semantic',
      `Unknown property '${path.slice(0, length).join('.')}'${hint}`,
      position,
      source
    );
  };

  if (path.length === 0) {
    throw new ParseError('semantic', 'Empty property path', position, source);
  }

  const root = path[0].toLowerCase();

  if (root !== 'exif') {
    const factory = IMAGE_FIELDS.get(root);
    if (factory === undefined) throw unknown(1, IMAGE_PROPERTY_NAMES);
    if (path.length > 1) throw unknown(2);
    return factory(imageSource, position);
  }

  if (path.length === 1) {
    throw new ParseError(
      'semantic',
      "Property 'exif' needs a field, e.g. 'exif.make'",
      position,
      source
    );
  }

  const field = path[1].toLowerCase();

  if (field === 'raw') {
    if (path.length === 2) {
      throw new ParseError(
        'semantic',
        "Property 'exif.raw' needs a tag name, e.g. 'exif.raw.Rating'",
        position,
        source
      );
    }
    if (path.length > 3) throw unknown(4);
    return rawField(path[2], position);
  }

  const factory = EXIF_FIELDS.get(field);
  if (factory === undefined) throw unknown(2, EXIF_PROPERTY_NAMES);
  if (path.length > 2) throw unknown(3);
  return factory(exifSource, position);
}

function rawField(key: string, position: number): CompiledExpression {
  return {
    kind: 'string',
    optional: true,
    position,
    evaluate: (image) => {
      const raw = image.exif?.raw;
      if (raw === null || raw === undefined || !Object.prototype.hasOwnProperty.call(raw, key)) {
        return null;
      }
      return raw[key];
    },
  };
}
