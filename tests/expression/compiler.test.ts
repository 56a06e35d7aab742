import { describe, it, expect } from 'vitest';
import { PredicateCompiler, compilePredicate } from '../../src/expression/compiler';
import { parse } from '../../src/expression/parser';
import type { FilterNode, Predicate } from '../../src/expression/types';
import { catchParseError, image } from '../helpers';

function predicateNode(source: string): FilterNode {
  const { predicate } = parse(source);
  if (predicate === null) {
    throw new Error(`'${source}' has no predicate`);
  }
  return predicate;
}

const compileSource = (source: string): Predicate => compilePredicate(predicateNode(source), source);

const canon = image({
  filename: 'IMG_001.jpg',
  dateTaken: new Date('2024-03-15T10:00:00Z'),
  exif: {
    make: 'Canon',
    model: 'EOS R5',
    iso: 3200,
    fNumber: 2.8,
    focalLength: 50,
    dateTaken: new Date('2024-03-14T09:00:00Z'),
    raw: { Rating: '5' },
  },
});

const bare = image({ filename: 'scan.png' });

describe('PredicateCompiler', () => {
  describe('comparisons', () => {
    it('should compare strings exactly', () => {
      expect(compileSource("filename == 'IMG_001.jpg'")(canon)).toBe(true);
      expect(compileSource("filename == 'img_001.jpg'")(canon)).toBe(false);
      expect(compileSource("filename != 'other.jpg'")(canon)).toBe(true);
    });

    it('should order strings by code unit', () => {
      expect(compileSource("exif.make < 'Nikon'")(canon)).toBe(true);
      expect(compileSource("exif.make > 'canon'")(canon)).toBe(false);
    });

    it('should compare integers', () => {
      expect(compileSource('exif.iso >= 3200')(canon)).toBe(true);
      expect(compileSource('exif.iso > 3200')(canon)).toBe(false);
      expect(compileSource('width > height')(canon)).toBe(true);
    });

    it('should compare integers with decimals', () => {
      expect(compileSource('exif.fNumber < 4')(canon)).toBe(true);
      expect(compileSource('exif.iso == 3200.0')(canon)).toBe(true);
      expect(compileSource('exif.focalLength <= 49.5')(canon)).toBe(false);
    });

    it('should compare dates', () => {
      expect(compileSource('dateTaken > exif.dateTaken')(canon)).toBe(true);
      expect(compileSource('dateTaken == dateTaken')(canon)).toBe(true);
    });

    it('should compare booleans for equality', () => {
      expect(compileSource('(width > 100) == true')(canon)).toBe(true);
      expect(compileSource('true != false')(canon)).toBe(true);
    });

    it('should resolve property names case-insensitively', () => {
      expect(compileSource('EXIF.ISO == 3200')(canon)).toBe(true);
      expect(compileSource("FileName == 'IMG_001.jpg'")(canon)).toBe(true);
    });
  });

  describe('absent values', () => {
    it('should be false for every operator when a side is absent', () => {
      expect(compileSource("exif.make == 'Canon'")(bare)).toBe(false);
      expect(compileSource("exif.make != 'Canon'")(bare)).toBe(false);
      expect(compileSource('exif.iso < 100')(bare)).toBe(false);
      expect(compileSource('dateTaken > exif.dateTaken')(bare)).toBe(false);
    });

    it('should test absence against null', () => {
      expect(compileSource('exif.make == null')(bare)).toBe(true);
      expect(compileSource('exif.make == null')(canon)).toBe(false);
      expect(compileSource('exif.make != null')(canon)).toBe(true);
      expect(compileSource('null == exif.iso')(bare)).toBe(true);
    });

    it('should treat missing fields of a present EXIF block as absent', () => {
      const noMake = image({ exif: { iso: 100 } });
      expect(compileSource('exif.make == null')(noMake)).toBe(true);
      expect(compileSource('exif.iso == 100')(noMake)).toBe(true);
    });

    it('should treat null fields as absent', () => {
      expect(compileSource('exif.make == null')(image({ exif: { make: null } }))).toBe(true);
    });

    it('should treat a present value as not null', () => {
      expect(compileSource('filename == null')(bare)).toBe(false);
    });
  });

  describe('logical operators', () => {
    it('should combine with and', () => {
      const predicate = compileSource("exif.make == 'Canon' and exif.iso > 100");
      expect(predicate(canon)).toBe(true);
      expect(predicate(bare)).toBe(false);
    });

    it('should combine with or', () => {
      const predicate = compileSource("exif.make == 'Nikon' or filename == 'scan.png'");
      expect(predicate(canon)).toBe(false);
      expect(predicate(bare)).toBe(true);
    });

    it('should negate with not', () => {
      expect(compileSource("not exif.make == 'Nikon'")(canon)).toBe(true);
      expect(compileSource("not exif.make == 'Canon'")(canon)).toBe(false);
      expect(compileSource('not not width > 0')(canon)).toBe(true);
    });

    it('should negate a comparison made false by absence', () => {
      expect(compileSource("not exif.make == 'Canon'")(bare)).toBe(true);
    });
  });

  describe('functions', () => {
    it('should extract UTC date parts', () => {
      expect(compileSource('year(dateTaken) == 2024')(canon)).toBe(true);
      expect(compileSource('month(dateTaken) == 3')(canon)).toBe(true);
      expect(compileSource('day(exif.dateTaken) == 14')(canon)).toBe(true);
    });

    it('should be false when the date is absent', () => {
      expect(compileSource('year(dateTaken) == 2024')(bare)).toBe(false);
      expect(compileSource('year(dateTaken) != 2024')(bare)).toBe(false);
    });

    it('should match substrings ignoring case', () => {
      expect(compileSource("contains(filename, 'img')")(canon)).toBe(true);
      expect(compileSource("starts_with(filename, 'IMG_')")(canon)).toBe(true);
      expect(compileSource("ends_with(filename, '.JPG')")(canon)).toBe(true);
      expect(compileSource("ends_with(filename, '.png')")(canon)).toBe(false);
    });

    it('should be false when a string test argument is absent', () => {
      expect(compileSource("contains(exif.make, 'can')")(bare)).toBe(false);
    });

    it('should map case', () => {
      expect(compileSource("lower(exif.make) == 'canon'")(canon)).toBe(true);
      expect(compileSource("upper(exif.model) == 'EOS R5'")(canon)).toBe(true);
      expect(compileSource("lower(exif.make) == null")(bare)).toBe(true);
    });

    it('should look up function names case-insensitively', () => {
      expect(compileSource('YEAR(dateTaken) == 2024')(canon)).toBe(true);
      expect(compileSource("Contains(filename, '001')")(canon)).toBe(true);
    });

    it('should compose calls', () => {
      expect(compileSource("contains(lower(exif.model), 'r5')")(canon)).toBe(true);
    });
  });

  describe('raw EXIF tags', () => {
    it('should read tags by exact name', () => {
      expect(compileSource("exif.raw.Rating == '5'")(canon)).toBe(true);
      expect(compileSource("exif.raw.rating == '5'")(canon)).toBe(false);
    });

    it('should be absent when the tag or the map is missing', () => {
      expect(compileSource('exif.raw.Artist == null')(canon)).toBe(true);
      expect(compileSource('exif.raw.Rating == null')(bare)).toBe(true);
    });

    it('should not read inherited properties', () => {
      expect(compileSource('exif.raw.toString == null')(canon)).toBe(true);
    });
  });

  describe('compileNode', () => {
    it('should report the kind of each expression', () => {
      const compiler = new PredicateCompiler('');
      expect(compiler.compileNode(predicateNode('year(dateTaken)')).kind).toBe('integer');
      expect(compiler.compileNode(predicateNode('exif.fNumber')).kind).toBe('decimal');
      expect(compiler.compileNode(predicateNode('lower(filename)')).kind).toBe('string');
      expect(compiler.compileNode(predicateNode('dateTaken')).kind).toBe('date');
    });

    it('should carry optionality through functions', () => {
      const compiler = new PredicateCompiler('');
      expect(compiler.compileNode(predicateNode('lower(filename)')).optional).toBe(false);
      expect(compiler.compileNode(predicateNode('lower(exif.make)')).optional).toBe(true);
    });
  });

  describe('semantic errors', () => {
    const errorOf = (source: string) => catchParseError(() => compileSource(source));

    it('should require a boolean result', () => {
      expect(errorOf('filename').message).toBe('Filter expression must evaluate to a boolean at position 0');
      expect(errorOf('exif.iso').message).toBe('Filter expression must evaluate to a boolean at position 0');
    });

    it('should report errors as semantic', () => {
      const error = errorOf('filename');
      expect(error.kind).toBe('semantic');
      expect(error.source).toBe('filename');
    });

    it('should require boolean operands for logical operators', () => {
      expect(errorOf('not filename').message).toBe("'not' operator requires a boolean operand at position 4");
      expect(errorOf('filename and true').message).toBe("Left side of 'and' must be boolean at position 0");
      expect(errorOf('true or width').message).toBe("Right side of 'or' must be boolean at position 8");
    });

    it('should reject comparisons across kinds', () => {
      expect(errorOf('filename == 5').message).toBe("Cannot compare 'string' with 'integer' at position 9");
      expect(errorOf("dateTaken == '2024-01-01'").message).toBe(
        "Cannot compare 'date' with 'string' at position 10"
      );
    });

    it('should only allow equality against null', () => {
      expect(errorOf('exif.iso < null').message).toBe("Operator '<' cannot be used with null at position 9");
    });

    it('should not order booleans', () => {
      expect(errorOf('true < false').message).toBe(
        "Operator '<' cannot be used with boolean values at position 5"
      );
    });

    it('should reject unknown properties', () => {
      expect(errorOf('foo == 1').message).toBe(
        "Unknown property 'foo' (expected one of: filename, width, height, dateTaken, exif) at position 0"
      );
      expect(errorOf('exif.shutter == 1').message).toBe(
        "Unknown property 'exif.shutter' (expected one of: make, model, lensModel, dateTaken, fNumber, exposureTime, iso, focalLength, gpsLatitude, gpsLongitude, raw) at position 0"
      );
      expect(errorOf("filename.ext == 'x'").message).toBe("Unknown property 'filename.ext' at position 0");
      expect(errorOf('exif.iso.value == 1').message).toBe("Unknown property 'exif.iso.value' at position 0");
      expect(errorOf("exif.raw.A.B == 'x'").message).toBe("Unknown property 'exif.raw.A.B' at position 0");
    });

    it('should reject incomplete EXIF paths', () => {
      expect(errorOf('exif == null').message).toBe(
        "Property 'exif' needs a field, e.g. 'exif.make' at position 0"
      );
      expect(errorOf("exif.raw == 'x'").message).toBe(
        "Property 'exif.raw' needs a tag name, e.g. 'exif.raw.Rating' at position 0"
      );
    });

    it('should reject unknown functions', () => {
      expect(errorOf('size(filename) > 1').message).toBe(
        "Unknown function 'size' (expected one of: year, month, day, contains, starts_with, ends_with, lower, upper) at position 0"
      );
    });

    it('should report an unknown function before its arguments', () => {
      expect(errorOf('size(foo) > 1').message).toBe(
        "Unknown function 'size' (expected one of: year, month, day, contains, starts_with, ends_with, lower, upper) at position 0"
      );
    });

    it('should check function arity', () => {
      expect(errorOf('year() == 2024').message).toBe("'year' function requires exactly 1 argument at position 0");
      expect(errorOf('contains(filename)').message).toBe(
        "'contains' function requires exactly 2 arguments at position 0"
      );
    });

    it('should check function argument kinds', () => {
      expect(errorOf('year(filename) == 2024').message).toBe(
        "'year' function requires a date argument at position 0"
      );
      expect(errorOf("contains(width, 'x')").message).toBe(
        "First argument to 'contains' must be a string at position 0"
      );
      expect(errorOf('contains(filename, 1)').message).toBe(
        "Second argument to 'contains' must be a string at position 0"
      );
      expect(errorOf("lower(width) == 'x'").message).toBe("Argument to 'lower' must be a string at position 0");
    });

    it('should position errors inside nested expressions', () => {
      expect(errorOf("width > 1 and year(filename) == 2024").position).toBe(14);
    });
  });
});
