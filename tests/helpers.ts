import { ParseError } from '../src/expression/types';
import type { ImageRecord } from '../src/types/index';

/**
 * Run a function that should fail and return its ParseError
 */
export function catchParseError(fn: () => unknown): ParseError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  throw new Error('Expected a ParseError');
}

/**
 * Build an image record with defaults for the required fields
 */
export function image(overrides: Partial<ImageRecord> = {}): ImageRecord {
  return {
    filename: 'image.jpg',
    width: 1920,
    height: 1080,
    ...overrides,
  };
}
