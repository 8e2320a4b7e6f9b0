import type { InformationField } from '../types';
import { AbcParseError } from '../errors';

// ============================================================
// Validation Error Types
// ============================================================

export type HeaderValidationErrorCode =
  | 'HEADER_TOO_SHORT'
  | 'HEADER_ORDER_INVALID';

export interface HeaderValidationLocation {
  fieldIndex?: number;
}

export interface HeaderValidationError {
  code: HeaderValidationErrorCode;
  level: 'error';
  message: string;
  location: HeaderValidationLocation;
  details?: Record<string, unknown>;
}

const MIN_HEADER_FIELDS = 3;

// ============================================================
// Header Validation
// ============================================================

/**
 * Validate the tune header: at least X:, T: and K:, starting with X: then T:
 * and ending with K:. A header too short to hold those reports only that.
 */
export function validateHeader(fields: InformationField[]): HeaderValidationError[] {
  if (fields.length < MIN_HEADER_FIELDS) {
    return [{
      code: 'HEADER_TOO_SHORT',
      level: 'error',
      message: fields.length === 0
        ? 'Tune header is empty; it must contain at least X:, T:, and K:'
        : 'Tune header must contain at least X:, T:, and K:',
      location: {},
      details: { fieldCount: fields.length },
    }];
  }

  const errors: HeaderValidationError[] = [];
  const expectKey = (fieldIndex: number, key: string, message: string) => {
    const actual = fields[fieldIndex]?.key;
    if (actual !== key) {
      errors.push({
        code: 'HEADER_ORDER_INVALID',
        level: 'error',
        message,
        location: { fieldIndex },
        details: { expected: key, actual },
      });
    }
  };

  expectKey(0, 'X', 'Tune header must begin with X:');
  expectKey(1, 'T', 'Tune header must have T: as its second field');
  expectKey(fields.length - 1, 'K', 'Tune header must end with K:');
  return errors;
}

export function isValidHeader(fields: InformationField[]): boolean {
  return validateHeader(fields).length === 0;
}

/**
 * Validate and throw the first failure as an AbcParseError
 */
export function assertValidHeader(fields: InformationField[]): void {
  const [first, ...rest] = validateHeader(fields);
  if (first) {
    throw new AbcParseError(first.code, first.message, {
      ...first.details,
      location: first.location,
      otherErrors: rest.map(e => e.message),
    });
  }
}
