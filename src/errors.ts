export type AbcErrorCode =
  | 'EMPTY_INPUT'
  | 'MISSING_MARKER'
  | 'HEADER_TOO_SHORT'
  | 'HEADER_ORDER_INVALID'
  | 'KEY_SIGNATURE_UNSUPPORTED'
  | 'INVALID_PITCH_LETTER';

/**
 * Raised for every fatal parse condition. No partial document is
 * produced once one of these is thrown.
 */
export class AbcParseError extends Error {
  constructor(
    public readonly code: AbcErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AbcParseError';
  }
}
