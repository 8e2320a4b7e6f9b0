// Core types
export type {
  AbcDocument,
  InformationField,
  MusicEvent,
  NoteEvent,
  RestEvent,
  Accidental,
  AccidentalKind,
  AccidentalMark,
  ParseDiagnostic,
  ParseDiagnosticCode,
  ParseOptions,
} from './types';

// Errors
export { AbcParseError } from './errors';
export type { AbcErrorCode } from './errors';

// Importers
export {
  parseAbc,
  parseAbcBody,
  readAbcLines,
  stripDecorations,
  tokenizeEvents,
  foldEvents,
} from './importers';
export type { AbcLines, EventToken } from './importers';

// Document assembly
export { createDocument } from './document';
export { parseKeySignature, propagateKeySignature } from './key-signature';
export type { KeyAccidental } from './key-signature';

// Pitch model
export {
  pitchValue,
  accidentalFromMark,
  isAccidentalMark,
  createNote,
  createRest,
  setAccidental,
  compareNotes,
  notesEqual,
} from './pitch';

// Validation
export { validateHeader, isValidHeader, assertValidHeader } from './validator';
export type {
  HeaderValidationError,
  HeaderValidationErrorCode,
  HeaderValidationLocation,
} from './validator';

// Queries
export {
  getNotes,
  getRests,
  getField,
  lowestNote,
  highestNote,
  pitchRange,
  totalDuration,
  trimRests,
} from './query';

// File operations
export { parseFile } from './file';

// ID generation
export { generateId } from './id';
