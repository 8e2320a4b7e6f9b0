// ============================================================
// Document (root)
// ============================================================
export interface AbcDocument {
  _id: string;
  fields: InformationField[];
  events: MusicEvent[];
  diagnostics: ParseDiagnostic[];
}

/**
 * A header line such as `T:Tune`. `key` is uppercased on ingestion,
 * `value` is the raw text after the colon.
 */
export interface InformationField {
  key: string;
  value: string;
}

// ============================================================
// Events
// ============================================================
export type AccidentalKind = 'flat' | 'natural' | 'sharp';
export type AccidentalMark = '_' | '=' | '^';

export interface Accidental {
  readonly kind: AccidentalKind;
  readonly mark: AccidentalMark;
  readonly semitones: -1 | 0 | 1;
}

export interface NoteEvent {
  _id: string;
  type: 'note';
  /** Letter plus the octave mark captured with it, e.g. `c'` or `G,` */
  name: string;
  /** Absent until set explicitly or by the key signature */
  accidental?: Accidental;
  duration: number;
  pitchValue: number;
}

export interface RestEvent {
  _id: string;
  type: 'rest';
  duration: number;
}

export type MusicEvent = NoteEvent | RestEvent;

// ============================================================
// Diagnostics
// ============================================================
export type ParseDiagnosticCode =
  | 'TIE_NAME_MISMATCH'
  | 'DANGLING_TIE'
  | 'UNCLOSED_CHORD';

export interface ParseDiagnostic {
  code: ParseDiagnosticCode;
  level: 'warning' | 'info';
  message: string;
  eventIndex?: number;
}

// ============================================================
// Options
// ============================================================
export interface ParseOptions {
  /** Require the leading `%abc` marker line (default: true) */
  requireMarker?: boolean;
}
