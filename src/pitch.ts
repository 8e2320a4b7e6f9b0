/**
 * Pitch value model.
 *
 * Every note resolves to one integer. Equal integers are the same audible
 * pitch, so `^E` and `F` compare equal.
 */

import type { Accidental, AccidentalMark, NoteEvent, RestEvent } from './types';
import { AbcParseError } from './errors';
import { generateId } from './id';

// ============================================================
// Constants
// ============================================================

// Piano key positions, one table entry per letter and case
const BASE_VALUES: Record<string, number> = {
  'C': 40, 'D': 42, 'E': 44, 'F': 45, 'G': 47, 'A': 49, 'B': 51,
  'c': 52, 'd': 54, 'e': 56, 'f': 57, 'g': 59, 'a': 61, 'b': 63,
};

const OCTAVE = 12;

const ACCIDENTALS: Record<AccidentalMark, Accidental> = {
  '_': Object.freeze<Accidental>({ kind: 'flat', mark: '_', semitones: -1 }),
  '=': Object.freeze<Accidental>({ kind: 'natural', mark: '=', semitones: 0 }),
  '^': Object.freeze<Accidental>({ kind: 'sharp', mark: '^', semitones: 1 }),
};

// ============================================================
// Accidentals
// ============================================================

export function isAccidentalMark(mark: string): mark is AccidentalMark {
  return mark === '_' || mark === '=' || mark === '^';
}

export function accidentalFromMark(mark: AccidentalMark): Accidental {
  return ACCIDENTALS[mark];
}

// ============================================================
// Pitch Values
// ============================================================

export function pitchValue(name: string, accidental?: Accidental): number {
  const letter = name[0];
  const base = letter === undefined ? undefined : BASE_VALUES[letter];
  if (base === undefined) {
    throw new AbcParseError('INVALID_PITCH_LETTER', `No pitch value for note name "${name}"`, { name });
  }

  let value = base;
  for (const mark of name.slice(1)) {
    if (mark === ',') value -= OCTAVE;
    else if (mark === "'") value += OCTAVE;
  }
  return value + (accidental?.semitones ?? 0);
}

// ============================================================
// Event Construction
// ============================================================

export function createNote(name: string, accidental?: Accidental, duration = 1): NoteEvent {
  const note: NoteEvent = {
    _id: generateId(),
    type: 'note',
    name,
    duration,
    pitchValue: pitchValue(name, accidental),
  };
  if (accidental) note.accidental = accidental;
  return note;
}

export function createRest(duration = 1): RestEvent {
  return { _id: generateId(), type: 'rest', duration };
}

/**
 * Set a note's accidental in place and recompute its pitch value
 */
export function setAccidental(note: NoteEvent, accidental: Accidental): void {
  note.accidental = accidental;
  note.pitchValue = pitchValue(note.name, accidental);
}

// ============================================================
// Ordering
// ============================================================

/** Sort comparator over pitch value only; spelling is ignored */
export function compareNotes(a: NoteEvent, b: NoteEvent): number {
  return a.pitchValue - b.pitchValue;
}

export function notesEqual(a: NoteEvent, b: NoteEvent): boolean {
  return a.pitchValue === b.pitchValue;
}
