import type { Accidental, MusicEvent } from './types';
import { AbcParseError } from './errors';
import { accidentalFromMark, isAccidentalMark, setAccidental } from './pitch';

// ============================================================
// Key Signature Parsing
// ============================================================

export interface KeyAccidental {
  /** Lowercase letter a-g */
  letter: string;
  accidental: Accidental;
}

/**
 * Parse a `K:` value of the form `C ^F _B`.
 * Only `C` with an explicit accidental list is supported.
 */
export function parseKeySignature(value: string | undefined): KeyAccidental[] {
  const tokens = (value ?? '').trim().split(/\s+/);
  if (tokens[0] !== 'C') {
    throw new AbcParseError(
      'KEY_SIGNATURE_UNSUPPORTED',
      'Key signature must be present and must be C with accidentals',
      { value }
    );
  }

  const result: KeyAccidental[] = [];
  for (const token of tokens.slice(1)) {
    const mark = token[0];
    const letter = token[1];
    if (token.length !== 2 || mark === undefined || !isAccidentalMark(mark) || letter === undefined || !/[A-Ga-g]/.test(letter)) {
      throw new AbcParseError(
        'KEY_SIGNATURE_UNSUPPORTED',
        `Key signature accidental "${token}" must be one of ^ = _ followed by a note letter`,
        { value, token }
      );
    }
    result.push({ letter: letter.toLowerCase(), accidental: accidentalFromMark(mark) });
  }
  return result;
}

// ============================================================
// Propagation
// ============================================================

/**
 * Apply the key's accidentals to every note of a matching letter, in any
 * octave, that has no accidental of its own. Notes are rewritten in place.
 * @returns Number of notes that received an accidental
 */
export function propagateKeySignature(events: MusicEvent[], keyValue: string | undefined): number {
  let applied = 0;
  for (const { letter, accidental } of parseKeySignature(keyValue)) {
    for (const event of events) {
      if (event.type !== 'note' || event.accidental !== undefined) continue;
      if (event.name[0]?.toLowerCase() !== letter) continue;
      setAccidental(event, accidental);
      applied++;
    }
  }
  return applied;
}
