/**
 * ABC Notation Parser
 * Parses a constrained ABC dialect into an ordered list of resolved events.
 *
 * Supported:
 * - Header fields (X, T, ..., K), one per line
 * - Notes with accidentals (^ = _), one octave mark (, or ') and a single-digit length
 * - Rests (z, x in either case)
 * - Ties (-) between notes of the same name
 * - Chords ([CEG]) including a length after the closing bracket ([CEG]2)
 * - Key signature C with an explicit accidental list (K:C ^F _B)
 *
 * Everything else in the body (bar lines, decorations, chord symbols,
 * lyrics) is stripped before tokenizing.
 */

import type {
  AbcDocument,
  Accidental,
  InformationField,
  MusicEvent,
  ParseDiagnostic,
  ParseOptions,
} from '../types';
import { AbcParseError } from '../errors';
import { accidentalFromMark, createNote, createRest, isAccidentalMark } from '../pitch';
import { createDocument } from '../document';

// ============================================================
// Types
// ============================================================

export interface AbcLines {
  fields: InformationField[];
  body: string;
}

export interface EventToken {
  event: MusicEvent;
  chordStart: boolean;
  chordEnd: boolean;
  /** Digit written after a closing bracket, as in `[CEG]2` */
  chordLength?: number;
  tie: boolean;
}

// ============================================================
// Constants
// ============================================================

const DEFAULT_OPTIONS: Required<ParseOptions> = {
  requireMarker: true,
};

const FILE_MARKER = '%abc';

const FIELD_PATTERN = /^([A-Za-z]):(.*)/;

// [?  accidentals  letter  octave?  length?  (] chord-length?)?  -?
const EVENT_PATTERN = /(\[?)([\^=_]*)([A-Za-z][,']?)([0-9]?)(?:(\])([0-9]?))?(-?)/g;

const REST_LETTERS = new Set(['z', 'x']);

// ============================================================
// Line Reading
// ============================================================

/**
 * Split ABC text into header fields and body text.
 * The header ends at the first non-blank line that is not a field.
 */
export function readAbcLines(text: string, options: ParseOptions = {}): AbcLines {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  if (text.trim() === '') {
    throw new AbcParseError('EMPTY_INPUT', 'File is empty');
  }

  const lines = text.split(/\r?\n/);
  let index = 0;
  if (lines[0]?.trim() === FILE_MARKER) {
    index = 1;
  } else if (opts.requireMarker) {
    throw new AbcParseError(
      'MISSING_MARKER',
      `File does not appear to be an abc notation file (missing ${FILE_MARKER} header)`
    );
  }

  const fields: InformationField[] = [];
  for (; index < lines.length; index++) {
    const line = lines[index].trim();
    if (line === '') continue;
    const fieldMatch = line.match(FIELD_PATTERN);
    if (!fieldMatch) break;
    fields.push({ key: fieldMatch[1].toUpperCase(), value: fieldMatch[2] });
  }

  const body = lines.slice(index).map(l => l.trim()).join('');
  return { fields, body };
}

// ============================================================
// Tokenizer
// ============================================================

/**
 * Remove everything but pitches, lengths, ties and chords from a body.
 * A tie left in front of a space (where a decoration was) is joined to the next token.
 */
export function stripDecorations(body: string): string {
  return body
    .replace(/[^a-zA-Z0-9\s/\-^_,'=[\]]/g, '')
    .replace(/\s+/g, ' ')
    .replace(/- /g, '-');
}

function parseLength(digit: string | undefined): number | undefined {
  return digit ? parseInt(digit, 10) : undefined;
}

/**
 * Scan a cleaned body into event tokens. Characters that do not form an
 * event are skipped.
 */
export function tokenizeEvents(body: string): EventToken[] {
  const tokens: EventToken[] = [];

  for (const match of body.matchAll(EVENT_PATTERN)) {
    const [, chordStart, marks, name, length, chordEnd, chordLength, tie] = match;

    // Only the mark nearest the letter counts
    const mark = marks.slice(-1);
    const accidental: Accidental | undefined = isAccidentalMark(mark) ? accidentalFromMark(mark) : undefined;
    const duration = parseLength(length) ?? 1;

    const event = REST_LETTERS.has(name[0].toLowerCase())
      ? createRest(duration)
      : createNote(name, accidental, duration);

    const token: EventToken = {
      event,
      chordStart: chordStart === '[',
      chordEnd: chordEnd === ']',
      tie: tie === '-',
    };
    const parsedChordLength = parseLength(chordLength);
    if (parsedChordLength !== undefined) token.chordLength = parsedChordLength;
    tokens.push(token);
  }

  return tokens;
}

// ============================================================
// Tie / Chord Folding
// ============================================================

function eventName(event: MusicEvent): string {
  return event.type === 'note' ? event.name : 'rest';
}

/**
 * Fold ties and chords over the token stream.
 *
 * A tie merges the next event into the previous one when both have the same
 * name. Inside a chord every member after the first has its duration zeroed,
 * so only the leading member advances the timeline.
 */
export function foldEvents(tokens: EventToken[]): { events: MusicEvent[]; diagnostics: ParseDiagnostic[] } {
  const events: MusicEvent[] = [];
  const diagnostics: ParseDiagnostic[] = [];
  let pendingTie = false;
  let inChord = false;
  let chordLeader: MusicEvent | undefined;

  for (const token of tokens) {
    events.push(token.event);

    if (pendingTie) {
      const previous = events[events.length - 2];
      const current = token.event;
      if (previous && eventName(previous) === eventName(current)) {
        previous.duration += current.duration;
        events.pop();
      } else {
        diagnostics.push({
          code: 'TIE_NAME_MISMATCH',
          level: 'warning',
          message: `Tie from ${previous ? eventName(previous) : 'nothing'} to ${eventName(current)} was ignored`,
          eventIndex: events.length - 1,
        });
      }
    }

    pendingTie = token.tie;

    const last = events[events.length - 1];
    if (inChord) {
      last.duration = 0;
      inChord = !token.chordEnd;
      if (token.chordEnd && token.chordLength !== undefined && chordLeader) {
        chordLeader.duration *= token.chordLength;
      }
    } else {
      inChord = token.chordStart;
      chordLeader = inChord ? last : undefined;
    }
  }

  if (pendingTie) {
    diagnostics.push({
      code: 'DANGLING_TIE',
      level: 'info',
      message: 'Tie on the last event has nothing to join',
      eventIndex: events.length - 1,
    });
  }
  if (inChord) {
    diagnostics.push({
      code: 'UNCLOSED_CHORD',
      level: 'warning',
      message: 'Chord is not closed before the end of the tune',
      eventIndex: chordLeader ? events.indexOf(chordLeader) : undefined,
    });
  }

  return { events, diagnostics };
}

// ============================================================
// Main Parse Function
// ============================================================

/**
 * Build a document from an already split header and raw body text
 */
export function parseAbcBody(fields: InformationField[], body: string): AbcDocument {
  const tokens = tokenizeEvents(stripDecorations(body));
  const { events, diagnostics } = foldEvents(tokens);
  return createDocument(fields, events, diagnostics);
}

/**
 * Parse ABC notation text into a document of resolved events
 * @param abcString - Text beginning with the `%abc` marker line
 * @throws AbcParseError when the input, header or key signature is malformed
 */
export function parseAbc(abcString: string, options: ParseOptions = {}): AbcDocument {
  const { fields, body } = readAbcLines(abcString, options);
  return parseAbcBody(fields, body);
}
