import type {
  AbcDocument,
  InformationField,
  MusicEvent,
  NoteEvent,
  RestEvent,
} from '../types';
import { compareNotes } from '../pitch';

/**
 * Get all notes in event order
 */
export function getNotes(doc: AbcDocument): NoteEvent[] {
  return doc.events.filter((e): e is NoteEvent => e.type === 'note');
}

/**
 * Get all rests in event order
 */
export function getRests(doc: AbcDocument): RestEvent[] {
  return doc.events.filter((e): e is RestEvent => e.type === 'rest');
}

/**
 * Get the first header field with the given key
 */
export function getField(doc: AbcDocument, key: string): InformationField | undefined {
  const upper = key.toUpperCase();
  return doc.fields.find((f) => f.key === upper);
}

export function lowestNote(doc: AbcDocument): NoteEvent | undefined {
  return getNotes(doc).reduce<NoteEvent | undefined>(
    (low, note) => (low === undefined || compareNotes(note, low) < 0 ? note : low),
    undefined
  );
}

export function highestNote(doc: AbcDocument): NoteEvent | undefined {
  return getNotes(doc).reduce<NoteEvent | undefined>(
    (high, note) => (high === undefined || compareNotes(note, high) > 0 ? note : high),
    undefined
  );
}

/**
 * Number of pitch steps spanned by the tune, both ends included.
 * Returns 0 when there are no notes.
 */
export function pitchRange(doc: AbcDocument): number {
  const low = lowestNote(doc);
  const high = highestNote(doc);
  if (!low || !high) return 0;
  return high.pitchValue - low.pitchValue + 1;
}

/**
 * Total length of the tune in beats. Chord members after the first
 * carry no duration and add nothing.
 */
export function totalDuration(events: MusicEvent[]): number {
  return events.reduce((sum, e) => sum + e.duration, 0);
}

/**
 * Copy of the events without leading and trailing rests
 */
export function trimRests(events: MusicEvent[]): MusicEvent[] {
  let start = 0;
  let end = events.length;
  while (start < end && events[start].type === 'rest') start++;
  while (end > start && events[end - 1].type === 'rest') end--;
  return events.slice(start, end);
}
