import { describe, it, expect } from 'vitest';
import {
  pitchValue,
  accidentalFromMark,
  isAccidentalMark,
  createNote,
  createRest,
  setAccidental,
  compareNotes,
  notesEqual,
  AbcParseError,
} from '../src';

const sharp = accidentalFromMark('^');
const flat = accidentalFromMark('_');
const natural = accidentalFromMark('=');

describe('Pitch Model', () => {
  describe('accidentals', () => {
    it('should map marks to semitone deltas', () => {
      expect(sharp).toEqual({ kind: 'sharp', mark: '^', semitones: 1 });
      expect(flat).toEqual({ kind: 'flat', mark: '_', semitones: -1 });
      expect(natural).toEqual({ kind: 'natural', mark: '=', semitones: 0 });
    });

    it('should share frozen instances', () => {
      expect(accidentalFromMark('^')).toBe(sharp);
      expect(Object.isFrozen(sharp)).toBe(true);
    });

    it('should recognize only accidental marks', () => {
      expect(['^', '=', '_', '-', '', '^^'].map(isAccidentalMark)).toEqual([true, true, true, false, false, false]);
    });
  });

  describe('pitchValue', () => {
    it('should return the base table value for every letter', () => {
      const letters = 'CDEFGABcdefgab'.split('');
      expect(letters.map(l => pitchValue(l))).toEqual([40, 42, 44, 45, 47, 49, 51, 52, 54, 56, 57, 59, 61, 63]);
    });

    it('should move by an octave for each mark', () => {
      expect(pitchValue("G'")).toBe(59);
      expect(pitchValue("G''")).toBe(71);
      expect(pitchValue('G,')).toBe(35);
      expect(pitchValue('G,,')).toBe(23);
      expect(pitchValue("G,'")).toBe(47);
    });

    it('should add the accidental delta', () => {
      expect(pitchValue('F', sharp)).toBe(46);
      expect(pitchValue('F', flat)).toBe(44);
      expect(pitchValue('F', natural)).toBe(45);
      expect(pitchValue("b'", sharp)).toBe(76);
    });

    it('should reject letters outside the table', () => {
      expect(() => pitchValue('H')).toThrow(AbcParseError);
      expect(() => pitchValue('')).toThrow(AbcParseError);
    });
  });

  describe('events', () => {
    it('should create notes with a pitch value and default length', () => {
      const note = createNote('d');
      expect(note).toMatchObject({ type: 'note', name: 'd', duration: 1, pitchValue: 54 });
      expect(note.accidental).toBeUndefined();
    });

    it('should create rests', () => {
      expect(createRest(3)).toMatchObject({ type: 'rest', duration: 3 });
    });

    it('should recompute pitch when the accidental changes', () => {
      const note = createNote('B', natural, 2);
      setAccidental(note, flat);
      expect(note.pitchValue).toBe(50);
      setAccidental(note, flat);
      expect(note.pitchValue).toBe(50);
      expect(note.accidental).toBe(flat);
      expect(note.duration).toBe(2);
    });
  });

  describe('ordering', () => {
    it('should treat enharmonic spellings as equal', () => {
      const eSharp = createNote('E', sharp);
      const f = createNote('F');
      expect(notesEqual(eSharp, f)).toBe(true);
      expect(compareNotes(eSharp, f)).toBe(0);
    });

    it('should sort by pitch value only', () => {
      const notes = [createNote('c'), createNote('C', sharp), createNote('B,'), createNote('C')];
      const sorted = [...notes].sort(compareNotes);
      expect(sorted.map(n => n.pitchValue)).toEqual([39, 40, 41, 52]);
    });
  });
});
