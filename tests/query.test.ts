import { describe, it, expect } from 'vitest';
import {
  parseAbc,
  getNotes,
  getRests,
  getField,
  lowestNote,
  highestNote,
  pitchRange,
  totalDuration,
  trimRests,
} from '../src';

const abc = ['%abc', 'X:1', 'T:Query', 'K:C', 'z2 C E [G c]2 z'].join('\n');

describe('Query Functions', () => {
  const doc = parseAbc(abc);

  it('should split notes and rests', () => {
    expect(getNotes(doc).map(n => n.name)).toEqual(['C', 'E', 'G', 'c']);
    expect(getRests(doc).map(r => r.duration)).toEqual([2, 1]);
  });

  it('should find header fields case-insensitively', () => {
    expect(getField(doc, 't')?.value).toBe('Query');
    expect(getField(doc, 'M')).toBeUndefined();
  });

  it('should find the lowest and highest notes', () => {
    expect(lowestNote(doc)?.name).toBe('C');
    expect(highestNote(doc)?.name).toBe('c');
    expect(pitchRange(doc)).toBe(13);
  });

  it('should count only leading chord members toward the length', () => {
    expect(totalDuration(doc.events)).toBe(7);
  });

  it('should trim leading and trailing rests', () => {
    const trimmed = trimRests(doc.events);
    expect(trimmed.map(e => e.type)).toEqual(['note', 'note', 'note', 'note']);
    expect(totalDuration(trimmed)).toBe(4);
    expect(doc.events).toHaveLength(6);
  });

  it('should handle a tune of rests', () => {
    const rests = parseAbc(['%abc', 'X:1', 'T:Silence', 'K:C', 'z z4'].join('\n'));
    expect(trimRests(rests.events)).toEqual([]);
    expect(lowestNote(rests)).toBeUndefined();
    expect(pitchRange(rests)).toBe(0);
  });
});
