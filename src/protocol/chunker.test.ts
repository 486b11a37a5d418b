import { describe, expect, it } from 'vitest';
import { segmentSizeFor, sliceSegments } from './chunker.js';

const bytes = (length: number) => Buffer.from(Array.from({ length }, (_, i) => i % 256));

describe('sliceSegments', () => {
  it('splits an exact multiple into k full chunks, the last one final', () => {
    const data = bytes(12);
    const chunks = [...sliceSegments(data, 4)];

    expect(chunks.map((chunk) => chunk.bytes.length)).toEqual([4, 4, 4]);
    expect(chunks.map((chunk) => chunk.isFinal)).toEqual([false, false, true]);
    expect(Buffer.concat(chunks.map((chunk) => chunk.bytes)).equals(data)).toBe(true);
  });

  it('puts the remainder in the final chunk', () => {
    const chunks = [...sliceSegments(bytes(10), 4)];
    expect(chunks.map((chunk) => chunk.bytes.length)).toEqual([4, 4, 2]);
    expect(chunks.map((chunk) => chunk.isFinal)).toEqual([false, false, true]);
  });

  it('yields a single final chunk when the data fits', () => {
    expect([...sliceSegments(bytes(3), 4)].map((c) => [c.bytes.length, c.isFinal])).toEqual([[3, true]]);
    expect([...sliceSegments(bytes(4), 4)].map((c) => [c.bytes.length, c.isFinal])).toEqual([[4, true]]);
  });

  it('yields one empty final chunk for empty input', () => {
    const chunks = [...sliceSegments(Buffer.alloc(0), 4)];
    expect(chunks).toHaveLength(1);
    expect(chunks[0].bytes.length).toBe(0);
    expect(chunks[0].isFinal).toBe(true);
  });

  it('is lazy', () => {
    const segments = sliceSegments(bytes(9), 4);
    expect(segments.next().value?.bytes.length).toBe(4);
    expect(segments.next().value?.isFinal).toBe(false);
    expect(segments.next().value?.isFinal).toBe(true);
    expect(segments.next().done).toBe(true);
  });

  it.each([0, -4, 1.5])('rejects chunk size %d', (size) => {
    expect(() => [...sliceSegments(bytes(4), size)]).toThrow(RangeError);
  });
});

describe('segmentSizeFor', () => {
  it('sizes a 15 s segment of 16 kHz mono 16-bit audio', () => {
    expect(segmentSizeFor({ channels: 1, bitsPerSample: 16, sampleRate: 16000 }, 15_000)).toBe(480_000);
  });

  it('rounds down fractional sizes', () => {
    expect(segmentSizeFor({ channels: 1, bitsPerSample: 16, sampleRate: 16000 }, 0.01)).toBe(0);
    expect(segmentSizeFor({ channels: 2, bitsPerSample: 16, sampleRate: 22050 }, 10)).toBe(882);
  });
});
