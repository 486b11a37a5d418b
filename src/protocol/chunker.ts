export interface Chunk {
  bytes: Buffer;
  isFinal: boolean;
}

/**
 * Lazily slices `data` into `chunkSize` segments. The last segment holds the remainder
 * (possibly empty, possibly a full `chunkSize`) and is the only one flagged final, so even
 * an empty buffer yields exactly one chunk.
 */
export function* sliceSegments(data: Buffer, chunkSize: number): Generator<Chunk, void, undefined> {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`chunkSize must be a positive integer (got ${chunkSize})`);
  }
  let offset = 0;
  while (offset + chunkSize < data.length) {
    yield { bytes: data.subarray(offset, offset + chunkSize), isFinal: false };
    offset += chunkSize;
  }
  yield { bytes: data.subarray(offset), isFinal: true };
}

/** Bytes per segment for PCM of the given format and target duration. */
export function segmentSizeFor(
  format: { channels: number; bitsPerSample: number; sampleRate: number },
  segmentDurationMs: number
): number {
  const bytesPerSecond = format.channels * (format.bitsPerSample / 8) * format.sampleRate;
  return Math.floor((bytesPerSecond * segmentDurationMs) / 1000);
}
