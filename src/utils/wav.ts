export const WAV_HEADER_BYTES = 44;
const PCM_FORMAT_TAG = 1;

export interface WavFormat {
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
}

export interface WavInfo extends WavFormat {
  /** Sample frames (one sample per channel). */
  frameCount: number;
  dataSize: number;
}

export function createWav(pcm: Buffer, format: WavFormat): Buffer {
  const { channels, sampleRate, bitsPerSample } = format;
  if (!Number.isFinite(sampleRate) || sampleRate <= 0) {
    throw new Error(`invalid sampleRate: ${sampleRate}`);
  }
  const blockAlign = channels * (bitsPerSample / 8);
  const byteRate = sampleRate * blockAlign;
  const dataSize = pcm.length - (pcm.length % blockAlign);

  const header = Buffer.alloc(WAV_HEADER_BYTES);
  header.write('RIFF', 0);
  header.writeUInt32LE(36 + dataSize, 4);
  header.write('WAVE', 8);
  header.write('fmt ', 12);
  header.writeUInt32LE(16, 16); // PCM header size
  header.writeUInt16LE(PCM_FORMAT_TAG, 20);
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  header.write('data', 36);
  header.writeUInt32LE(dataSize, 40);

  return Buffer.concat([header, pcm.subarray(0, dataSize)]);
}

export function readWavInfo(buffer: Buffer): WavInfo {
  if (buffer.length < 12 || buffer.toString('ascii', 0, 4) !== 'RIFF' || buffer.toString('ascii', 8, 12) !== 'WAVE') {
    throw new Error('not a RIFF/WAVE buffer');
  }
  let offset = 12;
  let format: WavFormat | undefined;
  let dataSize: number | undefined;

  while (offset + 8 <= buffer.length) {
    const id = buffer.toString('ascii', offset, offset + 4);
    const size = buffer.readUInt32LE(offset + 4);
    if (id === 'fmt ' && size >= 16) {
      format = {
        channels: buffer.readUInt16LE(offset + 10),
        sampleRate: buffer.readUInt32LE(offset + 12),
        bitsPerSample: buffer.readUInt16LE(offset + 22),
      };
    } else if (id === 'data') {
      // Streaming writers leave the size unset; trust what's actually there.
      dataSize = Math.min(size, buffer.length - offset - 8);
      break;
    }
    offset += 8 + size + (size % 2); // pad byte for odd sizes
  }

  if (!format || dataSize === undefined) {
    throw new Error('WAV buffer is missing its fmt or data chunk');
  }
  const blockAlign = format.channels * (format.bitsPerSample / 8);
  return {
    ...format,
    dataSize,
    frameCount: blockAlign > 0 ? Math.floor(dataSize / blockAlign) : 0,
  };
}
