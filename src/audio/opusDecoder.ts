import OpusScript from 'opusscript';

export const OPUS_SAMPLE_RATE = 16000;
export const OPUS_CHANNELS = 1;
/** 60 ms at 16 kHz. */
export const OPUS_FRAME_SAMPLES = 960;

const BYTES_PER_SAMPLE = 2;

/** Decode-only codec seam. Implementations return PCM16LE for one packet or throw. */
export interface PacketDecoder {
  decode(packet: Buffer, frameSize: number): Buffer;
  release?(): void;
}

export class OpusPacketDecoder implements PacketDecoder {
  private readonly codec: OpusScript;

  constructor() {
    this.codec = new OpusScript(OPUS_SAMPLE_RATE, OPUS_CHANNELS, OpusScript.Application.VOIP);
  }

  decode(packet: Buffer, frameSize: number): Buffer {
    if (packet.length === 0) {
      throw new Error('empty opus packet');
    }
    const decoded = this.codec.decode(packet);
    const maxBytes = frameSize * OPUS_CHANNELS * BYTES_PER_SAMPLE;
    if (decoded.length > maxBytes) {
      throw new Error(`opus packet decodes to ${decoded.length} bytes, frame allows ${maxBytes}`);
    }
    // The codec hands back a view into its own heap; copy before the next decode overwrites it.
    return Buffer.from(decoded);
  }

  release(): void {
    this.codec.delete();
  }
}

export function createOpusDecoder(): PacketDecoder {
  return new OpusPacketDecoder();
}
