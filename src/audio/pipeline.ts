import { logger } from '../logger.js';
import { RecognitionError, errorMessage } from '../errors.js';
import { WAV_HEADER_BYTES, createWav, type WavFormat } from '../utils/wav.js';
import { OPUS_FRAME_SAMPLES, type PacketDecoder } from './opusDecoder.js';

export const CONTAINER_FORMAT = {
  channels: 1,
  sampleRate: 16000,
  bitsPerSample: 16,
} as const satisfies WavFormat;

export interface AudioContainer {
  readonly wav: Buffer;
  readonly format: typeof CONTAINER_FORMAT;
  readonly pcmBytes: number;
}

export interface DecodeOptions {
  frameSize?: number;
  /** Called for each packet that was skipped. */
  onSkip?: (error: RecognitionError, index: number) => void;
}

/**
 * Best-effort decode: a packet the codec rejects is logged and dropped, the rest keep their order.
 * Dropped packets leave a gap rather than silence in the output.
 */
export function decodePackets(
  packets: readonly Buffer[],
  decoder: PacketDecoder,
  options: DecodeOptions = {}
): Buffer[] {
  const frameSize = options.frameSize ?? OPUS_FRAME_SAMPLES;
  const frames: Buffer[] = [];
  packets.forEach((packet, index) => {
    try {
      frames.push(decoder.decode(packet, frameSize));
    } catch (err) {
      const error = new RecognitionError('codec', `opus packet ${index} failed to decode: ${errorMessage(err)}`, {
        cause: err,
      });
      logger.error({ event: 'opus_decode_failed', index, bytes: packet.length, message: error.message });
      options.onSkip?.(error, index);
    }
  });
  return frames;
}

export function buildContainer(frames: readonly Buffer[]): AudioContainer {
  const pcm = Buffer.concat(frames);
  const wav = createWav(pcm, CONTAINER_FORMAT);
  return { wav, format: CONTAINER_FORMAT, pcmBytes: wav.length - WAV_HEADER_BYTES };
}

export function prepareAudio(packets: readonly Buffer[], decoder: PacketDecoder, options?: DecodeOptions): AudioContainer {
  return buildContainer(decodePackets(packets, decoder, options));
}
