import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { Logger } from 'pino';
import { logger } from '../logger.js';
import { createOpusDecoder, type PacketDecoder } from '../audio/opusDecoder.js';
import { prepareAudio, type AudioContainer } from '../audio/pipeline.js';
import { segmentSizeFor, sliceSegments } from '../protocol/chunker.js';
import { decodeFrame, encodeRequestFrame, MessageType, SequenceFlag, type DecodedResponse } from '../protocol/frame.js';
import { connectWebSocket, type FrameTransport, type TransportFactory } from '../transport/wsTransport.js';
import { readWavInfo } from '../utils/wav.js';
import type {
  RecognitionOutcome,
  RecognizeOptions,
  RecognizerConfig,
  SessionRequestConfig,
  SessionState,
} from '../types.js';
import { saveContainer } from './archive.js';
import { RecognitionError, errorMessage, toRecognitionError } from '../errors.js';

type StepResult<T> = { ok: true; value: T } | { ok: false; error: RecognitionError };

// The status code decides the outcome on its own; the other fields are read leniently.
const serviceStatusSchema = z
  .object({
    code: z.number(),
    message: z.string().nullish().catch(undefined),
  })
  .passthrough();

// Absent or empty means no speech; anything else that is not a list of texts is malformed.
const resultListSchema = z.object({
  result: z.array(z.object({ text: z.string() }).passthrough()).optional(),
});

type ServiceStatus = z.infer<typeof serviceStatusSchema>;

export interface RecognizerDeps {
  connect?: TransportFactory;
  createDecoder?: () => PacketDecoder;
}

export function buildSessionRequest(config: RecognizerConfig, container: AudioContainer): SessionRequestConfig {
  return {
    app: {
      appid: config.appId,
      cluster: config.cluster,
      token: config.accessToken,
    },
    user: {
      uid: randomUUID(),
    },
    request: {
      reqid: randomUUID(),
      show_utterances: false,
      sequence: 1,
    },
    audio: {
      format: 'wav',
      rate: container.format.sampleRate,
      language: config.language,
      bits: container.format.bitsPerSample,
      channel: container.format.channels,
      codec: 'raw',
    },
  };
}

function readStatus(response: DecodedResponse): ServiceStatus | null {
  if (response.payload.kind !== 'json') return null;
  const parsed = serviceStatusSchema.safeParse(response.payload.value);
  return parsed.success ? parsed.data : null;
}

function describeRemoteFailure(response: DecodedResponse, status: ServiceStatus | null): RecognitionError {
  if (response.messageType === MessageType.ErrorResponse) {
    const detail = response.payload.kind === 'text' ? `: ${response.payload.value}` : status?.message ? `: ${status.message}` : '';
    return new RecognitionError('remote', `service returned error frame ${response.errorCode ?? 'unknown'}${detail}`, {
      code: response.errorCode,
    });
  }
  if (!status) {
    return new RecognitionError('remote', `service response (type ${response.messageType}) carries no status`);
  }
  return new RecognitionError('remote', `service returned code ${status.code}${status.message ? `: ${status.message}` : ''}`, {
    code: status.code,
  });
}

/**
 * Runs recognition sessions against the framed WebSocket ASR service:
 * connect → send config → check handshake → stream WAV segments → read the consolidated result.
 * One transport per call, always closed before `recognize` resolves.
 */
export class SpeechRecognizer {
  private readonly connect: TransportFactory;
  private readonly createDecoder: () => PacketDecoder;

  constructor(
    private readonly config: RecognizerConfig,
    deps: RecognizerDeps = {}
  ) {
    if (config.segmentDurationMs <= 0) {
      throw new RangeError(`segmentDurationMs must be positive (got ${config.segmentDurationMs})`);
    }
    this.connect = deps.connect ?? connectWebSocket;
    this.createDecoder = deps.createDecoder ?? createOpusDecoder;
  }

  async recognize(packets: readonly Buffer[], options: RecognizeOptions = {}): Promise<RecognitionOutcome> {
    const sessionId = options.sessionId ?? randomUUID();
    const log = logger.child({ sessionId });
    const startedAt = Date.now();
    let state: SessionState = 'idle';
    let transport: FrameTransport | null = null;

    const fail = (error: RecognitionError): RecognitionOutcome => {
      const tagged = error.inState(state);
      log.error({
        event: 'asr_session_failed',
        state: tagged.state,
        kind: tagged.kind,
        code: tagged.code,
        message: tagged.message,
      });
      state = 'failed';
      return { error: tagged };
    };

    try {
      const audio = await this.step(() => this.prepare(packets, sessionId, log));
      if (!audio.ok) return fail(audio.error);
      const container = audio.value;

      const connected = await this.step(() => this.open(options.signal), 'connection');
      if (!connected.ok) return fail(connected.error);
      const live = connected.value;
      transport = live;
      state = 'connected';

      const configSent = await this.step(() => this.sendConfig(live, container));
      if (!configSent.ok) return fail(configSent.error);
      state = 'config_sent';

      const handshake = await this.step(() => this.checkHandshake(live));
      if (!handshake.ok) return fail(handshake.error);
      state = 'streaming';

      const streamed = await this.step(() => this.streamAudio(live, container));
      if (!streamed.ok) return fail(streamed.error);
      state = 'awaiting_result';
      log.debug({ event: 'asr_audio_sent', segments: streamed.value, bytes: container.wav.length });

      const result = await this.step(() => this.awaitResult(live));
      if (!result.ok) return fail(result.error);
      state = 'done';

      log.debug({
        event: 'asr_session_done',
        elapsedMs: Date.now() - startedAt,
        text: result.value,
      });
      return result.value === undefined ? {} : { text: result.value };
    } finally {
      if (transport) {
        await transport.close().catch((err: unknown) => {
          log.warn({ event: 'asr_transport_close_failed', message: errorMessage(err) });
        });
      }
    }
  }

  /** Typed errors pass through; anything else is attributed to `fallback` (unknown by default). */
  private async step<T>(
    run: () => Promise<T>,
    fallback: RecognitionError['kind'] = 'unknown'
  ): Promise<StepResult<T>> {
    try {
      return { ok: true, value: await run() };
    } catch (err) {
      return { ok: false, error: toRecognitionError(err, fallback) };
    }
  }

  private async prepare(packets: readonly Buffer[], sessionId: string, log: Logger): Promise<AudioContainer> {
    const decoder = this.createDecoder();
    let skipped = 0;
    const container = (() => {
      try {
        return prepareAudio(packets, decoder, { onSkip: () => (skipped += 1) });
      } finally {
        decoder.release?.();
      }
    })();
    log.debug({ event: 'asr_audio_prepared', packets: packets.length, skipped, pcmBytes: container.pcmBytes });
    if (this.config.outputDir) {
      await saveContainer(this.config.outputDir, sessionId, container.wav).then(
        (filePath) => log.debug({ event: 'asr_audio_archived', filePath }),
        (err: unknown) => log.warn({ event: 'asr_audio_archive_failed', message: errorMessage(err) })
      );
    }
    return container;
  }

  private open(signal?: AbortSignal): Promise<FrameTransport> {
    return this.connect(this.config.url, {
      headers: { Authorization: `Bearer; ${this.config.accessToken}` },
      connectTimeoutMs: this.config.connectTimeoutMs,
      signal,
    });
  }

  private async send(transport: FrameTransport, frame: Buffer): Promise<void> {
    try {
      await transport.send(frame);
    } catch (err) {
      throw toRecognitionError(err, 'transport');
    }
  }

  private async receive(transport: FrameTransport): Promise<DecodedResponse> {
    let raw: Buffer;
    try {
      raw = await transport.receive(this.config.receiveTimeoutMs);
    } catch (err) {
      throw toRecognitionError(err, 'transport');
    }
    return decodeFrame(raw);
  }

  private async sendConfig(transport: FrameTransport, container: AudioContainer): Promise<void> {
    const request = buildSessionRequest(this.config, container);
    const payload = Buffer.from(JSON.stringify(request), 'utf-8');
    await this.send(transport, encodeRequestFrame(MessageType.FullRequest, SequenceFlag.None, payload));
  }

  /** A handshake reply without a status document is accepted. */
  private async checkHandshake(transport: FrameTransport): Promise<void> {
    const response = await this.receive(transport);
    const status = readStatus(response);
    if (response.messageType === MessageType.ErrorResponse) {
      throw describeRemoteFailure(response, status);
    }
    if (status && status.code !== this.config.successCode) {
      throw describeRemoteFailure(response, status);
    }
  }

  /** Sends the whole container in order; resolves with the number of segments sent. */
  private async streamAudio(transport: FrameTransport, container: AudioContainer): Promise<number> {
    const info = readWavInfo(container.wav);
    const segmentSize = segmentSizeFor(info, this.config.segmentDurationMs);
    if (segmentSize <= 0) {
      throw new RecognitionError('unknown', `segment size resolved to ${segmentSize} bytes`);
    }
    let sent = 0;
    for (const chunk of sliceSegments(container.wav, segmentSize)) {
      const flag = chunk.isFinal ? SequenceFlag.FinalSegment : SequenceFlag.None;
      await this.send(transport, encodeRequestFrame(MessageType.AudioOnlyRequest, flag, chunk.bytes));
      sent += 1;
    }
    return sent;
  }

  /** Resolves with the first result's text, or undefined when the service heard no speech. */
  private async awaitResult(transport: FrameTransport): Promise<string | undefined> {
    const response = await this.receive(transport);
    const status = readStatus(response);
    if (response.messageType === MessageType.ErrorResponse || !status || status.code !== this.config.successCode) {
      throw describeRemoteFailure(response, status);
    }
    const results = resultListSchema.safeParse(response.payload.kind === 'json' ? response.payload.value : {});
    if (!results.success) {
      throw new RecognitionError('decode', `service returned code ${status.code} with a malformed result list`, {
        code: status.code,
      });
    }
    const [first] = results.data.result ?? [];
    return first?.text || undefined;
  }
}
