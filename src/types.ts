import type { RecognitionError } from './errors.js';

export const SESSION_STATES = [
  'idle',
  'connected',
  'config_sent',
  'streaming',
  'awaiting_result',
  'done',
  'failed',
] as const;

export type SessionState = (typeof SESSION_STATES)[number];

export interface AppConfig {
  service: {
    host: string;
    path: string;
    successCode: number;
  };
  session: {
    segmentDurationMs: number;
    receiveTimeoutMs: number;
    connectTimeoutMs: number;
  };
  audio: {
    language: string;
  };
  archive: {
    outputDir?: string;
  };
}

export interface ServiceCredentials {
  appId: string;
  cluster: string;
  accessToken: string;
}

/**
 * Everything a recognizer needs for its lifetime. Built once from config + credentials
 * and frozen; sessions never mutate it.
 */
export interface RecognizerConfig extends ServiceCredentials {
  readonly url: string;
  readonly successCode: number;
  readonly segmentDurationMs: number;
  readonly receiveTimeoutMs: number;
  readonly connectTimeoutMs: number;
  readonly language: string;
  readonly outputDir?: string;
}

export interface SessionRequestConfig {
  app: {
    appid: string;
    cluster: string;
    token: string;
  };
  user: {
    uid: string;
  };
  request: {
    reqid: string;
    show_utterances: boolean;
    sequence: number;
  };
  audio: {
    format: 'wav';
    rate: number;
    language: string;
    bits: number;
    channel: number;
    codec: 'raw';
  };
}

export interface RecognizeOptions {
  /** Used for log correlation and archive file names; a random UUID when omitted. */
  sessionId?: string;
  /** Aborting tears down the connection; the session then fails with a transport error. */
  signal?: AbortSignal;
}

/**
 * `{}` means the service heard no speech. `text` and `error` are never both set.
 */
export interface RecognitionOutcome {
  text?: string;
  error?: RecognitionError;
}
