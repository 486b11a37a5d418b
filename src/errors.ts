import type { SessionState } from './types.js';

export type RecognitionErrorKind = 'connection' | 'transport' | 'decode' | 'remote' | 'codec' | 'unknown';

interface RecognitionErrorOptions {
  cause?: unknown;
  state?: SessionState;
  /** Status or error code reported by the service. */
  code?: number;
}

export class RecognitionError extends Error {
  readonly kind: RecognitionErrorKind;
  readonly state?: SessionState;
  readonly code?: number;

  constructor(kind: RecognitionErrorKind, message: string, options: RecognitionErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'RecognitionError';
    this.kind = kind;
    this.state = options.state;
    this.code = options.code;
  }

  /** Returns a copy tagged with the state it surfaced in, keeping an existing tag. */
  inState(state: SessionState): RecognitionError {
    if (this.state) return this;
    return new RecognitionError(this.kind, this.message, { cause: this.cause, code: this.code, state });
  }
}

export function isRecognitionError(error: unknown): error is RecognitionError {
  return error instanceof RecognitionError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Classifies a thrown value: typed errors pass through, anything else becomes `fallback`. */
export function toRecognitionError(
  error: unknown,
  fallback: RecognitionErrorKind,
  state?: SessionState
): RecognitionError {
  if (isRecognitionError(error)) {
    return state ? error.inState(state) : error;
  }
  return new RecognitionError(fallback, errorMessage(error), { cause: error, state });
}
