import { WebSocket, type RawData } from 'ws';
import { logger } from '../logger.js';
import { RecognitionError, errorMessage } from '../errors.js';
import { withDeadline } from '../utils/abort.js';

const CLOSE_GRACE_MS = 2_000;

/** Message-framed duplex connection owned by exactly one session. */
export interface FrameTransport {
  send(frame: Buffer): Promise<void>;
  /** Next inbound message, in arrival order. Rejects on timeout, close or abort. */
  receive(timeoutMs: number): Promise<Buffer>;
  close(): Promise<void>;
}

export interface ConnectOptions {
  headers: Record<string, string>;
  connectTimeoutMs: number;
  signal?: AbortSignal;
}

export type TransportFactory = (url: string, options: ConnectOptions) => Promise<FrameTransport>;

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

type PendingReceive = {
  resolve: (frame: Buffer) => void;
  reject: (err: RecognitionError) => void;
};

export class WebSocketTransport implements FrameTransport {
  private readonly inbox: Buffer[] = [];
  private pending: PendingReceive | null = null;
  private failure: RecognitionError | null = null;

  constructor(
    private readonly ws: WebSocket,
    private readonly signal?: AbortSignal
  ) {
    ws.on('message', (data) => this.deliver(toBuffer(data)));
    ws.on('close', (code, reason) => {
      const detail = reason.length > 0 ? `: ${reason.toString()}` : '';
      this.fail(new RecognitionError('transport', `connection closed (${code}${detail})`));
    });
    ws.on('error', (err) => {
      this.fail(new RecognitionError('transport', `connection error: ${err.message}`, { cause: err }));
    });
    if (signal?.aborted) {
      this.onAbort();
    } else {
      signal?.addEventListener('abort', this.onAbort, { once: true });
    }
  }

  private readonly onAbort = () => {
    this.fail(new RecognitionError('transport', 'session aborted', { cause: this.signal?.reason }));
    this.ws.terminate();
  };

  private deliver(frame: Buffer) {
    if (this.pending) {
      const { resolve } = this.pending;
      this.pending = null;
      resolve(frame);
      return;
    }
    this.inbox.push(frame);
  }

  private fail(error: RecognitionError) {
    if (this.failure) return;
    this.failure = error;
    if (this.pending) {
      const { reject } = this.pending;
      this.pending = null;
      reject(error);
    }
  }

  async send(frame: Buffer): Promise<void> {
    if (this.failure) throw this.failure;
    if (this.ws.readyState !== WebSocket.OPEN) {
      throw new RecognitionError('transport', `cannot send: socket state ${this.ws.readyState}`);
    }
    await new Promise<void>((resolve, reject) => {
      this.ws.send(frame, { binary: true }, (err) => {
        if (err) {
          reject(new RecognitionError('transport', `send failed: ${err.message}`, { cause: err }));
          return;
        }
        resolve();
      });
    });
  }

  receive(timeoutMs: number): Promise<Buffer> {
    const queued = this.inbox.shift();
    if (queued) return Promise.resolve(queued);
    if (this.failure) return Promise.reject(this.failure);
    if (this.pending) {
      return Promise.reject(new RecognitionError('transport', 'a receive is already pending on this connection'));
    }

    const deadline = withDeadline(timeoutMs);
    return new Promise<Buffer>((resolve, reject) => {
      const onTimeout = () => {
        this.pending = null;
        reject(new RecognitionError('transport', `no frame received within ${timeoutMs} ms`));
      };
      deadline.signal.addEventListener('abort', onTimeout, { once: true });
      this.pending = {
        resolve: (frame) => {
          deadline.signal.removeEventListener('abort', onTimeout);
          deadline.cleanup();
          resolve(frame);
        },
        reject: (err) => {
          deadline.signal.removeEventListener('abort', onTimeout);
          deadline.cleanup();
          reject(err);
        },
      };
    });
  }

  async close(): Promise<void> {
    this.signal?.removeEventListener('abort', this.onAbort);
    const { ws } = this;
    if (ws.readyState === WebSocket.CLOSED) return;
    if (ws.readyState === WebSocket.CONNECTING) {
      ws.terminate();
      return;
    }
    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        ws.terminate();
        resolve();
      }, CLOSE_GRACE_MS);
      timer.unref?.();
      ws.once('close', () => {
        clearTimeout(timer);
        resolve();
      });
      if (ws.readyState === WebSocket.OPEN) {
        ws.close(1000);
      }
    });
  }
}

export const connectWebSocket: TransportFactory = async (url, options) => {
  const { signal } = options;
  if (signal?.aborted) {
    throw new RecognitionError('connection', 'aborted before connecting', { cause: signal.reason });
  }
  const ws = new WebSocket(url, { headers: options.headers });
  // Errors after the handshake are reported through the transport; this keeps late
  // handshake errors (e.g. after terminate) from becoming unhandled 'error' events.
  ws.on('error', (err) => {
    logger.debug({ event: 'asr_ws_error', message: err.message });
  });

  await new Promise<void>((resolve, reject) => {
    const deadline = withDeadline(options.connectTimeoutMs, signal);
    const cleanup = () => {
      deadline.signal.removeEventListener('abort', onAbort);
      deadline.cleanup();
      ws.off('open', onOpen);
      ws.off('error', onError);
      ws.off('close', onClose);
    };
    const fail = (message: string, cause?: unknown) => {
      cleanup();
      reject(new RecognitionError('connection', message, { cause }));
    };
    const onOpen = () => {
      cleanup();
      resolve();
    };
    const onError = (err: Error) => fail(`connect failed: ${errorMessage(err)}`, err);
    const onClose = () => fail('socket closed before open');
    const onAbort = () => {
      fail(
        deadline.didTimeout() ? `connect timed out after ${options.connectTimeoutMs} ms` : 'aborted while connecting',
        signal?.reason
      );
      ws.terminate();
    };
    ws.once('open', onOpen);
    ws.once('error', onError);
    ws.once('close', onClose);
    deadline.signal.addEventListener('abort', onAbort, { once: true });
  });

  return new WebSocketTransport(ws, signal);
};
