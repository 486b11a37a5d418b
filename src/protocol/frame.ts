import { gunzipSync, gzipSync } from 'node:zlib';
import { RecognitionError, errorMessage } from '../errors.js';

/*
 * Wire layout (big-endian):
 *
 *   byte 0  version(4) | header size in 4-byte words(4)
 *   byte 1  message type(4) | message type specific flags(4)
 *   byte 2  serialization(4) | compression(4)
 *   byte 3  reserved
 *   [header extensions: 4 * (header words - 1) bytes]
 *   body (layout depends on message type)
 */

export const PROTOCOL_VERSION = 0b0001;
export const HEADER_BYTES = 4;
const DEFAULT_HEADER_WORDS = 1;

export const MessageType = {
  FullRequest: 0b0001,
  AudioOnlyRequest: 0b0010,
  FullResponse: 0b1001,
  Ack: 0b1011,
  ErrorResponse: 0b1111,
} as const;
export type MessageType = (typeof MessageType)[keyof typeof MessageType];

export const SequenceFlag = {
  None: 0b0000,
  FinalSegment: 0b0010,
} as const;
export type SequenceFlag = (typeof SequenceFlag)[keyof typeof SequenceFlag];

export const Serialization = {
  None: 0b0000,
  Json: 0b0001,
  Thrift: 0b0011,
  Custom: 0b1111,
} as const;

export const Compression = {
  None: 0b0000,
  Gzip: 0b0001,
  Custom: 0b1111,
} as const;

/** Nibble fields are plain numbers on decode: the peer may send values we don't name. */
export interface FrameHeader {
  version: number;
  headerWords: number;
  messageType: number;
  flags: number;
  serialization: number;
  compression: number;
}

export type FramePayload =
  | { kind: 'none' }
  | { kind: 'json'; value: unknown }
  | { kind: 'text'; value: string };

export interface RawFrame {
  header: FrameHeader;
  sequenceNumber?: number;
  errorCode?: number;
  /** Size field as declared on the wire. */
  payloadSize?: number;
  /** Payload bytes after decompression, before deserialization. */
  body?: Buffer;
}

export interface DecodedResponse {
  readonly messageType: number;
  readonly header: FrameHeader;
  readonly sequenceNumber?: number;
  readonly errorCode?: number;
  readonly payload: FramePayload;
  readonly payloadSize?: number;
}

const NO_PAYLOAD: FramePayload = { kind: 'none' };

function nibble(value: number, field: string): number {
  if (!Number.isInteger(value) || value < 0 || value > 0x0f) {
    throw new RangeError(`${field} must fit in 4 bits (got ${value})`);
  }
  return value;
}

export function packHeader(header: FrameHeader): Buffer {
  const bytes = Buffer.alloc(HEADER_BYTES);
  bytes[0] = (nibble(header.version, 'version') << 4) | nibble(header.headerWords, 'headerWords');
  bytes[1] = (nibble(header.messageType, 'messageType') << 4) | nibble(header.flags, 'flags');
  bytes[2] = (nibble(header.serialization, 'serialization') << 4) | nibble(header.compression, 'compression');
  bytes[3] = 0x00;
  return bytes;
}

export function unpackHeader(bytes: Uint8Array): FrameHeader {
  if (bytes.length < HEADER_BYTES) {
    throw new RecognitionError('decode', `frame too short for header: ${bytes.length} bytes`);
  }
  return {
    version: bytes[0] >> 4,
    headerWords: bytes[0] & 0x0f,
    messageType: bytes[1] >> 4,
    flags: bytes[1] & 0x0f,
    serialization: bytes[2] >> 4,
    compression: bytes[2] & 0x0f,
  };
}

/** Request header: JSON serialization, gzip compression, no extensions. */
export function encodeHeader(messageType: MessageType, sequenceFlag: SequenceFlag = SequenceFlag.None): Buffer {
  return packHeader({
    version: PROTOCOL_VERSION,
    headerWords: DEFAULT_HEADER_WORDS,
    messageType,
    flags: sequenceFlag,
    serialization: Serialization.Json,
    compression: Compression.Gzip,
  });
}

export function encodeRequestFrame(
  messageType: MessageType,
  sequenceFlag: SequenceFlag,
  rawPayload: Uint8Array
): Buffer {
  const compressed = gzipSync(rawPayload);
  const size = Buffer.alloc(4);
  size.writeUInt32BE(compressed.length, 0);
  return Buffer.concat([encodeHeader(messageType, sequenceFlag), size, compressed]);
}

function requireBody(body: Buffer, minBytes: number, messageType: number): void {
  if (body.length < minBytes) {
    throw new RecognitionError(
      'decode',
      `frame body too short for message type ${messageType}: ${body.length} < ${minBytes} bytes`
    );
  }
}

function splitBody(header: FrameHeader, body: Buffer): Omit<RawFrame, 'header'> {
  switch (header.messageType) {
    case MessageType.FullResponse:
      requireBody(body, 4, header.messageType);
      return { payloadSize: body.readInt32BE(0), body: body.subarray(4) };
    case MessageType.FullRequest:
    case MessageType.AudioOnlyRequest:
      requireBody(body, 4, header.messageType);
      return { payloadSize: body.readUInt32BE(0), body: body.subarray(4) };
    case MessageType.Ack: {
      requireBody(body, 4, header.messageType);
      const sequenceNumber = body.readInt32BE(0);
      if (body.length < 8) {
        return { sequenceNumber };
      }
      return { sequenceNumber, payloadSize: body.readUInt32BE(4), body: body.subarray(8) };
    }
    case MessageType.ErrorResponse:
      requireBody(body, 8, header.messageType);
      return { errorCode: body.readUInt32BE(0), payloadSize: body.readUInt32BE(4), body: body.subarray(8) };
    default:
      return {};
  }
}

function decompress(compression: number, body: Buffer): Buffer {
  if (compression !== Compression.Gzip || body.length === 0) {
    return body;
  }
  try {
    return gunzipSync(body);
  } catch (err) {
    throw new RecognitionError('decode', `gzip payload could not be decompressed: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

/**
 * Parses header and body layout and decompresses the payload, without interpreting it.
 * Header extension words are skipped.
 */
export function readFrame(raw: Uint8Array): RawFrame {
  const bytes = Buffer.isBuffer(raw) ? raw : Buffer.from(raw.buffer, raw.byteOffset, raw.byteLength);
  const header = unpackHeader(bytes);
  if (header.headerWords < 1) {
    throw new RecognitionError('decode', 'header size must be at least one word');
  }
  const headerBytes = header.headerWords * 4;
  if (bytes.length < headerBytes) {
    throw new RecognitionError('decode', `frame shorter than its declared ${headerBytes}-byte header`);
  }
  const parts = splitBody(header, bytes.subarray(headerBytes));
  if (!parts.body) {
    return { header, ...parts };
  }
  return { header, ...parts, body: decompress(header.compression, parts.body) };
}

function deserialize(serialization: number, body: Buffer): FramePayload {
  if (serialization === Serialization.None) {
    return NO_PAYLOAD;
  }
  const text = body.toString('utf-8');
  if (serialization !== Serialization.Json) {
    return { kind: 'text', value: text };
  }
  try {
    return { kind: 'json', value: JSON.parse(text) };
  } catch (err) {
    throw new RecognitionError('decode', `invalid JSON payload: ${errorMessage(err)}`, { cause: err });
  }
}

export function decodeFrame(raw: Uint8Array): DecodedResponse {
  const { header, sequenceNumber, errorCode, payloadSize, body } = readFrame(raw);
  const base = {
    messageType: header.messageType,
    header,
    ...(sequenceNumber !== undefined ? { sequenceNumber } : {}),
    ...(errorCode !== undefined ? { errorCode } : {}),
  };
  if (!body) {
    return { ...base, payload: NO_PAYLOAD };
  }
  // An empty body (e.g. an error frame without details) carries no document.
  const payload = body.length > 0 ? deserialize(header.serialization, body) : NO_PAYLOAD;
  return { ...base, payload, payloadSize };
}
