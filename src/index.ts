export { SpeechRecognizer, buildSessionRequest, type RecognizerDeps } from './session/recognizer.js';
export { RecognitionError, isRecognitionError, type RecognitionErrorKind } from './errors.js';
export {
  MessageType,
  SequenceFlag,
  Serialization,
  Compression,
  packHeader,
  unpackHeader,
  encodeHeader,
  encodeRequestFrame,
  readFrame,
  decodeFrame,
  type FrameHeader,
  type FramePayload,
  type RawFrame,
  type DecodedResponse,
} from './protocol/frame.js';
export { sliceSegments, segmentSizeFor, type Chunk } from './protocol/chunker.js';
export { decodePackets, buildContainer, prepareAudio, CONTAINER_FORMAT, type AudioContainer } from './audio/pipeline.js';
export { OpusPacketDecoder, createOpusDecoder, OPUS_FRAME_SAMPLES, type PacketDecoder } from './audio/opusDecoder.js';
export {
  WebSocketTransport,
  connectWebSocket,
  type FrameTransport,
  type TransportFactory,
  type ConnectOptions,
} from './transport/wsTransport.js';
export { loadConfig, reloadConfig, loadEnvironment, readCredentials, buildRecognizerConfig } from './config.js';
export { SESSION_STATES } from './types.js';
export type * from './types.js';
