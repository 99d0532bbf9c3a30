/**
 * Shared wire protocol types and codec
 * @packageDocumentation
 */

export const version = '0.1.0';

// Wire Protocol Types
export {
  HandshakeMessageType,
  JsonValueSchema,
  InfoRequestSchema,
  InfoResponseSchema,
  ConnectRequestSchema,
  ConnectAcceptSchema,
  ConnectRejectSchema,
  HandshakeMessageSchema,
  FrameSchema,
  DEFAULT_FRAME_EVENT,
} from './types/wire';
export type {
  JsonPrimitive,
  JsonValue,
  JsonObject,
  InfoRequest,
  InfoResponse,
  ConnectRequest,
  ConnectAccept,
  ConnectReject,
  HandshakeMessage,
  Frame,
} from './types/wire';

// Line Codec
export {
  LINE_DELIMITER,
  InvalidFrameError,
  encodeLine,
  encodeFrame,
  decodeHandshakeMessage,
  decodeFrame,
} from './encoding/line-codec';
