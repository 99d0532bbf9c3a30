/**
 * Wire Protocol Type Definitions
 *
 * Messages exchanged between LAN Link peers over a TCP stream. Every message
 * is a single JSON object terminated by a newline.
 *
 * Two families of messages share the stream:
 * - Handshake messages, tagged by a `type` field, exchanged once while a
 *   connection is being admitted
 * - Frames (`{ event, data }`), exchanged for the lifetime of an admitted
 *   connection
 *
 * Schemas are zod objects so the codec can validate untrusted input; the
 * TypeScript types are inferred from them.
 *
 * @packageDocumentation
 */

import { z } from 'zod';

/**
 * JSON primitive value
 */
export type JsonPrimitive = string | number | boolean | null;

/**
 * Any value that survives a JSON round-trip unchanged
 */
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/**
 * JSON object payload
 */
export type JsonObject = { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

/**
 * Handshake Message Type Discriminator
 */
export enum HandshakeMessageType {
  /** Initiator asks the acceptor to describe itself */
  INFO_REQUEST = 'info_request',
  /** Acceptor describes its application and whether it takes peers */
  INFO_RESPONSE = 'info_response',
  /** Initiator asks to be admitted as a peer */
  CONNECT_REQUEST = 'connect_request',
  /** Acceptor admitted the initiator */
  CONNECT_ACCEPT = 'connect_accept',
  /** Acceptor refused the initiator */
  CONNECT_REJECT = 'connect_reject',
}

export const InfoRequestSchema = z.object({
  type: z.literal(HandshakeMessageType.INFO_REQUEST),
  peer_id: z.string().min(1),
});

export const InfoResponseSchema = z.object({
  type: z.literal(HandshakeMessageType.INFO_RESPONSE),
  app_name: z.string(),
  peer_id: z.string().min(1),
  accepting: z.boolean().default(false),
  /** Remote is scanning and dials compatible peers itself */
  seeking: z.boolean().default(false),
});

export const ConnectRequestSchema = z.object({
  type: z.literal(HandshakeMessageType.CONNECT_REQUEST),
  peer_id: z.string().min(1),
  app_name: z.string(),
});

export const ConnectAcceptSchema = z.object({
  type: z.literal(HandshakeMessageType.CONNECT_ACCEPT),
  peer_id: z.string().min(1),
});

export const ConnectRejectSchema = z.object({
  type: z.literal(HandshakeMessageType.CONNECT_REJECT),
  reason: z.string(),
});

export const HandshakeMessageSchema = z.discriminatedUnion('type', [
  InfoRequestSchema,
  InfoResponseSchema,
  ConnectRequestSchema,
  ConnectAcceptSchema,
  ConnectRejectSchema,
]);

export type InfoRequest = z.infer<typeof InfoRequestSchema>;
export type InfoResponse = z.infer<typeof InfoResponseSchema>;
export type ConnectRequest = z.infer<typeof ConnectRequestSchema>;
export type ConnectAccept = z.infer<typeof ConnectAcceptSchema>;
export type ConnectReject = z.infer<typeof ConnectRejectSchema>;

/**
 * Any message exchanged during the connection handshake
 */
export type HandshakeMessage = z.infer<typeof HandshakeMessageSchema>;

/**
 * Default event name for frames that carry no `event` field
 */
export const DEFAULT_FRAME_EVENT = 'message';

/**
 * Frame schema
 *
 * Missing fields are filled in rather than rejected: a frame without an
 * `event` is a `message`, a frame without `data` carries an empty object.
 */
export const FrameSchema = z.object({
  event: z.string().default(DEFAULT_FRAME_EVENT),
  data: JsonValueSchema.default({}),
});

/**
 * Application event exchanged between admitted peers
 */
export interface Frame {
  /** Event name the receiving side dispatches on */
  event: string;

  /** Arbitrary JSON payload */
  data: JsonValue;
}
