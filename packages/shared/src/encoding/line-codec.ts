/**
 * Line Codec
 *
 * Encodes wire messages as newline-terminated JSON and decodes received lines
 * back into validated handshake messages or frames.
 *
 * `JSON.stringify` escapes control characters inside strings, so an encoded
 * message never contains a raw newline before its terminator.
 *
 * @packageDocumentation
 */

import type { ZodType, ZodTypeDef } from 'zod';
import {
  Frame,
  FrameSchema,
  HandshakeMessage,
  HandshakeMessageSchema,
  JsonValue,
} from '../types/wire';

/**
 * Line terminator used by the wire protocol
 */
export const LINE_DELIMITER = '\n';

/**
 * Thrown when a received line is not a valid wire message
 *
 * @example
 * ```typescript
 * try {
 *   decodeFrame('not json');
 * } catch (error) {
 *   if (error instanceof InvalidFrameError) {
 *     // drop the line and keep reading
 *   }
 * }
 * ```
 */
export class InvalidFrameError extends Error {
  constructor(
    message: string,
    public readonly line: string
  ) {
    super(message);
    this.name = 'InvalidFrameError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvalidFrameError);
    }
  }
}

/**
 * Serialize a message to one wire line, including the trailing newline
 *
 * @param message - Handshake message or frame
 * @returns JSON text terminated by `\n`
 */
export function encodeLine(message: HandshakeMessage | Frame): string {
  return JSON.stringify(message) + LINE_DELIMITER;
}

/**
 * Build and serialize a frame
 *
 * @param event - Event name
 * @param data - JSON payload
 * @returns Wire line for `{ event, data }`
 */
export function encodeFrame(event: string, data: JsonValue): string {
  return encodeLine({ event, data });
}

/**
 * Parse one line and validate it against a schema
 */
function decodeWith<T>(line: string, schema: ZodType<T, ZodTypeDef, unknown>, kind: string): T {
  const text = line.trim();
  if (text.length === 0) {
    throw new InvalidFrameError(`Empty ${kind}`, line);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidFrameError(`Invalid JSON in ${kind}: ${reason}`, line);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const detail = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid';
    throw new InvalidFrameError(`Invalid ${kind}: ${detail}`, line);
  }

  return result.data;
}

/**
 * Decode a handshake message
 *
 * @param line - One received line, with or without its terminator
 * @throws InvalidFrameError if the line is not JSON or not a known handshake message
 */
export function decodeHandshakeMessage(line: string): HandshakeMessage {
  return decodeWith(line, HandshakeMessageSchema, 'handshake message');
}

/**
 * Decode an application frame
 *
 * @param line - One received line, with or without its terminator
 * @throws InvalidFrameError if the line is not a JSON object
 */
export function decodeFrame(line: string): Frame {
  return decodeWith(line, FrameSchema, 'frame');
}
