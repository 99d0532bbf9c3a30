/**
 * Line Codec Tests
 *
 * Verifies newline-delimited JSON encoding and validated decoding of
 * handshake messages and frames.
 */

import {
  InvalidFrameError,
  decodeFrame,
  decodeHandshakeMessage,
  encodeFrame,
  encodeLine,
} from './line-codec';
import { HandshakeMessageType } from '../types/wire';

describe('Line Codec', () => {
  describe('encodeLine', () => {
    it('should terminate each message with exactly one newline', () => {
      const line = encodeLine({ type: HandshakeMessageType.INFO_REQUEST, peer_id: 'peer-a' });

      expect(line).toBe('{"type":"info_request","peer_id":"peer-a"}\n');
    });

    it('should escape newlines inside payload strings', () => {
      const line = encodeFrame('message', { text: 'line one\nline two' });

      expect(line).toBe('{"event":"message","data":{"text":"line one\\nline two"}}\n');
      expect(line.indexOf('\n')).toBe(line.length - 1);
    });
  });

  describe('decodeHandshakeMessage', () => {
    it('should decode an info_response', () => {
      const message = decodeHandshakeMessage(
        '{"type":"info_response","app_name":"combat","peer_id":"peer-b","accepting":true}\n'
      );

      expect(message).toEqual({
        type: 'info_response',
        app_name: 'combat',
        peer_id: 'peer-b',
        accepting: true,
        seeking: false,
      });
    });

    it('should treat a missing accepting flag as not accepting', () => {
      const message = decodeHandshakeMessage(
        '{"type":"info_response","app_name":"combat","peer_id":"peer-b"}'
      );

      expect(message.type).toBe('info_response');
      if (message.type === 'info_response') {
        expect(message.accepting).toBe(false);
        expect(message.seeking).toBe(false);
      }
    });

    it('should decode a connect_reject with its reason', () => {
      const message = decodeHandshakeMessage(
        '{"type":"connect_reject","reason":"Not accepting connections"}'
      );

      expect(message).toEqual({ type: 'connect_reject', reason: 'Not accepting connections' });
    });

    it('should reject unknown message types', () => {
      expect(() => decodeHandshakeMessage('{"type":"hello","peer_id":"x"}')).toThrow(
        InvalidFrameError
      );
    });

    it('should reject a connect_request without a peer id', () => {
      expect(() => decodeHandshakeMessage('{"type":"connect_request","app_name":"combat"}')).toThrow(
        /Invalid handshake message: peer_id/
      );
    });
  });

  describe('decodeFrame', () => {
    it('should decode event and data', () => {
      expect(decodeFrame('{"event":"attack","data":{"target_position":3}}')).toEqual({
        event: 'attack',
        data: { target_position: 3 },
      });
    });

    it('should default a missing event to message and missing data to an empty object', () => {
      expect(decodeFrame('{}')).toEqual({ event: 'message', data: {} });
    });

    it('should keep null data as null', () => {
      expect(decodeFrame('{"event":"ping","data":null}')).toEqual({ event: 'ping', data: null });
    });

    it('should throw InvalidFrameError for malformed JSON', () => {
      let caught: unknown;
      try {
        decodeFrame('{"event":');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InvalidFrameError);
      expect(caught).toMatchObject({
        line: '{"event":',
        message: expect.stringMatching(/^Invalid JSON in frame/),
      });
    });

    it('should throw InvalidFrameError for JSON that is not an object', () => {
      expect(() => decodeFrame('[1,2,3]')).toThrow(InvalidFrameError);
      expect(() => decodeFrame('"text"')).toThrow(InvalidFrameError);
    });

    it('should throw InvalidFrameError for a blank line', () => {
      expect(() => decodeFrame('   ')).toThrow('Empty frame');
    });
  });
});
