/**
 * In-memory stream pairs for handshake and dispatch tests
 *
 * Bytes written to one side are readable on the other. Ending one side
 * ends the other (allowHalfOpen: false), so closing a LineChannel settles
 * both ends without a socket.
 */

import { Duplex } from 'stream';
import pino from 'pino';
import { LineChannel } from '../../src/transport/line-channel';

export function createDuplexPair(): [Duplex, Duplex] {
  const sides: Duplex[] = [];

  const makeSide = (index: number): Duplex =>
    new Duplex({
      allowHalfOpen: false,
      read(): void {
        // Data is pushed by the opposite side
      },
      write(chunk: Buffer, _encoding, callback): void {
        const other = sides[1 - index];
        if (other && !other.destroyed) {
          other.push(chunk);
        }
        callback();
      },
      final(callback): void {
        const other = sides[1 - index];
        if (other && !other.destroyed) {
          other.push(null);
        }
        callback();
      },
      destroy(error, callback): void {
        const other = sides[1 - index];
        if (other && !other.destroyed) {
          other.push(null);
        }
        callback(error);
      },
    });

  const left = makeSide(0);
  const right = makeSide(1);
  sides.push(left, right);
  return [left, right];
}

/**
 * Two connected LineChannels; each reports the other's address as remote
 */
export function createChannelPair(
  leftAddress = '10.0.0.1',
  rightAddress = '10.0.0.2'
): [LineChannel, LineChannel] {
  const [left, right] = createDuplexPair();
  return [new LineChannel(left, rightAddress), new LineChannel(right, leftAddress)];
}

/**
 * Logger that records every line it would have written
 */
export function createCapturingLogger(): { logger: pino.Logger; lines: Record<string, unknown>[] } {
  const lines: Record<string, unknown>[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write: (chunk: string): void => {
        lines.push(JSON.parse(chunk));
      },
    }
  );
  return { logger, lines };
}

/**
 * Poll until `condition` holds or `timeoutMs` passes
 */
export async function waitFor(
  condition: () => boolean,
  timeoutMs = 2000,
  intervalMs = 10
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
}
