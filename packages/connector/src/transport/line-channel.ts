/**
 * LineChannel - newline-delimited text over a byte stream
 *
 * Wraps a duplex stream (a TCP socket in production, an in-memory pair in
 * tests) and exposes it as a sequence of lines. Reads are pull-based: the
 * handshake reads exactly the lines it expects, then the dispatch loop takes
 * over and reads the rest.
 *
 * @packageDocumentation
 */

import type { Socket } from 'net';
import type { Duplex } from 'stream';
import { LINE_DELIMITER } from '@lanlink/shared';

/**
 * Lines buffered before the underlying stream is paused
 */
const MAX_BUFFERED_LINES = 64;

/**
 * How long close() waits for the remote side to finish before destroying
 */
const CLOSE_GRACE_MS = 500;

/**
 * Strip the IPv4-mapped IPv6 prefix that dual-stack listeners report
 */
export function normalizeAddress(address: string | undefined): string {
  if (!address) {
    return 'unknown';
  }
  return address.startsWith('::ffff:') ? address.slice('::ffff:'.length) : address;
}

/**
 * LineChannel reads and writes whole lines on a duplex stream.
 *
 * Features:
 * - readLine() resolves with the next line (without terminator) or null at end of stream
 * - writeLine() resolves once the stream has accepted the data
 * - close() half-closes, then destroys the stream if the remote does not finish
 */
export class LineChannel {
  private readonly _stream: Duplex;
  private readonly _remoteAddress: string;
  private readonly _lines: string[] = [];
  private _partial = '';
  private _ended = false;
  private _closePromise: Promise<void> | null = null;
  private _pendingRead: ((line: string | null) => void) | null = null;
  private _lastError: Error | null = null;

  /**
   * Create a LineChannel
   *
   * @param stream - Connected duplex stream
   * @param remoteAddress - Address of the remote side, used as the peer address
   */
  constructor(stream: Duplex, remoteAddress: string) {
    this._stream = stream;
    this._remoteAddress = remoteAddress;

    stream.setEncoding('utf8');
    stream.on('data', (chunk: string | Buffer) => {
      this.handleData(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
    });
    stream.on('end', () => this.handleEnd());
    stream.on('close', () => this.handleEnd());
    stream.on('error', (error: Error) => {
      this._lastError = error;
      this.handleEnd();
    });
  }

  /**
   * Wrap a connected TCP socket
   */
  static fromSocket(socket: Socket): LineChannel {
    socket.setNoDelay(true);
    return new LineChannel(socket, normalizeAddress(socket.remoteAddress));
  }

  get remoteAddress(): string {
    return this._remoteAddress;
  }

  /**
   * True once the stream has ended or close() was called
   */
  get isClosed(): boolean {
    return this._ended || this._closePromise !== null;
  }

  /**
   * Last transport error seen on the stream, if any
   */
  get lastError(): Error | null {
    return this._lastError;
  }

  /**
   * Read the next line
   *
   * @returns The line without its terminator, or null once the stream has ended
   * @throws Error if another read is already pending
   */
  readLine(): Promise<string | null> {
    if (this._pendingRead) {
      return Promise.reject(new Error('A read is already pending on this channel'));
    }
    if (this._closePromise) {
      return Promise.resolve(null);
    }

    const line = this._lines.shift();
    if (line !== undefined) {
      if (this._stream.isPaused() && this._lines.length < MAX_BUFFERED_LINES) {
        this._stream.resume();
      }
      return Promise.resolve(line);
    }

    if (this.isClosed) {
      return Promise.resolve(null);
    }

    return new Promise((resolve) => {
      this._pendingRead = resolve;
    });
  }

  /**
   * Write one line; the terminator is added when missing
   *
   * @throws Error if the channel is closed or the stream reports a write error
   */
  writeLine(line: string): Promise<void> {
    if (this.isClosed || this._stream.destroyed) {
      return Promise.reject(new Error('Channel is closed'));
    }

    const payload = line.endsWith(LINE_DELIMITER) ? line : line + LINE_DELIMITER;
    return new Promise((resolve, reject) => {
      this._stream.write(payload, 'utf8', (error?: Error | null) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Close the channel
   *
   * Pending and future reads resolve with null. Safe to call more than once.
   */
  close(): Promise<void> {
    if (this._closePromise) {
      return this._closePromise;
    }

    this._closePromise = new Promise<void>((resolve) => {
      const stream = this._stream;
      if (stream.destroyed) {
        resolve();
        return;
      }

      const graceTimer = setTimeout(() => {
        stream.destroy();
      }, CLOSE_GRACE_MS);
      graceTimer.unref();

      stream.once('close', () => {
        clearTimeout(graceTimer);
        resolve();
      });
      stream.end();
    });

    this.settlePendingRead();
    return this._closePromise;
  }

  private handleData(chunk: string): void {
    this._partial += chunk;

    let newlineIndex = this._partial.indexOf(LINE_DELIMITER);
    while (newlineIndex !== -1) {
      const line = this._partial.slice(0, newlineIndex);
      this._partial = this._partial.slice(newlineIndex + 1);
      this.deliver(line);
      newlineIndex = this._partial.indexOf(LINE_DELIMITER);
    }

    if (this._lines.length >= MAX_BUFFERED_LINES) {
      this._stream.pause();
    }
  }

  private deliver(line: string): void {
    const pending = this._pendingRead;
    if (pending) {
      this._pendingRead = null;
      pending(line);
    } else {
      this._lines.push(line);
    }
  }

  private handleEnd(): void {
    if (this._ended) {
      return;
    }
    this._ended = true;

    // A final line without terminator still counts
    if (this._partial.length > 0) {
      const tail = this._partial;
      this._partial = '';
      this.deliver(tail);
    }

    this.settlePendingRead();
  }

  private settlePendingRead(): void {
    const pending = this._pendingRead;
    if (pending && this._lines.length === 0) {
      this._pendingRead = null;
      pending(null);
    }
  }
}
