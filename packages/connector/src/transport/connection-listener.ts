/**
 * ConnectionListener - TCP server accepting inbound peer connections
 *
 * Accepts connections on one port and hands every socket to the acceptor
 * side of the handshake as an independent task. Accepting never waits on a
 * handshake.
 *
 * @packageDocumentation
 */

import * as net from 'net';
import type { Logger } from '../utils/logger';

/**
 * Error codes for listener failures
 */
export type ListenerErrorCode = 'ADDRESS_IN_USE' | 'BIND_FAILED';

/**
 * Thrown when the listening socket cannot be bound
 *
 * This is the only fatal condition at startup.
 */
export class ListenerError extends Error {
  constructor(
    message: string,
    public readonly code: ListenerErrorCode
  ) {
    super(message);
    this.name = 'ListenerError';
  }
}

/**
 * Handles one accepted socket until it is admitted or discarded
 */
export type ConnectionHandler = (socket: net.Socket) => Promise<void>;

/**
 * ConnectionListener owns the server socket and the sockets that are still
 * in their handshake.
 *
 * Sockets whose handler has returned (admitted peers) belong to the peer
 * registry; stop() leaves them alone.
 */
export class ConnectionListener {
  private readonly _handler: ConnectionHandler;
  private readonly _logger: Logger;
  private readonly _pendingSockets: Set<net.Socket> = new Set();
  private _server: net.Server | null = null;
  private _port = 0;

  /**
   * Create a ConnectionListener instance.
   *
   * @param handler - Called once per accepted socket
   * @param logger - Pino logger instance
   */
  constructor(handler: ConnectionHandler, logger: Logger) {
    this._handler = handler;
    this._logger = logger.child({ component: 'ConnectionListener' });
  }

  get isListening(): boolean {
    return this._server !== null && this._server.listening;
  }

  /**
   * Get the port the server is listening on.
   * Useful for tests using port 0 (random available port).
   */
  getPort(): number {
    return this._port;
  }

  /**
   * Bind and start accepting connections. No-op when already listening.
   *
   * @throws ListenerError if the port is in use or cannot be bound
   */
  async start(port: number, host: string): Promise<void> {
    if (this._server) {
      this._logger.warn(
        { event: 'listener_already_started', port: this._port },
        'Listener already running'
      );
      return;
    }

    const server = net.createServer((socket) => {
      this.handleSocket(socket);
    });

    await new Promise<void>((resolve, reject) => {
      const onError = (error: NodeJS.ErrnoException): void => {
        server.removeListener('listening', onListening);
        if (error.code === 'EADDRINUSE') {
          const message = `Port ${port} on ${host} is already in use`;
          this._logger.error({ event: 'listener_start_failed', port, host, error: message });
          reject(new ListenerError(message, 'ADDRESS_IN_USE'));
        } else {
          this._logger.error({ event: 'listener_start_failed', port, host, error: error.message });
          reject(
            new ListenerError(`Failed to bind ${host}:${port}: ${error.message}`, 'BIND_FAILED')
          );
        }
      };
      const onListening = (): void => {
        server.removeListener('error', onError);
        resolve();
      };

      server.once('error', onError);
      server.once('listening', onListening);
      server.listen(port, host);
    });

    server.on('error', (error: Error) => {
      this._logger.warn({ event: 'listener_error', error: error.message }, 'Listener error');
    });

    const address = server.address();
    this._port = typeof address === 'object' && address ? address.port : port;
    this._server = server;
    this._logger.info(
      { event: 'listener_started', port: this._port, host },
      'Listening for peers'
    );
  }

  /**
   * Stop accepting connections.
   *
   * Closes the server socket and destroys sockets still in their handshake.
   * Admitted peers are not touched.
   */
  async stop(): Promise<void> {
    const server = this._server;
    if (!server) {
      return;
    }
    this._server = null;

    server.close((error?: Error) => {
      if (error) {
        this._logger.debug({ event: 'listener_close_error', error: error.message });
      }
    });

    for (const socket of this._pendingSockets) {
      socket.destroy();
    }
    this._pendingSockets.clear();

    this._logger.info({ event: 'listener_stopped', port: this._port }, 'Listener stopped');
  }

  private handleSocket(socket: net.Socket): void {
    this._pendingSockets.add(socket);
    this._logger.debug(
      { event: 'connection_accepted', remoteAddress: socket.remoteAddress },
      'Inbound connection'
    );

    this._handler(socket)
      .catch((error: unknown) => {
        this._logger.warn(
          {
            event: 'connection_handler_failed',
            error: error instanceof Error ? error.message : String(error),
          },
          'Inbound connection handler failed'
        );
        socket.destroy();
      })
      .finally(() => {
        this._pendingSockets.delete(socket);
      });
  }
}
