/**
 * Outbound TCP connections for the discovery scanner
 *
 * @packageDocumentation
 */

import * as net from 'net';
import { LineChannel } from './line-channel';

/**
 * Open a TCP connection and wrap it in a LineChannel
 *
 * @param host - Remote address
 * @param port - Remote port
 * @param timeoutMs - Connect timeout; the socket is destroyed when it fires
 * @param localAddress - Source address, so the remote sees the address we listen on
 * @throws Error if the connection is refused, fails or times out
 */
export function openChannel(
  host: string,
  port: number,
  timeoutMs: number,
  localAddress?: string
): Promise<LineChannel> {
  return new Promise((resolve, reject) => {
    const socket = net.connect({ host, port, localAddress });

    const timer = setTimeout(() => {
      socket.destroy();
      reject(new Error(`Connect to ${host}:${port} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    socket.once('connect', () => {
      clearTimeout(timer);
      socket.removeAllListeners('error');
      resolve(LineChannel.fromSocket(socket));
    });
    socket.once('error', (error: Error) => {
      clearTimeout(timer);
      socket.destroy();
      reject(error);
    });
  });
}
