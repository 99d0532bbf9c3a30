/**
 * Handshake Protocol
 *
 * Four-step exchange run over a freshly opened channel before a peer is
 * admitted:
 *
 * | Step | Initiator            | Acceptor                          |
 * |------|----------------------|-----------------------------------|
 * | 1    | info_request         |                                   |
 * | 2    |                      | info_response                     |
 * | 3    | connect_request      |                                   |
 * | 4    |                      | connect_accept / connect_reject   |
 *
 * Every read is bounded by the per-step timeout of its role. A failed
 * attempt closes its channel and affects nothing else.
 *
 * @packageDocumentation
 */

import {
  HandshakeMessageType,
  InvalidFrameError,
  decodeHandshakeMessage,
  encodeLine,
  type ConnectRequest,
  type HandshakeMessage,
} from '@lanlink/shared';
import type { HandshakeConfig } from '../config/types';
import type { LocalIdentity } from '../identity/local-identity';
import type { PeerInfo } from '../registry/peer';
import type { PeerRegistry } from '../registry/peer-registry';
import type { LineChannel } from '../transport/line-channel';
import type { Logger } from '../utils/logger';

/**
 * Reason sent in every connect_reject
 */
export const REJECT_REASON = 'Not accepting connections';

export type HandshakeErrorCode = 'TIMEOUT' | 'CLOSED' | 'PROTOCOL';

/**
 * A handshake attempt that failed before reaching a decision
 */
export class HandshakeError extends Error {
  constructor(
    message: string,
    public readonly code: HandshakeErrorCode
  ) {
    super(message);
    this.name = 'HandshakeError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HandshakeError);
    }
  }
}

/**
 * Result of one handshake attempt
 *
 * Only `admitted` leaves the channel open; it then belongs to the registry.
 */
export type HandshakeOutcome =
  | { status: 'admitted'; peer: PeerInfo }
  | { status: 'rejected'; reason: string }
  | { status: 'declined'; reason: string }
  | { status: 'deferred'; remoteId: string }
  | { status: 'failed'; error: HandshakeError };

/**
 * Everything a handshake needs from the local node
 */
export interface HandshakeContext {
  identity: LocalIdentity;
  registry: PeerRegistry;
  config: HandshakeConfig;
  logger: Logger;
  /** True while the local scanner is running a seek */
  isSeeking: () => boolean;
}

/**
 * Race a promise against a timer
 *
 * @throws HandshakeError with code TIMEOUT when the timer fires first
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, step: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new HandshakeError(`Timed out after ${timeoutMs}ms waiting for ${step}`, 'TIMEOUT'));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

async function readMessage(
  channel: LineChannel,
  timeoutMs: number,
  step: string
): Promise<HandshakeMessage> {
  const line = await withTimeout(channel.readLine(), timeoutMs, step);
  if (line === null) {
    throw new HandshakeError(`Connection closed while waiting for ${step}`, 'CLOSED');
  }

  try {
    return decodeHandshakeMessage(line);
  } catch (error) {
    if (error instanceof InvalidFrameError) {
      throw new HandshakeError(error.message, 'PROTOCOL');
    }
    throw error;
  }
}

async function writeMessage(
  channel: LineChannel,
  message: HandshakeMessage,
  timeoutMs: number
): Promise<void> {
  try {
    await withTimeout(channel.writeLine(encodeLine(message)), timeoutMs, `${message.type} write`);
  } catch (error) {
    if (error instanceof HandshakeError) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new HandshakeError(`Failed to send ${message.type}: ${reason}`, 'CLOSED');
  }
}

function toHandshakeError(error: unknown): HandshakeError {
  if (error instanceof HandshakeError) {
    return error;
  }
  return new HandshakeError(error instanceof Error ? error.message : String(error), 'CLOSED');
}

/**
 * Run the initiator side over a connected channel
 *
 * Proceeds to connect_request only for a compatible, accepting remote that
 * is neither the local peer nor already registered. With tie-breaking on,
 * a remote that is seeking and whose ID sorts below the local ID is left to
 * initiate instead. An idle remote is always dialed.
 */
export async function initiateHandshake(
  channel: LineChannel,
  context: HandshakeContext
): Promise<HandshakeOutcome> {
  const { identity, registry, config } = context;
  const logger = context.logger.child({ remoteAddress: channel.remoteAddress, role: 'initiator' });
  const timeoutMs = config.initiatorTimeoutMs;

  const finish = async (outcome: HandshakeOutcome): Promise<HandshakeOutcome> => {
    await channel.close();
    return outcome;
  };

  try {
    await writeMessage(
      channel,
      { type: HandshakeMessageType.INFO_REQUEST, peer_id: identity.peerId },
      timeoutMs
    );

    const info = await readMessage(channel, timeoutMs, 'info_response');
    if (info.type !== HandshakeMessageType.INFO_RESPONSE) {
      throw new HandshakeError(`Expected info_response, got ${info.type}`, 'PROTOCOL');
    }

    const remoteId = info.peer_id;
    if (info.app_name !== identity.appName) {
      logger.debug({ event: 'handshake_incompatible', remoteApp: info.app_name });
      return await finish({ status: 'declined', reason: `Application mismatch: ${info.app_name}` });
    }
    if (remoteId === identity.peerId) {
      return await finish({ status: 'declined', reason: 'Remote is the local peer' });
    }
    if (registry.has(remoteId)) {
      return await finish({ status: 'declined', reason: 'Peer already connected' });
    }
    if (!info.accepting) {
      return await finish({ status: 'declined', reason: 'Remote is not accepting connections' });
    }
    if (config.tieBreak && info.seeking && remoteId < identity.peerId) {
      logger.debug({ event: 'handshake_deferred', remoteId }, 'Lower peer ID initiates');
      return await finish({ status: 'deferred', remoteId });
    }

    await writeMessage(
      channel,
      {
        type: HandshakeMessageType.CONNECT_REQUEST,
        peer_id: identity.peerId,
        app_name: identity.appName,
      },
      timeoutMs
    );

    const decision = await readMessage(channel, timeoutMs, 'connect_accept');
    if (decision.type === HandshakeMessageType.CONNECT_REJECT) {
      logger.debug({ event: 'handshake_rejected', remoteId, reason: decision.reason });
      return await finish({ status: 'rejected', reason: decision.reason });
    }
    if (decision.type !== HandshakeMessageType.CONNECT_ACCEPT) {
      throw new HandshakeError(`Expected connect_accept, got ${decision.type}`, 'PROTOCOL');
    }

    // The registry may have filled up or admitted this peer inbound meanwhile
    const peer = registry.admit(remoteId, channel.remoteAddress, channel);
    if (!peer) {
      // The remote has already announced us; closing here disconnects it at once
      logger.info(
        { event: 'handshake_abandoned', remoteId },
        'Closing connection accepted by the remote'
      );
      return await finish({ status: 'declined', reason: 'No longer accepting connections' });
    }
    return { status: 'admitted', peer };
  } catch (error) {
    const handshakeError = toHandshakeError(error);
    logger.debug(
      { event: 'handshake_failed', code: handshakeError.code, error: handshakeError.message },
      'Outbound handshake failed'
    );
    return finish({ status: 'failed', error: handshakeError });
  }
}

/**
 * Run the acceptor side over an accepted channel
 *
 * The first message may be info_request (full exchange) or connect_request
 * (info step skipped). Anything else ends the attempt.
 */
export async function acceptHandshake(
  channel: LineChannel,
  context: HandshakeContext
): Promise<HandshakeOutcome> {
  const { identity, registry, config } = context;
  const logger = context.logger.child({ remoteAddress: channel.remoteAddress, role: 'acceptor' });
  const timeoutMs = config.acceptorTimeoutMs;

  try {
    let request: ConnectRequest;
    const first = await readMessage(channel, timeoutMs, 'info_request');

    if (first.type === HandshakeMessageType.INFO_REQUEST) {
      await writeMessage(
        channel,
        {
          type: HandshakeMessageType.INFO_RESPONSE,
          app_name: identity.appName,
          peer_id: identity.peerId,
          accepting: registry.isAcceptingConnections,
          seeking: context.isSeeking(),
        },
        timeoutMs
      );

      const second = await readMessage(channel, timeoutMs, 'connect_request');
      if (second.type !== HandshakeMessageType.CONNECT_REQUEST) {
        throw new HandshakeError(`Expected connect_request, got ${second.type}`, 'PROTOCOL');
      }
      request = second;
    } else if (first.type === HandshakeMessageType.CONNECT_REQUEST) {
      request = first;
    } else {
      throw new HandshakeError(`Unexpected opening message ${first.type}`, 'PROTOCOL');
    }

    const peer =
      request.app_name === identity.appName
        ? registry.admit(request.peer_id, channel.remoteAddress, channel)
        : null;

    if (!peer) {
      logger.debug(
        { event: 'handshake_reject', remoteId: request.peer_id, remoteApp: request.app_name },
        'Rejecting connect_request'
      );
      await writeMessage(
        channel,
        { type: HandshakeMessageType.CONNECT_REJECT, reason: REJECT_REASON },
        timeoutMs
      );
      await channel.close();
      return { status: 'rejected', reason: REJECT_REASON };
    }

    try {
      await writeMessage(
        channel,
        { type: HandshakeMessageType.CONNECT_ACCEPT, peer_id: identity.peerId },
        timeoutMs
      );
    } catch (error) {
      await registry.remove(peer.id);
      throw error;
    }

    return { status: 'admitted', peer };
  } catch (error) {
    const handshakeError = toHandshakeError(error);
    logger.debug(
      { event: 'handshake_failed', code: handshakeError.code, error: handshakeError.message },
      'Inbound handshake failed'
    );
    await channel.close();
    return { status: 'failed', error: handshakeError };
  }
}
