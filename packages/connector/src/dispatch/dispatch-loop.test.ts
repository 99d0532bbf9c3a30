/**
 * Unit tests for the dispatch loop
 */

import pino from 'pino';
import { encodeFrame } from '@lanlink/shared';
import { createChannelPair, waitFor } from '../../test/helpers/duplex-pair';
import { EventBus } from '../events/event-bus';
import { PeerRegistry } from '../registry/peer-registry';
import type { PeerInfo } from '../registry/peer';
import type { LineChannel } from '../transport/line-channel';
import { runDispatchLoop } from './dispatch-loop';

describe('runDispatchLoop', () => {
  const logger = pino({ level: 'silent' });
  let events: EventBus;
  let registry: PeerRegistry;
  let local: LineChannel;
  let remote: LineChannel;
  let peer: PeerInfo;
  let loop: Promise<void>;

  beforeEach(() => {
    events = new EventBus(logger);
    registry = new PeerRegistry('local-id', events, logger);
    registry.setPolicy(1, 1);
    [local, remote] = createChannelPair('10.0.0.1', '10.0.0.2');

    const admitted = registry.admit('peer-b', '10.0.0.2', local);
    if (!admitted) {
      throw new Error('peer-b was not admitted');
    }
    peer = admitted;
    registry.announce(peer.id);
  });

  afterEach(async () => {
    await remote.close();
    await loop;
  });

  it('should dispatch frames to handlers with the peer and data', async () => {
    // Arrange
    const received: unknown[] = [];
    events.on('message', (from, data) => {
      received.push({ from: from.id, data });
    });
    loop = runDispatchLoop(peer, local, events, registry, logger);

    // Act
    await remote.writeLine(encodeFrame('message', { text: 'hi' }));
    await remote.writeLine(encodeFrame('message', [1, 2]));
    await waitFor(() => received.length === 2);

    // Assert
    expect(received).toEqual([
      { from: 'peer-b', data: { text: 'hi' } },
      { from: 'peer-b', data: [1, 2] },
    ]);
  });

  it('should skip undecodable lines and keep reading', async () => {
    const handler = jest.fn();
    events.on('message', handler);
    loop = runDispatchLoop(peer, local, events, registry, logger);

    await remote.writeLine('not json');
    await remote.writeLine('[]');
    await remote.writeLine(encodeFrame('message', 'ok'));
    await waitFor(() => handler.mock.calls.length === 1);

    expect(handler).toHaveBeenCalledWith(peer, 'ok');
    expect(registry.has('peer-b')).toBe(true);
  });

  it('should default a frame without event or data to message with an empty object', async () => {
    const handler = jest.fn();
    events.on('message', handler);
    loop = runDispatchLoop(peer, local, events, registry, logger);

    await remote.writeLine('{}');
    await waitFor(() => handler.mock.calls.length === 1);

    expect(handler).toHaveBeenCalledWith(peer, {});
  });

  it('should drop frames naming a lifecycle event', async () => {
    const disconnected = jest.fn();
    const message = jest.fn();
    events.on('peer_disconnected', disconnected);
    events.on('message', message);
    loop = runDispatchLoop(peer, local, events, registry, logger);

    await remote.writeLine(encodeFrame('peer_disconnected', {}));
    await remote.writeLine(encodeFrame('message', 1));
    await waitFor(() => message.mock.calls.length === 1);

    expect(disconnected).not.toHaveBeenCalled();
  });

  it('should keep reading after a handler throws', async () => {
    const after = jest.fn();
    events.on('boom', () => {
      throw new Error('handler fault');
    });
    events.on('after', after);
    loop = runDispatchLoop(peer, local, events, registry, logger);

    await remote.writeLine(encodeFrame('boom', null));
    await remote.writeLine(encodeFrame('after', null));
    await waitFor(() => after.mock.calls.length === 1);

    expect(registry.has('peer-b')).toBe(true);
  });

  it('should remove the peer once at end of stream', async () => {
    const disconnected = jest.fn();
    events.on('peer_disconnected', disconnected);
    loop = runDispatchLoop(peer, local, events, registry, logger);

    await remote.close();
    await loop;

    expect(registry.has('peer-b')).toBe(false);
    expect(disconnected).toHaveBeenCalledTimes(1);
    expect(disconnected).toHaveBeenCalledWith(peer);
  });
});
