/**
 * Unit tests for PeerScanner
 *
 * The dialer is a stand-in that admits peers straight into the registry, so
 * rounds run without sockets.
 */

import pino from 'pino';
import { createChannelPair } from '../../test/helpers/duplex-pair';
import type { DiscoveryConfig } from '../config/types';
import { EventBus } from '../events/event-bus';
import { PeerRegistry } from '../registry/peer-registry';
import type { LineChannel } from '../transport/line-channel';
import { PeerScanner } from './peer-scanner';
import type { CandidateDialer } from './types';

describe('PeerScanner', () => {
  const logger = pino({ level: 'silent' });
  const config: DiscoveryConfig = {
    addressPrefix: '10.0.0.',
    addressStart: 1,
    addressCount: 4,
    maxAttempts: 3,
    backoffMs: 5,
  };

  let events: EventBus;
  let registry: PeerRegistry;
  let channels: LineChannel[];
  let seekTimeout: jest.Mock;
  let allConnected: jest.Mock;

  /** Admits the peer living at `address` */
  const admitAt = (address: string): boolean => {
    const [local, remote] = createChannelPair('10.0.0.1', address);
    channels.push(local, remote);
    const peer = registry.admit(`peer-${address}`, address, local);
    if (!peer) {
      return false;
    }
    registry.announce(peer.id);
    return true;
  };

  const createScanner = (dialer: CandidateDialer, overrides: Partial<DiscoveryConfig> = {}) =>
    new PeerScanner({
      config: { ...config, ...overrides },
      registry,
      events,
      dialer,
      localAddresses: new Set(['10.0.0.1']),
      logger,
    });

  beforeEach(() => {
    channels = [];
    events = new EventBus(logger);
    registry = new PeerRegistry('local-id', events, logger);
    seekTimeout = jest.fn();
    allConnected = jest.fn();
    events.on('seek_timeout', seekTimeout);
    events.on('all_peers_connected', allConnected);
  });

  afterEach(async () => {
    await Promise.all(channels.map((channel) => channel.close()));
  });

  it('should dial every non-local candidate concurrently', async () => {
    // Arrange
    const dialed: string[] = [];
    const scanner = createScanner(async (address) => {
      dialed.push(address);
      return address === '10.0.0.3' && admitAt(address);
    });

    // Act
    const result = await scanner.seek(1);

    // Assert
    expect(dialed).toEqual(['10.0.0.2', '10.0.0.3', '10.0.0.4']);
    expect(result).toEqual({ status: 'satisfied', peerCount: 1, targetCount: 1, attempts: 1 });
    expect(allConnected).toHaveBeenCalledTimes(1);
    expect(seekTimeout).not.toHaveBeenCalled();
  });

  it('should skip connected addresses in later rounds', async () => {
    const rounds: string[][] = [[]];
    let round = 0;
    const scanner = createScanner(async (address) => {
      rounds[round].push(address);
      if (address === '10.0.0.2' && round === 0) {
        // Advance to the next round after this one settles
        setImmediate(() => {
          round++;
          rounds.push([]);
        });
        return admitAt(address);
      }
      if (address === '10.0.0.4' && round === 1) {
        return admitAt(address);
      }
      return false;
    });

    const result = await scanner.seek(2);

    expect(result.status).toBe('satisfied');
    expect(result.attempts).toBe(2);
    expect(rounds[1]).toEqual(['10.0.0.3', '10.0.0.4']);
  });

  it('should emit seek_timeout once after every round fails', async () => {
    const dialer = jest.fn<Promise<boolean>, [string]>().mockResolvedValue(false);
    const scanner = createScanner(dialer);

    const result = await scanner.seek(2);

    expect(result).toEqual({ status: 'timeout', peerCount: 0, targetCount: 2, attempts: 3 });
    expect(dialer).toHaveBeenCalledTimes(9);
    expect(seekTimeout).toHaveBeenCalledTimes(1);
    expect(seekTimeout).toHaveBeenCalledWith(0, 2);
    expect(allConnected).not.toHaveBeenCalled();
  });

  it('should count a rejected dial as a failed candidate', async () => {
    const scanner = createScanner(
      async (address) => {
        if (address === '10.0.0.2') {
          throw new Error('unreachable');
        }
        return address === '10.0.0.4' && admitAt(address);
      },
      { maxAttempts: 1 }
    );

    await expect(scanner.seek(1)).resolves.toMatchObject({ status: 'satisfied', peerCount: 1 });
  });

  it('should return at once without dialing when the target is already met', async () => {
    const first = createScanner(async (address) => admitAt(address));
    await first.seek(1);
    allConnected.mockClear();

    const dialer = jest.fn<Promise<boolean>, [string]>();
    const scanner = createScanner(dialer);
    const result = await scanner.seek(1);

    expect(result).toEqual({ status: 'satisfied', peerCount: 1, targetCount: 1, attempts: 0 });
    expect(dialer).not.toHaveBeenCalled();
    expect(allConnected).not.toHaveBeenCalled();
    expect(seekTimeout).not.toHaveBeenCalled();
  });

  it('should set the registry policy to the target while seeking', async () => {
    let acceptingDuringRound = false;
    const scanner = createScanner(
      async () => {
        acceptingDuringRound = registry.isAcceptingConnections;
        return false;
      },
      { maxAttempts: 1 }
    );

    await scanner.seek(3);

    expect(acceptingDuringRound).toBe(true);
    expect(registry.policy).toEqual({ maxPeers: 3, seekingPeers: 3 });
  });

  it('should not emit all_peers_connected twice when the last admission already did', async () => {
    const scanner = createScanner(async (address) => address === '10.0.0.2' && admitAt(address));

    await scanner.seek(1);

    expect(allConnected).toHaveBeenCalledTimes(1);
  });

  it('should share one in-flight seek between concurrent callers', async () => {
    const dialer = jest.fn<Promise<boolean>, [string]>().mockResolvedValue(false);
    const scanner = createScanner(dialer, { maxAttempts: 1 });

    const first = scanner.seek(2);
    const second = scanner.seek(1);

    expect(second).toBe(first);
    expect(scanner.isSeeking).toBe(true);
    await expect(first).resolves.toMatchObject({ status: 'timeout', targetCount: 2 });
    expect(scanner.isSeeking).toBe(false);
    expect(dialer).toHaveBeenCalledTimes(3);
  });

  it('should raise the running target when a larger seek joins', async () => {
    // Arrange
    const dialer = jest.fn<Promise<boolean>, [string]>().mockResolvedValue(false);
    const scanner = createScanner(dialer, { maxAttempts: 2 });

    // Act
    const first = scanner.seek(2);
    const second = scanner.seek(5);

    // Assert
    expect(second).toBe(first);
    expect(registry.policy).toEqual({ maxPeers: 5, seekingPeers: 5 });
    await expect(second).resolves.toEqual({
      status: 'timeout',
      peerCount: 0,
      targetCount: 5,
      attempts: 2,
    });
    expect(seekTimeout).toHaveBeenCalledTimes(1);
    expect(seekTimeout).toHaveBeenCalledWith(0, 5);
  });

  it('should keep seeking for a raised target after the first is met', async () => {
    // Round one dials under a target of 1, so only 10.0.0.2 is admitted
    const scanner = createScanner(async (address) => admitAt(address));

    const first = scanner.seek(1);
    scanner.seek(2);

    await expect(first).resolves.toEqual({
      status: 'satisfied',
      peerCount: 2,
      targetCount: 2,
      attempts: 2,
    });
    expect(registry.connectedAddresses).toEqual(new Set(['10.0.0.2', '10.0.0.3']));
    // Once for the first target, once more for the raised one
    expect(allConnected).toHaveBeenCalledTimes(2);
    expect(seekTimeout).not.toHaveBeenCalled();
  });

  it('should resolve aborted without seek_timeout when aborted during backoff', async () => {
    const scanner = createScanner(async () => false, { maxAttempts: 5, backoffMs: 10_000 });

    const seek = scanner.seek(1);
    await new Promise((resolve) => setTimeout(resolve, 20));
    scanner.abort();

    await expect(seek).resolves.toEqual({
      status: 'aborted',
      peerCount: 0,
      targetCount: 1,
      attempts: 1,
    });
    expect(seekTimeout).not.toHaveBeenCalled();
  });
});
