/**
 * Unit tests for local identity helpers
 */

import type { NetworkInterfaceInfo } from 'os';
import { createLocalIdentity, isWildcardHost, resolveLocalAddresses } from './local-identity';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

const iface = (address: string, family: 'IPv4' | 'IPv6'): NetworkInterfaceInfo =>
  family === 'IPv4'
    ? {
        address,
        family,
        netmask: '255.255.255.0',
        mac: '00:00:00:00:00:00',
        internal: false,
        cidr: `${address}/24`,
      }
    : {
        address,
        family,
        netmask: 'ffff:ffff:ffff:ffff::',
        mac: '00:00:00:00:00:00',
        internal: false,
        cidr: `${address}/64`,
        scopeid: 0,
      };

describe('createLocalIdentity', () => {
  it('should generate a UUID v4 peer ID and keep the app name', () => {
    const identity = createLocalIdentity('combat_game');

    expect(identity.peerId).toMatch(UUID_V4);
    expect(identity.appName).toBe('combat_game');
  });

  it('should generate a different ID for every identity', () => {
    const ids = new Set(Array.from({ length: 50 }, () => createLocalIdentity('a').peerId));

    expect(ids.size).toBe(50);
  });

  it('should be frozen', () => {
    const identity = createLocalIdentity('a');

    expect(Object.isFrozen(identity)).toBe(true);
  });
});

describe('resolveLocalAddresses', () => {
  const interfaces = {
    eth0: [iface('10.102.251.7', 'IPv4'), iface('fe80::1', 'IPv6')],
    wlan0: [iface('192.168.0.20', 'IPv4')],
    down: undefined,
  };

  it('should return only the bound address for a specific host', () => {
    expect(resolveLocalAddresses('127.0.0.2', interfaces)).toEqual(new Set(['127.0.0.2']));
  });

  it('should return loopback and every IPv4 interface for a wildcard host', () => {
    expect(resolveLocalAddresses('0.0.0.0', interfaces)).toEqual(
      new Set(['127.0.0.1', '10.102.251.7', '192.168.0.20'])
    );
  });

  it('should treat :: as a wildcard host', () => {
    expect(resolveLocalAddresses('::', {})).toEqual(new Set(['127.0.0.1']));
  });
});

describe('isWildcardHost', () => {
  it('should recognize wildcard binds', () => {
    expect(isWildcardHost('0.0.0.0')).toBe(true);
    expect(isWildcardHost('::')).toBe(true);
    expect(isWildcardHost('10.0.0.4')).toBe(false);
  });
});
