/**
 * Local Identity
 *
 * A process-lifetime peer ID plus the application namespace used to
 * recognize compatible peers.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'crypto';
import * as os from 'os';

/**
 * Identity of the local process on the network
 */
export interface LocalIdentity {
  /** Random UUID, unique per process run */
  readonly peerId: string;

  /** Application namespace; peers with another name are refused */
  readonly appName: string;
}

/**
 * Create a fresh identity for this process
 *
 * @param appName - Application namespace
 * @returns Frozen identity with a new UUID
 */
export function createLocalIdentity(appName: string): LocalIdentity {
  return Object.freeze({ peerId: randomUUID(), appName });
}

const WILDCARD_HOSTS = new Set(['0.0.0.0', '::', '']);

/**
 * True when the bind host listens on every interface
 */
export function isWildcardHost(host: string): boolean {
  return WILDCARD_HOSTS.has(host);
}

/**
 * Addresses that belong to the local host, for a given bind address
 *
 * A listener bound to one specific address is only reachable there, so only
 * that address is local. A wildcard bind answers on every interface, so
 * every IPv4 interface address plus loopback counts as local.
 *
 * @param bindHost - Host the listener is bound to
 * @param interfaces - Interface table (defaults to os.networkInterfaces())
 */
export function resolveLocalAddresses(
  bindHost: string,
  interfaces: NodeJS.Dict<os.NetworkInterfaceInfo[]> = os.networkInterfaces()
): Set<string> {
  if (!isWildcardHost(bindHost)) {
    return new Set([bindHost]);
  }

  const addresses = new Set<string>(['127.0.0.1']);
  for (const entries of Object.values(interfaces)) {
    for (const entry of entries ?? []) {
      if (entry.family === 'IPv4') {
        addresses.add(entry.address);
      }
    }
  }
  return addresses;
}
