/**
 * Configuration Types for LAN Link Peers
 *
 * Defines TypeScript interfaces for the YAML configuration schema.
 *
 * Example YAML Configuration:
 *
 * ```yaml
 * appName: combat_game
 * port: 9090
 * host: 0.0.0.0
 * logLevel: info
 *
 * discovery:
 *   addressPrefix: 10.102.251.
 *   addressStart: 1
 *   addressCount: 20
 *   maxAttempts: 10
 *   backoffMs: 1000
 *
 * handshake:
 *   initiatorTimeoutMs: 2000
 *   acceptorTimeoutMs: 5000
 *   tieBreak: true
 * ```
 *
 * @packageDocumentation
 */

import type { LogLevel } from '../utils/logger';

/**
 * Discovery Scanner Configuration
 *
 * Candidates are the contiguous IPv4 range
 * `addressPrefix + addressStart` .. `addressPrefix + (addressStart + addressCount - 1)`.
 */
export interface DiscoveryConfig {
  /**
   * First three octets including the trailing dot, e.g. "10.102.251."
   */
  addressPrefix: string;

  /**
   * Last octet of the first candidate address
   * @default 1
   */
  addressStart: number;

  /**
   * Number of consecutive candidate addresses
   * @default 20
   */
  addressCount: number;

  /**
   * Scan rounds per seekPeers call before seek_timeout
   * @default 10
   */
  maxAttempts: number;

  /**
   * Pause between scan rounds in milliseconds
   * @default 1000
   */
  backoffMs: number;
}

/**
 * Handshake Protocol Configuration
 */
export interface HandshakeConfig {
  /**
   * Per-step wait on the initiator side, including the TCP connect
   * @default 2000
   */
  initiatorTimeoutMs: number;

  /**
   * Per-step wait on the acceptor side
   * @default 5000
   */
  acceptorTimeoutMs: number;

  /**
   * Only the peer with the lexicographically lower ID initiates when both
   * sides are seeking
   * @default true
   */
  tieBreak: boolean;
}

/**
 * Command Inbox Configuration
 */
export interface InboxConfig {
  /**
   * Maximum queued commands; further commands are dropped
   * @default 256
   */
  capacity: number;
}

/**
 * Peer Node Configuration Interface
 *
 * Fully resolved configuration: every optional field of the YAML file has a
 * default by the time the loader returns it.
 */
export interface PeerNodeConfig {
  /**
   * Application namespace; peers with a different name are never admitted
   */
  appName: string;

  /**
   * TCP port every peer listens on and connects to
   * @default 9090
   */
  port: number;

  /**
   * Local address to bind
   * @default '0.0.0.0'
   */
  host: string;

  /**
   * Logging verbosity level
   * @default 'info'
   */
  logLevel: LogLevel;

  discovery: DiscoveryConfig;

  handshake: HandshakeConfig;

  inbox: InboxConfig;
}

/**
 * Partial configuration accepted by PeerNode and the loader before defaults apply
 */
export interface PeerNodeConfigInput {
  appName: string;
  port?: number;
  host?: string;
  logLevel?: LogLevel;
  discovery?: Partial<DiscoveryConfig>;
  handshake?: Partial<HandshakeConfig>;
  inbox?: Partial<InboxConfig>;
}
