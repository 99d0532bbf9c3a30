#!/usr/bin/env node
/* eslint-disable no-console */
/**
 * LAN Link CLI
 *
 * Command-line interface for running a LAN Link peer.
 * Provides commands for joining a session and inspecting the scan range.
 */

import * as readline from 'readline';
import { Command, InvalidArgumentError } from 'commander';
import { ConfigLoader, ConfigurationError } from '../config/config-loader';
import { PeerNode } from '../core/peer-node';
import { buildCandidateRange } from '../discovery/candidate-addresses';
import { resolveLocalAddresses } from '../identity/local-identity';
import { ListenerError } from '../transport/connection-listener';

const program = new Command();

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function shortId(peerId: string): string {
  return peerId.slice(0, 8);
}

program
  .name('lanlink')
  .description('LAN Link - peer discovery and messaging on the local network')
  .version('0.1.0');

/**
 * Start command - join a session and relay stdin as messages
 */
program
  .command('start')
  .description('Start a peer, seek other peers and relay stdin lines as messages')
  .option('-a, --app <name>', 'Application name shared by compatible peers')
  .option('-c, --config <path>', 'Path to YAML configuration file')
  .option('-n, --peers <count>', 'Number of peers to seek', parsePositiveInteger, 1)
  .option('-p, --port <port>', 'Port to listen on and connect to', parsePositiveInteger)
  .action(async (options: { app?: string; config?: string; peers: number; port?: number }) => {
    const env: NodeJS.ProcessEnv = { ...process.env };
    if (options.app) {
      env.LANLINK_APP_NAME = options.app;
    }
    if (options.port !== undefined) {
      env.LANLINK_PORT = String(options.port);
    }

    let node: PeerNode;
    try {
      node = new PeerNode(ConfigLoader.loadConfig(options.config, env));
    } catch (error) {
      if (error instanceof ConfigurationError) {
        console.error(`Configuration error: ${error.message}`);
        process.exit(1);
      }
      throw error;
    }

    node.on('peer_connected', (peer) => {
      console.log(`+ ${shortId(peer.id)} (${peer.address}) - ${node.peerCount} connected`);
    });
    node.on('peer_disconnected', (peer) => {
      console.log(`- ${shortId(peer.id)} (${peer.address}) - ${node.peerCount} connected`);
    });
    node.on('all_peers_connected', () => {
      console.log('All peers connected.');
    });
    node.on('seek_timeout', (peerCount, targetCount) => {
      console.log(`Seek timed out with ${peerCount}/${targetCount} peers.`);
    });
    node.on('message', (peer, data) => {
      console.log(`[${shortId(peer.id)}] ${JSON.stringify(data)}`);
    });

    try {
      await node.startListening();
    } catch (error) {
      if (error instanceof ListenerError) {
        console.error(`Failed to start: ${error.message}`);
        process.exit(1);
      }
      throw error;
    }

    console.log(`Peer ${node.localId} (${node.appName}) listening on port ${node.listeningPort}`);

    const input = readline.createInterface({ input: process.stdin });
    input.on('line', (line) => {
      const text = line.trim();
      if (text.length > 0) {
        node.emit('message', { text });
      }
    });

    const shutdown = (): void => {
      input.close();
      node
        .stopListening()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('Shutdown failed:', error instanceof Error ? error.message : error);
          process.exit(1);
        });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    const result = await node.seekPeers(options.peers);
    console.log(`Seek ${result.status} after ${result.attempts} round(s).`);
  });

/**
 * Range command - print the candidate addresses a peer would scan
 */
program
  .command('range')
  .description('Print the candidate addresses scanned by seek')
  .option('-c, --config <path>', 'Path to YAML configuration file')
  .action((options: { config?: string }) => {
    try {
      const config = ConfigLoader.loadConfig(options.config, {
        LANLINK_APP_NAME: 'lanlink',
        ...process.env,
      });
      const local = resolveLocalAddresses(config.host);
      for (const address of buildCandidateRange(config.discovery)) {
        console.log(local.has(address) ? `${address} (local, skipped)` : address);
      }
    } catch (error) {
      if (error instanceof ConfigurationError) {
        console.error(`Configuration error: ${error.message}`);
        process.exit(1);
      }
      throw error;
    }
  });

// Parse command line arguments
program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
