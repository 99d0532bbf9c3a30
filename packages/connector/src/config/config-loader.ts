/**
 * Configuration Loader Module
 *
 * Loads LAN Link peer configuration from an optional YAML file, applies
 * environment variable overrides, validates every field and fills in
 * defaults.
 *
 * Environment variables (override the file):
 * - LANLINK_APP_NAME
 * - LANLINK_PORT
 * - LANLINK_HOST
 * - LANLINK_ADDRESS_PREFIX
 * - LANLINK_ADDRESS_START
 * - LANLINK_ADDRESS_COUNT
 * - LANLINK_SCAN_ATTEMPTS
 * - LANLINK_SCAN_BACKOFF_MS
 * - LOG_LEVEL
 *
 * @packageDocumentation
 */

import * as fs from 'fs';
import * as yaml from 'js-yaml';
import { isLogLevel } from '../utils/logger';
import type {
  DiscoveryConfig,
  HandshakeConfig,
  InboxConfig,
  PeerNodeConfig,
} from './types';

/**
 * Custom Error Class for Configuration Errors
 *
 * Thrown when configuration validation fails during loading.
 *
 * @example
 * ```typescript
 * throw new ConfigurationError('Missing required field: appName');
 * ```
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError);
    }
  }
}

/**
 * Default listening and connecting port
 */
export const DEFAULT_PORT = 9090;

export const DEFAULT_DISCOVERY_CONFIG: DiscoveryConfig = {
  addressPrefix: '10.102.251.',
  addressStart: 1,
  addressCount: 20,
  maxAttempts: 10,
  backoffMs: 1000,
};

export const DEFAULT_HANDSHAKE_CONFIG: HandshakeConfig = {
  initiatorTimeoutMs: 2000,
  acceptorTimeoutMs: 5000,
  tieBreak: true,
};

export const DEFAULT_INBOX_CONFIG: InboxConfig = {
  capacity: 256,
};

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const IPV4_PREFIX_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.$/;

/**
 * Configuration Loader Class
 *
 * Static class providing methods to load and validate peer configuration.
 *
 * @example
 * ```typescript
 * try {
 *   const config = ConfigLoader.loadConfig('./lanlink.yaml');
 *   console.log(`Loaded config for app: ${config.appName}`);
 * } catch (error) {
 *   if (error instanceof ConfigurationError) {
 *     console.error(`Configuration error: ${error.message}`);
 *     process.exit(1);
 *   }
 * }
 * ```
 */
export class ConfigLoader {
  /**
   * Load and Validate Configuration
   *
   * @param filePath - Optional path to a YAML configuration file
   * @param env - Environment to read overrides from (defaults to process.env)
   * @returns Validated configuration with defaults applied
   * @throws ConfigurationError if the file is unreadable, the YAML is invalid or validation fails
   */
  static loadConfig(filePath?: string, env: NodeJS.ProcessEnv = process.env): PeerNodeConfig {
    const fileConfig = filePath ? this.readYamlFile(filePath) : {};
    const merged = this.applyEnvironmentOverrides(fileConfig, env);
    return this.resolveConfig(merged);
  }

  /**
   * Validate a configuration object and fill in defaults
   *
   * Accepts already-parsed input, e.g. a PeerNodeConfigInput literal.
   *
   * @throws ConfigurationError if any field is missing or invalid
   */
  static resolveConfig(input: unknown): PeerNodeConfig {
    if (!isRecord(input)) {
      throw new ConfigurationError('Configuration must be an object');
    }

    const appName = input.appName;
    if (typeof appName !== 'string' || appName.trim().length === 0) {
      throw new ConfigurationError('Missing required field: appName');
    }

    const port = this.readInteger(input, 'port', 'port', DEFAULT_PORT, 1, 65535);

    const host = input.host ?? '0.0.0.0';
    if (typeof host !== 'string' || host.length === 0) {
      throw new ConfigurationError('host must be a non-empty string');
    }

    const logLevelRaw = input.logLevel ?? 'info';
    const logLevel = typeof logLevelRaw === 'string' ? logLevelRaw.toLowerCase() : '';
    if (!isLogLevel(logLevel)) {
      throw new ConfigurationError(
        `logLevel must be one of debug, info, warn, error, got: ${String(logLevelRaw)}`
      );
    }

    return {
      appName,
      port,
      host,
      logLevel,
      discovery: this.resolveDiscovery(input.discovery),
      handshake: this.resolveHandshake(input.handshake),
      inbox: this.resolveInbox(input.inbox),
    };
  }

  /**
   * Read and parse a YAML file into a raw object
   * @private
   */
  private static readYamlFile(filePath: string): RawRecord {
    let fileContent: string;
    try {
      fileContent = fs.readFileSync(filePath, 'utf8');
    } catch (error) {
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
        throw new ConfigurationError(`Configuration file not found: ${filePath}`);
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Failed to read configuration file: ${reason}`);
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(fileContent);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Invalid YAML syntax: ${reason}`);
    }

    if (!isRecord(parsed)) {
      throw new ConfigurationError('Configuration must be a YAML object');
    }

    return parsed;
  }

  /**
   * Overlay LANLINK_* and LOG_LEVEL environment variables on a raw config
   * @private
   */
  private static applyEnvironmentOverrides(raw: RawRecord, env: NodeJS.ProcessEnv): RawRecord {
    const discovery: RawRecord = isRecord(raw.discovery) ? { ...raw.discovery } : {};
    const merged: RawRecord = { ...raw };

    if (env.LANLINK_APP_NAME) {
      merged.appName = env.LANLINK_APP_NAME;
    }
    if (env.LANLINK_PORT) {
      merged.port = this.parseEnvInteger('LANLINK_PORT', env.LANLINK_PORT);
    }
    if (env.LANLINK_HOST) {
      merged.host = env.LANLINK_HOST;
    }
    if (env.LOG_LEVEL) {
      merged.logLevel = env.LOG_LEVEL;
    }
    if (env.LANLINK_ADDRESS_PREFIX) {
      discovery.addressPrefix = env.LANLINK_ADDRESS_PREFIX;
    }
    if (env.LANLINK_ADDRESS_START) {
      discovery.addressStart = this.parseEnvInteger(
        'LANLINK_ADDRESS_START',
        env.LANLINK_ADDRESS_START
      );
    }
    if (env.LANLINK_ADDRESS_COUNT) {
      discovery.addressCount = this.parseEnvInteger(
        'LANLINK_ADDRESS_COUNT',
        env.LANLINK_ADDRESS_COUNT
      );
    }
    if (env.LANLINK_SCAN_ATTEMPTS) {
      discovery.maxAttempts = this.parseEnvInteger(
        'LANLINK_SCAN_ATTEMPTS',
        env.LANLINK_SCAN_ATTEMPTS
      );
    }
    if (env.LANLINK_SCAN_BACKOFF_MS) {
      discovery.backoffMs = this.parseEnvInteger(
        'LANLINK_SCAN_BACKOFF_MS',
        env.LANLINK_SCAN_BACKOFF_MS
      );
    }

    merged.discovery = discovery;
    return merged;
  }

  private static resolveDiscovery(raw: unknown): DiscoveryConfig {
    const section = this.readSection(raw, 'discovery');
    const defaults = DEFAULT_DISCOVERY_CONFIG;

    const addressPrefix = section.addressPrefix ?? defaults.addressPrefix;
    if (typeof addressPrefix !== 'string') {
      throw new ConfigurationError('discovery.addressPrefix must be a string');
    }
    const match = IPV4_PREFIX_PATTERN.exec(addressPrefix);
    if (!match || match.slice(1).some((octet) => Number(octet) > 255)) {
      throw new ConfigurationError(
        `discovery.addressPrefix must be three IPv4 octets followed by a dot (e.g. "10.102.251."), got: ${addressPrefix}`
      );
    }

    const addressStart = this.readInteger(
      section,
      'addressStart',
      'discovery.addressStart',
      defaults.addressStart,
      0,
      255
    );
    const addressCount = this.readInteger(
      section,
      'addressCount',
      'discovery.addressCount',
      defaults.addressCount,
      1,
      256
    );
    if (addressStart + addressCount - 1 > 255) {
      throw new ConfigurationError(
        `discovery range ${addressPrefix}${addressStart} + ${addressCount} addresses exceeds ${addressPrefix}255`
      );
    }

    return {
      addressPrefix,
      addressStart,
      addressCount,
      maxAttempts: this.readInteger(
        section,
        'maxAttempts',
        'discovery.maxAttempts',
        defaults.maxAttempts,
        1
      ),
      backoffMs: this.readInteger(section, 'backoffMs', 'discovery.backoffMs', defaults.backoffMs, 0),
    };
  }

  private static resolveHandshake(raw: unknown): HandshakeConfig {
    const section = this.readSection(raw, 'handshake');
    const defaults = DEFAULT_HANDSHAKE_CONFIG;

    const tieBreak = section.tieBreak ?? defaults.tieBreak;
    if (typeof tieBreak !== 'boolean') {
      throw new ConfigurationError('handshake.tieBreak must be a boolean');
    }

    return {
      initiatorTimeoutMs: this.readInteger(
        section,
        'initiatorTimeoutMs',
        'handshake.initiatorTimeoutMs',
        defaults.initiatorTimeoutMs,
        1
      ),
      acceptorTimeoutMs: this.readInteger(
        section,
        'acceptorTimeoutMs',
        'handshake.acceptorTimeoutMs',
        defaults.acceptorTimeoutMs,
        1
      ),
      tieBreak,
    };
  }

  private static resolveInbox(raw: unknown): InboxConfig {
    const section = this.readSection(raw, 'inbox');
    return {
      capacity: this.readInteger(
        section,
        'capacity',
        'inbox.capacity',
        DEFAULT_INBOX_CONFIG.capacity,
        1
      ),
    };
  }

  private static readSection(raw: unknown, name: string): RawRecord {
    if (raw === undefined || raw === null) {
      return {};
    }
    if (!isRecord(raw)) {
      throw new ConfigurationError(`${name} must be an object`);
    }
    return raw;
  }

  /**
   * Read an optional integer field with bounds
   * @private
   */
  private static readInteger(
    section: RawRecord,
    key: string,
    label: string,
    fallback: number,
    min: number,
    max: number = Number.MAX_SAFE_INTEGER
  ): number {
    const value = section[key] ?? fallback;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
      const range = max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `between ${min}-${max}`;
      throw new ConfigurationError(`${label} must be an integer ${range}, got: ${String(value)}`);
    }
    return value;
  }

  private static parseEnvInteger(name: string, value: string): number {
    if (!/^-?\d+$/.test(value.trim())) {
      throw new ConfigurationError(`${name} must be an integer, got: ${value}`);
    }
    return parseInt(value, 10);
  }
}
