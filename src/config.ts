import { readFileSync, existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { homedir } from 'node:os';
import { WELL_KNOWN_HOSTNAMES } from './discovery/address-space.js';
import { isLogLevel, type LogLevel } from './logger.js';

/** TCP port the device serves its handshake, /system/info and /ws/audio on. */
export const SERVICE_PORT = 8000;

/** WebSocket upgrade path for the audio stream. */
export const STREAM_PATH = '/ws/audio';

/**
 * Settings for the streaming connection. All durations are milliseconds.
 */
export interface DeviceConnectionConfig {
  /** Host used by `vlink connect` when none is given */
  defaultHost: string;
  port: number;
  path: string;
  /** Time allowed for the WebSocket upgrade to complete */
  connectTimeout: number;
  /** Fixed pause before each reconnect attempt */
  reconnectDelay: number;
  maxReconnectAttempts: number;
  heartbeatInterval: number;
  /** Peer is considered dead after heartbeatInterval × this without inbound traffic */
  heartbeatTimeoutMultiplier: number;
}

/**
 * Settings for subnet and hostname probing. All durations are milliseconds.
 */
export interface DiscoveryConfig {
  port: number;
  /** Host probes in flight per subnet */
  batchSize: number;
  /** Ping each address before the TCP handshake */
  reachabilityCheck: boolean;
  pingTimeout: number;
  handshakeTimeout: number;
  infoTimeout: number;
  neighborTimeout: number;
  hostnames: string[];
}

export interface LoggingConfig {
  level: LogLevel;
}

/**
 * Canonical client configuration shape.
 * Use loadClientConfig() to load from file merged over defaults.
 */
export interface ClientConfig {
  device: DeviceConnectionConfig;
  discovery: DiscoveryConfig;
  logging: LoggingConfig;
}

export function defaultClientConfig(): ClientConfig {
  return {
    device: {
      defaultHost: 'raspberrypi.local',
      port: SERVICE_PORT,
      path: STREAM_PATH,
      connectTimeout: 30_000,
      reconnectDelay: 5_000,
      maxReconnectAttempts: 10,
      heartbeatInterval: 30_000,
      heartbeatTimeoutMultiplier: 4,
    },
    discovery: {
      port: SERVICE_PORT,
      batchSize: 50,
      reachabilityCheck: true,
      pingTimeout: 1_000,
      handshakeTimeout: 3_000,
      infoTimeout: 5_000,
      neighborTimeout: 2_000,
      hostnames: [...WELL_KNOWN_HOSTNAMES],
    },
    logging: {
      level: 'info',
    },
  };
}

/**
 * Default config file path: VLINK_CONFIG env or ~/.config/vlink/config.json
 */
export function getDefaultConfigPath(): string {
  if (process.env.VLINK_CONFIG) {
    return resolve(process.env.VLINK_CONFIG);
  }
  return resolve(homedir(), '.config', 'vlink', 'config.json');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function positiveNumber(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : fallback;
}

function positiveInteger(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : fallback;
}

function nonEmptyString(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim() !== '' ? value : fallback;
}

/**
 * Merge a parsed JSON object over the defaults. Mistyped fields keep their default.
 */
export function parseClientConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const config = defaultClientConfig();
  const root = isRecord(raw) ? raw : {};

  if (isRecord(root.device)) {
    const d = root.device;
    const device = config.device;
    device.defaultHost = nonEmptyString(d.defaultHost, device.defaultHost);
    device.port = positiveInteger(d.port, device.port);
    device.path = nonEmptyString(d.path, device.path);
    device.connectTimeout = positiveNumber(d.connectTimeout, device.connectTimeout);
    device.reconnectDelay = positiveNumber(d.reconnectDelay, device.reconnectDelay);
    device.maxReconnectAttempts = positiveInteger(d.maxReconnectAttempts, device.maxReconnectAttempts);
    device.heartbeatInterval = positiveNumber(d.heartbeatInterval, device.heartbeatInterval);
    device.heartbeatTimeoutMultiplier = positiveNumber(d.heartbeatTimeoutMultiplier, device.heartbeatTimeoutMultiplier);
  }

  if (isRecord(root.discovery)) {
    const d = root.discovery;
    const discovery = config.discovery;
    discovery.port = positiveInteger(d.port, discovery.port);
    discovery.batchSize = positiveInteger(d.batchSize, discovery.batchSize);
    discovery.reachabilityCheck = typeof d.reachabilityCheck === 'boolean' ? d.reachabilityCheck : discovery.reachabilityCheck;
    discovery.pingTimeout = positiveNumber(d.pingTimeout, discovery.pingTimeout);
    discovery.handshakeTimeout = positiveNumber(d.handshakeTimeout, discovery.handshakeTimeout);
    discovery.infoTimeout = positiveNumber(d.infoTimeout, discovery.infoTimeout);
    discovery.neighborTimeout = positiveNumber(d.neighborTimeout, discovery.neighborTimeout);
    if (Array.isArray(d.hostnames)) {
      discovery.hostnames = d.hostnames.filter((h): h is string => typeof h === 'string' && h.trim() !== '');
    }
  }

  if (isRecord(root.logging) && isLogLevel(root.logging.level)) {
    config.logging.level = root.logging.level;
  }
  if (isLogLevel(env.VLINK_LOG_LEVEL)) {
    config.logging.level = env.VLINK_LOG_LEVEL;
  }

  return config;
}

function parseJson(content: string, configPath: string): unknown {
  try {
    return JSON.parse(content) as unknown;
  } catch {
    throw new Error(`Invalid JSON in config file: ${configPath}`);
  }
}

/**
 * Load client configuration from a JSON file (sync).
 * A missing file yields the defaults.
 *
 * @param path - Config file path; defaults to getDefaultConfigPath()
 * @throws Error if the file holds invalid JSON
 */
export function loadClientConfig(path?: string): ClientConfig {
  const configPath = path ?? getDefaultConfigPath();

  if (!existsSync(configPath)) {
    return parseClientConfig({});
  }

  return parseClientConfig(parseJson(readFileSync(configPath, 'utf-8'), configPath));
}

/**
 * Load client configuration from a JSON file (async).
 */
export async function loadClientConfigAsync(path?: string): Promise<ClientConfig> {
  const configPath = path ?? getDefaultConfigPath();

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    const code = typeof err === 'object' && err !== null && 'code' in err ? err.code : undefined;
    if (code === 'ENOENT') {
      return parseClientConfig({});
    }
    throw err;
  }

  return parseClientConfig(parseJson(content, configPath));
}
