#!/usr/bin/env node

import { parseArgs } from 'node:util';
import { loadClientConfig, type ClientConfig } from './config.js';
import { ConnectionManager } from './connection/connection-manager.js';
import { parseCidr } from './discovery/address-space.js';
import { DiscoveryEngine } from './discovery/discovery-engine.js';
import type { Device } from './discovery/types.js';
import { createLogger, errorMessage, isLogLevel, type Logger } from './logger.js';
import { DeviceSimulator } from './simulator/device-simulator.js';

interface CliOptions {
  config?: string;
  pretty?: boolean;
  port?: string;
  subnet?: string;
  name?: string;
  'log-level'?: string;
}

const USAGE = [
  'Usage: vlink <command> [options]',
  'Commands:',
  '  discover [--subnet a.b.c.d/nn] [--port n]   sweep local subnets and well-known hostnames',
  '  find <hostname> [--port n]                   probe one hostname',
  '  connect <host> [--port n]                    stream state changes and recognition results',
  '  simulate [--port n] [--name s]               run a simulated device',
  'Options: --config <path>, --pretty, --log-level <debug|info|warn|error|silent>',
].join('\n');

/**
 * Output data as JSON or pretty format.
 */
function output(data: unknown, pretty: boolean): void {
  if (!pretty) {
    console.log(JSON.stringify(data, null, 2));
    return;
  }
  if (typeof data === 'object' && data !== null) {
    for (const [key, value] of Object.entries(data)) {
      if (Array.isArray(value)) {
        console.log(`${key}:`);
        for (const item of value) {
          console.log(`  - ${typeof item === 'object' && item !== null ? JSON.stringify(item) : String(item)}`);
        }
      } else if (typeof value === 'object' && value !== null) {
        console.log(`${key}: ${JSON.stringify(value)}`);
      } else {
        console.log(`${key}: ${String(value)}`);
      }
    }
  } else {
    console.log(data);
  }
}

/**
 * Flatten a Device for output.
 */
function describeDevice(device: Device): Record<string, unknown> {
  return {
    name: device.displayName,
    address: device.address,
    port: device.port,
    hostname: device.hostname ?? null,
    hardwareAddress: device.hardwareAddress ?? null,
    version: device.capabilities?.version ?? null,
    model: device.capabilities?.model ?? null,
    lastSeen: new Date(device.lastSeen).toISOString(),
  };
}

function parsePort(value: string | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  const port = parseInt(value, 10);
  if (isNaN(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port number '${value}'. Port must be between 0 and 65535.`);
  }
  return port;
}

function setup(options: CliOptions): { config: ClientConfig; logger: Logger } {
  const config = loadClientConfig(options.config);
  const requested = options['log-level'];
  if (requested !== undefined) {
    if (!isLogLevel(requested)) {
      throw new Error(`Invalid log level '${requested}'`);
    }
    config.logging.level = requested;
  }
  // Logs go to stderr so stdout stays parseable.
  const logger = createLogger({ level: config.logging.level, stderr: true });
  return { config, logger };
}

function createEngine(config: ClientConfig, logger: Logger, port: number): DiscoveryEngine {
  return new DiscoveryEngine({ ...config.discovery, port, logger });
}

/**
 * Handle the `vlink discover` command.
 */
async function handleDiscover(options: CliOptions): Promise<void> {
  const { config, logger } = setup(options);
  const port = parsePort(options.port, config.discovery.port);
  const engine = createEngine(config, logger, port);

  const subnets = options.subnet ? [parseCidr(options.subnet)] : undefined;
  const devices = await engine.discover({ subnets });

  if (engine.lastError) {
    console.error(`Error: ${engine.lastError.message}`);
    process.exit(1);
  }

  output({ count: devices.length, devices: devices.map(describeDevice) }, options.pretty ?? false);
}

/**
 * Handle the `vlink find <hostname>` command.
 */
async function handleFind(args: string[], options: CliOptions): Promise<void> {
  const hostname = args[0];
  if (!hostname) {
    console.error('Error: Missing hostname. Usage: vlink find <hostname>');
    process.exit(1);
  }

  const { config, logger } = setup(options);
  const engine = createEngine(config, logger, parsePort(options.port, config.discovery.port));
  const device = await engine.findDevice(hostname);

  if (!device) {
    output({ status: 'not_found', hostname }, options.pretty ?? false);
    process.exit(1);
  }

  output({ status: 'found', device: describeDevice(device) }, options.pretty ?? false);
}

/**
 * Handle the `vlink connect <host>` command. Runs until SIGINT/SIGTERM.
 */
async function handleConnect(args: string[], options: CliOptions): Promise<void> {
  const { config, logger } = setup(options);
  const host = args[0] ?? config.device.defaultHost;
  const port = parsePort(options.port, config.device.port);

  const manager = new ConnectionManager({ ...config.device, logger });
  manager.subscribe({
    onStateChanged: (state, previous) => {
      console.log(JSON.stringify({ event: 'state', state, previous, at: new Date().toISOString() }));
    },
    onRecognitionResult: (result) => {
      console.log(JSON.stringify({ event: 'recognition', ...result }));
    },
    onError: (error) => {
      console.log(JSON.stringify({ event: 'error', name: error.name, message: error.message }));
    },
    onReconnectFailed: (attempts) => {
      console.error(`Error: Gave up after ${attempts} reconnect attempts`);
      process.exit(1);
    },
  });

  const shutdown = (): void => {
    manager
      .disconnect()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error('Error during disconnect:', errorMessage(err));
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  const connected = await manager.connect(host, port);
  if (!connected) {
    console.error(`Error: Could not connect to ${host}:${port}: ${manager.getSnapshot().lastError ?? 'unknown error'}`);
    process.exit(1);
  }
}

/**
 * Handle the `vlink simulate` command. Runs until SIGINT/SIGTERM.
 */
async function handleSimulate(options: CliOptions): Promise<void> {
  const { config, logger } = setup(options);
  const port = parsePort(options.port, config.device.port);

  const simulator = new DeviceSimulator({ name: options.name, path: config.device.path, logger });
  const boundPort = await simulator.start(port, '0.0.0.0');
  output({ status: 'listening', port: boundPort, path: config.device.path }, options.pretty ?? false);

  const shutdown = (): void => {
    simulator
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error('Error stopping simulator:', errorMessage(err));
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

/**
 * Parse CLI arguments and route to appropriate handler.
 */
async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    console.error(USAGE);
    process.exit(1);
  }

  const parsed = parseArgs({
    args,
    options: {
      config: { type: 'string' },
      pretty: { type: 'boolean' },
      port: { type: 'string' },
      subnet: { type: 'string' },
      name: { type: 'string' },
      'log-level': { type: 'string' },
    },
    strict: true,
    allowPositionals: true,
  });

  const command = parsed.positionals[0];
  const rest = parsed.positionals.slice(1);
  const options: CliOptions = parsed.values;

  try {
    switch (command) {
      case 'discover':
        await handleDiscover(options);
        break;
      case 'find':
        await handleFind(rest, options);
        break;
      case 'connect':
        await handleConnect(rest, options);
        break;
      case 'simulate':
        await handleSimulate(options);
        break;
      default:
        console.error(`Error: Unknown command '${command}'. Use: discover, find, connect, simulate`);
        process.exit(1);
    }
  } catch (e) {
    console.error('Error:', errorMessage(e));
    process.exit(1);
  }
}

main().catch((e: unknown) => {
  console.error('Fatal error:', errorMessage(e));
  process.exit(1);
});
