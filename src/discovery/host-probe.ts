import { parseCapabilities } from './capabilities.js';
import { createDevice } from './device.js';
import { parseHardwareAddress } from './neighbor-table.js';
import { systemNetwork, type ProbeNetwork } from './network.js';
import type { Device, DeviceCapabilities } from './types.js';
import { errorMessage, silentLogger, type Logger } from '../logger.js';

/**
 * Configuration for HostProbe. Durations are milliseconds.
 */
export interface HostProbeOptions {
  /** Service port (default: 8000) */
  port?: number;
  /** Ping addresses before the TCP handshake (default: true) */
  reachabilityCheck?: boolean;
  pingTimeout?: number;
  handshakeTimeout?: number;
  infoTimeout?: number;
  neighborTimeout?: number;
  /** Path of the capability endpoint (default: /system/info) */
  infoPath?: string;
  network?: ProbeNetwork;
  logger?: Logger;
}

type ResolvedOptions = Required<Omit<HostProbeOptions, 'network' | 'logger'>>;

/**
 * One bounded check of one address or hostname against the device service.
 *
 * Steps run in order and stop at the first failure:
 *   a. ping (addresses only)
 *   b. TCP connect to the service port: the handshake
 *   c. GET /system/info → capabilities (best-effort)
 *   d. neighbor table → hardware address (best-effort)
 * Only (a) and (b) decide whether a Device exists.
 */
export class HostProbe {
  private options: ResolvedOptions;
  private network: ProbeNetwork;
  private logger: Logger;

  constructor(options: HostProbeOptions = {}) {
    this.options = {
      port: options.port ?? 8000,
      reachabilityCheck: options.reachabilityCheck ?? true,
      pingTimeout: options.pingTimeout ?? 1_000,
      handshakeTimeout: options.handshakeTimeout ?? 3_000,
      infoTimeout: options.infoTimeout ?? 5_000,
      neighborTimeout: options.neighborTimeout ?? 2_000,
      infoPath: options.infoPath ?? '/system/info',
    };
    this.network = options.network ?? systemNetwork;
    this.logger = options.logger ?? silentLogger;
  }

  get port(): number {
    return this.options.port;
  }

  /**
   * Steps (a) and (b). Returns a bare Device, or null if the host is not a candidate.
   */
  async handshake(address: string, hostname?: string): Promise<Device | null> {
    const { port } = this.options;

    if (this.options.reachabilityCheck && hostname === undefined) {
      const reachable = await this.network.ping(address, this.options.pingTimeout);
      if (!reachable) {
        return null;
      }
    }

    const accepted = await this.network.connect(address, port, this.options.handshakeTimeout);
    if (!accepted) {
      this.logger.debug(`No service on ${address}:${port}`);
      return null;
    }

    return createDevice({ address, port, hostname });
  }

  /**
   * Steps (c) and (d), concurrently. Returns a new record; the input is untouched.
   */
  async enrich(device: Device): Promise<Device> {
    const [capabilities, hardwareAddress] = await Promise.all([
      this.fetchCapabilities(device.address),
      this.lookupHardwareAddress(device.address),
    ]);

    return createDevice({
      address: device.address,
      port: device.port,
      hostname: device.hostname,
      capabilities: capabilities ?? device.capabilities,
      hardwareAddress: hardwareAddress ?? device.hardwareAddress,
    });
  }

  /**
   * Full probe of a literal IPv4 address.
   */
  async probeAddress(address: string): Promise<Device | null> {
    const device = await this.handshake(address);
    return device ? this.enrich(device) : null;
  }

  /**
   * Resolve a hostname, then handshake and enrich. Unresolvable names yield null.
   */
  async probeHostname(hostname: string): Promise<Device | null> {
    const address = await this.resolve(hostname);
    if (!address) {
      return null;
    }
    const device = await this.handshake(address, hostname);
    return device ? this.enrich(device) : null;
  }

  async resolve(hostname: string): Promise<string | null> {
    try {
      return await this.network.resolve(hostname);
    } catch (err) {
      this.logger.debug(`Could not resolve ${hostname}: ${errorMessage(err)}`);
      return null;
    }
  }

  private async fetchCapabilities(address: string): Promise<DeviceCapabilities | undefined> {
    const url = `http://${address}:${this.options.port}${this.options.infoPath}`;
    try {
      const response = await this.network.httpGet(url, this.options.infoTimeout);
      if (response.status < 200 || response.status >= 300) {
        this.logger.debug(`${url} answered ${response.status}`);
        return undefined;
      }
      const capabilities = parseCapabilities(JSON.parse(response.body));
      if (!capabilities) {
        this.logger.debug(`${url} returned an unrecognised payload`);
      }
      return capabilities;
    } catch (err) {
      this.logger.debug(`Capability fetch from ${url} failed: ${errorMessage(err)}`);
      return undefined;
    }
  }

  private async lookupHardwareAddress(address: string): Promise<string | undefined> {
    try {
      const output = await this.network.neighborTable(address, this.options.neighborTimeout);
      return parseHardwareAddress(output, address);
    } catch (err) {
      this.logger.debug(`Neighbor lookup for ${address} failed: ${errorMessage(err)}`);
      return undefined;
    }
  }
}
