import { EventEmitter } from 'node:events';
import { enumerateSubnets, hostCandidates, WELL_KNOWN_HOSTNAMES } from './address-space.js';
import { sameDetails } from './device.js';
import { HostProbe } from './host-probe.js';
import type { ProbeNetwork } from './network.js';
import { DiscoverySession } from './session.js';
import type { Device, DiscoveryObserver, Subnet } from './types.js';
import { DiscoveryError } from '../errors.js';
import { errorMessage, silentLogger, type Logger } from '../logger.js';

/**
 * The parts of HostProbe the engine drives. Tests substitute instrumented stubs.
 */
export type HostProbeLike = Pick<HostProbe, 'handshake' | 'enrich' | 'resolve' | 'probeHostname'>;

/**
 * Configuration for DiscoveryEngine. Durations are milliseconds.
 */
export interface DiscoveryEngineOptions {
  /** Service port (default: 8000) */
  port?: number;
  /** Host probes in flight per subnet (default: 50) */
  batchSize?: number;
  /** Hostnames probed alongside the sweep (default: WELL_KNOWN_HOSTNAMES) */
  hostnames?: readonly string[];
  reachabilityCheck?: boolean;
  pingTimeout?: number;
  handshakeTimeout?: number;
  infoTimeout?: number;
  neighborTimeout?: number;
  /** Network primitives for the default HostProbe */
  network?: ProbeNetwork;
  /** Replaces the default HostProbe entirely */
  probe?: HostProbeLike;
  /** Subnet source (default: local interfaces) */
  enumerateSubnets?: () => Subnet[];
  logger?: Logger;
}

export interface DiscoverOptions {
  /** Sweep these instead of the local interface subnets */
  subnets?: Subnet[];
  /** Probe these instead of the configured hostnames */
  hostnames?: readonly string[];
}

/**
 * Finds devices running the service on the local networks by brute-force probing.
 *
 * Every attached /24 is swept in batches; the well-known hostnames are probed in
 * parallel with the sweep. One session at a time per engine.
 *
 * @example
 * ```ts
 * const engine = new DiscoveryEngine({ logger });
 * engine.on('deviceDiscovered', (device) => console.log(device.displayName));
 * const devices = await engine.discover();
 * ```
 */
export class DiscoveryEngine extends EventEmitter {
  private probe: HostProbeLike;
  private batchSize: number;
  private hostnames: readonly string[];
  private listSubnets: () => Subnet[];
  private logger: Logger;
  private session: DiscoverySession | null = null;
  private failure: Error | null = null;

  constructor(options: DiscoveryEngineOptions = {}) {
    super();
    this.logger = options.logger ?? silentLogger;
    this.batchSize = Math.max(1, options.batchSize ?? 50);
    this.hostnames = options.hostnames ?? WELL_KNOWN_HOSTNAMES;
    this.listSubnets = options.enumerateSubnets ?? (() => enumerateSubnets());
    this.probe =
      options.probe ??
      new HostProbe({
        port: options.port,
        reachabilityCheck: options.reachabilityCheck,
        pingTimeout: options.pingTimeout,
        handshakeTimeout: options.handshakeTimeout,
        infoTimeout: options.infoTimeout,
        neighborTimeout: options.neighborTimeout,
        network: options.network,
        logger: this.logger,
      });
  }

  get isDiscovering(): boolean {
    return this.session !== null;
  }

  /** Failure that aborted the most recent discover(), if any */
  get lastError(): Error | null {
    return this.failure;
  }

  /**
   * Run one discovery session and resolve with every device found.
   * Resolves with [] (and starts nothing) if a session is already running.
   * Never rejects on probe failures; an enumeration failure resolves with []
   * after emitting `discoveryFailed`.
   */
  async discover(options: DiscoverOptions = {}): Promise<Device[]> {
    if (this.session) {
      this.logger.warn('Discovery already in progress');
      return [];
    }

    const session = new DiscoverySession();
    this.session = session;
    this.failure = null;

    try {
      let subnets: Subnet[];
      try {
        subnets = options.subnets ?? this.listSubnets();
      } catch (err) {
        const error = new DiscoveryError(`Network interface enumeration failed: ${errorMessage(err)}`, err);
        this.failure = error;
        this.logger.error(error.message);
        this.emit('discoveryFailed', error);
        return [];
      }

      const hostnames = options.hostnames ?? this.hostnames;
      this.logger.info(
        `Starting discovery: ${subnets.map((s) => s.cidr).join(', ') || 'no subnets'}; ${hostnames.length} hostname(s)`
      );

      await Promise.all([
        ...subnets.map((subnet) => this.sweep(subnet, session)),
        ...hostnames.map((hostname) => this.probeHostnameInto(hostname, session)),
      ]);

      const devices = session.complete();
      this.logger.info(`Discovery completed, found ${devices.length} device(s)`);
      this.emit('discoveryCompleted', devices);
      return devices;
    } finally {
      this.session = null;
    }
  }

  /**
   * Probe one hostname outside any session, e.g. to refresh a remembered device.
   * Resolves with null on any failure.
   */
  async findDevice(hostname: string): Promise<Device | null> {
    this.logger.info(`Looking for device: ${hostname}`);
    try {
      const device = await this.probe.probeHostname(hostname);
      if (device) {
        this.logger.info(`Found device: ${device.displayName} at ${device.address}`);
      } else {
        this.logger.debug(`Device not found: ${hostname}`);
      }
      return device;
    } catch (err) {
      this.logger.debug(`Error finding device ${hostname}: ${errorMessage(err)}`);
      return null;
    }
  }

  /**
   * Attach an observer; returns a function that detaches it.
   */
  subscribe(observer: DiscoveryObserver): () => void {
    const handlers = {
      deviceDiscovered: (device: Device) => observer.onDeviceFound?.(device),
      deviceUpdated: (device: Device) => observer.onDeviceUpdated?.(device),
      discoveryCompleted: (devices: Device[]) => observer.onDiscoveryCompleted?.(devices),
      discoveryFailed: (error: Error) => observer.onDiscoveryFailed?.(error),
    };
    for (const [event, handler] of Object.entries(handlers)) {
      this.on(event, handler);
    }
    return () => {
      for (const [event, handler] of Object.entries(handlers)) {
        this.off(event, handler);
      }
    };
  }

  /**
   * Sweep one subnet, at most batchSize probes in flight.
   */
  private async sweep(subnet: Subnet, session: DiscoverySession): Promise<void> {
    this.logger.debug(`Scanning subnet ${subnet.cidr}`);
    const candidates = hostCandidates(subnet);

    for (let i = 0; i < candidates.length; i += this.batchSize) {
      const batch = candidates.slice(i, i + this.batchSize);
      await Promise.all(batch.map((address) => this.probeAddressInto(address, session)));
    }
  }

  private async probeAddressInto(address: string, session: DiscoverySession): Promise<void> {
    try {
      const device = await this.probe.handshake(address);
      if (device) {
        await this.admit(device, session);
      }
    } catch (err) {
      this.logger.debug(`Error checking ${address}: ${errorMessage(err)}`);
    }
  }

  private async probeHostnameInto(hostname: string, session: DiscoverySession): Promise<void> {
    try {
      const address = await this.probe.resolve(hostname);
      if (!address) {
        return;
      }
      const device = await this.probe.handshake(address, hostname);
      if (device) {
        await this.admit(device, session);
      }
    } catch (err) {
      this.logger.debug(`Error checking hostname ${hostname}: ${errorMessage(err)}`);
    }
  }

  /**
   * Announce a handshaken device right away, then enrich it. `deviceUpdated`
   * fires only when enrichment added something.
   */
  private async admit(device: Device, session: DiscoverySession): Promise<void> {
    if (session.add(device)) {
      this.logger.info(`Discovered device ${device.displayName} at ${device.address}:${device.port}`);
      this.emit('deviceDiscovered', device);
    }

    const enriched = await this.probe.enrich(device);
    if (sameDetails(enriched, device)) {
      return;
    }
    // Emit what the session holds, which may carry a hostname the probe lacked.
    const stored = session.update(enriched);
    if (stored) {
      this.emit('deviceUpdated', stored);
    }
  }
}
