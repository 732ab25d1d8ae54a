/**
 * Live metrics block of the /system/info response.
 */
export interface SystemStatus {
  cpuUsage: number;
  memoryUsage: number;
  /** °C; absent when the board has no sensor */
  temperature?: number;
  diskUsage: number;
  /** Seconds since boot */
  uptime: number;
  isRecording: boolean;
  activeConnections: number;
}

/**
 * Audio block of the /system/info response.
 */
export interface AudioCapabilities {
  supportedFormats: string[];
  supportedSampleRates: number[];
  maxChannels: number;
  audioDevice: string;
  hasMicrophone: boolean;
}

/**
 * Descriptive payload a device reports about itself. Best-effort: absent when
 * the endpoint failed or returned something unusable.
 */
export interface DeviceCapabilities {
  name: string;
  version: string;
  model?: string;
  serial?: string;
  status?: SystemStatus;
  audio?: AudioCapabilities;
}

/**
 * A host that completed the service handshake.
 * Immutable: a later probe produces a new record rather than mutating this one.
 */
export interface Device {
  readonly address: string;
  readonly hostname?: string;
  readonly port: number;
  readonly displayName: string;
  readonly hardwareAddress?: string;
  readonly capabilities?: Readonly<DeviceCapabilities>;
  /** ms epoch of the most recent successful probe */
  readonly lastSeen: number;
}

/**
 * An IPv4 network attached to a local interface.
 */
export interface Subnet {
  /** Network address, e.g. "192.168.1.0" */
  network: string;
  prefix: number;
  /** "192.168.1.0/24" */
  cidr: string;
  /** Local interface the subnet was found on */
  interfaceName?: string;
}

/**
 * Events emitted by DiscoveryEngine
 */
export interface DiscoveryEngineEvents {
  /** A host completed the handshake; fired as soon as it does */
  'deviceDiscovered': (device: Device) => void;
  /** Capability/hardware-address lookup produced a fresher record */
  'deviceUpdated': (device: Device) => void;
  /** Session finished; carries the deduplicated set */
  'discoveryCompleted': (devices: Device[]) => void;
  /** Session aborted before probing */
  'discoveryFailed': (error: Error) => void;
}

export interface DiscoveryObserver {
  onDeviceFound?(device: Device): void;
  onDeviceUpdated?(device: Device): void;
  onDiscoveryCompleted?(devices: Device[]): void;
  onDiscoveryFailed?(error: Error): void;
}
