import type { Device, DeviceCapabilities } from './types.js';

export interface DeviceFields {
  address: string;
  port: number;
  hostname?: string;
  hardwareAddress?: string;
  capabilities?: DeviceCapabilities;
  lastSeen?: number;
}

/**
 * Name shown for a device: the name it reports, else its hostname, else device@address.
 */
export function deriveDisplayName(fields: Pick<DeviceFields, 'address' | 'hostname' | 'capabilities'>): string {
  const reported = fields.capabilities?.name.trim();
  if (reported) {
    return reported;
  }
  if (fields.hostname) {
    return fields.hostname;
  }
  return `device@${fields.address}`;
}

/**
 * Build a frozen Device record.
 */
export function createDevice(fields: DeviceFields): Device {
  const device: Device = {
    address: fields.address,
    port: fields.port,
    displayName: deriveDisplayName(fields),
    lastSeen: fields.lastSeen ?? Date.now(),
    ...(fields.hostname ? { hostname: fields.hostname } : {}),
    ...(fields.hardwareAddress ? { hardwareAddress: fields.hardwareAddress } : {}),
    ...(fields.capabilities ? { capabilities: Object.freeze({ ...fields.capabilities }) } : {}),
  };
  return Object.freeze(device);
}

/**
 * Identity used for deduplication: "address:port".
 */
export function deviceKey(device: Pick<Device, 'address' | 'port'>): string {
  return `${device.address}:${device.port}`;
}

/**
 * True when two records describe the device identically, ignoring lastSeen.
 */
export function sameDetails(a: Device, b: Device): boolean {
  return (
    deviceKey(a) === deviceKey(b) &&
    a.hostname === b.hostname &&
    a.hardwareAddress === b.hardwareAddress &&
    JSON.stringify(a.capabilities) === JSON.stringify(b.capabilities)
  );
}
