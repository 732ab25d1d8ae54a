import { createDevice, deviceKey } from './device.js';
import type { Device } from './types.js';

/**
 * Result set of one discover() call, keyed by address:port.
 *
 * Probe callbacks all run on the one event loop, and each session owns exactly
 * one map, so inserts from concurrent probes never interleave.
 */
export class DiscoverySession {
  private devices = new Map<string, Device>();
  private completed = false;
  readonly startedAt = Date.now();

  /**
   * Record a device. Returns false when the address:port is already known; the
   * stored entry is only swapped if the newcomer carries a hostname it lacks.
   */
  add(device: Device): boolean {
    this.assertOpen();
    const key = deviceKey(device);
    const existing = this.devices.get(key);
    if (!existing) {
      this.devices.set(key, device);
      return true;
    }
    if (!existing.hostname && device.hostname) {
      this.devices.set(key, device);
    }
    return false;
  }

  /**
   * Replace a known entry with a fresher record and return what was stored, or
   * null for an unknown key. A hostname already on record survives a newcomer
   * that lacks one.
   */
  update(device: Device): Device | null {
    this.assertOpen();
    const key = deviceKey(device);
    const existing = this.devices.get(key);
    if (!existing) {
      return null;
    }
    const stored =
      existing.hostname && !device.hostname ? createDevice({ ...device, hostname: existing.hostname }) : device;
    this.devices.set(key, stored);
    return stored;
  }

  get(key: string): Device | undefined {
    return this.devices.get(key);
  }

  get size(): number {
    return this.devices.size;
  }

  get isCompleted(): boolean {
    return this.completed;
  }

  /**
   * Close the session and return its devices. Callable once.
   */
  complete(): Device[] {
    this.assertOpen();
    this.completed = true;
    return Array.from(this.devices.values());
  }

  private assertOpen(): void {
    if (this.completed) {
      throw new Error('Discovery session already completed');
    }
  }
}
