/**
 * Raised by send operations when the connection is not in the `connected` state.
 * Sends are never queued; the caller decides whether to retry.
 */
export class NotConnectedError extends Error {
  constructor(state: string) {
    super(`Not connected (state: ${state})`);
    this.name = 'NotConnectedError';
  }
}

/**
 * An `error` message reported by the device over the connection.
 */
export class DeviceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DeviceError';
  }
}

/**
 * A connect attempt that failed (timeout, refused, cancelled).
 */
export class ConnectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConnectionError';
  }
}

/**
 * Discovery aborted before any probing, e.g. interface enumeration threw.
 */
export class DiscoveryError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'DiscoveryError';
  }
}
