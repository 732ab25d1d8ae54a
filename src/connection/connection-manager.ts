import { EventEmitter } from 'node:events';
import WebSocket from 'ws';
import { toBuffer } from './frames.js';
import type { ConnectionObserver, ConnectionSnapshot, ConnectionState } from './types.js';
import type { Device } from '../discovery/types.js';
import { ConnectionError, DeviceError, NotConnectedError } from '../errors.js';
import { errorMessage, silentLogger, type Logger } from '../logger.js';
import { decodeMessage, decodeRecognitionResult, describeServerError, encodeMessage } from '../protocol/codec.js';
import type { Message, OutboundMessage, RecognitionResult } from '../protocol/messages.js';

/**
 * Configuration for ConnectionManager. Durations are milliseconds.
 */
export interface ConnectionManagerOptions {
  /** Upgrade path (default: /ws/audio) */
  path?: string;
  /** Time allowed for the upgrade to complete (default: 30000) */
  connectTimeout?: number;
  /** Fixed pause before each reconnect attempt (default: 5000) */
  reconnectDelay?: number;
  /** Attempts before giving up (default: 10) */
  maxReconnectAttempts?: number;
  /** Heartbeat period (default: 30000) */
  heartbeatInterval?: number;
  /** Silence longer than heartbeatInterval × this means the peer is gone (default: 4) */
  heartbeatTimeoutMultiplier?: number;
  /** Wait for the close handshake before terminating the socket (default: 2000) */
  closeTimeout?: number;
  logger?: Logger;
}

type ResolvedOptions = Required<Omit<ConnectionManagerOptions, 'logger'>>;

/**
 * Owns the single streaming connection to one device.
 *
 * Lifecycle: disconnected → connecting → connected → disconnecting → disconnected.
 * Any close this side did not ask for, and any silence past the heartbeat
 * threshold, moves a connected manager to `reconnecting`, which retries the
 * last host/port a bounded number of times with a fixed delay.
 *
 * Every connect, disconnect and reconnect start bumps an epoch counter. Async
 * work captures the epoch it started under and stands down once it moves, so
 * an explicit disconnect always wins over a pending connect or reconnect.
 */
export class ConnectionManager extends EventEmitter {
  private options: ResolvedOptions;
  private logger: Logger;
  private socket: WebSocket | null = null;
  private state: ConnectionState = 'disconnected';
  private host: string | null = null;
  private port: number | null = null;
  private targetDevice: Device | null = null;
  private lastHeartbeatAt: number | null = null;
  private reconnectAttempt = 0;
  private lastError: string | null = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private epoch = 0;
  private abortPending: ((reason: string) => void) | null = null;
  private wakeReconnect: (() => void) | null = null;
  private closing: Promise<void> | null = null;
  /** Bumped by every disconnect() call, including ones that join a teardown in flight */
  private cancels = 0;

  constructor(options: ConnectionManagerOptions = {}) {
    super();
    this.options = {
      path: options.path ?? '/ws/audio',
      connectTimeout: options.connectTimeout ?? 30_000,
      reconnectDelay: options.reconnectDelay ?? 5_000,
      maxReconnectAttempts: options.maxReconnectAttempts ?? 10,
      heartbeatInterval: options.heartbeatInterval ?? 30_000,
      heartbeatTimeoutMultiplier: options.heartbeatTimeoutMultiplier ?? 4,
      closeTimeout: options.closeTimeout ?? 2_000,
    };
    this.logger = options.logger ?? silentLogger;
  }

  get currentState(): ConnectionState {
    return this.state;
  }

  get isConnected(): boolean {
    return this.state === 'connected';
  }

  getSnapshot(): ConnectionSnapshot {
    return {
      state: this.state,
      targetDevice: this.targetDevice,
      host: this.host,
      port: this.port,
      lastHeartbeatAt: this.lastHeartbeatAt,
      reconnectAttempt: this.reconnectAttempt,
      lastError: this.lastError,
      heartbeatActive: this.heartbeatTimer !== null,
    };
  }

  /**
   * Open the stream to host:port, replacing any current connection.
   * Resolves true once the upgrade completes, false on timeout, error or
   * cancellation (the reason is kept in getSnapshot().lastError).
   */
  connect(host: string, port: number): Promise<boolean> {
    return this.establish(host, port, null);
  }

  /**
   * connect() to a discovered device and bind it as the target.
   */
  connectDevice(device: Device): Promise<boolean> {
    return this.establish(device.address, device.port, device);
  }

  /**
   * Close the connection and cancel any connect or reconnect in flight.
   * Idempotent; concurrent callers share one teardown.
   */
  disconnect(): Promise<void> {
    this.cancels++;
    return this.close();
  }

  /**
   * Send a binary frame (e.g. an audio chunk). Rejects with NotConnectedError
   * unless connected; nothing is queued.
   */
  send(data: Buffer | Uint8Array): Promise<void> {
    return this.write(data, true);
  }

  /**
   * Send an envelope as a text frame. Rejects with NotConnectedError unless connected.
   */
  sendMessage(message: OutboundMessage): Promise<void> {
    return this.write(encodeMessage(message.type, message.data), false);
  }

  /**
   * Attach an observer; returns a function that detaches it.
   */
  subscribe(observer: ConnectionObserver): () => void {
    const handlers = {
      stateChanged: (current: ConnectionState, previous: ConnectionState) => observer.onStateChanged?.(current, previous),
      message: (message: Message) => observer.onMessage?.(message),
      recognitionResult: (result: RecognitionResult) => observer.onRecognitionResult?.(result),
      reconnecting: (attempt: number, max: number) => observer.onReconnecting?.(attempt, max),
      reconnectFailed: (attempts: number) => observer.onReconnectFailed?.(attempts),
    };
    for (const [event, handler] of Object.entries(handlers)) {
      this.on(event, handler);
    }
    // Registering an error listener changes whether errors are emitted at all.
    const onError = observer.onError ? (error: Error) => observer.onError?.(error) : null;
    if (onError) {
      this.on('error', onError);
    }

    return () => {
      for (const [event, handler] of Object.entries(handlers)) {
        this.off(event, handler);
      }
      if (onError) {
        this.off('error', onError);
      }
    };
  }

  private async establish(host: string, port: number, device: Device | null): Promise<boolean> {
    if (this.state !== 'disconnected') {
      this.logger.warn(`Connection is ${this.state}, disconnecting first`);
      const cancels = this.cancels;
      await this.close();
      if (this.cancels !== cancels) {
        this.logger.info(`Connect to ${host}:${port} cancelled by disconnect`);
        return false;
      }
    }

    const epoch = ++this.epoch;
    this.abortPending?.('Superseded by a newer connect');
    this.host = host;
    this.port = port;
    this.targetDevice = device;
    this.reconnectAttempt = 0;
    this.setState('connecting');

    if (await this.open(epoch)) {
      return true;
    }
    if (epoch === this.epoch) {
      this.setState('disconnected');
      this.emitError(new ConnectionError(this.lastError ?? 'Connection failed'));
    }
    return false;
  }

  /**
   * Shared teardown. `closing` is set before any state change is emitted, so a
   * listener calling disconnect() joins this teardown instead of starting one.
   */
  private close(): Promise<void> {
    if (this.closing) {
      return this.closing;
    }
    if (this.state === 'disconnected') {
      return Promise.resolve();
    }
    const closing: Promise<void> = Promise.resolve()
      .then(() => this.teardown())
      .finally(() => {
        if (this.closing === closing) {
          this.closing = null;
        }
      });
    this.closing = closing;
    return closing;
  }

  private async teardown(): Promise<void> {
    this.epoch++;
    this.setState('disconnecting');
    this.stopHeartbeat();
    this.wakeReconnect?.();
    this.abortPending?.('Connection cancelled');

    const socket = this.socket;
    this.socket = null;
    if (socket) {
      await this.closeSocket(socket);
    }

    this.reconnectAttempt = 0;
    this.setState('disconnected');
    this.logger.info('Disconnected');
  }

  private url(): string {
    const scheme = this.port === 443 ? 'wss' : 'ws';
    return `${scheme}://${this.host}:${this.port}${this.options.path}`;
  }

  /**
   * One upgrade attempt against the current host/port. Installs the socket and
   * enters `connected` only if `epoch` is still current when it opens.
   */
  private async open(epoch: number): Promise<boolean> {
    const url = this.url();
    this.logger.info(`Connecting to ${url}`);

    let socket: WebSocket;
    try {
      socket = await this.openSocket(url);
    } catch (err) {
      if (epoch === this.epoch) {
        this.lastError = errorMessage(err);
        this.logger.error(`Connection to ${url} failed: ${this.lastError}`);
      }
      return false;
    }

    if (epoch !== this.epoch) {
      socket.terminate();
      return false;
    }

    this.attach(socket);
    this.socket = socket;
    this.lastError = null;
    this.reconnectAttempt = 0;
    this.lastHeartbeatAt = Date.now();
    this.startHeartbeat();
    this.setState('connected');
    return true;
  }

  /**
   * Resolves with the socket on `open`; rejects on error, early close,
   * timeout, or abortPending().
   */
  private openSocket(url: string): Promise<WebSocket> {
    return new Promise((resolve, reject) => {
      const socket = new WebSocket(url);
      let settled = false;

      const settle = (error: Error | null): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        if (this.abortPending === abort) {
          this.abortPending = null;
        }
        if (error) {
          socket.terminate();
          reject(error);
        } else {
          resolve(socket);
        }
      };
      const abort = (reason: string): void => settle(new ConnectionError(reason));
      const timer = setTimeout(
        () => settle(new ConnectionError(`Connection timeout after ${this.options.connectTimeout}ms`)),
        this.options.connectTimeout
      );

      this.abortPending = abort;
      socket.once('open', () => settle(null));
      socket.once('close', () => settle(new ConnectionError('Connection closed before it opened')));
      // Stays attached for the socket's lifetime; attach() adds the live handler.
      socket.on('error', (err: Error) => settle(err));
    });
  }

  private attach(socket: WebSocket): void {
    socket.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
      this.handleFrame(socket, data, isBinary);
    });
    socket.on('close', (code: number, reason: Buffer) => {
      this.handleClose(socket, code, reason.toString());
    });
    socket.on('error', (err: Error) => {
      if (socket !== this.socket) {
        return;
      }
      this.lastError = err.message;
      this.logger.error(`WebSocket error: ${err.message}`);
      this.emitError(err);
    });
  }

  private closeSocket(socket: WebSocket): Promise<void> {
    if (socket.readyState === WebSocket.CLOSED) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        socket.terminate();
        resolve();
      }, this.options.closeTimeout);
      socket.once('close', () => {
        clearTimeout(timer);
        resolve();
      });
      socket.close(1000, 'Client disconnect');
    });
  }

  private handleFrame(socket: WebSocket, data: WebSocket.RawData, isBinary: boolean): void {
    if (socket !== this.socket) {
      return;
    }
    // Any inbound traffic counts as liveness, not just pong.
    this.lastHeartbeatAt = Date.now();
    const buffer = toBuffer(data);

    if (isBinary) {
      this.logger.debug(`Received binary frame of ${buffer.length} bytes`);
      this.emit('binary', buffer);
      return;
    }

    const decoded = decodeMessage(buffer.toString('utf-8'));
    if (!decoded.ok) {
      this.logger.warn(`Dropping malformed message (${decoded.reason})`);
      return;
    }

    try {
      this.dispatch(decoded.message);
    } catch (err) {
      this.logger.error(`Error handling ${decoded.message.type} message: ${errorMessage(err)}`);
    }
  }

  private dispatch(message: Message): void {
    this.emit('message', message);

    switch (message.type) {
      case 'ping':
        this.sendMessage({ type: 'pong' }).catch((err: unknown) => {
          this.logger.warn(`Failed to answer ping: ${errorMessage(err)}`);
        });
        break;

      case 'pong':
        break;

      case 'recognition_result': {
        const result = decodeRecognitionResult(message.data);
        if (!result) {
          this.logger.warn('Dropping recognition_result without a usable payload');
          break;
        }
        this.emit('recognitionResult', result);
        break;
      }

      case 'error': {
        const text = describeServerError(message.data);
        this.logger.error(`Device reported an error: ${text}`);
        this.emitError(new DeviceError(text));
        break;
      }

      default:
        this.logger.debug(`Ignoring message of unknown type: ${message.type}`);
        break;
    }
  }

  private handleClose(socket: WebSocket, code: number, reason: string): void {
    // Sockets this side closed or replaced are detached before they close.
    if (socket !== this.socket) {
      return;
    }
    this.socket = null;
    this.lastError = `Connection closed by peer (code ${code}${reason ? `: ${reason}` : ''})`;
    this.logger.warn(this.lastError);
    this.startReconnect('connection closed unexpectedly');
  }

  private startReconnect(reason: string): void {
    if (this.state !== 'connected') {
      return;
    }
    this.stopHeartbeat();
    const stale = this.socket;
    this.socket = null;
    stale?.terminate();

    const epoch = ++this.epoch;
    this.logger.warn(`Reconnecting to ${this.host}:${this.port}: ${reason}`);
    this.setState('reconnecting');
    this.reconnect(epoch).catch((err: unknown) => {
      this.logger.error(`Reconnect loop failed: ${errorMessage(err)}`);
    });
  }

  private async reconnect(epoch: number): Promise<void> {
    const max = this.options.maxReconnectAttempts;

    for (let attempt = 1; attempt <= max; attempt++) {
      if (epoch !== this.epoch) {
        return;
      }
      this.reconnectAttempt = attempt;
      this.logger.info(`Reconnect attempt ${attempt}/${max}`);
      this.emit('reconnecting', attempt, max);

      await this.pause(this.options.reconnectDelay);
      if (epoch !== this.epoch) {
        return;
      }
      if (await this.open(epoch)) {
        this.logger.info(`Reconnected after ${attempt} attempt(s)`);
        return;
      }
    }

    if (epoch !== this.epoch) {
      return;
    }
    this.reconnectAttempt = 0;
    this.logger.error(`Failed to reconnect after ${max} attempts`);
    this.setState('disconnected');
    this.emit('reconnectFailed', max);
  }

  /**
   * Sleep that disconnect() can cut short.
   */
  private pause(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const wake = (): void => {
        clearTimeout(timer);
        if (this.wakeReconnect === wake) {
          this.wakeReconnect = null;
        }
        resolve();
      };
      const timer = setTimeout(wake, ms);
      this.wakeReconnect = wake;
    });
  }

  private startHeartbeat(): void {
    this.stopHeartbeat();
    this.heartbeatTimer = setInterval(() => this.heartbeat(), this.options.heartbeatInterval);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  private heartbeat(): void {
    if (this.state !== 'connected') {
      return;
    }
    const silentFor = Date.now() - (this.lastHeartbeatAt ?? 0);
    const deadAfter = this.options.heartbeatInterval * this.options.heartbeatTimeoutMultiplier;

    if (silentFor > deadAfter) {
      this.lastError = `No traffic for ${silentFor}ms`;
      this.logger.warn(`${this.lastError}, connection presumed dead`);
      this.startReconnect('heartbeat timeout');
      return;
    }

    this.sendMessage({ type: 'ping' }).catch((err: unknown) => {
      this.logger.warn(`Heartbeat ping failed: ${errorMessage(err)}`);
    });
  }

  private write(payload: string | Buffer | Uint8Array, binary: boolean): Promise<void> {
    const socket = this.socket;
    if (this.state !== 'connected' || !socket || socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new NotConnectedError(this.state));
    }
    // ws serializes frames per socket, so concurrent sends never interleave.
    return new Promise((resolve, reject) => {
      socket.send(payload, { binary }, (err?: Error) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  private setState(next: ConnectionState): void {
    if (next === this.state) {
      return;
    }
    const previous = this.state;
    this.state = next;
    this.logger.info(`Connection state changed: ${previous} -> ${next}`);
    this.emit('stateChanged', next, previous);
  }

  /** An unhandled 'error' event would throw, so only emit when someone listens. */
  private emitError(error: Error): void {
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    }
  }
}
