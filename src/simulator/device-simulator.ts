import { EventEmitter } from 'node:events';
import http from 'node:http';
import express, { type Express } from 'express';
import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { toBuffer } from '../connection/frames.js';
import { errorMessage, silentLogger, type Logger } from '../logger.js';
import { decodeMessage, encodeMessage } from '../protocol/codec.js';
import type { Message } from '../protocol/messages.js';

/**
 * Configuration for DeviceSimulator
 */
export interface DeviceSimulatorOptions {
  /** Reported device name (default: "voice-sim") */
  name?: string;
  /** Body served at /system/info; defaults to defaultDeviceInfo(name) */
  info?: Record<string, unknown>;
  /** Status for /system/info; anything but 200 serves an error body (default: 200) */
  infoStatus?: number;
  /** Answer `ping` with `pong` (default: true) */
  respondToPing?: boolean;
  /** Send a recognition_result after this many audio bytes (default: 32000) */
  resultEveryBytes?: number;
  speakerId?: string;
  speakerName?: string;
  path?: string;
  logger?: Logger;
}

/**
 * Events emitted by DeviceSimulator
 */
export interface DeviceSimulatorEvents {
  'client-connected': (socket: WebSocket) => void;
  'client-disconnected': () => void;
  /** A decoded text frame from a client */
  'message': (message: Message) => void;
  /** Bytes of a binary frame from a client */
  'audio': (bytes: number) => void;
}

/**
 * /system/info body in the device's snake_case wire form.
 */
export function defaultDeviceInfo(name = 'voice-sim'): Record<string, unknown> {
  return {
    name,
    version: '1.0.0',
    model: 'Simulated Pi',
    serial_number: 'SIM-0001',
    status: {
      cpu_usage: 12.5,
      memory_usage: 40.1,
      temperature: 48.3,
      disk_usage: 22,
      uptime: 3600,
      is_recording: false,
      active_connections: 0,
    },
    audio: {
      supported_formats: ['wav', 'pcm'],
      supported_sample_rates: [16000, 44100],
      max_channels: 1,
      audio_device: 'sim-mic',
      has_microphone: true,
    },
  };
}

/**
 * In-process stand-in for the device service: HTTP status endpoint plus the
 * audio WebSocket on one port. Used by tests and `vlink simulate`.
 */
export class DeviceSimulator extends EventEmitter {
  private options: Required<Omit<DeviceSimulatorOptions, 'info' | 'logger'>> & { info: Record<string, unknown> };
  private logger: Logger;
  private server: http.Server | null = null;
  private wss: WebSocketServer | null = null;
  private clients = new Set<WebSocket>();
  private audioBytes = new Map<WebSocket, number>();

  constructor(options: DeviceSimulatorOptions = {}) {
    super();
    const name = options.name ?? 'voice-sim';
    this.options = {
      name,
      info: options.info ?? defaultDeviceInfo(name),
      infoStatus: options.infoStatus ?? 200,
      respondToPing: options.respondToPing ?? true,
      resultEveryBytes: options.resultEveryBytes ?? 32_000,
      speakerId: options.speakerId ?? 'spk-1',
      speakerName: options.speakerName ?? 'Test Speaker',
      path: options.path ?? '/ws/audio',
    };
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Port the simulator listens on, once started.
   */
  get port(): number {
    const address = this.server?.address();
    if (!address || typeof address === 'string') {
      throw new Error('Simulator is not listening');
    }
    return address.port;
  }

  get connectionCount(): number {
    return this.clients.size;
  }

  /**
   * Toggle ping answering at runtime.
   */
  setRespondToPing(respond: boolean): void {
    this.options.respondToPing = respond;
  }

  /**
   * Express app with the HTTP routes (no WebSocket). Exposed for route tests.
   */
  createApp(): Express {
    const app = express();

    app.get('/system/info', (_req, res) => {
      if (this.options.infoStatus !== 200) {
        res.status(this.options.infoStatus).json({ error: 'Status unavailable' });
        return;
      }
      const status = this.options.info.status;
      const body =
        typeof status === 'object' && status !== null
          ? { ...this.options.info, status: { ...status, active_connections: this.clients.size } }
          : this.options.info;
      res.json(body);
    });

    app.get('/health', (_req, res) => {
      res.json({ status: 'ok', connections: this.clients.size });
    });

    app.use((_req, res) => {
      res.status(404).json({ error: 'Not found' });
    });

    return app;
  }

  /**
   * Start listening. Port 0 picks a free port; the bound port is returned.
   */
  async start(port = 0, host = '127.0.0.1'): Promise<number> {
    const server = http.createServer(this.createApp());
    const wss = new WebSocketServer({ server, path: this.options.path });
    wss.on('connection', (socket: WebSocket) => this.handleConnection(socket));

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    this.server = server;
    this.wss = wss;
    this.logger.info(`Simulator listening on http://${host}:${this.port}`);
    return this.port;
  }

  /**
   * Stop the simulator, dropping every client.
   */
  async stop(): Promise<void> {
    this.dropClients();
    const wss = this.wss;
    const server = this.server;
    this.wss = null;
    this.server = null;

    if (wss) {
      await new Promise<void>((resolve) => wss.close(() => resolve()));
    }
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeAllConnections();
      });
    }
  }

  /**
   * Kill every client socket without a close handshake.
   */
  dropClients(): void {
    for (const socket of this.clients) {
      socket.terminate();
    }
    this.clients.clear();
  }

  /**
   * Send a raw text frame to every client.
   */
  broadcast(text: string): void {
    for (const socket of this.clients) {
      if (socket.readyState === WebSocket.OPEN) {
        socket.send(text);
      }
    }
  }

  private handleConnection(socket: WebSocket): void {
    this.clients.add(socket);
    this.audioBytes.set(socket, 0);
    this.logger.info(`Client connected (${this.clients.size} total)`);
    this.emit('client-connected', socket);

    socket.on('message', (data: RawData, isBinary: boolean) => {
      const buffer = toBuffer(data);
      if (isBinary) {
        this.handleAudio(socket, buffer.length);
      } else {
        this.handleText(socket, buffer.toString('utf-8'));
      }
    });

    socket.on('close', () => {
      this.clients.delete(socket);
      this.audioBytes.delete(socket);
      this.emit('client-disconnected');
    });

    socket.on('error', (err) => {
      this.logger.warn(`Client socket error: ${errorMessage(err)}`);
    });
  }

  private handleText(socket: WebSocket, text: string): void {
    const decoded = decodeMessage(text);
    if (!decoded.ok) {
      socket.send(encodeMessage('error', { message: `Malformed message: ${decoded.reason}` }));
      return;
    }

    this.emit('message', decoded.message);
    if (decoded.message.type === 'ping' && this.options.respondToPing) {
      socket.send(encodeMessage('pong'));
    }
  }

  private handleAudio(socket: WebSocket, bytes: number): void {
    this.emit('audio', bytes);
    const total = (this.audioBytes.get(socket) ?? 0) + bytes;
    if (total < this.options.resultEveryBytes) {
      this.audioBytes.set(socket, total);
      return;
    }
    this.audioBytes.set(socket, 0);

    // 16 kHz, 16-bit mono
    const audioDuration = total / 32_000;
    socket.send(
      encodeMessage('recognition_result', {
        speaker_id: this.options.speakerId,
        speaker_name: this.options.speakerName,
        confidence: 87.5,
        timestamp: new Date().toISOString(),
        audio_duration: audioDuration,
        processing_time: 0.05,
        features: {
          energy_level: 0.42,
          voice_activity: true,
        },
      })
    );
  }
}
