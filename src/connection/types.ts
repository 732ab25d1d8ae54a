import type { Device } from '../discovery/types.js';
import type { Message, RecognitionResult } from '../protocol/messages.js';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'disconnecting' | 'reconnecting';

/**
 * Point-in-time view of the managed connection.
 */
export interface ConnectionSnapshot {
  state: ConnectionState;
  /** Device bound through connectDevice(), if any */
  targetDevice: Device | null;
  host: string | null;
  port: number | null;
  /** ms epoch of the last inbound frame */
  lastHeartbeatAt: number | null;
  /** Current reconnect attempt; 0 outside a reconnect loop */
  reconnectAttempt: number;
  lastError: string | null;
  heartbeatActive: boolean;
}

/**
 * Events emitted by ConnectionManager
 */
export interface ConnectionManagerEvents {
  'stateChanged': (current: ConnectionState, previous: ConnectionState) => void;
  /** Every decoded text frame */
  'message': (message: Message) => void;
  'recognitionResult': (result: RecognitionResult) => void;
  /** Inbound binary frame */
  'binary': (data: Buffer) => void;
  /** Reconnect attempt n of max is about to run */
  'reconnecting': (attempt: number, maxAttempts: number) => void;
  /** Gave up; the manager is disconnected until the next connect() */
  'reconnectFailed': (attempts: number) => void;
  /** Only emitted while at least one listener is attached */
  'error': (error: Error) => void;
}

export interface ConnectionObserver {
  onStateChanged?(current: ConnectionState, previous: ConnectionState): void;
  onMessage?(message: Message): void;
  onRecognitionResult?(result: RecognitionResult): void;
  onError?(error: Error): void;
  onReconnecting?(attempt: number, maxAttempts: number): void;
  onReconnectFailed?(attempts: number): void;
}
