/**
 * Message types the client understands. Anything else is logged and dropped.
 */
export type KnownMessageType = 'ping' | 'pong' | 'recognition_result' | 'error';

export const KNOWN_MESSAGE_TYPES: readonly KnownMessageType[] = ['ping', 'pong', 'recognition_result', 'error'];

export function isKnownMessageType(type: string): type is KnownMessageType {
  return (KNOWN_MESSAGE_TYPES as readonly string[]).includes(type);
}

/**
 * Text-frame envelope: { "type": string, "data": any, "timestamp": ISO-8601 }
 */
export interface Message<T = unknown> {
  type: string;
  data?: T;
  /** ISO-8601; undefined when the sender omitted or garbled it */
  timestamp?: string;
}

/**
 * What callers hand to sendMessage(); the timestamp is stamped on encode.
 */
export interface OutboundMessage<T = unknown> {
  type: string;
  data?: T;
}

export interface FrequencyStats {
  fundamentalFrequency: number;
  spectralCentroid: number;
  spectralBandwidth: number;
  spectralRolloff: number;
}

export interface RecognitionFeatures {
  mfccFeatures?: number[];
  energyLevel: number;
  voiceActivity: boolean;
  frequencyStats?: FrequencyStats;
}

/**
 * Payload of a `recognition_result` message.
 */
export interface RecognitionResult {
  speakerId: string;
  speakerName: string;
  /** 0–100 */
  confidence: number;
  /** ISO-8601 as sent by the device */
  timestamp: string;
  /** Seconds of audio the result covers */
  audioDuration: number;
  /** Seconds the device spent on it */
  processingTime: number;
  features?: RecognitionFeatures;
}

export type DecodeResult =
  | { ok: true; message: Message }
  | { ok: false; reason: 'invalid_json' | 'not_an_object' | 'missing_type' };
