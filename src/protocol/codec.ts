import type {
  DecodeResult,
  FrequencyStats,
  Message,
  RecognitionFeatures,
  RecognitionResult,
} from './messages.js';

type Fields = Record<string, unknown>;

function isRecord(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function num(value: unknown, fallback = 0): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function str(value: unknown, fallback = ''): string {
  return typeof value === 'string' ? value : fallback;
}

/** Identifier that may arrive as a string or a number (database ids). */
function ident(value: unknown): string {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return str(value);
}

/**
 * Serialize an envelope for a text frame. `data` is left out when undefined.
 */
export function encodeMessage(type: string, data?: unknown, timestamp: Date = new Date()): string {
  const message: Message = { type };
  if (data !== undefined) {
    message.data = data;
  }
  message.timestamp = timestamp.toISOString();
  return JSON.stringify(message);
}

/**
 * Parse a text frame into an envelope. The type tag is lowercased.
 */
export function decodeMessage(text: string): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { ok: false, reason: 'invalid_json' };
  }

  if (!isRecord(parsed)) {
    return { ok: false, reason: 'not_an_object' };
  }

  if (typeof parsed.type !== 'string' || parsed.type.trim() === '') {
    return { ok: false, reason: 'missing_type' };
  }

  const message: Message = { type: parsed.type.trim().toLowerCase() };
  if ('data' in parsed) {
    message.data = parsed.data;
  }
  if (typeof parsed.timestamp === 'string') {
    message.timestamp = parsed.timestamp;
  }
  return { ok: true, message };
}

function decodeFrequencyStats(raw: unknown): FrequencyStats | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }
  return {
    fundamentalFrequency: num(raw.fundamental_frequency),
    spectralCentroid: num(raw.spectral_centroid),
    spectralBandwidth: num(raw.spectral_bandwidth),
    spectralRolloff: num(raw.spectral_rolloff),
  };
}

function decodeFeatures(raw: unknown): RecognitionFeatures | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }
  const features: RecognitionFeatures = {
    energyLevel: num(raw.energy_level),
    voiceActivity: raw.voice_activity === true,
  };
  const mfcc = raw.mfcc_features;
  if (Array.isArray(mfcc) && mfcc.every((v): v is number => typeof v === 'number')) {
    features.mfccFeatures = mfcc;
  }
  const stats = decodeFrequencyStats(raw.frequency_stats);
  if (stats) {
    features.frequencyStats = stats;
  }
  return features;
}

/**
 * Map the `data` of a recognition_result onto RecognitionResult.
 *
 * Accepts the payload object or a JSON string of it. Returns null when the
 * payload is not an object or names no speaker.
 */
export function decodeRecognitionResult(data: unknown): RecognitionResult | null {
  let raw = data;
  if (typeof raw === 'string') {
    try {
      raw = JSON.parse(raw);
    } catch {
      return null;
    }
  }
  if (!isRecord(raw)) {
    return null;
  }

  const speakerId = ident(raw.speaker_id);
  const speakerName = ident(raw.speaker_name);
  if (speakerId === '' && speakerName === '') {
    return null;
  }

  const result: RecognitionResult = {
    speakerId,
    speakerName,
    confidence: Math.min(100, Math.max(0, num(raw.confidence))),
    timestamp: str(raw.timestamp),
    audioDuration: num(raw.audio_duration),
    processingTime: num(raw.processing_time),
  };
  const features = decodeFeatures(raw.features);
  if (features) {
    result.features = features;
  }
  return result;
}

/**
 * Human-readable text of an `error` message payload.
 */
export function describeServerError(data: unknown): string {
  if (typeof data === 'string' && data.trim() !== '') {
    return data;
  }
  if (isRecord(data)) {
    if (typeof data.message === 'string') {
      return data.message;
    }
    if (typeof data.error === 'string') {
      return data.error;
    }
  }
  return 'Unknown error';
}
