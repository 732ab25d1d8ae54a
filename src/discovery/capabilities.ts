import type { AudioCapabilities, DeviceCapabilities, SystemStatus } from './types.js';

type Fields = Record<string, unknown>;

function isRecord(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Read a field under its wire (snake_case) name or its camelCase alias. */
function field(source: Fields, snake: string, camel?: string): unknown {
  if (snake in source) {
    return source[snake];
  }
  return camel !== undefined ? source[camel] : undefined;
}

function num(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function str(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function bool(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

const CLOCK_UPTIME = /^(?:(\d+)(?: days?, |\.))?(\d+):(\d{2}):(\d{2})(?:\.\d+)?$/;
const UNIT_UPTIME = /^(?:(\d+)d)?\s*(?:(\d+)h)?\s*(?:(\d+)m)?$/;

/**
 * Uptime in seconds. Devices send a number of seconds, a clock string
 * ("2:03:04", "3 days, 2:03:04", "3.02:03:04") or a unit string ("2d 14h 32m").
 */
export function parseUptime(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : undefined;
  }
  if (typeof value !== 'string') {
    return undefined;
  }
  const text = value.trim();
  const clock = CLOCK_UPTIME.exec(text);
  if (clock) {
    const [, days = '0', hours, minutes, seconds] = clock;
    return Number(days) * 86_400 + Number(hours) * 3_600 + Number(minutes) * 60 + Number(seconds);
  }
  const units = UNIT_UPTIME.exec(text);
  if (units && text !== '') {
    const [, days = '0', hours = '0', minutes = '0'] = units;
    return Number(days) * 86_400 + Number(hours) * 3_600 + Number(minutes) * 60;
  }
  return undefined;
}

function parseStatus(raw: Fields): SystemStatus | undefined {
  // Boards without a sensor report temperature as null or leave it out.
  const rawTemperature = field(raw, 'temperature');
  const temperature = rawTemperature === null || rawTemperature === undefined ? null : num(rawTemperature);
  if (temperature === undefined) {
    return undefined;
  }

  const status = {
    cpuUsage: num(field(raw, 'cpu_usage', 'cpuUsage')),
    memoryUsage: num(field(raw, 'memory_usage', 'memoryUsage')),
    diskUsage: num(field(raw, 'disk_usage', 'diskUsage')),
    uptime: parseUptime(field(raw, 'uptime')),
    isRecording: bool(field(raw, 'is_recording', 'isRecording')),
    activeConnections: num(field(raw, 'active_connections', 'activeConnections')),
  };

  if (
    status.cpuUsage === undefined ||
    status.memoryUsage === undefined ||
    status.diskUsage === undefined ||
    status.uptime === undefined ||
    status.isRecording === undefined ||
    status.activeConnections === undefined
  ) {
    return undefined;
  }

  return {
    cpuUsage: status.cpuUsage,
    memoryUsage: status.memoryUsage,
    ...(temperature !== null ? { temperature } : {}),
    diskUsage: status.diskUsage,
    uptime: status.uptime,
    isRecording: status.isRecording,
    activeConnections: status.activeConnections,
  };
}

function parseAudio(raw: Fields): AudioCapabilities | undefined {
  const formats = field(raw, 'supported_formats', 'supportedFormats');
  const sampleRates = field(raw, 'supported_sample_rates', 'supportedSampleRates');
  const maxChannels = num(field(raw, 'max_channels', 'maxChannels'));
  const audioDevice = str(field(raw, 'audio_device', 'audioDevice'));
  const hasMicrophone = bool(field(raw, 'has_microphone', 'hasMicrophone'));

  if (
    !Array.isArray(formats) ||
    !formats.every((f): f is string => typeof f === 'string') ||
    !Array.isArray(sampleRates) ||
    !sampleRates.every((r): r is number => typeof r === 'number') ||
    maxChannels === undefined ||
    audioDevice === undefined ||
    hasMicrophone === undefined
  ) {
    return undefined;
  }

  return {
    supportedFormats: formats,
    supportedSampleRates: sampleRates,
    maxChannels,
    audioDevice,
    hasMicrophone,
  };
}

/**
 * Map a /system/info JSON body onto DeviceCapabilities.
 *
 * `name` and `version` are required. The `status` and `audio` blocks are
 * optional, but a block that is present and incomplete makes the whole
 * payload unusable and the result is undefined.
 */
export function parseCapabilities(json: unknown): DeviceCapabilities | undefined {
  if (!isRecord(json)) {
    return undefined;
  }

  const name = str(json.name);
  const version = str(json.version);
  if (name === undefined || version === undefined) {
    return undefined;
  }

  const capabilities: DeviceCapabilities = { name, version };

  const model = str(json.model);
  if (model !== undefined) {
    capabilities.model = model;
  }
  const serial = str(field(json, 'serial_number', 'serialNumber')) ?? str(json.serial);
  if (serial !== undefined) {
    capabilities.serial = serial;
  }

  if (json.status !== undefined) {
    const status = isRecord(json.status) ? parseStatus(json.status) : undefined;
    if (!status) {
      return undefined;
    }
    capabilities.status = status;
  }

  if (json.audio !== undefined) {
    const audio = isRecord(json.audio) ? parseAudio(json.audio) : undefined;
    if (!audio) {
      return undefined;
    }
    capabilities.audio = audio;
  }

  return capabilities;
}
