/**
 * Server configuration
 *
 * Environment variables (all optional):
 *   SCPI_HOST              - TCP bind address (default: 0.0.0.0)
 *   SCPI_PORT              - TCP port (default: 5025)
 *   SCPI_INSTRUMENT        - Personality: function-generator | power-supply (default: function-generator)
 *   SCPI_IDENTITY          - *IDN? response (default: personality specific)
 *   SCPI_CHANNELS          - Function generator channel count (default: 2)
 *   SCPI_SAMPLE_RATE       - Function generator sample rate in Hz (default: 48000)
 *   SCPI_LOAD_OHMS         - Power supply load resistance, >= 0 (default: none)
 *   SCPI_MAX_CONNECTIONS   - Concurrent TCP connection cap, 0 = unlimited (default: 0)
 *   SCPI_ERROR_QUEUE_SIZE  - Error queue capacity, 0 = unbounded (default: 0)
 *   HTTP_ENABLED           - Serve the HTTP API and WebSocket bridge (default: true)
 *   HTTP_PORT              - HTTP/WebSocket port (default: 3001)
 */

import type { PersonalityName, Result } from '../shared/types.js';
import { Ok, Err } from '../shared/types.js';
import { isPersonalityName, PERSONALITIES } from './instruments/index.js';

export interface ServerConfig {
  host: string;
  port: number;
  instrument: PersonalityName;
  identity?: string;
  channels: number;
  sampleRate: number;
  loadOhms: number | null;
  maxConnections: number;
  errorQueueSize: number;
  httpEnabled: boolean;
  httpPort: number;
}

export const DEFAULT_CONFIG: ServerConfig = {
  host: '0.0.0.0',
  port: 5025,
  instrument: 'function-generator',
  channels: 2,
  sampleRate: 48000,
  loadOhms: null,
  maxConnections: 0,
  errorQueueSize: 0,
  httpEnabled: true,
  httpPort: 3001,
};

type Env = Record<string, string | undefined>;

const parseInteger = (value: string | undefined, defaultVal: number): number => {
  if (!value) return defaultVal;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultVal : parsed;
};

const parseNumber = (value: string | undefined, defaultVal: number | null): number | null => {
  if (!value) return defaultVal;
  const parsed = Number.parseFloat(value);
  return Number.isNaN(parsed) ? defaultVal : parsed;
};

const parseFlag = (value: string | undefined, defaultVal: boolean): boolean => {
  if (!value) return defaultVal;
  return !['0', 'false', 'no', 'off'].includes(value.trim().toLowerCase());
};

/**
 * Load configuration from environment variables with defaults.
 * Malformed numbers fall back to their default; an unknown personality is an error.
 */
export function loadConfigFromEnv(env: Env = process.env): Result<ServerConfig, string> {
  const instrument = env.SCPI_INSTRUMENT?.trim() || DEFAULT_CONFIG.instrument;
  if (!isPersonalityName(instrument)) {
    return Err(`Unknown SCPI_INSTRUMENT "${instrument}", expected one of: ${PERSONALITIES.join(', ')}`);
  }

  const port = parseInteger(env.SCPI_PORT, DEFAULT_CONFIG.port);
  const httpPort = parseInteger(env.HTTP_PORT, DEFAULT_CONFIG.httpPort);
  for (const [name, value] of [['SCPI_PORT', port], ['HTTP_PORT', httpPort]] as const) {
    if (value < 0 || value > 65535) {
      return Err(`${name} must be between 0 and 65535, got ${value}`);
    }
  }

  const channels = parseInteger(env.SCPI_CHANNELS, DEFAULT_CONFIG.channels);
  if (channels < 1) {
    return Err(`SCPI_CHANNELS must be at least 1, got ${channels}`);
  }

  const loadOhms = parseNumber(env.SCPI_LOAD_OHMS, DEFAULT_CONFIG.loadOhms);
  if (loadOhms !== null && loadOhms < 0) {
    return Err(`SCPI_LOAD_OHMS must not be negative, got ${loadOhms}`);
  }

  return Ok({
    host: env.SCPI_HOST?.trim() || DEFAULT_CONFIG.host,
    port,
    instrument,
    identity: env.SCPI_IDENTITY || undefined,
    channels,
    sampleRate: parseInteger(env.SCPI_SAMPLE_RATE, DEFAULT_CONFIG.sampleRate),
    loadOhms,
    maxConnections: Math.max(0, parseInteger(env.SCPI_MAX_CONNECTIONS, DEFAULT_CONFIG.maxConnections)),
    errorQueueSize: Math.max(0, parseInteger(env.SCPI_ERROR_QUEUE_SIZE, DEFAULT_CONFIG.errorQueueSize)),
    httpEnabled: parseFlag(env.HTTP_ENABLED, DEFAULT_CONFIG.httpEnabled),
    httpPort,
  });
}
