/**
 * Environment configuration
 *
 * ECHO_HOST, ECHO_PORT, ECHO_CONNECT_TIMEOUT_MS, ECHO_READ_TIMEOUT_MS,
 * ECHO_LOG_LEVEL and ECHO_TIME_RESOLUTION_MS override the defaults below.
 */

import type { LogLevel } from './types.js';
import { DEFAULT_PORT, DEFAULT_TIMEOUTS } from './protocol/constants.js';
import { DEFAULT_TIME_RESOLUTION_MS } from './measurement/driver.js';

export interface EchoProbeConfig {
  host: string;
  port: number;
  connectTimeoutMs: number;
  readTimeoutMs: number;
  logLevel: LogLevel;
  timeResolutionMs: number;
}

/** Client defaults */
export const DEFAULT_CONFIG: EchoProbeConfig = {
  host: '127.0.0.1',
  port: DEFAULT_PORT,
  connectTimeoutMs: DEFAULT_TIMEOUTS.CONNECT,
  readTimeoutMs: DEFAULT_TIMEOUTS.READ,
  logLevel: 'info',
  timeResolutionMs: DEFAULT_TIME_RESOLUTION_MS,
};

/** Server defaults: listen everywhere, never time out an idle session */
export const SERVER_DEFAULTS: Partial<EchoProbeConfig> = {
  host: '0.0.0.0',
  readTimeoutMs: 0,
};

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

type Env = Record<string, string | undefined>;

/**
 * Build a configuration from environment variables
 *
 * @param env - Variables to read (default: process.env)
 * @param base - Values used where a variable is unset, over the client defaults
 * @throws RangeError for a malformed number, port or log level
 */
export function loadConfig(
  env: Env = process.env,
  base: Partial<EchoProbeConfig> = {}
): EchoProbeConfig {
  const defaults: EchoProbeConfig = { ...DEFAULT_CONFIG, ...base };

  return {
    host: nonEmpty(env.ECHO_HOST) ?? defaults.host,
    port: readPort(env.ECHO_PORT, 'ECHO_PORT') ?? defaults.port,
    connectTimeoutMs:
      readInteger(env.ECHO_CONNECT_TIMEOUT_MS, 'ECHO_CONNECT_TIMEOUT_MS', 1) ??
      defaults.connectTimeoutMs,
    readTimeoutMs:
      readInteger(env.ECHO_READ_TIMEOUT_MS, 'ECHO_READ_TIMEOUT_MS', 0) ?? defaults.readTimeoutMs,
    logLevel: readLogLevel(env.ECHO_LOG_LEVEL) ?? defaults.logLevel,
    timeResolutionMs:
      readPositiveNumber(env.ECHO_TIME_RESOLUTION_MS, 'ECHO_TIME_RESOLUTION_MS') ??
      defaults.timeResolutionMs,
  };
}

/**
 * Parse a TCP/UDP port number; 0 asks the OS for a free one
 */
export function parsePort(value: string, name = 'port'): number {
  const port = readInteger(value, name, 0);
  if (port === undefined || port > 65535) {
    throw new RangeError(`${name} must be an integer between 0 and 65535, got "${value}"`);
  }
  return port;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function readPort(value: string | undefined, name: string): number | undefined {
  const raw = nonEmpty(value);
  return raw === undefined ? undefined : parsePort(raw, name);
}

function readInteger(value: string | undefined, name: string, min: number): number | undefined {
  const raw = nonEmpty(value);
  if (raw === undefined) return undefined;

  if (!/^\d+$/.test(raw) || Number(raw) < min || !Number.isSafeInteger(Number(raw))) {
    throw new RangeError(`${name} must be an integer of at least ${min}, got "${raw}"`);
  }
  return Number(raw);
}

function readPositiveNumber(value: string | undefined, name: string): number | undefined {
  const raw = nonEmpty(value);
  if (raw === undefined) return undefined;

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new RangeError(`${name} must be a positive number, got "${raw}"`);
  }
  return parsed;
}

function readLogLevel(value: string | undefined): LogLevel | undefined {
  const raw = nonEmpty(value)?.toLowerCase();
  if (raw === undefined) return undefined;

  const level = LOG_LEVELS.find((candidate) => candidate === raw);
  if (!level) {
    throw new RangeError(`ECHO_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${raw}"`);
  }
  return level;
}
