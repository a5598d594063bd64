/**
 * Tests for environment configuration
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, loadConfig, parsePort, SERVER_DEFAULTS } from '../src/config.js';

describe('loadConfig', () => {
  it('should return the client defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      host: '127.0.0.1',
      port: 26881,
      connectTimeoutMs: 5000,
      readTimeoutMs: 10000,
      logLevel: 'info',
      timeResolutionMs: 0.001,
    });
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('should apply server defaults underneath the environment', () => {
    const config = loadConfig({ ECHO_PORT: '9000' }, SERVER_DEFAULTS);
    expect(config).toMatchObject({ host: '0.0.0.0', port: 9000, readTimeoutMs: 0 });
  });

  it('should read every variable', () => {
    const config = loadConfig({
      ECHO_HOST: ' echo.test ',
      ECHO_PORT: '0',
      ECHO_CONNECT_TIMEOUT_MS: '250',
      ECHO_READ_TIMEOUT_MS: '0',
      ECHO_LOG_LEVEL: 'DEBUG',
      ECHO_TIME_RESOLUTION_MS: '0.5',
    });

    expect(config).toEqual({
      host: 'echo.test',
      port: 0,
      connectTimeoutMs: 250,
      readTimeoutMs: 0,
      logLevel: 'debug',
      timeResolutionMs: 0.5,
    });
  });

  it('should ignore blank variables', () => {
    expect(loadConfig({ ECHO_HOST: '  ', ECHO_PORT: '' })).toMatchObject({
      host: '127.0.0.1',
      port: 26881,
    });
  });

  it('should reject malformed values', () => {
    expect(() => loadConfig({ ECHO_PORT: 'abc' })).toThrow(RangeError);
    expect(() => loadConfig({ ECHO_PORT: '70000' })).toThrow(
      'ECHO_PORT must be an integer between 0 and 65535, got "70000"'
    );
    expect(() => loadConfig({ ECHO_CONNECT_TIMEOUT_MS: '0' })).toThrow(
      'ECHO_CONNECT_TIMEOUT_MS must be an integer of at least 1, got "0"'
    );
    expect(() => loadConfig({ ECHO_READ_TIMEOUT_MS: '-5' })).toThrow(RangeError);
    expect(() => loadConfig({ ECHO_TIME_RESOLUTION_MS: '0' })).toThrow(RangeError);
    expect(() => loadConfig({ ECHO_LOG_LEVEL: 'verbose' })).toThrow(
      'ECHO_LOG_LEVEL must be one of silent, error, warn, info, debug, got "verbose"'
    );
  });
});

describe('parsePort', () => {
  it('should accept the full port range', () => {
    expect(parsePort('0')).toBe(0);
    expect(parsePort('65535')).toBe(65535);
  });

  it('should reject fractions and signs', () => {
    expect(() => parsePort('80.5')).toThrow(RangeError);
    expect(() => parsePort('+80')).toThrow(RangeError);
  });
});
