/**
 * Command line argument parsing for the client and server entry points
 */

import { parsePort } from '../config.js';

export type CliTransport = 'tcp' | 'udp';

export interface ClientArgs {
  transport: CliTransport;
  host?: string;
  port?: number;
}

export interface ServerArgs {
  transport: CliTransport;
  port?: number;
}

export const CLIENT_USAGE = 'Usage: echo-probe <tcp|udp> [host] [port]';
export const SERVER_USAGE = 'Usage: echo-probe-server <tcp|udp> [port]';

/** Bad invocation; the message is meant for the terminal */
export class UsageError extends Error {
  constructor(message: string, usage: string) {
    super(`${message}\n${usage}`);
    this.name = 'UsageError';
  }
}

/**
 * Parse `echo-probe <tcp|udp> [host] [port]`
 */
export function parseClientArgs(argv: readonly string[]): ClientArgs {
  if (argv.length < 1 || argv.length > 3) {
    throw new UsageError(`Expected 1 to 3 arguments, got ${argv.length}`, CLIENT_USAGE);
  }
  const [mode, host, port] = argv;
  return {
    transport: parseTransport(mode, CLIENT_USAGE),
    host: host === undefined ? undefined : parseHost(host),
    port: port === undefined ? undefined : parseCliPort(port, CLIENT_USAGE),
  };
}

/**
 * Parse `echo-probe-server <tcp|udp> [port]`
 */
export function parseServerArgs(argv: readonly string[]): ServerArgs {
  if (argv.length < 1 || argv.length > 2) {
    throw new UsageError(`Expected 1 or 2 arguments, got ${argv.length}`, SERVER_USAGE);
  }
  const [mode, port] = argv;
  return {
    transport: parseTransport(mode, SERVER_USAGE),
    port: port === undefined ? undefined : parseCliPort(port, SERVER_USAGE),
  };
}

function parseTransport(value: string | undefined, usage: string): CliTransport {
  const mode = value?.toLowerCase();
  if (mode !== 'tcp' && mode !== 'udp') {
    throw new UsageError(`Unknown transport "${value ?? ''}"`, usage);
  }
  return mode;
}

function parseHost(value: string): string {
  const host = value.trim();
  if (!host) {
    throw new UsageError('Host must not be empty', CLIENT_USAGE);
  }
  return host;
}

function parseCliPort(value: string, usage: string): number {
  try {
    return parsePort(value);
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err), usage);
  }
}
