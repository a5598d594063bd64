import type { LogLevel, ServerStats, TransportMessage } from '../types.js';
import { KeyStream } from '../crypto/keystream.js';
import { UdpTransport } from '../transport/udp.js';
import { clipDatagram, isTerminationMarker } from '../protocol/datagram.js';
import { DEFAULT_PORT, DEFAULT_SEED, MAX_DATAGRAM_SIZE } from '../protocol/constants.js';
import { toEchoError } from '../errors.js';
import { Logger } from '../logger.js';
import { ServerMetrics } from './metrics.js';

/** UDP echo server configuration */
export interface DatagramServerConfig {
  /** Address to bind (default: 0.0.0.0) */
  host?: string;
  /** Port to bind; 0 picks a free one (default: 26881) */
  port?: number;
  /** Initial key (default: 123456789) */
  seed?: bigint;
  /** Receive buffer size; longer datagrams are cut to it (default: 1024) */
  maxDatagramSize?: number;
  logLevel?: LogLevel;
}

const DEFAULT_CONFIG: Required<DatagramServerConfig> = {
  host: '0.0.0.0',
  port: DEFAULT_PORT,
  seed: DEFAULT_SEED,
  maxDatagramSize: MAX_DATAGRAM_SIZE,
  logLevel: 'info',
};

/** Why the server stopped */
export type DatagramServerExit = 'terminated' | 'stopped' | 'failed';

/** What to do with one inbound datagram */
export type DatagramResponse = { kind: 'terminate' } | { kind: 'echo'; data: Uint8Array };

/**
 * Decide the reply to one datagram, rotating the key as it goes
 *
 * The termination marker is compared before any decryption. Anything else is
 * decrypted with the current key, the key rotates, the plaintext is
 * re-encrypted with the new key, and the key rotates again.
 */
export function respondToDatagram(data: Uint8Array, keys: KeyStream): DatagramResponse {
  if (isTerminationMarker(data)) {
    return { kind: 'terminate' };
  }

  const plaintext = keys.apply(data);
  keys.advance();
  const reply = keys.apply(plaintext);
  keys.advance();
  return { kind: 'echo', data: reply };
}

/**
 * UDP Echo Server
 *
 * One key shared by every sender. Datagrams are handled one at a time in
 * arrival order; the termination marker shuts the whole server down.
 *
 * @example
 * ```typescript
 * const server = new DatagramEchoServer({ port: 26881 });
 * await server.start();
 * const exit = await server.closed;
 * ```
 */
export class DatagramEchoServer {
  private readonly config: Required<DatagramServerConfig>;
  private readonly transport: UdpTransport;
  private readonly keys: KeyStream;
  private readonly logger: Logger;
  private readonly metrics = new ServerMetrics();

  private running = false;
  private exit: DatagramServerExit | null = null;
  private resolveClosed: (exit: DatagramServerExit) => void = () => undefined;

  /** Settles once the server has shut down, with the reason */
  readonly closed: Promise<DatagramServerExit>;

  private readonly onMessage = (message: TransportMessage): void => {
    this.handleDatagram(message);
  };

  private readonly onError = (err: Error): void => {
    this.logger.error(`Socket error: ${err.message}`);
    this.shutdown('failed');
  };

  constructor(config: DatagramServerConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = new Logger('echo-probe:udp-server', this.config.logLevel);
    this.keys = new KeyStream(this.config.seed);
    this.transport = new UdpTransport({
      host: this.config.host,
      localAddress: this.config.host,
      localPort: this.config.port,
    });
    this.closed = new Promise((resolve) => {
      this.resolveClosed = resolve;
    });
  }

  /**
   * Bind the socket and begin echoing
   * @returns The bound address
   */
  async start(): Promise<{ address: string; port: number }> {
    this.transport.on('message', this.onMessage);
    this.transport.on('error', this.onError);
    await this.transport.connect();
    this.running = true;

    const bound = this.transport.address();
    this.logger.info(`UDP echo server listening on ${bound.address}:${bound.port}`);
    return bound;
  }

  /**
   * Stop without waiting for a termination marker
   */
  async stop(): Promise<void> {
    this.shutdown('stopped');
    await this.closed;
  }

  address(): { address: string; port: number } {
    return this.transport.address();
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Key state shared by every sender
   */
  get keyStream(): KeyStream {
    return this.keys;
  }

  getStats(): ServerStats {
    return this.metrics.getSnapshot();
  }

  private handleDatagram(message: TransportMessage): void {
    if (!this.running) return;

    const data = clipDatagram(message.data, this.config.maxDatagramSize);
    if (data.length < message.data.length) {
      this.logger.warn(
        `Datagram of ${message.data.length} bytes cut to ${data.length} from ${message.remoteAddress}:${message.remotePort}`
      );
    }

    if (this.logger.isEnabled('debug')) {
      this.logger.debug(`Datagram of ${data.length} bytes, key ${this.keys.describe()}`);
    }
    const response = respondToDatagram(data, this.keys);
    if (response.kind === 'terminate') {
      this.logger.info(`Termination signal received from ${message.remoteAddress}:${message.remotePort}`);
      this.metrics.datagram(message.data.length, 0);
      this.shutdown('terminated');
      return;
    }

    this.metrics.datagram(message.data.length, response.data.length);
    this.metrics.messageEchoed();
    this.transport.sendTo(response.data, message.remoteAddress, message.remotePort).catch((err: unknown) => {
      this.logger.error(`Failed to send echo: ${toEchoError(err).message}`);
      this.shutdown('failed');
    });
  }

  private shutdown(exit: DatagramServerExit): void {
    if (this.exit) return;
    this.exit = exit;
    this.running = false;

    this.transport.off('message', this.onMessage);
    this.transport.off('error', this.onError);
    this.transport.disconnect();

    this.logger.info(`UDP echo server stopped (${exit})`, this.metrics.getSnapshot());
    this.resolveClosed(exit);
  }
}
