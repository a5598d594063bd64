/**
 * UDP Transport for Node.js
 * Provides socket management and message handling for echo traffic over UDP
 */

import { createSocket, type Socket } from 'node:dgram';
import type {
  ConnectionState,
  DatagramClientConfig,
  DatagramSignal,
  EventHandler,
  TransportMessage,
} from '../types.js';
import { KeyStream } from '../crypto/keystream.js';
import { assertDatagramSize, TERMINATION_MARKER_BYTES } from '../protocol/datagram.js';
import { DEFAULT_PORT, DEFAULT_SEED, DEFAULT_TIMEOUTS, MAX_DATAGRAM_SIZE } from '../protocol/constants.js';
import { IOError } from '../errors.js';
import { Logger, silentLogger } from '../logger.js';

/** UDP transport configuration */
export interface UdpTransportConfig {
  /** Remote hostname or IP address */
  host: string;
  /** Remote port number (default: 26881) */
  port?: number;
  /** Local address to bind (default: all interfaces) */
  localAddress?: string;
  /** Local port to bind (default: 0, any free port) */
  localPort?: number;
}

/** Default configuration values */
const DEFAULT_TRANSPORT_CONFIG = {
  port: DEFAULT_PORT,
  localPort: 0,
};

/** Payload type of each transport event */
interface TransportEvents {
  open: undefined;
  close: undefined;
  error: Error;
  message: TransportMessage;
}

type TransportEvent = keyof TransportEvents;

/** Events a datagram channel listens to */
export interface DatagramTransportEvents {
  message: TransportMessage;
  error: Error;
}

/** What a datagram channel needs from its socket */
export interface DatagramTransport {
  connect(): Promise<void>;
  disconnect(): void;
  send(data: Uint8Array): Promise<void>;
  on<E extends keyof DatagramTransportEvents>(
    event: E,
    handler: EventHandler<DatagramTransportEvents[E]>
  ): void;
  off<E extends keyof DatagramTransportEvents>(
    event: E,
    handler: EventHandler<DatagramTransportEvents[E]>
  ): void;
}

/**
 * UDP socket bound locally and aimed at one remote endpoint
 */
export class UdpTransport implements DatagramTransport {
  private socket: Socket | null = null;
  private config: Required<Omit<UdpTransportConfig, 'localAddress'>> & { localAddress?: string };
  private state: ConnectionState = 'disconnected';
  private eventHandlers: { [E in TransportEvent]: Set<EventHandler<TransportEvents[E]>> } = {
    open: new Set(),
    close: new Set(),
    error: new Set(),
    message: new Set(),
  };

  constructor(config: UdpTransportConfig) {
    this.config = {
      ...DEFAULT_TRANSPORT_CONFIG,
      ...config,
    };
  }

  /**
   * Get current connection state
   */
  getState(): ConnectionState {
    return this.state;
  }

  /**
   * Bind the local socket
   */
  async connect(): Promise<void> {
    if (this.state === 'connected' || this.state === 'connecting') {
      return;
    }

    this.state = 'connecting';

    return new Promise((resolve, reject) => {
      const socket = createSocket('udp4');
      this.socket = socket;

      socket.on('error', (err: Error) => {
        if (this.state === 'connecting') {
          this.state = 'disconnected';
          this.socket = null;
          socket.close();
          reject(new IOError(err.message, err));
          return;
        }
        this.emit('error', err);
      });

      socket.on('message', (msg: Buffer, rinfo: { address: string; port: number }) => {
        const message: TransportMessage = {
          data: new Uint8Array(msg),
          remoteAddress: rinfo.address,
          remotePort: rinfo.port,
        };
        this.emit('message', message);
      });

      socket.on('close', () => {
        this.state = 'disconnected';
        this.emit('close', undefined);
      });

      socket.bind({ port: this.config.localPort, address: this.config.localAddress }, () => {
        this.state = 'connected';
        this.emit('open', undefined);
        resolve();
      });
    });
  }

  /**
   * Close the socket
   */
  disconnect(): void {
    if (this.socket) {
      const socket = this.socket;
      this.socket = null;
      socket.close();
    }
    this.state = 'disconnected';
  }

  /**
   * Local address the socket is bound to
   */
  address(): { address: string; port: number } {
    if (!this.socket || this.state !== 'connected') {
      throw new IOError('UDP socket is not bound');
    }
    const { address, port } = this.socket.address();
    return { address, port };
  }

  /**
   * Send data to the configured remote endpoint
   */
  send(data: Uint8Array): Promise<void> {
    return this.sendTo(data, this.config.host, this.config.port);
  }

  /**
   * Send data to an arbitrary endpoint
   */
  sendTo(data: Uint8Array, address: string, port: number): Promise<void> {
    const socket = this.socket;
    if (!socket || this.state !== 'connected') {
      return Promise.reject(new IOError('UDP socket is not connected'));
    }

    return new Promise((resolve, reject) => {
      socket.send(data, port, address, (err: Error | null) => {
        if (err) {
          reject(new IOError(err.message, err));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Register an event handler
   */
  on<E extends TransportEvent>(event: E, handler: EventHandler<TransportEvents[E]>): void {
    this.eventHandlers[event].add(handler);
  }

  /**
   * Remove an event handler
   */
  off<E extends TransportEvent>(event: E, handler: EventHandler<TransportEvents[E]>): void {
    this.eventHandlers[event].delete(handler);
  }

  /**
   * Check if the socket is bound
   */
  isConnected(): boolean {
    return this.state === 'connected';
  }

  private emit<E extends TransportEvent>(event: E, data: TransportEvents[E]): void {
    this.eventHandlers[event].forEach((handler) => handler(data));
  }
}

/** Options for a datagram channel over an existing transport */
export interface DatagramChannelOptions {
  /** Initial key (default: 123456789) */
  seed?: bigint;
  /** How long recvData() waits; 0 waits forever (default: 10000) */
  readTimeoutMs?: number;
  /** Largest payload sent (default: 1024) */
  maxDatagramSize?: number;
  logger?: Logger;
}

interface DatagramWaiter {
  resolve: (data: Uint8Array | null) => void;
  reject: (err: IOError) => void;
  timer: ReturnType<typeof setTimeout> | null;
}

/**
 * Echo channel where every datagram is one encrypted message
 *
 * There is no acknowledgment at this layer. Replies that arrive while no one
 * is reading are queued until the next send, which discards them.
 */
export class DatagramChannel {
  readonly kind = 'datagram' as const;

  private readonly transport: DatagramTransport;
  private readonly keys: KeyStream;
  private readonly readTimeoutMs: number;
  private readonly maxDatagramSize: number;
  private readonly logger: Logger;

  private inbox: Uint8Array[] = [];
  private waiter: DatagramWaiter | null = null;
  private closed = false;
  private failure: IOError | null = null;

  private readonly onMessage = (message: TransportMessage): void => {
    if (this.waiter) {
      const { resolve, timer } = this.waiter;
      if (timer) clearTimeout(timer);
      this.waiter = null;
      resolve(message.data);
      return;
    }
    this.inbox.push(message.data);
  };

  private readonly onError = (err: Error): void => {
    this.logger.error(`Socket error: ${err.message}`);
    const failure = this.failure ?? new IOError(err.message, err);
    this.failure = failure;
    if (this.waiter) {
      const { reject, timer } = this.waiter;
      if (timer) clearTimeout(timer);
      this.waiter = null;
      reject(failure);
    }
  };

  constructor(transport: DatagramTransport, options: DatagramChannelOptions = {}) {
    this.transport = transport;
    this.keys = new KeyStream(options.seed ?? DEFAULT_SEED);
    this.readTimeoutMs = options.readTimeoutMs ?? DEFAULT_TIMEOUTS.READ;
    this.maxDatagramSize = options.maxDatagramSize ?? MAX_DATAGRAM_SIZE;
    this.logger = options.logger ?? silentLogger;
    this.transport.on('message', this.onMessage);
    this.transport.on('error', this.onError);
  }

  /**
   * Key state of this endpoint
   */
  get keyStream(): KeyStream {
    return this.keys;
  }

  /** Configured receive timeout in milliseconds */
  get timeoutMs(): number {
    return this.readTimeoutMs;
  }

  /**
   * Encrypt and send one datagram, then rotate the key
   */
  async sendData(payload: Uint8Array): Promise<void> {
    this.assertOpen();
    assertDatagramSize(payload, this.maxDatagramSize);

    if (this.inbox.length > 0) {
      this.logger.debug(`Discarding ${this.inbox.length} stale datagram(s)`);
      this.inbox = [];
    }

    await this.transport.send(this.keys.apply(payload));
    this.keys.advance();
  }

  /**
   * Wait for one datagram and decrypt it
   *
   * A timeout is reported as no-response and leaves the key untouched.
   *
   * @throws IOError if the socket reported an error
   */
  async recvData(): Promise<DatagramSignal> {
    this.assertOpen();
    const data = await this.nextDatagram();
    if (!data) {
      return { kind: 'no-response' };
    }
    const payload = this.keys.apply(data);
    this.keys.advance();
    return { kind: 'data', payload };
  }

  /**
   * Send the termination marker in the clear
   */
  async sendTerminate(): Promise<void> {
    this.assertOpen();
    await this.transport.send(TERMINATION_MARKER_BYTES);
  }

  /**
   * Release the transport
   */
  close(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      this.transport.off('message', this.onMessage);
      this.transport.off('error', this.onError);
      if (this.waiter) {
        const { resolve, timer } = this.waiter;
        if (timer) clearTimeout(timer);
        this.waiter = null;
        resolve(null);
      }
      this.transport.disconnect();
    }
    return Promise.resolve();
  }

  private nextDatagram(): Promise<Uint8Array | null> {
    const queued = this.inbox.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.waiter) {
      return Promise.reject(new IOError('Another read is already in progress'));
    }

    return new Promise((resolve, reject) => {
      const timer =
        this.readTimeoutMs > 0
          ? setTimeout(() => {
              this.waiter = null;
              resolve(null);
            }, this.readTimeoutMs)
          : null;
      this.waiter = { resolve, reject, timer };
    });
  }

  private assertOpen(): void {
    if (this.failure) {
      throw this.failure;
    }
    if (this.closed) {
      throw new IOError('Channel closed');
    }
  }
}

/**
 * Bind a UDP socket and wrap it in a datagram channel
 */
export async function connectDatagram(config: DatagramClientConfig = {}): Promise<DatagramChannel> {
  const logger = new Logger('echo-probe:udp', config.logLevel ?? 'error');
  const transport = new UdpTransport({
    host: config.host ?? '127.0.0.1',
    port: config.port ?? DEFAULT_PORT,
  });
  await transport.connect();
  logger.info(`UDP socket bound, target ${config.host ?? '127.0.0.1'}:${config.port ?? DEFAULT_PORT}`);

  return new DatagramChannel(transport, {
    seed: config.seed,
    readTimeoutMs: config.readTimeoutMs,
    maxDatagramSize: config.maxDatagramSize,
    logger,
  });
}
