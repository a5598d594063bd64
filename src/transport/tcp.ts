/**
 * Stream Transport over TCP
 *
 * Wraps a reliable byte stream in the length-prefixed echo framing and keeps
 * the endpoint's key in step with its peer.
 */

import { connect } from 'node:net';
import type { Duplex } from 'node:stream';
import type { Frame, StreamChannelState, StreamClientConfig, StreamSignal } from '../types.js';
import { KeyStream, transform } from '../crypto/keystream.js';
import { encodeFrame, extractFrame, pendingFrameBytes } from '../protocol/frame.js';
import {
  DEFAULT_MAX_FRAME_LENGTH,
  DEFAULT_PORT,
  DEFAULT_SEED,
  DEFAULT_TIMEOUTS,
  MAX_LENGTH_FIELD,
} from '../protocol/constants.js';
import {
  ConnectRefusedError,
  ConnectTimeoutError,
  EchoError,
  IOError,
  PayloadTooLargeError,
  ProtocolError,
  ReadTimeoutError,
  ShortReadError,
  toEchoError,
  WriteTimeoutError,
} from '../errors.js';
import { Logger, silentLogger } from '../logger.js';

/** Options for a channel over an already open stream */
export interface StreamChannelOptions {
  /** Initial key (default: 123456789) */
  seed?: bigint;
  /** Read timeout in milliseconds; 0 waits forever (default: 10000) */
  readTimeoutMs?: number;
  /** Largest inbound frame payload accepted (default: 16 MiB) */
  maxFrameLength?: number;
  logger?: Logger;
}

/** Default client configuration values */
const DEFAULT_CONFIG: Required<StreamClientConfig> = {
  host: '127.0.0.1',
  port: DEFAULT_PORT,
  seed: DEFAULT_SEED,
  readTimeoutMs: DEFAULT_TIMEOUTS.READ,
  connectTimeoutMs: DEFAULT_TIMEOUTS.CONNECT,
  maxFrameLength: DEFAULT_MAX_FRAME_LENGTH,
  logLevel: 'error',
};

/**
 * Reply a channel expects for something it sent
 *
 * An echo is decrypted with the key that encrypted the outgoing frame, since
 * the responder returns the ciphertext untouched.
 */
type PendingReply =
  | { kind: 'echo'; key: bigint }
  | { kind: 'empty-echo' }
  | { kind: 'ack' };

interface Waiter {
  resolve: (frame: Frame) => void;
  reject: (err: EchoError) => void;
  timer: ReturnType<typeof setTimeout> | null;
}

/**
 * Framed echo channel over a byte stream
 *
 * State machine: connected ⟷ awaiting-response → closed
 *
 * Inbound bytes are parsed as they arrive; recvData() hands out one decoded
 * frame at a time. Once a terminate frame is parsed nothing after it is read.
 */
export class StreamChannel {
  readonly kind = 'stream' as const;

  private readonly socket: Duplex;
  private readonly keys: KeyStream;
  private readonly readTimeoutMs: number;
  private readonly maxFrameLength: number;
  private readonly logger: Logger;

  private state: StreamChannelState = 'connected';
  private released = false;
  private closing: Promise<void> | null = null;
  private terminated = false;
  private failure: EchoError | null = null;

  private recvBuffer: Buffer = Buffer.alloc(0);
  private inbox: Frame[] = [];
  private pending: PendingReply[] = [];
  private waiter: Waiter | null = null;

  private bytesSent = 0;
  private bytesReceived = 0;

  constructor(socket: Duplex, options: StreamChannelOptions = {}) {
    this.socket = socket;
    this.keys = new KeyStream(options.seed ?? DEFAULT_SEED);
    this.readTimeoutMs = options.readTimeoutMs ?? DEFAULT_TIMEOUTS.READ;
    this.maxFrameLength = options.maxFrameLength ?? DEFAULT_MAX_FRAME_LENGTH;
    this.logger = options.logger ?? silentLogger;
    this.wireSocket();
  }

  /**
   * Get current channel state
   */
  getState(): StreamChannelState {
    return this.state;
  }

  /**
   * Key state of this endpoint
   */
  get keyStream(): KeyStream {
    return this.keys;
  }

  /**
   * Get byte counters
   */
  getStats(): { bytesSent: number; bytesReceived: number } {
    return { bytesSent: this.bytesSent, bytesReceived: this.bytesReceived };
  }

  /**
   * Encrypt and send one data message, expecting its echo
   *
   * An empty payload goes out as a zero-length frame and its echo is the
   * zero-length reply; neither side rotates its key for it.
   *
   * @throws WriteTimeoutError if the peer stops reading for longer than the
   * read timeout
   */
  async sendData(payload: Uint8Array): Promise<void> {
    if (payload.length > MAX_LENGTH_FIELD) {
      throw new PayloadTooLargeError(payload.length, MAX_LENGTH_FIELD);
    }
    this.assertWritable();

    if (payload.length === 0) {
      this.expect({ kind: 'empty-echo' });
      await this.write(encodeFrame({ kind: 'phase-end' }));
      return;
    }

    if (this.logger.isEnabled('debug')) {
      this.logger.debug(`Sending ${payload.length} bytes, key ${this.keys.describe()}`);
    }
    const key = this.keys.advance();
    this.expect({ kind: 'echo', key });
    await this.write(encodeFrame({ kind: 'data', payload: transform(payload, key) }));
  }

  /**
   * Return received ciphertext to the peer unmodified
   */
  async echo(ciphertext: Uint8Array): Promise<void> {
    this.assertWritable();
    await this.write(encodeFrame({ kind: 'data', payload: ciphertext }));
  }

  /**
   * Signal the end of a throughput burst; one acknowledgment is expected
   */
  async sendPhaseEnd(): Promise<void> {
    this.assertWritable();
    this.expect({ kind: 'ack' });
    await this.write(encodeFrame({ kind: 'phase-end' }));
  }

  /**
   * Acknowledge a phase-end received from the peer
   */
  async acknowledgePhaseEnd(): Promise<void> {
    this.assertWritable();
    await this.write(encodeFrame({ kind: 'phase-end' }));
  }

  /**
   * End the session; nothing more may be sent afterwards
   */
  async sendTerminate(): Promise<void> {
    this.assertWritable();
    this.pending = [];
    this.state = 'closed';
    await this.write(encodeFrame({ kind: 'terminate' }));
  }

  /**
   * Read the next frame
   *
   * @throws ReadTimeoutError if nothing arrives within the read timeout
   * @throws ShortReadError if the peer closes mid-frame
   * @throws ProtocolError if the frame does not fit what is awaited
   */
  async recvData(): Promise<StreamSignal> {
    const frame = await this.nextFrame();
    return this.interpret(frame);
  }

  /**
   * Close the underlying stream
   *
   * With nothing queued the stream is ended, then destroyed once flushed or
   * after a short grace period. Writes still queued are dropped and the
   * stream is destroyed at once.
   */
  close(): Promise<void> {
    if (this.closing) {
      return this.closing;
    }

    this.released = true;
    this.state = 'closed';
    this.rejectWaiter(new IOError('Channel closed'));

    this.closing = new Promise((resolve) => {
      if (this.socket.destroyed) {
        resolve();
        return;
      }
      if (this.socket.writableLength > 0) {
        this.socket.once('close', () => resolve());
        this.socket.destroy();
        return;
      }

      const grace = setTimeout(() => this.socket.destroy(), DEFAULT_TIMEOUTS.CLOSE_GRACE);
      this.socket.once('close', () => {
        clearTimeout(grace);
        resolve();
      });
      this.socket.end(() => this.socket.destroy());
    });
    return this.closing;
  }

  /**
   * Bind stream events to channel behavior
   */
  private wireSocket(): void {
    this.socket.on('data', (chunk: Buffer) => {
      this.onData(chunk);
    });

    this.socket.on('end', () => {
      this.onPeerClosed();
    });

    this.socket.on('close', () => {
      this.onPeerClosed();
    });

    this.socket.on('error', (err: Error) => {
      this.fail(new IOError(err.message, err));
    });
  }

  /**
   * Incremental frame parser
   *
   * Handles fragmentation and several frames per chunk.
   */
  private onData(chunk: Buffer): void {
    if (this.terminated || this.failure) return;

    this.bytesReceived += chunk.length;
    this.recvBuffer =
      this.recvBuffer.length === 0 ? chunk : Buffer.concat([this.recvBuffer, chunk]);

    while (true) {
      let result: ReturnType<typeof extractFrame>;
      try {
        result = extractFrame(this.recvBuffer, this.maxFrameLength);
      } catch (err) {
        this.fail(toEchoError(err));
        return;
      }
      if (!result) break;

      this.recvBuffer = result.remaining;
      this.inbox.push(result.frame);

      if (result.frame.kind === 'terminate') {
        this.terminated = true;
        this.recvBuffer = Buffer.alloc(0);
        this.socket.pause();
        break;
      }
    }

    this.deliver();
  }

  private onPeerClosed(): void {
    if (this.terminated || this.failure) return;

    const partial = pendingFrameBytes(this.recvBuffer);
    this.fail(
      partial
        ? new ShortReadError(partial.expected, partial.received)
        : new IOError('Connection closed by peer')
    );
  }

  private fail(err: EchoError): void {
    if (!this.failure) {
      this.failure = err;
      this.logger.debug(`Channel failed: ${err.message}`);
    }
    if (this.inbox.length === 0) {
      this.rejectWaiter(this.failure);
    }
  }

  private deliver(): void {
    if (!this.waiter) return;
    const frame = this.inbox.shift();
    if (frame) {
      const { resolve, timer } = this.waiter;
      if (timer) clearTimeout(timer);
      this.waiter = null;
      resolve(frame);
    }
  }

  private rejectWaiter(err: EchoError): void {
    if (!this.waiter) return;
    const { reject, timer } = this.waiter;
    if (timer) clearTimeout(timer);
    this.waiter = null;
    reject(err);
  }

  private nextFrame(): Promise<Frame> {
    const queued = this.inbox.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.released || this.terminated) {
      return Promise.reject(new IOError('Channel closed'));
    }
    if (this.waiter) {
      return Promise.reject(new IOError('Another read is already in progress'));
    }

    return new Promise<Frame>((resolve, reject) => {
      const timer =
        this.readTimeoutMs > 0
          ? setTimeout(() => {
              this.waiter = null;
              reject(new ReadTimeoutError(this.readTimeoutMs));
            }, this.readTimeoutMs)
          : null;
      this.waiter = { resolve, reject, timer };
    });
  }

  /**
   * Map a decoded frame onto what this endpoint is waiting for
   */
  private interpret(frame: Frame): StreamSignal {
    if (frame.kind === 'terminate') {
      this.pending = [];
      this.state = 'closed';
      return { kind: 'terminated' };
    }

    const head = this.pending[0];

    if (frame.kind === 'phase-end') {
      if (!head) {
        return { kind: 'phase-end' };
      }
      if (head.kind === 'echo') {
        throw new ProtocolError('Phase-end received while awaiting an echo');
      }
      this.settle();
      return head.kind === 'ack'
        ? { kind: 'phase-end' }
        : { kind: 'data', payload: new Uint8Array(0), ciphertext: new Uint8Array(0) };
    }

    // Data initiated by the peer: decrypt with the current key, then rotate
    if (!head) {
      const key = this.keys.advance();
      return { kind: 'data', payload: transform(frame.payload, key), ciphertext: frame.payload };
    }
    if (head.kind !== 'echo') {
      throw new ProtocolError(
        head.kind === 'ack'
          ? 'Data received while awaiting a phase-end acknowledgment'
          : 'Data received while awaiting an empty echo'
      );
    }
    this.settle();
    return { kind: 'data', payload: transform(frame.payload, head.key), ciphertext: frame.payload };
  }

  private expect(reply: PendingReply): void {
    this.pending.push(reply);
    this.state = 'awaiting-response';
  }

  private settle(): void {
    this.pending.shift();
    if (this.state !== 'closed') {
      this.state = this.pending.length > 0 ? 'awaiting-response' : 'connected';
    }
  }

  private assertWritable(): void {
    if (this.failure) {
      throw this.failure;
    }
    if (this.released || this.state === 'closed') {
      throw new IOError('Channel closed');
    }
  }

  /**
   * Write a frame, waiting for the stream to drain under backpressure
   */
  private async write(buffer: Buffer): Promise<void> {
    this.bytesSent += buffer.length;

    let flushed: boolean;
    try {
      flushed = this.socket.write(buffer);
    } catch (err) {
      const error = toEchoError(err);
      this.fail(error);
      throw error;
    }

    if (!flushed) {
      await this.waitForDrain();
    }
  }

  /**
   * Wait for the stream to drain, bounded by the read timeout
   */
  private waitForDrain(): Promise<void> {
    return new Promise((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | null = null;
      const cleanup = () => {
        if (timer) clearTimeout(timer);
        this.socket.off('drain', onDrain);
        this.socket.off('close', onClose);
      };
      const onDrain = () => {
        cleanup();
        resolve();
      };
      const onClose = () => {
        cleanup();
        reject(this.failure ?? new IOError('Connection closed while writing'));
      };
      this.socket.on('drain', onDrain);
      this.socket.on('close', onClose);

      if (this.readTimeoutMs > 0) {
        timer = setTimeout(() => {
          cleanup();
          const error = new WriteTimeoutError(this.readTimeoutMs);
          this.fail(error);
          reject(error);
        }, this.readTimeoutMs);
      }
    });
  }
}

/**
 * Open a TCP connection and wrap it in a stream channel
 *
 * @throws ConnectTimeoutError if the peer does not accept in time
 * @throws ConnectRefusedError if the peer rejects the connection
 */
export function connectStream(config: StreamClientConfig = {}): Promise<StreamChannel> {
  const settings: Required<StreamClientConfig> = { ...DEFAULT_CONFIG, ...config };
  const logger = new Logger('echo-probe:tcp', settings.logLevel);

  return new Promise((resolve, reject) => {
    const socket = connect({ host: settings.host, port: settings.port });
    let settled = false;

    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      socket.destroy();
      reject(new ConnectTimeoutError(settings.host, settings.port, settings.connectTimeoutMs));
    }, settings.connectTimeoutMs);

    const onError = (err: NodeJS.ErrnoException) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.destroy();
      reject(
        err.code === 'ECONNREFUSED'
          ? new ConnectRefusedError(settings.host, settings.port, err)
          : new IOError(err.message, err)
      );
    };

    socket.once('error', onError);
    socket.once('connect', () => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.off('error', onError);
      socket.setNoDelay(true);
      logger.info(`Connected to ${settings.host}:${settings.port}`);
      resolve(
        new StreamChannel(socket, {
          seed: settings.seed,
          readTimeoutMs: settings.readTimeoutMs,
          maxFrameLength: settings.maxFrameLength,
          logger,
        })
      );
    });
  });
}
