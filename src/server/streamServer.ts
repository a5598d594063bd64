import { createServer, type Server, type Socket } from 'node:net';
import type { LogLevel, ServerStats } from '../types.js';
import { StreamChannel } from '../transport/tcp.js';
import { DEFAULT_MAX_FRAME_LENGTH, DEFAULT_PORT, DEFAULT_SEED } from '../protocol/constants.js';
import { IOError } from '../errors.js';
import { Logger } from '../logger.js';
import { ServerMetrics } from './metrics.js';

/** TCP echo server configuration */
export interface StreamServerConfig {
  /** Address to listen on (default: 0.0.0.0) */
  host?: string;
  /** Port to listen on; 0 picks a free one (default: 26881) */
  port?: number;
  /** Initial key of every session (default: 123456789) */
  seed?: bigint;
  /** Idle limit per session in ms; 0 waits forever (default: 0) */
  readTimeoutMs?: number;
  /** Largest inbound frame payload accepted (default: 16 MiB) */
  maxFrameLength?: number;
  logLevel?: LogLevel;
}

const DEFAULT_CONFIG: Required<StreamServerConfig> = {
  host: '0.0.0.0',
  port: DEFAULT_PORT,
  seed: DEFAULT_SEED,
  readTimeoutMs: 0,
  maxFrameLength: DEFAULT_MAX_FRAME_LENGTH,
  logLevel: 'info',
};

/** How a session loop ended */
export type SessionExit = 'terminated' | 'failed';

/**
 * Echo frames on one connection until the peer terminates or the
 * connection fails, then close it
 *
 * Data is returned as the ciphertext it arrived as; receiving it rotates
 * this session's key. A phase-end is answered with one phase-end.
 */
export async function serveStreamSession(
  channel: StreamChannel,
  logger: Logger,
  metrics?: ServerMetrics
): Promise<SessionExit> {
  try {
    while (true) {
      const signal = await channel.recvData();
      switch (signal.kind) {
        case 'terminated':
          logger.info('Termination signal received');
          return 'terminated';

        case 'phase-end':
          await channel.acknowledgePhaseEnd();
          metrics?.phaseEndAcknowledged();
          break;

        case 'data':
          await channel.echo(signal.ciphertext);
          metrics?.messageEchoed();
          break;
      }
    }
  } catch (err) {
    logger.warn(`Session ended: ${err instanceof Error ? err.message : String(err)}`);
    return 'failed';
  } finally {
    await channel.close();
    metrics?.sessionClosed(channel.getStats());
  }
}

/**
 * TCP Echo Server
 *
 * Core responsibilities:
 * - Accept TCP connections
 * - Give every connection its own channel and key
 * - Run the echo loop per connection, independent of the others
 */
export class StreamEchoServer {
  private readonly server: Server;
  private readonly config: Required<StreamServerConfig>;
  private readonly logger: Logger;
  private readonly metrics = new ServerMetrics();
  private readonly sessions: Map<string, { channel: StreamChannel; done: Promise<SessionExit> }> =
    new Map();
  private nextId = 1;
  private running = false;

  constructor(config: StreamServerConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = new Logger('echo-probe:tcp-server', this.config.logLevel);
    this.server = createServer((socket) => this.handleSocket(socket));
  }

  /**
   * Start listening
   * @returns The bound address
   */
  start(): Promise<{ address: string; port: number }> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => reject(new IOError(err.message, err));
      this.server.once('error', onError);
      this.server.listen(this.config.port, this.config.host, () => {
        this.server.off('error', onError);
        this.server.on('error', (err) => this.logger.error(`Server error: ${err.message}`));
        this.running = true;
        const bound = this.address();
        this.logger.info(`TCP echo server listening on ${bound.address}:${bound.port}`);
        resolve(bound);
      });
    });
  }

  /**
   * Stop accepting, close every open session and release the socket
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.logger.info('Shutting down TCP echo server...');

    const closing = new Promise<void>((resolve, reject) => {
      this.server.close((err) => (err ? reject(new IOError(err.message, err)) : resolve()));
    });

    const pending = [...this.sessions.values()];
    await Promise.all(pending.map(({ channel }) => channel.close()));
    await Promise.all(pending.map(({ done }) => done));
    await closing;

    this.logger.info('Server stopped', this.metrics.getSnapshot());
  }

  address(): { address: string; port: number } {
    const bound = this.server.address();
    if (!bound || typeof bound === 'string') {
      throw new IOError('Server is not listening on a TCP port');
    }
    return { address: bound.address, port: bound.port };
  }

  isRunning(): boolean {
    return this.running;
  }

  getStats(): ServerStats & { activeSessions: number } {
    return { ...this.metrics.getSnapshot(), activeSessions: this.sessions.size };
  }

  /**
   * Wait until every session open right now has ended
   */
  async drain(): Promise<void> {
    await Promise.all([...this.sessions.values()].map(({ done }) => done));
  }

  private handleSocket(socket: Socket): void {
    if (!this.running) {
      socket.destroy();
      return;
    }

    const sessionId = `conn-${this.nextId++}`;
    const logger = this.logger.child(sessionId);
    socket.setNoDelay(true);

    const channel = new StreamChannel(socket, {
      seed: this.config.seed,
      readTimeoutMs: this.config.readTimeoutMs,
      maxFrameLength: this.config.maxFrameLength,
      logger,
    });

    this.metrics.sessionOpened();
    logger.info('Client connected', { remoteAddress: socket.remoteAddress });

    const done = serveStreamSession(channel, logger, this.metrics).then((exit) => {
      this.sessions.delete(sessionId);
      logger.info(`Client socket closed (${exit})`);
      return exit;
    });
    this.sessions.set(sessionId, { channel, done });
  }
}
