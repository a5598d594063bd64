/**
 * TypeScript interfaces for the echo-probe toolkit
 */

/** Log level for console output */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

/** Transport variant a channel or server runs over */
export type TransportKind = 'stream' | 'datagram';

/** Event handler function type */
export type EventHandler<T = unknown> = (data: T) => void;

/** Connection state of the stream channel */
export type StreamChannelState = 'connected' | 'awaiting-response' | 'closed';

/** Connection state of a datagram transport */
export type ConnectionState = 'disconnected' | 'connecting' | 'connected';

/** Shared endpoint configuration */
export interface EndpointConfig {
  /** Server hostname or IP address */
  host: string;
  /** Server port number (default: 26881) */
  port: number;
  /** Initial key for the XOR keystream (default: 123456789) */
  seed: bigint;
  /** Read timeout in milliseconds; 0 waits forever */
  readTimeoutMs: number;
  /** Logging level */
  logLevel: LogLevel;
}

/** Configuration for a client connection over TCP */
export interface StreamClientConfig extends Partial<EndpointConfig> {
  /** Connection timeout in milliseconds (default: 5000) */
  connectTimeoutMs?: number;
  /** Largest inbound frame payload accepted (default: 16 MiB) */
  maxFrameLength?: number;
}

/** Configuration for a client socket over UDP */
export interface DatagramClientConfig extends Partial<EndpointConfig> {
  /** Largest datagram payload sent (default: 1024) */
  maxDatagramSize?: number;
}

/** A decoded stream frame, as it appears on the wire */
export type Frame =
  | { kind: 'data'; payload: Uint8Array }
  | { kind: 'phase-end' }
  | { kind: 'terminate' };

/** Outcome of reading from the stream channel */
export type StreamSignal =
  | {
      kind: 'data';
      /** Decrypted payload */
      payload: Uint8Array;
      /** Bytes exactly as they crossed the wire */
      ciphertext: Uint8Array;
    }
  | { kind: 'phase-end' }
  | { kind: 'terminated' };

/** Outcome of reading from the datagram channel */
export type DatagramSignal =
  | { kind: 'data'; payload: Uint8Array }
  | { kind: 'no-response' };

/** Raw datagram with its sender */
export interface TransportMessage {
  /** Raw datagram bytes */
  data: Uint8Array;
  /** Source address */
  remoteAddress: string;
  /** Source port */
  remotePort: number;
}

/** One throughput trial of a measurement plan */
export interface ThroughputTrial {
  /** Number of messages in the burst */
  count: number;
  /** Size of each message in bytes */
  size: number;
}

/** Ordered latency probes and throughput trials for one run */
export interface MeasurementPlan {
  readonly latencySizes: readonly number[];
  readonly throughputTrials: readonly Readonly<ThroughputTrial>[];
}

/** Result of a single latency probe */
export type LatencyResult =
  | { kind: 'rtt'; size: number; elapsedMs: number }
  | { kind: 'no-response'; size: number; timeoutMs: number };

/** Result of a throughput trial */
export interface ThroughputResult {
  count: number;
  size: number;
  /** Elapsed wall-clock time in milliseconds */
  elapsedMs: number;
  /** Achieved rate in bits per second */
  bitsPerSecond: number;
  /** True when elapsed time includes waiting for echoes */
  roundTrip: boolean;
}

/** Everything a run of the driver produced */
export interface MeasurementReport {
  transport: TransportKind;
  latency: LatencyResult[];
  throughput: ThroughputResult[];
}

/** Counters kept by the echo servers */
export interface ServerStats {
  sessionsOpened: number;
  sessionsClosed: number;
  messagesEchoed: number;
  acknowledgments: number;
  bytesReceived: number;
  bytesSent: number;
}
