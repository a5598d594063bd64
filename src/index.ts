/**
 * echo-probe: latency and throughput measurement over TCP and UDP echo
 *
 * @packageDocumentation
 * @module echo-probe
 *
 * @example
 * ```typescript
 * import { connectStream, MeasurementDriver, DEFAULT_PLAN, formatReport } from 'echo-probe';
 *
 * const channel = await connectStream({
 *   host: 'echo.example.com',
 *   port: 26881,
 *   logLevel: 'info'
 * });
 *
 * const report = await new MeasurementDriver().run(channel, DEFAULT_PLAN);
 * for (const line of formatReport(report)) {
 *   console.log(line);
 * }
 * ```
 */

// Measurement
export { MeasurementDriver, computeBitRate, DEFAULT_TIME_RESOLUTION_MS } from './measurement/driver.js';
export type { MeasurementChannel, Clock, DriverConfig } from './measurement/driver.js';
export { DEFAULT_PLAN, createPlan } from './measurement/plan.js';
export { formatLatency, formatThroughput, formatReport } from './measurement/report.js';

// Type exports
export type {
  LogLevel,
  TransportKind,
  EventHandler,
  StreamChannelState,
  ConnectionState,
  EndpointConfig,
  StreamClientConfig,
  DatagramClientConfig,
  Frame,
  StreamSignal,
  DatagramSignal,
  TransportMessage,
  ThroughputTrial,
  MeasurementPlan,
  LatencyResult,
  ThroughputResult,
  MeasurementReport,
  ServerStats,
} from './types.js';

// Channels and transports
export {
  StreamChannel,
  connectStream,
  UdpTransport,
  DatagramChannel,
  connectDatagram,
} from './transport/index.js';
export type {
  StreamChannelOptions,
  UdpTransportConfig,
  DatagramTransport,
  DatagramTransportEvents,
  DatagramChannelOptions,
} from './transport/index.js';

// Servers
export {
  StreamEchoServer,
  serveStreamSession,
  DatagramEchoServer,
  respondToDatagram,
  ServerMetrics,
} from './server/index.js';
export type {
  StreamServerConfig,
  SessionExit,
  DatagramServerConfig,
  DatagramServerExit,
  DatagramResponse,
} from './server/index.js';

// Keystream (for advanced usage)
export { KeyStream, advanceKey, transform } from './crypto/index.js';

// Protocol utilities (for advanced usage)
export {
  encodeFrame,
  extractFrame,
  isTerminationMarker,
  DEFAULT_PORT,
  DEFAULT_SEED,
  TERMINATION_MARKER,
} from './protocol/index.js';

// Errors, logging and configuration
export {
  EchoError,
  ConnectTimeoutError,
  ConnectRefusedError,
  IOError,
  ShortReadError,
  ReadTimeoutError,
  WriteTimeoutError,
  EchoMismatchError,
  ProtocolError,
  PayloadTooLargeError,
  toEchoError,
} from './errors.js';
export type { EchoErrorCode } from './errors.js';
export { Logger, silentLogger } from './logger.js';
export { loadConfig, parsePort, DEFAULT_CONFIG, SERVER_DEFAULTS } from './config.js';
export type { EchoProbeConfig } from './config.js';
