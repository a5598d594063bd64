/**
 * Echo server exports
 */

export { StreamEchoServer, serveStreamSession } from './streamServer.js';
export type { StreamServerConfig, SessionExit } from './streamServer.js';
export { DatagramEchoServer, respondToDatagram } from './datagramServer.js';
export type { DatagramServerConfig, DatagramServerExit, DatagramResponse } from './datagramServer.js';
export { ServerMetrics } from './metrics.js';
