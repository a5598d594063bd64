/**
 * Transport module exports
 */

export { StreamChannel, connectStream } from './tcp.js';
export type { StreamChannelOptions } from './tcp.js';
export { UdpTransport, DatagramChannel, connectDatagram } from './udp.js';
export type {
  UdpTransportConfig,
  DatagramTransport,
  DatagramTransportEvents,
  DatagramChannelOptions,
} from './udp.js';
