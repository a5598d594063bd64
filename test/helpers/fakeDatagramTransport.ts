/**
 * Datagram transport that keeps sent datagrams in memory and answers them
 * through a pluggable responder
 */

import type { DatagramTransport, DatagramTransportEvents } from '../../src/transport/udp.js';
import type { EventHandler, TransportMessage } from '../../src/types.js';

/** Returns the reply for the n-th datagram, or null to stay silent */
export type Responder = (data: Uint8Array, index: number) => Uint8Array | null;

export class FakeDatagramTransport implements DatagramTransport {
  readonly sent: Uint8Array[] = [];
  connected = false;
  respond: Responder;
  private readonly handlers: {
    [E in keyof DatagramTransportEvents]: Set<EventHandler<DatagramTransportEvents[E]>>;
  } = { message: new Set(), error: new Set() };

  constructor(respond: Responder = () => null) {
    this.respond = respond;
  }

  async connect(): Promise<void> {
    this.connected = true;
  }

  disconnect(): void {
    this.connected = false;
  }

  async send(data: Uint8Array): Promise<void> {
    const index = this.sent.length;
    this.sent.push(data);
    const reply = this.respond(data, index);
    if (reply) {
      setImmediate(() => this.deliver(reply));
    }
  }

  /** Hand a datagram to every listener, as if it had just arrived */
  deliver(data: Uint8Array): void {
    const message: TransportMessage = { data, remoteAddress: '127.0.0.1', remotePort: 26881 };
    this.handlers.message.forEach((handler) => handler(message));
  }

  /** Report a socket error to every listener */
  fail(err: Error): void {
    this.handlers.error.forEach((handler) => handler(err));
  }

  on<E extends keyof DatagramTransportEvents>(
    event: E,
    handler: EventHandler<DatagramTransportEvents[E]>
  ): void {
    this.handlers[event].add(handler);
  }

  off<E extends keyof DatagramTransportEvents>(
    event: E,
    handler: EventHandler<DatagramTransportEvents[E]>
  ): void {
    this.handlers[event].delete(handler);
  }
}
