/**
 * Echo server counters
 */

import type { ServerStats } from '../types.js';

export class ServerMetrics {
  private sessionsOpened = 0;
  private sessionsClosed = 0;
  private messagesEchoed = 0;
  private acknowledgments = 0;
  private bytesReceived = 0;
  private bytesSent = 0;

  sessionOpened(): void {
    this.sessionsOpened++;
  }

  sessionClosed(bytes: { bytesSent: number; bytesReceived: number }): void {
    this.sessionsClosed++;
    this.bytesSent += bytes.bytesSent;
    this.bytesReceived += bytes.bytesReceived;
  }

  messageEchoed(): void {
    this.messagesEchoed++;
  }

  phaseEndAcknowledged(): void {
    this.acknowledgments++;
  }

  /**
   * Account datagram traffic, which has no per-session byte counter
   */
  datagram(received: number, sent: number): void {
    this.bytesReceived += received;
    this.bytesSent += sent;
  }

  getSnapshot(): ServerStats {
    return {
      sessionsOpened: this.sessionsOpened,
      sessionsClosed: this.sessionsClosed,
      messagesEchoed: this.messagesEchoed,
      acknowledgments: this.acknowledgments,
      bytesReceived: this.bytesReceived,
      bytesSent: this.bytesSent,
    };
  }
}
