/**
 * Console lines for a measurement report
 */

import type { LatencyResult, MeasurementReport, ThroughputResult, TransportKind } from '../types.js';

const UNIT: Record<TransportKind, string> = {
  stream: 'messages',
  datagram: 'datagrams',
};

export function formatLatency(result: LatencyResult): string {
  if (result.kind === 'no-response') {
    return `RTT for ${result.size} bytes: no response (timeout after ${result.timeoutMs} ms)`;
  }
  return `RTT for ${result.size} bytes: ${result.elapsedMs.toFixed(3)} ms`;
}

export function formatThroughput(result: ThroughputResult, transport: TransportKind): string {
  return (
    `Throughput for ${result.count} ${UNIT[transport]} of ${result.size} bytes: ` +
    `${Math.round(result.bitsPerSecond)} bps (${result.elapsedMs.toFixed(3)} ms)`
  );
}

export function formatReport(report: MeasurementReport): string[] {
  return [
    ...report.latency.map(formatLatency),
    ...report.throughput.map((result) => formatThroughput(result, report.transport)),
  ];
}
