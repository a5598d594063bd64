/**
 * MeasurementDriver - runs latency probes and throughput trials
 * against a stream or datagram channel
 */

import { equalBytes } from '@noble/ciphers/utils.js';
import type {
  LatencyResult,
  MeasurementPlan,
  MeasurementReport,
  ThroughputResult,
} from '../types.js';
import type { StreamChannel } from '../transport/tcp.js';
import type { DatagramChannel } from '../transport/udp.js';
import { FILL_BYTES } from '../protocol/constants.js';
import { EchoMismatchError, ProtocolError } from '../errors.js';
import { Logger, silentLogger } from '../logger.js';

/** Either channel variant */
export type MeasurementChannel = StreamChannel | DatagramChannel;

/** Monotonic time source in milliseconds */
export interface Clock {
  now(): number;
}

/** Driver configuration */
export interface DriverConfig {
  /** Time source (default: performance.now) */
  clock?: Clock;
  /** Smallest elapsed time a rate is computed over, in ms (default: 0.001) */
  timeResolutionMs?: number;
  logger?: Logger;
}

/** One microsecond, the tick of the default clock as reported */
export const DEFAULT_TIME_RESOLUTION_MS = 0.001;

const systemClock: Clock = {
  now: () => performance.now(),
};

/**
 * Bits per second for a burst, never dividing by zero
 *
 * @param elapsedMs - Measured duration
 * @param resolutionMs - Floor applied to the duration
 */
export function computeBitRate(
  count: number,
  size: number,
  elapsedMs: number,
  resolutionMs: number = DEFAULT_TIME_RESOLUTION_MS
): number {
  const bits = count * size * 8;
  const seconds = Math.max(elapsedMs, resolutionMs) / 1000;
  return bits / seconds;
}

/**
 * Drives a fixed measurement plan over one channel
 *
 * @example
 * ```typescript
 * const channel = await connectStream({ host: 'echo.example.com' });
 * const report = await new MeasurementDriver().run(channel, DEFAULT_PLAN);
 * ```
 */
export class MeasurementDriver {
  private readonly clock: Clock;
  private readonly resolutionMs: number;
  private readonly logger: Logger;

  constructor(config: DriverConfig = {}) {
    this.clock = config.clock ?? systemClock;
    this.resolutionMs = config.timeResolutionMs ?? DEFAULT_TIME_RESOLUTION_MS;
    this.logger = config.logger ?? silentLogger;

    if (!(this.resolutionMs > 0)) {
      throw new RangeError(`Time resolution must be positive, got ${this.resolutionMs}`);
    }
  }

  /**
   * Run the whole plan: latency first, then each trial in order, then terminate
   *
   * A fatal error releases the channel without the termination signal and is
   * rethrown.
   */
  async run(channel: MeasurementChannel, plan: MeasurementPlan): Promise<MeasurementReport> {
    const report: MeasurementReport = { transport: channel.kind, latency: [], throughput: [] };

    try {
      report.latency = await this.runLatencyProbes(channel, plan.latencySizes);
      for (const { count, size } of plan.throughputTrials) {
        report.throughput.push(await this.runThroughputTrial(channel, count, size));
      }
    } catch (err) {
      this.logger.error(`Measurement aborted: ${err instanceof Error ? err.message : String(err)}`);
      await channel.close();
      throw err;
    }

    await this.finish(channel);
    return report;
  }

  /**
   * Time one echo per size, in order
   */
  async runLatencyProbes(
    channel: MeasurementChannel,
    sizes: readonly number[]
  ): Promise<LatencyResult[]> {
    const results: LatencyResult[] = [];
    for (const size of sizes) {
      const result =
        channel.kind === 'stream'
          ? await this.probeStream(channel, size)
          : await this.probeDatagram(channel, size);
      this.logger.debug(`Latency probe ${size}B`, result);
      results.push(result);
    }
    return results;
  }

  /**
   * Time a burst of count messages of size bytes
   *
   * Over a stream every echo is read back and a phase-end handshake closes
   * the burst. Over datagrams only the send duration is measured.
   */
  async runThroughputTrial(
    channel: MeasurementChannel,
    count: number,
    size: number
  ): Promise<ThroughputResult> {
    const payload = new Uint8Array(size).fill(FILL_BYTES[channel.kind]);
    const start = this.clock.now();

    if (channel.kind === 'stream') {
      await this.streamBurst(channel, payload, count);
    } else {
      for (let i = 0; i < count; i++) {
        await channel.sendData(payload);
      }
    }

    const elapsedMs = this.clock.now() - start;
    const result: ThroughputResult = {
      count,
      size,
      elapsedMs,
      bitsPerSecond: computeBitRate(count, size, elapsedMs, this.resolutionMs),
      roundTrip: channel.kind === 'stream',
    };
    this.logger.debug(`Throughput trial ${count}x${size}B`, result);
    return result;
  }

  /**
   * Send the termination signal and release the channel
   */
  async finish(channel: MeasurementChannel): Promise<void> {
    try {
      await channel.sendTerminate();
    } finally {
      await channel.close();
    }
  }

  private async probeStream(channel: StreamChannel, size: number): Promise<LatencyResult> {
    const message = new Uint8Array(size);
    const start = this.clock.now();

    await channel.sendData(message);
    const reply = await channel.recvData();
    if (reply.kind !== 'data') {
      throw new ProtocolError(`Expected an echo of ${size} bytes, got ${reply.kind}`);
    }
    if (!equalBytes(reply.payload, message)) {
      throw new EchoMismatchError(size);
    }

    return { kind: 'rtt', size, elapsedMs: this.clock.now() - start };
  }

  private async probeDatagram(channel: DatagramChannel, size: number): Promise<LatencyResult> {
    const message = new Uint8Array(size);
    const start = this.clock.now();

    await channel.sendData(message);
    const reply = await channel.recvData();
    if (reply.kind === 'no-response') {
      this.logger.warn(`No response from server for ${size} byte probe (timeout)`);
      return { kind: 'no-response', size, timeoutMs: channel.timeoutMs };
    }

    return { kind: 'rtt', size, elapsedMs: this.clock.now() - start };
  }

  private async streamBurst(channel: StreamChannel, payload: Uint8Array, count: number): Promise<void> {
    for (let i = 0; i < count; i++) {
      await channel.sendData(payload);
    }

    for (let i = 0; i < count; i++) {
      const reply = await channel.recvData();
      if (reply.kind !== 'data') {
        throw new ProtocolError(`Expected echo ${i + 1} of ${count}, got ${reply.kind}`);
      }
    }

    await channel.sendPhaseEnd();
    const ack = await channel.recvData();
    if (ack.kind !== 'phase-end') {
      throw new ProtocolError(`Expected phase-end acknowledgment, got ${ack.kind}`);
    }
  }
}
