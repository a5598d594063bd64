/**
 * Tests for the measurement driver
 */

import { Duplex } from 'node:stream';
import { describe, it, expect } from 'vitest';
import { computeBitRate, MeasurementDriver, type Clock } from '../../src/measurement/driver.js';
import { createPlan } from '../../src/measurement/plan.js';
import { StreamChannel } from '../../src/transport/tcp.js';
import { DatagramChannel } from '../../src/transport/udp.js';
import { serveStreamSession } from '../../src/server/streamServer.js';
import { ServerMetrics } from '../../src/server/metrics.js';
import { encodeFrame } from '../../src/protocol/frame.js';
import { TERMINATION_MARKER_BYTES } from '../../src/protocol/datagram.js';
import { EchoMismatchError, WriteTimeoutError } from '../../src/errors.js';
import { silentLogger } from '../../src/logger.js';
import { createDuplexPair } from '../helpers/duplexPair.js';
import { FakeDatagramTransport } from '../helpers/fakeDatagramTransport.js';

/** Clock that moves 5 ms on every reading */
function steppingClock(): Clock {
  let now = 0;
  return {
    now: () => {
      now += 5;
      return now;
    },
  };
}

function streamSession() {
  const [clientEnd, serverEnd] = createDuplexPair();
  const client = new StreamChannel(clientEnd);
  const metrics = new ServerMetrics();
  const serving = serveStreamSession(
    new StreamChannel(serverEnd, { readTimeoutMs: 0 }),
    silentLogger,
    metrics
  );
  return { clientEnd, client, metrics, serving };
}

describe('computeBitRate', () => {
  it('should divide bits by elapsed seconds', () => {
    expect(computeBitRate(1024, 1024, 1000)).toBe(8388608);
  });

  it('should floor the elapsed time at the resolution', () => {
    expect(computeBitRate(1, 1000, 0)).toBeCloseTo(8e9, 3);
    expect(computeBitRate(1, 1000, 0, 1)).toBeCloseTo(8e6, 3);
  });

  it('should be zero for empty messages', () => {
    expect(computeBitRate(10, 0, 3)).toBe(0);
  });
});

describe('MeasurementDriver', () => {
  it('should reject a non-positive time resolution', () => {
    expect(() => new MeasurementDriver({ timeResolutionMs: 0 })).toThrow(RangeError);
  });

  it('should run a plan over a stream channel', async () => {
    const { client, metrics, serving } = streamSession();
    const driver = new MeasurementDriver({ clock: steppingClock() });

    const report = await driver.run(client, createPlan([0, 8], [{ count: 3, size: 16 }]));

    expect(report).toEqual({
      transport: 'stream',
      latency: [
        { kind: 'rtt', size: 0, elapsedMs: 5 },
        { kind: 'rtt', size: 8, elapsedMs: 5 },
      ],
      throughput: [
        {
          count: 3,
          size: 16,
          elapsedMs: 5,
          bitsPerSecond: expect.closeTo(76800, 6),
          roundTrip: true,
        },
      ],
    });
    expect(await serving).toBe('terminated');
    expect(metrics.getSnapshot()).toMatchObject({ messagesEchoed: 4, acknowledgments: 2 });
    expect(client.getState()).toBe('closed');
  });

  it('should write 16384 data frames and one phase-end for a 16384 x 64 trial', async () => {
    const { clientEnd, client, metrics, serving } = streamSession();
    const driver = new MeasurementDriver();

    const result = await driver.runThroughputTrial(client, 16384, 64);

    const frames = clientEnd.writtenFrames();
    expect(frames.filter((frame) => frame.kind === 'data').length).toBe(16384);
    expect(frames.filter((frame) => frame.kind === 'phase-end').length).toBe(1);
    expect(frames[frames.length - 1]).toEqual({ kind: 'phase-end' });
    expect(result).toMatchObject({ count: 16384, size: 64, roundTrip: true });

    await driver.finish(client);
    expect(await serving).toBe('terminated');
    expect(metrics.getSnapshot()).toMatchObject({ messagesEchoed: 16384, acknowledgments: 1 });
  });

  it('should fill stream bursts with zero bytes', async () => {
    const { clientEnd, client, serving } = streamSession();
    const driver = new MeasurementDriver();

    await driver.runThroughputTrial(client, 1, 4);
    await driver.finish(client);
    await serving;

    // First message goes out under the seed mask
    expect(clientEnd.writtenFrames()[0]).toEqual({
      kind: 'data',
      payload: Uint8Array.of(0x15, 0x15, 0x15, 0x15),
    });
  });

  it('should abort and close the channel on a corrupted echo', async () => {
    const [clientEnd, serverEnd] = createDuplexPair();
    const client = new StreamChannel(clientEnd);
    serverEnd.on('data', () => {
      serverEnd.write(encodeFrame({ kind: 'data', payload: Uint8Array.of(0xee) }));
    });

    const run = new MeasurementDriver().run(client, createPlan([1], []));

    await expect(run).rejects.toBeInstanceOf(EchoMismatchError);
    expect(client.getState()).toBe('closed');
  });

  it('should abort a burst the peer never reads', async () => {
    const stalled = new Duplex({ read() {}, write() {}, writableHighWaterMark: 16 });
    const client = new StreamChannel(stalled, { readTimeoutMs: 20 });

    const run = new MeasurementDriver().run(client, createPlan([], [{ count: 16384, size: 1024 }]));

    await expect(run).rejects.toBeInstanceOf(WriteTimeoutError);
    expect(client.getState()).toBe('closed');
    expect(stalled.destroyed).toBe(true);
  });

  it('should record no-response for a lost datagram and keep going', async () => {
    const transport = new FakeDatagramTransport((data, index) => (index === 0 ? null : data));
    const channel = new DatagramChannel(transport, { readTimeoutMs: 20 });
    const driver = new MeasurementDriver({ clock: steppingClock() });

    const report = await driver.run(channel, createPlan([8, 64], [{ count: 2, size: 16 }]));

    expect(report).toEqual({
      transport: 'datagram',
      latency: [
        { kind: 'no-response', size: 8, timeoutMs: 20 },
        { kind: 'rtt', size: 64, elapsedMs: 5 },
      ],
      throughput: [
        {
          count: 2,
          size: 16,
          elapsedMs: 5,
          bitsPerSecond: expect.closeTo(51200, 6),
          roundTrip: false,
        },
      ],
    });
  });

  it('should fill datagram bursts with x and finish with the marker', async () => {
    const transport = new FakeDatagramTransport();
    await transport.connect();
    const channel = new DatagramChannel(transport, { readTimeoutMs: 20 });
    const driver = new MeasurementDriver();

    await driver.runThroughputTrial(channel, 2, 3);
    await driver.finish(channel);

    // 'x' under masks 0x15 and 0xcf
    expect(transport.sent).toEqual([
      Uint8Array.of(0x6d, 0x6d, 0x6d),
      Uint8Array.of(0xb7, 0xb7, 0xb7),
      TERMINATION_MARKER_BYTES,
    ]);
    expect(transport.connected).toBe(false);
  });
});
