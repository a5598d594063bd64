/**
 * Loopback tests for the TCP echo server
 */

import { connect } from 'node:net';
import { describe, it, expect, afterEach, vi } from 'vitest';
import { StreamEchoServer } from '../../src/server/streamServer.js';
import { connectStream } from '../../src/transport/tcp.js';
import { MeasurementDriver } from '../../src/measurement/driver.js';
import { createPlan } from '../../src/measurement/plan.js';
import { encodeFrame } from '../../src/protocol/frame.js';
import { ConnectRefusedError, EchoError } from '../../src/errors.js';

describe('StreamEchoServer', () => {
  const servers: StreamEchoServer[] = [];

  async function startServer(): Promise<{ server: StreamEchoServer; port: number }> {
    const server = new StreamEchoServer({ host: '127.0.0.1', port: 0, logLevel: 'silent' });
    servers.push(server);
    const { port } = await server.start();
    return { server, port };
  }

  afterEach(async () => {
    await Promise.all(servers.splice(0).map((server) => server.stop()));
  });

  it('should serve a complete measurement run', async () => {
    const { server, port } = await startServer();
    const channel = await connectStream({ host: '127.0.0.1', port, logLevel: 'silent' });
    const plan = createPlan(
      [0, 8, 512],
      [
        { count: 4, size: 64 },
        { count: 2, size: 1024 },
      ]
    );

    const report = await new MeasurementDriver().run(channel, plan);
    await server.drain();

    expect(report.latency.map((result) => result.kind)).toEqual(['rtt', 'rtt', 'rtt']);
    expect(report.throughput.map(({ count, size }) => [count, size])).toEqual([
      [4, 64],
      [2, 1024],
    ]);
    expect(server.getStats()).toEqual({
      sessionsOpened: 1,
      sessionsClosed: 1,
      messagesEchoed: 8,
      acknowledgments: 3,
      bytesReceived: 2872,
      bytesSent: 2868,
      activeSessions: 0,
    });
  });

  it('should keep accepting after a session terminates', async () => {
    const { server, port } = await startServer();
    const plan = createPlan([8], []);

    for (let i = 0; i < 2; i++) {
      const channel = await connectStream({ host: '127.0.0.1', port, logLevel: 'silent' });
      await new MeasurementDriver().run(channel, plan);
    }
    await server.drain();

    expect(server.getStats()).toMatchObject({ sessionsOpened: 2, sessionsClosed: 2 });
    expect(server.isRunning()).toBe(true);
  });

  it('should echo concurrent connections independently', async () => {
    const { port } = await startServer();
    const first = await connectStream({ host: '127.0.0.1', port, logLevel: 'silent' });
    const second = await connectStream({ host: '127.0.0.1', port, logLevel: 'silent' });

    await first.sendData(Uint8Array.of(1));
    await first.recvData();
    await second.sendData(Uint8Array.of(2));

    expect(await second.recvData()).toEqual({
      kind: 'data',
      payload: Uint8Array.of(2),
      ciphertext: Uint8Array.of(2 ^ 0x15),
    });
    await first.close();
    await second.close();
  });

  it('should close open sessions on stop', async () => {
    const { server, port } = await startServer();
    const channel = await connectStream({ host: '127.0.0.1', port, logLevel: 'silent' });
    await vi.waitFor(() => expect(server.getStats().activeSessions).toBe(1));

    const closed = expect(channel.recvData()).rejects.toBeInstanceOf(EchoError);
    await server.stop();

    await closed;
    expect(server.isRunning()).toBe(false);
    await channel.close();
  });

  it('should stop while a client has stopped reading its echoes', async () => {
    const { server, port } = await startServer();
    const raw = connect({ host: '127.0.0.1', port });
    const socketErrors: Error[] = [];
    raw.on('error', (err) => socketErrors.push(err));
    await new Promise<void>((resolve) => raw.once('connect', () => resolve()));
    raw.pause();

    const frame = encodeFrame({ kind: 'data', payload: new Uint8Array(60000) });
    for (let i = 0; i < 399; i++) {
      raw.write(frame);
    }
    await new Promise<void>((resolve) => raw.write(frame, () => resolve()));
    await new Promise((resolve) => setTimeout(resolve, 200));

    let timer: ReturnType<typeof setTimeout> | undefined;
    const outcome = await Promise.race([
      server.stop().then(() => 'stopped'),
      new Promise<string>((resolve) => {
        timer = setTimeout(() => resolve('hung'), 4000);
      }),
    ]);
    clearTimeout(timer);

    expect(outcome).toBe('stopped');
    expect(server.getStats().activeSessions).toBe(0);
    raw.destroy();
  });

  it('should refuse connections once stopped', async () => {
    const { server, port } = await startServer();
    await server.stop();

    await expect(
      connectStream({ host: '127.0.0.1', port, logLevel: 'silent' })
    ).rejects.toBeInstanceOf(ConnectRefusedError);
  });

  it('should fail to start on a port already in use', async () => {
    const { port } = await startServer();
    const clash = new StreamEchoServer({ host: '127.0.0.1', port, logLevel: 'silent' });

    await expect(clash.start()).rejects.toBeInstanceOf(EchoError);
  });
});
