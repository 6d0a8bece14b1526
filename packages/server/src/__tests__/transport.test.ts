import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { once } from 'events';
import dgram from 'dgram';
import { createServer } from 'net';
import type { Server as NetServer } from 'net';
import type { LinkState } from '@telemetry-bridge/shared';
import { TcpTransport, UdpTransport } from '../link/transport.js';
import type { LinkTransport } from '../link/transport.js';
import { LinkReader } from '../link/reader.js';
import { encodeMessage } from '../link/messages.js';
import { TelemetryStore } from '../telemetry/store.js';
import { BroadcastHub } from '../telemetry/hub.js';
import { HEADER, waitFor } from './helpers.js';

const HOST = '127.0.0.1';

const position = (lat: number) => encodeMessage('GLOBAL_POSITION_INT', { lat: lat * 1e7, lon: 0 }, HEADER);

async function freeUdpPort(): Promise<number> {
  const probe = dgram.createSocket('udp4');
  probe.bind(0, HOST);
  await once(probe, 'listening');
  const { port } = probe.address();
  await new Promise<void>((resolve) => probe.close(() => resolve()));
  return port;
}

async function freeTcpPort(): Promise<number> {
  const probe = createServer();
  probe.listen(0, HOST);
  await once(probe, 'listening');
  const addr = probe.address();
  if (addr === null || typeof addr === 'string') throw new Error('server is not bound to a TCP port');
  await new Promise<void>((resolve) => probe.close(() => resolve()));
  return addr.port;
}

function readerFor(transport: LinkTransport, linkTimeoutMs: number, baseMs: number) {
  const store = new TelemetryStore();
  const hub = new BroadcastHub(store, { maxQueue: 16, staleAfterMs: 3000 });
  const reader = new LinkReader({
    transport, store, hub,
    altitude: 'msl',
    linkTimeoutMs,
    backoff: { baseMs, maxMs: baseMs, jitterMs: 0 },
  });
  const states: LinkState[] = [];
  reader.link.on('change', (next: LinkState) => states.push(next));
  return { store, reader, states };
}

describe('link transports', () => {
  const cleanup: (() => Promise<void> | void)[] = [];

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    for (const fn of cleanup.splice(0)) await fn();
    vi.restoreAllMocks();
  });

  describe('UdpTransport', () => {
    it('delivers datagrams to the store', async () => {
      const port = await freeUdpPort();
      const transport = new UdpTransport(HOST, port);
      const { store, reader } = readerFor(transport, 5000, 100);
      const sender = dgram.createSocket('udp4');
      cleanup.push(() => reader.stop(), () => { sender.close(); });

      const opened = once(transport, 'open');
      reader.start();
      await opened;

      sender.send(position(1), port, HOST);
      await waitFor(() => store.get() !== null);

      expect(store.get()).toMatchObject({ seq: 1, lat: 1, lon: 0 });
      expect(reader.link.status).toBe('connected');
    });

    it('rebinds after the link goes quiet and accepts new data', async () => {
      const port = await freeUdpPort();
      const transport = new UdpTransport(HOST, port);
      const { store, reader, states } = readerFor(transport, 150, 50);
      const sender = dgram.createSocket('udp4');
      cleanup.push(() => reader.stop(), () => { sender.close(); });

      let opens = 0;
      transport.on('open', () => opens++);
      reader.start();
      await waitFor(() => opens === 1);

      sender.send(position(1), port, HOST);
      await waitFor(() => store.sequence === 1);

      await waitFor(() => opens === 2);
      sender.send(position(2), port, HOST);
      await waitFor(() => store.sequence === 2);

      expect(states.slice(0, 5).map(s => s.status)).toEqual(['connecting', 'connected', 'degraded', 'connecting', 'connected']);
      expect(states[2]).toMatchObject({ reason: 'no telemetry for 150ms', lastSeq: 1 });
      expect(store.get()).toMatchObject({ seq: 2, lat: 2 });
    });

    it('reports close once when the port is already taken', async () => {
      const holder = dgram.createSocket('udp4');
      holder.bind(0, HOST);
      await once(holder, 'listening');
      cleanup.push(() => new Promise<void>((resolve) => holder.close(() => resolve())));

      const transport = new UdpTransport(HOST, holder.address().port);
      const opened = vi.fn();
      const closes: string[] = [];
      transport.on('open', opened);
      transport.on('close', (reason: string) => closes.push(reason));

      transport.open();
      await waitFor(() => closes.length === 1);
      await new Promise(resolve => setTimeout(resolve, 50));

      expect(closes).toHaveLength(1);
      expect(closes[0]).toMatch(/EADDRINUSE/);
      expect(opened).not.toHaveBeenCalled();
    });
  });

  describe('TcpTransport', () => {
    it('goes degraded on a refused connect and connects once the peer is up', async () => {
      const port = await freeTcpPort();
      const transport = new TcpTransport(HOST, port);
      const { store, reader, states } = readerFor(transport, 5000, 100);
      cleanup.push(() => reader.stop());

      reader.start();
      await waitFor(() => reader.link.status === 'degraded');
      const refused = states[1];
      expect(refused).toMatchObject({ status: 'degraded', lastSeq: null });
      expect(refused.status === 'degraded' ? refused.reason : '').toMatch(/ECONNREFUSED/);

      const server: NetServer = createServer((socket) => socket.write(position(3)));
      server.listen(port, HOST);
      await once(server, 'listening');
      cleanup.push(() => new Promise<void>((resolve) => server.close(() => resolve())));

      await waitFor(() => store.get() !== null);
      expect(store.get()).toMatchObject({ seq: 1, lat: 3 });
      expect(reader.link.status).toBe('connected');
    });

    it('reports close once when closed locally', async () => {
      const server: NetServer = createServer();
      server.listen(0, HOST);
      await once(server, 'listening');
      const addr = server.address();
      if (addr === null || typeof addr === 'string') throw new Error('server is not bound to a TCP port');
      cleanup.push(() => new Promise<void>((resolve) => server.close(() => resolve())));

      const transport = new TcpTransport(HOST, addr.port);
      const closes: string[] = [];
      transport.on('close', (reason: string) => closes.push(reason));

      const opened = once(transport, 'open');
      transport.open();
      await opened;
      transport.close();
      await waitFor(() => closes.length === 1);
      await new Promise(resolve => setTimeout(resolve, 50));

      expect(closes).toEqual(['connection closed']);
    });
  });
});
