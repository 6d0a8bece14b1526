import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createServer } from 'http';
import type { Server } from 'http';
import { createApp } from '../api/app.js';
import { LinkReader } from '../link/reader.js';
import { encodeMessage } from '../link/messages.js';
import { TelemetryStore } from '../telemetry/store.js';
import { BroadcastHub } from '../telemetry/hub.js';
import { mergeSnapshot } from '../telemetry/snapshot.js';
import { FakeTransport, HEADER, listen } from './helpers.js';

describe('HTTP API', () => {
  let now: number;
  let store: TelemetryStore;
  let transport: FakeTransport;
  let reader: LinkReader;
  let server: Server;
  let base: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    now = 5000;
    const clock = () => now;
    store = new TelemetryStore(clock);
    const hub = new BroadcastHub(store, { maxQueue: 16, staleAfterMs: 3000, clock });
    transport = new FakeTransport();
    reader = new LinkReader({
      transport, store, hub,
      altitude: 'msl',
      linkTimeoutMs: 5000,
      // long enough that no reconnect happens during a test
      backoff: { baseMs: 60_000, maxMs: 60_000, jitterMs: 0 },
      clock,
    });
    server = createServer(createApp({ store, hub, reader, staleAfterMs: 3000, clock }));
    base = `http://127.0.0.1:${await listen(server)}`;
  });

  afterEach(async () => {
    reader.stop();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    vi.restoreAllMocks();
  });

  const connectAndFeed = () => {
    reader.start();
    transport.connect();
    transport.feed(encodeMessage('GLOBAL_POSITION_INT', { lat: 10_000_000, lon: 20_000_000 }, HEADER));
  };

  describe('GET /api/telemetry', () => {
    it('answers 503 before any telemetry has arrived', async () => {
      const res = await fetch(`${base}/api/telemetry`);
      expect(res.status).toBe(503);
      expect(res.headers.get('retry-after')).toBe('1');
      expect(await res.json()).toEqual({ error: 'unavailable', message: 'No telemetry received since startup' });
    });

    it('returns the latest snapshot with its age', async () => {
      store.replace(mergeSnapshot(null, { lat: 1, lon: 2, alt: 0 }, 1, 4000));

      const res = await fetch(`${base}/api/telemetry`);
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        lat: 1, lon: 2, alt: 0,
        roll: null, pitch: null, yaw: null,
        battery: null, voltage: null, current: null,
        fixType: null, satellites: null,
        armed: null, customMode: null,
        seq: 1,
        timestamp: 4000,
        ageMs: 1000,
        stale: false,
      });
    });

    it('flags a snapshot older than the stale threshold', async () => {
      store.replace(mergeSnapshot(null, { lat: 1 }, 1, 4000));
      now = 8000;

      const res = await fetch(`${base}/api/telemetry`);
      expect(await res.json()).toMatchObject({ lat: 1, ageMs: 4000, stale: true });
    });

    it('allows cross-origin reads', async () => {
      const res = await fetch(`${base}/api/telemetry`, { headers: { Origin: 'http://dashboard.test' } });
      expect(res.headers.get('access-control-allow-origin')).toBe('*');
    });
  });

  describe('GET /api/link', () => {
    it('reports the link state and counters', async () => {
      connectAndFeed();
      const res = await fetch(`${base}/api/link`);
      expect(await res.json()).toEqual({
        endpoint: 'fake://link',
        state: { status: 'connected', since: 5000 },
        stats: { framesAccepted: 1, framesDiscarded: 0, snapshotsProduced: 1, bytesDiscarded: 0 },
      });
    });
  });

  describe('GET /api/health', () => {
    it('is unhealthy while the link is down and nothing has arrived', async () => {
      const res = await fetch(`${base}/api/health`);
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        name: 'telemetry-bridge',
        status: 'unhealthy',
        components: [
          { name: 'link', status: 'down' },
          { name: 'snapshot', status: 'down', details: { seq: 0, ageMs: null } },
          { name: 'subscribers', status: 'up', details: { count: 0, published: 0 } },
        ],
      });
    });

    it('is healthy with a connected link and fresh data', async () => {
      connectAndFeed();
      const res = await fetch(`${base}/api/health`);
      expect(await res.json()).toMatchObject({
        status: 'healthy',
        components: [
          { name: 'link', status: 'up' },
          { name: 'snapshot', status: 'up', details: { seq: 1, ageMs: 0 } },
          { name: 'subscribers', status: 'up', details: { published: 1 } },
        ],
      });
    });

    it('is degraded after the link drops', async () => {
      connectAndFeed();
      transport.drop('connection reset');

      const res = await fetch(`${base}/api/health`);
      expect(await res.json()).toMatchObject({
        status: 'degraded',
        components: [
          { name: 'link', status: 'degraded', error: 'connection reset' },
          { name: 'snapshot', status: 'up' },
          { name: 'subscribers' },
        ],
      });
    });
  });

  it('answers 404 for unknown routes', async () => {
    const res = await fetch(`${base}/api/nothing`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'not found' });
  });
});
