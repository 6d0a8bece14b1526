import express from 'express';
import cors from 'cors';
import type { ComponentHealth, HealthStatus, UnavailableResponse } from '@telemetry-bridge/shared';
import { TelemetryStore } from '../telemetry/store.js';
import { BroadcastHub } from '../telemetry/hub.js';
import { toPayload } from '../telemetry/snapshot.js';
import { LinkReader } from '../link/reader.js';

export const SERVICE_NAME = 'telemetry-bridge';
export const SERVICE_VERSION = '1.0.0';

export interface ApiDeps {
  store: TelemetryStore;
  hub: BroadcastHub;
  reader: LinkReader;
  staleAfterMs: number;
  clock?: () => number;
}

export function createApp({ store, hub, reader, staleAfterMs, clock = Date.now }: ApiDeps): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json());

  // --- Snapshot ---
  app.get('/api/telemetry', (_req, res) => {
    const snapshot = store.get();
    if (!snapshot) {
      const body: UnavailableResponse = { error: 'unavailable', message: 'No telemetry received since startup' };
      return res.status(503).set('Retry-After', '1').json(body);
    }
    res.json(toPayload(snapshot, clock(), staleAfterMs));
  });

  // --- Link ---
  app.get('/api/link', (_req, res) => {
    res.json(reader.report());
  });

  // --- Health ---
  app.get('/api/health', (_req, res) => {
    const now = clock();
    const link = reader.link.state;
    const ageMs = store.ageMs();
    const fresh = ageMs !== null && ageMs <= staleAfterMs;

    const components: ComponentHealth[] = [
      {
        name: 'link',
        status: link.status === 'connected' ? 'up' : link.status === 'disconnected' ? 'down' : 'degraded',
        lastCheck: now,
        details: { ...link },
        error: link.status === 'degraded' ? link.reason : undefined,
      },
      {
        name: 'snapshot',
        status: fresh ? 'up' : ageMs === null ? 'down' : 'degraded',
        lastCheck: now,
        details: { seq: store.sequence, ageMs },
      },
      {
        name: 'subscribers',
        status: 'up',
        lastCheck: now,
        details: { count: hub.size, published: hub.publishedCount },
      },
    ];

    const health: HealthStatus = {
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
      status: link.status === 'disconnected' ? 'unhealthy' : link.status === 'connected' && fresh ? 'healthy' : 'degraded',
      uptime: process.uptime(),
      timestamp: now,
      components,
    };
    res.json(health);
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'not found' });
  });

  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    console.error('⚠️ Request failed:', err);
    res.status(500).json({ error: String(err) });
  });

  return app;
}
