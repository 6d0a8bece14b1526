// ============================================================================
// Telemetry Bridge: Service Composition
// ============================================================================
import { createServer as createHttpServer } from 'http';
import type { Server as HttpServer } from 'http';
import { createServer as createHttpsServer } from 'https';
import type { Server as HttpsServer } from 'https';
import { readFileSync } from 'fs';
import type { AddressInfo, Server as NetServer } from 'net';
import type { Express } from 'express';
import type { BridgeConfig } from './config.js';
import type { LinkEndpoint, LinkTransport } from './link/transport.js';
import { TcpTransport, UdpTransport } from './link/transport.js';
import { DemoTransport } from './link/demo.js';
import { LinkReader } from './link/reader.js';
import { TelemetryStore } from './telemetry/store.js';
import { BroadcastHub } from './telemetry/hub.js';
import { createApp } from './api/app.js';
import { attachTelemetryStream } from './api/stream.js';
import type { TelemetryStream } from './api/stream.js';

export function createTransport(endpoint: LinkEndpoint, demoRateHz: number): LinkTransport {
  switch (endpoint.kind) {
    case 'udp': return new UdpTransport(endpoint.host, endpoint.port);
    case 'tcp': return new TcpTransport(endpoint.host, endpoint.port);
    case 'demo': return new DemoTransport({ rateHz: demoRateHz });
  }
}

/**
 * The running service: one store, one hub, one link reader, and the HTTP /
 * WebSocket surface in front of them.
 */
export class TelemetryBridge {
  readonly store: TelemetryStore;
  readonly hub: BroadcastHub;
  readonly reader: LinkReader;
  readonly app: Express;
  readonly server: HttpServer | HttpsServer;
  readonly stream: TelemetryStream;

  constructor(private readonly config: BridgeConfig, transport?: LinkTransport) {
    this.store = new TelemetryStore();
    this.hub = new BroadcastHub(this.store, {
      maxQueue: config.subscriberQueueLimit,
      staleAfterMs: config.staleAfterMs,
    });
    this.reader = new LinkReader({
      transport: transport ?? createTransport(config.link, config.demoRateHz),
      store: this.store,
      hub: this.hub,
      altitude: config.altitude,
      linkTimeoutMs: config.linkTimeoutMs,
      backoff: config.backoff,
    });
    this.app = createApp({ store: this.store, hub: this.hub, reader: this.reader, staleAfterMs: config.staleAfterMs });

    // TLS files are read here so a bad path fails startup, not the first request.
    this.server = config.tls
      ? createHttpsServer({ cert: readFileSync(config.tls.certPath), key: readFileSync(config.tls.keyPath) }, this.app)
      : createHttpServer(this.app);
    this.stream = attachTelemetryStream(this.server, this.hub, { pingIntervalMs: config.pingIntervalMs });
  }

  get secure() { return this.config.tls !== undefined; }

  /** Bind the listening socket, then start the link. Rejects if the socket cannot be bound. */
  async start(): Promise<AddressInfo> {
    const listener: NetServer = this.server;
    const address = await new Promise<AddressInfo>((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      listener.once('error', onError);
      listener.listen(this.config.port, this.config.host, () => {
        listener.off('error', onError);
        const addr = listener.address();
        if (addr === null || typeof addr === 'string') {
          reject(new Error(`Unexpected listen address: ${String(addr)}`));
          return;
        }
        resolve(addr);
      });
    });
    this.reader.start();
    return address;
  }

  async stop(): Promise<void> {
    this.reader.stop();
    this.hub.close();
    await this.stream.close();
    const listener: NetServer = this.server;
    await new Promise<void>((resolve, reject) => {
      listener.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
