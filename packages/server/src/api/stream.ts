import type { Server as HttpServer, IncomingMessage } from 'http';
import type { Server as HttpsServer } from 'https';
import { WebSocketServer, WebSocket } from 'ws';
import { BroadcastHub } from '../telemetry/hub.js';

export const STREAM_PATH = '/ws/telemetry';
const CLOSE_GRACE_MS = 2000;

export interface TelemetryStreamOptions {
  path?: string;
  pingIntervalMs: number;
}

export interface TelemetryStream {
  wss: WebSocketServer;
  close(): Promise<void>;
}

/**
 * Push endpoint. Each connection becomes a hub subscriber; whatever the
 * client sends is ignored. Connections that stop answering pings are
 * terminated, healthy ones are left alone.
 */
export function attachTelemetryStream(
  server: HttpServer | HttpsServer,
  hub: BroadcastHub,
  { path = STREAM_PATH, pingIntervalMs }: TelemetryStreamOptions,
): TelemetryStream {
  const wss = new WebSocketServer({ server, path });
  const alive = new WeakSet<WebSocket>();

  wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
    const label = req.socket.remoteAddress ?? 'unknown';
    console.log(`⚡ Client connected (${label})`);
    alive.add(ws);

    const sub = hub.subscribe({
      send: (data, cb) => ws.send(data, cb),
      close: (code, reason) => ws.close(code, reason),
    }, label);

    ws.on('pong', () => alive.add(ws));

    ws.on('close', () => {
      console.log(`⚡ Client disconnected (${label})`);
      hub.unsubscribe(sub);
    });

    ws.on('error', (err) => {
      console.error(`⚠️ WebSocket error (${label}): ${err.message}`);
    });
  });

  const pingTimer = setInterval(() => {
    for (const ws of wss.clients) {
      if (!alive.has(ws)) {
        ws.terminate();
        continue;
      }
      alive.delete(ws);
      ws.ping();
    }
  }, pingIntervalMs);

  wss.on('close', () => clearInterval(pingTimer));

  // The HTTP server's own listen errors are re-emitted here; the owner of the server reports them.
  wss.on('error', (err) => {
    console.error(`⚠️ WebSocket server error: ${err.message}`);
  });

  return {
    wss,
    close: () => new Promise<void>((resolve, reject) => {
      clearInterval(pingTimer);
      for (const ws of wss.clients) {
        if (ws.readyState === WebSocket.OPEN) ws.close(1001, 'server shutting down');
      }
      // Peers that never finish the closing handshake are cut off.
      const deadline = setTimeout(() => {
        for (const ws of wss.clients) ws.terminate();
      }, CLOSE_GRACE_MS);
      wss.close((err) => {
        clearTimeout(deadline);
        if (err) reject(err);
        else resolve();
      });
    }),
  };
}
