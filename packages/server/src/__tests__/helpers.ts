import { EventEmitter, once } from 'events';
import type { Server } from 'http';
import type { TelemetryPayload } from '@telemetry-bridge/shared';
import type { LinkTransport } from '../link/transport.js';
import type { SubscriberSink } from '../telemetry/hub.js';
import type { FrameHeader } from '../link/mavlink.js';

export const HEADER: FrameHeader = { sequence: 0, systemId: 1, componentId: 1 };

/** Transport driven by the test: nothing happens until the test says so. */
export class FakeTransport extends EventEmitter implements LinkTransport {
  readonly description = 'fake://link';
  opens = 0;
  closes = 0;

  open() { this.opens++; }

  close() {
    this.closes++;
    this.emit('close', 'closed by reader');
  }

  connect() { this.emit('open'); }
  feed(data: Buffer) { this.emit('data', data); }
  drop(reason = 'connection reset') { this.emit('close', reason); }
}

type SinkMode = 'auto' | 'manual' | 'fail';

/**
 * Subscriber sink. `auto` completes every write immediately, `manual` holds
 * write callbacks until `complete()`, `fail` reports every write as failed.
 */
export class FakeSink implements SubscriberSink {
  received: string[] = [];
  closed: { code: number; reason: string } | null = null;
  onSend: (() => void) | null = null;
  private pending: ((err?: Error) => void)[] = [];

  constructor(private readonly mode: SinkMode = 'auto') {}

  send(data: string, cb: (err?: Error) => void) {
    this.received.push(data);
    this.onSend?.();
    if (this.mode === 'auto') cb();
    else if (this.mode === 'fail') cb(new Error('EPIPE'));
    else this.pending.push(cb);
  }

  close(code: number, reason: string) {
    this.closed = { code, reason };
  }

  complete() {
    const cb = this.pending.shift();
    cb?.();
  }

  get payloads(): TelemetryPayload[] {
    return this.received.map(d => JSON.parse(d));
  }

  get seqs(): number[] {
    return this.payloads.map(p => p.seq);
  }
}

export async function listen(server: Server): Promise<number> {
  server.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const addr = server.address();
  if (addr === null || typeof addr === 'string') throw new Error('server is not bound to a TCP port');
  return addr.port;
}

export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error(`condition not met within ${timeoutMs}ms`);
    await new Promise(resolve => setTimeout(resolve, 10));
  }
}
