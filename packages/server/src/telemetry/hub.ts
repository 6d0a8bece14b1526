// ============================================================================
// Telemetry Bridge: Broadcast Hub
// ============================================================================
import { EventEmitter } from 'events';
import type { TelemetrySnapshot } from '@telemetry-bridge/shared';
import { TelemetryStore } from './store.js';
import { toPayload } from './snapshot.js';

/** Outbound side of one push connection. `send` must call back once the write completes or fails. */
export interface SubscriberSink {
  send(data: string, cb: (err?: Error) => void): void;
  close(code: number, reason: string): void;
}

export interface BroadcastHubOptions {
  maxQueue: number;
  staleAfterMs: number;
  clock?: () => number;
}

export const CLOSE_GOING_AWAY = 1001;
export const CLOSE_SEND_FAILED = 1011;
export const CLOSE_SLOW_CONSUMER = 4008;

export type DropReason = 'slow_consumer' | 'send_failed' | 'unsubscribed' | 'shutdown';

export class Subscriber {
  readonly connectedAt: number;
  private queue: string[] = [];
  private sending = false;
  private alive = true;
  private sent = 0;

  constructor(
    readonly id: string,
    readonly label: string,
    private readonly sink: SubscriberSink,
    private readonly onSendFailure: (sub: Subscriber, err: Error) => void,
    now: number,
  ) {
    this.connectedAt = now;
  }

  get isAlive() { return this.alive; }
  get pending() { return this.queue.length; }
  get delivered() { return this.sent; }

  /** Returns false when the queue is already full; the caller decides what to do. */
  enqueue(payload: string, maxQueue: number): boolean {
    if (!this.alive) return true;
    if (this.queue.length >= maxQueue) return false;
    this.queue.push(payload);
    this.flush();
    return true;
  }

  close(code: number, reason: string) {
    if (!this.alive) return;
    this.alive = false;
    this.queue = [];
    try {
      this.sink.close(code, reason);
    } catch (err) {
      console.error(`⚠️ Subscriber ${this.id} close failed:`, err instanceof Error ? err.message : err);
    }
  }

  /** Stop delivering without touching the sink (the peer already went away). */
  release() {
    this.alive = false;
    this.queue = [];
  }

  private flush() {
    if (this.sending || !this.alive) return;
    const next = this.queue.shift();
    if (next === undefined) return;
    this.sending = true;
    try {
      this.sink.send(next, (err) => {
        this.sending = false;
        if (err) {
          this.onSendFailure(this, err);
          return;
        }
        this.sent++;
        this.flush();
      });
    } catch (err) {
      this.sending = false;
      this.onSendFailure(this, err instanceof Error ? err : new Error(String(err)));
    }
  }
}

/**
 * Fans each published snapshot out to every push subscriber. `publish` only
 * enqueues; every subscriber drains its own bounded queue with one write in
 * flight, so a stalled client never holds up ingestion or its peers. A
 * subscriber whose queue overflows is disconnected.
 */
export class BroadcastHub extends EventEmitter {
  private subscribers = new Map<string, Subscriber>();
  private readonly clock: () => number;
  private published = 0;
  private nextId = 0;

  constructor(private readonly store: TelemetryStore, private readonly options: BroadcastHubOptions) {
    super();
    this.clock = options.clock ?? Date.now;
  }

  get size() { return this.subscribers.size; }
  get publishedCount() { return this.published; }

  subscribe(sink: SubscriberSink, label = 'client'): Subscriber {
    const id = `sub-${++this.nextId}`;
    const sub = new Subscriber(id, label, sink, (s, err) => this.handleSendFailure(s, err), this.clock());
    this.subscribers.set(id, sub);

    const current = this.store.get();
    if (current) {
      sub.enqueue(this.serialize(current), this.options.maxQueue);
    }

    this.emit('subscribed', sub);
    return sub;
  }

  publish(snapshot: TelemetrySnapshot) {
    this.published++;
    const payload = this.serialize(snapshot);
    // Iterate over a copy: drops during the loop must not disturb it.
    for (const sub of Array.from(this.subscribers.values())) {
      if (!sub.isAlive) continue;
      if (!sub.enqueue(payload, this.options.maxQueue)) {
        this.drop(sub, 'slow_consumer', CLOSE_SLOW_CONSUMER, 'slow consumer');
      }
    }
  }

  /** Remove a subscriber whose connection is already gone. */
  unsubscribe(sub: Subscriber) {
    if (!this.subscribers.delete(sub.id)) return;
    sub.release();
    this.emit('dropped', sub, 'unsubscribed' satisfies DropReason);
  }

  close() {
    for (const sub of Array.from(this.subscribers.values())) {
      this.drop(sub, 'shutdown', CLOSE_GOING_AWAY, 'server shutting down');
    }
  }

  getSubscribers(): Subscriber[] {
    return Array.from(this.subscribers.values());
  }

  private handleSendFailure(sub: Subscriber, err: Error) {
    console.error(`⚠️ Delivery to ${sub.label} (${sub.id}) failed: ${err.message}`);
    this.drop(sub, 'send_failed', CLOSE_SEND_FAILED, 'send failed');
  }

  private drop(sub: Subscriber, reason: DropReason, code: number, message: string) {
    if (!this.subscribers.delete(sub.id)) return;
    if (reason === 'slow_consumer') {
      console.warn(`🐢 Dropping slow subscriber ${sub.label} (${sub.id}) with ${sub.pending} queued`);
    }
    sub.close(code, message);
    this.emit('dropped', sub, reason);
  }

  private serialize(snapshot: TelemetrySnapshot): string {
    return JSON.stringify(toPayload(snapshot, this.clock(), this.options.staleAfterMs));
  }
}
