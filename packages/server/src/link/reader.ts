// ============================================================================
// Telemetry Bridge: Link Reader
// ============================================================================
import { EventEmitter } from 'events';
import type { LinkReport, LinkState, LinkStats, TelemetrySnapshot, TelemetryUpdate } from '@telemetry-bridge/shared';
import type { LinkTransport } from './transport.js';
import type { AltitudeReference } from './fields.js';
import type { BackoffOptions } from './state.js';
import { MavlinkParser } from './mavlink.js';
import { decodeMessage, lookupMessage } from './messages.js';
import { extractFields } from './fields.js';
import { LinkStateMachine, Backoff } from './state.js';
import { TelemetryStore } from '../telemetry/store.js';
import { BroadcastHub } from '../telemetry/hub.js';
import { mergeSnapshot, isEmptyUpdate } from '../telemetry/snapshot.js';

export interface LinkReaderOptions {
  transport: LinkTransport;
  store: TelemetryStore;
  hub: BroadcastHub;
  altitude: AltitudeReference;
  linkTimeoutMs: number;
  backoff: BackoffOptions;
  clock?: () => number;
  random?: () => number;
}

/**
 * Owns the connection to the flight controller. Every accepted message is
 * merged into a new snapshot, stored, and handed to the hub. Connection loss
 * moves the link to degraded and schedules a reconnect; the last snapshot
 * stays in the store untouched.
 *
 * Emits `snapshot` for every produced snapshot.
 */
export class LinkReader extends EventEmitter {
  readonly link: LinkStateMachine;
  private readonly transport: LinkTransport;
  private readonly store: TelemetryStore;
  private readonly hub: BroadcastHub;
  private readonly clock: () => number;
  private readonly parser = new MavlinkParser(lookupMessage);
  private readonly backoff: Backoff;
  private retryTimer: ReturnType<typeof setTimeout> | null = null;
  private watchdog: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private closeReason: string | null = null;
  private accepted = 0;
  private produced = 0;

  constructor(private readonly options: LinkReaderOptions) {
    super();
    this.transport = options.transport;
    this.store = options.store;
    this.hub = options.hub;
    this.clock = options.clock ?? Date.now;
    this.link = new LinkStateMachine(this.clock);
    this.backoff = new Backoff(options.backoff, options.random);

    this.link.on('change', (next: LinkState, prev: LinkState) => {
      console.log(`🛰️ Link ${this.transport.description}: ${prev.status} → ${next.status}${next.status === 'degraded' ? ` (${next.reason}, retry in ${next.retryInMs}ms)` : ''}`);
    });

    this.transport.on('open', () => this.handleOpen());
    this.transport.on('data', (chunk: Buffer) => this.handleData(chunk));
    this.transport.on('close', (reason?: string) => this.handleClose(reason ?? 'connection closed'));
  }

  get isRunning() { return this.running; }

  start() {
    if (this.running) return;
    this.running = true;
    this.openTransport();
  }

  stop() {
    if (!this.running) return;
    this.running = false;
    if (this.retryTimer) { clearTimeout(this.retryTimer); this.retryTimer = null; }
    this.clearWatchdog();
    this.backoff.reset();
    this.transport.close();
    this.link.disconnected();
  }

  stats(): LinkStats {
    return {
      framesAccepted: this.accepted,
      framesDiscarded: this.parser.stats.crcErrors + this.parser.stats.unknownMessages,
      snapshotsProduced: this.produced,
      bytesDiscarded: this.parser.stats.bytesDiscarded,
    };
  }

  report(): LinkReport {
    return { endpoint: this.transport.description, state: this.link.state, stats: this.stats() };
  }

  private openTransport() {
    this.link.connecting(this.backoff.attempts + 1);
    this.parser.reset();
    this.closeReason = null;
    this.transport.open();
    // Covers connects that never complete as well as silent links.
    if (this.link.status === 'connecting') this.armWatchdog();
  }

  private handleOpen() {
    if (!this.running) return;
    this.armWatchdog();
  }

  private handleData(chunk: Buffer) {
    if (!this.running) return;

    for (const frame of this.parser.push(chunk)) {
      const msg = decodeMessage(frame);
      if (!msg) continue;
      this.accepted++;
      const update = extractFields(msg, { altitude: this.options.altitude });
      this.onAccepted();
      if (!isEmptyUpdate(update)) this.ingest(update);
    }
  }

  private onAccepted() {
    if (this.link.status === 'connecting') {
      this.link.connected();
      this.backoff.reset();
    }
    this.armWatchdog();
  }

  private ingest(update: TelemetryUpdate) {
    const snapshot: TelemetrySnapshot = mergeSnapshot(this.store.get(), update, this.store.sequence + 1, this.clock());
    this.store.replace(snapshot);
    this.produced++;
    this.hub.publish(snapshot);
    this.emit('snapshot', snapshot);
  }

  private handleClose(closed: string) {
    const reason = this.closeReason ?? closed;
    this.closeReason = null;
    this.clearWatchdog();
    if (!this.running) return;
    if (this.link.status !== 'connecting' && this.link.status !== 'connected') return;

    const delay = this.backoff.next();
    this.link.degraded(reason, this.store.get()?.seq ?? null, delay);
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      if (this.running) this.openTransport();
    }, delay);
  }

  private armWatchdog() {
    this.clearWatchdog();
    this.watchdog = setTimeout(() => {
      this.watchdog = null;
      this.closeReason = `no telemetry for ${this.options.linkTimeoutMs}ms`;
      console.warn(`🛰️ Link ${this.transport.description}: ${this.closeReason}`);
      this.transport.close();
    }, this.options.linkTimeoutMs);
  }

  private clearWatchdog() {
    if (this.watchdog) { clearTimeout(this.watchdog); this.watchdog = null; }
  }
}
