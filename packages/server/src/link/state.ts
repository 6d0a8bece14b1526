// ============================================================================
// Telemetry Bridge: Link Connection State Machine
// ============================================================================
import { EventEmitter } from 'events';
import type { LinkState, LinkStatus } from '@telemetry-bridge/shared';

const TRANSITIONS: Record<LinkStatus, readonly LinkStatus[]> = {
  disconnected: ['connecting'],
  connecting: ['connected', 'degraded', 'disconnected'],
  connected: ['degraded', 'disconnected'],
  degraded: ['connecting', 'disconnected'],
};

export class LinkTransitionError extends Error {
  constructor(readonly from: LinkStatus, readonly to: LinkStatus) {
    super(`Illegal link transition ${from} -> ${to}`);
    this.name = 'LinkTransitionError';
  }
}

/**
 * Tracks the link through disconnected / connecting / connected / degraded.
 * Emits `change` with (next, previous) on every transition.
 */
export class LinkStateMachine extends EventEmitter {
  private current: LinkState;

  constructor(private readonly clock: () => number = Date.now) {
    super();
    this.current = { status: 'disconnected', since: clock() };
  }

  get state(): LinkState { return this.current; }
  get status(): LinkStatus { return this.current.status; }

  connecting(attempt: number) {
    this.transition({ status: 'connecting', since: this.clock(), attempt });
  }

  connected() {
    this.transition({ status: 'connected', since: this.clock() });
  }

  degraded(reason: string, lastSeq: number | null, retryInMs: number) {
    this.transition({ status: 'degraded', since: this.clock(), reason, lastSeq, retryInMs });
  }

  disconnected() {
    this.transition({ status: 'disconnected', since: this.clock() });
  }

  private transition(next: LinkState) {
    const prev = this.current;
    if (!TRANSITIONS[prev.status].includes(next.status)) {
      throw new LinkTransitionError(prev.status, next.status);
    }
    this.current = next;
    this.emit('change', next, prev);
  }
}

export interface BackoffOptions {
  baseMs: number;
  maxMs: number;
  jitterMs: number;
}

/** Exponential reconnect delay with jitter, capped at `maxMs`. */
export class Backoff {
  private attempt = 0;

  constructor(private readonly options: BackoffOptions, private readonly random: () => number = Math.random) {}

  get attempts() { return this.attempt; }

  next(): number {
    const { baseMs, maxMs, jitterMs } = this.options;
    const exp = Math.min(baseMs * 2 ** this.attempt, maxMs);
    this.attempt++;
    return Math.min(exp + Math.floor(this.random() * jitterMs), maxMs);
  }

  reset() {
    this.attempt = 0;
  }
}
