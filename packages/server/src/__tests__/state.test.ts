import { describe, it, expect, vi } from 'vitest';
import { Backoff, LinkStateMachine, LinkTransitionError } from '../link/state.js';

describe('LinkStateMachine', () => {
  it('starts disconnected', () => {
    expect(new LinkStateMachine(() => 5).state).toEqual({ status: 'disconnected', since: 5 });
  });

  it('walks through a connect, loss and reconnect', () => {
    let now = 0;
    const link = new LinkStateMachine(() => now);
    const seen: string[] = [];
    link.on('change', (next: { status: string }, prev: { status: string }) => seen.push(`${prev.status}>${next.status}`));

    link.connecting(1);
    now = 100;
    link.connected();
    now = 200;
    link.degraded('connection reset', 42, 500);

    expect(link.state).toEqual({ status: 'degraded', since: 200, reason: 'connection reset', lastSeq: 42, retryInMs: 500 });

    link.connecting(2);
    link.disconnected();
    expect(seen).toEqual([
      'disconnected>connecting',
      'connecting>connected',
      'connected>degraded',
      'degraded>connecting',
      'connecting>disconnected',
    ]);
  });

  it('rejects illegal transitions and stays put', () => {
    const link = new LinkStateMachine();
    expect(() => link.connected()).toThrow(LinkTransitionError);
    expect(() => link.connected()).toThrow('Illegal link transition disconnected -> connected');
    expect(link.status).toBe('disconnected');

    link.connecting(1);
    link.connected();
    expect(() => link.connecting(2)).toThrow(LinkTransitionError);
  });

  it('does not emit for a rejected transition', () => {
    const link = new LinkStateMachine();
    const listener = vi.fn();
    link.on('change', listener);
    expect(() => link.degraded('x', null, 0)).toThrow();
    expect(listener).not.toHaveBeenCalled();
  });
});

describe('Backoff', () => {
  const options = { baseMs: 100, maxMs: 1000, jitterMs: 50 };

  it('doubles from the base and stops at the cap', () => {
    const backoff = new Backoff(options, () => 0);
    expect([1, 2, 3, 4, 5, 6].map(() => backoff.next())).toEqual([100, 200, 400, 800, 1000, 1000]);
    expect(backoff.attempts).toBe(6);
  });

  it('adds jitter without exceeding the cap', () => {
    const backoff = new Backoff(options, () => 0.5);
    expect(backoff.next()).toBe(125);
    for (let i = 0; i < 10; i++) expect(backoff.next()).toBeLessThanOrEqual(1000);
  });

  it('starts over after reset', () => {
    const backoff = new Backoff(options, () => 0);
    backoff.next();
    backoff.next();
    backoff.reset();
    expect(backoff.attempts).toBe(0);
    expect(backoff.next()).toBe(100);
  });
});
