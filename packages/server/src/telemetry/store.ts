import type { TelemetrySnapshot } from '@telemetry-bridge/shared';

/**
 * Holds the single latest telemetry snapshot. Replacement is a reference
 * swap of a frozen object, so a reader sees either the old or the new
 * snapshot, never a mix.
 */
export class TelemetryStore {
  private current: TelemetrySnapshot | null = null;

  constructor(private readonly clock: () => number = Date.now) {}

  get(): TelemetrySnapshot | null {
    return this.current;
  }

  replace(snapshot: TelemetrySnapshot): void {
    if (this.current && snapshot.seq <= this.current.seq) {
      throw new Error(`Snapshot seq ${snapshot.seq} is not newer than stored seq ${this.current.seq}`);
    }
    this.current = Object.isFrozen(snapshot) ? snapshot : Object.freeze({ ...snapshot });
  }

  /** Milliseconds since the stored snapshot was captured, or null before the first one. */
  ageMs(): number | null {
    if (!this.current) return null;
    return Math.max(0, this.clock() - this.current.timestamp);
  }

  get sequence(): number {
    return this.current?.seq ?? 0;
  }
}
