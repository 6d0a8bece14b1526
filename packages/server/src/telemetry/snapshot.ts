import type { TelemetryFields, TelemetrySnapshot, TelemetryUpdate, TelemetryPayload } from '@telemetry-bridge/shared';

const UNKNOWN: TelemetryFields = {
  lat: null, lon: null, alt: null,
  roll: null, pitch: null, yaw: null,
  battery: null, voltage: null, current: null,
  fixType: null, satellites: null,
  armed: null, customMode: null,
};

/**
 * Merge a partial update into the previous snapshot. Fields the update does
 * not carry keep their previous value; the result is a new frozen object.
 */
export function mergeSnapshot(
  prev: TelemetrySnapshot | null,
  update: TelemetryUpdate,
  seq: number,
  timestamp: number,
): TelemetrySnapshot {
  const base: TelemetryFields = prev ?? UNKNOWN;
  return Object.freeze({
    lat: update.lat ?? base.lat,
    lon: update.lon ?? base.lon,
    alt: update.alt ?? base.alt,
    roll: update.roll ?? base.roll,
    pitch: update.pitch ?? base.pitch,
    yaw: update.yaw ?? base.yaw,
    battery: update.battery ?? base.battery,
    voltage: update.voltage ?? base.voltage,
    current: update.current ?? base.current,
    fixType: update.fixType ?? base.fixType,
    satellites: update.satellites ?? base.satellites,
    armed: update.armed ?? base.armed,
    customMode: update.customMode ?? base.customMode,
    seq,
    timestamp,
  });
}

export function isEmptyUpdate(update: TelemetryUpdate): boolean {
  return Object.values(update).every(v => v === undefined);
}

export function toPayload(snapshot: TelemetrySnapshot, now: number, staleAfterMs: number): TelemetryPayload {
  const ageMs = Math.max(0, now - snapshot.timestamp);
  return { ...snapshot, ageMs, stale: ageMs > staleAfterMs };
}
