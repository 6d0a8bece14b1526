// ============================================================================
// Telemetry Bridge: Snapshot Types
// ============================================================================

/**
 * Latest known value of every telemetry field. `null` means the field has
 * never been reported (or the vehicle reported it as unknown); it is never
 * a stand-in for zero.
 */
export interface TelemetryFields {
  readonly lat: number | null;
  readonly lon: number | null;
  readonly alt: number | null;
  readonly roll: number | null;
  readonly pitch: number | null;
  readonly yaw: number | null;
  readonly battery: number | null;
  readonly voltage: number | null;
  readonly current: number | null;
  readonly fixType: number | null;
  readonly satellites: number | null;
  readonly armed: boolean | null;
  readonly customMode: number | null;
}

export type TelemetryFieldKey = keyof TelemetryFields;

/** Partial update decoded from one source message. Only carried fields are set. */
export type TelemetryUpdate = {
  [K in TelemetryFieldKey]?: NonNullable<TelemetryFields[K]>;
};

export interface TelemetrySnapshot extends TelemetryFields {
  readonly seq: number;
  readonly timestamp: number;   // capture time, epoch ms
}

/** JSON body of `GET /api/telemetry` and of every push-stream message. */
export interface TelemetryPayload extends TelemetrySnapshot {
  ageMs: number;
  stale: boolean;
}

export interface UnavailableResponse {
  error: 'unavailable';
  message: string;
}
