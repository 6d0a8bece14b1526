export type {
  TelemetryFields,
  TelemetryFieldKey,
  TelemetryUpdate,
  TelemetrySnapshot,
  TelemetryPayload,
  UnavailableResponse,
} from './telemetry.js';
export type { LinkStatus, LinkState, LinkStats, LinkReport } from './link.js';
export type { HealthStatus, ComponentHealth } from './resilience.js';
