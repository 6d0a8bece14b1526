// ============================================================================
// Telemetry Bridge: Link Connection Types
// ============================================================================

export type LinkStatus = 'disconnected' | 'connecting' | 'connected' | 'degraded';

export type LinkState =
  | { status: 'disconnected'; since: number }
  | { status: 'connecting'; since: number; attempt: number }
  | { status: 'connected'; since: number }
  | { status: 'degraded'; since: number; reason: string; lastSeq: number | null; retryInMs: number };

export interface LinkStats {
  framesAccepted: number;
  framesDiscarded: number;
  snapshotsProduced: number;
  bytesDiscarded: number;
}

export interface LinkReport {
  endpoint: string;
  state: LinkState;
  stats: LinkStats;
}
