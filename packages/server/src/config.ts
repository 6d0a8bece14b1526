import { z } from 'zod';
import type { LinkEndpoint } from './link/transport.js';
import { parseLinkUrl } from './link/transport.js';

const int = (min: number, max = Number.MAX_SAFE_INTEGER) => z.coerce.number().int().min(min).max(max);

const EnvSchema = z.object({
  PORT: int(0, 65535).default(8000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LINK_URL: z.string().default('udp:127.0.0.1:14557'),
  ALTITUDE_REFERENCE: z.enum(['msl', 'relative']).default('msl'),
  RECONNECT_BASE_MS: int(1).default(500),
  RECONNECT_MAX_MS: int(1).default(10_000),
  RECONNECT_JITTER_MS: int(0).default(250),
  LINK_TIMEOUT_MS: int(100).default(5_000),
  SUBSCRIBER_QUEUE_LIMIT: int(1).default(64),
  STALE_AFTER_MS: int(0).default(3_000),
  WS_PING_INTERVAL_MS: int(1_000).default(30_000),
  DEMO_RATE_HZ: z.coerce.number().positive().max(100).default(5),
  TLS_CERT: z.string().min(1).optional(),
  TLS_KEY: z.string().min(1).optional(),
});

export interface BridgeConfig {
  port: number;
  host: string;
  link: LinkEndpoint;
  altitude: 'msl' | 'relative';
  backoff: { baseMs: number; maxMs: number; jitterMs: number };
  linkTimeoutMs: number;
  subscriberQueueLimit: number;
  staleAfterMs: number;
  pingIntervalMs: number;
  demoRateHz: number;
  tls?: { certPath: string; keyPath: string };
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

/** Read and validate the service configuration from environment variables. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;

  const issues: string[] = [];
  let link: LinkEndpoint = { kind: 'demo' };
  try {
    link = parseLinkUrl(e.LINK_URL);
  } catch (err) {
    issues.push(`LINK_URL: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (e.RECONNECT_MAX_MS < e.RECONNECT_BASE_MS) {
    issues.push('RECONNECT_MAX_MS: must not be smaller than RECONNECT_BASE_MS');
  }
  if ((e.TLS_CERT === undefined) !== (e.TLS_KEY === undefined)) {
    issues.push('TLS_CERT / TLS_KEY: set both or neither');
  }
  if (issues.length > 0) throw new ConfigError(issues);

  return {
    port: e.PORT,
    host: e.HOST,
    link,
    altitude: e.ALTITUDE_REFERENCE,
    backoff: { baseMs: e.RECONNECT_BASE_MS, maxMs: e.RECONNECT_MAX_MS, jitterMs: e.RECONNECT_JITTER_MS },
    linkTimeoutMs: e.LINK_TIMEOUT_MS,
    subscriberQueueLimit: e.SUBSCRIBER_QUEUE_LIMIT,
    staleAfterMs: e.STALE_AFTER_MS,
    pingIntervalMs: e.WS_PING_INTERVAL_MS,
    demoRateHz: e.DEMO_RATE_HZ,
    tls: e.TLS_CERT && e.TLS_KEY ? { certPath: e.TLS_CERT, keyPath: e.TLS_KEY } : undefined,
  };
}
