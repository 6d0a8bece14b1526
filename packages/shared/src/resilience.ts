// Health reporting types

export interface HealthStatus {
  name: string;
  status: 'healthy' | 'degraded' | 'unhealthy';
  version: string;
  uptime: number;
  timestamp: number;
  components: ComponentHealth[];
}

export interface ComponentHealth {
  name: string;
  status: 'up' | 'down' | 'degraded';
  lastCheck: number;
  details?: Record<string, unknown>;
  error?: string;
}
