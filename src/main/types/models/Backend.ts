export const BACKEND_NAMES = ['projects', 'activity', 'performance', 'labs'] as const;

export type BackendName = (typeof BACKEND_NAMES)[number];

export interface ProxyResponse {
  status: number;
  body: unknown;
}

export type BackendHealthStatus = 'healthy' | 'degraded' | 'unreachable';

export interface BackendHealth {
  status: BackendHealthStatus;
  url: string;
  latencyMs: number;
  detail?: string;
}

export interface AggregateHealthReport {
  gateway: 'healthy';
  timestamp: string;
  services: Record<BackendName, BackendHealth>;
}

export interface ServiceDescriptor {
  name: BackendName;
  url: string;
  status: BackendHealthStatus;
}
