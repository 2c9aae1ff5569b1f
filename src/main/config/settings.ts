import dotenv from 'dotenv';
import { z } from 'zod';
import type { BackendName } from '../types/models/Backend';
import type { CollaborationScope } from '../types/models/Collaboration';

dotenv.config();

const millis = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const settingsSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().positive().default(9000),
  BASE_URL_PATH: z.string().startsWith('/').default('/api/v1'),
  JWT_SECRET: z.string().min(1, 'JWT_SECRET must be set'),
  SERVICE_SECRET: z.string().min(1, 'SERVICE_SECRET must be set'),
  SERVICE_NAME: z.string().default('gateway'),
  PROJECTS_SERVICE_URL: z.string().url().default('http://localhost:8000'),
  ACTIVITY_SERVICE_URL: z.string().url().default('http://localhost:8001'),
  PERFORMANCE_SERVICE_URL: z.string().url().default('http://localhost:8003'),
  LABS_SERVICE_URL: z.string().url().default('http://localhost:8004'),
  PROXY_TIMEOUT_MS: millis(3000),
  PROXY_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
  PROXY_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(100),
  HEALTH_TIMEOUT_MS: millis(2000),
  DASHBOARD_DEADLINE_MS: millis(5000),
  COLLABORATION_SCOPE: z.enum(['organization', 'global']).default('organization'),
  COLLABORATION_MAILBOX: z.string().email().default('collaborations@example.org'),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),
  DATABASE_TECHNOLOGY: z.string().default('mongoDB'),
  MONGO_URI: z.string().default('mongodb://localhost:27017/lab-suite'),
  ALLOWED_ORIGINS: z.string().default(''),
});

export interface ProxySettings {
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
}

export interface GatewaySettings {
  environment: string;
  port: number;
  baseUrlPath: string;
  jwtSecret: string;
  serviceSecret: string;
  serviceName: string;
  backends: Readonly<Record<BackendName, string>>;
  proxy: Readonly<ProxySettings>;
  healthTimeoutMs: number;
  dashboardDeadlineMs: number;
  collaboration: Readonly<{ scope: CollaborationScope; mailbox: string }>;
  bcryptRounds: number;
  databaseTechnology: string;
  mongoUri: string;
  allowedOrigins: string[];
}

function stripTrailingSlash(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}

/**
 * Builds the process-wide configuration once. The returned object is frozen
 * and handed to every component by reference.
 */
export function loadSettings(env: Record<string, string | undefined> = process.env): Readonly<GatewaySettings> {
  const parsed = settingsSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid gateway configuration: ${details}`);
  }
  const values = parsed.data;

  const backendUrls: Record<BackendName, string> = {
    projects: stripTrailingSlash(values.PROJECTS_SERVICE_URL),
    activity: stripTrailingSlash(values.ACTIVITY_SERVICE_URL),
    performance: stripTrailingSlash(values.PERFORMANCE_SERVICE_URL),
    labs: stripTrailingSlash(values.LABS_SERVICE_URL),
  };

  return Object.freeze({
    environment: values.NODE_ENV,
    port: values.PORT,
    baseUrlPath: values.BASE_URL_PATH,
    jwtSecret: values.JWT_SECRET,
    serviceSecret: values.SERVICE_SECRET,
    serviceName: values.SERVICE_NAME,
    backends: Object.freeze(backendUrls),
    proxy: Object.freeze({
      timeoutMs: values.PROXY_TIMEOUT_MS,
      maxRetries: values.PROXY_MAX_RETRIES,
      retryDelayMs: values.PROXY_RETRY_DELAY_MS,
    }),
    healthTimeoutMs: values.HEALTH_TIMEOUT_MS,
    dashboardDeadlineMs: values.DASHBOARD_DEADLINE_MS,
    collaboration: Object.freeze({
      scope: values.COLLABORATION_SCOPE,
      mailbox: values.COLLABORATION_MAILBOX,
    }),
    bcryptRounds: values.BCRYPT_ROUNDS,
    databaseTechnology: values.DATABASE_TECHNOLOGY,
    mongoUri: values.MONGO_URI,
    allowedOrigins: values.ALLOWED_ORIGINS.split(';').map(s => s.trim()).filter(Boolean),
  });
}

