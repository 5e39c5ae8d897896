import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../middleware/errorHandler';

dotenv.config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  API_VERSION: z.string().min(1).default('v1'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  CORS_ORIGIN: z.string().default('http://localhost:3050'),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(900000), // 15 minutes
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(100),
  UPLOAD_LIMIT: z.string().default('10mb'),
  ROSTER_GROUP_SEPARATOR: z.string().min(1).max(3).default('/'),
  ROSTER_RESERVED_MARKERS: z.string().default('Rank'),
  ROSTER_DUTY_CODES_PATH: z.string().optional()
});

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  apiVersion: string;
  logLevel: string;
  corsOrigin: string;
  rateLimitWindowMs: number;
  rateLimitMaxRequests: number;
  uploadLimit: string;
  roster: {
    groupSeparator: string;
    reservedMarkers: readonly string[];
    dutyCodesPath?: string;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment configuration: ${issues}`);
  }

  const values = result.data;
  const reservedMarkers = values.ROSTER_RESERVED_MARKERS
    .split(',')
    .map(marker => marker.trim())
    .filter(Boolean);

  return Object.freeze({
    nodeEnv: values.NODE_ENV,
    port: values.PORT,
    apiVersion: values.API_VERSION,
    logLevel: values.LOG_LEVEL,
    corsOrigin: values.CORS_ORIGIN,
    rateLimitWindowMs: values.RATE_LIMIT_WINDOW_MS,
    rateLimitMaxRequests: values.RATE_LIMIT_MAX_REQUESTS,
    uploadLimit: values.UPLOAD_LIMIT,
    roster: Object.freeze({
      groupSeparator: values.ROSTER_GROUP_SEPARATOR,
      reservedMarkers,
      dutyCodesPath: values.ROSTER_DUTY_CODES_PATH || undefined
    })
  });
}
