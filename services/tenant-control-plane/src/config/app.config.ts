import { type ConfigType, registerAs } from '@nestjs/config';
import { z } from 'zod';
import {
  coercedNonNegativeIntSchema,
  coercedPositiveIntSchema,
  requiredStringSchema,
} from '../utils/zod.util';

export const LogLevel = {
  Fatal: 'fatal',
  Error: 'error',
  Warn: 'warn',
  Info: 'info',
  Debug: 'debug',
  Trace: 'trace',
  Silent: 'silent',
} as const;

export const AppConfigSchema = z
  .object({
    nodeEnv: z.enum(['development', 'production', 'test']).prefault('production'),
    port: z.coerce.number().int().min(0).max(65535).prefault(9650),
    logLevel: z.enum(LogLevel).prefault(LogLevel.Info),
    tenantConfigPath: requiredStringSchema.describe('Path to the tenant YAML file'),
    auditBufferCapacity: coercedPositiveIntSchema.prefault(1000),
    graphRequestTimeoutMs: coercedPositiveIntSchema.prefault(30_000),
    graphMaxRetries: coercedNonNegativeIntSchema.prefault(3),
    graphMaxBackoffSeconds: coercedPositiveIntSchema.prefault(30),
  })
  .transform((config) => ({
    ...config,
    isDev: config.nodeEnv === 'development',
  }));

export const appConfig = registerAs('app', () =>
  AppConfigSchema.parse({
    nodeEnv: process.env.NODE_ENV,
    port: process.env.PORT,
    logLevel: process.env.LOG_LEVEL,
    tenantConfigPath: process.env.TENANT_CONFIG_PATH,
    auditBufferCapacity: process.env.AUDIT_BUFFER_CAPACITY,
    graphRequestTimeoutMs: process.env.GRAPH_REQUEST_TIMEOUT_MS,
    graphMaxRetries: process.env.GRAPH_MAX_RETRIES,
    graphMaxBackoffSeconds: process.env.GRAPH_MAX_BACKOFF_SECONDS,
  }),
);

export type AppConfig = ConfigType<typeof appConfig>;
