/**
 * Zod schemas for the cartmesh runtime configuration.
 * Every section carries defaults, so an empty object is a valid config.
 */
import { z } from 'zod';

// ─── Server ─────────────────────────────────────────────────────

export const serverConfigSchema = z
  .object({
    host: z.string().min(1).default('0.0.0.0'),
    port: z.coerce.number().int().min(0).max(65535).default(8000),
  })
  .default({});

// ─── Storage ────────────────────────────────────────────────────

/**
 * `memory` keeps everything in-process. `redis` needs `redisUrl`.
 */
export const storageConfigSchema = z
  .object({
    driver: z.enum(['memory', 'redis']).default('memory'),
    redisUrl: z.string().url('Invalid Redis URL').optional(),
  })
  .default({})
  .refine((storage) => storage.driver !== 'redis' || storage.redisUrl !== undefined, {
    message: 'redisUrl is required when driver is "redis"',
    path: ['redisUrl'],
  });

// ─── Delivery ───────────────────────────────────────────────────

export const deliveryConfigSchema = z
  .object({
    maxRetries: z.number().int().min(0).max(10, 'Max retries cannot exceed 10').default(3),
    retryBaseDelayMs: z.number().int().positive().default(1000),
    ackTimeoutMs: z.number().int().positive().default(30_000),
    channelCapacity: z.number().int().positive().default(100),
  })
  .default({});

// ─── Gateway ────────────────────────────────────────────────────

export const gatewayConfigSchema = z
  .object({
    rateLimitWindowSeconds: z.number().int().positive().default(60),
    rateLimitMaxMessages: z.number().int().positive().default(100),
    maxErrorHistory: z.number().int().positive().default(50),
    maxQueuedMessages: z.number().int().positive().default(20),
  })
  .default({});

// ─── Reconnection ───────────────────────────────────────────────

export const reconnectionConfigSchema = z
  .object({
    maxAttempts: z.number().int().min(0).default(5),
    initialDelaySeconds: z.number().positive().default(1),
    maxDelaySeconds: z.number().positive().default(30),
    backoffMultiplier: z.number().min(1).default(2),
    jitter: z.boolean().default(true),
  })
  .default({});

// ─── Sessions & Logging ─────────────────────────────────────────

export const sessionConfigSchema = z
  .object({
    ttlSeconds: z.number().int().positive().default(3600),
  })
  .default({});

export const loggingConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  })
  .default({});

// ─── Root ───────────────────────────────────────────────────────

export const meshConfigSchema = z.object({
  server: serverConfigSchema,
  storage: storageConfigSchema,
  delivery: deliveryConfigSchema,
  gateway: gatewayConfigSchema,
  reconnection: reconnectionConfigSchema,
  sessions: sessionConfigSchema,
  logging: loggingConfigSchema,
});
