import { z } from 'zod';
import type { AppConfig } from '../config/types.js';

/**
 * Configuration Validation Schemas
 *
 * Applied to the merged defaults + environment configuration before any
 * component is constructed.
 */

const sourceSchema = z.object({
  baseUrl: z.string().url('Source base URL must be a valid URL'),
  apiKey: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive(),
});

const ttlHours = z.number().positive('TTL must be greater than 0 hours');

const perMinute = z.number()
  .int()
  .min(1, 'Rate limit must allow at least 1 call per minute')
  .max(6000, 'Rate limit must be at most 6000 calls per minute');

export const appConfigSchema = z.object({
  database: z.object({
    filename: z.string().min(1),
    backupDir: z.string().min(1),
  }),
  sources: z.object({
    plex: sourceSchema.extend({ libraryName: z.string().min(1) }),
    overseerr: sourceSchema.extend({ requestsCacheTtlMs: z.number().int().nonnegative() }),
    tautulli: sourceSchema,
    sonarr: sourceSchema.extend({ deleteSeries: z.boolean() }),
  }),
  cache: z.object({
    ttlHours,
    entityTtlHours: z.object({
      show: ttlHours.optional(),
      watch: ttlHours.optional(),
      request: ttlHours.optional(),
      monitor: ttlHours.optional(),
    }),
    forceRefresh: z.boolean(),
  }),
  rateLimits: z.object({
    perMinute: z.object({
      plex: perMinute,
      overseerr: perMinute,
      tautulli: perMinute,
      sonarr: perMinute,
    }),
    acquireTimeoutMs: z.number().int().positive(),
  }),
  retry: z.object({
    maxAttempts: z.number().int().min(1).max(10),
    initialDelayMs: z.number().int().nonnegative(),
    maxDelayMs: z.number().int().nonnegative(),
  }),
  reconciliation: z.object({
    requestThresholdDays: z.number()
      .int()
      .min(0, 'Request threshold cannot be negative')
      .max(36500),
    ignoreFirstSeason: z.boolean(),
    ignoreFirstEpisode: z.boolean(),
    skipOverseerr: z.boolean(),
    skipTautulli: z.boolean(),
    concurrency: z.number().int().min(1).max(32),
  }),
  actions: z.object({
    defaultAction: z.enum(['delete', 'keep_first_season', 'keep_first_episode', 'keep']),
    skipConfirmation: z.boolean(),
    executeActions: z.boolean(),
  }),
  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'debug']),
    file: z.object({
      enabled: z.boolean(),
      path: z.string().min(1),
      maxSize: z.number().int().positive(),
      maxFiles: z.number().int().positive(),
    }),
    console: z.object({
      enabled: z.boolean(),
      colorize: z.boolean(),
    }),
  }),
}) satisfies z.ZodType<AppConfig>;
