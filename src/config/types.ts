import type { ActionType } from '../types/models.js';

export type SourceName = 'plex' | 'overseerr' | 'tautulli' | 'sonarr';

export const SOURCE_NAMES: readonly SourceName[] = ['plex', 'overseerr', 'tautulli', 'sonarr'];

export interface DatabaseConfig {
  /** SQLite file, or ':memory:' */
  filename: string;
  backupDir: string;
}

export interface SourceConfig {
  baseUrl: string;
  apiKey?: string | undefined;
  timeoutMs: number;
}

export interface SourcesConfig {
  plex: SourceConfig & { libraryName: string };
  overseerr: SourceConfig & { requestsCacheTtlMs: number };
  tautulli: SourceConfig;
  sonarr: SourceConfig & { deleteSeries: boolean };
}

export type CacheEntityType = 'show' | 'watch' | 'request' | 'monitor';

export interface CacheConfig {
  ttlHours: number;
  /** Per-entity overrides of ttlHours */
  entityTtlHours: Partial<Record<CacheEntityType, number>>;
  forceRefresh: boolean;
}

export interface RateLimitConfig {
  /** Calls per minute, per source */
  perMinute: Record<SourceName, number>;
  acquireTimeoutMs: number;
}

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
}

export interface ReconciliationConfig {
  requestThresholdDays: number;
  ignoreFirstSeason: boolean;
  ignoreFirstEpisode: boolean;
  skipOverseerr: boolean;
  skipTautulli: boolean;
  concurrency: number;
}

export interface ActionConfig {
  defaultAction: ActionType;
  /** Non-interactive mode when true */
  skipConfirmation: boolean;
  /** The only switch that leaves simulation mode */
  executeActions: boolean;
}

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'debug';
  file: {
    enabled: boolean;
    path: string;
    maxSize: number; // MB
    maxFiles: number; // days
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

export interface AppConfig {
  database: DatabaseConfig;
  sources: SourcesConfig;
  cache: CacheConfig;
  rateLimits: RateLimitConfig;
  retry: RetryConfig;
  reconciliation: ReconciliationConfig;
  actions: ActionConfig;
  logging: LoggingConfig;
}
