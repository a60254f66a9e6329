import { AppConfig } from './types.js';

export const defaultConfig: AppConfig = {
  database: {
    filename: './data/showcull.sqlite',
    backupDir: './data/backups',
  },
  sources: {
    plex: {
      baseUrl: 'http://localhost:32400',
      timeoutMs: 30000,
      libraryName: 'TV Shows',
    },
    overseerr: {
      baseUrl: 'http://localhost:5055',
      timeoutMs: 30000,
      requestsCacheTtlMs: 3600000, // 1 hour
    },
    tautulli: {
      baseUrl: 'http://localhost:8181',
      timeoutMs: 30000,
    },
    sonarr: {
      baseUrl: 'http://localhost:8989',
      timeoutMs: 30000,
      deleteSeries: false,
    },
  },
  cache: {
    ttlHours: 24,
    entityTtlHours: {},
    forceRefresh: false,
  },
  rateLimits: {
    perMinute: {
      plex: 100,
      overseerr: 100,
      tautulli: 100,
      sonarr: 100,
    },
    acquireTimeoutMs: 120000, // 2 minutes
  },
  retry: {
    maxAttempts: 3,
    initialDelayMs: 1000,
    maxDelayMs: 30000,
  },
  reconciliation: {
    requestThresholdDays: 365,
    ignoreFirstSeason: false,
    ignoreFirstEpisode: false,
    skipOverseerr: false,
    skipTautulli: false,
    concurrency: 4,
  },
  actions: {
    defaultAction: 'keep',
    skipConfirmation: false,
    executeActions: false,
  },
  logging: {
    level: 'info',
    file: {
      enabled: true,
      path: './logs',
      maxSize: 10,
      maxFiles: 14,
    },
    console: {
      enabled: true,
      colorize: true,
    },
  },
};
