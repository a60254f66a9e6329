import dotenv from 'dotenv';
import { AppConfig, CacheEntityType, LoggingConfig, SourceConfig } from './types.js';
import { defaultConfig } from './defaults.js';
import { appConfigSchema } from '../validation/configSchemas.js';
import { ConfigurationError } from '../errors/index.js';
import { logger } from '../utils/logger.js';

type Env = Record<string, string | undefined>;

/**
 * Builds the run configuration from defaults and environment variables.
 * Created once at startup and handed to App; there is no global instance.
 */
export class ConfigManager {
  private config: AppConfig;

  constructor(private readonly env: Env = process.env) {
    this.config = this.loadConfig();
  }

  /**
   * Load `.env` into process.env, then read the configuration from it
   */
  static fromEnvironment(): ConfigManager {
    dotenv.config();
    return new ConfigManager(process.env);
  }

  private loadConfig(): AppConfig {
    const config: AppConfig = structuredClone(defaultConfig);

    // Database configuration
    config.database.filename = this.getString('DB_FILE', config.database.filename);
    config.database.backupDir = this.getString('BACKUP_DIR', config.database.backupDir);

    // Sources
    config.sources.plex = {
      ...this.getSource('PLEX', config.sources.plex, 'PLEX_TOKEN'),
      libraryName: this.getString('PLEX_LIBRARY_NAME', config.sources.plex.libraryName),
    };
    config.sources.overseerr = {
      ...this.getSource('OVERSEERR', config.sources.overseerr),
      requestsCacheTtlMs: config.sources.overseerr.requestsCacheTtlMs,
    };
    config.sources.tautulli = this.getSource('TAUTULLI', config.sources.tautulli);
    config.sources.sonarr = {
      ...this.getSource('SONARR', config.sources.sonarr),
      deleteSeries: this.getBoolean('SONARR_DELETE_SERIES', config.sources.sonarr.deleteSeries),
    };

    // Cache
    config.cache.ttlHours = this.getNumber('CACHE_TTL_HOURS', config.cache.ttlHours);
    const entityTypes: CacheEntityType[] = ['show', 'watch', 'request', 'monitor'];
    for (const entityType of entityTypes) {
      const key = `CACHE_TTL_${entityType.toUpperCase()}_HOURS`;
      if (this.env[key]) {
        config.cache.entityTtlHours[entityType] = this.getNumber(key, config.cache.ttlHours);
      }
    }
    config.cache.forceRefresh = this.getBoolean('FORCE_REFRESH', config.cache.forceRefresh);

    // Rate limits
    const perMinute = config.rateLimits.perMinute;
    perMinute.plex = this.getNumber('RATE_LIMIT_PLEX', perMinute.plex);
    perMinute.overseerr = this.getNumber('RATE_LIMIT_OVERSEERR', perMinute.overseerr);
    perMinute.tautulli = this.getNumber('RATE_LIMIT_TAUTULLI', perMinute.tautulli);
    perMinute.sonarr = this.getNumber('RATE_LIMIT_SONARR', perMinute.sonarr);
    config.rateLimits.acquireTimeoutMs = this.getNumber(
      'RATE_LIMIT_TIMEOUT_MS',
      config.rateLimits.acquireTimeoutMs
    );

    // Retry
    config.retry.maxAttempts = this.getNumber('RETRY_MAX_ATTEMPTS', config.retry.maxAttempts);
    config.retry.initialDelayMs = this.getNumber('RETRY_INITIAL_DELAY_MS', config.retry.initialDelayMs);

    // Reconciliation
    const rec = config.reconciliation;
    rec.requestThresholdDays = this.getNumber('REQUEST_THRESHOLD_DAYS', rec.requestThresholdDays);
    rec.ignoreFirstSeason = this.getBoolean('IGNORE_FIRST_SEASON', rec.ignoreFirstSeason);
    rec.ignoreFirstEpisode = this.getBoolean('IGNORE_FIRST_EPISODE', rec.ignoreFirstEpisode);
    rec.skipOverseerr = this.getBoolean('SKIP_OVERSEERR', rec.skipOverseerr);
    rec.skipTautulli = this.getBoolean('SKIP_TAUTULLI', rec.skipTautulli);
    rec.concurrency = this.getNumber('CONCURRENCY', rec.concurrency);

    // Actions
    config.actions.defaultAction = this.getEnum('ACTION', config.actions.defaultAction, [
      'delete',
      'keep_first_season',
      'keep_first_episode',
      'keep',
    ]);
    config.actions.skipConfirmation = this.getBoolean(
      'SKIP_CONFIRMATION',
      config.actions.skipConfirmation
    );
    config.actions.executeActions = this.getBoolean('EXECUTE_ACTIONS', config.actions.executeActions);
    if (this.env.DELETE_FILES !== undefined) {
      logger.warn('[ConfigManager] DELETE_FILES is not honoured; set EXECUTE_ACTIONS=true to leave simulation mode');
    }

    // Logging configuration
    config.logging.level = this.getEnum('LOG_LEVEL', config.logging.level, [
      'error',
      'warn',
      'info',
      'debug',
    ]);
    config.logging.file.enabled = this.getBoolean('LOG_FILE_ENABLED', config.logging.file.enabled);
    config.logging.file.path = this.getString('LOG_FILE_PATH', config.logging.file.path);
    config.logging.console.enabled = this.getBoolean(
      'LOG_CONSOLE_ENABLED',
      config.logging.console.enabled
    );

    return config;
  }

  private getSource(prefix: string, defaults: SourceConfig, apiKeyVar = `${prefix}_API_KEY`): SourceConfig {
    return {
      baseUrl: this.getString(`${prefix}_URL`, defaults.baseUrl).replace(/\/+$/, ''),
      apiKey: this.env[apiKeyVar] || defaults.apiKey,
      timeoutMs: this.getNumber(`${prefix}_TIMEOUT_MS`, defaults.timeoutMs),
    };
  }

  private getString(key: string, defaultValue: string): string {
    return this.env[key] || defaultValue;
  }

  private getNumber(key: string, defaultValue: number): number {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      throw new ConfigurationError(key, `Environment variable ${key} must be a valid number`);
    }
    return parsed;
  }

  private getBoolean(key: string, defaultValue: boolean): boolean {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }

  private getEnum<T extends string>(key: string, defaultValue: T, validValues: readonly T[]): T {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }
    const match = validValues.find((candidate) => candidate === value);
    if (match === undefined) {
      throw new ConfigurationError(
        key,
        `Environment variable ${key} must be one of: ${validValues.join(', ')}`
      );
    }
    return match;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getLoggingConfig(): LoggingConfig {
    return this.config.logging;
  }

  /**
   * Validate the merged configuration. Returns it on success.
   */
  validate(): AppConfig {
    const result = appConfigSchema.safeParse(this.config);
    if (!result.success) {
      const issue = result.error.issues[0];
      const key = issue ? issue.path.join('.') : 'config';
      throw new ConfigurationError(
        key,
        `Configuration validation failed: ${result.error.issues
          .map((i) => `${i.path.join('.')}: ${i.message}`)
          .join('; ')}`
      );
    }
    if (this.config.actions.executeActions && this.config.actions.defaultAction !== 'keep') {
      const missing = (['plex', 'sonarr'] as const).filter((source) => !this.config.sources[source].apiKey);
      if (missing.length > 0) {
        throw new ConfigurationError(
          'actions.executeActions',
          `Real mode needs credentials for: ${missing.join(', ')}`
        );
      }
    }
    return this.config;
  }
}
