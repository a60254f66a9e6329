import { AppConfig } from './config/types.js';
import { DatabaseManager } from './database/DatabaseManager.js';
import { MigrationRunner } from './database/MigrationRunner.js';
import { CacheStore, IntegrityReport, RepairResult } from './services/cache/CacheStore.js';
import { IdentityMapper } from './services/identity/IdentityMapper.js';
import { ShowRepository } from './services/library/ShowRepository.js';
import { RateLimiterRegistry } from './services/sources/utils/RateLimiterRegistry.js';
import { PlexClient } from './services/sources/plex/PlexClient.js';
import { OverseerrClient } from './services/sources/overseerr/OverseerrClient.js';
import { TautulliClient } from './services/sources/tautulli/TautulliClient.js';
import { SonarrClient } from './services/sources/sonarr/SonarrClient.js';
import { SourceGateway } from './services/sources/SourceGateway.js';
import { ReconciliationEngine } from './services/reconciliation/ReconciliationEngine.js';
import { ActionChooser, ActionDispatcher, DispatchMode } from './services/actions/ActionDispatcher.js';
import { ActionHistoryRepository } from './services/actions/ActionHistoryRepository.js';
import { LibrarySweepService } from './services/sweep/LibrarySweepService.js';
import { RunReport } from './services/sweep/types.js';
import { SourceAdapters } from './types/adapters.js';
import { logger } from './utils/logger.js';

export interface AppOptions {
  /** Replaces the HTTP clients */
  adapters?: SourceAdapters;
  /** Needed for interactive runs */
  chooser?: ActionChooser;
  now?: () => number;
}

/**
 * Wires the store, the source clients and the services for one process
 */
export class App {
  readonly db: DatabaseManager;
  readonly store: CacheStore;
  readonly identity: IdentityMapper;
  readonly shows: ShowRepository;
  readonly history: ActionHistoryRepository;
  readonly rateLimiters: RateLimiterRegistry;
  readonly gateway: SourceGateway;
  readonly engine: ReconciliationEngine;
  readonly dispatcher: ActionDispatcher;
  readonly sweep: LibrarySweepService;
  readonly mode: DispatchMode;

  constructor(
    private readonly config: AppConfig,
    options: AppOptions = {}
  ) {
    const now = options.now ?? Date.now;

    this.db = new DatabaseManager(config.database);
    this.store = new CacheStore(this.db, { ...config.cache, backupDir: config.database.backupDir, now });
    this.identity = new IdentityMapper(this.store);
    this.shows = new ShowRepository(this.store);
    this.history = new ActionHistoryRepository(this.store);
    this.rateLimiters = new RateLimiterRegistry(config.rateLimits);

    const adapters = options.adapters ?? this.createClients();
    this.gateway = new SourceGateway(adapters, this.store, this.identity, config.retry);
    this.engine = new ReconciliationEngine(this.gateway, now);
    this.dispatcher = new ActionDispatcher(this.gateway, this.history, {
      deleteSeries: config.sources.sonarr.deleteSeries,
      ...(options.chooser && { chooser: options.chooser }),
      now,
    });

    this.mode = {
      runMode: config.actions.skipConfirmation ? 'non-interactive' : 'interactive',
      dryRun: !config.actions.executeActions,
    };

    this.sweep = new LibrarySweepService(
      this.store,
      this.gateway,
      this.identity,
      this.shows,
      this.engine,
      this.dispatcher,
      {
        reconcile: {
          ...config.reconciliation,
          skipRequests: config.reconciliation.skipOverseerr,
          skipWatchHistory: config.reconciliation.skipTautulli,
          defaultAction: config.actions.defaultAction,
        },
        mode: this.mode,
        now,
      }
    );
  }

  async start(): Promise<void> {
    await this.db.connect();
    const migrationRunner = new MigrationRunner(this.db.getConnection());
    await migrationRunner.migrate();

    logger.info('[App] Store ready', {
      database: this.config.database.filename,
      runMode: this.mode.runMode,
      dryRun: this.mode.dryRun,
    });
  }

  async stop(): Promise<void> {
    this.rateLimiters.reset();
    if (this.db.isConnected()) {
      await this.db.disconnect();
    }
  }

  run(signal?: AbortSignal): Promise<RunReport> {
    return this.sweep.run(signal);
  }

  check(): Promise<IntegrityReport> {
    return this.store.integrityCheck();
  }

  repair(): Promise<RepairResult> {
    return this.store.repair();
  }

  backup(destination?: string): Promise<string> {
    return this.store.backup(destination);
  }

  restore(source: string): Promise<void> {
    return this.store.restore(source);
  }

  private createClients(): SourceAdapters {
    const { sources } = this.config;
    return {
      plex: new PlexClient(sources.plex, this.rateLimiters.forSource('plex')),
      overseerr: new OverseerrClient(sources.overseerr, this.rateLimiters.forSource('overseerr')),
      tautulli: new TautulliClient(sources.tautulli, this.rateLimiters.forSource('tautulli')),
      sonarr: new SonarrClient(sources.sonarr, this.rateLimiters.forSource('sonarr')),
    };
  }
}
