/**
 * Library Sweep Service
 *
 * One full run: check the store (repairing it when needed), scan the
 * library (or reuse a fresh scan), reconcile every active show, dispatch
 * the eligible ones one at a time and report.
 *
 * Per-show failures are collected in the report. Store failures, including
 * corruption that repair cannot fix, end the run and are reported as fatal.
 */

import { Show } from '../../types/models.js';
import { CacheStore } from '../cache/CacheStore.js';
import { SourceGateway } from '../sources/SourceGateway.js';
import { IdentityMapper } from '../identity/IdentityMapper.js';
import { ScannedShow, ShowRepository } from '../library/ShowRepository.js';
import { ReconciliationEngine, ReconcileOptions } from '../reconciliation/ReconciliationEngine.js';
import { ReconciliationResult } from '../reconciliation/types.js';
import { ActionDispatcher, DispatchMode } from '../actions/ActionDispatcher.js';
import { ActionSummary, RunReport, ScanSummary, StoreRepairSummary } from './types.js';
import { logger } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { AmbiguousIdentityError } from '../../errors/index.js';

export interface LibrarySweepOptions {
  reconcile: ReconcileOptions;
  mode: DispatchMode;
  now?: () => number;
}

export class LibrarySweepService {
  private readonly now: () => number;

  constructor(
    private readonly store: CacheStore,
    private readonly gateway: SourceGateway,
    private readonly identity: IdentityMapper,
    private readonly shows: ShowRepository,
    private readonly engine: ReconciliationEngine,
    private readonly dispatcher: ActionDispatcher,
    private readonly options: LibrarySweepOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  async run(signal?: AbortSignal): Promise<RunReport> {
    const report = this.emptyReport();

    logger.info('[LibrarySweepService] Starting run', {
      runMode: this.options.mode.runMode,
      dryRun: this.options.mode.dryRun,
    });

    try {
      report.repair = await this.verifyStore();

      const { shows, summary } = await this.scan();
      report.scan = summary;
      report.totals.shows = shows.length;

      const reconciliation = await this.engine.reconcile(shows, this.options.reconcile, signal);
      this.collectAssessments(report, reconciliation);

      for (const assessment of reconciliation.assessments) {
        if (!assessment.eligibleForAction) {
          continue;
        }
        if (signal?.aborted) {
          report.cancelled = true;
          break;
        }

        const record = await this.dispatcher.apply(assessment, this.options.mode);
        const summaryEntry: ActionSummary = {
          canonicalId: record.canonicalId,
          title: assessment.show.title,
          action: record.action,
          requestedAction: record.requestedAction,
          outcome: record.outcome,
          simulated: record.simulated,
          error: record.error,
          steps: record.steps,
          completedSteps: record.completedSteps,
        };

        if (record.outcome === 'failed') {
          report.failed.push(summaryEntry);
        } else if (record.action === 'keep') {
          report.kept.push(summaryEntry);
        } else {
          report.acted.push(summaryEntry);
        }
      }

      report.unresolved = await this.identity.listUnresolved();
    } catch (error) {
      report.fatalError = getErrorMessage(error);
      logger.error('[LibrarySweepService] Run aborted', { error: report.fatalError });
    }

    report.finishedAt = this.now();
    this.computeTotals(report);

    logger.info('[LibrarySweepService] Run finished', {
      ...report.totals,
      cancelled: report.cancelled,
      fatal: report.fatalError !== null,
    });

    return report;
  }

  /**
   * Run the integrity check and repair whatever it finds. Repair throws
   * CacheCorruptionError when SQLite itself stays corrupt.
   */
  private async verifyStore(): Promise<StoreRepairSummary | null> {
    const integrity = await this.store.integrityCheck();
    if (integrity.ok) {
      return null;
    }

    logger.warn('[LibrarySweepService] Store failed its integrity check, repairing', {
      problems: integrity.problems,
    });
    const repaired = await this.store.repair();

    return {
      problems: integrity.problems,
      restoredShows: repaired.restoredShows,
      removedRecords: repaired.removedRecords,
      removedMappings: repaired.removedMappings,
      clearedPayloads: repaired.clearedPayloads,
      invalidated: repaired.invalidated,
    };
  }

  /**
   * Reuse the stored show list while the last scan is fresh, otherwise list
   * the library and save the whole scan at once
   */
  private async scan(): Promise<{ shows: Show[]; summary: ScanSummary }> {
    if (await this.shows.isScanFresh()) {
      const shows = await this.shows.listActive();
      logger.info('[LibrarySweepService] Using cached library scan', { shows: shows.length });
      return { shows, summary: { source: 'cache', shows: shows.length, deactivated: 0 } };
    }

    const snapshots = await this.gateway.listShows();
    const scanned: ScannedShow[] = [];
    const seen = new Map<string, string>();

    for (const snapshot of snapshots) {
      let canonicalId: string;
      try {
        canonicalId = await this.identity.resolve('plex', snapshot.sourceId, {
          ...snapshot.externalIds,
          title: snapshot.title,
          year: snapshot.year,
        });
      } catch (error) {
        // Flagged for review; listed as unresolved in the report
        if (error instanceof AmbiguousIdentityError) {
          continue;
        }
        throw error;
      }

      const previous = seen.get(canonicalId);
      if (previous !== undefined) {
        logger.warn('[LibrarySweepService] Two library items resolve to one show, keeping the first', {
          canonicalId,
          first: previous,
          duplicate: snapshot.sourceId,
        });
        continue;
      }
      seen.set(canonicalId, snapshot.sourceId);
      scanned.push({ canonicalId, snapshot });
    }

    const saved = await this.shows.saveScan(scanned);
    const shows = await this.shows.listActive();

    return { shows, summary: { source: 'plex', shows: shows.length, deactivated: saved.deactivated } };
  }

  private collectAssessments(report: RunReport, reconciliation: ReconciliationResult): void {
    report.skipped = reconciliation.skipped;
    report.cancelled = reconciliation.cancelled;
    report.totals.assessed = reconciliation.assessments.length;
    report.totals.eligible = reconciliation.assessments.filter((assessment) => assessment.eligibleForAction).length;
    report.excluded = reconciliation.assessments
      .filter((assessment) => !assessment.eligibleForAction)
      .map((assessment) => ({
        canonicalId: assessment.show.canonicalId,
        title: assessment.show.title,
        reasons: assessment.exclusionReasons,
      }));
  }

  private computeTotals(report: RunReport): void {
    report.totals.acted = report.acted.length;
    report.totals.kept = report.kept.length;
    report.totals.failed = report.failed.length;
    report.totals.skipped = report.skipped.length;
    report.totals.excluded = report.excluded.length;
    report.totals.unresolved = report.unresolved.length;
  }

  private emptyReport(): RunReport {
    const startedAt = this.now();
    return {
      startedAt,
      finishedAt: startedAt,
      mode: this.options.mode,
      repair: null,
      scan: null,
      acted: [],
      kept: [],
      failed: [],
      skipped: [],
      excluded: [],
      unresolved: [],
      totals: {
        shows: 0,
        assessed: 0,
        eligible: 0,
        acted: 0,
        kept: 0,
        failed: 0,
        skipped: 0,
        excluded: 0,
        unresolved: 0,
      },
      cancelled: false,
      fatalError: null,
    };
  }
}
