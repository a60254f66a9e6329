/**
 * Reconciliation Engine
 *
 * Gathers watch, request and monitoring records for every show (cache
 * first, in parallel up to the configured concurrency) and assesses each
 * one. A show whose source cannot be reached is skipped; the rest of the
 * run continues.
 */

import pMap from 'p-map';
import { Show } from '../../types/models.js';
import { SourceGateway } from '../sources/SourceGateway.js';
import { assessShow } from './eligibility.js';
import type { AssessmentOptions, ReconciliationResult, ShowAssessment, ShowRecords, SkippedShow } from './types.js';
import { logger } from '../../utils/logger.js';
import { getErrorCode, getErrorMessage } from '../../utils/errorHandling.js';
import { TransactionFailureError } from '../../errors/index.js';

export interface ReconcileOptions extends AssessmentOptions {
  concurrency: number;
}

type ShowOutcome = { kind: 'assessed'; assessment: ShowAssessment } | { kind: 'skipped'; skipped: SkippedShow } | null;

export class ReconciliationEngine {
  constructor(
    private readonly gateway: SourceGateway,
    private readonly now: () => number = Date.now
  ) {}

  async reconcile(shows: Show[], options: ReconcileOptions, signal?: AbortSignal): Promise<ReconciliationResult> {
    logger.info('[ReconciliationEngine] Reconciling shows', {
      shows: shows.length,
      concurrency: options.concurrency,
    });

    const outcomes = await pMap(
      shows,
      async (show): Promise<ShowOutcome> => {
        // Checked between shows only; a show in progress runs to completion
        if (signal?.aborted) {
          return null;
        }

        try {
          const assessment = await this.assess(show, options);
          return { kind: 'assessed', assessment };
        } catch (error) {
          // The store itself failing ends the run
          if (error instanceof TransactionFailureError) {
            throw error;
          }

          logger.warn('[ReconciliationEngine] Skipping show', {
            canonicalId: show.canonicalId,
            title: show.title,
            error: getErrorMessage(error),
          });
          return {
            kind: 'skipped',
            skipped: {
              canonicalId: show.canonicalId,
              title: show.title,
              error: getErrorMessage(error),
              code: getErrorCode(error) ?? null,
            },
          };
        }
      },
      { concurrency: Math.max(1, options.concurrency) }
    );

    const result: ReconciliationResult = {
      assessments: [],
      skipped: [],
      cancelled: signal?.aborted ?? false,
    };
    for (const outcome of outcomes) {
      if (outcome?.kind === 'assessed') {
        result.assessments.push(outcome.assessment);
      } else if (outcome?.kind === 'skipped') {
        result.skipped.push(outcome.skipped);
      }
    }

    logger.info('[ReconciliationEngine] Reconciliation finished', {
      assessed: result.assessments.length,
      eligible: result.assessments.filter((assessment) => assessment.eligibleForAction).length,
      skipped: result.skipped.length,
      cancelled: result.cancelled,
    });

    return result;
  }

  /**
   * Gather the records of one show and assess it
   */
  async assess(show: Show, options: AssessmentOptions): Promise<ShowAssessment> {
    const [watch, requests, monitor] = await Promise.all([
      options.skipWatchHistory ? null : this.gateway.getWatchRecord(show),
      options.skipRequests ? [] : this.gateway.getRequestRecords(show),
      this.gateway.getMonitorRecord(show),
    ]);

    const records: ShowRecords = { watch, requests, monitor };
    const assessment = assessShow(show, records, options, this.now());

    logger.debug('[ReconciliationEngine] Assessed show', {
      canonicalId: show.canonicalId,
      eligible: assessment.eligibleForAction,
      reasons: assessment.exclusionReasons,
    });

    return assessment;
  }
}
