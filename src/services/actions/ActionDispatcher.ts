/**
 * Action Dispatcher
 *
 * Turns an assessment into a recorded decision. Ineligible shows are
 * always kept. Dry runs describe the plan without calling anything
 * destructive. A real run records its action only after every step of the
 * plan succeeded; a failed step is recorded as a keep with the error, the
 * failing step and the steps that already went through.
 */

import { ActionRecord, ActionType } from '../../types/models.js';
import { ShowAssessment } from '../reconciliation/types.js';
import { SourceGateway } from '../sources/SourceGateway.js';
import { ActionHistoryRepository } from './ActionHistoryRepository.js';
import { ActionStep, buildActionPlan, describeStep } from './actionPlan.js';
import { logger } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { InvalidStateError } from '../../errors/index.js';

export type RunMode = 'interactive' | 'non-interactive';

export interface DispatchMode {
  runMode: RunMode;
  /** When true nothing destructive is called */
  dryRun: boolean;
}

/**
 * Source of decisions in interactive mode
 */
export interface ActionChooser {
  /** Pick an action, starting from the recommendation */
  choose(assessment: ShowAssessment): Promise<ActionType>;
  /** Confirm a non-keep action before anything happens */
  confirm(assessment: ShowAssessment, action: ActionType, steps: string[]): Promise<boolean>;
}

export interface ActionDispatcherOptions {
  deleteSeries: boolean;
  chooser?: ActionChooser;
  now?: () => number;
}

type PendingRecord = Omit<ActionRecord, 'id' | 'canonicalId' | 'createdAt' | 'actor'>;

export class ActionDispatcher {
  private readonly now: () => number;

  constructor(
    private readonly gateway: SourceGateway,
    private readonly history: ActionHistoryRepository,
    private readonly options: ActionDispatcherOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  async apply(assessment: ShowAssessment, mode: DispatchMode): Promise<ActionRecord> {
    const record = await this.decide(assessment, mode);
    const saved = await this.history.append({
      ...record,
      canonicalId: assessment.show.canonicalId,
      actor: mode.runMode === 'interactive' ? 'interactive' : 'auto',
      createdAt: this.now(),
    });

    logger.info('[ActionDispatcher] Recorded decision', {
      canonicalId: saved.canonicalId,
      title: assessment.show.title,
      action: saved.action,
      requestedAction: saved.requestedAction,
      outcome: saved.outcome,
    });

    return saved;
  }

  private async decide(assessment: ShowAssessment, mode: DispatchMode): Promise<PendingRecord> {
    const keep = (
      requestedAction: ActionType,
      outcome: PendingRecord['outcome'],
      extra: Pick<Partial<PendingRecord>, 'error' | 'steps' | 'completedSteps'> = {}
    ): PendingRecord => ({
      action: 'keep',
      requestedAction,
      simulated: mode.dryRun,
      outcome,
      error: null,
      steps: [],
      completedSteps: [],
      ...extra,
    });

    // Safety rules cannot be overridden, not even interactively
    if (!assessment.eligibleForAction) {
      return keep(assessment.recommendedAction, 'excluded');
    }

    const requested = await this.requestedAction(assessment, mode);
    if (requested === 'keep') {
      return keep('keep', 'kept');
    }

    let plan: ActionStep[];
    try {
      plan = await buildActionPlan(assessment.show, assessment.records.monitor, requested, {
        deleteSeries: this.options.deleteSeries,
        listEpisodes: (showId, season) => this.gateway.listEpisodes(showId, season),
      });
    } catch (error) {
      return keep(requested, 'failed', { error: getErrorMessage(error) });
    }
    const steps = plan.map(describeStep);

    if (mode.runMode === 'interactive') {
      const confirmed = await this.requireChooser().confirm(assessment, requested, steps);
      if (!confirmed) {
        return keep(requested, 'declined', { steps });
      }
    }

    if (mode.dryRun) {
      for (const step of steps) {
        logger.info(`[ActionDispatcher] [dry run] ${step}`, { canonicalId: assessment.show.canonicalId });
      }
      return {
        action: requested,
        requestedAction: requested,
        simulated: true,
        outcome: 'simulated',
        error: null,
        steps,
        completedSteps: [],
      };
    }

    const completedSteps: string[] = [];
    for (const step of plan) {
      const description = describeStep(step);
      try {
        await this.execute(step);
      } catch (error) {
        const message = `"${description}" failed: ${getErrorMessage(error)}`;
        logger.error(
          completedSteps.length > 0
            ? '[ActionDispatcher] Action failed part-way, show partly removed'
            : '[ActionDispatcher] Action failed, show kept',
          {
            canonicalId: assessment.show.canonicalId,
            action: requested,
            error: message,
            completedSteps,
          }
        );
        return keep(requested, 'failed', { error: message, steps, completedSteps });
      }
      completedSteps.push(description);
    }

    return {
      action: requested,
      requestedAction: requested,
      simulated: false,
      outcome: 'applied',
      error: null,
      steps,
      completedSteps,
    };
  }

  private async requestedAction(assessment: ShowAssessment, mode: DispatchMode): Promise<ActionType> {
    if (mode.runMode === 'interactive') {
      return this.requireChooser().choose(assessment);
    }
    return assessment.recommendedAction;
  }

  private requireChooser(): ActionChooser {
    if (!this.options.chooser) {
      throw new InvalidStateError('action chooser', 'none', 'Interactive mode needs an action chooser', {
        service: 'ActionDispatcher',
      });
    }
    return this.options.chooser;
  }

  private async execute(step: ActionStep): Promise<void> {
    switch (step.kind) {
      case 'delete_show':
        return this.gateway.deleteShow(step.showId);
      case 'delete_season':
        return this.gateway.deleteSeason(step.showId, step.season);
      case 'delete_episode':
        return this.gateway.deleteEpisode(step.showId, { season: step.season, episode: step.episode });
      case 'unmonitor_series':
        return this.gateway.unmonitorSeries(step.seriesId);
      case 'delete_series':
        return this.gateway.deleteSeries(step.seriesId, step.deleteFiles);
    }
  }
}
