import type { ActionOutcome, ActionType } from '../../types/models.js';
import type { CacheEntityType } from '../../config/types.js';
import type { ExclusionReason, SkippedShow } from '../reconciliation/types.js';
import type { UnresolvedIdentity } from '../identity/IdentityMapper.js';
import type { DispatchMode } from '../actions/ActionDispatcher.js';

export interface ActionSummary {
  canonicalId: string;
  title: string;
  action: ActionType;
  requestedAction: ActionType;
  outcome: ActionOutcome;
  simulated: boolean;
  error: string | null;
  steps: string[];
  completedSteps: string[];
}

export interface ExcludedShow {
  canonicalId: string;
  title: string;
  reasons: ExclusionReason[];
}

export interface ScanSummary {
  /** Where the show list came from */
  source: 'cache' | 'plex';
  shows: number;
  deactivated: number;
}

/** What the integrity check found before the run, and what repair did about it */
export interface StoreRepairSummary {
  problems: string[];
  restoredShows: number;
  removedRecords: number;
  removedMappings: number;
  clearedPayloads: number;
  invalidated: CacheEntityType[];
}

export interface RunTotals {
  shows: number;
  assessed: number;
  eligible: number;
  acted: number;
  kept: number;
  failed: number;
  skipped: number;
  excluded: number;
  unresolved: number;
}

export interface RunReport {
  startedAt: number;
  finishedAt: number;
  mode: DispatchMode;
  /** Set when the store needed repair before the run */
  repair: StoreRepairSummary | null;
  scan: ScanSummary | null;
  /** Non-keep actions, applied or simulated */
  acted: ActionSummary[];
  /** Eligible shows kept by choice or declined at the prompt */
  kept: ActionSummary[];
  /** Actions that failed; completedSteps tells whether anything was removed */
  failed: ActionSummary[];
  /** Shows whose records could not be gathered */
  skipped: SkippedShow[];
  /** Shows protected by a safety rule */
  excluded: ExcludedShow[];
  unresolved: UnresolvedIdentity[];
  totals: RunTotals;
  cancelled: boolean;
  /** Set when the run was aborted by a store failure */
  fatalError: string | null;
}
