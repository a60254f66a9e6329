import type { ActionType, MonitorRecord, RequestRecord, Show, WatchRecord } from '../../types/models.js';

export type ExclusionReason = 'watched' | 'recently_requested' | 'first_season_only' | 'first_episode_only';

export interface AssessmentOptions {
  requestThresholdDays: number;
  ignoreFirstSeason: boolean;
  ignoreFirstEpisode: boolean;
  /** Ignore request data entirely */
  skipRequests: boolean;
  /** Ignore the watch history service entirely */
  skipWatchHistory: boolean;
  defaultAction: ActionType;
}

/**
 * Everything gathered for one show. A null record means the source was
 * not consulted.
 */
export interface ShowRecords {
  watch: WatchRecord | null;
  requests: RequestRecord[];
  monitor: MonitorRecord | null;
}

export interface ShowAssessment {
  show: Show;
  records: ShowRecords;
  isUnwatched: boolean;
  isRequestedRecently: boolean;
  hasPartialProtection: boolean;
  eligibleForAction: boolean;
  recommendedAction: ActionType;
  exclusionReasons: ExclusionReason[];
  /** Season numbers with content on disk */
  downloadedSeasons: number[];
  assessedAt: number;
}

export interface SkippedShow {
  canonicalId: string;
  title: string;
  error: string;
  code: string | null;
}

export interface ReconciliationResult {
  assessments: ShowAssessment[];
  skipped: SkippedShow[];
  cancelled: boolean;
}
