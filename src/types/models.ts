/**
 * Domain models shared by the identity, cache, reconciliation and action
 * layers. Timestamps are epoch milliseconds.
 */

export type ActionType = 'delete' | 'keep_first_season' | 'keep_first_episode' | 'keep';

export const ACTION_TYPES: readonly ActionType[] = [
  'delete',
  'keep_first_season',
  'keep_first_episode',
  'keep',
];

/** Sources an identifier can come from in the mapping table */
export type IdentitySource = 'plex' | 'sonarr' | 'tvdb' | 'tmdb' | 'imdb';

/** External metadata ids strong enough to merge two source records */
export type StrongIdSource = 'tvdb' | 'tmdb' | 'imdb';

export const STRONG_ID_SOURCES: readonly StrongIdSource[] = ['tvdb', 'tmdb', 'imdb'];

export type ExternalIds = Partial<Record<StrongIdSource, string>>;

export type ShowExternalIds = Partial<Record<IdentitySource, string>>;

export interface SeasonInventory {
  /** Season number; 0 holds specials */
  index: number;
  /** Media server id of the season */
  sourceId: string;
  /** Episodes present on disk */
  episodeCount: number;
  viewedEpisodeCount: number;
}

export interface EpisodeInventory {
  index: number;
  seasonIndex: number;
  sourceId: string;
}

/**
 * One show as listed by the media server
 */
export interface ShowSnapshot {
  sourceId: string;
  title: string;
  year: number | null;
  libraryPath: string | null;
  externalIds: ExternalIds;
  seasons: SeasonInventory[];
  viewedEpisodeCount: number;
  lastViewedAt: number | null;
}

export interface Show extends ShowSnapshot {
  canonicalId: string;
  titleKey: string;
  /** Every identifier mapped to this show */
  identifiers: ShowExternalIds;
  active: boolean;
  firstSeenAt: number;
  lastSeenAt: number;
  fetchedAt: number;
}

export interface EpisodeWatch {
  season: number;
  episode: number;
  plays: number;
}

export interface WatchStats {
  watched: boolean;
  totalPlays: number;
  totalTimeSeconds: number;
  lastWatchedAt: number | null;
  granularity: 'show' | 'episode';
  episodes?: EpisodeWatch[];
}

export interface WatchRecord extends WatchStats {
  canonicalId: string;
}

export interface RequestInfo {
  requestId: number;
  requestedAt: number;
  requester: string | null;
  status: string;
}

export interface RequestRecord extends RequestInfo {
  canonicalId: string;
}

export interface SeasonFiles {
  season: number;
  monitored: boolean;
  episodeFileCount: number;
  episodeCount: number;
}

export interface SeriesInfo {
  seriesId: number;
  title: string;
  tvdbId: number | null;
  monitored: boolean;
  seasons: SeasonFiles[];
}

export interface MonitorRecord {
  canonicalId: string;
  /** null when the monitoring service does not track the show */
  seriesId: number | null;
  monitored: boolean;
  seasons: SeasonFiles[];
}

export type ActionActor = 'interactive' | 'auto';

export type ActionOutcome =
  | 'applied'
  | 'simulated'
  | 'kept'
  | 'declined'
  | 'failed'
  | 'excluded';

export interface ActionRecord {
  id?: number;
  canonicalId: string;
  /** What was done; 'keep' unless the whole plan went through */
  action: ActionType;
  /** What the recommendation or the user asked for */
  requestedAction: ActionType;
  simulated: boolean;
  actor: ActionActor;
  outcome: ActionOutcome;
  error: string | null;
  /** Step descriptions of the executed or simulated plan */
  steps: string[];
  /**
   * Steps that went through before a real run failed. A failed record with
   * completed steps means the show was only partly removed.
   */
  completedSteps: string[];
  createdAt: number;
}
