import type {
  EpisodeInventory,
  RequestInfo,
  SeriesInfo,
  ShowExternalIds,
  ShowSnapshot,
  WatchStats,
} from './models.js';

/**
 * Source adapter contracts. The engine depends on these shapes only; the
 * HTTP clients under services/sources implement them.
 */

export interface MediaServerAdapter {
  listShows(): Promise<ShowSnapshot[]>;
  listEpisodes(showId: string, season: number): Promise<EpisodeInventory[]>;
  deleteShow(showId: string): Promise<void>;
  deleteSeason(showId: string, season: number): Promise<void>;
  deleteEpisode(showId: string, episode: { season: number; episode: number }): Promise<void>;
}

export interface RequestTrackerAdapter {
  getRequests(ids: ShowExternalIds): Promise<RequestInfo[]>;
}

export interface WatchHistoryAdapter {
  getWatchStats(ids: ShowExternalIds): Promise<WatchStats>;
}

export interface MonitoringAdapter {
  /** Resolves null when the series is not tracked */
  getSeries(ids: ShowExternalIds): Promise<SeriesInfo | null>;
  unmonitor(seriesId: number): Promise<void>;
  delete(seriesId: number, deleteFiles: boolean): Promise<void>;
}

export interface SourceAdapters {
  plex: MediaServerAdapter;
  overseerr: RequestTrackerAdapter;
  tautulli: WatchHistoryAdapter;
  sonarr: MonitoringAdapter;
}
