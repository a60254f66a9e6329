import {
  MediaServerAdapter,
  MonitoringAdapter,
  RequestTrackerAdapter,
  SourceAdapters,
  WatchHistoryAdapter,
} from '../../src/types/adapters.js';
import {
  EpisodeInventory,
  RequestInfo,
  SeasonInventory,
  SeriesInfo,
  Show,
  ShowSnapshot,
  WatchStats,
} from '../../src/types/models.js';
import { buildTitleKey } from '../../src/utils/titleKey.js';
import { TEST_EPOCH } from './testDatabase.js';

export const DAY_MS = 24 * 60 * 60 * 1000;

export function season(index: number, episodeCount: number, viewedEpisodeCount = 0): SeasonInventory {
  return { index, sourceId: `season-${index}`, episodeCount, viewedEpisodeCount };
}

export function makeSnapshot(overrides: Partial<ShowSnapshot> = {}): ShowSnapshot {
  return {
    sourceId: '100',
    title: 'Test Show',
    year: 2020,
    libraryPath: '/tv/Test Show',
    externalIds: { tvdb: '5000' },
    seasons: [season(1, 10), season(2, 10)],
    viewedEpisodeCount: 0,
    lastViewedAt: null,
    ...overrides,
  };
}

export function makeShow(overrides: Partial<Show> = {}): Show {
  const snapshot = makeSnapshot(overrides);
  return {
    ...snapshot,
    canonicalId: 'show_test',
    titleKey: buildTitleKey(snapshot.title, snapshot.year),
    identifiers: { plex: snapshot.sourceId, ...snapshot.externalIds },
    active: true,
    firstSeenAt: TEST_EPOCH,
    lastSeenAt: TEST_EPOCH,
    fetchedAt: TEST_EPOCH,
    ...overrides,
  };
}

export const UNWATCHED_STATS: WatchStats = {
  watched: false,
  totalPlays: 0,
  totalTimeSeconds: 0,
  lastWatchedAt: null,
  granularity: 'show',
};

export function makeSeries(overrides: Partial<SeriesInfo> = {}): SeriesInfo {
  return {
    seriesId: 42,
    title: 'Test Show',
    tvdbId: 5000,
    monitored: true,
    seasons: [
      { season: 1, monitored: true, episodeFileCount: 10, episodeCount: 10 },
      { season: 2, monitored: true, episodeFileCount: 10, episodeCount: 10 },
    ],
    ...overrides,
  };
}

/**
 * In-process stand-ins for the four services, backed by jest mocks
 */
export interface FakeAdapters extends SourceAdapters {
  plex: jest.Mocked<MediaServerAdapter>;
  overseerr: jest.Mocked<RequestTrackerAdapter>;
  tautulli: jest.Mocked<WatchHistoryAdapter>;
  sonarr: jest.Mocked<MonitoringAdapter>;
}

export function createFakeAdapters(
  options: {
    shows?: ShowSnapshot[];
    episodes?: EpisodeInventory[];
    requests?: RequestInfo[];
    watch?: WatchStats;
    series?: SeriesInfo | null;
  } = {}
): FakeAdapters {
  return {
    plex: {
      listShows: jest.fn().mockResolvedValue(options.shows ?? []),
      listEpisodes: jest.fn().mockResolvedValue(options.episodes ?? []),
      deleteShow: jest.fn().mockResolvedValue(undefined),
      deleteSeason: jest.fn().mockResolvedValue(undefined),
      deleteEpisode: jest.fn().mockResolvedValue(undefined),
    },
    overseerr: {
      getRequests: jest.fn().mockResolvedValue(options.requests ?? []),
    },
    tautulli: {
      getWatchStats: jest.fn().mockResolvedValue(options.watch ?? UNWATCHED_STATS),
    },
    sonarr: {
      getSeries: jest.fn().mockResolvedValue(options.series === undefined ? makeSeries() : options.series),
      unmonitor: jest.fn().mockResolvedValue(undefined),
      delete: jest.fn().mockResolvedValue(undefined),
    },
  };
}

/** Retry settings that never sleep */
export const FAST_RETRY = { maxAttempts: 3, initialDelayMs: 0, maxDelayMs: 0 };
