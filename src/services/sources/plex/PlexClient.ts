/**
 * Plex Media Server Client
 *
 * Lists the TV library with its season inventory and removes shows,
 * seasons and episodes from it. Authenticates with X-Plex-Token.
 *
 * @see https://plexapi.dev/
 */

import { AxiosAdapter } from 'axios';
import { SourcesConfig } from '../../../config/types.js';
import { MediaServerAdapter } from '../../../types/adapters.js';
import { EpisodeInventory, SeasonInventory, ShowSnapshot } from '../../../types/models.js';
import {
  PlexSeason,
  PlexShow,
  plexEpisodesResponseSchema,
  plexSeasonsResponseSchema,
  plexSectionsResponseSchema,
  plexShowsResponseSchema,
} from '../../../types/sources/plex.js';
import { parseGuids } from '../../../utils/externalIds.js';
import { SourceHttpClient } from '../utils/SourceHttpClient.js';
import { RateLimiter } from '../utils/RateLimiter.js';
import { logger } from '../../../utils/logger.js';
import { ResourceNotFoundError } from '../../../errors/index.js';

const PLEX_TYPE_SHOW = 2;
const PLEX_TYPE_SEASON = 3;

export class PlexClient extends SourceHttpClient implements MediaServerAdapter {
  private readonly libraryName: string;
  private sectionKey: string | null = null;

  constructor(config: SourcesConfig['plex'], rateLimiter: RateLimiter, adapter?: AxiosAdapter) {
    super('plex', {
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
      rateLimiter,
      headers: config.apiKey ? { 'X-Plex-Token': config.apiKey } : {},
      ...(adapter && { adapter }),
    });
    this.libraryName = config.libraryName;
  }

  async listShows(): Promise<ShowSnapshot[]> {
    const sectionKey = await this.getSectionKey();

    const shows = await this.request(
      { url: `/library/sections/${sectionKey}/all`, params: { type: PLEX_TYPE_SHOW, includeGuids: 1 } },
      plexShowsResponseSchema,
      'listShows'
    );
    const seasons = await this.request(
      { url: `/library/sections/${sectionKey}/all`, params: { type: PLEX_TYPE_SEASON } },
      plexSeasonsResponseSchema,
      'listSeasons'
    );

    const seasonsByShow = new Map<string, PlexSeason[]>();
    for (const season of seasons.MediaContainer.Metadata) {
      if (season.parentRatingKey === undefined) {
        continue;
      }
      const list = seasonsByShow.get(season.parentRatingKey) ?? [];
      list.push(season);
      seasonsByShow.set(season.parentRatingKey, list);
    }

    const snapshots = shows.MediaContainer.Metadata.map((show) =>
      this.toSnapshot(show, seasonsByShow.get(show.ratingKey) ?? [])
    );

    logger.info('[PlexClient] Listed library', {
      library: this.libraryName,
      shows: snapshots.length,
      seasons: seasons.MediaContainer.Metadata.length,
    });

    return snapshots;
  }

  async listEpisodes(showId: string, season: number): Promise<EpisodeInventory[]> {
    const seasonKey = await this.findSeasonKey(showId, season);
    const episodes = await this.request(
      { url: `/library/metadata/${seasonKey}/children` },
      plexEpisodesResponseSchema,
      'listEpisodes'
    );

    return episodes.MediaContainer.Metadata.map((episode) => ({
      index: episode.index,
      seasonIndex: episode.parentIndex ?? season,
      sourceId: episode.ratingKey,
    })).sort((a, b) => a.index - b.index);
  }

  async deleteShow(showId: string): Promise<void> {
    await this.send({ method: 'delete', url: `/library/metadata/${showId}` }, 'deleteShow');
    logger.info('[PlexClient] Deleted show', { showId });
  }

  async deleteSeason(showId: string, season: number): Promise<void> {
    const seasonKey = await this.findSeasonKey(showId, season);
    await this.send({ method: 'delete', url: `/library/metadata/${seasonKey}` }, 'deleteSeason');
    logger.info('[PlexClient] Deleted season', { showId, season });
  }

  async deleteEpisode(showId: string, episode: { season: number; episode: number }): Promise<void> {
    const episodes = await this.listEpisodes(showId, episode.season);
    const target = episodes.find((candidate) => candidate.index === episode.episode);
    if (!target) {
      throw new ResourceNotFoundError('plex episode', `${showId}/S${episode.season}E${episode.episode}`);
    }
    await this.send({ method: 'delete', url: `/library/metadata/${target.sourceId}` }, 'deleteEpisode');
    logger.info('[PlexClient] Deleted episode', { showId, ...episode });
  }

  private async getSectionKey(): Promise<string> {
    if (this.sectionKey !== null) {
      return this.sectionKey;
    }

    const sections = await this.request({ url: '/library/sections' }, plexSectionsResponseSchema, 'listSections');
    const wanted = this.libraryName.toLowerCase();
    const section = sections.MediaContainer.Directory.find(
      (directory) => directory.type === 'show' && directory.title.toLowerCase() === wanted
    );
    if (!section) {
      throw new ResourceNotFoundError('plex library', this.libraryName);
    }

    this.sectionKey = section.key;
    return section.key;
  }

  private async findSeasonKey(showId: string, season: number): Promise<string> {
    const seasons = await this.request(
      { url: `/library/metadata/${showId}/children` },
      plexSeasonsResponseSchema,
      'listShowSeasons'
    );
    const match = seasons.MediaContainer.Metadata.find((candidate) => candidate.index === season);
    if (!match) {
      throw new ResourceNotFoundError('plex season', `${showId}/S${season}`);
    }
    return match.ratingKey;
  }

  private toSnapshot(show: PlexShow, seasons: PlexSeason[]): ShowSnapshot {
    const guids = show.Guid.map((guid) => guid.id);
    if (show.guid) {
      guids.push(show.guid);
    }

    const inventory: SeasonInventory[] = seasons
      .map((season) => ({
        index: season.index,
        sourceId: season.ratingKey,
        episodeCount: season.leafCount,
        viewedEpisodeCount: season.viewedLeafCount,
      }))
      .sort((a, b) => a.index - b.index);

    return {
      sourceId: show.ratingKey,
      title: show.title,
      year: show.year ?? null,
      libraryPath: show.Location[0]?.path ?? null,
      externalIds: parseGuids(guids),
      seasons: inventory,
      viewedEpisodeCount: show.viewedLeafCount,
      // Plex reports seconds
      lastViewedAt: show.lastViewedAt !== undefined ? show.lastViewedAt * 1000 : null,
    };
  }
}
