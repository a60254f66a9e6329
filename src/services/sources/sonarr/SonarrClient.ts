/**
 * Sonarr API Client
 *
 * Series are found by TVDB id, or by a Sonarr series id already mapped to
 * the show. Unmonitoring rewrites the series resource with every season
 * switched off.
 */

import { AxiosAdapter } from 'axios';
import { SourcesConfig } from '../../../config/types.js';
import { MonitoringAdapter } from '../../../types/adapters.js';
import { SeriesInfo, ShowExternalIds } from '../../../types/models.js';
import { SonarrSeries, sonarrSeriesListSchema, sonarrSeriesSchema } from '../../../types/sources/sonarr.js';
import { SourceHttpClient } from '../utils/SourceHttpClient.js';
import { RateLimiter } from '../utils/RateLimiter.js';
import { logger } from '../../../utils/logger.js';
import { ResourceNotFoundError } from '../../../errors/index.js';

export class SonarrClient extends SourceHttpClient implements MonitoringAdapter {
  constructor(config: SourcesConfig['sonarr'], rateLimiter: RateLimiter, adapter?: AxiosAdapter) {
    super('sonarr', {
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
      rateLimiter,
      headers: config.apiKey ? { 'X-Api-Key': config.apiKey } : {},
      ...(adapter && { adapter }),
    });
  }

  async getSeries(ids: ShowExternalIds): Promise<SeriesInfo | null> {
    if (ids.tvdb !== undefined) {
      const matches = await this.request(
        { url: '/api/v3/series', params: { tvdbId: ids.tvdb } },
        sonarrSeriesListSchema,
        'lookupSeries'
      );
      const series = matches.find((candidate) => String(candidate.tvdbId) === ids.tvdb);
      if (series) {
        return this.toSeriesInfo(series);
      }
    }

    if (ids.sonarr !== undefined) {
      const series = await this.fetchSeries(ids.sonarr).catch((error: unknown) => {
        if (error instanceof ResourceNotFoundError) {
          return null;
        }
        throw error;
      });
      return series ? this.toSeriesInfo(series) : null;
    }

    return null;
  }

  async unmonitor(seriesId: number): Promise<void> {
    const series = await this.fetchSeries(String(seriesId));
    const updated = {
      ...series,
      monitored: false,
      seasons: series.seasons.map((season) => ({ ...season, monitored: false })),
    };

    await this.send({ method: 'put', url: `/api/v3/series/${seriesId}`, data: updated }, 'unmonitorSeries');
    logger.info('[SonarrClient] Unmonitored series', { seriesId, title: series.title });
  }

  async delete(seriesId: number, deleteFiles: boolean): Promise<void> {
    await this.send(
      {
        method: 'delete',
        url: `/api/v3/series/${seriesId}`,
        params: { deleteFiles, addImportListExclusion: false },
      },
      'deleteSeries'
    );
    logger.info('[SonarrClient] Deleted series', { seriesId, deleteFiles });
  }

  private fetchSeries(seriesId: string): Promise<SonarrSeries> {
    return this.request({ url: `/api/v3/series/${seriesId}` }, sonarrSeriesSchema, 'getSeries');
  }

  private toSeriesInfo(series: SonarrSeries): SeriesInfo {
    return {
      seriesId: series.id,
      title: series.title,
      tvdbId: series.tvdbId ?? null,
      monitored: series.monitored,
      seasons: series.seasons
        .map((season) => ({
          season: season.seasonNumber,
          monitored: season.monitored,
          episodeFileCount: season.statistics?.episodeFileCount ?? 0,
          episodeCount: season.statistics?.episodeCount ?? 0,
        }))
        .sort((a, b) => a.season - b.season),
    };
  }
}
