/**
 * Source Gateway
 *
 * The single path from the engine to the upstream services. Reads are
 * served from the cache when fresh, otherwise fetched with retries and
 * written back. No transaction is held while a request is in flight.
 */

import { z } from 'zod';
import { CacheEntityType, RetryConfig, SourceName } from '../../config/types.js';
import { SourceAdapters } from '../../types/adapters.js';
import {
  EpisodeInventory,
  MonitorRecord,
  RequestRecord,
  Show,
  ShowExternalIds,
  ShowSnapshot,
  WatchRecord,
} from '../../types/models.js';
import { CacheStore } from '../cache/CacheStore.js';
import { IdentityMapper } from '../identity/IdentityMapper.js';
import { monitorRecordSchema, requestRecordsSchema, watchRecordSchema } from '../../validation/recordSchemas.js';
import { AdapterUnavailableError, RetryStrategy, createRetryStrategy } from '../../errors/index.js';
import { logger } from '../../utils/logger.js';

export class SourceGateway {
  private readonly retryStrategy: RetryStrategy;

  constructor(
    private readonly adapters: SourceAdapters,
    private readonly store: CacheStore,
    private readonly identity: IdentityMapper,
    retry: RetryConfig
  ) {
    this.retryStrategy = createRetryStrategy({
      maxAttempts: retry.maxAttempts,
      initialDelayMs: retry.initialDelayMs,
      maxDelayMs: retry.maxDelayMs,
    });
  }

  // ============================================
  // READS
  // ============================================

  async listShows(): Promise<ShowSnapshot[]> {
    return this.call('plex', 'listShows', () => this.adapters.plex.listShows());
  }

  async listEpisodes(showId: string, season: number): Promise<EpisodeInventory[]> {
    return this.call('plex', 'listEpisodes', () => this.adapters.plex.listEpisodes(showId, season));
  }

  async getWatchRecord(show: Show): Promise<WatchRecord> {
    return this.cached('watch', show, watchRecordSchema, 'tautulli', async () => {
      const stats = await this.adapters.tautulli.getWatchStats(this.idsOf(show));
      return { canonicalId: show.canonicalId, ...stats };
    });
  }

  async getRequestRecords(show: Show): Promise<RequestRecord[]> {
    return this.cached('request', show, requestRecordsSchema, 'overseerr', async () => {
      const requests = await this.adapters.overseerr.getRequests(this.idsOf(show));
      return requests.map((request) => ({ canonicalId: show.canonicalId, ...request }));
    });
  }

  async getMonitorRecord(show: Show): Promise<MonitorRecord> {
    const record = await this.cached('monitor', show, monitorRecordSchema, 'sonarr', async () => {
      const series = await this.adapters.sonarr.getSeries(this.idsOf(show));
      if (!series) {
        // Untracked shows are cached too, so the lookup is not repeated
        return { canonicalId: show.canonicalId, seriesId: null, monitored: false, seasons: [] };
      }
      return {
        canonicalId: show.canonicalId,
        seriesId: series.seriesId,
        monitored: series.monitored,
        seasons: series.seasons,
      };
    });

    if (record.seriesId !== null && show.identifiers.sonarr !== String(record.seriesId)) {
      await this.identity.link('sonarr', String(record.seriesId), show.canonicalId);
    }
    return record;
  }

  // ============================================
  // DESTRUCTIVE CALLS
  // ============================================

  async deleteShow(showId: string): Promise<void> {
    await this.call('plex', 'deleteShow', () => this.adapters.plex.deleteShow(showId));
  }

  async deleteSeason(showId: string, season: number): Promise<void> {
    await this.call('plex', 'deleteSeason', () => this.adapters.plex.deleteSeason(showId, season));
  }

  async deleteEpisode(showId: string, episode: { season: number; episode: number }): Promise<void> {
    await this.call('plex', 'deleteEpisode', () => this.adapters.plex.deleteEpisode(showId, episode));
  }

  async unmonitorSeries(seriesId: number): Promise<void> {
    await this.call('sonarr', 'unmonitor', () => this.adapters.sonarr.unmonitor(seriesId));
  }

  async deleteSeries(seriesId: number, deleteFiles: boolean): Promise<void> {
    await this.call('sonarr', 'deleteSeries', () => this.adapters.sonarr.delete(seriesId, deleteFiles));
  }

  // ============================================
  // INTERNALS
  // ============================================

  private async cached<T>(
    entityType: CacheEntityType,
    show: Show,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    sourceName: SourceName,
    fetch: () => Promise<T>
  ): Promise<T> {
    const entry = await this.store.get(entityType, show.canonicalId);
    if (entry) {
      const parsed = schema.safeParse(entry.payload);
      if (parsed.success) {
        return parsed.data;
      }
      logger.warn('[SourceGateway] Cached record no longer valid, refetching', {
        entityType,
        canonicalId: show.canonicalId,
      });
    }

    const value = await this.call(sourceName, `fetch:${entityType}`, fetch);
    await this.store.put(entityType, show.canonicalId, value);
    return value;
  }

  private async call<T>(sourceName: SourceName, operation: string, fn: () => Promise<T>): Promise<T> {
    const result = await this.retryStrategy.executeWithResult(fn, `${sourceName}.${operation}`);
    if (result.success) {
      return result.value;
    }

    throw new AdapterUnavailableError(
      sourceName,
      result.attemptCount,
      `${sourceName} ${operation} failed after ${result.attemptCount} attempt(s): ${result.error.message}`,
      { service: 'SourceGateway', operation },
      result.error
    );
  }

  private idsOf(show: Show): ShowExternalIds {
    return { ...show.externalIds, ...show.identifiers, plex: show.identifiers.plex ?? show.sourceId };
  }
}
