/**
 * Tautulli API Client
 *
 * Watch statistics are looked up by the media server's rating key, so a
 * show without a Plex mapping has no history here.
 */

import { AxiosAdapter } from 'axios';
import { SourcesConfig } from '../../../config/types.js';
import { WatchHistoryAdapter } from '../../../types/adapters.js';
import { ShowExternalIds, WatchStats } from '../../../types/models.js';
import {
  tautulliHistoryResponseSchema,
  tautulliWatchTimeStatsResponseSchema,
} from '../../../types/sources/tautulli.js';
import { SourceHttpClient } from '../utils/SourceHttpClient.js';
import { RateLimiter } from '../utils/RateLimiter.js';
import { InvalidResponseError } from '../../../errors/index.js';

const UNWATCHED: WatchStats = {
  watched: false,
  totalPlays: 0,
  totalTimeSeconds: 0,
  lastWatchedAt: null,
  granularity: 'show',
};

export class TautulliClient extends SourceHttpClient implements WatchHistoryAdapter {
  constructor(config: SourcesConfig['tautulli'], rateLimiter: RateLimiter, adapter?: AxiosAdapter) {
    super('tautulli', {
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
      rateLimiter,
      params: config.apiKey ? { apikey: config.apiKey } : {},
      ...(adapter && { adapter }),
    });
  }

  async getWatchStats(ids: ShowExternalIds): Promise<WatchStats> {
    const ratingKey = ids.plex;
    if (ratingKey === undefined) {
      return { ...UNWATCHED };
    }

    const stats = await this.request(
      { url: '/api/v2', params: { cmd: 'get_item_watch_time_stats', rating_key: ratingKey } },
      tautulliWatchTimeStatsResponseSchema,
      'getWatchTimeStats'
    );
    this.assertSuccess(stats.response.result, stats.response.message, 'get_item_watch_time_stats');

    // query_days 0 is the all-time bucket and always the largest
    let totalPlays = 0;
    let totalTimeSeconds = 0;
    for (const bucket of stats.response.data) {
      if (bucket.total_plays > totalPlays) {
        totalPlays = bucket.total_plays;
        totalTimeSeconds = bucket.total_time;
      }
    }

    if (totalPlays === 0) {
      return { ...UNWATCHED };
    }

    return {
      watched: true,
      totalPlays,
      totalTimeSeconds,
      lastWatchedAt: await this.getLastWatchedAt(ratingKey),
      granularity: 'show',
    };
  }

  private async getLastWatchedAt(ratingKey: string): Promise<number | null> {
    const history = await this.request(
      {
        url: '/api/v2',
        params: {
          cmd: 'get_history',
          grandparent_rating_key: ratingKey,
          length: 1,
          order_column: 'date',
          order_dir: 'desc',
        },
      },
      tautulliHistoryResponseSchema,
      'getHistory'
    );
    this.assertSuccess(history.response.result, history.response.message, 'get_history');

    const latest = history.response.data.data[0];
    if (!latest) {
      return null;
    }
    // seconds
    return (latest.stopped ?? latest.date) * 1000;
  }

  private assertSuccess(result: string, message: string | null | undefined, command: string): void {
    if (result !== 'success') {
      throw new InvalidResponseError('tautulli', `Tautulli ${command} failed: ${message ?? result}`, {
        service: 'TautulliClient',
        operation: command,
      });
    }
  }
}
