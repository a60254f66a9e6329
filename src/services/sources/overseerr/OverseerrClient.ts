/**
 * Overseerr API Client
 *
 * Overseerr has no lookup by external id, so the full request list is paged
 * in once and kept in memory for `requestsCacheTtlMs`. Concurrent callers
 * share a single in-flight load.
 */

import { AxiosAdapter } from 'axios';
import { SourcesConfig } from '../../../config/types.js';
import { RequestTrackerAdapter } from '../../../types/adapters.js';
import { RequestInfo, ShowExternalIds } from '../../../types/models.js';
import { OverseerrRequest, overseerrRequestPageSchema } from '../../../types/sources/overseerr.js';
import { SourceHttpClient } from '../utils/SourceHttpClient.js';
import { RateLimiter } from '../utils/RateLimiter.js';
import { logger } from '../../../utils/logger.js';
import { InvalidResponseError } from '../../../errors/index.js';

const PAGE_SIZE = 100;

const REQUEST_STATUS: Record<number, string> = {
  1: 'pending',
  2: 'approved',
  3: 'declined',
  4: 'failed',
  5: 'completed',
};

interface LoadedRequests {
  loadedAt: number;
  requests: OverseerrRequest[];
}

export class OverseerrClient extends SourceHttpClient implements RequestTrackerAdapter {
  private readonly cacheTtlMs: number;
  private loaded: LoadedRequests | null = null;
  private loading: Promise<OverseerrRequest[]> | null = null;

  constructor(
    config: SourcesConfig['overseerr'],
    rateLimiter: RateLimiter,
    adapter?: AxiosAdapter,
    private readonly now: () => number = Date.now
  ) {
    super('overseerr', {
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
      rateLimiter,
      headers: config.apiKey ? { 'X-Api-Key': config.apiKey } : {},
      ...(adapter && { adapter }),
    });
    this.cacheTtlMs = config.requestsCacheTtlMs;
  }

  async getRequests(ids: ShowExternalIds): Promise<RequestInfo[]> {
    const requests = await this.loadRequests();

    return requests
      .filter((request) => request.type === 'tv' && this.matches(request, ids))
      .map((request) => ({
        requestId: request.id,
        requestedAt: this.requestedAt(request),
        requester:
          request.requestedBy?.displayName ?? request.requestedBy?.username ?? request.requestedBy?.email ?? null,
        status: REQUEST_STATUS[request.status] ?? String(request.status),
      }))
      .sort((a, b) => b.requestedAt - a.requestedAt);
  }

  /**
   * A request without a readable date could be recent, so the show cannot
   * be assessed from it
   */
  private requestedAt(request: OverseerrRequest): number {
    const requestedAt = Date.parse(request.createdAt);
    if (!Number.isFinite(requestedAt)) {
      throw new InvalidResponseError(
        'overseerr',
        `Request ${request.id} has an unreadable date: "${request.createdAt}"`,
        { service: 'OverseerrClient', operation: 'getRequests', entityId: request.id }
      );
    }
    return requestedAt;
  }

  /**
   * Drop the in-memory request list
   */
  clearCache(): void {
    this.loaded = null;
  }

  private async loadRequests(): Promise<OverseerrRequest[]> {
    if (this.loaded && this.now() - this.loaded.loadedAt < this.cacheTtlMs) {
      return this.loaded.requests;
    }

    if (!this.loading) {
      this.loading = this.fetchAllPages()
        .then((requests) => {
          this.loaded = { loadedAt: this.now(), requests };
          return requests;
        })
        .finally(() => {
          this.loading = null;
        });
    }
    return this.loading;
  }

  private async fetchAllPages(): Promise<OverseerrRequest[]> {
    const requests: OverseerrRequest[] = [];

    for (let page = 0; ; page++) {
      const response = await this.request(
        {
          url: '/api/v1/request',
          params: { take: PAGE_SIZE, skip: page * PAGE_SIZE, sort: 'modified', filter: 'all' },
        },
        overseerrRequestPageSchema,
        'listRequests'
      );
      requests.push(...response.results);

      if (response.results.length < PAGE_SIZE || page + 1 >= response.pageInfo.pages) {
        break;
      }
    }

    logger.debug('[OverseerrClient] Loaded requests', { count: requests.length });
    return requests;
  }

  private matches(request: OverseerrRequest, ids: ShowExternalIds): boolean {
    const media = request.media;
    if (!media) {
      return false;
    }
    return (
      sameId(media.tvdbId, ids.tvdb) || sameId(media.tmdbId, ids.tmdb) || sameId(media.ratingKey, ids.plex)
    );
  }
}

function sameId(value: string | number | null | undefined, wanted: string | undefined): boolean {
  return value !== null && value !== undefined && wanted !== undefined && String(value) === wanted;
}
