import { SonarrClient } from '../../src/services/sources/sonarr/SonarrClient.js';
import { HttpStub, openLimiter } from '../utils/httpStub.js';

const config = { baseUrl: 'http://sonarr.test:8989', apiKey: 'test-secret', timeoutMs: 1000, deleteSeries: false };

const SERIES = {
  id: 42,
  title: 'Test Show',
  tvdbId: 5000,
  monitored: true,
  qualityProfileId: 3,
  path: '/tv/Test Show',
  seasons: [
    { seasonNumber: 2, monitored: true, statistics: { episodeFileCount: 4, episodeCount: 10 } },
    { seasonNumber: 1, monitored: true, statistics: { episodeFileCount: 10, episodeCount: 10 } },
    { seasonNumber: 0, monitored: false },
  ],
};

describe('SonarrClient', () => {
  let http: HttpStub;
  let client: SonarrClient;

  beforeEach(() => {
    http = new HttpStub();
    client = new SonarrClient(config, openLimiter('sonarr'), http.adapter);
  });

  describe('getSeries', () => {
    it('should find a series by TVDB id', async () => {
      http.on('get', '/api/v3/series', { data: [SERIES] });

      const series = await client.getSeries({ tvdb: '5000' });

      expect(series).toEqual({
        seriesId: 42,
        title: 'Test Show',
        tvdbId: 5000,
        monitored: true,
        seasons: [
          { season: 0, monitored: false, episodeFileCount: 0, episodeCount: 0 },
          { season: 1, monitored: true, episodeFileCount: 10, episodeCount: 10 },
          { season: 2, monitored: true, episodeFileCount: 4, episodeCount: 10 },
        ],
      });
      expect(http.requests[0]?.params).toEqual({ tvdbId: '5000' });
      expect(http.requests[0]?.headers.get('X-Api-Key')).toBe('test-secret');
    });

    it('should fall back to a mapped series id', async () => {
      http.on('get', '/api/v3/series', { data: [] }).on('get', '/api/v3/series/42', { data: SERIES });

      const series = await client.getSeries({ tvdb: '5000', sonarr: '42' });

      expect(series?.seriesId).toBe(42);
    });

    it('should return null for an untracked show', async () => {
      http.on('get', '/api/v3/series', { data: [] });

      expect(await client.getSeries({ tvdb: '5000', sonarr: '77' })).toBeNull();
      expect(await client.getSeries({ plex: '100' })).toBeNull();
    });
  });

  describe('unmonitor', () => {
    it('should put the series back with everything unmonitored', async () => {
      http.on('get', '/api/v3/series/42', { data: SERIES }).on('put', '/api/v3/series/42', { status: 202 });

      await client.unmonitor(42);

      const [put] = http.sentTo('put', '/api/v3/series/42');
      const body: unknown = typeof put?.data === 'string' ? JSON.parse(put.data) : put?.data;
      expect(body).toEqual({
        ...SERIES,
        monitored: false,
        seasons: SERIES.seasons.map((season) => ({ ...season, monitored: false })),
      });
    });
  });

  describe('delete', () => {
    it('should delete without adding an import exclusion', async () => {
      http.on('delete', '/api/v3/series/42', { status: 200 });

      await client.delete(42, false);

      expect(http.sentTo('delete', '/api/v3/series/42')[0]?.params).toEqual({
        deleteFiles: false,
        addImportListExclusion: false,
      });
    });
  });
});
