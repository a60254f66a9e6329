import { IdentityMapper } from '../../src/services/identity/IdentityMapper.js';
import { ShowRepository } from '../../src/services/library/ShowRepository.js';
import { SourceGateway } from '../../src/services/sources/SourceGateway.js';
import { AdapterUnavailableError, AuthenticationError, NetworkError } from '../../src/errors/index.js';
import { Show } from '../../src/types/models.js';
import { createFakeAdapters, FakeAdapters, FAST_RETRY, makeSeries, makeSnapshot } from '../utils/fixtures.js';
import { createTestStore, TestStore } from '../utils/testDatabase.js';

const HOUR_MS = 60 * 60 * 1000;

describe('SourceGateway', () => {
  let ctx: TestStore;
  let identity: IdentityMapper;
  let adapters: FakeAdapters;
  let gateway: SourceGateway;
  let show: Show;

  beforeEach(async () => {
    ctx = await createTestStore();
    identity = new IdentityMapper(ctx.store);
    adapters = createFakeAdapters({
      watch: { watched: true, totalPlays: 4, totalTimeSeconds: 7200, lastWatchedAt: 1000, granularity: 'show' },
      requests: [{ requestId: 7, requestedAt: 500, requester: 'alice', status: 'approved' }],
    });
    gateway = new SourceGateway(adapters, ctx.store, identity, FAST_RETRY);

    const snapshot = makeSnapshot();
    const canonicalId = await identity.resolve('plex', snapshot.sourceId, { ...snapshot.externalIds, title: snapshot.title });
    const shows = new ShowRepository(ctx.store);
    await shows.saveScan([{ canonicalId, snapshot }]);
    const [saved] = await shows.listActive();
    if (!saved) {
      throw new Error('show was not saved');
    }
    show = saved;
  });

  afterEach(async () => {
    await ctx.close();
  });

  describe('cached reads', () => {
    it('should fetch once and then serve from the cache', async () => {
      const first = await gateway.getWatchRecord(show);
      const second = await gateway.getWatchRecord(show);

      expect(first).toEqual({
        canonicalId: show.canonicalId,
        watched: true,
        totalPlays: 4,
        totalTimeSeconds: 7200,
        lastWatchedAt: 1000,
        granularity: 'show',
      });
      expect(second).toEqual(first);
      expect(adapters.tautulli.getWatchStats).toHaveBeenCalledTimes(1);
      expect(adapters.tautulli.getWatchStats).toHaveBeenCalledWith({ plex: '100', tvdb: '5000' });
    });

    it('should refetch once the entry has expired', async () => {
      await gateway.getRequestRecords(show);
      ctx.clock.advance(24 * HOUR_MS + 1);
      const records = await gateway.getRequestRecords(show);

      expect(records).toEqual([
        { canonicalId: show.canonicalId, requestId: 7, requestedAt: 500, requester: 'alice', status: 'approved' },
      ]);
      expect(adapters.overseerr.getRequests).toHaveBeenCalledTimes(2);
    });

    it('should refetch a cached payload that no longer validates', async () => {
      await ctx.store.put('watch', show.canonicalId, { watched: 'maybe' });

      const record = await gateway.getWatchRecord(show);

      expect(record.totalPlays).toBe(4);
      expect(adapters.tautulli.getWatchStats).toHaveBeenCalledTimes(1);
    });
  });

  describe('getMonitorRecord', () => {
    it('should link the series id to the show', async () => {
      const record = await gateway.getMonitorRecord(show);

      expect(record).toMatchObject({ canonicalId: show.canonicalId, seriesId: 42, monitored: true });
      expect(record.seasons).toEqual(makeSeries().seasons);
      expect(await identity.getIdentifiers(show.canonicalId)).toMatchObject({ sonarr: '42' });
    });

    it('should cache untracked series as a null series id', async () => {
      adapters.sonarr.getSeries.mockResolvedValue(null);

      const first = await gateway.getMonitorRecord(show);
      await gateway.getMonitorRecord(show);

      expect(first).toEqual({ canonicalId: show.canonicalId, seriesId: null, monitored: false, seasons: [] });
      expect(adapters.sonarr.getSeries).toHaveBeenCalledTimes(1);
      expect((await identity.getIdentifiers(show.canonicalId)).sonarr).toBeUndefined();
    });
  });

  describe('retries', () => {
    it('should retry transient failures', async () => {
      adapters.tautulli.getWatchStats
        .mockRejectedValueOnce(new NetworkError('connection reset'))
        .mockRejectedValueOnce(new NetworkError('connection reset'));

      const record = await gateway.getWatchRecord(show);

      expect(record.watched).toBe(true);
      expect(adapters.tautulli.getWatchStats).toHaveBeenCalledTimes(3);
    });

    it('should give up with AdapterUnavailableError after the last attempt', async () => {
      adapters.plex.listShows.mockRejectedValue(new NetworkError('connection refused'));

      const error = await gateway.listShows().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(AdapterUnavailableError);
      expect(error).toMatchObject({ attempts: 3, sourceName: 'plex' });
      expect(adapters.plex.listShows).toHaveBeenCalledTimes(3);
    });

    it('should not retry permanent failures', async () => {
      adapters.sonarr.unmonitor.mockRejectedValue(new AuthenticationError('bad key'));

      await expect(gateway.unmonitorSeries(42)).rejects.toThrow('sonarr unmonitor failed after 1 attempt(s): bad key');
      expect(adapters.sonarr.unmonitor).toHaveBeenCalledTimes(1);
    });

    it('should not write to the cache when the fetch fails', async () => {
      adapters.overseerr.getRequests.mockRejectedValue(new NetworkError('timeout'));

      await expect(gateway.getRequestRecords(show)).rejects.toBeInstanceOf(AdapterUnavailableError);
      expect(await ctx.store.get('request', show.canonicalId)).toBeNull();
    });
  });

  describe('destructive calls', () => {
    it('should pass through to the adapters', async () => {
      await gateway.deleteShow('100');
      await gateway.deleteSeason('100', 2);
      await gateway.deleteEpisode('100', { season: 1, episode: 3 });
      await gateway.deleteSeries(42, false);

      expect(adapters.plex.deleteShow).toHaveBeenCalledWith('100');
      expect(adapters.plex.deleteSeason).toHaveBeenCalledWith('100', 2);
      expect(adapters.plex.deleteEpisode).toHaveBeenCalledWith('100', { season: 1, episode: 3 });
      expect(adapters.sonarr.delete).toHaveBeenCalledWith(42, false);
    });
  });
});
