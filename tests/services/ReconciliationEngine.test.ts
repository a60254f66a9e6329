import { IdentityMapper } from '../../src/services/identity/IdentityMapper.js';
import { ScannedShow, ShowRepository } from '../../src/services/library/ShowRepository.js';
import { SourceGateway } from '../../src/services/sources/SourceGateway.js';
import { ReconcileOptions, ReconciliationEngine } from '../../src/services/reconciliation/ReconciliationEngine.js';
import { NetworkError, TransactionFailureError } from '../../src/errors/index.js';
import { Show, ShowExternalIds, ShowSnapshot, WatchStats } from '../../src/types/models.js';
import {
  createFakeAdapters,
  DAY_MS,
  FakeAdapters,
  FAST_RETRY,
  makeSnapshot,
  UNWATCHED_STATS,
} from '../utils/fixtures.js';
import { createTestStore, TestStore } from '../utils/testDatabase.js';

const options: ReconcileOptions = {
  requestThresholdDays: 30,
  ignoreFirstSeason: false,
  ignoreFirstEpisode: false,
  skipRequests: false,
  skipWatchHistory: false,
  defaultAction: 'delete',
  concurrency: 2,
};

describe('ReconciliationEngine', () => {
  let ctx: TestStore;
  let adapters: FakeAdapters;
  let engine: ReconciliationEngine;
  let shows: Show[];

  const snapshots: ShowSnapshot[] = [
    makeSnapshot({ sourceId: '1', title: 'Forgotten', externalIds: { tvdb: '11' } }),
    makeSnapshot({ sourceId: '2', title: 'Loved', externalIds: { tvdb: '22' } }),
    makeSnapshot({ sourceId: '3', title: 'Unreachable', externalIds: { tvdb: '33' } }),
  ];

  const watchByPlexId: Record<string, WatchStats | Error> = {
    '1': UNWATCHED_STATS,
    '2': { watched: true, totalPlays: 12, totalTimeSeconds: 36000, lastWatchedAt: 1, granularity: 'show' },
    '3': new NetworkError('connection refused'),
  };

  beforeEach(async () => {
    ctx = await createTestStore();
    adapters = createFakeAdapters({
      requests: [{ requestId: 1, requestedAt: ctx.clock.time - 90 * DAY_MS, requester: 'alice', status: 'approved' }],
    });
    adapters.tautulli.getWatchStats.mockImplementation(async (ids: ShowExternalIds) => {
      const stats = watchByPlexId[ids.plex ?? ''];
      if (stats === undefined) {
        return UNWATCHED_STATS;
      }
      if (stats instanceof Error) {
        throw stats;
      }
      return stats;
    });

    const identity = new IdentityMapper(ctx.store);
    const repository = new ShowRepository(ctx.store);
    const scanned: ScannedShow[] = [];
    for (const snapshot of snapshots) {
      const canonicalId = await identity.resolve('plex', snapshot.sourceId, { ...snapshot.externalIds, title: snapshot.title });
      scanned.push({ canonicalId, snapshot });
    }
    await repository.saveScan(scanned);
    shows = await repository.listActive();

    const gateway = new SourceGateway(adapters, ctx.store, identity, FAST_RETRY);
    engine = new ReconciliationEngine(gateway, ctx.clock.now);
  });

  afterEach(async () => {
    await ctx.close();
  });

  it('should assess reachable shows and skip the unreachable one', async () => {
    const result = await engine.reconcile(shows, options);

    expect(result.cancelled).toBe(false);
    expect(result.assessments.map((a) => [a.show.title, a.eligibleForAction, a.exclusionReasons])).toEqual([
      ['Forgotten', true, []],
      ['Loved', false, ['watched']],
    ]);
    expect(result.skipped).toEqual([
      {
        canonicalId: shows.find((show) => show.title === 'Unreachable')?.canonicalId,
        title: 'Unreachable',
        error: 'tautulli fetch:watch failed after 3 attempt(s): connection refused',
        code: 'SOURCE_UNAVAILABLE',
      },
    ]);
  });

  it('should recommend the default action for eligible shows', async () => {
    const result = await engine.reconcile(shows, options);
    const forgotten = result.assessments.find((a) => a.show.title === 'Forgotten');

    expect(forgotten).toMatchObject({
      isUnwatched: true,
      isRequestedRecently: false,
      recommendedAction: 'delete',
      downloadedSeasons: [1, 2],
      assessedAt: ctx.clock.time,
    });
    expect(forgotten?.records.monitor?.seriesId).toBe(42);
  });

  it('should not consult skipped sources', async () => {
    const result = await engine.reconcile(shows, { ...options, skipWatchHistory: true, skipRequests: true });

    expect(adapters.tautulli.getWatchStats).not.toHaveBeenCalled();
    expect(adapters.overseerr.getRequests).not.toHaveBeenCalled();
    expect(result.skipped).toEqual([]);
    expect(result.assessments.every((a) => a.records.watch === null && a.records.requests.length === 0)).toBe(true);
  });

  it('should stop picking up shows once aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await engine.reconcile(shows, options, controller.signal);

    expect(result).toEqual({ assessments: [], skipped: [], cancelled: true });
    expect(adapters.sonarr.getSeries).not.toHaveBeenCalled();
  });

  it('should fail the whole run when the store cannot commit', async () => {
    await ctx.db.execute(`
      CREATE TRIGGER monitor_records_full BEFORE INSERT ON monitor_records
      BEGIN
        SELECT RAISE(ABORT, 'disk full');
      END
    `);

    await expect(engine.reconcile(shows, options)).rejects.toBeInstanceOf(TransactionFailureError);
  });
});
