import { IdentityMapper } from '../../src/services/identity/IdentityMapper.js';
import { ScannedShow, ShowRepository } from '../../src/services/library/ShowRepository.js';
import { InvalidStateError } from '../../src/errors/index.js';
import { ShowSnapshot } from '../../src/types/models.js';
import { makeSnapshot } from '../utils/fixtures.js';
import { createTestStore, TestStore } from '../utils/testDatabase.js';

const HOUR_MS = 60 * 60 * 1000;

describe('ShowRepository', () => {
  let ctx: TestStore;
  let identity: IdentityMapper;
  let shows: ShowRepository;

  beforeEach(async () => {
    ctx = await createTestStore();
    identity = new IdentityMapper(ctx.store);
    shows = new ShowRepository(ctx.store);
  });

  afterEach(async () => {
    await ctx.close();
  });

  async function scan(...snapshots: ShowSnapshot[]) {
    const scanned: ScannedShow[] = [];
    for (const snapshot of snapshots) {
      const canonicalId = await identity.resolve('plex', snapshot.sourceId, {
        ...snapshot.externalIds,
        title: snapshot.title,
        year: snapshot.year,
      });
      scanned.push({ canonicalId, snapshot });
    }
    return shows.saveScan(scanned);
  }

  it('should save a scan and list active shows with their identifiers', async () => {
    const result = await scan(makeSnapshot(), makeSnapshot({ sourceId: '200', title: 'Another', externalIds: {} }));

    expect(result).toEqual({ saved: 2, deactivated: 0, scannedAt: ctx.clock.time });

    const active = await shows.listActive();
    expect(active.map((show) => show.title)).toEqual(['Another', 'Test Show']);
    expect(active[1]).toMatchObject({
      sourceId: '100',
      titleKey: 'test show|2020',
      identifiers: { plex: '100', tvdb: '5000' },
      active: true,
      seasons: makeSnapshot().seasons,
    });
  });

  it('should mark shows missing from a later scan inactive', async () => {
    await scan(makeSnapshot(), makeSnapshot({ sourceId: '200', title: 'Another', externalIds: {} }));
    ctx.clock.advance(1000);

    const result = await scan(makeSnapshot());

    expect(result.deactivated).toBe(1);
    expect((await shows.listActive()).map((show) => show.title)).toEqual(['Test Show']);

    const gone = await identity.resolve('plex', '200');
    expect(await shows.get(gone)).toMatchObject({ title: 'Another', active: false });
  });

  it('should reactivate a show that comes back', async () => {
    await scan(makeSnapshot());
    ctx.clock.advance(1000);
    await scan();
    ctx.clock.advance(1000);

    await scan(makeSnapshot());

    expect(await shows.listActive()).toHaveLength(1);
  });

  it('should skip resolved shows that were never scanned', async () => {
    await identity.resolve('sonarr', '42', { title: 'Sonarr Only' });

    expect(await shows.listActive()).toEqual([]);
  });

  it('should save nothing when one show is unknown', async () => {
    await expect(
      shows.saveScan([{ canonicalId: 'show_missing', snapshot: makeSnapshot() }])
    ).rejects.toBeInstanceOf(InvalidStateError);

    expect(await shows.getLastScanAt()).toBeNull();
  });

  it('should report the scan fresh until the show TTL passes', async () => {
    expect(await shows.isScanFresh()).toBe(false);

    await scan(makeSnapshot());
    expect(await shows.isScanFresh()).toBe(true);

    ctx.clock.advance(24 * HOUR_MS + 1);
    expect(await shows.isScanFresh()).toBe(false);
  });
});
