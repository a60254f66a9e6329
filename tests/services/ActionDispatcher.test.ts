import { IdentityMapper } from '../../src/services/identity/IdentityMapper.js';
import { SourceGateway } from '../../src/services/sources/SourceGateway.js';
import { ActionHistoryRepository } from '../../src/services/actions/ActionHistoryRepository.js';
import { ActionChooser, ActionDispatcher, DispatchMode } from '../../src/services/actions/ActionDispatcher.js';
import { assessShow } from '../../src/services/reconciliation/eligibility.js';
import { AssessmentOptions, ShowAssessment } from '../../src/services/reconciliation/types.js';
import { AuthenticationError, InvalidStateError } from '../../src/errors/index.js';
import { ActionType, MonitorRecord } from '../../src/types/models.js';
import { createFakeAdapters, FakeAdapters, FAST_RETRY, makeShow, UNWATCHED_STATS } from '../utils/fixtures.js';
import { createTestStore, TestStore } from '../utils/testDatabase.js';

const AUTO_DRY: DispatchMode = { runMode: 'non-interactive', dryRun: true };
const AUTO_LIVE: DispatchMode = { runMode: 'non-interactive', dryRun: false };
const INTERACTIVE_LIVE: DispatchMode = { runMode: 'interactive', dryRun: false };

const options: AssessmentOptions = {
  requestThresholdDays: 365,
  ignoreFirstSeason: false,
  ignoreFirstEpisode: false,
  skipRequests: false,
  skipWatchHistory: false,
  defaultAction: 'delete',
};

const monitor: MonitorRecord = {
  canonicalId: 'show_test',
  seriesId: 42,
  monitored: true,
  seasons: [{ season: 1, monitored: true, episodeFileCount: 10, episodeCount: 10 }],
};

function assessment(overrides: Partial<AssessmentOptions> = {}, watched = false): ShowAssessment {
  return assessShow(
    makeShow(),
    { watch: { canonicalId: 'show_test', ...UNWATCHED_STATS, watched }, requests: [], monitor },
    { ...options, ...overrides },
    0
  );
}

function chooser(action: ActionType, confirmed = true): jest.Mocked<ActionChooser> {
  return {
    choose: jest.fn().mockResolvedValue(action),
    confirm: jest.fn().mockResolvedValue(confirmed),
  };
}

describe('ActionDispatcher', () => {
  let ctx: TestStore;
  let adapters: FakeAdapters;
  let gateway: SourceGateway;
  let history: ActionHistoryRepository;

  beforeEach(async () => {
    ctx = await createTestStore();
    adapters = createFakeAdapters();
    gateway = new SourceGateway(adapters, ctx.store, new IdentityMapper(ctx.store), FAST_RETRY);
    history = new ActionHistoryRepository(ctx.store);
  });

  afterEach(async () => {
    await ctx.close();
  });

  function dispatcher(extra: { deleteSeries?: boolean; chooser?: ActionChooser } = {}): ActionDispatcher {
    return new ActionDispatcher(gateway, history, {
      deleteSeries: extra.deleteSeries ?? false,
      ...(extra.chooser && { chooser: extra.chooser }),
      now: ctx.clock.now,
    });
  }

  function expectNoDestructiveCalls(): void {
    expect(adapters.plex.deleteShow).not.toHaveBeenCalled();
    expect(adapters.plex.deleteSeason).not.toHaveBeenCalled();
    expect(adapters.plex.deleteEpisode).not.toHaveBeenCalled();
    expect(adapters.sonarr.unmonitor).not.toHaveBeenCalled();
    expect(adapters.sonarr.delete).not.toHaveBeenCalled();
  }

  it('should simulate a dry run without destructive calls', async () => {
    const record = await dispatcher().apply(assessment(), AUTO_DRY);

    expect(record).toEqual({
      id: 1,
      canonicalId: 'show_test',
      action: 'delete',
      requestedAction: 'delete',
      simulated: true,
      actor: 'auto',
      outcome: 'simulated',
      error: null,
      steps: ['plex: delete show 100', 'sonarr: unmonitor series 42'],
      completedSteps: [],
      createdAt: ctx.clock.time,
    });
    expectNoDestructiveCalls();
  });

  it('should apply the plan in a real run', async () => {
    const record = await dispatcher().apply(assessment(), AUTO_LIVE);

    expect(record).toMatchObject({ action: 'delete', outcome: 'applied', simulated: false });
    expect(record.completedSteps).toEqual(['plex: delete show 100', 'sonarr: unmonitor series 42']);
    expect(adapters.plex.deleteShow).toHaveBeenCalledWith('100');
    expect(adapters.sonarr.unmonitor).toHaveBeenCalledWith(42);
    expect(adapters.sonarr.delete).not.toHaveBeenCalled();
  });

  it('should delete the series without files when configured to', async () => {
    await dispatcher({ deleteSeries: true }).apply(assessment(), AUTO_LIVE);

    expect(adapters.sonarr.delete).toHaveBeenCalledWith(42, false);
    expect(adapters.sonarr.unmonitor).not.toHaveBeenCalled();
  });

  it('should keep the first season for a partial action', async () => {
    const record = await dispatcher().apply(assessment({ defaultAction: 'keep_first_season' }), AUTO_LIVE);

    expect(record.steps).toEqual(['plex: delete season 2 of 100', 'sonarr: unmonitor series 42']);
    expect(adapters.plex.deleteSeason).toHaveBeenCalledWith('100', 2);
    expect(adapters.plex.deleteShow).not.toHaveBeenCalled();
  });

  it('should record a failed step as a keep and stop the plan', async () => {
    adapters.plex.deleteShow.mockRejectedValue(new AuthenticationError('token rejected'));

    const record = await dispatcher().apply(assessment(), AUTO_LIVE);

    expect(record).toMatchObject({
      action: 'keep',
      requestedAction: 'delete',
      outcome: 'failed',
      simulated: false,
      error: '"plex: delete show 100" failed: plex deleteShow failed after 1 attempt(s): token rejected',
      completedSteps: [],
    });
    expect(adapters.sonarr.unmonitor).not.toHaveBeenCalled();
  });

  it('should record the steps that went through before a later step failed', async () => {
    adapters.sonarr.unmonitor.mockRejectedValue(new AuthenticationError('bad key'));

    const record = await dispatcher().apply(assessment(), AUTO_LIVE);

    expect(adapters.plex.deleteShow).toHaveBeenCalledTimes(1);
    expect(record).toMatchObject({
      action: 'keep',
      requestedAction: 'delete',
      outcome: 'failed',
      error: '"sonarr: unmonitor series 42" failed: sonarr unmonitor failed after 1 attempt(s): bad key',
      steps: ['plex: delete show 100', 'sonarr: unmonitor series 42'],
      completedSteps: ['plex: delete show 100'],
    });

    const [stored] = await history.list('show_test');
    expect(stored?.completedSteps).toEqual(['plex: delete show 100']);
  });

  it('should keep excluded shows, even when asked interactively', async () => {
    const ask = chooser('delete');

    const record = await dispatcher({ chooser: ask }).apply(assessment({}, true), INTERACTIVE_LIVE);

    expect(record).toMatchObject({ action: 'keep', requestedAction: 'keep', outcome: 'excluded', actor: 'interactive' });
    expect(ask.choose).not.toHaveBeenCalled();
    expectNoDestructiveCalls();
  });

  it('should honour an interactive keep', async () => {
    const ask = chooser('keep');

    const record = await dispatcher({ chooser: ask }).apply(assessment(), INTERACTIVE_LIVE);

    expect(record).toMatchObject({ action: 'keep', requestedAction: 'keep', outcome: 'kept' });
    expect(ask.confirm).not.toHaveBeenCalled();
    expectNoDestructiveCalls();
  });

  it('should record a declined confirmation', async () => {
    const ask = chooser('delete', false);

    const record = await dispatcher({ chooser: ask }).apply(assessment(), INTERACTIVE_LIVE);

    expect(record).toMatchObject({ action: 'keep', requestedAction: 'delete', outcome: 'declined' });
    expect(ask.confirm).toHaveBeenCalledWith(expect.anything(), 'delete', [
      'plex: delete show 100',
      'sonarr: unmonitor series 42',
    ]);
    expectNoDestructiveCalls();
  });

  it('should refuse interactive mode without a chooser', async () => {
    await expect(dispatcher().apply(assessment(), INTERACTIVE_LIVE)).rejects.toBeInstanceOf(InvalidStateError);
  });

  it('should append every decision to the history', async () => {
    const dispatch = dispatcher();
    await dispatch.apply(assessment(), AUTO_DRY);
    ctx.clock.advance(1000);
    await dispatch.apply(assessment({}, true), AUTO_DRY);

    const records = await history.list('show_test');

    expect(records.map((r) => [r.id, r.action, r.outcome, r.createdAt])).toEqual([
      [1, 'delete', 'simulated', ctx.clock.time - 1000],
      [2, 'keep', 'excluded', ctx.clock.time],
    ]);
  });
});
