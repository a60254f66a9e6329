import { TautulliClient } from '../../src/services/sources/tautulli/TautulliClient.js';
import { InvalidResponseError } from '../../src/errors/index.js';
import { HttpStub, openLimiter } from '../utils/httpStub.js';

const config = { baseUrl: 'http://tautulli.test:8181', apiKey: 'test-secret', timeoutMs: 1000 };

function success(data: unknown) {
  return { data: { response: { result: 'success', message: null, data } } };
}

describe('TautulliClient', () => {
  let http: HttpStub;
  let client: TautulliClient;

  function respond(stats: unknown, history: unknown = { data: [] }): void {
    http.on('get', '/api/v2', (request) =>
      request.params?.cmd === 'get_history' ? success(history) : success(stats)
    );
  }

  beforeEach(() => {
    http = new HttpStub();
    client = new TautulliClient(config, openLimiter('tautulli'), http.adapter);
  });

  it('should report a show with plays as watched', async () => {
    respond(
      [
        { query_days: 1, total_plays: 0, total_time: 0 },
        { query_days: 30, total_plays: 2, total_time: 3600 },
        { query_days: 0, total_plays: 5, total_time: 9000 },
      ],
      { data: [{ date: 1700000000, stopped: 1700001800 }] }
    );

    const stats = await client.getWatchStats({ plex: '100' });

    expect(stats).toEqual({
      watched: true,
      totalPlays: 5,
      totalTimeSeconds: 9000,
      lastWatchedAt: 1700001800000,
      granularity: 'show',
    });
  });

  it('should query by rating key with the api key', async () => {
    respond([{ query_days: 0, total_plays: 1, total_time: 60 }], { data: [{ date: 1700000000 }] });

    const stats = await client.getWatchStats({ plex: '100' });

    expect(stats.lastWatchedAt).toBe(1700000000000);
    expect(http.requests.map((request) => request.params)).toEqual([
      { apikey: 'test-secret', cmd: 'get_item_watch_time_stats', rating_key: '100' },
      {
        apikey: 'test-secret',
        cmd: 'get_history',
        grandparent_rating_key: '100',
        length: 1,
        order_column: 'date',
        order_dir: 'desc',
      },
    ]);
  });

  it('should report zero plays as unwatched without reading history', async () => {
    respond([{ query_days: 0, total_plays: 0, total_time: 0 }]);

    const stats = await client.getWatchStats({ plex: '100' });

    expect(stats).toEqual({ watched: false, totalPlays: 0, totalTimeSeconds: 0, lastWatchedAt: null, granularity: 'show' });
    expect(http.requests).toHaveLength(1);
  });

  it('should report a show without a rating key as unwatched', async () => {
    const stats = await client.getWatchStats({ tvdb: '5000' });

    expect(stats.watched).toBe(false);
    expect(http.requests).toHaveLength(0);
  });

  it('should reject an error envelope', async () => {
    http.on('get', '/api/v2', { data: { response: { result: 'error', message: 'Invalid apikey', data: [] } } });

    const error = await client.getWatchStats({ plex: '100' }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(InvalidResponseError);
    expect(error).toMatchObject({ message: 'Tautulli get_item_watch_time_stats failed: Invalid apikey' });
  });
});
