import { OverseerrClient } from '../../src/services/sources/overseerr/OverseerrClient.js';
import { InvalidResponseError } from '../../src/errors/index.js';
import { TestClock } from '../utils/testDatabase.js';
import { HttpStub, openLimiter } from '../utils/httpStub.js';

const config = {
  baseUrl: 'http://overseerr.test:5055',
  apiKey: 'test-secret',
  timeoutMs: 1000,
  requestsCacheTtlMs: 60 * 60 * 1000,
};

function tvRequest(id: number, createdAt: string, media: Record<string, unknown>, status = 2) {
  return {
    id,
    type: 'tv',
    status,
    createdAt,
    requestedBy: { displayName: null, username: `user${id}`, email: `user${id}@example.test` },
    media,
  };
}

const REQUESTS = [
  tvRequest(1, '2025-01-01T00:00:00.000Z', { tvdbId: 5000 }),
  tvRequest(2, '2025-06-01T00:00:00.000Z', { tmdbId: 9000, tvdbId: null }, 5),
  { ...tvRequest(3, '2025-07-01T00:00:00.000Z', { tvdbId: 5000 }), type: 'movie' },
  tvRequest(4, 'not a date', { tvdbId: 7000 }),
  tvRequest(5, '2025-03-01T00:00:00.000Z', { ratingKey: '100' }, 1),
  tvRequest(6, '2025-02-01T00:00:00.000Z', { tvdbId: 6000 }),
];

describe('OverseerrClient', () => {
  let http: HttpStub;
  let clock: TestClock;
  let client: OverseerrClient;

  beforeEach(() => {
    http = new HttpStub().on('get', '/api/v1/request', {
      data: { pageInfo: { pages: 1, page: 1, results: REQUESTS.length }, results: REQUESTS },
    });
    clock = new TestClock();
    client = new OverseerrClient(config, openLimiter('overseerr'), http.adapter, clock.now);
  });

  it('should return the TV requests of a show, newest first', async () => {
    const requests = await client.getRequests({ plex: '100', tvdb: '5000', tmdb: '9000' });

    expect(requests).toEqual([
      { requestId: 2, requestedAt: Date.parse('2025-06-01T00:00:00.000Z'), requester: 'user2', status: 'completed' },
      { requestId: 5, requestedAt: Date.parse('2025-03-01T00:00:00.000Z'), requester: 'user5', status: 'pending' },
      { requestId: 1, requestedAt: Date.parse('2025-01-01T00:00:00.000Z'), requester: 'user1', status: 'approved' },
    ]);
  });

  it('should return nothing for a show nobody requested', async () => {
    expect(await client.getRequests({ tvdb: '1234' })).toEqual([]);
  });

  it('should reject a request for the show whose date cannot be read', async () => {
    const result = client.getRequests({ tvdb: '7000' });

    await expect(result).rejects.toBeInstanceOf(InvalidResponseError);
    await expect(client.getRequests({ tvdb: '7000' })).rejects.toThrow(
      'Request 4 has an unreadable date: "not a date"'
    );
  });

  it('should load the request list once per TTL', async () => {
    await Promise.all([client.getRequests({ tvdb: '5000' }), client.getRequests({ tvdb: '6000' })]);
    await client.getRequests({ tvdb: '5000' });
    expect(http.requests).toHaveLength(1);

    clock.advance(config.requestsCacheTtlMs);
    await client.getRequests({ tvdb: '5000' });
    expect(http.requests).toHaveLength(2);
    expect(http.requests[0]?.headers.get('X-Api-Key')).toBe('test-secret');
  });

  it('should page through every request', async () => {
    const firstPage = Array.from({ length: 100 }, (_, i) =>
      tvRequest(1000 + i, '2024-01-01T00:00:00.000Z', { tvdbId: 1 })
    );
    http.on('get', '/api/v1/request', (request) => ({
      data:
        request.params?.skip === 0
          ? { pageInfo: { pages: 2, page: 1, results: 101 }, results: firstPage }
          : { pageInfo: { pages: 2, page: 2, results: 101 }, results: [tvRequest(7, '2024-02-01T00:00:00.000Z', { tvdbId: 1 })] },
    }));

    const requests = await client.getRequests({ tvdb: '1' });

    expect(requests).toHaveLength(101);
    expect(requests[0]?.requestId).toBe(7);
    expect(http.requests.map((request) => request.params)).toEqual([
      { take: 100, skip: 0, sort: 'modified', filter: 'all' },
      { take: 100, skip: 100, sort: 'modified', filter: 'all' },
    ]);
  });

  it('should surface server errors', async () => {
    http.on('get', '/api/v1/request', { status: 503 });

    await expect(client.getRequests({ tvdb: '5000' })).rejects.toThrow('overseerr returned 503');
  });
});
