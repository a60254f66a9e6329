import { normalizeExternalId, parseGuid, parseGuids } from '../../src/utils/externalIds.js';

describe('parseGuid', () => {
  it('should parse modern agent guids', () => {
    expect(parseGuid('tvdb://393206')).toEqual({ source: 'tvdb', id: '393206' });
    expect(parseGuid('tmdb://1399')).toEqual({ source: 'tmdb', id: '1399' });
    expect(parseGuid('imdb://tt0944947')).toEqual({ source: 'imdb', id: 'tt0944947' });
  });

  it('should parse legacy agent guids with path and query', () => {
    expect(parseGuid('com.plexapp.agents.thetvdb://121361/2/4?lang=en')).toEqual({ source: 'tvdb', id: '121361' });
  });

  it('should ignore plex-internal guids', () => {
    expect(parseGuid('plex://show/5d9c086c46115600200aa2fe')).toBeNull();
  });

  it('should reject malformed ids', () => {
    expect(parseGuid('tvdb://abc')).toBeNull();
    expect(parseGuid('imdb://0944947')).toBeNull();
    expect(parseGuid('not a guid')).toBeNull();
  });
});

describe('parseGuids', () => {
  it('should keep the first id seen per source', () => {
    expect(parseGuids(['tvdb://1', 'tvdb://2', 'imdb://tt7', 'plex://show/x'])).toEqual({ tvdb: '1', imdb: 'tt7' });
  });
});

describe('normalizeExternalId', () => {
  it('should strip leading zeros from numeric ids', () => {
    expect(normalizeExternalId('tvdb', '000123')).toBe('123');
    expect(normalizeExternalId('tmdb', 42)).toBe('42');
  });

  it('should reject zero', () => {
    expect(normalizeExternalId('tvdb', '0')).toBeNull();
  });

  it('should lowercase imdb ids', () => {
    expect(normalizeExternalId('imdb', 'TT0944947')).toBe('tt0944947');
  });
});
