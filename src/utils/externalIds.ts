/**
 * External ID Parsing Utilities
 *
 * Media servers report metadata agent ids as URIs. Both the modern form
 * (`tvdb://121361`) and the legacy agent form
 * (`com.plexapp.agents.thetvdb://121361/1/2?lang=en`) are understood.
 */

import type { ExternalIds, StrongIdSource } from '../types/models.js';

/**
 * URI schemes that carry a strong external id
 */
const SCHEME_SOURCES: Record<string, StrongIdSource> = {
  tvdb: 'tvdb',
  thetvdb: 'tvdb',
  'com.plexapp.agents.thetvdb': 'tvdb',
  tmdb: 'tmdb',
  themoviedb: 'tmdb',
  'com.plexapp.agents.themoviedb': 'tmdb',
  imdb: 'imdb',
  'com.plexapp.agents.imdb': 'imdb',
};

/**
 * Parse a single guid URI into a source and id
 *
 * @example
 * parseGuid('tvdb://393206') // => { source: 'tvdb', id: '393206' }
 * parseGuid('com.plexapp.agents.thetvdb://121361/2/4?lang=en') // => { source: 'tvdb', id: '121361' }
 * parseGuid('plex://show/5d9c086c46115600200aa2fe') // => null
 */
export function parseGuid(guid: string): { source: StrongIdSource; id: string } | null {
  const match = guid.trim().match(/^([a-z0-9.]+):\/\/([^/?#]+)/i);
  if (!match) {
    return null;
  }

  const [, scheme, rawId] = match;
  if (scheme === undefined || rawId === undefined) {
    return null;
  }
  const source = SCHEME_SOURCES[scheme.toLowerCase()];
  if (!source) {
    return null;
  }

  const id = normalizeExternalId(source, rawId);
  return id ? { source, id } : null;
}

/**
 * Collect every strong id from a list of guid URIs. The first id seen for
 * a source wins.
 */
export function parseGuids(guids: Iterable<string>): ExternalIds {
  const ids: ExternalIds = {};
  for (const guid of guids) {
    const parsed = parseGuid(guid);
    if (parsed && ids[parsed.source] === undefined) {
      ids[parsed.source] = parsed.id;
    }
  }
  return ids;
}

/**
 * Canonical string form of an external id: numeric ids without leading
 * zeros, IMDb ids lowercase with their `tt` prefix.
 */
export function normalizeExternalId(source: StrongIdSource, raw: string | number): string | null {
  const value = String(raw).trim();
  if (!value) {
    return null;
  }

  if (source === 'imdb') {
    const imdb = value.toLowerCase();
    return /^tt\d+$/.test(imdb) ? imdb : null;
  }

  if (!/^\d+$/.test(value)) {
    return null;
  }
  const numeric = Number(value);
  return numeric > 0 ? String(numeric) : null;
}
