/**
 * Title normalisation for cross-source matching
 *
 * Two records share a title key when their titles differ only in case,
 * accents, punctuation, spacing or a trailing "(year)".
 *
 * @example
 * buildTitleKey('The Office (US)', 2005)   // => "the office us|2005"
 * buildTitleKey('Pokémon: Indigo League', 1997) // => "pokemon indigo league|1997"
 */

const TRAILING_YEAR = /\s*\((?:19|20)\d{2}\)\s*$/;

export function normalizeTitle(raw: string): string {
  let s = (raw ?? '').trim();
  if (!s) return '';

  s = s.normalize('NFKC').replace(TRAILING_YEAR, '');

  // Strip accents
  s = s.normalize('NFD').replace(/\p{M}+/gu, '');

  return s
    .toLowerCase()
    .replace(/[‘’ʼ']/g, '')
    .replace(/&/g, ' and ')
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function buildTitleKey(title: string, year: number | null | undefined): string {
  return `${normalizeTitle(title)}|${year ?? ''}`;
}
