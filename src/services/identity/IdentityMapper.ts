/**
 * Identity Mapper
 *
 * Sole authority over canonical show ids. A (source, source id) pair is
 * resolved in order:
 *   1. exact mapping (following merges)
 *   2. strong external ids (tvdb, tmdb, imdb) from the hints
 *   3. normalised title + year, when no strong id contradicts it
 *   4. mint a new id
 * Each resolution runs in one store transaction under the global write
 * lock, so concurrent callers for the same show cannot mint twice.
 */

import { createHash } from 'crypto';
import { CacheStore, CacheTransaction } from '../cache/CacheStore.js';
import { DatabaseConnection } from '../../types/database.js';
import {
  ExternalIds,
  IdentitySource,
  ShowExternalIds,
  STRONG_ID_SOURCES,
} from '../../types/models.js';
import { buildTitleKey } from '../../utils/titleKey.js';
import { normalizeExternalId } from '../../utils/externalIds.js';
import { logger } from '../../utils/logger.js';
import { AmbiguousIdentityError, ValidationError } from '../../errors/index.js';

export interface IdentityHints extends ExternalIds {
  title?: string;
  year?: number | null;
}

export interface UnresolvedIdentity {
  sourceName: IdentitySource;
  sourceId: string;
  title: string | null;
  candidates: string[];
  flaggedAt: number;
}

type Resolution =
  | { kind: 'resolved'; canonicalId: string; minted: boolean }
  | { kind: 'ambiguous'; candidates: string[] };

const MAX_MERGE_DEPTH = 32;

/**
 * Deterministic canonical id for the first record that introduced a show
 */
export function mintCanonicalId(sourceName: IdentitySource, sourceId: string): string {
  const digest = createHash('sha1').update(`${sourceName}:${sourceId}`).digest('hex');
  return `show_${digest.slice(0, 16)}`;
}

export class IdentityMapper {
  constructor(private readonly store: CacheStore) {}

  async resolve(sourceName: IdentitySource, sourceId: string, hints: IdentityHints = {}): Promise<string> {
    const id = sourceId.trim();
    if (!id) {
      throw new ValidationError(`Empty ${sourceName} id`, { service: 'IdentityMapper', operation: 'resolve' });
    }

    const strongIds = this.normalizeHints(hints);
    const resolution = await this.store.transaction(
      (tx) => this.resolveInTransaction(tx, sourceName, id, hints, strongIds),
      'identity:resolve'
    );

    if (resolution.kind === 'ambiguous') {
      logger.warn('[IdentityMapper] Ambiguous identity flagged for review', {
        sourceName,
        sourceId: id,
        title: hints.title,
        candidates: resolution.candidates,
      });
      throw new AmbiguousIdentityError(sourceName, id, resolution.candidates, undefined, {
        service: 'IdentityMapper',
        operation: 'resolve',
        metadata: { title: hints.title },
      });
    }

    if (resolution.minted) {
      logger.debug('[IdentityMapper] Minted canonical id', { sourceName, sourceId: id, canonicalId: resolution.canonicalId });
    }
    return resolution.canonicalId;
  }

  private async resolveInTransaction(
    tx: CacheTransaction,
    sourceName: IdentitySource,
    sourceId: string,
    hints: IdentityHints,
    strongIds: ExternalIds
  ): Promise<Resolution> {
    const db = tx.connection;

    // 1. Exact match
    const existing = await this.lookup(db, sourceName, sourceId);
    if (existing) {
      const canonicalId = await this.followMerges(db, existing);
      await this.extendMappings(tx, canonicalId, strongIds);
      await this.clearReview(db, sourceName, sourceId);
      return { kind: 'resolved', canonicalId, minted: false };
    }

    // 2. Strong external ids
    const strongCandidates = new Set<string>();
    for (const source of STRONG_ID_SOURCES) {
      const value = strongIds[source];
      if (value === undefined) continue;
      const mapped = await this.lookup(db, source, value);
      if (mapped) {
        strongCandidates.add(await this.followMerges(db, mapped));
      }
    }

    if (strongCandidates.size > 1) {
      return this.flagAmbiguous(tx, sourceName, sourceId, hints, strongIds, [...strongCandidates]);
    }

    let canonicalId: string | undefined = [...strongCandidates][0];

    // 3. Title + year, only when the candidate's own ids agree. A candidate
    // that already has a record from the same source is a different show.
    if (!canonicalId && hints.title) {
      const titleKey = buildTitleKey(hints.title, hints.year);
      const rows = await db.query<{ canonical_id: string }>(
        'SELECT canonical_id FROM shows WHERE title_key = ? AND merged_into IS NULL ORDER BY canonical_id',
        [titleKey]
      );

      const compatible: string[] = [];
      for (const row of rows) {
        const known = await this.getIdentifiersWith(db, row.canonical_id);
        const conflicts =
          known[sourceName] !== undefined ||
          STRONG_ID_SOURCES.some(
            (source) =>
              strongIds[source] !== undefined && known[source] !== undefined && known[source] !== strongIds[source]
          );
        if (!conflicts) {
          compatible.push(row.canonical_id);
        }
      }

      if (compatible.length > 1) {
        return this.flagAmbiguous(tx, sourceName, sourceId, hints, strongIds, compatible);
      }
      canonicalId = compatible[0];
    }

    // 4. Mint
    let minted = false;
    if (!canonicalId) {
      canonicalId = mintCanonicalId(sourceName, sourceId);
      minted = true;
      const title = hints.title?.trim() || `${sourceName}:${sourceId}`;
      await db.execute(
        `INSERT OR IGNORE INTO shows (canonical_id, title, year, title_key, active, first_seen_at, last_seen_at)
         VALUES (?, ?, ?, ?, 1, ?, ?)`,
        [canonicalId, title, hints.year ?? null, buildTitleKey(title, hints.year), tx.now, tx.now]
      );
    }

    await this.insertMapping(db, sourceName, sourceId, canonicalId, tx.now);
    await this.extendMappings(tx, canonicalId, strongIds);
    await this.clearReview(db, sourceName, sourceId);
    return { kind: 'resolved', canonicalId, minted };
  }

  /**
   * Add hint ids that are not mapped yet. A hint already mapped to another
   * show is left alone: the mapper never guesses.
   */
  private async extendMappings(tx: CacheTransaction, canonicalId: string, strongIds: ExternalIds): Promise<void> {
    for (const source of STRONG_ID_SOURCES) {
      const value = strongIds[source];
      if (value === undefined) continue;

      const mapped = await this.lookup(tx.connection, source, value);
      if (!mapped) {
        await this.insertMapping(tx.connection, source, value, canonicalId, tx.now);
        continue;
      }

      const target = await this.followMerges(tx.connection, mapped);
      if (target !== canonicalId) {
        logger.warn('[IdentityMapper] External id already belongs to another show', {
          source,
          id: value,
          canonicalId,
          existing: target,
        });
      }
    }
  }

  private async flagAmbiguous(
    tx: CacheTransaction,
    sourceName: IdentitySource,
    sourceId: string,
    hints: IdentityHints,
    strongIds: ExternalIds,
    candidates: string[]
  ): Promise<Resolution> {
    const sorted = [...candidates].sort();
    await tx.connection.execute(
      `INSERT INTO identity_reviews (source_name, source_id, title, candidates, hints, flagged_at)
       VALUES (?, ?, ?, ?, ?, ?)
       ON CONFLICT(source_name, source_id) DO UPDATE SET
         title = excluded.title, candidates = excluded.candidates, hints = excluded.hints, flagged_at = excluded.flagged_at`,
      [
        sourceName,
        sourceId,
        hints.title ?? null,
        JSON.stringify(sorted),
        JSON.stringify({ ...strongIds, year: hints.year ?? null }),
        tx.now,
      ]
    );
    return { kind: 'ambiguous', candidates: sorted };
  }

  /**
   * Fold `fromId` into `intoId`. One-directional and idempotent: repeating
   * it, or merging an id that already points at `intoId`, changes nothing.
   * Action history stays attached to `fromId`; cached records are dropped.
   */
  async merge(fromId: string, intoId: string): Promise<string> {
    return this.store.transaction(async (tx) => {
      const db = tx.connection;
      const target = await this.followMerges(db, intoId);
      const source = await this.followMerges(db, fromId);

      if (source === target) {
        return target;
      }

      for (const id of [source, target]) {
        const row = await db.get<{ canonical_id: string }>('SELECT canonical_id FROM shows WHERE canonical_id = ?', [id]);
        if (!row) {
          throw new ValidationError(`Unknown canonical id: ${id}`, {
            service: 'IdentityMapper',
            operation: 'merge',
            entityId: id,
          });
        }
      }

      await db.execute('UPDATE identity_mappings SET canonical_id = ? WHERE canonical_id = ?', [target, source]);
      await db.execute(
        'INSERT OR REPLACE INTO identity_merges (from_canonical_id, into_canonical_id, merged_at) VALUES (?, ?, ?)',
        [source, target, tx.now]
      );
      await db.execute('UPDATE shows SET merged_into = ?, active = 0 WHERE canonical_id = ?', [target, source]);

      for (const entityType of ['watch', 'request', 'monitor'] as const) {
        await tx.invalidate(entityType, source);
      }

      logger.info('[IdentityMapper] Merged canonical ids', { from: source, into: target });
      return target;
    }, 'identity:merge');
  }

  /**
   * Manually attach a source record to a show, resolving its review entry
   */
  async link(sourceName: IdentitySource, sourceId: string, canonicalId: string): Promise<void> {
    await this.store.transaction(async (tx) => {
      const target = await this.followMerges(tx.connection, canonicalId);
      await tx.connection.execute(
        `INSERT INTO identity_mappings (source_name, source_id, canonical_id, created_at) VALUES (?, ?, ?, ?)
         ON CONFLICT(source_name, source_id) DO UPDATE SET canonical_id = excluded.canonical_id`,
        [sourceName, sourceId, target, tx.now]
      );
      await this.clearReview(tx.connection, sourceName, sourceId);
    }, 'identity:link');
  }

  async getIdentifiers(canonicalId: string): Promise<ShowExternalIds> {
    return this.getIdentifiersWith(this.store.connection, canonicalId);
  }

  async listUnresolved(): Promise<UnresolvedIdentity[]> {
    const rows = await this.store.connection.query<{
      source_name: IdentitySource;
      source_id: string;
      title: string | null;
      candidates: string;
      flagged_at: number;
    }>('SELECT source_name, source_id, title, candidates, flagged_at FROM identity_reviews ORDER BY flagged_at, source_id');

    return rows.map((row) => ({
      sourceName: row.source_name,
      sourceId: row.source_id,
      title: row.title,
      candidates: parseStringArray(row.candidates),
      flaggedAt: row.flagged_at,
    }));
  }

  private async getIdentifiersWith(db: DatabaseConnection, canonicalId: string): Promise<ShowExternalIds> {
    const rows = await db.query<{ source_name: IdentitySource; source_id: string }>(
      'SELECT source_name, source_id FROM identity_mappings WHERE canonical_id = ? ORDER BY created_at, source_id',
      [canonicalId]
    );
    const ids: ShowExternalIds = {};
    for (const row of rows) {
      if (ids[row.source_name] === undefined) {
        ids[row.source_name] = row.source_id;
      }
    }
    return ids;
  }

  private async lookup(db: DatabaseConnection, sourceName: IdentitySource, sourceId: string): Promise<string | null> {
    const row = await db.get<{ canonical_id: string }>(
      'SELECT canonical_id FROM identity_mappings WHERE source_name = ? AND source_id = ?',
      [sourceName, sourceId]
    );
    return row?.canonical_id ?? null;
  }

  private async followMerges(db: DatabaseConnection, canonicalId: string): Promise<string> {
    let current = canonicalId;
    for (let depth = 0; depth < MAX_MERGE_DEPTH; depth++) {
      const row = await db.get<{ into_canonical_id: string }>(
        'SELECT into_canonical_id FROM identity_merges WHERE from_canonical_id = ?',
        [current]
      );
      if (!row) {
        return current;
      }
      current = row.into_canonical_id;
    }
    return current;
  }

  private async insertMapping(
    db: DatabaseConnection,
    sourceName: IdentitySource,
    sourceId: string,
    canonicalId: string,
    now: number
  ): Promise<void> {
    await db.execute(
      'INSERT OR IGNORE INTO identity_mappings (source_name, source_id, canonical_id, created_at) VALUES (?, ?, ?, ?)',
      [sourceName, sourceId, canonicalId, now]
    );
  }

  private async clearReview(db: DatabaseConnection, sourceName: IdentitySource, sourceId: string): Promise<void> {
    await db.execute('DELETE FROM identity_reviews WHERE source_name = ? AND source_id = ?', [sourceName, sourceId]);
  }

  private normalizeHints(hints: IdentityHints): ExternalIds {
    const ids: ExternalIds = {};
    for (const source of STRONG_ID_SOURCES) {
      const raw = hints[source];
      if (raw === undefined) continue;
      const value = normalizeExternalId(source, raw);
      if (value) {
        ids[source] = value;
      }
    }
    return ids;
  }
}

function parseStringArray(raw: string): string[] {
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter((item): item is string => typeof item === 'string') : [];
  } catch {
    return [];
  }
}
