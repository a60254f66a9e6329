import { CacheStore, LIBRARY_SCAN_META_KEY } from '../cache/CacheStore.js';
import { IdentitySource, Show, ShowExternalIds, ShowSnapshot } from '../../types/models.js';
import { showSnapshotSchema } from '../../validation/recordSchemas.js';
import { buildTitleKey } from '../../utils/titleKey.js';
import { logger } from '../../utils/logger.js';
import { InvalidStateError } from '../../errors/index.js';

export interface ScannedShow {
  canonicalId: string;
  snapshot: ShowSnapshot;
}

export interface ScanSaveResult {
  saved: number;
  deactivated: number;
  scannedAt: number;
}

interface ShowRow {
  canonical_id: string;
  title: string;
  year: number | null;
  title_key: string;
  active: number;
  payload: string;
  fetched_at: number;
  first_seen_at: number;
  last_seen_at: number;
}

interface MappingRow {
  canonical_id: string;
  source_name: IdentitySource;
  source_id: string;
}

/**
 * Persistence for the show catalogue. A library scan is saved in a single
 * transaction: every show is updated and the missing ones are marked
 * inactive, or nothing changes at all.
 */
export class ShowRepository {
  constructor(private readonly store: CacheStore) {}

  async saveScan(shows: ScannedShow[]): Promise<ScanSaveResult> {
    return this.store.transaction(async (tx) => {
      const db = tx.connection;

      for (const { canonicalId, snapshot } of shows) {
        const result = await db.execute(
          `UPDATE shows
           SET title = ?, year = ?, title_key = ?, payload = ?, fetched_at = ?, active = 1, last_seen_at = ?
           WHERE canonical_id = ?`,
          [
            snapshot.title,
            snapshot.year,
            buildTitleKey(snapshot.title, snapshot.year),
            JSON.stringify(snapshot),
            tx.now,
            tx.now,
            canonicalId,
          ]
        );
        if (result.affectedRows === 0) {
          throw new InvalidStateError('resolved show', 'missing', `Show ${canonicalId} was never resolved`, {
            service: 'ShowRepository',
            operation: 'saveScan',
            entityId: canonicalId,
          });
        }
      }

      // Never deleted, only marked inactive
      const deactivated = await db.execute(
        'UPDATE shows SET active = 0 WHERE active = 1 AND last_seen_at < ?',
        [tx.now]
      );
      await tx.setMeta(LIBRARY_SCAN_META_KEY, String(tx.now));

      return { saved: shows.length, deactivated: deactivated.affectedRows, scannedAt: tx.now };
    }, 'library:scan');
  }

  async getLastScanAt(): Promise<number | null> {
    const value = await this.store.getMeta(LIBRARY_SCAN_META_KEY);
    if (value === null) {
      return null;
    }
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }

  /**
   * Whether the last full scan is recent enough to reuse
   */
  async isScanFresh(): Promise<boolean> {
    const lastScanAt = await this.getLastScanAt();
    return lastScanAt !== null && this.store.isFresh(lastScanAt, this.store.ttlFor('show'));
  }

  async listActive(): Promise<Show[]> {
    const rows = await this.store.connection.query<ShowRow>(
      'SELECT * FROM shows WHERE active = 1 AND merged_into IS NULL ORDER BY title_key, canonical_id'
    );
    const identifiers = await this.loadIdentifiers();

    const shows: Show[] = [];
    for (const row of rows) {
      const show = this.toShow(row, identifiers.get(row.canonical_id) ?? {});
      if (show) {
        shows.push(show);
      }
    }
    return shows;
  }

  async get(canonicalId: string): Promise<Show | null> {
    const row = await this.store.connection.get<ShowRow>('SELECT * FROM shows WHERE canonical_id = ?', [canonicalId]);
    if (!row) {
      return null;
    }
    const identifiers = await this.loadIdentifiers(canonicalId);
    return this.toShow(row, identifiers.get(canonicalId) ?? {});
  }

  private async loadIdentifiers(canonicalId?: string): Promise<Map<string, ShowExternalIds>> {
    const rows = canonicalId
      ? await this.store.connection.query<MappingRow>(
          'SELECT canonical_id, source_name, source_id FROM identity_mappings WHERE canonical_id = ? ORDER BY created_at, source_id',
          [canonicalId]
        )
      : await this.store.connection.query<MappingRow>(
          'SELECT canonical_id, source_name, source_id FROM identity_mappings ORDER BY created_at, source_id'
        );

    const byShow = new Map<string, ShowExternalIds>();
    for (const row of rows) {
      const ids = byShow.get(row.canonical_id) ?? {};
      if (ids[row.source_name] === undefined) {
        ids[row.source_name] = row.source_id;
      }
      byShow.set(row.canonical_id, ids);
    }
    return byShow;
  }

  private toShow(row: ShowRow, identifiers: ShowExternalIds): Show | null {
    let raw: unknown;
    try {
      raw = JSON.parse(row.payload);
    } catch {
      raw = undefined;
    }

    // Stubs minted before their first scan have no snapshot yet
    if (raw === null) {
      return null;
    }

    const parsed = showSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn('[ShowRepository] Ignoring show with unreadable snapshot', {
        canonicalId: row.canonical_id,
        issues: parsed.error.issues.length,
      });
      return null;
    }

    return {
      ...parsed.data,
      canonicalId: row.canonical_id,
      titleKey: row.title_key,
      identifiers,
      active: row.active === 1,
      firstSeenAt: row.first_seen_at,
      lastSeenAt: row.last_seen_at,
      fetchedAt: row.fetched_at,
    };
  }
}
