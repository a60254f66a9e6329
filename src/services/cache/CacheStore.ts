/**
 * Cache Store
 *
 * Durable TTL cache over the SQLite database. Reads are plain queries;
 * every write goes through transaction(), which holds the process-wide
 * write lock, commits all-or-nothing and retries a failed commit once.
 *
 * Entity types and their tables:
 *   show    -> shows (payload column; rows are never deleted)
 *   watch   -> watch_records
 *   request -> request_records
 *   monitor -> monitor_records
 */

import path from 'path';
import { promises as fs } from 'fs';
import { DatabaseManager } from '../../database/DatabaseManager.js';
import { SqliteConnection } from '../../database/connections/SqliteConnection.js';
import { MigrationRunner } from '../../database/MigrationRunner.js';
import { DatabaseConnection } from '../../types/database.js';
import { CacheConfig, CacheEntityType } from '../../config/types.js';
import { logger } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import {
  CacheCorruptionError,
  DatabaseError,
  InvalidStateError,
  ResourceNotFoundError,
  TransactionFailureError,
  ValidationError,
} from '../../errors/index.js';

export const CACHE_ENTITY_TYPES: readonly CacheEntityType[] = ['show', 'watch', 'request', 'monitor'];

const ENTITY_TABLES: Record<CacheEntityType, string> = {
  show: 'shows',
  watch: 'watch_records',
  request: 'request_records',
  monitor: 'monitor_records',
};

const HOUR_MS = 60 * 60 * 1000;
const MAX_TRANSACTION_ATTEMPTS = 2;

export const LIBRARY_SCAN_META_KEY = 'library_scan';

export interface CacheEntry {
  entityType: CacheEntityType;
  canonicalId: string;
  payload: unknown;
  fetchedAt: number;
}

export interface CacheStoreOptions extends CacheConfig {
  backupDir: string;
  /** Clock, injectable for tests */
  now?: () => number;
}

/**
 * Write handle passed to transaction callbacks. Everything done through it
 * commits or rolls back together.
 */
export interface CacheTransaction {
  readonly connection: DatabaseConnection;
  /** Timestamp shared by every write in this transaction */
  readonly now: number;
  put(entityType: CacheEntityType, canonicalId: string, payload: unknown): Promise<void>;
  invalidate(entityType: CacheEntityType, target: string | 'all'): Promise<number>;
  setMeta(key: string, value: string): Promise<void>;
}

export interface IntegrityReport {
  ok: boolean;
  /** Output of PRAGMA integrity_check other than "ok" */
  sqlite: string[];
  /** Canonical ids with action history but no show row */
  orphanActions: string[];
  orphanMappings: number;
  orphanRecords: Record<CacheEntityType, number>;
  corruptPayloads: Record<CacheEntityType, number>;
  problems: string[];
}

export interface RepairResult {
  reindexed: boolean;
  restoredShows: number;
  removedMappings: number;
  removedRecords: number;
  clearedPayloads: number;
  /** Entity types whose cache had to be dropped wholesale */
  invalidated: CacheEntityType[];
  remaining: IntegrityReport;
}

interface PayloadRow {
  payload: string;
  fetched_at: number;
}

interface CountRow {
  count: number;
}

function emptyCounts(): Record<CacheEntityType, number> {
  return { show: 0, watch: 0, request: 0, monitor: 0 };
}

export class CacheStore {
  private readonly now: () => number;
  /** Entries written before this instant are stale under force refresh */
  private readonly runStartedAt: number;

  constructor(
    private readonly db: DatabaseManager,
    private readonly options: CacheStoreOptions
  ) {
    this.now = options.now ?? Date.now;
    this.runStartedAt = this.now();
  }

  /**
   * Connection for reads outside a transaction
   */
  get connection(): DatabaseConnection {
    return this.db.getConnection();
  }

  get forceRefresh(): boolean {
    return this.options.forceRefresh;
  }

  /**
   * TTL in milliseconds for an entity type
   */
  ttlFor(entityType: CacheEntityType): number {
    return (this.options.entityTtlHours[entityType] ?? this.options.ttlHours) * HOUR_MS;
  }

  /**
   * Whether a record fetched at `fetchedAt` may still be served
   */
  isFresh(fetchedAt: number, ttlMs: number): boolean {
    if (fetchedAt <= 0) {
      return false;
    }
    // Force refresh: only what this run has already rewritten counts
    if (this.options.forceRefresh && fetchedAt < this.runStartedAt) {
      return false;
    }
    return this.now() - fetchedAt <= ttlMs;
  }

  /**
   * Cached payload, or null when missing, expired or unreadable.
   * Callers treat null as "go fetch".
   */
  async get(
    entityType: CacheEntityType,
    canonicalId: string,
    ttlMs: number = this.ttlFor(entityType)
  ): Promise<CacheEntry | null> {
    const row = await this.db.get<PayloadRow>(
      `SELECT payload, fetched_at FROM ${ENTITY_TABLES[entityType]} WHERE canonical_id = ?`,
      [canonicalId]
    );

    if (!row || !this.isFresh(row.fetched_at, ttlMs)) {
      return null;
    }

    try {
      const payload: unknown = JSON.parse(row.payload);
      if (payload === null) {
        return null;
      }
      return { entityType, canonicalId, payload, fetchedAt: row.fetched_at };
    } catch (error) {
      logger.warn('[CacheStore] Unreadable cache payload treated as missing', {
        entityType,
        canonicalId,
        error: getErrorMessage(error),
      });
      return null;
    }
  }

  /**
   * Overwrite one entry in its own transaction
   */
  async put(entityType: CacheEntityType, canonicalId: string, payload: unknown): Promise<void> {
    await this.transaction((tx) => tx.put(entityType, canonicalId, payload), `put:${entityType}`);
  }

  async invalidate(entityType: CacheEntityType, target: string | 'all'): Promise<number> {
    return this.transaction((tx) => tx.invalidate(entityType, target), `invalidate:${entityType}`);
  }

  async getMeta(key: string): Promise<string | null> {
    const row = await this.db.get<{ value: string }>('SELECT value FROM cache_meta WHERE key = ?', [key]);
    return row?.value ?? null;
  }

  /**
   * Run `fn` in one transaction under the write lock. A database failure is
   * retried once; a second failure (or a non-retryable one) becomes
   * TransactionFailureError. Other errors are rethrown unchanged after
   * rollback.
   */
  async transaction<T>(fn: (tx: CacheTransaction) => Promise<T>, operation = 'transaction'): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.db.transaction((connection) => fn(this.createTransaction(connection)));
      } catch (error) {
        if (!(error instanceof DatabaseError) || error instanceof TransactionFailureError) {
          throw error;
        }

        if (error.retryable && attempt < MAX_TRANSACTION_ATTEMPTS) {
          logger.warn('[CacheStore] Transaction did not commit, retrying', {
            operation,
            attempt,
            error: error.message,
          });
          continue;
        }

        logger.error('[CacheStore] Transaction failed', { operation, attempt, error: error.message });
        throw new TransactionFailureError(
          attempt,
          `Store transaction '${operation}' did not commit: ${error.message}`,
          { service: 'CacheStore', operation },
          error
        );
      }
    }
  }

  private createTransaction(connection: DatabaseConnection): CacheTransaction {
    const now = this.now();

    return {
      connection,
      now,
      put: async (entityType, canonicalId, payload) => {
        const serialized = JSON.stringify(payload ?? null);

        if (entityType === 'show') {
          const result = await connection.execute(
            'UPDATE shows SET payload = ?, fetched_at = ? WHERE canonical_id = ?',
            [serialized, now, canonicalId]
          );
          if (result.affectedRows === 0) {
            // Show rows are minted by the identity mapper only
            throw new InvalidStateError('existing show', 'missing', `Unknown show: ${canonicalId}`, {
              service: 'CacheStore',
              operation: 'put',
              entityId: canonicalId,
            });
          }
          return;
        }

        await connection.execute(
          `INSERT INTO ${ENTITY_TABLES[entityType]} (canonical_id, payload, fetched_at)
           VALUES (?, ?, ?)
           ON CONFLICT(canonical_id) DO UPDATE SET payload = excluded.payload, fetched_at = excluded.fetched_at`,
          [canonicalId, serialized, now]
        );
      },
      invalidate: async (entityType, target) => {
        if (entityType === 'show') {
          if (target === 'all') {
            await connection.execute('DELETE FROM cache_meta WHERE key = ?', [LIBRARY_SCAN_META_KEY]);
            const result = await connection.execute('UPDATE shows SET fetched_at = 0');
            return result.affectedRows;
          }
          const result = await connection.execute('UPDATE shows SET fetched_at = 0 WHERE canonical_id = ?', [
            target,
          ]);
          return result.affectedRows;
        }

        const table = ENTITY_TABLES[entityType];
        const result =
          target === 'all'
            ? await connection.execute(`DELETE FROM ${table}`)
            : await connection.execute(`DELETE FROM ${table} WHERE canonical_id = ?`, [target]);
        return result.affectedRows;
      },
      setMeta: async (key, value) => {
        await connection.execute(
          `INSERT INTO cache_meta (key, value, updated_at) VALUES (?, ?, ?)
           ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`,
          [key, value, now]
        );
      },
    };
  }

  // ============================================
  // INTEGRITY / REPAIR
  // ============================================

  async integrityCheck(): Promise<IntegrityReport> {
    const problems: string[] = [];

    const pragmaRows = await this.db.query<{ integrity_check: string }>('PRAGMA integrity_check');
    const sqlite = pragmaRows.map((row) => row.integrity_check).filter((line) => line !== 'ok');
    problems.push(...sqlite.map((line) => `sqlite: ${line}`));

    const orphanActionRows = await this.db.query<{ canonical_id: string }>(
      `SELECT DISTINCT a.canonical_id AS canonical_id FROM action_records a
       WHERE NOT EXISTS (SELECT 1 FROM shows s WHERE s.canonical_id = a.canonical_id)
       ORDER BY a.canonical_id`
    );
    const orphanActions = orphanActionRows.map((row) => row.canonical_id);
    if (orphanActions.length > 0) {
      problems.push(`${orphanActions.length} action history id(s) reference unknown shows`);
    }

    const orphanMappings = await this.count(
      `SELECT COUNT(*) AS count FROM identity_mappings m
       WHERE NOT EXISTS (SELECT 1 FROM shows s WHERE s.canonical_id = m.canonical_id)`
    );
    if (orphanMappings > 0) {
      problems.push(`${orphanMappings} identity mapping(s) reference unknown shows`);
    }

    const orphanRecords = emptyCounts();
    const corruptPayloads = emptyCounts();
    for (const entityType of CACHE_ENTITY_TYPES) {
      const table = ENTITY_TABLES[entityType];

      if (entityType !== 'show') {
        orphanRecords[entityType] = await this.count(
          `SELECT COUNT(*) AS count FROM ${table} r
           WHERE NOT EXISTS (SELECT 1 FROM shows s WHERE s.canonical_id = r.canonical_id)`
        );
        if (orphanRecords[entityType] > 0) {
          problems.push(`${orphanRecords[entityType]} ${entityType} record(s) reference unknown shows`);
        }
      }

      corruptPayloads[entityType] = await this.count(
        `SELECT COUNT(*) AS count FROM ${table} WHERE json_valid(payload) = 0`
      );
      if (corruptPayloads[entityType] > 0) {
        problems.push(`${corruptPayloads[entityType]} ${entityType} payload(s) are not valid JSON`);
      }
    }

    return {
      ok: problems.length === 0,
      sqlite,
      orphanActions,
      orphanMappings,
      orphanRecords,
      corruptPayloads,
      problems,
    };
  }

  /**
   * Rebuild indices, restore show stubs for orphaned action history, and
   * drop orphaned or unreadable cache rows. An entity type whose repair
   * fails, or that still has problems afterwards, is invalidated wholesale
   * so the next run refetches it from the sources.
   *
   * @throws CacheCorruptionError when SQLite itself still reports corruption
   */
  async repair(): Promise<RepairResult> {
    const result: RepairResult = {
      reindexed: false,
      restoredShows: 0,
      removedMappings: 0,
      removedRecords: 0,
      clearedPayloads: 0,
      invalidated: [],
      remaining: await this.integrityCheck(),
    };

    try {
      await this.db.exclusive((connection) => connection.exec('REINDEX'));
      result.reindexed = true;
    } catch (error) {
      logger.error('[CacheStore] REINDEX failed', { error: getErrorMessage(error) });
    }

    // Action history first: it must survive even if everything else is dropped
    result.restoredShows = await this.transaction(async (tx) => {
      const restored = await tx.connection.execute(
        `INSERT INTO shows (canonical_id, title, year, title_key, active, payload, fetched_at, first_seen_at, last_seen_at)
         SELECT a.canonical_id, '(restored) ' || a.canonical_id, NULL, '', 0, 'null', 0, MIN(a.created_at), MAX(a.created_at)
         FROM action_records a
         WHERE NOT EXISTS (SELECT 1 FROM shows s WHERE s.canonical_id = a.canonical_id)
         GROUP BY a.canonical_id`
      );
      return restored.affectedRows;
    }, 'repair:history');

    for (const entityType of CACHE_ENTITY_TYPES) {
      try {
        await this.transaction((tx) => this.repairEntity(tx, entityType, result), `repair:${entityType}`);
      } catch (error) {
        logger.error('[CacheStore] Repair failed, invalidating entity cache', {
          entityType,
          error: getErrorMessage(error),
        });
        await this.invalidateWholesale(entityType, result);
      }
    }

    result.remaining = await this.integrityCheck();

    for (const entityType of CACHE_ENTITY_TYPES) {
      const stillBroken =
        result.remaining.orphanRecords[entityType] > 0 ||
        result.remaining.corruptPayloads[entityType] > 0 ||
        (entityType === 'show' && result.remaining.orphanMappings > 0);
      if (stillBroken && !result.invalidated.includes(entityType)) {
        await this.invalidateWholesale(entityType, result);
      }
    }

    if (result.remaining.sqlite.length > 0 || result.remaining.orphanActions.length > 0) {
      throw new CacheCorruptionError(result.remaining.problems, undefined, {
        service: 'CacheStore',
        operation: 'repair',
      });
    }

    logger.info('[CacheStore] Repair complete', {
      restoredShows: result.restoredShows,
      removedMappings: result.removedMappings,
      removedRecords: result.removedRecords,
      clearedPayloads: result.clearedPayloads,
      invalidated: result.invalidated,
    });

    return result;
  }

  private async repairEntity(
    tx: CacheTransaction,
    entityType: CacheEntityType,
    result: RepairResult
  ): Promise<void> {
    const { connection } = tx;

    if (entityType === 'show') {
      const mappings = await connection.execute(
        `DELETE FROM identity_mappings
         WHERE NOT EXISTS (SELECT 1 FROM shows s WHERE s.canonical_id = identity_mappings.canonical_id)`
      );
      result.removedMappings += mappings.affectedRows;

      const cleared = await connection.execute(
        "UPDATE shows SET payload = 'null', fetched_at = 0 WHERE json_valid(payload) = 0"
      );
      result.clearedPayloads += cleared.affectedRows;
      return;
    }

    const table = ENTITY_TABLES[entityType];
    const orphans = await connection.execute(
      `DELETE FROM ${table}
       WHERE NOT EXISTS (SELECT 1 FROM shows s WHERE s.canonical_id = ${table}.canonical_id)`
    );
    const corrupt = await connection.execute(`DELETE FROM ${table} WHERE json_valid(payload) = 0`);
    result.removedRecords += orphans.affectedRows + corrupt.affectedRows;
  }

  private async invalidateWholesale(entityType: CacheEntityType, result: RepairResult): Promise<void> {
    try {
      await this.invalidate(entityType, 'all');
      result.invalidated.push(entityType);
    } catch (error) {
      throw new CacheCorruptionError(
        [`could not invalidate ${entityType} cache: ${getErrorMessage(error)}`],
        undefined,
        { service: 'CacheStore', operation: 'repair', entityType }
      );
    }
  }

  private async count(sql: string): Promise<number> {
    const row = await this.db.get<CountRow>(sql);
    return row?.count ?? 0;
  }

  // ============================================
  // BACKUP / RESTORE
  // ============================================

  /**
   * Write a point-in-time snapshot of the whole store. Returns its path.
   */
  async backup(destination?: string): Promise<string> {
    const stamp = new Date(this.now()).toISOString().replace(/[:.]/g, '-');
    const target = destination ?? path.join(this.options.backupDir, `showcull-${stamp}.sqlite`);

    if (await this.exists(target)) {
      throw new ValidationError(`Backup target already exists: ${target}`, {
        service: 'CacheStore',
        operation: 'backup',
      });
    }
    await fs.mkdir(path.dirname(target), { recursive: true });

    const literal = target.replace(/'/g, "''");
    await this.db.exclusive((connection) => connection.exec(`VACUUM INTO '${literal}'`));

    logger.info('[CacheStore] Backup written', { path: target });
    return target;
  }

  /**
   * Atomically replace the store with a verified snapshot
   */
  async restore(source: string): Promise<void> {
    if (this.db.isInMemory()) {
      throw new InvalidStateError('file database', ':memory:', 'Cannot restore into an in-memory store', {
        service: 'CacheStore',
        operation: 'restore',
      });
    }
    if (!(await this.exists(source))) {
      throw new ResourceNotFoundError('backup', source, undefined, {
        service: 'CacheStore',
        operation: 'restore',
      });
    }

    await this.verifySnapshot(source);

    const target = this.db.filename;
    const staging = `${target}.restore-${this.now()}`;
    await fs.copyFile(source, staging);

    try {
      // rename() is atomic within a filesystem
      await this.db.reopen(() => fs.rename(staging, target));
    } catch (error) {
      await fs.rm(staging, { force: true });
      throw error;
    }

    logger.info('[CacheStore] Store restored from backup', { source });
  }

  private async verifySnapshot(source: string): Promise<void> {
    const candidate = new SqliteConnection({ filename: source });
    const problems: string[] = [];

    try {
      await candidate.connect();
      const rows = await candidate.query<{ integrity_check: string }>('PRAGMA integrity_check');
      problems.push(...rows.map((row) => row.integrity_check).filter((line) => line !== 'ok'));

      const runner = new MigrationRunner(candidate);
      const executed = await runner.getExecutedMigrations();
      if (!executed.includes(runner.latestVersion)) {
        problems.push(`schema version ${runner.latestVersion} missing`);
      }
    } catch (error) {
      problems.push(getErrorMessage(error));
    } finally {
      await candidate.close();
    }

    if (problems.length > 0) {
      throw new CacheCorruptionError(problems, `Backup failed verification: ${source}`, {
        service: 'CacheStore',
        operation: 'restore',
      });
    }
  }

  private async exists(file: string): Promise<boolean> {
    try {
      await fs.access(file);
      return true;
    } catch {
      return false;
    }
  }
}
