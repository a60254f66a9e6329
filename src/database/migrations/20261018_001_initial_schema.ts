import { DatabaseConnection } from '../../types/database.js';

/**
 * Initial schema
 *
 * - shows: one row per canonical id; queryable columns plus the media
 *   server snapshot as a JSON payload
 * - identity_*: (source, source id) -> canonical id graph, merges and the
 *   review queue for ambiguous records
 * - watch/request/monitor_records: cached adapter payloads keyed by
 *   canonical id, overwritten whole on refresh
 * - action_records: append-only audit log (UPDATE and DELETE are rejected
 *   by triggers)
 *
 * Record tables carry no foreign keys to shows: the integrity check and
 * repair path find and fix orphans instead of cascading them away.
 */
export class InitialSchemaMigration {
  static version = '20261018_001';
  static migrationName = 'initial_schema';

  static async up(db: DatabaseConnection): Promise<void> {
    // Shows
    await db.execute(`
      CREATE TABLE shows (
        canonical_id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        year INTEGER,
        title_key TEXT NOT NULL,
        active INTEGER NOT NULL DEFAULT 1,
        merged_into TEXT,
        payload TEXT NOT NULL DEFAULT 'null',
        fetched_at INTEGER NOT NULL DEFAULT 0,
        first_seen_at INTEGER NOT NULL,
        last_seen_at INTEGER NOT NULL
      )
    `);
    await db.execute('CREATE INDEX idx_shows_title_key ON shows(title_key)');
    await db.execute('CREATE INDEX idx_shows_active ON shows(active)');

    // Identity
    await db.execute(`
      CREATE TABLE identity_mappings (
        source_name TEXT NOT NULL,
        source_id TEXT NOT NULL,
        canonical_id TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        PRIMARY KEY (source_name, source_id)
      )
    `);
    await db.execute('CREATE INDEX idx_identity_mappings_canonical ON identity_mappings(canonical_id)');

    await db.execute(`
      CREATE TABLE identity_merges (
        from_canonical_id TEXT PRIMARY KEY,
        into_canonical_id TEXT NOT NULL,
        merged_at INTEGER NOT NULL
      )
    `);

    await db.execute(`
      CREATE TABLE identity_reviews (
        source_name TEXT NOT NULL,
        source_id TEXT NOT NULL,
        title TEXT,
        candidates TEXT NOT NULL,
        hints TEXT NOT NULL,
        flagged_at INTEGER NOT NULL,
        PRIMARY KEY (source_name, source_id)
      )
    `);

    // Cached records
    for (const table of ['watch_records', 'request_records', 'monitor_records']) {
      await db.execute(`
        CREATE TABLE ${table} (
          canonical_id TEXT PRIMARY KEY,
          payload TEXT NOT NULL,
          fetched_at INTEGER NOT NULL
        )
      `);
    }

    // Action history
    await db.execute(`
      CREATE TABLE action_records (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        canonical_id TEXT NOT NULL,
        action TEXT NOT NULL CHECK (action IN ('delete', 'keep_first_season', 'keep_first_episode', 'keep')),
        requested_action TEXT NOT NULL,
        simulated INTEGER NOT NULL,
        actor TEXT NOT NULL CHECK (actor IN ('interactive', 'auto')),
        outcome TEXT NOT NULL,
        error TEXT,
        steps TEXT NOT NULL DEFAULT '[]',
        completed_steps TEXT NOT NULL DEFAULT '[]',
        created_at INTEGER NOT NULL
      )
    `);
    await db.execute('CREATE INDEX idx_action_records_canonical ON action_records(canonical_id)');
    await db.execute(`
      CREATE TRIGGER action_records_no_update
      BEFORE UPDATE ON action_records
      BEGIN
        SELECT RAISE(ABORT, 'action_records is append-only');
      END
    `);
    await db.execute(`
      CREATE TRIGGER action_records_no_delete
      BEFORE DELETE ON action_records
      BEGIN
        SELECT RAISE(ABORT, 'action_records is append-only');
      END
    `);

    // Run metadata (last library scan, etc.)
    await db.execute(`
      CREATE TABLE cache_meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at INTEGER NOT NULL
      )
    `);
  }

  static async down(db: DatabaseConnection): Promise<void> {
    await db.execute('DROP TABLE IF EXISTS cache_meta');
    await db.execute('DROP TRIGGER IF EXISTS action_records_no_delete');
    await db.execute('DROP TRIGGER IF EXISTS action_records_no_update');
    await db.execute('DROP TABLE IF EXISTS action_records');
    await db.execute('DROP TABLE IF EXISTS monitor_records');
    await db.execute('DROP TABLE IF EXISTS request_records');
    await db.execute('DROP TABLE IF EXISTS watch_records');
    await db.execute('DROP TABLE IF EXISTS identity_reviews');
    await db.execute('DROP TABLE IF EXISTS identity_merges');
    await db.execute('DROP TABLE IF EXISTS identity_mappings');
    await db.execute('DROP TABLE IF EXISTS shows');
  }
}
