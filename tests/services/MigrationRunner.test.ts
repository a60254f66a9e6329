import { DatabaseManager } from '../../src/database/DatabaseManager.js';
import { MigrationRunner } from '../../src/database/MigrationRunner.js';
import { IN_MEMORY_DATABASE } from '../../src/database/connections/SqliteConnection.js';

describe('MigrationRunner', () => {
  let db: DatabaseManager;
  let runner: MigrationRunner;

  beforeEach(async () => {
    db = new DatabaseManager({ filename: IN_MEMORY_DATABASE });
    await db.connect();
    runner = new MigrationRunner(db.getConnection());
  });

  afterEach(async () => {
    await db.disconnect();
  });

  it('should apply pending migrations once', async () => {
    await runner.migrate();
    await runner.migrate();

    expect(await runner.getExecutedMigrations()).toEqual([runner.latestVersion]);
    expect(await runner.status()).toEqual([{ version: '20261018_001', name: 'initial_schema', executed: true }]);
  });

  it('should create the store tables', async () => {
    await runner.migrate();

    const tables = await db.query<{ name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
    );
    expect(tables.map((table) => table.name)).toEqual([
      'action_records',
      'cache_meta',
      'identity_mappings',
      'identity_merges',
      'identity_reviews',
      'migrations',
      'monitor_records',
      'request_records',
      'shows',
      'watch_records',
    ]);
  });

  it('should keep the action log append-only', async () => {
    await runner.migrate();
    await db.execute(
      `INSERT INTO action_records (canonical_id, action, requested_action, simulated, actor, outcome, steps, created_at)
       VALUES ('show_a', 'keep', 'keep', 1, 'auto', 'kept', '[]', 0)`
    );

    await expect(db.execute("UPDATE action_records SET outcome = 'applied'")).rejects.toThrow('append-only');
    await expect(db.execute('DELETE FROM action_records')).rejects.toThrow('append-only');
  });

  it('should roll back to an empty schema', async () => {
    await runner.migrate();
    await runner.rollback();

    expect(await runner.getExecutedMigrations()).toEqual([]);
    const tables = await db.query<{ name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'shows'"
    );
    expect(tables).toEqual([]);
  });
});
