import { DatabaseConnection } from '../types/database.js';
import { InitialSchemaMigration } from './migrations/20261018_001_initial_schema.js';
import { logger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/errorHandling.js';
import { DatabaseError, ErrorCode } from '../errors/index.js';

interface MigrationRecord {
  version: string;
}

interface Migration {
  version: string;
  name: string;
  up: (db: DatabaseConnection) => Promise<void>;
  down: (db: DatabaseConnection) => Promise<void>;
}

/**
 * Migration Runner
 *
 * Applies pending migrations in version order, each inside its own
 * transaction together with its bookkeeping row.
 */
export class MigrationRunner {
  private readonly migrations: Migration[] = [
    {
      version: InitialSchemaMigration.version,
      name: InitialSchemaMigration.migrationName,
      up: InitialSchemaMigration.up,
      down: InitialSchemaMigration.down,
    },
  ];

  constructor(private readonly db: DatabaseConnection) {}

  async ensureMigrationTable(): Promise<void> {
    await this.db.execute(`
      CREATE TABLE IF NOT EXISTS migrations (
        version TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        executed_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);
  }

  async getExecutedMigrations(): Promise<string[]> {
    const results = await this.db.query<MigrationRecord>('SELECT version FROM migrations ORDER BY version');
    return results.map((row) => row.version);
  }

  /**
   * Latest known schema version
   */
  get latestVersion(): string {
    return this.migrations[this.migrations.length - 1]?.version ?? '';
  }

  async migrate(): Promise<void> {
    await this.ensureMigrationTable();
    const executedMigrations = await this.getExecutedMigrations();

    for (const migration of this.migrations) {
      if (executedMigrations.includes(migration.version)) {
        continue;
      }

      logger.info(`[MigrationRunner] Running migration: ${migration.version} - ${migration.name}`);

      try {
        await this.db.beginTransaction();
        await migration.up(this.db);
        await this.db.execute('INSERT INTO migrations (version, name) VALUES (?, ?)', [
          migration.version,
          migration.name,
        ]);
        await this.db.commit();
      } catch (error) {
        await this.db.rollback();
        throw new DatabaseError(
          `Migration failed: ${migration.version} - ${getErrorMessage(error)}`,
          ErrorCode.DATABASE_QUERY_FAILED,
          false,
          { service: 'MigrationRunner', operation: 'migrate' },
          error instanceof Error ? error : undefined
        );
      }

      logger.info(`[MigrationRunner] Migration completed: ${migration.version}`);
    }
  }

  async rollback(targetVersion?: string): Promise<void> {
    await this.ensureMigrationTable();
    const executedMigrations = await this.getExecutedMigrations();

    const migrationsToRollback = this.migrations
      .filter((migration) => executedMigrations.includes(migration.version))
      .reverse();

    for (const migration of migrationsToRollback) {
      if (targetVersion && migration.version <= targetVersion) {
        break;
      }

      logger.info(`[MigrationRunner] Rolling back migration: ${migration.version} - ${migration.name}`);

      try {
        await this.db.beginTransaction();
        await migration.down(this.db);
        await this.db.execute('DELETE FROM migrations WHERE version = ?', [migration.version]);
        await this.db.commit();
      } catch (error) {
        await this.db.rollback();
        throw new DatabaseError(
          `Rollback failed: ${migration.version} - ${getErrorMessage(error)}`,
          ErrorCode.DATABASE_QUERY_FAILED,
          false,
          { service: 'MigrationRunner', operation: 'rollback' },
          error instanceof Error ? error : undefined
        );
      }
    }
  }

  async status(): Promise<Array<{ version: string; name: string; executed: boolean }>> {
    await this.ensureMigrationTable();
    const executedMigrations = await this.getExecutedMigrations();

    return this.migrations.map((migration) => ({
      version: migration.version,
      name: migration.name,
      executed: executedMigrations.includes(migration.version),
    }));
  }
}
