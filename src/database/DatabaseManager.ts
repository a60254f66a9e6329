import { DatabaseConfig } from '../config/types.js';
import { DatabaseConnection, ExecuteResult, SqlParam } from '../types/database.js';
import { SqliteConnection, IN_MEMORY_DATABASE } from './connections/SqliteConnection.js';
import { logger } from '../utils/logger.js';
import { AsyncMutex } from '../utils/AsyncMutex.js';
import { getErrorMessage } from '../utils/errorHandling.js';
import { DatabaseError, ErrorCode } from '../errors/index.js';

/**
 * Owns the single SQLite connection. Every transaction runs under one
 * process-wide write lock, so two transactions never interleave on the
 * connection.
 */
export class DatabaseManager {
  private connection: DatabaseConnection | null = null;
  private readonly writeLock = new AsyncMutex();

  constructor(private readonly config: Pick<DatabaseConfig, 'filename'>) {}

  async connect(): Promise<void> {
    if (this.connection) {
      return;
    }

    const connection = new SqliteConnection(this.config);
    await connection.connect();
    this.connection = connection;
  }

  async disconnect(): Promise<void> {
    if (this.connection) {
      await this.connection.close();
      this.connection = null;
    }
  }

  /**
   * Close and reopen the database file, e.g. after it was replaced on disk.
   * Waits for in-flight transactions.
   */
  async reopen(replace?: () => Promise<void>): Promise<void> {
    await this.writeLock.runExclusive(async () => {
      await this.disconnect();
      try {
        if (replace) {
          await replace();
        }
      } finally {
        await this.connect();
      }
    });
    logger.info('[DatabaseManager] Database reopened', { filename: this.config.filename });
  }

  /**
   * Validate database connection by running a simple query
   */
  async validateConnection(): Promise<boolean> {
    if (!this.connection) {
      return false;
    }

    try {
      await this.connection.query('SELECT 1 as ping', []);
      return true;
    } catch (error) {
      logger.warn('[DatabaseManager] Database connection validation failed', {
        error: getErrorMessage(error),
      });
      return false;
    }
  }

  getConnection(): DatabaseConnection {
    if (!this.connection) {
      throw new DatabaseError(
        'Database not connected. Call connect() first.',
        ErrorCode.DATABASE_CONNECTION_FAILED,
        false,
        { service: 'DatabaseManager', operation: 'getConnection' }
      );
    }
    return this.connection;
  }

  get filename(): string {
    return this.config.filename;
  }

  isInMemory(): boolean {
    return this.config.filename === IN_MEMORY_DATABASE;
  }

  async query<T>(sql: string, params?: SqlParam[]): Promise<T[]> {
    return this.getConnection().query<T>(sql, params);
  }

  async get<T>(sql: string, params?: SqlParam[]): Promise<T | undefined> {
    return this.getConnection().get<T>(sql, params);
  }

  async execute(sql: string, params?: SqlParam[]): Promise<ExecuteResult> {
    return this.getConnection().execute(sql, params);
  }

  /**
   * Run callback inside BEGIN/COMMIT under the write lock. Rolls back and
   * rethrows on failure.
   */
  async transaction<T>(callback: (connection: DatabaseConnection) => Promise<T>): Promise<T> {
    return this.writeLock.runExclusive(async () => {
      const connection = this.getConnection();

      await connection.beginTransaction();
      try {
        const result = await callback(connection);
        await connection.commit();
        return result;
      } catch (error) {
        try {
          await connection.rollback();
        } catch (rollbackError) {
          logger.error('[DatabaseManager] Rollback failed', {
            error: getErrorMessage(rollbackError),
          });
        }
        throw error;
      }
    });
  }

  /**
   * Run callback under the write lock without opening a transaction
   * (VACUUM, REINDEX and other statements that refuse to run inside one)
   */
  async exclusive<T>(callback: (connection: DatabaseConnection) => Promise<T>): Promise<T> {
    return this.writeLock.runExclusive(() => callback(this.getConnection()));
  }

  isConnected(): boolean {
    return this.connection !== null;
  }
}
