import { Database } from 'sqlite3';
import path from 'path';
import fs from 'fs';
import { DatabaseConfig } from '../../config/types.js';
import { DatabaseConnection, ExecuteResult, SqlParam } from '../../types/database.js';
import {
  DatabaseError,
  DuplicateKeyError,
  ForeignKeyViolationError,
  ErrorCode,
} from '../../errors/index.js';

export const IN_MEMORY_DATABASE = ':memory:';

export class SqliteConnection implements DatabaseConnection {
  private db: Database | null = null;

  constructor(private readonly config: Pick<DatabaseConfig, 'filename'>) {}

  async connect(): Promise<void> {
    const dbPath = this.config.filename;

    if (dbPath !== IN_MEMORY_DATABASE) {
      const dir = path.dirname(dbPath);
      try {
        await fs.promises.mkdir(dir, { recursive: true });
      } catch (err) {
        throw new DatabaseError(
          `Failed to create database directory: ${dir}`,
          ErrorCode.DATABASE_CONNECTION_FAILED,
          false,
          { service: 'SqliteConnection', operation: 'connect', metadata: { dir } },
          err instanceof Error ? err : undefined
        );
      }
    }

    const db = await new Promise<Database>((resolve, reject) => {
      const handle = new Database(dbPath, (err) => {
        if (err) {
          reject(
            new DatabaseError(
              `Failed to connect to SQLite database: ${err.message}`,
              ErrorCode.DATABASE_CONNECTION_FAILED,
              true,
              { service: 'SqliteConnection', operation: 'connect', metadata: { dbPath } },
              err
            )
          );
        } else {
          resolve(handle);
        }
      });
    });

    this.db = db;
    await this.exec('PRAGMA foreign_keys = ON');
  }

  private requireDb(operation: string): Database {
    if (!this.db) {
      throw new DatabaseError(
        'Database not connected',
        ErrorCode.DATABASE_CONNECTION_FAILED,
        false,
        { service: 'SqliteConnection', operation }
      );
    }
    return this.db;
  }

  async query<T>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    const db = this.requireDb('query');

    return new Promise((resolve, reject) => {
      db.all(sql, params, (err: Error | null, rows: T[]) => {
        if (err) {
          reject(this.convertDatabaseError(err, sql, 'query'));
        } else {
          resolve(rows);
        }
      });
    });
  }

  async get<T>(sql: string, params: SqlParam[] = []): Promise<T | undefined> {
    const db = this.requireDb('get');

    return new Promise((resolve, reject) => {
      db.get(sql, params, (err: Error | null, row: T | undefined) => {
        if (err) {
          reject(this.convertDatabaseError(err, sql, 'get'));
        } else {
          resolve(row);
        }
      });
    });
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<ExecuteResult> {
    const db = this.requireDb('execute');

    return new Promise((resolve, reject) => {
      const self = this;
      db.run(sql, params, function (err) {
        if (err) {
          reject(self.convertDatabaseError(err, sql, 'execute'));
        } else {
          // 'this' is the statement context, providing changes and lastID
          resolve({
            affectedRows: this.changes,
            insertId: this.lastID,
          });
        }
      });
    });
  }

  async exec(sql: string): Promise<void> {
    const db = this.requireDb('exec');

    return new Promise((resolve, reject) => {
      db.exec(sql, (err) => {
        if (err) {
          reject(this.convertDatabaseError(err, sql, 'exec'));
        } else {
          resolve();
        }
      });
    });
  }

  async close(): Promise<void> {
    const db = this.db;
    if (!db) {
      return;
    }

    return new Promise((resolve, reject) => {
      db.close((err) => {
        if (err) {
          reject(
            new DatabaseError(
              `Failed to close database: ${err.message}`,
              ErrorCode.DATABASE_CONNECTION_FAILED,
              false,
              { service: 'SqliteConnection', operation: 'close' },
              err
            )
          );
        } else {
          this.db = null;
          resolve();
        }
      });
    });
  }

  async beginTransaction(): Promise<void> {
    await this.execute('BEGIN IMMEDIATE TRANSACTION');
  }

  async commit(): Promise<void> {
    await this.execute('COMMIT');
  }

  async rollback(): Promise<void> {
    await this.execute('ROLLBACK');
  }

  /**
   * Convert SQLite errors to ApplicationError types
   */
  private convertDatabaseError(error: Error, sql: string, operation: string): Error {
    const errorMessage = error.message.toLowerCase();
    const context = {
      service: 'SqliteConnection',
      operation,
      metadata: { sql, sqliteError: error.message },
    };

    if (errorMessage.includes('unique constraint')) {
      const match = errorMessage.match(/unique constraint failed: (\w+)\.(\w+)/i);
      return new DuplicateKeyError(match?.[1] ?? 'unknown', match?.[2] ?? 'unknown', error.message, context);
    }

    if (errorMessage.includes('foreign key constraint')) {
      // SQLite does not name the table in this message
      return new ForeignKeyViolationError('unknown', 'foreign_key', error.message, context);
    }

    // Triggers that RAISE(ABORT) and type errors will fail the same way again
    const retryable = !errorMessage.includes('constraint') && !errorMessage.includes('append-only');

    return new DatabaseError(
      `Database ${operation} failed: ${error.message}`,
      ErrorCode.DATABASE_QUERY_FAILED,
      retryable,
      context,
      error
    );
  }
}
