import { CacheStore } from '../cache/CacheStore.js';
import { ActionActor, ActionOutcome, ActionRecord, ActionType } from '../../types/models.js';
import { actionTypeSchema } from '../../validation/recordSchemas.js';
import { DatabaseError, ErrorCode } from '../../errors/index.js';

interface ActionRow {
  id: number;
  canonical_id: string;
  action: string;
  requested_action: string;
  simulated: number;
  actor: ActionActor;
  outcome: ActionOutcome;
  error: string | null;
  steps: string;
  completed_steps: string;
  created_at: number;
}

/**
 * Append-only log of decisions. Rows are never updated or deleted; the
 * database rejects both.
 */
export class ActionHistoryRepository {
  constructor(private readonly store: CacheStore) {}

  async append(record: ActionRecord): Promise<ActionRecord> {
    return this.store.transaction(async (tx) => {
      const result = await tx.connection.execute(
        `INSERT INTO action_records
           (canonical_id, action, requested_action, simulated, actor, outcome, error, steps, completed_steps, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          record.canonicalId,
          record.action,
          record.requestedAction,
          record.simulated ? 1 : 0,
          record.actor,
          record.outcome,
          record.error,
          JSON.stringify(record.steps),
          JSON.stringify(record.completedSteps),
          record.createdAt,
        ]
      );
      return result.insertId !== undefined ? { ...record, id: result.insertId } : record;
    }, 'actions:append');
  }

  /**
   * History of one show, or of every show, oldest first
   */
  async list(canonicalId?: string): Promise<ActionRecord[]> {
    const rows = canonicalId
      ? await this.store.connection.query<ActionRow>(
          'SELECT * FROM action_records WHERE canonical_id = ? ORDER BY id',
          [canonicalId]
        )
      : await this.store.connection.query<ActionRow>('SELECT * FROM action_records ORDER BY id');

    return rows.map((row) => this.toRecord(row));
  }

  private toRecord(row: ActionRow): ActionRecord {
    return {
      id: row.id,
      canonicalId: row.canonical_id,
      action: this.parseAction(row.action, row.id),
      requestedAction: this.parseAction(row.requested_action, row.id),
      simulated: row.simulated === 1,
      actor: row.actor,
      outcome: row.outcome,
      error: row.error,
      steps: parseSteps(row.steps),
      completedSteps: parseSteps(row.completed_steps),
      createdAt: row.created_at,
    };
  }

  private parseAction(value: string, id: number): ActionType {
    const parsed = actionTypeSchema.safeParse(value);
    if (!parsed.success) {
      throw new DatabaseError(`Unknown action "${value}" in action record ${id}`, ErrorCode.DATABASE_QUERY_FAILED, false, {
        service: 'ActionHistoryRepository',
        operation: 'list',
        entityId: id,
      });
    }
    return parsed.data;
  }
}

function parseSteps(raw: string): string[] {
  try {
    const value: unknown = JSON.parse(raw);
    return Array.isArray(value) ? value.filter((step): step is string => typeof step === 'string') : [];
  } catch {
    return [];
  }
}
