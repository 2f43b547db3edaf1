import { DatabaseError, Pool } from 'pg';
import { v7 as uuid } from 'uuid';
import { AgentLogEntry, WORKFLOW_STEP } from '@photoflow/sdk';
import { PhotoTaskEntity, TaskStatus, DISPATCHABLE_STATUSES } from '../db/task.entity';
import { DuplicateSkuError } from '../errors';
import { NewTask, TaskPatch, TaskStore } from './task.store';

const UNIQUE_VIOLATION = '23505';

export class TaskRepository implements TaskStore {
    constructor(private readonly pool: Pool) { }

    async insert(task: NewTask): Promise<PhotoTaskEntity> {
        try {
            const res = await this.pool.query<PhotoTaskEntity>(
                `INSERT INTO photo_tasks (id, sku_code, status, workflow_step, metadata, agent_log)
                 VALUES ($1, $2, $3, $4, $5, $6)
                 RETURNING *`,
                [
                    uuid(),
                    task.sku_code,
                    TaskStatus.UPLOADED,
                    WORKFLOW_STEP[TaskStatus.UPLOADED],
                    JSON.stringify(task.metadata),
                    JSON.stringify(task.agent_log),
                ],
            );
            return res.rows[0];
        } catch (err) {
            if (err instanceof DatabaseError && err.code === UNIQUE_VIOLATION) {
                throw new DuplicateSkuError(task.sku_code);
            }
            throw err;
        }
    }

    async findById(id: string): Promise<PhotoTaskEntity | null> {
        const res = await this.pool.query<PhotoTaskEntity>('SELECT * FROM photo_tasks WHERE id = $1', [id]);
        return res.rows[0] ?? null;
    }

    async findBySku(skuCode: string): Promise<PhotoTaskEntity | null> {
        const res = await this.pool.query<PhotoTaskEntity>('SELECT * FROM photo_tasks WHERE sku_code = $1', [skuCode]);
        return res.rows[0] ?? null;
    }

    async update(id: string, patch: TaskPatch, expectedStatus: TaskStatus, expectedVersion?: number): Promise<PhotoTaskEntity | null> {
        const sets: string[] = ['version = version + 1', 'updated_at = NOW()'];
        const params: unknown[] = [id, expectedStatus];
        const guards: string[] = ['id = $1', 'status = $2'];
        const bind = (value: unknown) => {
            params.push(value);
            return `$${params.length}`;
        };

        if (patch.status !== undefined) {
            sets.push(`status = ${bind(patch.status)}`);
            // FAILED keeps the step the task failed at
            if (patch.status !== TaskStatus.FAILED) {
                sets.push(`workflow_step = ${bind(WORKFLOW_STEP[patch.status])}`);
            }
        }
        if (patch.color_analysis !== undefined) {
            sets.push(`color_analysis = ${bind(JSON.stringify(patch.color_analysis))}::jsonb`);
        }
        if (patch.publish_results !== undefined) {
            sets.push(`publish_results = ${bind(JSON.stringify(patch.publish_results))}::jsonb`);
        }
        if (patch.retry_metadata !== undefined) {
            sets.push(`retry_metadata = ${bind(JSON.stringify(patch.retry_metadata))}::jsonb`);
        }
        if (patch.next_attempt_at !== undefined) {
            sets.push(`next_attempt_at = ${bind(patch.next_attempt_at)}`);
        }
        if (patch.append_log !== undefined) {
            sets.push(`agent_log = agent_log || ${bind(JSON.stringify([patch.append_log]))}::jsonb`);
        }

        // Only one writer can move a task out of the status it read; the version
        // guard also rejects same-status writes built from a stale copy.
        if (expectedVersion !== undefined) {
            guards.push(`version = ${bind(expectedVersion)}`);
        }

        const res = await this.pool.query<PhotoTaskEntity>(
            `UPDATE photo_tasks SET ${sets.join(', ')} WHERE ${guards.join(' AND ')} RETURNING *`,
            params,
        );
        return res.rows[0] ?? null;
    }

    async appendLog(id: string, entry: AgentLogEntry): Promise<void> {
        const res = await this.pool.query(
            `UPDATE photo_tasks SET agent_log = agent_log || $2::jsonb, updated_at = NOW() WHERE id = $1`,
            [id, JSON.stringify([entry])],
        );
        if (res.rowCount !== 1) {
            throw new Error(`task ${id} not found`);
        }
    }

    async findNonTerminal(limit: number): Promise<PhotoTaskEntity[]> {
        const res = await this.pool.query<PhotoTaskEntity>(
            'SELECT * FROM photo_tasks WHERE status = ANY($1) ORDER BY created_at ASC LIMIT $2',
            [DISPATCHABLE_STATUSES, limit],
        );
        return res.rows;
    }

    async findDue(now: Date, staleBefore: Date, limit: number): Promise<PhotoTaskEntity[]> {
        const res = await this.pool.query<PhotoTaskEntity>(
            `SELECT * FROM photo_tasks
             WHERE status = ANY($1)
               AND (
                    (next_attempt_at IS NOT NULL AND next_attempt_at <= $2)
                 OR (next_attempt_at IS NULL AND updated_at < $3)
               )
             ORDER BY COALESCE(next_attempt_at, updated_at) ASC
             LIMIT $4`,
            [DISPATCHABLE_STATUSES, now, staleBefore, limit],
        );
        return res.rows;
    }
}
