import { TaskStatus } from './task.entity';

export type TaskEventOperation = 'insert' | 'update';

/**
 * One row of task_events, written by the photo_tasks trigger for every insert/update.
 * seq is BIGSERIAL, which pg returns as a string.
 */
export interface TaskEventEntity {
    seq: string;
    task_id: string;
    operation: TaskEventOperation;
    old_status: TaskStatus | null;
    new_status: TaskStatus;
    created_at: Date;
}

/** A task change as the listener consumes it; seq doubles as the resume token. */
export interface TaskChangeEvent {
    seq: number;
    task_id: string;
    operation: TaskEventOperation;
    old_status: TaskStatus | null;
    new_status: TaskStatus;
}

export function toChangeEvent(row: TaskEventEntity): TaskChangeEvent {
    return {
        seq: Number(row.seq),
        task_id: row.task_id,
        operation: row.operation,
        old_status: row.old_status,
        new_status: row.new_status,
    };
}
