import type { PhotoTask } from '@photoflow/sdk';
import { TaskStatus } from '@photoflow/sdk';

export { TaskStatus };

/**
 * Row shape of photo_tasks. jsonb columns come back parsed by pg,
 * TIMESTAMPTZ columns as Date, so a row is the task document itself.
 */
export type PhotoTaskEntity = PhotoTask;

/** Statuses that have a next step to dispatch. */
export const DISPATCHABLE_STATUSES: readonly TaskStatus[] = [TaskStatus.UPLOADED, TaskStatus.COLOR_CORRECTED];

export function isDispatchable(status: TaskStatus): boolean {
    return DISPATCHABLE_STATUSES.includes(status);
}
