import type { PhotoTask } from '@photoflow/sdk';
import { TaskStatus } from '../db/task.entity';
import { TaskPatch } from '../repositories/task.store';
import { DownstreamError } from '../errors';

export type StepName = 'color_correction' | 'publish';

export interface PhotoFailure {
    /** null when the step failed before reaching individual photos */
    photo_index: number | null;
    error: DownstreamError;
}

export interface StepContext {
    /** Deadline for each external call. */
    timeoutMs: number;
}

export interface StepRunResult {
    overall: 'succeeded' | 'failed';
    /** Per-photo output merged over what the task already had, keyed by photo_index. */
    patch: Pick<TaskPatch, 'color_analysis' | 'publish_results'>;
    attempted: number[];
    skipped: number[];
    failures: PhotoFailure[];
}

/**
 * One pipeline stage. Executors never write to the store; the dispatcher commits
 * their patch together with the status change and audit entry.
 */
export interface StepExecutor {
    readonly step: StepName;
    readonly agentName: string;
    /** Status this executor is dispatched from. */
    readonly from: TaskStatus;
    /** Status a fully successful run moves the task to. */
    readonly to: TaskStatus;
    /** Throws DataIntegrityError when the task lacks the input this step needs. */
    validate(task: PhotoTask): void;
    /** Processes every photo not yet done; one photo's failure does not stop the others. */
    run(task: PhotoTask, ctx: StepContext): Promise<StepRunResult>;
}

export function mergeByPhotoIndex<E extends { photo_index: number }>(existing: readonly E[], updates: readonly E[]): E[] {
    const byIndex = new Map<number, E>();
    for (const entry of existing) byIndex.set(entry.photo_index, entry);
    for (const entry of updates) byIndex.set(entry.photo_index, entry);
    return [...byIndex.values()].sort((a, b) => a.photo_index - b.photo_index);
}

export function describeError(error: DownstreamError): string {
    return `${error.kind}: ${error.message}`;
}

type PhotoEntry = { photo_index: number; status: string };

function isDone(entry: PhotoEntry): boolean {
    return entry.status === 'completed' || entry.status === 'published';
}

// A photo recorded as done stays done; only this run's own entries are laid over.
function rebaseEntries<E extends PhotoEntry>(current: readonly E[], produced: readonly E[], attempted: ReadonlySet<number>): E[] {
    const done = new Set(current.filter(isDone).map(e => e.photo_index));
    const own = produced.filter(e => attempted.has(e.photo_index) && !done.has(e.photo_index));
    return mergeByPhotoIndex(current, own);
}

/**
 * Re-applies a run's per-photo output to a fresher copy of the task, e.g. after a
 * concurrent dispatch of the same step committed first. Failures for photos the
 * fresher copy already has done are dropped, so the run can turn into a success.
 */
export function rebaseRun(current: PhotoTask, result: StepRunResult): StepRunResult {
    const attempted = new Set(result.attempted);
    const patch: StepRunResult['patch'] = {};
    let entries: PhotoEntry[] = [];

    if (result.patch.color_analysis) {
        patch.color_analysis = rebaseEntries(current.color_analysis, result.patch.color_analysis, attempted);
        entries = patch.color_analysis;
    }
    if (result.patch.publish_results) {
        patch.publish_results = rebaseEntries(current.publish_results, result.patch.publish_results, attempted);
        entries = patch.publish_results;
    }

    const done = new Set(entries.filter(isDone).map(e => e.photo_index));
    const failures = result.failures.filter(f => f.photo_index === null || !done.has(f.photo_index));

    return {
        ...result,
        overall: failures.length === 0 ? 'succeeded' : 'failed',
        patch,
        failures,
    };
}
