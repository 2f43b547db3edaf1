import type { ErrorKind, PhotoTask, RetryMetadata } from '@photoflow/sdk';
import { TaskStatus } from '../db/task.entity';
import { TaskPatch, TaskStore } from '../repositories/task.store';
import { ExecutorRegistry, PhotoFailure, StepExecutor, StepRunResult, rebaseRun } from '../executors';
import { AuditLogger } from '../audit/audit-logger';
import { DataIntegrityError, DownstreamError, asDownstreamError } from '../errors';
import { RetryPolicy, retryDelay } from '../utils/backoff';

const TAG = '[dispatcher]';

// Commit attempts per dispatch while concurrent same-step writes keep landing first
const MAX_COMMIT_ROUNDS = 10;

/** A dispatch request derived from one status-transition event. */
export interface WorkItem {
    task_id: string;
    observed_status: TaskStatus;
}

export type DispatchOutcome =
    | { kind: 'missing' }
    | { kind: 'stale'; current: TaskStatus }
    | { kind: 'deferred'; delayMs: number }
    | { kind: 'advanced'; status: TaskStatus }
    | { kind: 'retry_scheduled'; attempt: number; delayMs: number }
    | { kind: 'failed'; reason: ErrorKind }
    | { kind: 'conflict' };

export interface DispatcherConfig extends RetryPolicy {
    executorTimeoutMs: number;
}

const SEVERITY: readonly ErrorKind[] = ['transient', 'timeout', 'permanent', 'content_rejected', 'data_integrity'];

export function mostSevere(failures: readonly PhotoFailure[]): ErrorKind {
    let worst: ErrorKind = 'transient';
    for (const { error } of failures) {
        if (SEVERITY.indexOf(error.kind) > SEVERITY.indexOf(worst)) worst = error.kind;
    }
    return worst;
}

export function formatFailures(failures: readonly PhotoFailure[]): string {
    return failures
        .map(({ photo_index, error }) => photo_index === null
            ? `${error.kind}: ${error.message}`
            : `${error.kind}: photo ${photo_index}: ${error.message}`)
        .join('; ');
}

/**
 * The pipeline state machine. Loads the task, checks the work item is still current,
 * runs the executor for the task's status and commits the outcome with a conditional
 * write guarded by the status and version it read, so at most one dispatch wins each
 * transition and no commit is built from a stale copy.
 */
export class StepDispatcher {
    constructor(
        private readonly store: TaskStore,
        private readonly executors: ExecutorRegistry,
        private readonly audit: AuditLogger,
        private readonly config: DispatcherConfig,
        private readonly clock: () => Date = () => new Date(),
    ) { }

    async dispatch(item: WorkItem): Promise<DispatchOutcome> {
        const task = await this.store.findById(item.task_id);
        if (!task) {
            console.warn(`${TAG} task ${item.task_id} not found, dropping work item`);
            return { kind: 'missing' };
        }

        // Another event or worker already moved the task on
        if (task.status !== item.observed_status) {
            return { kind: 'stale', current: task.status };
        }

        const executor = this.executors.forStatus(task.status);
        if (!executor) {
            return { kind: 'stale', current: task.status };
        }

        // Early events (a re-scan, a duplicate) must not cut a retry backoff short
        if (task.next_attempt_at) {
            const delayMs = task.next_attempt_at.getTime() - this.clock().getTime();
            if (delayMs > 0) return { kind: 'deferred', delayMs };
        }

        try {
            executor.validate(task);
        } catch (err) {
            if (err instanceof DataIntegrityError) return this.failIntegrity(task, executor, err);
            throw err;
        }

        console.log(`${TAG} ${task.sku_code} (${task.id}): ${executor.step} attempt ${task.retry_metadata.count + 1}`);

        let result: StepRunResult;
        try {
            result = await executor.run(task, { timeoutMs: this.config.executorTimeoutMs });
        } catch (err) {
            if (err instanceof DataIntegrityError) return this.failIntegrity(task, executor, err);
            result = {
                overall: 'failed',
                patch: {},
                attempted: [],
                skipped: [],
                failures: [{ photo_index: null, error: asDownstreamError(err) }],
            };
        }

        return this.settle(task, executor, result);
    }

    /**
     * Commits the run. When the version moved on but the status did not, another
     * dispatch of the same step committed first: this run's photos are merged into
     * the fresh copy and the commit is tried again. A status change ends the dispatch.
     */
    private async settle(task: PhotoTask, executor: StepExecutor, result: StepRunResult): Promise<DispatchOutcome> {
        let current = task;
        let pending = result;

        for (let round = 1; ; round++) {
            const outcome = await this.commitRun(current, executor, pending);
            if (outcome) return outcome;

            const fresh = await this.store.findById(task.id);
            if (!fresh || fresh.status !== task.status) {
                console.warn(`${TAG} ${task.id} left ${task.status} while dispatching, abandoning`);
                return { kind: 'conflict' };
            }
            if (round >= MAX_COMMIT_ROUNDS) {
                console.warn(`${TAG} ${task.id} kept changing under ${executor.step}, abandoning after ${round} commits`);
                return { kind: 'conflict' };
            }

            console.warn(`${TAG} ${task.id} was written concurrently, merging ${executor.step} results into version ${fresh.version}`);
            current = fresh;
            pending = rebaseRun(fresh, pending);
        }
    }

    private async commitRun(task: PhotoTask, executor: StepExecutor, result: StepRunResult): Promise<DispatchOutcome | null> {
        if (result.overall === 'succeeded') {
            try {
                return await this.commitSuccess(task, executor, result);
            } catch (err) {
                // Nothing was written; record the attempt as failed but keep the
                // per-photo results, publishes among them are already live.
                console.error(`${TAG} ${task.id} commit failed:`, err);
                const message = err instanceof Error ? err.message : String(err);
                return this.commitFailure(task, executor, result.patch, [
                    { photo_index: null, error: new DownstreamError(`commit failed: ${message}`, 'transient', null, err) },
                ]);
            }
        }

        return this.commitFailure(task, executor, result.patch, result.failures);
    }

    private async commitSuccess(task: PhotoTask, executor: StepExecutor, result: StepRunResult): Promise<DispatchOutcome | null> {
        const processed = result.attempted.length;
        const note = result.skipped.length > 0
            ? `Processed ${processed} photo(s), ${result.skipped.length} already done`
            : `Processed ${processed} photo(s)`;

        const committed = await this.commit(task, {
            ...result.patch,
            status: executor.to,
            retry_metadata: { count: 0, last_error: null, last_error_kind: null },
            next_attempt_at: null,
            append_log: this.audit.entry(executor.agentName, `${executor.step}_completed`, note),
        });
        if (!committed) return null;

        console.log(`${TAG} ${task.sku_code} (${task.id}): ${task.status} → ${executor.to}`);
        return { kind: 'advanced', status: executor.to };
    }

    private async commitFailure(
        task: PhotoTask,
        executor: StepExecutor,
        patch: StepRunResult['patch'],
        failures: PhotoFailure[],
    ): Promise<DispatchOutcome | null> {
        const count = task.retry_metadata.count + 1;
        const kind = mostSevere(failures);
        const lastError = formatFailures(failures);
        const retryMetadata: RetryMetadata = { count, last_error: lastError, last_error_kind: kind };

        if (count > this.config.maxRetries) {
            const committed = await this.commit(task, {
                ...patch,
                status: TaskStatus.FAILED,
                retry_metadata: retryMetadata,
                next_attempt_at: null,
                append_log: this.audit.entry(
                    executor.agentName,
                    `${executor.step}_failed`,
                    `Retries exhausted after ${count} attempts: ${lastError}`,
                ),
            });
            if (!committed) return null;

            console.error(`${TAG} ${task.sku_code} (${task.id}): ${task.status} → FAILED (${kind})`);
            return { kind: 'failed', reason: kind };
        }

        const delayMs = retryDelay(count, this.config);
        const committed = await this.commit(task, {
            ...patch,
            retry_metadata: retryMetadata,
            next_attempt_at: new Date(this.clock().getTime() + delayMs),
            append_log: this.audit.entry(
                executor.agentName,
                `${executor.step}_retry_scheduled`,
                `Attempt ${count} failed, retrying in ${delayMs}ms: ${lastError}`,
            ),
        });
        if (!committed) return null;

        console.warn(`${TAG} ${task.sku_code} (${task.id}): attempt ${count}/${this.config.maxRetries + 1} failed (${kind}), retry in ${delayMs}ms`);
        return { kind: 'retry_scheduled', attempt: count, delayMs };
    }

    // Retrying cannot produce input that is missing, so the task fails at once.
    private async failIntegrity(task: PhotoTask, executor: StepExecutor, err: DataIntegrityError): Promise<DispatchOutcome> {
        const committed = await this.commit(task, {
            status: TaskStatus.FAILED,
            retry_metadata: {
                count: task.retry_metadata.count,
                last_error: `data_integrity: ${err.message}`,
                last_error_kind: 'data_integrity',
            },
            next_attempt_at: null,
            append_log: this.audit.entry(executor.agentName, `${executor.step}_failed`, `Data integrity: ${err.message}`),
        });
        if (!committed) {
            console.warn(`${TAG} ${task.id} left ${task.status} while dispatching, abandoning`);
            return { kind: 'conflict' };
        }

        console.error(`${TAG} ${task.sku_code} (${task.id}): ${task.status} → FAILED (data_integrity: ${err.message})`);
        return { kind: 'failed', reason: 'data_integrity' };
    }

    private commit(task: PhotoTask, patch: TaskPatch): Promise<PhotoTask | null> {
        return this.store.update(task.id, patch, task.status, task.version);
    }
}
