import type {
    AgentLogEntry,
    ColorAnalysisEntry,
    PhotoTask,
    PublishResultEntry,
    RetryMetadata,
    TaskMetadata,
} from '@photoflow/sdk';
import { TaskStatus } from '../db/task.entity';
import { TaskChangeEvent } from '../db/task-event.entity';
import { ResumeTokenInvalidError } from '../errors';

export interface NewTask {
    sku_code: string;
    metadata: TaskMetadata;
    agent_log: AgentLogEntry[];
}

/**
 * Fields the orchestrator may write after creation. `append_log` is pushed onto
 * agent_log in the same write; workflow_step follows status.
 */
export interface TaskPatch {
    status?: TaskStatus;
    color_analysis?: ColorAnalysisEntry[];
    publish_results?: PublishResultEntry[];
    retry_metadata?: RetryMetadata;
    next_attempt_at?: Date | null;
    append_log?: AgentLogEntry;
}

export interface TaskStore {
    /** Creates a task in UPLOADED. Throws DuplicateSkuError if the SKU exists. */
    insert(task: NewTask): Promise<PhotoTask>;
    findById(id: string): Promise<PhotoTask | null>;
    findBySku(skuCode: string): Promise<PhotoTask | null>;
    /**
     * Conditional write: applies `patch` only while the stored status equals
     * `expectedStatus` and, when given, the stored version equals `expectedVersion`.
     * Every applied write bumps the version. Returns the updated task, or null when
     * the guard failed.
     */
    update(id: string, patch: TaskPatch, expectedStatus: TaskStatus, expectedVersion?: number): Promise<PhotoTask | null>;
    /** Appends one audit entry; throws if the task does not exist. */
    appendLog(id: string, entry: AgentLogEntry): Promise<void>;
    findNonTerminal(limit: number): Promise<PhotoTask[]>;
    /**
     * Dispatchable tasks whose scheduled retry is due, plus those with no scheduled
     * retry that have not been written since `staleBefore`.
     */
    findDue(now: Date, staleBefore: Date, limit: number): Promise<PhotoTask[]>;
}

export interface EventBounds {
    oldest: number | null;
    newest: number | null;
}

export interface ChangeSubscription {
    close(): Promise<void>;
}

export interface ChangeSource {
    /** Events with seq > after, ascending. Throws ResumeTokenInvalidError when `after` fell out of history. */
    fetch(after: number, limit: number): Promise<TaskChangeEvent[]>;
    bounds(): Promise<EventBounds>;
    /** Calls onNotify whenever a new event is written; onError when the subscription breaks. */
    subscribe(onNotify: () => void, onError: (err: Error) => void): Promise<ChangeSubscription>;
    /** Deletes events created before `olderThan`; returns the number removed. */
    prune(olderThan: Date): Promise<number>;
}

/**
 * Decides whether reading after `after` is still gap-free. Sequence gaps inside
 * retained history (rolled-back inserts) are fine; missing history at the front is not.
 */
export function assertResumable(after: number, events: TaskChangeEvent[], bounds: EventBounds): void {
    if (bounds.newest === null) return;
    if (after > bounds.newest) {
        throw new ResumeTokenInvalidError(after, bounds.oldest, bounds.newest);
    }
    // 0 is the position of an empty history, so whatever is retained now came after it
    if (after > 0 && events.length > 0 && bounds.oldest !== null && bounds.oldest > after + 1) {
        throw new ResumeTokenInvalidError(after, bounds.oldest, bounds.newest);
    }
}
