import { v7 as uuid } from 'uuid';
import { AgentLogEntry, PhotoTask, TERMINAL_STATUSES, TaskStatus, WORKFLOW_STEP } from '@photoflow/sdk';
import { TaskChangeEvent, TaskEventOperation } from '../../src/db/task-event.entity';
import { DISPATCHABLE_STATUSES } from '../../src/db/task.entity';
import {
    ChangeSource,
    ChangeSubscription,
    EventBounds,
    NewTask,
    TaskPatch,
    TaskStore,
    assertResumable,
} from '../../src/repositories/task.store';
import { DuplicateSkuError } from '../../src/errors';

type FailingOp = 'findById' | 'update' | 'appendLog' | 'fetch' | 'subscribe';

interface StoredEvent {
    event: TaskChangeEvent;
    created_at: Date;
}

/**
 * TaskStore and ChangeSource over plain maps, with the same guards as the Postgres
 * repositories: conditional update on status, one change event per write, and a
 * notification per event.
 */
export class InMemoryTaskStore implements TaskStore, ChangeSource {
    readonly tasks = new Map<string, PhotoTask>();
    private events: StoredEvent[] = [];
    private seq = 0;
    private readonly listeners = new Set<() => void>();
    private readonly failures = new Map<FailingOp, Error[]>();

    constructor(public clock: () => Date = () => new Date()) { }

    /** Makes the next `times` calls of `op` throw `error`. */
    failNext(op: FailingOp, error: Error, times = 1): void {
        const queue = this.failures.get(op) ?? [];
        for (let i = 0; i < times; i++) queue.push(error);
        this.failures.set(op, queue);
    }

    get(id: string): PhotoTask {
        const task = this.tasks.get(id);
        if (!task) throw new Error(`no task ${id}`);
        return structuredClone(task);
    }

    allEvents(): TaskChangeEvent[] {
        return this.events.map(e => ({ ...e.event }));
    }

    get listenerCount(): number {
        return this.listeners.size;
    }

    /** Drops events up to and including `throughSeq`, as retention would. */
    truncateHistory(throughSeq: number): void {
        this.events = this.events.filter(e => e.event.seq > throughSeq);
    }

    /** Overwrites stored fields without a change event, for arranging test state. */
    arrange(id: string, fields: Partial<PhotoTask>): PhotoTask {
        const task = { ...this.get(id), ...fields };
        this.tasks.set(id, task);
        return structuredClone(task);
    }

    async insert(input: NewTask): Promise<PhotoTask> {
        for (const task of this.tasks.values()) {
            if (task.sku_code === input.sku_code) throw new DuplicateSkuError(input.sku_code);
        }
        const now = this.clock();
        const task: PhotoTask = {
            id: uuid(),
            sku_code: input.sku_code,
            status: TaskStatus.UPLOADED,
            workflow_step: WORKFLOW_STEP[TaskStatus.UPLOADED],
            metadata: structuredClone(input.metadata),
            color_analysis: [],
            publish_results: [],
            agent_log: structuredClone(input.agent_log),
            retry_metadata: { count: 0, last_error: null, last_error_kind: null },
            next_attempt_at: null,
            version: 0,
            created_at: now,
            updated_at: now,
        };
        this.tasks.set(task.id, task);
        this.record(task.id, 'insert', null, task.status);
        return structuredClone(task);
    }

    async findById(id: string): Promise<PhotoTask | null> {
        this.maybeFail('findById');
        const task = this.tasks.get(id);
        return task ? structuredClone(task) : null;
    }

    async findBySku(skuCode: string): Promise<PhotoTask | null> {
        for (const task of this.tasks.values()) {
            if (task.sku_code === skuCode) return structuredClone(task);
        }
        return null;
    }

    async update(id: string, patch: TaskPatch, expectedStatus: TaskStatus, expectedVersion?: number): Promise<PhotoTask | null> {
        this.maybeFail('update');
        const current = this.tasks.get(id);
        if (!current || current.status !== expectedStatus) return null;
        if (expectedVersion !== undefined && current.version !== expectedVersion) return null;

        const next: PhotoTask = structuredClone(current);
        if (patch.status !== undefined) {
            next.status = patch.status;
            if (patch.status !== TaskStatus.FAILED) next.workflow_step = WORKFLOW_STEP[patch.status];
        }
        if (patch.color_analysis !== undefined) next.color_analysis = structuredClone(patch.color_analysis);
        if (patch.publish_results !== undefined) next.publish_results = structuredClone(patch.publish_results);
        if (patch.retry_metadata !== undefined) next.retry_metadata = { ...patch.retry_metadata };
        if (patch.next_attempt_at !== undefined) next.next_attempt_at = patch.next_attempt_at;
        if (patch.append_log !== undefined) next.agent_log.push({ ...patch.append_log });
        next.version = current.version + 1;
        next.updated_at = this.clock();

        this.tasks.set(id, next);
        this.record(id, 'update', current.status, next.status);
        return structuredClone(next);
    }

    async appendLog(id: string, entry: AgentLogEntry): Promise<void> {
        this.maybeFail('appendLog');
        const task = this.tasks.get(id);
        if (!task) throw new Error(`task ${id} not found`);
        task.agent_log.push({ ...entry });
        task.updated_at = this.clock();
        this.record(id, 'update', task.status, task.status);
    }

    async findNonTerminal(limit: number): Promise<PhotoTask[]> {
        return [...this.tasks.values()]
            .filter(t => !TERMINAL_STATUSES.includes(t.status))
            .slice(0, limit)
            .map(t => structuredClone(t));
    }

    async findDue(now: Date, staleBefore: Date, limit: number): Promise<PhotoTask[]> {
        return [...this.tasks.values()]
            .filter(t => DISPATCHABLE_STATUSES.includes(t.status))
            .filter(t => t.next_attempt_at
                ? t.next_attempt_at.getTime() <= now.getTime()
                : t.updated_at.getTime() < staleBefore.getTime())
            .slice(0, limit)
            .map(t => structuredClone(t));
    }

    async fetch(after: number, limit: number): Promise<TaskChangeEvent[]> {
        this.maybeFail('fetch');
        const events = this.events
            .filter(e => e.event.seq > after)
            .slice(0, limit)
            .map(e => ({ ...e.event }));
        if (events.length > 0 && events[0].seq === after + 1) return events;
        assertResumable(after, events, await this.bounds());
        return events;
    }

    async bounds(): Promise<EventBounds> {
        if (this.events.length === 0) return { oldest: null, newest: null };
        return { oldest: this.events[0].event.seq, newest: this.events[this.events.length - 1].event.seq };
    }

    async subscribe(onNotify: () => void, _onError: (err: Error) => void): Promise<ChangeSubscription> {
        this.maybeFail('subscribe');
        this.listeners.add(onNotify);
        return {
            close: async () => {
                this.listeners.delete(onNotify);
            },
        };
    }

    async prune(olderThan: Date): Promise<number> {
        const before = this.events.length;
        this.events = this.events.filter(e => e.created_at.getTime() >= olderThan.getTime());
        return before - this.events.length;
    }

    private record(taskId: string, operation: TaskEventOperation, oldStatus: TaskStatus | null, newStatus: TaskStatus): void {
        this.events.push({
            event: { seq: ++this.seq, task_id: taskId, operation, old_status: oldStatus, new_status: newStatus },
            created_at: this.clock(),
        });
        for (const listener of this.listeners) listener();
    }

    private maybeFail(op: FailingOp): void {
        const queue = this.failures.get(op);
        const error = queue?.shift();
        if (error) throw error;
    }
}
