import { ChangeSource, TaskStore } from '../repositories/task.store';
import { WorkItem } from './dispatcher';

const TAG = '[sweeper]';

export interface RetrySweeperConfig {
    onWorkItem: (item: WorkItem) => Promise<boolean>;
    intervalMs?: number;
    staleThresholdSeconds?: number;
    eventRetentionHours?: number;
    batchSize?: number;
}

export interface SweepResult {
    enqueued: string[];
    pruned: number;
}

// Re-dispatches tasks whose retry is due, and tasks that went quiet without one
// (an event lost to a crash between commit and acknowledgement). Runs on the leader only.
export class RetrySweeper {
    private readonly intervalMs: number;
    private readonly staleThresholdSeconds: number;
    private readonly eventRetentionHours: number;
    private readonly batchSize: number;
    private readonly onWorkItem: (item: WorkItem) => Promise<boolean>;
    private intervalHandle: NodeJS.Timeout | null = null;
    private running = false;
    private isSweeping = false;

    constructor(
        private readonly store: Pick<TaskStore, 'findDue'>,
        private readonly events: Pick<ChangeSource, 'prune'>,
        config: RetrySweeperConfig,
        private readonly clock: () => Date = () => new Date(),
    ) {
        this.onWorkItem = config.onWorkItem;
        this.intervalMs = config.intervalMs ?? 10_000;
        this.staleThresholdSeconds = config.staleThresholdSeconds ?? 300;
        this.eventRetentionHours = config.eventRetentionHours ?? 168;
        this.batchSize = config.batchSize ?? 100;
    }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }
        this.running = true;
        console.log(`${TAG} started (interval: ${this.intervalMs}ms, stale threshold: ${this.staleThresholdSeconds}s)`);

        // Fire immediately, then on schedule
        this.tick();
        this.intervalHandle = setInterval(() => this.tick(), this.intervalMs);
    }

    stop(): void {
        this.running = false;
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
        console.log(`${TAG} stopped`);
    }

    isRunning(): boolean {
        return this.running;
    }

    async sweep(): Promise<SweepResult> {
        const result: SweepResult = { enqueued: [], pruned: 0 };
        if (this.isSweeping) return result;
        this.isSweeping = true;

        try {
            const now = this.clock();
            const staleBefore = new Date(now.getTime() - this.staleThresholdSeconds * 1000);
            const due = await this.store.findDue(now, staleBefore, this.batchSize);

            for (const task of due) {
                const item: WorkItem = { task_id: task.id, observed_status: task.status };
                this.onWorkItem(item).catch(
                    err => console.error(`${TAG} re-dispatch of ${task.id} failed:`, err),
                );
                result.enqueued.push(task.id);
            }

            const retainAfter = new Date(now.getTime() - this.eventRetentionHours * 3_600_000);
            result.pruned = await this.events.prune(retainAfter);

            if (result.enqueued.length > 0 || result.pruned > 0) {
                console.log(`${TAG} re-dispatched ${result.enqueued.length} task(s), pruned ${result.pruned} event(s)`);
            }
        } finally {
            this.isSweeping = false;
        }

        return result;
    }

    private tick(): void {
        this.sweep().catch(err => console.error(`${TAG} error during sweep:`, err));
    }
}
