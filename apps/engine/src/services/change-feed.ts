import { TaskChangeEvent } from '../db/task-event.entity';
import { isDispatchable } from '../db/task.entity';
import { ChangeSource, ChangeSubscription, TaskStore } from '../repositories/task.store';
import { ResumeTokenInvalidError } from '../errors';
import { calculateBackOff } from '../utils/backoff';
import { WorkItem } from './dispatcher';
import { PositionTracker } from './position-tracker';
import { ResumeTokenStore } from './resume-token.store';

const TAG = '[feed]';

export interface ChangeFeedConfig {
    /** Resolves true once the item's dispatch finished, false if it was dropped. */
    onWorkItem: (item: WorkItem) => Promise<boolean>;
    batchSize?: number;
    /** Most open tasks re-dispatched by one re-scan; the sweeper recovers any beyond it. */
    rescanLimit?: number;
    checkBackpressure?: () => boolean;
}

/**
 * Only status transitions into a dispatchable status produce work. Updates that keep
 * the status (retry bookkeeping, audit notes) and moves into terminal statuses do not.
 */
export function toWorkItem(event: TaskChangeEvent): WorkItem | null {
    if (!isDispatchable(event.new_status)) return null;
    if (event.operation === 'update' && event.old_status === event.new_status) return null;
    return { task_id: event.task_id, observed_status: event.new_status };
}

/**
 * Follows the task change feed and hands dispatchable transitions to `onWorkItem`.
 * Reads after a persisted resume token, which only advances past an event once its
 * dispatch completed. NOTIFY wakes it early; otherwise it polls, backing off
 * 100 → 500ms while idle. A lost or expired token triggers a re-scan of open tasks.
 */
export class ChangeFeedListener {
    private interval = 100;
    private readonly minInterval = 100;
    private readonly maxInterval = 500;
    private readonly batchSize: number;
    private readonly rescanLimit: number;
    private readonly onWorkItem: (item: WorkItem) => Promise<boolean>;
    private readonly checkBackpressure?: () => boolean;

    private running = false;
    private currentTimeout: NodeJS.Timeout | null = null;
    private polling: Promise<void> | null = null;
    private wakeRequested = false;
    private subscription: ChangeSubscription | null = null;
    private tracker: PositionTracker | null = null;
    private needsRescan = false;
    private failures = 0;
    private lastSaved: number | null = null;
    private readonly inflight = new Set<Promise<void>>();

    constructor(
        private readonly source: ChangeSource,
        private readonly store: Pick<TaskStore, 'findNonTerminal'>,
        private readonly tokens: ResumeTokenStore,
        config: ChangeFeedConfig,
    ) {
        this.onWorkItem = config.onWorkItem;
        this.batchSize = config.batchSize || 50;
        this.rescanLimit = config.rescanLimit || 10_000;
        this.checkBackpressure = config.checkBackpressure;
    }

    /** Position the next start would resume after, or null before the first read. */
    get committedPosition(): number | null {
        return this.tracker ? this.tracker.committed : null;
    }

    isRunning(): boolean {
        return this.running;
    }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }
        this.running = true;
        this.interval = this.minInterval;
        this.failures = 0;
        // Re-read the stored token on every start; another instance may have moved it
        this.tracker = null;
        this.lastSaved = null;
        console.log(`${TAG} started`);
        this.schedule(0);
    }

    /** Stops reading. Dispatches already handed out keep running; call flush() once they finish. */
    async stop(): Promise<void> {
        this.running = false;
        if (this.currentTimeout) {
            clearTimeout(this.currentTimeout);
            this.currentTimeout = null;
        }
        if (this.polling) await this.polling;
        await this.unsubscribe();
        console.log(`${TAG} stopped`);
    }

    /** Waits for outstanding acknowledgements and persists the committed position. */
    async flush(): Promise<void> {
        await Promise.all(this.inflight);
        await this.savePosition();
    }

    private schedule(delayMs: number): void {
        if (!this.running) return;
        this.currentTimeout = setTimeout(() => {
            this.currentTimeout = null;
            this.polling = this.poll();
        }, delayMs);
    }

    private wake(): void {
        if (!this.running) return;
        if (this.currentTimeout) {
            clearTimeout(this.currentTimeout);
            this.schedule(0);
        } else {
            this.wakeRequested = true;
        }
    }

    private async poll(): Promise<void> {
        if (!this.running) return;
        this.wakeRequested = false;

        if (this.checkBackpressure && this.checkBackpressure()) {
            console.warn(`${TAG} backpressure detected, skipping read`);
            this.schedule(1000);
            return;
        }

        let delay: number;
        try {
            const tracker = this.tracker ?? await this.initialize();
            if (!this.subscription) await this.subscribe();

            const events = await this.source.fetch(tracker.cursor, this.batchSize);
            this.failures = 0;

            for (const event of events) {
                if (!this.running) break;
                this.handle(event, tracker);
            }
            await this.savePosition();

            if (events.length > 0) {
                this.interval = this.minInterval;
            } else {
                this.interval = Math.min(this.interval * 2, this.maxInterval);
            }
            // A full batch means more is waiting
            delay = events.length >= this.batchSize || this.wakeRequested ? 0 : this.interval;
        } catch (err) {
            delay = await this.recover(err);
        }

        this.schedule(delay);
    }

    private async recover(err: unknown): Promise<number> {
        if (err instanceof ResumeTokenInvalidError) {
            console.warn(`${TAG} ${err.message}, re-scanning open tasks`);
            this.tracker = null;
            this.needsRescan = true;
            return 0;
        }

        this.failures++;
        const delay = calculateBackOff(this.failures);
        console.error(`${TAG} read failed (attempt ${this.failures}), reconnecting in ${delay}ms:`, err);
        await this.unsubscribe();
        return delay;
    }

    private async initialize(): Promise<PositionTracker> {
        const token = this.needsRescan ? null : await this.tokens.load();
        if (token !== null) {
            console.log(`${TAG} resuming after event ${token}`);
            const tracker = new PositionTracker(token);
            this.tracker = tracker;
            this.lastSaved = token;
            return tracker;
        }

        // Record the head before scanning: anything written during the scan is read
        // from the feed afterwards, and dispatching it twice is harmless
        const { newest } = await this.source.bounds();
        const head = newest ?? 0;
        const tasks = await this.store.findNonTerminal(this.rescanLimit);
        console.warn(`${TAG} re-scan found ${tasks.length} open task(s), continuing after event ${head}`);

        const tracker = new PositionTracker(head);
        this.tracker = tracker;
        this.needsRescan = false;
        this.lastSaved = null;

        for (const task of tasks) {
            if (!isDispatchable(task.status)) continue;
            this.emit({ task_id: task.id, observed_status: task.status }, head, tracker);
        }
        return tracker;
    }

    private handle(event: TaskChangeEvent, tracker: PositionTracker): void {
        const item = toWorkItem(event);
        if (!item) {
            tracker.skip(event.seq);
            return;
        }
        this.emit(item, event.seq, tracker);
    }

    private emit(item: WorkItem, seq: number, tracker: PositionTracker): void {
        tracker.track(seq);
        const run = async () => {
            try {
                if (await this.onWorkItem(item)) tracker.ack(seq);
            } catch (err) {
                console.error(`${TAG} work item for ${item.task_id} failed:`, err);
            } finally {
                this.inflight.delete(ack);
            }
        };
        const ack = run();
        this.inflight.add(ack);
    }

    private async savePosition(): Promise<void> {
        if (!this.tracker) return;
        const position = this.tracker.committed;
        if (position === null || position === this.lastSaved) return;
        await this.tokens.save(position);
        this.lastSaved = position;
    }

    private async subscribe(): Promise<void> {
        this.subscription = await this.source.subscribe(
            () => this.wake(),
            err => {
                console.error(`${TAG} notification channel lost:`, err.message);
                this.subscription = null;
            },
        );
    }

    private async unsubscribe(): Promise<void> {
        const subscription = this.subscription;
        if (!subscription) return;
        this.subscription = null;
        try {
            await subscription.close();
        } catch (err) {
            console.error(`${TAG} error closing notification channel:`, err);
        }
    }
}
