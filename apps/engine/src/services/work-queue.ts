import { WorkItem } from './dispatcher';

const TAG = '[queue]';

export interface WorkQueueOptions {
    /** Dispatches running at once. */
    concurrency: number;
    /** Waiting items above which the queue reports saturation. */
    capacity: number;
}

type Handler = (item: WorkItem) => Promise<void>;

interface Entry {
    key: string;
    item: WorkItem;
    resolve: (processed: boolean) => void;
}

interface Timer {
    handle: NodeJS.Timeout;
    dueAt: number;
}

function keyOf(item: WorkItem): string {
    return `${item.task_id}:${item.observed_status}`;
}

/**
 * Bounded dispatch queue. Items for the same task never run concurrently, and an item
 * equal to one already waiting or running shares its completion instead of queueing again.
 *
 * `enqueue` resolves true once the handler finished with the item, false when the
 * queue stopped before running it.
 */
export class WorkQueue {
    private readonly waiting: Entry[] = [];
    private readonly known = new Map<string, Promise<boolean>>();
    private readonly running = new Map<string, Promise<void>>();
    private readonly timers = new Map<string, Timer>();
    private accepting = true;

    constructor(
        private readonly handler: Handler,
        private readonly options: WorkQueueOptions,
    ) { }

    get size(): number {
        return this.waiting.length;
    }

    get active(): number {
        return this.running.size;
    }

    get scheduled(): number {
        return this.timers.size;
    }

    isSaturated(): boolean {
        return this.waiting.length >= this.options.capacity;
    }

    enqueue(item: WorkItem): Promise<boolean> {
        if (!this.accepting) return Promise.resolve(false);

        const key = keyOf(item);
        const existing = this.known.get(key);
        if (existing) return existing;

        let resolve: (processed: boolean) => void = () => { };
        const done = new Promise<boolean>(r => { resolve = r; });
        this.known.set(key, done);
        this.waiting.push({ key, item, resolve });
        this.pump();
        return done;
    }

    /** Enqueues the item after a delay; one timer per task, the earliest wins. */
    schedule(item: WorkItem, delayMs: number): void {
        if (!this.accepting) return;

        const delay = Math.max(0, delayMs);
        const dueAt = Date.now() + delay;
        const pending = this.timers.get(item.task_id);
        if (pending) {
            if (pending.dueAt <= dueAt) return;
            clearTimeout(pending.handle);
        }

        const handle = setTimeout(() => {
            this.timers.delete(item.task_id);
            this.enqueue(item).catch(
                err => console.error(`${TAG} scheduled item for ${item.task_id} failed:`, err),
            );
        }, delay);
        this.timers.set(item.task_id, { handle, dueAt });
    }

    /** Accepts work again after stop(). */
    start(): void {
        this.accepting = true;
    }

    /** Stops accepting work, drops waiting items and timers, and waits for running dispatches. */
    async stop(): Promise<void> {
        this.accepting = false;

        for (const timer of this.timers.values()) clearTimeout(timer.handle);
        this.timers.clear();

        const dropped = this.waiting.splice(0);
        for (const entry of dropped) {
            this.known.delete(entry.key);
            entry.resolve(false);
        }
        if (dropped.length > 0) {
            console.log(`${TAG} dropped ${dropped.length} waiting item(s) on shutdown`);
        }

        await Promise.all(this.running.values());
    }

    private pump(): void {
        while (this.running.size < this.options.concurrency) {
            const index = this.waiting.findIndex(e => !this.running.has(e.item.task_id));
            if (index === -1) return;
            const [entry] = this.waiting.splice(index, 1);
            this.running.set(entry.item.task_id, this.run(entry));
        }
    }

    private async run(entry: Entry): Promise<void> {
        try {
            await this.handler(entry.item);
        } catch (err) {
            console.error(`${TAG} handler error for ${entry.item.task_id}:`, err);
        } finally {
            this.running.delete(entry.item.task_id);
            this.known.delete(entry.key);
            entry.resolve(true);
            if (this.accepting) this.pump();
        }
    }
}
