import { ChangeSource, TaskStore } from '../repositories/task.store';
import { TaskRunner } from '../task-runner';
import { ChangeFeedListener } from './change-feed';
import { LeaderElector } from './leaderelector';
import { ResumeTokenStore } from './resume-token.store';
import { RetrySweeper } from './retry-sweeper';
import { WorkQueue } from './work-queue';

const TAG = '[orchestrator]';

export interface OrchestratorDeps {
    store: TaskStore;
    source: ChangeSource;
    tokens: ResumeTokenStore;
    runner: TaskRunner;
    /** Builds the elector; the orchestrator supplies the lost-leadership callback. */
    createElector: (onLost: () => void) => LeaderElector;
    /** Extra backpressure signal, e.g. event-loop lag. */
    isOverloaded?: () => boolean;
}

export interface OrchestratorConfig {
    concurrency: number;
    maxQueueSize: number;
    feedBatchSize: number;
    sweepIntervalMs: number;
    staleThresholdSeconds: number;
    eventRetentionHours: number;
    /** How often a standby tries to take over leadership. */
    standbyRetryMs: number;
}

/**
 * Wires change feed → work queue → dispatcher, plus the retry sweeper. Only the leader
 * reads the feed and sweeps; a standby keeps trying to acquire the lease.
 */
export class Orchestrator {
    readonly queue: WorkQueue;
    readonly feed: ChangeFeedListener;
    readonly sweeper: RetrySweeper;
    private readonly elector: LeaderElector;
    private readonly standbyRetryMs: number;
    private standbyTimer: NodeJS.Timeout | null = null;
    private leading = false;
    private started = false;
    private transition: Promise<void> = Promise.resolve();

    constructor(
        private readonly deps: OrchestratorDeps,
        config: OrchestratorConfig,
    ) {
        this.queue = new WorkQueue(item => deps.runner.run(this.queue, item), {
            concurrency: config.concurrency,
            capacity: config.maxQueueSize,
        });
        const onWorkItem = this.queue.enqueue.bind(this.queue);

        this.feed = new ChangeFeedListener(deps.source, deps.store, deps.tokens, {
            onWorkItem,
            batchSize: config.feedBatchSize,
            checkBackpressure: () => this.checkBackpressure(),
        });
        this.sweeper = new RetrySweeper(deps.store, deps.source, {
            onWorkItem,
            intervalMs: config.sweepIntervalMs,
            staleThresholdSeconds: config.staleThresholdSeconds,
            eventRetentionHours: config.eventRetentionHours,
        });
        this.elector = deps.createElector(() => this.onLeadershipLost());
        this.standbyRetryMs = config.standbyRetryMs;
    }

    isLeading(): boolean {
        return this.leading;
    }

    async start(): Promise<void> {
        if (this.started) {
            console.warn(`${TAG} already started`);
            return;
        }
        this.started = true;
        await this.campaign();
    }

    /** Stops reading, lets running dispatches finish, persists the position, releases the lease. */
    async stop(): Promise<void> {
        this.started = false;
        this.clearStandby();
        await this.transition;

        if (this.leading) {
            await this.stepDown();
            await this.elector.releaseLeadership();
        } else {
            await this.queue.stop();
        }
        console.log(`${TAG} stopped`);
    }

    private checkBackpressure(): boolean {
        if (this.queue.isSaturated()) {
            console.warn(`${TAG} [backpressure] queue size ${this.queue.size} at capacity`);
            return true;
        }
        return this.deps.isOverloaded ? this.deps.isOverloaded() : false;
    }

    private async campaign(): Promise<void> {
        if (!this.started) return;
        let elected = false;
        try {
            elected = await this.elector.tryBecomeLeader();
        } catch (err) {
            console.error(`${TAG} leader election failed:`, err);
        }

        if (!this.started) {
            if (elected) await this.elector.releaseLeadership();
            return;
        }

        if (elected) {
            this.leading = true;
            this.queue.start();
            console.log(`${TAG} ${this.elector.workerId} is leader, starting feed and sweeper`);
            this.feed.start();
            this.sweeper.start();
        } else {
            console.log(`${TAG} standing by, retrying in ${this.standbyRetryMs}ms`);
            this.standbyTimer = setTimeout(() => {
                this.standbyTimer = null;
                this.transition = this.campaign()
                    .catch(err => console.error(`${TAG} error during election:`, err));
            }, this.standbyRetryMs);
        }
    }

    private onLeadershipLost(): void {
        if (!this.leading) return;
        console.warn(`${TAG} leadership lost, stepping down`);
        this.transition = this.transition
            .then(() => this.stepDown())
            .then(() => this.campaign())
            .catch(err => console.error(`${TAG} error stepping down:`, err));
    }

    private async stepDown(): Promise<void> {
        this.leading = false;
        this.sweeper.stop();
        await this.feed.stop();
        await this.queue.stop();
        await this.feed.flush();
    }

    private clearStandby(): void {
        if (this.standbyTimer) {
            clearTimeout(this.standbyTimer);
            this.standbyTimer = null;
        }
    }
}
