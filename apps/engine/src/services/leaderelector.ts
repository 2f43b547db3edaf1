import { Redis } from 'ioredis';

export const LEADER_KEY = 'photoflow:orchestrator:leader';

const TAG = '[leader]';

/** An expiring, owner-checked lock. */
export interface LeaseStore {
    acquire(key: string, owner: string, ttlSeconds: number): Promise<boolean>;
    owner(key: string): Promise<string | null>;
    /** Extends the lease only while `owner` still holds it. */
    renew(key: string, owner: string, ttlSeconds: number): Promise<boolean>;
    /** Deletes the lease only while `owner` still holds it. */
    release(key: string, owner: string): Promise<void>;
}

const RENEW_SCRIPT = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
        return redis.call("expire", KEYS[1], ARGV[2])
    else
        return 0
    end
`;

const RELEASE_SCRIPT = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
        return redis.call("del", KEYS[1])
    else
        return 0
    end
`;

export class RedisLeaseStore implements LeaseStore {
    constructor(private readonly redis: Redis) { }

    async acquire(key: string, owner: string, ttlSeconds: number): Promise<boolean> {
        // SET NX with TTL - atomic
        const result = await this.redis.set(key, owner, 'EX', ttlSeconds, 'NX');
        return result === 'OK';
    }

    owner(key: string): Promise<string | null> {
        return this.redis.get(key);
    }

    async renew(key: string, owner: string, ttlSeconds: number): Promise<boolean> {
        const result = await this.redis.eval(RENEW_SCRIPT, 1, key, owner, ttlSeconds);
        return result === 1;
    }

    async release(key: string, owner: string): Promise<void> {
        await this.redis.eval(RELEASE_SCRIPT, 1, key, owner);
    }
}

export interface LeaderElectorOptions {
    ttlSeconds: number;
    workerId?: string;
    key?: string;
    /** Called once when a renewal finds the lease held by someone else. */
    onLost?: () => void;
}

/**
 * Single-leader election over a LeaseStore. The leader renews at half the TTL;
 * if it stalls past the TTL the lease expires and a standby can take over.
 */
export class LeaderElector {
    readonly workerId: string;
    private readonly key: string;
    private readonly ttlSeconds: number;
    private readonly onLost?: () => void;
    private renewalInterval: NodeJS.Timeout | null = null;
    private renewing = false;

    constructor(
        private readonly leases: LeaseStore,
        options: LeaderElectorOptions,
    ) {
        this.ttlSeconds = options.ttlSeconds;
        this.workerId = options.workerId || `worker-${process.pid}-${Date.now()}`;
        this.key = options.key || LEADER_KEY;
        this.onLost = options.onLost;
    }

    async tryBecomeLeader(): Promise<boolean> {
        if (await this.leases.acquire(this.key, this.workerId, this.ttlSeconds)) {
            this.startRenewal();
            return true;
        }

        // Re-election after a restart with the same worker id
        const current = await this.leases.owner(this.key);
        if (current === this.workerId) {
            this.startRenewal();
            return true;
        }
        return false;
    }

    async releaseLeadership(): Promise<void> {
        this.stopRenewal();
        await this.leases.release(this.key, this.workerId);
    }

    async isLeader(): Promise<boolean> {
        return (await this.leases.owner(this.key)) === this.workerId;
    }

    /** Runs one renewal; exposed so callers and tests need not wait for the timer. */
    async renew(): Promise<boolean> {
        if (this.renewing) return true;
        this.renewing = true;
        try {
            const stillLeader = await this.leases.renew(this.key, this.workerId, this.ttlSeconds);
            if (!stillLeader) {
                console.warn(`${TAG} ${this.workerId} lost leadership`);
                this.stopRenewal();
                this.onLost?.();
            }
            return stillLeader;
        } catch (err) {
            // Keep trying; the lease only lapses after the full TTL
            console.error(`${TAG} lease renewal failed:`, err);
            return true;
        } finally {
            this.renewing = false;
        }
    }

    private startRenewal(): void {
        if (this.renewalInterval) return;
        const renewalMs = (this.ttlSeconds * 1000) / 2;
        this.renewalInterval = setInterval(() => {
            this.renew().catch(err => console.error(`${TAG} renewal error:`, err));
        }, renewalMs);
    }

    private stopRenewal(): void {
        if (this.renewalInterval) {
            clearInterval(this.renewalInterval);
            this.renewalInterval = null;
        }
    }
}
