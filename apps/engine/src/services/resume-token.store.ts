import Redis from 'ioredis';

export const RESUME_TOKEN_KEY = 'photoflow:feed:resume-token';

/** Persists the change-feed position across restarts. */
export interface ResumeTokenStore {
    load(): Promise<number | null>;
    save(position: number): Promise<void>;
}

export class RedisResumeTokenStore implements ResumeTokenStore {
    constructor(
        private readonly redis: Redis,
        private readonly key: string = RESUME_TOKEN_KEY,
    ) { }

    async load(): Promise<number | null> {
        const raw = await this.redis.get(this.key);
        if (raw === null) return null;
        const position = Number(raw);
        if (!Number.isSafeInteger(position) || position < 0) {
            console.warn(`[feed] ignoring unreadable resume token "${raw}"`);
            return null;
        }
        return position;
    }

    async save(position: number): Promise<void> {
        await this.redis.set(this.key, String(position));
    }
}
