export interface EngineConfig {
  port: number;
  databaseUrl: string;
  redisUrl: string;
  maxRetries: number;
  retryBaseMs: number;
  retryMaxMs: number;
  executorTimeoutMs: number;
  dispatchConcurrency: number;
  maxQueueSize: number;
  maxEventLoopLag: number;
  feedBatchSize: number;
  sweepIntervalMs: number;
  staleThresholdSeconds: number;
  eventRetentionHours: number;
  leaderTtlSeconds: number;
  vision: {
    url: string;
    apiKey: string;
  };
  wordpress: {
    url: string;
    user: string;
    appPassword: string;
  };
}

export class ConfigError extends Error {
  constructor(public readonly variable: string) {
    super(`${variable} is required`);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

// Values below `min` fall back to the default like unparsable ones
function int(env: Env, name: string, fallback: number, min = 1): number {
  const value = parseInt(env[name] || "", 10);
  return Number.isNaN(value) || value < min ? fallback : value;
}

function required(env: Env, name: string): string {
  const value = env[name]?.trim();
  if (!value) throw new ConfigError(name);
  return value;
}

// Central configuration, parsed once at start-up
export function loadConfig(env: Env = process.env): EngineConfig {
  return {
    port: int(env, "PORT", 50051),
    databaseUrl: required(env, "DATABASE_URL"),
    redisUrl: env.REDIS_URL || "redis://localhost:6379",
    maxRetries: int(env, "MAX_RETRIES", 3, 0),
    retryBaseMs: int(env, "RETRY_BASE_MS", 5000),
    retryMaxMs: int(env, "RETRY_MAX_MS", 300000),
    executorTimeoutMs: int(env, "EXECUTOR_TIMEOUT_MS", 60000),
    dispatchConcurrency: int(env, "DISPATCH_CONCURRENCY", 4),
    maxQueueSize: int(env, "MAX_QUEUE_SIZE", 100),
    maxEventLoopLag: int(env, "MAX_EVENT_LOOP_LAG", 100),
    feedBatchSize: int(env, "FEED_BATCH_SIZE", 50),
    sweepIntervalMs: int(env, "SWEEP_INTERVAL_MS", 10000),
    staleThresholdSeconds: int(env, "STALE_THRESHOLD_SECONDS", 300),
    eventRetentionHours: int(env, "EVENT_RETENTION_HOURS", 168),
    leaderTtlSeconds: int(env, "LEADER_TTL_SECONDS", 30),
    vision: {
      url: required(env, "VISION_SERVICE_URL"),
      apiKey: required(env, "VISION_API_KEY"),
    },
    wordpress: {
      url: required(env, "WORDPRESS_URL"),
      user: required(env, "WORDPRESS_USER"),
      appPassword: required(env, "WORDPRESS_APP_PASSWORD"),
    },
  };
}
