import "dotenv/config";
import { v7 as uuid } from "uuid";
import { applySchema, createPool, createRedis } from "./db";
import { createGrpcServer, startGrpcServer, stopGrpcServer } from "./grpc/server";
import { HealthService } from "./grpc/health.service";
import { TaskServiceImpl } from "./grpc/task.service";
import { TaskRepository } from "./repositories/task.repository";
import { TaskEventRepository } from "./repositories/task-event.repository";
import { AuditLogger } from "./audit/audit-logger";
import { HttpVisionClient } from "./clients/vision.client";
import { WordPressMediaClient } from "./clients/wordpress.client";
import { LocalPhotoStorage } from "./clients/photo-storage";
import { ColorCorrectionExecutor, ExecutorRegistry, PublishExecutor } from "./executors";
import {
  EventLoopMonitor,
  LeaderElector,
  Orchestrator,
  RedisLeaseStore,
  RedisResumeTokenStore,
  StepDispatcher,
} from "./services";
import { TaskRunner } from "./task-runner";
import { loadConfig } from "./config";

const TAG = "[photoflow]";

const config = loadConfig();
const workerId = `worker-${uuid()}`;

// Wiring
const pool = createPool(config.databaseUrl);
const redis = createRedis(config.redisUrl);

pool.on("error", (err) => console.error(`${TAG} idle client error:`, err));

const taskRepo = new TaskRepository(pool);
const eventRepo = new TaskEventRepository(pool);
const audit = new AuditLogger(taskRepo);

const storage = new LocalPhotoStorage();
const executors = new ExecutorRegistry([
  new ColorCorrectionExecutor(
    HttpVisionClient.create({
      baseUrl: config.vision.url,
      apiKey: config.vision.apiKey,
      timeoutMs: config.executorTimeoutMs,
    }),
  ),
  new PublishExecutor(
    WordPressMediaClient.create({ ...config.wordpress, timeoutMs: config.executorTimeoutMs }, storage),
  ),
]);

const dispatcher = new StepDispatcher(taskRepo, executors, audit, {
  maxRetries: config.maxRetries,
  baseDelayMs: config.retryBaseMs,
  maxDelayMs: config.retryMaxMs,
  executorTimeoutMs: config.executorTimeoutMs,
});

const monitor = new EventLoopMonitor();
const leases = new RedisLeaseStore(redis);

const orchestrator = new Orchestrator(
  {
    store: taskRepo,
    source: eventRepo,
    tokens: new RedisResumeTokenStore(redis),
    runner: new TaskRunner(dispatcher, audit),
    createElector: (onLost) =>
      new LeaderElector(leases, { ttlSeconds: config.leaderTtlSeconds, workerId, onLost }),
    isOverloaded: () => monitor.isLagging(config.maxEventLoopLag),
  },
  {
    concurrency: config.dispatchConcurrency,
    maxQueueSize: config.maxQueueSize,
    feedBatchSize: config.feedBatchSize,
    sweepIntervalMs: config.sweepIntervalMs,
    staleThresholdSeconds: config.staleThresholdSeconds,
    eventRetentionHours: config.eventRetentionHours,
    standbyRetryMs: (config.leaderTtlSeconds * 1000) / 2,
  },
);

const grpcServer = createGrpcServer(
  new TaskServiceImpl(taskRepo, audit),
  new HealthService([() => pool.query("SELECT 1"), () => redis.ping()]),
);

async function main() {
  console.log(`${TAG} starting engine... (worker: ${workerId})`);

  // Health checks
  await pool.query("SELECT 1");
  console.log(`${TAG} postgres connected`);

  await redis.ping();
  console.log(`${TAG} redis connected`);

  await applySchema(pool);
  console.log(`${TAG} schema applied`);

  await startGrpcServer(grpcServer, config.port);
  await orchestrator.start();

  console.log(`${TAG} engine ready`);
}

let shuttingDown = false;

async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`${TAG} ${signal} received, shutting down...`);

  await stopGrpcServer(grpcServer);
  await orchestrator.stop();
  monitor.disable();

  await pool.end();
  await redis.quit();
  console.log(`${TAG} shutdown complete`);
  process.exit(0);
}

function onSignal(signal: string) {
  shutdown(signal).catch((err) => {
    console.error(`${TAG} shutdown failed:`, err);
    process.exit(1);
  });
}

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));

main().catch((err) => {
  console.error(`${TAG} fatal:`, err);
  process.exit(1);
});
