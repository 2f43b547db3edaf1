export { StepDispatcher, mostSevere, formatFailures } from './dispatcher';
export type { WorkItem, DispatchOutcome, DispatcherConfig } from './dispatcher';
export { WorkQueue } from './work-queue';
export { PositionTracker } from './position-tracker';
export { RedisResumeTokenStore, RESUME_TOKEN_KEY } from './resume-token.store';
export type { ResumeTokenStore } from './resume-token.store';
export { ChangeFeedListener, toWorkItem } from './change-feed';
export { LeaderElector, RedisLeaseStore, LEADER_KEY } from './leaderelector';
export type { LeaseStore } from './leaderelector';
export { RetrySweeper } from './retry-sweeper';
export type { SweepResult } from './retry-sweeper';
export { Orchestrator } from './orchestrator';
export { EventLoopMonitor } from './event-loop-monitor';
