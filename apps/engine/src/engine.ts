// public api for @batchline/engine
export { JobEngine, validateRetryPolicy } from './services/job-engine';
export type {
    JobEngineOptions,
    CreateJobOptions,
    CreateGroupOptions,
    JobStatus,
    GroupStatus,
    JobFilter,
    EngineStats,
} from './services/job-engine';
export type { TransitionEvent, GroupEvent, ProgressEvent } from './services/scheduler';
export type { ReapedJob } from './services/reaper';
export { JobState, JobPriority, DEFAULT_RETRY_POLICY } from './db/job.entity';
export type { JobEntity, JobArgs, JobErrorRecord, RetryPolicy } from './db/job.entity';
export { GroupState } from './db/job-group.entity';
export type { GroupSummary, JobGroupEntity } from './db/job-group.entity';
export type { JobStore, PendingRecords } from './repositories/job-store';
export { FileJobStore } from './repositories/file-job-store';
export { PgJobStore } from './repositories/pg-job-store';
export { MemoryJobStore } from './repositories/memory-job-store';
export { loadConfig } from './config';
export type { EngineConfig, StoreKind } from './config';
export { registerBuiltinTasks } from './tasks';
export * from './errors/engine.errors';
