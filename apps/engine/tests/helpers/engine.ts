import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { TaskRegistry } from '@batchline/sdk';
import { JobEngine, JobEngineOptions } from '../../src/services/job-engine';
import { JobEntity, JobState, createJobEntity } from '../../src/db/job.entity';
import { PersistenceQueue } from '../../src/services/persistence-queue';
import { Scheduler, SchedulerOptions } from '../../src/services/scheduler';
import { MemoryJobStore } from '../../src/repositories/memory-job-store';
import { JobStore } from '../../src/repositories/job-store';

// Short retry delays and poll interval so retries settle within a test.
export const FAST_RETRY = { baseDelayMs: 5, multiplier: 1, maxDelayMs: 5, jitter: 0 };

export function createTestEngine(options: JobEngineOptions = {}): JobEngine {
    return new JobEngine({
        store: new MemoryJobStore(),
        maxWorkers: 2,
        pollIntervalMs: 10,
        ...options,
        retryPolicy: { ...FAST_RETRY, ...options.retryPolicy },
    });
}

export function createTestScheduler(
    overrides: Partial<SchedulerOptions> & { store?: JobStore } = {},
): { scheduler: Scheduler; registry: TaskRegistry; persistence: PersistenceQueue } {
    const registry = overrides.registry ?? new TaskRegistry();
    const persistence = overrides.persistence ?? new PersistenceQueue(overrides.store ?? new MemoryJobStore());
    const scheduler = new Scheduler({
        registry,
        persistence,
        capacity: overrides.capacity ?? 4,
        maxQueueSize: overrides.maxQueueSize ?? 100,
        retry: overrides.retry,
    });
    return { scheduler, registry, persistence };
}

export function makeJob(id: string, overrides: Partial<JobEntity> = {}): JobEntity {
    return {
        ...createJobEntity({ id, taskName: 'ok', args: [] }),
        ...overrides,
    };
}

export function runningJob(id: string, attemptCount: number, overrides: Partial<JobEntity> = {}): JobEntity {
    return makeJob(id, {
        state: JobState.RUNNING,
        attemptCount,
        startedAt: new Date(),
        queuedAt: new Date(),
        ...overrides,
    });
}

/** A promise plus the function that resolves it, for holding a task open. */
export function gate(): { promise: Promise<void>; open: () => void } {
    let open: () => void = () => undefined;
    const promise = new Promise<void>(resolve => {
        open = resolve;
    });
    return { promise, open };
}

export async function makeTempDir(prefix = 'batchline-test-'): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
    await fs.rm(dir, { recursive: true, force: true });
}
