import { v7 as uuid } from 'uuid';
import { RegisterOptions, Task, TaskHandler, TaskRegistry, serialize } from '@batchline/sdk';
import {
    DEFAULT_RETRY_POLICY,
    JobArgs,
    JobEntity,
    JobErrorRecord,
    JobPriority,
    JobState,
    RetryPolicy,
    createJobEntity,
    isJobPriority,
    isJobState,
    isTerminal,
} from '../db/job.entity';
import { GroupState, GroupSummary, JobGroupEntity, createGroupEntity } from '../db/job-group.entity';
import { defaultWorkerCount } from '../config';
import {
    InvalidStateError,
    NotFoundError,
    ValidationError,
    WaitTimeoutError,
} from '../errors/engine.errors';
import { JobStore } from '../repositories/job-store';
import { MemoryJobStore } from '../repositories/memory-job-store';
import { runTask } from '../task-runner';
import { PersistenceQueue } from './persistence-queue';
import { Poller } from './poller';
import { ReapedJob, Reaper } from './reaper';
import { RetryCoordinator } from './retry-coordinator';
import { GroupEvent, ProgressEvent, Scheduler, SchedulerStats, TransitionEvent } from './scheduler';
import { WorkerPool } from './worker-pool';

const TAG = '[batchline]';

export interface JobEngineOptions {
    store?: JobStore;
    registry?: TaskRegistry;
    maxWorkers?: number;
    maxQueueSize?: number;
    pollIntervalMs?: number;
    /** Time budget for jobs that set none, 0 means no limit */
    defaultTimeoutMs?: number;
    retryPolicy?: Partial<RetryPolicy>;
    /** Source of randomness for retry jitter */
    random?: () => number;
}

export interface CreateJobOptions {
    name?: string;
    priority?: JobPriority | `${JobPriority}`;
    dependencies?: string[];
    retryPolicy?: Partial<RetryPolicy>;
    groupId?: string;
    tags?: string[];
    metadata?: Record<string, unknown>;
    timeoutMs?: number;
}

export interface CreateGroupOptions {
    sequential?: boolean;
    cancelOnFailure?: boolean;
    description?: string;
    metadata?: Record<string, unknown>;
}

export interface JobStatus {
    id: string;
    name: string;
    taskName: string;
    state: JobState;
    priority: JobPriority;
    attemptCount: number;
    maxAttempts: number;
    progress: number;
    progressMessage: string;
    groupId: string | null;
    dependencies: string[];
    tags: string[];
    lastError: JobErrorRecord | null;
    error: JobErrorRecord | null;
    retryAt: Date | null;
    createdAt: Date;
    queuedAt: Date | null;
    startedAt: Date | null;
    finishedAt: Date | null;
    updatedAt: Date;
}

export interface GroupStatus {
    id: string;
    name: string;
    description: string;
    state: GroupState;
    sequential: boolean;
    cancelOnFailure: boolean;
    memberIds: string[];
    summary: GroupSummary;
    createdAt: Date;
    finishedAt: Date | null;
}

export interface JobFilter {
    state?: JobState | `${JobState}`;
    tag?: string;
    groupId?: string;
}

export interface EngineStats extends SchedulerStats {
    total: number;
    groups: number;
    started: boolean;
}

/**
 * Public entry point: wires the registry, scheduler, workers, poller and
 * store together.
 *
 * ```ts
 * const engine = new JobEngine({ store: new FileJobStore('./data') });
 * engine.registerTask('resize', async ({ path }) => resize(path));
 * await engine.start();
 * const id = engine.createJob('resize', { path: 'a.png' }, { priority: 'high' });
 * await engine.submit(id);
 * await engine.waitForJob(id);
 * ```
 */
export class JobEngine {
    readonly registry: TaskRegistry;
    readonly store: JobStore;
    private readonly persistence: PersistenceQueue;
    private readonly scheduler: Scheduler;
    private readonly pool: WorkerPool;
    private readonly poller: Poller;
    private readonly reaper: Reaper;
    private readonly retryPolicy: RetryPolicy;
    private started = false;
    private recovered = false;

    constructor(options: JobEngineOptions = {}) {
        this.registry = options.registry ?? new TaskRegistry();
        this.store = options.store ?? new MemoryJobStore();
        this.retryPolicy = validateRetryPolicy({ ...DEFAULT_RETRY_POLICY, ...options.retryPolicy });

        const maxWorkers = options.maxWorkers ?? defaultWorkerCount();
        this.persistence = new PersistenceQueue(this.store);
        this.scheduler = new Scheduler({
            registry: this.registry,
            persistence: this.persistence,
            capacity: maxWorkers,
            maxQueueSize: options.maxQueueSize ?? 1000,
            retry: new RetryCoordinator(options.random),
        });

        const defaultTimeoutMs = options.defaultTimeoutMs ?? 0;
        this.pool = new WorkerPool(
            this.scheduler,
            lease => runTask(this.registry, lease, {
                defaultTimeoutMs,
                onProgress: (jobId, progress, message) => this.scheduler.reportProgress(jobId, progress, message),
            }),
            maxWorkers,
        );
        this.poller = new Poller(this.scheduler, {
            intervalMs: options.pollIntervalMs ?? 100,
            checkBackpressure: () => this.scheduler.idleWorkers === 0,
        });
        this.reaper = new Reaper(this.store, this.scheduler);
    }

    // ---- lifecycle ----

    /** Recovers pending work from the store on first start, then starts workers and the poller. */
    async start(): Promise<ReapedJob[]> {
        if (this.started) return [];
        const reaped = this.recovered ? [] : await this.reaper.recover();
        this.recovered = true;

        this.scheduler.open();
        this.pool.start();
        this.poller.start();
        this.started = true;
        console.log(`${TAG} engine started (workers: ${this.pool.size})`);
        return reaped;
    }

    /** Lets running attempts finish, then waits for every pending write. */
    async stop(): Promise<void> {
        if (!this.started) {
            await this.persistence.flush();
            return;
        }
        this.started = false;
        await this.poller.stop();
        this.scheduler.drain();
        await this.pool.stop();
        await this.persistence.flush();
        console.log(`${TAG} engine stopped`);
    }

    isRunning(): boolean {
        return this.started;
    }

    // ---- tasks ----

    registerTask<TArgs = unknown, TResult = unknown>(
        name: string,
        handler: TaskHandler<TArgs, TResult>,
        opts?: RegisterOptions,
    ): Task<TArgs, TResult> {
        return this.registry.register(name, handler, opts);
    }

    // ---- jobs ----

    createJob(taskName: string, args: JobArgs = [], options: CreateJobOptions = {}): string {
        if (typeof taskName !== 'string' || taskName.trim() === '') {
            throw new ValidationError('taskName is required');
        }
        if (!Array.isArray(args) && !isPlainRecord(args)) {
            throw new ValidationError('args must be an array or a plain object');
        }
        const priority = options.priority ?? JobPriority.NORMAL;
        if (!isJobPriority(priority)) {
            throw new ValidationError(`Unknown priority "${priority}"`);
        }
        if (options.timeoutMs !== undefined && (!Number.isFinite(options.timeoutMs) || options.timeoutMs <= 0)) {
            throw new ValidationError('timeoutMs must be a positive number');
        }
        for (const dep of options.dependencies ?? []) {
            if (!this.scheduler.getJob(dep)) {
                throw new ValidationError(`Dependency ${dep} does not exist`);
            }
        }
        if (options.groupId !== undefined) {
            const group = this.requireGroup(options.groupId);
            if (group.canceled) throw new InvalidStateError(`Group ${group.id} was canceled`);
        }
        // Rejects args that cannot be persisted, before anything is recorded.
        serialize(args);

        const job = createJobEntity({
            id: uuid(),
            taskName,
            args,
            priority,
            dependencies: options.dependencies,
            retryPolicy: validateRetryPolicy({ ...this.retryPolicy, ...options.retryPolicy }),
            name: options.name,
            tags: options.tags,
            metadata: options.metadata,
            timeoutMs: options.timeoutMs ?? null,
        });
        void this.scheduler.addJob(job);
        if (options.groupId !== undefined) {
            this.scheduler.addJobToGroup(job.id, options.groupId);
        }
        return job.id;
    }

    /**
     * Queues a created job. Resolves with the state it entered (queued,
     * waiting, or failed when its task is not registered).
     */
    submit(jobId: string): Promise<JobState> {
        return this.scheduler.submit(jobId);
    }

    pause(jobId: string): JobState {
        return this.scheduler.pause(jobId);
    }

    resume(jobId: string): JobState {
        return this.scheduler.resume(jobId);
    }

    cancel(jobId: string, reason?: string): JobState {
        return this.scheduler.cancel(jobId, reason);
    }

    reprioritize(jobId: string, priority: JobPriority | `${JobPriority}`): void {
        if (!isJobPriority(priority)) {
            throw new ValidationError(`Unknown priority "${priority}"`);
        }
        this.scheduler.reprioritize(jobId, priority);
    }

    getStatus(jobId: string): JobStatus {
        return toJobStatus(this.requireJob(jobId));
    }

    getResult(jobId: string): unknown {
        const job = this.requireJob(jobId);
        if (job.state !== JobState.COMPLETED) {
            throw new InvalidStateError(`Job ${jobId} has no result, it is ${job.state}`);
        }
        return job.result;
    }

    getError(jobId: string): JobErrorRecord | null {
        return this.requireJob(jobId).error;
    }

    listJobs(filter: JobFilter = {}): JobStatus[] {
        if (filter.state !== undefined && !isJobState(filter.state)) {
            throw new ValidationError(`Unknown state "${filter.state}"`);
        }
        const matches: JobStatus[] = [];
        for (const job of this.scheduler.allJobs()) {
            if (filter.state !== undefined && job.state !== filter.state) continue;
            if (filter.tag !== undefined && !job.tags.includes(filter.tag)) continue;
            if (filter.groupId !== undefined && job.groupId !== filter.groupId) continue;
            matches.push(toJobStatus(job));
        }
        return matches.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
    }

    waitForJob(jobId: string, timeoutMs?: number): Promise<JobStatus> {
        const job = this.requireJob(jobId);
        if (isTerminal(job.state)) return Promise.resolve(toJobStatus(job));

        return this.waitFor('job', jobId, timeoutMs, done => this.scheduler.onTransition(event => {
            if (event.jobId === jobId && isTerminal(event.to)) done(toJobStatus(this.requireJob(jobId)));
        }));
    }

    /** Waits for several jobs at once; the timeout covers the whole wait. */
    waitForJobs(jobIds: string[], timeoutMs?: number): Promise<JobStatus[]> {
        for (const id of jobIds) this.requireJob(id);
        return Promise.all(jobIds.map(id => this.waitForJob(id, timeoutMs)));
    }

    /**
     * Drops finished jobs from memory, all of them or only those in `state`.
     * Jobs still needed by unfinished jobs or groups are kept. Returns how
     * many were dropped.
     */
    clearJobs(state?: JobState | `${JobState}`): number {
        if (state === undefined) return this.scheduler.clearJobs();
        if (!isJobState(state)) {
            throw new ValidationError(`Unknown state "${state}"`);
        }
        return this.scheduler.clearJobs(state);
    }

    // ---- groups ----

    createGroup(name: string, options: CreateGroupOptions = {}): string {
        if (typeof name !== 'string' || name.trim() === '') {
            throw new ValidationError('Group name is required');
        }
        const group = createGroupEntity({ id: uuid(), name, ...options });
        void this.scheduler.addGroup(group);
        return group.id;
    }

    addJobToGroup(jobId: string, groupId: string): void {
        this.scheduler.addJobToGroup(jobId, groupId);
    }

    cancelGroup(groupId: string): GroupState {
        return this.scheduler.cancelGroup(groupId);
    }

    getGroupStatus(groupId: string): GroupStatus {
        return this.toGroupStatus(this.requireGroup(groupId));
    }

    waitForGroup(groupId: string, timeoutMs?: number): Promise<GroupStatus> {
        const group = this.requireGroup(groupId);
        if (group.finishedAt !== null) return Promise.resolve(this.toGroupStatus(group));

        return this.waitFor('group', groupId, timeoutMs, done => this.scheduler.onGroup((event: GroupEvent) => {
            if (event.groupId === groupId && event.finished) done(this.toGroupStatus(this.requireGroup(groupId)));
        }));
    }

    // ---- observation ----

    getStats(): EngineStats {
        const stats = this.scheduler.stats();
        let total = 0;
        for (const count of Object.values(stats.byState)) total += count;
        return { ...stats, total, groups: this.scheduler.groupCount, started: this.started };
    }

    onTransition(listener: (event: TransitionEvent) => void): () => void {
        return this.scheduler.onTransition(listener);
    }

    onGroup(listener: (event: GroupEvent) => void): () => void {
        return this.scheduler.onGroup(listener);
    }

    onProgress(listener: (event: ProgressEvent) => void): () => void {
        return this.scheduler.onProgress(listener);
    }

    // ---- internals ----

    private waitFor<T>(
        resource: 'job' | 'group',
        id: string,
        timeoutMs: number | undefined,
        subscribe: (done: (value: T) => void) => () => void,
    ): Promise<T> {
        return new Promise<T>((resolve, reject) => {
            let timer: NodeJS.Timeout | undefined;
            const unsubscribe = subscribe(value => {
                if (timer) clearTimeout(timer);
                unsubscribe();
                resolve(value);
            });
            if (timeoutMs !== undefined && timeoutMs > 0) {
                timer = setTimeout(() => {
                    unsubscribe();
                    reject(new WaitTimeoutError(resource, id, timeoutMs));
                }, timeoutMs);
            }
        });
    }

    private requireJob(id: string): JobEntity {
        const job = this.scheduler.getJob(id);
        if (!job) throw new NotFoundError('job', id);
        return job;
    }

    private requireGroup(id: string): JobGroupEntity {
        const group = this.scheduler.getGroup(id);
        if (!group) throw new NotFoundError('group', id);
        return group;
    }

    private toGroupStatus(group: JobGroupEntity): GroupStatus {
        return {
            id: group.id,
            name: group.name,
            description: group.description,
            state: group.state,
            sequential: group.sequential,
            cancelOnFailure: group.cancelOnFailure,
            memberIds: [...group.memberIds],
            summary: this.scheduler.summarize(group),
            createdAt: group.createdAt,
            finishedAt: group.finishedAt,
        };
    }
}

function toJobStatus(job: JobEntity): JobStatus {
    return {
        id: job.id,
        name: job.name,
        taskName: job.taskName,
        state: job.state,
        priority: job.priority,
        attemptCount: job.attemptCount,
        maxAttempts: job.retryPolicy.maxAttempts,
        progress: job.progress,
        progressMessage: job.progressMessage,
        groupId: job.groupId,
        dependencies: [...job.dependencies],
        tags: [...job.tags],
        lastError: job.lastError,
        error: job.error,
        retryAt: job.retryAt,
        createdAt: job.createdAt,
        queuedAt: job.queuedAt,
        startedAt: job.startedAt,
        finishedAt: job.finishedAt,
        updatedAt: job.updatedAt,
    };
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
    if (typeof value !== 'object' || value === null) return false;
    const proto = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

export function validateRetryPolicy(policy: RetryPolicy): RetryPolicy {
    if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
        throw new ValidationError('retryPolicy.maxAttempts must be an integer >= 1');
    }
    if (!(policy.baseDelayMs >= 0)) {
        throw new ValidationError('retryPolicy.baseDelayMs must be >= 0');
    }
    if (!(policy.multiplier >= 1)) {
        throw new ValidationError('retryPolicy.multiplier must be >= 1');
    }
    if (!(policy.maxDelayMs >= 0)) {
        throw new ValidationError('retryPolicy.maxDelayMs must be >= 0');
    }
    if (!(policy.jitter >= 0 && policy.jitter <= 1)) {
        throw new ValidationError('retryPolicy.jitter must be between 0 and 1');
    }
    return policy;
}
