import { EventEmitter } from 'events';
import { TaskRegistry, UnknownTaskError } from '@batchline/sdk';
import {
    JobEntity,
    JobErrorRecord,
    JobPriority,
    JobState,
    isTerminal,
} from '../db/job.entity';
import {
    GroupState,
    GroupSummary,
    JobGroupEntity,
    deriveGroupState,
    isGroupSettled,
    summarizeGroup,
} from '../db/job-group.entity';
import {
    DependencyFailedError,
    InvalidStateError,
    JobCanceledError,
    JobInterruptedError,
    NotFoundError,
    PersistenceError,
    QueueFullError,
    toErrorRecord,
} from '../errors/engine.errors';
import { JobQueue } from './job-queue';
import { PersistenceQueue } from './persistence-queue';
import { RetryCoordinator } from './retry-coordinator';

const TAG = '[scheduler]';

export interface Lease {
    /** Copy of the job as it was when the attempt started */
    job: JobEntity;
    signal: AbortSignal;
}

export type AttemptOutcome =
    | { ok: true; result: unknown }
    | { ok: false; error: unknown };

export interface TransitionEvent {
    jobId: string;
    from: JobState;
    to: JobState;
    job: JobEntity;
}

export interface GroupEvent {
    groupId: string;
    state: GroupState;
    summary: GroupSummary;
    finished: boolean;
}

export interface ProgressEvent {
    jobId: string;
    progress: number;
    message: string;
}

export interface SchedulerStats {
    byState: Record<JobState, number>;
    running: number;
    capacity: number;
    pending: number;
    maxQueueSize: number;
}

export interface SchedulerOptions {
    registry: TaskRegistry;
    persistence: PersistenceQueue;
    /** Maximum number of jobs running at once */
    capacity: number;
    /** Maximum number of queued, waiting and paused jobs */
    maxQueueSize: number;
    retry?: RetryCoordinator;
}

interface RunningAttempt {
    controller: AbortController;
    /** Set once cancellation was requested while the attempt ran */
    cancelError: JobCanceledError | null;
    pauseRequested: boolean;
}

type Readiness =
    | { kind: 'ready' }
    | { kind: 'blocked' }
    | { kind: 'doomed'; reason: string };

type Waiter = (lease: Lease | null) => void;

const PENDING_STATES: ReadonlySet<JobState> = new Set([
    JobState.QUEUED,
    JobState.WAITING,
    JobState.PAUSED,
]);

/**
 * Owns every job and group record and is the only place their state changes.
 * Workers lease eligible jobs from it and report outcomes back; everything
 * else (dependency release, group sequencing, retries, cancellation) happens
 * inside one synchronous transition at a time.
 */
export class Scheduler {
    private readonly jobs = new Map<string, JobEntity>();
    private readonly groups = new Map<string, JobGroupEntity>();
    /** Ids of jobs that are not terminal */
    private readonly active = new Set<string>();
    private readonly queue = new JobQueue();
    private readonly attempts = new Map<string, RunningAttempt>();
    private waiters: Waiter[] = [];
    private readonly events = new EventEmitter();
    private readonly retry: RetryCoordinator;
    private dispatchScheduled = false;
    private closed = false;

    constructor(private readonly options: SchedulerOptions) {
        this.retry = options.retry ?? new RetryCoordinator();
        this.events.setMaxListeners(0);
    }

    // ---- records ----

    getJob(id: string): JobEntity | undefined {
        return this.jobs.get(id);
    }

    getGroup(id: string): JobGroupEntity | undefined {
        return this.groups.get(id);
    }

    allJobs(): IterableIterator<JobEntity> {
        return this.jobs.values();
    }

    get groupCount(): number {
        return this.groups.size;
    }

    summarize(group: JobGroupEntity): GroupSummary {
        return summarizeGroup(group, id => this.jobs.get(id));
    }

    addJob(job: JobEntity): Promise<PersistenceError | null> {
        if (this.jobs.has(job.id)) {
            throw new InvalidStateError(`Job ${job.id} already exists`);
        }
        this.jobs.set(job.id, job);
        if (!isTerminal(job.state)) this.active.add(job.id);
        return this.options.persistence.saveJob(job);
    }

    addGroup(group: JobGroupEntity): Promise<PersistenceError | null> {
        if (this.groups.has(group.id)) {
            throw new InvalidStateError(`Group ${group.id} already exists`);
        }
        this.groups.set(group.id, group);
        this.refreshGroup(group, true);
        return this.options.persistence.saveGroup(group);
    }

    /**
     * Loads records read back from the store without running transitions.
     * Records already known are left alone.
     */
    restore(jobs: JobEntity[], groups: JobGroupEntity[]): void {
        for (const group of groups) {
            if (!this.groups.has(group.id)) this.groups.set(group.id, group);
        }
        for (const job of jobs) {
            if (this.jobs.has(job.id)) continue;
            this.jobs.set(job.id, job);
            if (isTerminal(job.state)) continue;
            this.active.add(job.id);
            if (job.state === JobState.QUEUED) this.queue.push(job);
        }
        for (const group of this.groups.values()) {
            this.refreshGroup(group);
        }
        this.reevaluate();
        this.scheduleDispatch();
    }

    /**
     * Settles a job whose attempt was cut short by a crash. The attempt counts
     * as failed: the job fails if it was the last one allowed, otherwise it
     * goes back to the queue.
     */
    recoverInterrupted(jobId: string): 'requeued' | 'failed' {
        const job = this.require(jobId);
        const error = toErrorRecord(new JobInterruptedError(jobId));

        if (job.attemptCount >= job.retryPolicy.maxAttempts) {
            void this.finish(job, JobState.FAILED, { error });
            this.reevaluate();
            return 'failed';
        }

        job.lastError = error;
        job.retryAt = null;
        job.updatedAt = new Date();
        this.queue.push(job);
        void this.options.persistence.saveJob(job);
        this.scheduleDispatch();
        return 'requeued';
    }

    // ---- submission ----

    async submit(jobId: string): Promise<JobState> {
        const job = this.require(jobId);
        if (isTerminal(job.state)) return job.state;
        if (job.state !== JobState.CREATED) {
            throw new InvalidStateError(`Job ${jobId} was already submitted (state: ${job.state})`);
        }

        if (!this.options.registry.has(job.taskName)) {
            const error = new UnknownTaskError(job.taskName, this.options.registry.list());
            console.warn(`${TAG} job ${jobId} references unknown task "${job.taskName}"`);
            const persisted = this.finish(job, JobState.FAILED, { error: toErrorRecord(error) });
            this.reevaluate();
            return this.settle(persisted, JobState.FAILED);
        }

        if (this.pendingCount() >= this.options.maxQueueSize) {
            throw new QueueFullError(this.options.maxQueueSize);
        }

        job.queuedAt = new Date();
        const persisted = this.place(job);
        const state = job.state;
        this.reevaluate();
        this.scheduleDispatch();
        return this.settle(persisted, state);
    }

    private async settle(persisted: Promise<PersistenceError | null>, state: JobState): Promise<JobState> {
        const failure = await persisted;
        if (failure) throw failure;
        return state;
    }

    // ---- leasing ----

    /** Resolves with the next eligible job, or null once the scheduler is drained. */
    acquire(): Promise<Lease | null> {
        if (this.closed) return Promise.resolve(null);
        const lease = this.tryStart(new Date());
        if (lease) return Promise.resolve(lease);
        return new Promise(resolve => this.waiters.push(resolve));
    }

    report(jobId: string, outcome: AttemptOutcome): void {
        const job = this.jobs.get(jobId);
        const attempt = this.attempts.get(jobId);
        if (!job || !attempt || job.state !== JobState.RUNNING) {
            console.warn(`${TAG} ignoring outcome for job ${jobId}, it is not running`);
            return;
        }
        this.attempts.delete(jobId);

        if (outcome.ok) {
            void this.finish(job, JobState.COMPLETED, { result: outcome.result });
        } else if (attempt.cancelError) {
            void this.finish(job, JobState.CANCELED, { error: toErrorRecord(attempt.cancelError) });
        } else {
            this.handleFailure(job, attempt, outcome.error);
        }

        this.reevaluate();
        this.scheduleDispatch();
    }

    reportProgress(jobId: string, progress: number, message?: string): void {
        const job = this.jobs.get(jobId);
        if (!job || job.state !== JobState.RUNNING) return;

        job.progress = Math.max(0, Math.min(100, Number.isFinite(progress) ? progress : 0));
        if (message !== undefined) job.progressMessage = message;
        job.updatedAt = new Date();
        void this.options.persistence.saveJob(job);
        this.events.emit('progress', { jobId, progress: job.progress, message: job.progressMessage } satisfies ProgressEvent);
    }

    /** Clears elapsed backoff timers; returns how many jobs became runnable. */
    releaseDue(now: Date = new Date()): number {
        let released = 0;
        for (const id of this.queue.ordered()) {
            const job = this.jobs.get(id);
            if (!job || job.retryAt === null || job.retryAt > now) continue;
            job.retryAt = null;
            job.updatedAt = now;
            void this.options.persistence.saveJob(job);
            released++;
        }
        if (released > 0) this.scheduleDispatch();
        return released;
    }

    get idleWorkers(): number {
        return this.waiters.length;
    }

    /** Stops handing out work; pending acquire() calls resolve with null. */
    drain(): void {
        this.closed = true;
        const waiters = this.waiters;
        this.waiters = [];
        for (const waiter of waiters) waiter(null);
    }

    open(): void {
        this.closed = false;
        this.scheduleDispatch();
    }

    // ---- control ----

    pause(jobId: string): JobState {
        const job = this.require(jobId);
        if (isTerminal(job.state)) return job.state;

        switch (job.state) {
            case JobState.CREATED:
                throw new InvalidStateError(`Job ${jobId} has not been submitted`);
            case JobState.RUNNING: {
                const attempt = this.attempts.get(jobId);
                if (attempt) attempt.pauseRequested = true;
                return job.state;
            }
            case JobState.PAUSED:
                return job.state;
            default:
                this.queue.remove(jobId);
                void this.transition(job, JobState.PAUSED);
                return job.state;
        }
    }

    resume(jobId: string): JobState {
        const job = this.require(jobId);
        if (isTerminal(job.state)) return job.state;

        if (job.state === JobState.RUNNING) {
            const attempt = this.attempts.get(jobId);
            if (attempt?.pauseRequested) {
                attempt.pauseRequested = false;
                return job.state;
            }
        }
        if (job.state !== JobState.PAUSED) {
            throw new InvalidStateError(`Job ${jobId} is ${job.state}, not paused`);
        }

        void this.place(job);
        this.reevaluate();
        this.scheduleDispatch();
        return job.state;
    }

    /**
     * Jobs that are not running are canceled at once. A running job has its
     * signal aborted and becomes canceled when its attempt ends in failure.
     */
    cancel(jobId: string, reason?: string): JobState {
        const job = this.require(jobId);
        if (isTerminal(job.state)) return job.state;

        this.cancelJob(job, new JobCanceledError(jobId, reason));
        this.reevaluate();
        this.scheduleDispatch();
        return job.state;
    }

    cancelGroup(groupId: string): GroupState {
        const group = this.requireGroup(groupId);
        if (!group.canceled) {
            group.canceled = true;
            for (const id of group.memberIds) {
                const member = this.jobs.get(id);
                if (member && !isTerminal(member.state)) {
                    this.cancelJob(member, new JobCanceledError(id, `canceled with group ${groupId}`));
                }
            }
            this.refreshGroup(group, true);
            this.reevaluate();
            this.scheduleDispatch();
        }
        return group.state;
    }

    addJobToGroup(jobId: string, groupId: string): void {
        const job = this.require(jobId);
        const group = this.requireGroup(groupId);

        if (job.groupId === groupId) return;
        if (job.groupId !== null) {
            throw new InvalidStateError(`Job ${jobId} already belongs to group ${job.groupId}`);
        }
        if (isTerminal(job.state)) {
            throw new InvalidStateError(`Job ${jobId} is already ${job.state}`);
        }
        if (group.canceled) {
            throw new InvalidStateError(`Group ${groupId} was canceled`);
        }

        group.memberIds.push(jobId);
        job.groupId = groupId;
        job.updatedAt = new Date();
        void this.options.persistence.saveJob(job);
        this.refreshGroup(group, true);
        this.reevaluate();
        this.scheduleDispatch();
    }

    reprioritize(jobId: string, priority: JobPriority): void {
        const job = this.require(jobId);
        if (isTerminal(job.state) || job.state === JobState.RUNNING) {
            throw new InvalidStateError(`Cannot reprioritize job ${jobId} while ${job.state}`);
        }
        job.priority = priority;
        job.updatedAt = new Date();
        this.queue.reprioritize(jobId, priority);
        void this.options.persistence.saveJob(job);
        this.scheduleDispatch();
    }

    /**
     * Forgets finished jobs, optionally only those in one state. A job stays
     * while an unfinished job depends on it or while its group is unfinished;
     * a finished group goes once all its members can go. Records already
     * written to the store are kept there.
     */
    clearJobs(state?: JobState): number {
        const referenced = new Set<string>();
        for (const id of this.active) {
            const job = this.jobs.get(id);
            if (job) for (const dep of job.dependencies) referenced.add(dep);
        }
        const clearable = (job: JobEntity | undefined): job is JobEntity =>
            job !== undefined &&
            isTerminal(job.state) &&
            (state === undefined || job.state === state) &&
            !referenced.has(job.id);

        const cleared: string[] = [];
        for (const job of this.jobs.values()) {
            const grouped = job.groupId !== null && this.groups.has(job.groupId);
            if (!grouped && clearable(job)) cleared.push(job.id);
        }
        for (const group of this.groups.values()) {
            if (group.finishedAt === null) continue;
            if (!group.memberIds.every(id => clearable(this.jobs.get(id)))) continue;
            cleared.push(...group.memberIds);
            this.groups.delete(group.id);
        }

        for (const id of cleared) this.jobs.delete(id);
        if (cleared.length > 0) console.log(`${TAG} cleared ${cleared.length} finished jobs`);
        return cleared.length;
    }

    // ---- observation ----

    onTransition(listener: (event: TransitionEvent) => void): () => void {
        return this.subscribe('transition', listener);
    }

    onGroup(listener: (event: GroupEvent) => void): () => void {
        return this.subscribe('group', listener);
    }

    onProgress(listener: (event: ProgressEvent) => void): () => void {
        return this.subscribe('progress', listener);
    }

    stats(): SchedulerStats {
        const byState: Record<JobState, number> = {
            [JobState.CREATED]: 0,
            [JobState.QUEUED]: 0,
            [JobState.WAITING]: 0,
            [JobState.RUNNING]: 0,
            [JobState.PAUSED]: 0,
            [JobState.COMPLETED]: 0,
            [JobState.FAILED]: 0,
            [JobState.CANCELED]: 0,
        };
        for (const job of this.jobs.values()) byState[job.state]++;

        return {
            byState,
            running: this.attempts.size,
            capacity: this.options.capacity,
            pending: this.pendingCount(),
            maxQueueSize: this.options.maxQueueSize,
        };
    }

    // ---- internals ----

    // A listener runs inside a transition; its errors must not cut that transition short.
    private subscribe<T>(event: string, listener: (payload: T) => void): () => void {
        const guarded = (payload: T): void => {
            try {
                listener(payload);
            } catch (err) {
                console.error(`${TAG} ${event} listener failed:`, err);
            }
        };
        this.events.on(event, guarded);
        return () => {
            this.events.off(event, guarded);
        };
    }

    private require(id: string): JobEntity {
        const job = this.jobs.get(id);
        if (!job) throw new NotFoundError('job', id);
        return job;
    }

    private requireGroup(id: string): JobGroupEntity {
        const group = this.groups.get(id);
        if (!group) throw new NotFoundError('group', id);
        return group;
    }

    private pendingCount(): number {
        let count = 0;
        for (const id of this.active) {
            const job = this.jobs.get(id);
            if (job && PENDING_STATES.has(job.state)) count++;
        }
        return count;
    }

    private transition(job: JobEntity, to: JobState): Promise<PersistenceError | null> {
        const from = job.state;
        job.state = to;
        job.updatedAt = new Date();
        if (isTerminal(to)) this.active.delete(job.id);
        else this.active.add(job.id);

        const persisted = this.options.persistence.saveJob(job);
        this.events.emit('transition', { jobId: job.id, from, to, job: { ...job } } satisfies TransitionEvent);

        if (job.groupId) {
            const group = this.groups.get(job.groupId);
            if (group) this.refreshGroup(group);
        }
        return persisted;
    }

    // Moves a submitted job to queued or waiting, or cancels it if it can never run.
    private place(job: JobEntity): Promise<PersistenceError | null> {
        const readiness = this.readinessOf(job);
        if (readiness.kind === 'doomed') {
            return this.finish(job, JobState.CANCELED, {
                error: toErrorRecord(new DependencyFailedError(job.id, readiness.reason)),
            });
        }
        if (readiness.kind === 'blocked') {
            return this.transition(job, JobState.WAITING);
        }
        this.queue.push(job);
        return this.transition(job, JobState.QUEUED);
    }

    private finish(
        job: JobEntity,
        to: JobState.COMPLETED | JobState.FAILED | JobState.CANCELED,
        outcome: { result?: unknown; error?: JobErrorRecord },
    ): Promise<PersistenceError | null> {
        const now = new Date();
        this.queue.remove(job.id);
        job.result = to === JobState.COMPLETED ? outcome.result ?? null : null;
        job.error = to === JobState.COMPLETED ? null : outcome.error ?? null;
        job.retryAt = null;
        job.finishedAt = now;
        if (to === JobState.COMPLETED) job.progress = 100;

        const persisted = this.transition(job, to);
        console.log(`${TAG} job ${job.id} ${to}${job.error ? `: ${job.error.message}` : ''}`);

        if (to === JobState.FAILED) this.propagateFailure(job);
        return persisted;
    }

    private handleFailure(job: JobEntity, attempt: RunningAttempt, error: unknown): void {
        const record = toErrorRecord(error);
        const decision = this.retry.decide(job, error);
        job.lastError = record;

        if (decision.action === 'fail') {
            void this.finish(job, JobState.FAILED, { error: record });
            return;
        }

        job.retryAt = new Date(Date.now() + decision.delayMs);
        console.warn(
            `${TAG} job ${job.id} attempt ${job.attemptCount}/${job.retryPolicy.maxAttempts} failed, retrying in ${decision.delayMs}ms: ${record.message}`,
        );

        if (attempt.pauseRequested) {
            void this.transition(job, JobState.PAUSED);
            return;
        }
        job.queuedAt = new Date();
        this.queue.push(job);
        void this.transition(job, JobState.QUEUED);
    }

    private propagateFailure(job: JobEntity): void {
        if (!job.groupId) return;
        const group = this.groups.get(job.groupId);
        if (!group || !group.cancelOnFailure) return;

        for (const id of group.memberIds) {
            const member = this.jobs.get(id);
            if (!member || id === job.id || isTerminal(member.state)) continue;
            this.cancelJob(member, new JobCanceledError(id, `canceled after group member ${job.id} failed`));
        }
    }

    private cancelJob(job: JobEntity, error: JobCanceledError): void {
        if (job.state === JobState.RUNNING) {
            const attempt = this.attempts.get(job.id);
            if (attempt && !attempt.cancelError) {
                attempt.cancelError = error;
                attempt.controller.abort(error);
            }
            return;
        }
        void this.finish(job, JobState.CANCELED, { error: toErrorRecord(error) });
    }

    private readinessOf(job: JobEntity): Readiness {
        const blockers: string[] = [...job.dependencies];
        const predecessors = this.predecessorsOf(job);
        blockers.push(...predecessors);

        let blocked = false;
        for (const id of blockers) {
            const other = this.jobs.get(id);
            const label = predecessors.includes(id) ? 'group predecessor' : 'dependency';
            if (!other) return { kind: 'doomed', reason: `${label} ${id} is missing` };
            if (other.state === JobState.FAILED || other.state === JobState.CANCELED) {
                return { kind: 'doomed', reason: `${label} ${id} ${other.state}` };
            }
            if (other.state !== JobState.COMPLETED) blocked = true;
        }
        return blocked ? { kind: 'blocked' } : { kind: 'ready' };
    }

    private predecessorsOf(job: JobEntity): string[] {
        if (!job.groupId) return [];
        const group = this.groups.get(job.groupId);
        if (!group || !group.sequential) return [];
        const index = group.memberIds.indexOf(job.id);
        return index > 0 ? group.memberIds.slice(0, index) : [];
    }

    /**
     * Settles every pending job against its dependencies and group order,
     * repeating until nothing changes since one cancellation can doom others.
     */
    private reevaluate(): void {
        let changed = true;
        while (changed) {
            changed = false;
            for (const id of this.active) {
                const job = this.jobs.get(id);
                // Created jobs are settled by place() when they are submitted.
                if (!job || job.state === JobState.RUNNING || job.state === JobState.CREATED) continue;

                const readiness = this.readinessOf(job);
                if (readiness.kind === 'doomed') {
                    void this.finish(job, JobState.CANCELED, {
                        error: toErrorRecord(new DependencyFailedError(job.id, readiness.reason)),
                    });
                    changed = true;
                } else if (readiness.kind === 'ready' && job.state === JobState.WAITING) {
                    this.queue.push(job);
                    void this.transition(job, JobState.QUEUED);
                    changed = true;
                } else if (readiness.kind === 'blocked' && job.state === JobState.QUEUED) {
                    this.queue.remove(job.id);
                    void this.transition(job, JobState.WAITING);
                    changed = true;
                }
            }
        }
    }

    private refreshGroup(group: JobGroupEntity, force = false): void {
        const summary = this.summarize(group);
        const state = deriveGroupState(group, summary);
        const settled = isGroupSettled(summary);
        const finishedAt = settled ? group.finishedAt ?? new Date() : null;

        if (!force && state === group.state && finishedAt === group.finishedAt) return;

        group.state = state;
        group.finishedAt = finishedAt;
        group.updatedAt = new Date();
        void this.options.persistence.saveGroup(group);
        this.events.emit('group', { groupId: group.id, state, summary, finished: settled } satisfies GroupEvent);
    }

    private tryStart(now: Date): Lease | null {
        if (this.closed || this.attempts.size >= this.options.capacity) return null;

        for (const id of this.queue.ordered()) {
            const job = this.jobs.get(id);
            if (!job || job.state !== JobState.QUEUED) {
                this.queue.remove(id);
                continue;
            }
            if (job.retryAt !== null && job.retryAt > now) continue;

            this.queue.remove(id);
            job.attemptCount++;
            job.startedAt = now;
            job.retryAt = null;
            const controller = new AbortController();
            this.attempts.set(id, { controller, cancelError: null, pauseRequested: false });
            void this.transition(job, JobState.RUNNING);

            return { job: { ...job }, signal: controller.signal };
        }
        return null;
    }

    private scheduleDispatch(): void {
        if (this.dispatchScheduled || this.waiters.length === 0) return;
        this.dispatchScheduled = true;
        setImmediate(() => {
            this.dispatchScheduled = false;
            this.dispatch();
        });
    }

    private dispatch(): void {
        while (this.waiters.length > 0) {
            const lease = this.tryStart(new Date());
            if (!lease) return;
            const waiter = this.waiters.shift();
            if (waiter) waiter(lease);
        }
    }
}
