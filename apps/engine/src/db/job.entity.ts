/**
 * Lifecycle states for jobs.
 * created → queued/waiting → running → completed/failed/canceled, with
 * paused reachable from any submitted, not-yet-terminal state.
 */
export enum JobState {
    CREATED = 'created',
    QUEUED = 'queued',
    WAITING = 'waiting',
    RUNNING = 'running',
    PAUSED = 'paused',
    COMPLETED = 'completed',
    FAILED = 'failed',
    CANCELED = 'canceled',
}

export enum JobPriority {
    LOW = 'low',
    NORMAL = 'normal',
    HIGH = 'high',
    CRITICAL = 'critical',
}

export const PRIORITY_RANK: Record<JobPriority, number> = {
    [JobPriority.CRITICAL]: 3,
    [JobPriority.HIGH]: 2,
    [JobPriority.NORMAL]: 1,
    [JobPriority.LOW]: 0,
};

export const TERMINAL_STATES: ReadonlySet<JobState> = new Set([
    JobState.COMPLETED,
    JobState.FAILED,
    JobState.CANCELED,
]);

export function isTerminal(state: JobState): boolean {
    return TERMINAL_STATES.has(state);
}

export function isJobState(value: string): value is JobState {
    return Object.values(JobState).some((state) => state === value);
}

export function isJobPriority(value: string): value is JobPriority {
    return Object.values(JobPriority).some((priority) => priority === value);
}

export interface RetryPolicy {
    maxAttempts: number;
    baseDelayMs: number;
    multiplier: number;
    maxDelayMs: number;
    /** Fraction of the delay added or removed at random, 0 disables jitter */
    jitter: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    multiplier: 4,
    maxDelayMs: 60_000,
    jitter: 0,
};

export interface JobErrorRecord {
    name: string;
    code: string;
    message: string;
    stack?: string;
    cause?: { name: string; message: string };
}

/** Positional or named arguments, opaque to the engine. */
export type JobArgs = unknown[] | Record<string, unknown>;

export interface JobEntity {
    id: string;
    name: string;
    taskName: string;
    args: JobArgs;
    priority: JobPriority;
    dependencies: string[];
    state: JobState;
    retryPolicy: RetryPolicy;
    attemptCount: number;
    result: unknown;
    error: JobErrorRecord | null;
    lastError: JobErrorRecord | null;
    groupId: string | null;
    tags: string[];
    metadata: Record<string, unknown>;
    timeoutMs: number | null;
    progress: number;
    progressMessage: string;
    retryAt: Date | null;
    createdAt: Date;
    queuedAt: Date | null;
    startedAt: Date | null;
    finishedAt: Date | null;
    updatedAt: Date;
}

export function createJobEntity(params: {
    id: string;
    taskName: string;
    args: JobArgs;
    priority?: JobPriority;
    dependencies?: string[];
    retryPolicy?: RetryPolicy;
    name?: string;
    groupId?: string | null;
    tags?: string[];
    metadata?: Record<string, unknown>;
    timeoutMs?: number | null;
}): JobEntity {
    const now = new Date();
    return {
        id: params.id,
        name: params.name ?? `job-${params.id.slice(-8)}`,
        taskName: params.taskName,
        args: params.args,
        priority: params.priority ?? JobPriority.NORMAL,
        dependencies: [...new Set(params.dependencies ?? [])],
        state: JobState.CREATED,
        retryPolicy: params.retryPolicy ?? { ...DEFAULT_RETRY_POLICY },
        attemptCount: 0,
        result: null,
        error: null,
        lastError: null,
        groupId: params.groupId ?? null,
        tags: params.tags ?? [],
        metadata: params.metadata ?? {},
        timeoutMs: params.timeoutMs ?? null,
        progress: 0,
        progressMessage: '',
        retryAt: null,
        createdAt: now,
        queuedAt: null,
        startedAt: null,
        finishedAt: null,
        updatedAt: now,
    };
}
