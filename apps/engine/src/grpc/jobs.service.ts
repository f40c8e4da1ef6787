import * as grpc from '@grpc/grpc-js';
import { ServerUnaryCall, sendUnaryData } from '@grpc/grpc-js';
import {
    DuplicateTaskError,
    InvalidTaskNameError,
    SerializationError,
    deserialize,
    serialize,
} from '@batchline/sdk';
import { JobArgs, JobErrorRecord, JobPriority, JobState, isJobState } from '../db/job.entity';
import {
    InvalidStateError,
    NotFoundError,
    QueueFullError,
    ValidationError,
    WaitTimeoutError,
} from '../errors/engine.errors';
import { GroupStatus, JobEngine, JobStatus } from '../services/job-engine';

const TAG = '[grpc]';

type Priority = 'PRIORITY_UNSPECIFIED' | 'LOW' | 'NORMAL' | 'HIGH' | 'CRITICAL';

interface RetryPolicyMessage {
    max_attempts: number;
    base_delay_ms: number;
    multiplier: number;
    max_delay_ms: number;
    jitter: number;
}

export interface CreateJobRequest {
    task_name: string;
    args: Buffer;
    priority: Priority;
    dependencies: string[];
    retry_policy: RetryPolicyMessage | null;
    group_id: string;
    name: string;
    tags: string[];
    timeout_ms: number;
}

interface CreateJobResponse {
    job_id: string;
}

export interface JobRequest {
    job_id: string;
}

export interface CancelJobRequest {
    job_id: string;
    reason: string;
}

interface JobStateResponse {
    job_id: string;
    state: string;
}

interface JobErrorMessage {
    name: string;
    code: string;
    message: string;
}

export interface JobStatusMessage {
    job_id: string;
    name: string;
    task_name: string;
    state: string;
    priority: string;
    attempt_count: number;
    max_attempts: number;
    progress: number;
    progress_message: string;
    group_id: string;
    last_error: JobErrorMessage | null;
    error: JobErrorMessage | null;
    created_at: number;
    started_at: number;
    finished_at: number;
    retry_at: number;
}

export interface JobResultResponse {
    job_id: string;
    state: string;
    result: Buffer;
    error: JobErrorMessage | null;
}

export interface CreateGroupRequest {
    name: string;
    sequential: boolean;
    cancel_on_failure: boolean;
    description: string;
}

interface CreateGroupResponse {
    group_id: string;
}

export interface AddJobToGroupRequest {
    job_id: string;
    group_id: string;
}

export interface GroupRequest {
    group_id: string;
}

export interface GroupStatusMessage {
    group_id: string;
    name: string;
    state: string;
    sequential: boolean;
    cancel_on_failure: boolean;
    member_ids: string[];
    total: number;
    completed: number;
    failed: number;
    canceled: number;
    active: number;
    progress: number;
}

export interface WaitForJobRequest {
    job_id: string;
    timeout_ms: number;
}

export interface StatsResponse {
    by_state: Record<string, number>;
    running: number;
    capacity: number;
    pending: number;
    max_queue_size: number;
    total: number;
}

export interface ClearJobsRequest {
    state: string;
}

interface ClearJobsResponse {
    cleared: number;
}

type Empty = Record<string, never>;

// Handlers only read the request, so tests can pass a bare { request }.
type UnaryCall<Req> = Pick<ServerUnaryCall<Req, unknown>, 'request'>;

const PRIORITIES: Record<Priority, JobPriority | undefined> = {
    PRIORITY_UNSPECIFIED: undefined,
    LOW: JobPriority.LOW,
    NORMAL: JobPriority.NORMAL,
    HIGH: JobPriority.HIGH,
    CRITICAL: JobPriority.CRITICAL,
};

/**
 * gRPC surface of the job engine. Args and results travel as superjson
 * bytes; engine errors are mapped onto gRPC status codes.
 */
export class JobServiceImpl {
    constructor(private readonly engine: JobEngine) { }

    createJob(call: UnaryCall<CreateJobRequest>, callback: sendUnaryData<CreateJobResponse>) {
        this.handle('createJob', callback, () => {
            const req = call.request;
            const policy = req.retry_policy;
            const jobId = this.engine.createJob(req.task_name, decodeArgs(req.args), {
                name: req.name || undefined,
                priority: PRIORITIES[req.priority],
                dependencies: req.dependencies,
                groupId: req.group_id || undefined,
                tags: req.tags,
                timeoutMs: req.timeout_ms > 0 ? req.timeout_ms : undefined,
                retryPolicy: policy && policy.max_attempts > 0
                    ? {
                        maxAttempts: policy.max_attempts,
                        baseDelayMs: policy.base_delay_ms,
                        multiplier: policy.multiplier,
                        maxDelayMs: policy.max_delay_ms,
                        jitter: policy.jitter,
                    }
                    : undefined,
            });
            return { job_id: jobId };
        });
    }

    submitJob(call: UnaryCall<JobRequest>, callback: sendUnaryData<JobStateResponse>) {
        this.handle('submitJob', callback, async () => {
            const state = await this.engine.submit(call.request.job_id);
            return { job_id: call.request.job_id, state };
        });
    }

    getJobStatus(call: UnaryCall<JobRequest>, callback: sendUnaryData<JobStatusMessage>) {
        this.handle('getJobStatus', callback, () => toStatusMessage(this.engine.getStatus(call.request.job_id)));
    }

    getJobResult(call: UnaryCall<JobRequest>, callback: sendUnaryData<JobResultResponse>) {
        this.handle('getJobResult', callback, () => {
            const status = this.engine.getStatus(call.request.job_id);
            const result = status.state === JobState.COMPLETED
                ? Buffer.from(serialize(this.engine.getResult(status.id)), 'utf-8')
                : Buffer.alloc(0);
            return { job_id: status.id, state: status.state, result, error: toErrorMessage(status.error) };
        });
    }

    pauseJob(call: UnaryCall<JobRequest>, callback: sendUnaryData<JobStateResponse>) {
        this.handle('pauseJob', callback, () => ({ job_id: call.request.job_id, state: this.engine.pause(call.request.job_id) }));
    }

    resumeJob(call: UnaryCall<JobRequest>, callback: sendUnaryData<JobStateResponse>) {
        this.handle('resumeJob', callback, () => ({ job_id: call.request.job_id, state: this.engine.resume(call.request.job_id) }));
    }

    cancelJob(call: UnaryCall<CancelJobRequest>, callback: sendUnaryData<JobStateResponse>) {
        this.handle('cancelJob', callback, () => {
            const { job_id, reason } = call.request;
            return { job_id, state: this.engine.cancel(job_id, reason || undefined) };
        });
    }

    createGroup(call: UnaryCall<CreateGroupRequest>, callback: sendUnaryData<CreateGroupResponse>) {
        this.handle('createGroup', callback, () => {
            const { name, sequential, cancel_on_failure, description } = call.request;
            const groupId = this.engine.createGroup(name, { sequential, cancelOnFailure: cancel_on_failure, description });
            return { group_id: groupId };
        });
    }

    addJobToGroup(call: UnaryCall<AddJobToGroupRequest>, callback: sendUnaryData<Empty>) {
        this.handle('addJobToGroup', callback, () => {
            this.engine.addJobToGroup(call.request.job_id, call.request.group_id);
            return {};
        });
    }

    cancelGroup(call: UnaryCall<GroupRequest>, callback: sendUnaryData<GroupStatusMessage>) {
        this.handle('cancelGroup', callback, () => {
            this.engine.cancelGroup(call.request.group_id);
            return toGroupMessage(this.engine.getGroupStatus(call.request.group_id));
        });
    }

    getGroupStatus(call: UnaryCall<GroupRequest>, callback: sendUnaryData<GroupStatusMessage>) {
        this.handle('getGroupStatus', callback, () => toGroupMessage(this.engine.getGroupStatus(call.request.group_id)));
    }

    waitForJob(call: UnaryCall<WaitForJobRequest>, callback: sendUnaryData<JobStatusMessage>) {
        this.handle('waitForJob', callback, async () => {
            const { job_id, timeout_ms } = call.request;
            const status = await this.engine.waitForJob(job_id, timeout_ms > 0 ? timeout_ms : undefined);
            return toStatusMessage(status);
        });
    }

    getStats(_call: UnaryCall<Empty>, callback: sendUnaryData<StatsResponse>) {
        this.handle('getStats', callback, () => {
            const stats = this.engine.getStats();
            return {
                by_state: { ...stats.byState },
                running: stats.running,
                capacity: stats.capacity,
                pending: stats.pending,
                max_queue_size: stats.maxQueueSize,
                total: stats.total,
            };
        });
    }

    clearJobs(call: UnaryCall<ClearJobsRequest>, callback: sendUnaryData<ClearJobsResponse>) {
        this.handle('clearJobs', callback, () => {
            const { state } = call.request;
            if (state === '') return { cleared: this.engine.clearJobs() };
            if (!isJobState(state)) throw new ValidationError(`Unknown state "${state}"`);
            return { cleared: this.engine.clearJobs(state) };
        });
    }

    private handle<T>(method: string, callback: sendUnaryData<T>, fn: () => T | Promise<T>): void {
        Promise.resolve()
            .then(fn)
            .then(
                response => callback(null, response),
                (error: unknown) => {
                    const code = toStatusCode(error);
                    if (code === grpc.status.INTERNAL) {
                        console.error(`${TAG} ${method} error:`, error);
                    }
                    callback({
                        code,
                        details: error instanceof Error ? error.message : 'Unknown error',
                    });
                },
            )
            .catch(err => console.error(`${TAG} ${method} failed to respond:`, err));
    }
}

export function toStatusCode(error: unknown): grpc.status {
    if (error instanceof NotFoundError) return grpc.status.NOT_FOUND;
    if (error instanceof InvalidStateError) return grpc.status.FAILED_PRECONDITION;
    if (
        error instanceof ValidationError ||
        error instanceof SerializationError ||
        error instanceof InvalidTaskNameError
    ) {
        return grpc.status.INVALID_ARGUMENT;
    }
    if (error instanceof QueueFullError) return grpc.status.RESOURCE_EXHAUSTED;
    if (error instanceof DuplicateTaskError) return grpc.status.ALREADY_EXISTS;
    if (error instanceof WaitTimeoutError) return grpc.status.DEADLINE_EXCEEDED;
    return grpc.status.INTERNAL;
}

function decodeArgs(bytes: Buffer | undefined): JobArgs {
    if (!bytes || bytes.length === 0) return [];
    const value = deserialize<unknown>(bytes.toString('utf-8'));
    if (value === undefined || value === null) return [];
    if (Array.isArray(value)) return value;
    if (isRecord(value)) return value;
    throw new ValidationError('args must encode an array or an object');
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function millis(date: Date | null): number {
    return date ? date.getTime() : 0;
}

function toErrorMessage(error: JobErrorRecord | null): JobErrorMessage | null {
    return error ? { name: error.name, code: error.code, message: error.message } : null;
}

export function toStatusMessage(status: JobStatus): JobStatusMessage {
    return {
        job_id: status.id,
        name: status.name,
        task_name: status.taskName,
        state: status.state,
        priority: status.priority,
        attempt_count: status.attemptCount,
        max_attempts: status.maxAttempts,
        progress: status.progress,
        progress_message: status.progressMessage,
        group_id: status.groupId ?? '',
        last_error: toErrorMessage(status.lastError),
        error: toErrorMessage(status.error),
        created_at: millis(status.createdAt),
        started_at: millis(status.startedAt),
        finished_at: millis(status.finishedAt),
        retry_at: millis(status.retryAt),
    };
}

export function toGroupMessage(status: GroupStatus): GroupStatusMessage {
    return {
        group_id: status.id,
        name: status.name,
        state: status.state,
        sequential: status.sequential,
        cancel_on_failure: status.cancelOnFailure,
        member_ids: status.memberIds,
        ...status.summary,
    };
}
