import { JobErrorRecord } from '../db/job.entity';

/**
 * Base class for every error the engine raises or records on a job.
 * `code` is stable and travels with persisted job records and gRPC statuses.
 */
export class EngineError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

export class NotFoundError extends EngineError {
    constructor(resource: 'job' | 'group', id: string) {
        super(`${resource === 'job' ? 'Job' : 'Group'} ${id} not found`, 'NOT_FOUND');
    }
}

export class InvalidStateError extends EngineError {
    constructor(message: string) {
        super(message, 'INVALID_STATE');
    }
}

export class ValidationError extends EngineError {
    constructor(message: string) {
        super(message, 'INVALID_ARGUMENT');
    }
}

export class QueueFullError extends EngineError {
    constructor(public readonly maxQueueSize: number) {
        super(`Queue is full (${maxQueueSize} pending jobs), retry submission later`, 'QUEUE_FULL');
    }
}

export class TaskExecutionError extends EngineError {
    constructor(message: string, cause: unknown) {
        super(message, 'TASK_FAILED', { cause });
    }
}

export class TimeoutError extends EngineError {
    constructor(public readonly timeoutMs: number) {
        super(`Task exceeded its time budget of ${timeoutMs}ms`, 'TIMEOUT');
    }
}

export class DependencyFailedError extends EngineError {
    constructor(jobId: string, reason: string) {
        super(`Job ${jobId} canceled: ${reason}`, 'DEPENDENCY_FAILED');
    }
}

export class JobCanceledError extends EngineError {
    constructor(jobId: string, reason = 'canceled by request') {
        super(`Job ${jobId} ${reason}`, 'CANCELED');
    }
}

export class JobInterruptedError extends EngineError {
    constructor(jobId: string) {
        super(`Job ${jobId} was running when the engine stopped and has no attempts left`, 'INTERRUPTED');
    }
}

export class PersistenceError extends EngineError {
    constructor(key: string, cause: unknown) {
        super(`Failed to persist ${key}: ${describe(cause)}`, 'PERSISTENCE_FAILED', { cause });
    }
}

export class WaitTimeoutError extends EngineError {
    constructor(resource: 'job' | 'group', id: string, timeoutMs: number) {
        super(`Timed out after ${timeoutMs}ms waiting for ${resource} ${id}`, 'WAIT_TIMEOUT');
    }
}

export class ConfigError extends EngineError {
    constructor(message: string) {
        super(message, 'CONFIG_ERROR');
    }
}

export function isEngineError(error: unknown): error is EngineError {
    return error instanceof EngineError;
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function codeOf(error: Error): string {
    if ('code' in error && typeof error.code === 'string') return error.code;
    return 'ERROR';
}

/** Flattens any thrown value into the shape stored on a job. */
export function toErrorRecord(error: unknown): JobErrorRecord {
    if (!(error instanceof Error)) {
        return { name: 'Error', code: 'ERROR', message: String(error) };
    }

    const record: JobErrorRecord = {
        name: error.name,
        code: codeOf(error),
        message: error.message,
        stack: error.stack,
    };
    if (error.cause instanceof Error) {
        record.cause = { name: error.cause.name, message: error.cause.message };
    }
    return record;
}
