import { Task, TaskContext, TaskRegistry, TaskRegistryError } from '@batchline/sdk';
import { TaskExecutionError, TimeoutError, isEngineError } from './errors/engine.errors';
import { AttemptOutcome, Lease } from './services/scheduler';

const TAG = '[worker]';

export interface RunTaskOptions {
    /** Applies when the job sets no timeout of its own; 0 means no limit */
    defaultTimeoutMs: number;
    onProgress: (jobId: string, progress: number, message?: string) => void;
}

/**
 * Runs one attempt of a leased job. Never throws: whatever the task does ends
 * up in the returned outcome.
 */
export async function runTask(
    registry: TaskRegistry,
    lease: Lease,
    options: RunTaskOptions,
): Promise<AttemptOutcome> {
    const { job } = lease;
    console.log(`${TAG} running job ${job.id} (${job.taskName}, attempt ${job.attemptCount})`);

    let task: Task;
    try {
        task = registry.resolve(job.taskName);
    } catch (err) {
        return { ok: false, error: err };
    }

    // Cancellation and the time budget both abort the signal the task sees.
    const controller = new AbortController();
    const forwardAbort = () => controller.abort(lease.signal.reason);
    if (lease.signal.aborted) forwardAbort();
    else lease.signal.addEventListener('abort', forwardAbort, { once: true });

    const ctx: TaskContext = {
        jobId: job.id,
        taskName: job.taskName,
        attempt: job.attemptCount,
        signal: controller.signal,
        reportProgress: (progress, message) => options.onProgress(job.id, progress, message),
    };

    const timeoutMs = job.timeoutMs ?? options.defaultTimeoutMs;
    let timer: NodeJS.Timeout | undefined;

    try {
        const execution = Promise.resolve().then(() => task.handler(job.args, ctx));
        const result = timeoutMs > 0
            ? await Promise.race([
                execution,
                new Promise<never>((_, reject) => {
                    timer = setTimeout(() => {
                        const timeout = new TimeoutError(timeoutMs);
                        controller.abort(timeout);
                        execution.catch(lateErr =>
                            console.warn(`${TAG} job ${job.id} failed after timing out:`, lateErr),
                        );
                        reject(timeout);
                    }, timeoutMs);
                }),
            ])
            : await execution;

        console.log(`${TAG} job ${job.id} attempt ${job.attemptCount} succeeded`);
        return { ok: true, result };
    } catch (err) {
        console.error(`${TAG} job ${job.id} attempt ${job.attemptCount} failed:`, err);
        return { ok: false, error: wrapTaskError(err) };
    } finally {
        if (timer) clearTimeout(timer);
        lease.signal.removeEventListener('abort', forwardAbort);
    }
}

// Engine and registry errors keep their identity; anything a task throws becomes a TaskExecutionError.
export function wrapTaskError(err: unknown): Error {
    if (isEngineError(err) || err instanceof TaskRegistryError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new TaskExecutionError(message, err);
}
