export interface TaskContext {
    jobId: string;
    taskName: string;
    /** 1-indexed attempt number of the current execution */
    attempt: number;
    /** Aborted when the job is canceled or its time budget runs out. */
    signal: AbortSignal;
    reportProgress(progress: number, message?: string): void;
}

export type TaskHandler<TArgs = unknown, TResult = unknown> = (
    args: TArgs,
    ctx: TaskContext,
) => Promise<TResult> | TResult;

export interface Task<TArgs = unknown, TResult = unknown> {
    name: string;
    handler(args: TArgs, ctx: TaskContext): Promise<TResult> | TResult;
}

export interface RegisterOptions {
    overwrite?: boolean;
}

// A module listed in BATCHLINE_TASKS must export this.
export interface TaskModule {
    registerTasks(registry: TaskRegistrar): void;
}

export interface TaskRegistrar {
    register<TArgs = unknown, TResult = unknown>(
        name: string,
        handler: TaskHandler<TArgs, TResult>,
        opts?: RegisterOptions,
    ): Task<TArgs, TResult>;
}
