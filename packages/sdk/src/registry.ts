import { DuplicateTaskError, InvalidTaskNameError, UnknownTaskError } from './errors';
import { RegisterOptions, Task, TaskHandler, TaskModule, TaskRegistrar } from './types';

/**
 * Maps task names to handlers. Jobs reference tasks by name only, so a
 * persisted job runs against whatever registry is active after a restart.
 *
 * Build one at startup and hand it to the engine; there is no global instance.
 */
export class TaskRegistry implements TaskRegistrar {
    private tasks = new Map<string, Task>();
    private static readonly NAME_PATTERN = /^[a-zA-Z0-9_.:-]+$/;
    private static readonly MAX_NAME_LENGTH = 100;

    register<TArgs = unknown, TResult = unknown>(
        name: string,
        handler: TaskHandler<TArgs, TResult>,
        opts: RegisterOptions = {},
    ): Task<TArgs, TResult> {
        if (!name || name.length === 0) {
            throw new InvalidTaskNameError('Task name cannot be empty');
        }
        if (name.length > TaskRegistry.MAX_NAME_LENGTH) {
            throw new InvalidTaskNameError(
                `Task name exceeds maximum length of ${TaskRegistry.MAX_NAME_LENGTH} characters`,
            );
        }
        if (!TaskRegistry.NAME_PATTERN.test(name)) {
            throw new InvalidTaskNameError(
                'Task name must contain only alphanumeric characters, dots, colons, dashes, and underscores',
            );
        }
        if (this.tasks.has(name) && !opts.overwrite) {
            throw new DuplicateTaskError(name);
        }
        const task: Task<TArgs, TResult> = { name, handler };
        this.tasks.set(name, task);
        return task;
    }

    resolve(name: string): Task {
        const task = this.tasks.get(name);
        if (!task) {
            throw new UnknownTaskError(name, this.list());
        }
        return task;
    }

    get(name: string): Task | undefined {
        return this.tasks.get(name);
    }

    has(name: string): boolean {
        return this.tasks.has(name);
    }

    unregister(name: string): boolean {
        return this.tasks.delete(name);
    }

    list(): string[] {
        return Array.from(this.tasks.keys());
    }
}

export function isTaskModule(value: unknown): value is TaskModule {
    return (
        typeof value === 'object' &&
        value !== null &&
        'registerTasks' in value &&
        typeof value.registerTasks === 'function'
    );
}
