import { TaskContext, TaskRegistrar } from '@batchline/sdk';

// Always available, mostly for smoke tests and wiring checks from a client.
export function registerBuiltinTasks(registry: TaskRegistrar): void {
    registry.register('noop', (args: unknown) => args ?? null, { overwrite: true });

    registry.register('sleep', (args: unknown, ctx: TaskContext) => {
        const ms = sleepDuration(args);
        return new Promise<number>((resolve, reject) => {
            if (ctx.signal.aborted) {
                reject(ctx.signal.reason);
                return;
            }
            const timer = setTimeout(() => resolve(ms), ms);
            ctx.signal.addEventListener('abort', () => {
                clearTimeout(timer);
                reject(ctx.signal.reason);
            }, { once: true });
        });
    }, { overwrite: true });
}

function sleepDuration(args: unknown): number {
    const raw = Array.isArray(args)
        ? args[0]
        : typeof args === 'object' && args !== null && 'ms' in args
            ? args.ms
            : undefined;
    return typeof raw === 'number' && raw >= 0 ? raw : 0;
}
