import { TaskRegistry, isTaskModule } from '../src/registry';
import { DuplicateTaskError, InvalidTaskNameError, UnknownTaskError } from '../src/errors';
import { TaskContext } from '../src/types';

function ctx(): TaskContext {
    return {
        jobId: 'job-1',
        taskName: 'echo',
        attempt: 1,
        signal: new AbortController().signal,
        reportProgress: jest.fn(),
    };
}

describe('TaskRegistry', () => {
    let registry: TaskRegistry;

    beforeEach(() => {
        registry = new TaskRegistry();
    });

    test('registers and resolves a task by name', async () => {
        registry.register<{ text: string }, string>('echo', async ({ text }) => text.toUpperCase());

        const task = registry.resolve('echo');
        expect(task.name).toBe('echo');
        await expect(task.handler({ text: 'hi' }, ctx())).resolves.toBe('HI');
    });

    test('rejects a duplicate name unless overwrite is set', () => {
        registry.register('echo', () => 1);

        expect(() => registry.register('echo', () => 2)).toThrow(DuplicateTaskError);

        registry.register('echo', () => 3, { overwrite: true });
        expect(registry.resolve('echo').handler(undefined, ctx())).toBe(3);
    });

    test('throws UnknownTaskError listing registered names', () => {
        registry.register('a', () => null);
        registry.register('b', () => null);

        expect(() => registry.resolve('missing')).toThrow(UnknownTaskError);
        expect(() => registry.resolve('missing')).toThrow('Task "missing" is not registered. Registered: [a, b]');
    });

    test('validates task names', () => {
        expect(() => registry.register('', () => null)).toThrow(InvalidTaskNameError);
        expect(() => registry.register('has space', () => null)).toThrow(InvalidTaskNameError);
        expect(() => registry.register('x'.repeat(101), () => null)).toThrow(/maximum length of 100/);
        expect(() => registry.register('docs:parse.v2_fast-path', () => null)).not.toThrow();
    });

    test('unregister removes the binding', () => {
        registry.register('temp', () => null);
        expect(registry.has('temp')).toBe(true);

        expect(registry.unregister('temp')).toBe(true);
        expect(registry.has('temp')).toBe(false);
        expect(registry.get('temp')).toBeUndefined();
        expect(registry.list()).toEqual([]);
    });

    test('error codes are stable', () => {
        expect(new UnknownTaskError('x').code).toBe('UNKNOWN_TASK');
        expect(new DuplicateTaskError('x').code).toBe('DUPLICATE_TASK');
        expect(new UnknownTaskError('x').name).toBe('UnknownTaskError');
    });
});

describe('isTaskModule', () => {
    test('accepts objects exporting registerTasks', () => {
        expect(isTaskModule({ registerTasks: () => undefined })).toBe(true);
        expect(isTaskModule({ registerTasks: 'nope' })).toBe(false);
        expect(isTaskModule(null)).toBe(false);
        expect(isTaskModule(42)).toBe(false);
    });
});
