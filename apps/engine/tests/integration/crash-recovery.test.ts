import { JobState } from '../../src/db/job.entity';
import { FileJobStore } from '../../src/repositories/file-job-store';
import { JobEngine } from '../../src/services/job-engine';
import { registerBuiltinTasks } from '../../src/tasks';
import { createTestEngine, makeTempDir, removeDir, runningJob } from '../helpers/engine';

describe('Crash recovery', () => {
    let dir: string;
    const engines: JobEngine[] = [];

    async function boot(): Promise<JobEngine> {
        const store = new FileJobStore(dir);
        await store.init();
        const engine = createTestEngine({ store });
        registerBuiltinTasks(engine.registry);
        engines.push(engine);
        return engine;
    }

    beforeEach(async () => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        dir = await makeTempDir();
    });

    afterEach(async () => {
        for (const engine of engines.splice(0)) await engine.stop();
        await removeDir(dir);
        jest.restoreAllMocks();
    });

    it('requeues a job that was running when the process died', async () => {
        const seed = new FileJobStore(dir);
        await seed.saveJob(runningJob('job-a', 1, { taskName: 'noop', args: ['payload'] }));

        const engine = await boot();
        const reaped = await engine.start();

        expect(reaped).toEqual([{ id: 'job-a', taskName: 'noop', attemptCount: 1, action: 'requeued' }]);
        const status = await engine.waitForJob('job-a', 5000);
        expect(status.state).toBe(JobState.COMPLETED);
        expect(status.attemptCount).toBe(2);
        expect(status.lastError?.code).toBe('INTERRUPTED');
        expect(engine.getResult('job-a')).toEqual(['payload']);
    });

    it('fails an interrupted job that had no attempts left', async () => {
        const seed = new FileJobStore(dir);
        await seed.saveJob(runningJob('job-a', 3, { taskName: 'noop' }));

        const engine = await boot();
        const reaped = await engine.start();

        expect(reaped).toEqual([{ id: 'job-a', taskName: 'noop', attemptCount: 3, action: 'failed' }]);
        const status = engine.getStatus('job-a');
        expect(status.state).toBe(JobState.FAILED);
        expect(status.error?.code).toBe('INTERRUPTED');
    });

    it('resumes queued and waiting jobs after a restart', async () => {
        const first = await boot();
        const a = first.createJob('noop', ['a']);
        const b = first.createJob('noop', ['b'], { dependencies: [a] });
        await first.submit(b);
        await first.submit(a);
        await first.stop();

        const second = await boot();
        await second.start();

        const status = await second.waitForJob(b, 5000);
        expect(status.state).toBe(JobState.COMPLETED);
        expect(second.getStatus(a).state).toBe(JobState.COMPLETED);
        expect(second.getResult(b)).toEqual(['b']);
    });

    it('lets a restored job depend on one that finished before the restart', async () => {
        const first = await boot();
        await first.start();
        const a = first.createJob('noop', ['a']);
        await first.submit(a);
        await first.waitForJob(a, 5000);
        const b = first.createJob('noop', ['b'], { dependencies: [a] });
        await first.stop();

        const second = await boot();
        await second.start();

        expect(second.getStatus(a).state).toBe(JobState.COMPLETED);
        await expect(second.submit(b)).resolves.toBe(JobState.QUEUED);
        await expect(second.waitForJob(b, 5000)).resolves.toMatchObject({ state: JobState.COMPLETED });
    });
});
