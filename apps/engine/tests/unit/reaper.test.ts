import { JobState } from '../../src/db/job.entity';
import { createGroupEntity, GroupState } from '../../src/db/job-group.entity';
import { MemoryJobStore } from '../../src/repositories/memory-job-store';
import { Reaper } from '../../src/services/reaper';
import { createTestScheduler, makeJob, runningJob } from '../helpers/engine';

describe('Reaper', () => {
    let store: MemoryJobStore;

    beforeEach(() => {
        store = new MemoryJobStore();
    });

    function setup() {
        const { scheduler, persistence } = createTestScheduler({ store });
        return { scheduler, persistence, reaper: new Reaper(store, scheduler) };
    }

    it('requeues an interrupted job that has attempts left', async () => {
        await store.saveJob(runningJob('a', 1));
        const { scheduler, persistence, reaper } = setup();

        const reaped = await reaper.recover();
        await persistence.flush();

        expect(reaped).toEqual([{ id: 'a', taskName: 'ok', attemptCount: 1, action: 'requeued' }]);
        const job = scheduler.getJob('a');
        expect(job?.state).toBe(JobState.QUEUED);
        expect(job?.lastError?.code).toBe('INTERRUPTED');
        expect((await store.loadJob('a'))?.state).toBe(JobState.QUEUED);
    });

    it('fails an interrupted job on its last attempt', async () => {
        await store.saveJob(runningJob('a', 3));
        const { scheduler, persistence, reaper } = setup();

        const reaped = await reaper.recover();
        await persistence.flush();

        expect(reaped[0].action).toBe('failed');
        const job = scheduler.getJob('a');
        expect(job?.state).toBe(JobState.FAILED);
        expect(job?.error?.code).toBe('INTERRUPTED');
        expect(job?.attemptCount).toBe(3);
        expect((await store.loadJob('a'))?.state).toBe(JobState.FAILED);
    });

    it('loads finished dependencies to release waiting jobs', async () => {
        await store.saveJob(makeJob('a', { state: JobState.COMPLETED, finishedAt: new Date() }));
        await store.saveJob(makeJob('b', { state: JobState.WAITING, dependencies: ['a'] }));
        const { scheduler, reaper } = setup();

        const reaped = await reaper.recover();

        expect(reaped).toEqual([]);
        expect(scheduler.getJob('a')?.state).toBe(JobState.COMPLETED);
        expect(scheduler.getJob('b')?.state).toBe(JobState.QUEUED);
    });

    it('cancels a job whose dependency is missing from the store', async () => {
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        await store.saveJob(makeJob('b', { state: JobState.WAITING, dependencies: ['gone'] }));
        const { scheduler, reaper } = setup();

        await reaper.recover();

        const job = scheduler.getJob('b');
        expect(job?.state).toBe(JobState.CANCELED);
        expect(job?.error?.code).toBe('DEPENDENCY_FAILED');
        expect(job?.error?.message).toBe('Job b canceled: dependency gone is missing');
        warn.mockRestore();
    });

    it('restores groups with their finished members', async () => {
        const group = createGroupEntity({ id: 'g1', name: 'batch', sequential: true });
        group.memberIds.push('a', 'b');
        group.state = GroupState.RUNNING;
        await store.saveGroup(group);
        await store.saveJob(makeJob('a', { state: JobState.COMPLETED, groupId: 'g1', finishedAt: new Date() }));
        await store.saveJob(makeJob('b', { state: JobState.WAITING, groupId: 'g1' }));
        const { scheduler, reaper } = setup();

        await reaper.recover();

        expect(scheduler.getJob('b')?.state).toBe(JobState.QUEUED);
        const restored = scheduler.getGroup('g1');
        expect(restored?.state).toBe(GroupState.RUNNING);
        expect(restored && scheduler.summarize(restored)).toEqual({
            total: 2, completed: 1, failed: 0, canceled: 0, active: 1, progress: 0.5,
        });
    });
});
