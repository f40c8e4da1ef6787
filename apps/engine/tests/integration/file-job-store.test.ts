import { promises as fs } from 'fs';
import path from 'path';
import { JobState } from '../../src/db/job.entity';
import { createGroupEntity } from '../../src/db/job-group.entity';
import { FileJobStore } from '../../src/repositories/file-job-store';
import { makeJob, makeTempDir, removeDir, runningJob } from '../helpers/engine';

describe('FileJobStore', () => {
    let dir: string;
    let store: FileJobStore;

    beforeEach(async () => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        dir = await makeTempDir();
        store = new FileJobStore(dir);
        await store.init();
    });

    afterEach(async () => {
        await store.close();
        await removeDir(dir);
        jest.restoreAllMocks();
    });

    it('writes one document per job and reads it back', async () => {
        const job = makeJob('job-1', { args: { since: new Date('2024-01-01T00:00:00Z'), ids: new Set([1, 2]) } });

        await store.saveJob(job);

        expect(await fs.readdir(path.join(dir, 'jobs'))).toEqual(['job-1.json']);
        const loaded = await store.loadJob('job-1');
        expect(loaded).toEqual(job);
        expect(loaded?.createdAt).toBeInstanceOf(Date);
    });

    it('overwrites the previous record on save', async () => {
        const job = makeJob('job-1');
        await store.saveJob(job);

        await store.saveJob({ ...job, state: JobState.QUEUED, attemptCount: 1 });

        expect(await store.loadJob('job-1')).toMatchObject({ state: JobState.QUEUED, attemptCount: 1 });
    });

    it('returns null for records that do not exist', async () => {
        await expect(store.loadJob('missing')).resolves.toBeNull();
        await expect(store.loadGroup('missing')).resolves.toBeNull();
    });

    it('refuses ids that would escape the data directory', async () => {
        await expect(store.loadJob('../outside')).rejects.toThrow('Invalid record id "../outside"');
    });

    it('loads pending work and hands back running jobs as queued', async () => {
        await store.saveJob(makeJob('created'));
        await store.saveJob(runningJob('running', 1));
        await store.saveJob(makeJob('done', { state: JobState.COMPLETED, finishedAt: new Date() }));
        await store.saveGroup({ ...createGroupEntity({ id: 'finished', name: 'finished' }), finishedAt: new Date() });
        await store.saveGroup(createGroupEntity({ id: 'open', name: 'open' }));

        const pending = await store.loadAllPending();

        expect(pending.jobs.map(job => job.id).sort()).toEqual(['created', 'running']);
        expect(pending.jobs.find(job => job.id === 'running')?.state).toBe(JobState.QUEUED);
        expect(pending.interrupted).toEqual(['running']);
        expect(pending.groups.map(group => group.id)).toEqual(['open']);
    });

    it('answers a ping once initialized', async () => {
        await expect(store.ping()).resolves.toBeUndefined();
    });
});
