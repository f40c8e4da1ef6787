import { toJsonEnvelope } from '@batchline/sdk';
import { JobPriority, JobState } from '../../src/db/job.entity';
import { GroupState, createGroupEntity } from '../../src/db/job-group.entity';
import {
    GroupRow,
    JobRow,
    UPSERT_GROUP,
    UPSERT_JOB,
    groupParams,
    jobParams,
    rowToGroup,
    rowToJob,
} from '../../src/repositories/pg-job-store';
import { makeJob } from '../helpers/engine';

function jobRow(overrides: Partial<JobRow> = {}): JobRow {
    const created = new Date('2024-03-01T10:00:00Z');
    return {
        id: 'job-1',
        name: 'nightly export',
        task_name: 'export',
        args: toJsonEnvelope([{ since: new Date('2024-02-01T00:00:00Z') }]),
        priority: 'high',
        dependencies: ['job-0'],
        state: 'waiting',
        retry_policy: { maxAttempts: 3, baseDelayMs: 1000, multiplier: 4, maxDelayMs: 60_000, jitter: 0 },
        attempt_count: 0,
        result: null,
        error: null,
        last_error: null,
        group_id: null,
        tags: ['reports'],
        metadata: toJsonEnvelope({ owner: 'ops' }),
        timeout_ms: 5000,
        progress: 0,
        progress_message: '',
        retry_at: null,
        created_at: created,
        queued_at: created,
        started_at: null,
        finished_at: null,
        updated_at: created,
        ...overrides,
    };
}

describe('PgJobStore row mapping', () => {
    it('builds an upsert covering every column', () => {
        expect(UPSERT_JOB.startsWith('INSERT INTO jobs (id, name, task_name, args,')).toBe(true);
        expect(UPSERT_JOB).toContain('VALUES ($1, $2, $3,');
        expect(UPSERT_JOB).toContain('$24)');
        expect(UPSERT_JOB).toContain('ON CONFLICT (id) DO UPDATE SET name = EXCLUDED.name,');
        expect(UPSERT_JOB).not.toContain('id = EXCLUDED.id');
        expect(UPSERT_GROUP).toContain('$12)');
    });

    it('orders job parameters like the column list', () => {
        const job = makeJob('job-1', { priority: JobPriority.LOW, tags: ['a'] });
        const params = jobParams(job);

        expect(params).toHaveLength(24);
        expect(params[0]).toBe('job-1');
        expect(params[2]).toBe('ok');
        expect(params[3]).toBe(JSON.stringify(toJsonEnvelope([])));
        expect(params[4]).toBe('low');
        expect(params[6]).toBe('created');
        expect(params[10]).toBeNull();
        expect(params[13]).toEqual(['a']);
    });

    it('orders group parameters like the column list', () => {
        const group = createGroupEntity({ id: 'g1', name: 'batch', sequential: true });
        const params = groupParams(group);

        expect(params).toHaveLength(12);
        expect(params.slice(0, 5)).toEqual(['g1', 'batch', '', true, false]);
        expect(params[7]).toBe('completed');
    });

    it('maps a job row back to an entity, restoring rich values', () => {
        const job = rowToJob(jobRow());

        expect(job.taskName).toBe('export');
        expect(job.priority).toBe(JobPriority.HIGH);
        expect(job.state).toBe(JobState.WAITING);
        expect(job.args).toEqual([{ since: new Date('2024-02-01T00:00:00Z') }]);
        expect(job.metadata).toEqual({ owner: 'ops' });
        expect(job.result).toBeNull();
        expect(job.timeoutMs).toBe(5000);
    });

    it('defaults missing payloads', () => {
        const job = rowToJob(jobRow({ args: null, metadata: null }));

        expect(job.args).toEqual([]);
        expect(job.metadata).toEqual({});
    });

    it('rejects rows with an unknown state or priority', () => {
        expect(() => rowToJob(jobRow({ state: 'exploded' }))).toThrow('Job job-1 has unknown state "exploded"');
        expect(() => rowToJob(jobRow({ priority: 'urgent' }))).toThrow('Job job-1 has unknown priority "urgent"');
    });

    it('maps a group row back to an entity', () => {
        const created = new Date('2024-03-01T10:00:00Z');
        const row: GroupRow = {
            id: 'g1',
            name: 'batch',
            description: 'monthly close',
            sequential: true,
            cancel_on_failure: false,
            member_ids: ['a', 'b'],
            canceled: false,
            state: 'running',
            metadata: null,
            created_at: created,
            updated_at: created,
            finished_at: null,
        };

        const group = rowToGroup(row);

        expect(group.state).toBe(GroupState.RUNNING);
        expect(group.memberIds).toEqual(['a', 'b']);
        expect(group.metadata).toEqual({});
        expect(() => rowToGroup({ ...row, state: 'lost' })).toThrow('Group g1 has unknown state "lost"');
    });
});
