import { deserialize, serialize } from '@batchline/sdk';
import { JobEntity } from '../db/job.entity';
import { JobGroupEntity } from '../db/job-group.entity';
import { JobStore, PendingRecords, collectPending } from './job-store';

/**
 * Keeps records as serialized strings so a reload behaves like one from disk.
 * Useful for embedding without durability and for tests.
 */
export class MemoryJobStore implements JobStore {
    private jobs = new Map<string, string>();
    private groups = new Map<string, string>();

    async saveJob(job: JobEntity): Promise<void> {
        this.jobs.set(job.id, serialize(job));
    }

    async saveGroup(group: JobGroupEntity): Promise<void> {
        this.groups.set(group.id, serialize(group));
    }

    async loadJob(id: string): Promise<JobEntity | null> {
        return deserialize<JobEntity>(this.jobs.get(id)) ?? null;
    }

    async loadGroup(id: string): Promise<JobGroupEntity | null> {
        return deserialize<JobGroupEntity>(this.groups.get(id)) ?? null;
    }

    async loadAllPending(): Promise<PendingRecords> {
        const jobs: JobEntity[] = [];
        for (const raw of this.jobs.values()) {
            const job = deserialize<JobEntity>(raw);
            if (job) jobs.push(job);
        }
        const groups: JobGroupEntity[] = [];
        for (const raw of this.groups.values()) {
            const group = deserialize<JobGroupEntity>(raw);
            if (group) groups.push(group);
        }
        return collectPending(jobs, groups);
    }

    async ping(): Promise<void> { }

    async close(): Promise<void> { }
}
