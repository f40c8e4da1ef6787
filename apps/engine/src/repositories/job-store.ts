import { JobEntity, JobState, isTerminal } from '../db/job.entity';
import { JobGroupEntity } from '../db/job-group.entity';

export interface PendingRecords {
    jobs: JobEntity[];
    groups: JobGroupEntity[];
    /** Ids of jobs that were running when their record was last written */
    interrupted: string[];
}

/**
 * Durable record of jobs and groups, one record per id.
 * Saves overwrite the previous record for the same id.
 */
export interface JobStore {
    saveJob(job: JobEntity): Promise<void>;
    saveGroup(group: JobGroupEntity): Promise<void>;
    loadJob(id: string): Promise<JobEntity | null>;
    loadGroup(id: string): Promise<JobGroupEntity | null>;
    /** Non-terminal jobs and unfinished groups; running jobs come back queued. */
    loadAllPending(): Promise<PendingRecords>;
    ping(): Promise<void>;
    close(): Promise<void>;
}

// The engine cannot know how far an interrupted attempt got, so it goes back to the queue.
export function collectPending(jobs: Iterable<JobEntity>, groups: Iterable<JobGroupEntity>): PendingRecords {
    const pending: PendingRecords = { jobs: [], groups: [], interrupted: [] };

    for (const job of jobs) {
        if (isTerminal(job.state)) continue;
        if (job.state === JobState.RUNNING) {
            pending.interrupted.push(job.id);
            pending.jobs.push({ ...job, state: JobState.QUEUED });
        } else {
            pending.jobs.push(job);
        }
    }
    for (const group of groups) {
        if (group.finishedAt === null) pending.groups.push(group);
    }

    pending.jobs.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
    return pending;
}
