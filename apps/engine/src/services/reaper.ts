import { JobEntity, JobState } from '../db/job.entity';
import { JobGroupEntity } from '../db/job-group.entity';
import { JobStore } from '../repositories/job-store';
import { Scheduler } from './scheduler';

const TAG = '[reaper]';

export interface ReapedJob {
    id: string;
    taskName: string;
    attemptCount: number;
    action: 'requeued' | 'failed';
}

/**
 * Crash recovery. Runs once at startup, before any worker takes a job:
 * rehydrates pending work from the store and settles attempts that were
 * running when the previous process died.
 */
export class Reaper {
    private isReaping = false;

    constructor(
        private readonly store: JobStore,
        private readonly scheduler: Scheduler,
    ) { }

    async recover(): Promise<ReapedJob[]> {
        if (this.isReaping) return [];
        this.isReaping = true;

        try {
            const pending = await this.store.loadAllPending();
            const jobs = new Map(pending.jobs.map(job => [job.id, job]));
            const groups = new Map(pending.groups.map(group => [group.id, group]));

            await this.loadReferencedGroups(jobs.values(), groups);
            await this.loadReferencedJobs(jobs, groups.values());

            this.scheduler.restore(Array.from(jobs.values()), Array.from(groups.values()));

            const reaped: ReapedJob[] = [];
            for (const id of pending.interrupted) {
                const job = this.scheduler.getJob(id);
                if (!job || job.state !== JobState.QUEUED) continue;
                const action = this.scheduler.recoverInterrupted(id);
                reaped.push({ id, taskName: job.taskName, attemptCount: job.attemptCount, action });
            }

            console.log(`${TAG} restored ${pending.jobs.length} pending jobs and ${pending.groups.length} groups`);
            if (reaped.length > 0) {
                console.log(`${TAG} reaped ${reaped.length} interrupted jobs: ${reaped.map(j => `${j.id}(${j.action})`).join(', ')}`);
            }
            return reaped;
        } finally {
            this.isReaping = false;
        }
    }

    // Groups of pending jobs may already be finished on disk if the job joined late.
    private async loadReferencedGroups(
        jobs: Iterable<JobEntity>,
        groups: Map<string, JobGroupEntity>,
    ): Promise<void> {
        for (const job of jobs) {
            if (!job.groupId || groups.has(job.groupId) || this.scheduler.getGroup(job.groupId)) continue;
            const group = await this.store.loadGroup(job.groupId);
            if (group) groups.set(group.id, group);
        }
    }

    // Terminal dependencies and group members are not in the pending set but decide eligibility.
    private async loadReferencedJobs(
        jobs: Map<string, JobEntity>,
        groups: Iterable<JobGroupEntity>,
    ): Promise<void> {
        const referenced = new Set<string>();
        for (const job of jobs.values()) {
            for (const dep of job.dependencies) referenced.add(dep);
        }
        for (const group of groups) {
            for (const member of group.memberIds) referenced.add(member);
        }

        for (const id of referenced) {
            if (jobs.has(id) || this.scheduler.getJob(id)) continue;
            const job = await this.store.loadJob(id);
            if (job) {
                jobs.set(id, job);
            } else {
                console.warn(`${TAG} job ${id} is referenced but missing from the store`);
            }
        }
    }
}
