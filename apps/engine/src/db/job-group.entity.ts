import { JobEntity, JobState } from './job.entity';

export enum GroupState {
    RUNNING = 'running',
    COMPLETED = 'completed',
    FAILED = 'failed',
    CANCELED = 'canceled',
}

/**
 * A named set of jobs sharing sequencing and cancellation policy.
 * Members are referenced by id; the group never owns job records.
 */
export interface JobGroupEntity {
    id: string;
    name: string;
    description: string;
    sequential: boolean;
    cancelOnFailure: boolean;
    memberIds: string[];
    /** Set by an explicit cancelGroup() */
    canceled: boolean;
    /** Last derived state, kept for the persisted record */
    state: GroupState;
    metadata: Record<string, unknown>;
    createdAt: Date;
    updatedAt: Date;
    /** Set once every member is terminal */
    finishedAt: Date | null;
}

export interface GroupSummary {
    total: number;
    completed: number;
    failed: number;
    canceled: number;
    active: number;
    /** Share of members in a terminal state, 0..1 */
    progress: number;
}

export function createGroupEntity(params: {
    id: string;
    name: string;
    sequential?: boolean;
    cancelOnFailure?: boolean;
    description?: string;
    metadata?: Record<string, unknown>;
}): JobGroupEntity {
    const now = new Date();
    return {
        id: params.id,
        name: params.name,
        description: params.description ?? '',
        sequential: params.sequential ?? false,
        cancelOnFailure: params.cancelOnFailure ?? false,
        memberIds: [],
        canceled: false,
        state: GroupState.COMPLETED,
        metadata: params.metadata ?? {},
        createdAt: now,
        updatedAt: now,
        finishedAt: null,
    };
}

export function summarizeGroup(
    group: JobGroupEntity,
    lookup: (id: string) => JobEntity | undefined,
): GroupSummary {
    const summary: GroupSummary = { total: group.memberIds.length, completed: 0, failed: 0, canceled: 0, active: 0, progress: 0 };

    for (const id of group.memberIds) {
        const state = lookup(id)?.state;
        if (state === JobState.COMPLETED) summary.completed++;
        else if (state === JobState.FAILED) summary.failed++;
        else if (state === JobState.CANCELED) summary.canceled++;
        else summary.active++;
    }

    if (summary.total > 0) {
        summary.progress = (summary.total - summary.active) / summary.total;
    }
    return summary;
}

// An empty group has nothing left to do, so it counts as completed.
export function deriveGroupState(group: JobGroupEntity, summary: GroupSummary): GroupState {
    if (group.canceled) return GroupState.CANCELED;
    if (summary.failed > 0) return GroupState.FAILED;
    if (summary.active > 0) return GroupState.RUNNING;
    if (summary.canceled > 0) return GroupState.CANCELED;
    return GroupState.COMPLETED;
}

export function isGroupSettled(summary: GroupSummary): boolean {
    return summary.active === 0;
}
