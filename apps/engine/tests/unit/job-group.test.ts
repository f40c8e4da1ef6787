import { JobEntity, JobState } from '../../src/db/job.entity';
import {
    GroupState,
    createGroupEntity,
    deriveGroupState,
    isGroupSettled,
    summarizeGroup,
} from '../../src/db/job-group.entity';
import { makeJob } from '../helpers/engine';

describe('job groups', () => {
    function groupOf(states: JobState[]) {
        const jobs = new Map<string, JobEntity>();
        const group = createGroupEntity({ id: 'g1', name: 'batch' });
        states.forEach((state, i) => {
            const job = makeJob(`j${i}`, { state, groupId: 'g1' });
            jobs.set(job.id, job);
            group.memberIds.push(job.id);
        });
        return { group, summary: summarizeGroup(group, id => jobs.get(id)) };
    }

    it('counts members by outcome', () => {
        const { summary } = groupOf([JobState.COMPLETED, JobState.FAILED, JobState.CANCELED, JobState.RUNNING]);
        expect(summary).toEqual({ total: 4, completed: 1, failed: 1, canceled: 1, active: 1, progress: 0.75 });
    });

    it('is running while any member is not terminal', () => {
        const { group, summary } = groupOf([JobState.COMPLETED, JobState.WAITING]);
        expect(deriveGroupState(group, summary)).toBe(GroupState.RUNNING);
        expect(isGroupSettled(summary)).toBe(false);
    });

    it('is completed when every member completed', () => {
        const { group, summary } = groupOf([JobState.COMPLETED, JobState.COMPLETED]);
        expect(deriveGroupState(group, summary)).toBe(GroupState.COMPLETED);
        expect(isGroupSettled(summary)).toBe(true);
    });

    it('is failed as soon as one member failed', () => {
        const { group, summary } = groupOf([JobState.FAILED, JobState.RUNNING]);
        expect(deriveGroupState(group, summary)).toBe(GroupState.FAILED);
    });

    it('is canceled when members ended canceled and none failed', () => {
        const { group, summary } = groupOf([JobState.COMPLETED, JobState.CANCELED]);
        expect(deriveGroupState(group, summary)).toBe(GroupState.CANCELED);
    });

    it('is canceled once explicitly canceled', () => {
        const { group, summary } = groupOf([JobState.FAILED, JobState.RUNNING]);
        group.canceled = true;
        expect(deriveGroupState(group, summary)).toBe(GroupState.CANCELED);
    });

    it('treats an empty group as completed', () => {
        const { group, summary } = groupOf([]);
        expect(summary.progress).toBe(0);
        expect(deriveGroupState(group, summary)).toBe(GroupState.COMPLETED);
        expect(isGroupSettled(summary)).toBe(true);
    });
});
