import { JobEntity } from '../db/job.entity';
import { JobGroupEntity } from '../db/job-group.entity';
import { PersistenceError } from '../errors/engine.errors';
import { JobStore } from '../repositories/job-store';

const TAG = '[store]';

/**
 * Orders writes per record: a save for `job:<id>` never overtakes an earlier
 * save for the same key. Each record is copied when the save is queued, so
 * later in-memory changes do not leak into an older write.
 *
 * Saves resolve to the failure instead of rejecting.
 */
export class PersistenceQueue {
    private chains = new Map<string, Promise<PersistenceError | null>>();

    constructor(private readonly store: JobStore) { }

    saveJob(job: JobEntity): Promise<PersistenceError | null> {
        const snapshot: JobEntity = {
            ...job,
            dependencies: [...job.dependencies],
            tags: [...job.tags],
            metadata: { ...job.metadata },
        };
        return this.enqueue(`job:${job.id}`, () => this.store.saveJob(snapshot));
    }

    saveGroup(group: JobGroupEntity): Promise<PersistenceError | null> {
        const snapshot: JobGroupEntity = {
            ...group,
            memberIds: [...group.memberIds],
            metadata: { ...group.metadata },
        };
        return this.enqueue(`group:${group.id}`, () => this.store.saveGroup(snapshot));
    }

    get pending(): number {
        return this.chains.size;
    }

    /** Resolves once every queued write has settled. */
    async flush(): Promise<void> {
        while (this.chains.size > 0) {
            await Promise.all(this.chains.values());
        }
    }

    private enqueue(key: string, write: () => Promise<void>): Promise<PersistenceError | null> {
        const previous = this.chains.get(key) ?? Promise.resolve(null);

        const next: Promise<PersistenceError | null> = previous
            .then(write)
            .then(
                () => null,
                (err: unknown) => {
                    console.error(`${TAG} failed to persist ${key}:`, err);
                    return new PersistenceError(key, err);
                },
            )
            .then(outcome => {
                if (this.chains.get(key) === next) this.chains.delete(key);
                return outcome;
            });

        this.chains.set(key, next);
        return next;
    }
}
