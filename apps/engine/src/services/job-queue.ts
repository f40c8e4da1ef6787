import { JobPriority, PRIORITY_RANK } from '../db/job.entity';

interface QueueEntry {
    id: string;
    priority: JobPriority;
    createdAt: number;
    seq: number;
}

/**
 * Submitted jobs that are not running: priority first, then earliest
 * creation, then submission order.
 */
export class JobQueue {
    private entries = new Map<string, QueueEntry>();
    private seq = 0;

    push(job: { id: string; priority: JobPriority; createdAt: Date }): void {
        if (this.entries.has(job.id)) return;
        this.entries.set(job.id, {
            id: job.id,
            priority: job.priority,
            createdAt: job.createdAt.getTime(),
            seq: this.seq++,
        });
    }

    remove(id: string): boolean {
        return this.entries.delete(id);
    }

    has(id: string): boolean {
        return this.entries.has(id);
    }

    reprioritize(id: string, priority: JobPriority): boolean {
        const entry = this.entries.get(id);
        if (!entry) return false;
        entry.priority = priority;
        return true;
    }

    get size(): number {
        return this.entries.size;
    }

    ordered(): string[] {
        return Array.from(this.entries.values())
            .sort(compareEntries)
            .map(entry => entry.id);
    }

    clear(): void {
        this.entries.clear();
    }
}

function compareEntries(a: QueueEntry, b: QueueEntry): number {
    return (
        PRIORITY_RANK[b.priority] - PRIORITY_RANK[a.priority] ||
        a.createdAt - b.createdAt ||
        a.seq - b.seq
    );
}
