import { AttemptOutcome, Lease } from './scheduler';

const TAG = '[worker-pool]';

export interface LeaseSource {
    acquire(): Promise<Lease | null>;
    report(jobId: string, outcome: AttemptOutcome): void;
}

export type AttemptExecutor = (lease: Lease) => Promise<AttemptOutcome>;

/**
 * A fixed number of async loops, each taking one job at a time from the
 * source. A loop ends when the source hands out null.
 */
export class WorkerPool {
    private loops: Promise<void>[] = [];
    private running = false;

    constructor(
        private readonly source: LeaseSource,
        private readonly execute: AttemptExecutor,
        readonly size: number,
    ) {
        if (!Number.isInteger(size) || size < 1) {
            throw new RangeError(`Worker pool size must be a positive integer, got ${size}`);
        }
    }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }
        this.running = true;
        this.loops = Array.from({ length: this.size }, (_, index) => this.loop(index));
        console.log(`${TAG} started ${this.size} workers`);
    }

    /** Resolves once every loop has finished its current job and exited. */
    async stop(): Promise<void> {
        if (!this.running) return;
        this.running = false;
        await Promise.all(this.loops);
        this.loops = [];
        console.log(`${TAG} stopped`);
    }

    isRunning(): boolean {
        return this.running;
    }

    private async loop(index: number): Promise<void> {
        while (this.running) {
            const lease = await this.source.acquire();
            if (!lease) break;

            try {
                const outcome = await this.execute(lease);
                this.source.report(lease.job.id, outcome);
            } catch (err) {
                console.error(`${TAG} worker ${index} crashed on job ${lease.job.id}:`, err);
                this.source.report(lease.job.id, { ok: false, error: err });
            }
        }
    }
}
