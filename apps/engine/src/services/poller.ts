const TAG = '[poller]';

export interface DueSource {
    /** Releases jobs whose backoff has elapsed; returns how many were released. */
    releaseDue(now: Date): number;
}

export interface PollerConfig {
    intervalMs?: number;
    /** Skip a cycle while this returns true */
    checkBackpressure?: () => boolean;
}

// Wakes backed-off jobs once their retry time passes.
export class Poller {
    private interval: number;
    private readonly minInterval: number;
    private readonly maxInterval: number;
    private running = false;
    private currentTimeout: NodeJS.Timeout | null = null;
    private readonly checkBackpressure?: () => boolean;

    constructor(
        private readonly source: DueSource,
        config: PollerConfig = {},
    ) {
        this.minInterval = config.intervalMs || 100;
        this.maxInterval = this.minInterval * 5;
        this.interval = this.minInterval;
        this.checkBackpressure = config.checkBackpressure;
    }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }
        this.running = true;
        console.log(`${TAG} started (interval: ${this.minInterval}ms)`);
        this.poll();
    }

    async stop(): Promise<void> {
        this.running = false;
        if (this.currentTimeout) {
            clearTimeout(this.currentTimeout);
            this.currentTimeout = null;
        }
        console.log(`${TAG} stopped`);
    }

    get currentInterval(): number {
        return this.interval;
    }

    private poll(): void {
        if (!this.running) return;

        if (this.checkBackpressure && this.checkBackpressure()) {
            this.interval = this.minInterval;
            this.schedule();
            return;
        }

        try {
            const released = this.source.releaseDue(new Date());
            if (released > 0) {
                this.interval = this.minInterval;
            } else {
                // backoff: min -> 2x -> 4x -> 5x cap
                this.interval = Math.min(this.interval * 2, this.maxInterval);
            }
        } catch (err) {
            console.error(`${TAG} release error:`, err);
            this.interval = this.maxInterval;
        }

        this.schedule();
    }

    private schedule(): void {
        if (this.running) {
            this.currentTimeout = setTimeout(() => this.poll(), this.interval);
        }
    }
}
