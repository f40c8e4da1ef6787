import { UnknownTaskError } from '@batchline/sdk';
import { JobEntity } from '../db/job.entity';
import { DependencyFailedError } from '../errors/engine.errors';
import { calculateBackOff } from '../utils/backoff';

export type RetryDecision =
    | { action: 'retry'; delayMs: number }
    | { action: 'fail'; reason: 'structural' | 'exhausted' };

/**
 * Decides what happens to a job whose attempt just failed.
 * Structural errors are never retried since another attempt cannot change the outcome.
 */
export class RetryCoordinator {
    constructor(private readonly random: () => number = Math.random) { }

    decide(job: Pick<JobEntity, 'attemptCount' | 'retryPolicy'>, error: unknown): RetryDecision {
        if (this.isStructural(error)) {
            return { action: 'fail', reason: 'structural' };
        }
        if (job.attemptCount >= job.retryPolicy.maxAttempts) {
            return { action: 'fail', reason: 'exhausted' };
        }
        return {
            action: 'retry',
            delayMs: calculateBackOff(job.attemptCount, job.retryPolicy, this.random),
        };
    }

    private isStructural(error: unknown): boolean {
        return error instanceof UnknownTaskError || error instanceof DependencyFailedError;
    }
}
