import { UnknownTaskError } from '@batchline/sdk';
import { DEFAULT_RETRY_POLICY } from '../../src/db/job.entity';
import { DependencyFailedError, TaskExecutionError } from '../../src/errors/engine.errors';
import { RetryCoordinator } from '../../src/services/retry-coordinator';

describe('RetryCoordinator', () => {
    const coordinator = new RetryCoordinator(() => 0.5);
    const policy = { ...DEFAULT_RETRY_POLICY, maxAttempts: 3 };

    it('retries with backoff while attempts remain', () => {
        const decision = coordinator.decide({ attemptCount: 1, retryPolicy: policy }, new Error('flaky'));
        expect(decision).toEqual({ action: 'retry', delayMs: 1000 });
    });

    it('uses the attempt that just failed for the delay', () => {
        const decision = coordinator.decide({ attemptCount: 2, retryPolicy: policy }, new TaskExecutionError('flaky', null));
        expect(decision).toEqual({ action: 'retry', delayMs: 4000 });
    });

    it('fails once attempts are exhausted', () => {
        const decision = coordinator.decide({ attemptCount: 3, retryPolicy: policy }, new Error('flaky'));
        expect(decision).toEqual({ action: 'fail', reason: 'exhausted' });
    });

    it('never retries an unknown task', () => {
        const decision = coordinator.decide({ attemptCount: 1, retryPolicy: policy }, new UnknownTaskError('missing'));
        expect(decision).toEqual({ action: 'fail', reason: 'structural' });
    });

    it('never retries a failed dependency', () => {
        const decision = coordinator.decide(
            { attemptCount: 1, retryPolicy: policy },
            new DependencyFailedError('job-1', 'dependency job-0 failed'),
        );
        expect(decision).toEqual({ action: 'fail', reason: 'structural' });
    });
});
