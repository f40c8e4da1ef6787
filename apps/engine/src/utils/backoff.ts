import { RetryPolicy } from '../db/job.entity';

// Exponential backoff: baseDelayMs * multiplier^(attempt-1), capped at maxDelayMs.
// attempt is the 1-indexed attempt that just failed; attempt=1 waits baseDelayMs.
export function calculateBackOff(
    attempt: number,
    policy: Pick<RetryPolicy, 'baseDelayMs' | 'multiplier' | 'maxDelayMs' | 'jitter'>,
    random: () => number = Math.random,
): number {
    let delay = policy.baseDelayMs * Math.pow(policy.multiplier, Math.max(0, attempt - 1));
    delay = Math.min(delay, policy.maxDelayMs);
    if (policy.jitter <= 0) return Math.floor(delay);

    // ±jitter of the delay, never past the cap
    const spread = delay * policy.jitter;
    const randomJitter = random() * spread * 2 - spread;
    return Math.max(0, Math.floor(Math.min(delay + randomJitter, policy.maxDelayMs)));
}
