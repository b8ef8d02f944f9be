/**
 * Backoff for the initial database connection. Tenant lifecycle steps never retry.
 */

import { getLog } from "./Logger";

const log = getLog(import.meta);

export interface BackoffPolicy {
	/** Total number of attempts, the first one included */
	attempts: number;
	/** Wait after the first failure; doubles after each further failure */
	baseDelayMs: number;
	/** Cap of the doubled wait, before jitter */
	maxDelayMs: number;
}

export interface RetryHooks {
	/** Errors it rejects are rethrown at once */
	shouldRetry: (error: unknown) => boolean;
	/** Operation name in log messages */
	label: string;
	sleep?: (delayMs: number) => Promise<void>;
	/** Source of jitter in [0, 1) */
	random?: () => number;
}

/**
 * Wait after the given (1-based) failed attempt: the capped exponential delay
 * plus up to as much again of jitter.
 */
export function backoffDelay(failedAttempt: number, policy: BackoffPolicy, random: () => number = Math.random): number {
	const capped = Math.min(policy.baseDelayMs * 2 ** (failedAttempt - 1), policy.maxDelayMs);
	return capped + Math.floor(capped * random());
}

function wait(delayMs: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, delayMs));
}

/**
 * Runs `operation` until it resolves. Rethrows the error of the last attempt,
 * or the first error `shouldRetry` rejects.
 */
export async function retryWithBackoff<T>(
	operation: () => Promise<T>,
	policy: BackoffPolicy,
	hooks: RetryHooks,
): Promise<T> {
	const sleep = hooks.sleep ?? wait;
	for (let attempt = 1; ; attempt++) {
		try {
			return await operation();
		} catch (error) {
			if (attempt >= policy.attempts || !hooks.shouldRetry(error)) {
				throw error;
			}
			const delayMs = backoffDelay(attempt, policy, hooks.random);
			log.warn(
				{ attempt, attempts: policy.attempts, delayMs, err: error },
				"%s failed (attempt %d of %d), retrying in %dms",
				hooks.label,
				attempt,
				policy.attempts,
				delayMs,
			);
			await sleep(delayMs);
		}
	}
}
