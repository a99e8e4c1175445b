import { setTimeout as delay } from "node:timers/promises";
import { RetryExhaustedError, isRetryableError } from "../errors.js";

export type RetryPolicy = {
	maxAttempts: number;
	baseDelayMs: number;
	maxDelayMs: number;
	multiplier: number;
	jitter: boolean;
};

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
	maxAttempts: 3,
	baseDelayMs: 1000,
	maxDelayMs: 10_000,
	multiplier: 2,
	jitter: false,
};

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = async (ms) => {
	await delay(ms);
};

export type RetryOptions = {
	policy: RetryPolicy;
	sleep?: Sleep;
	isRetryable?: (error: unknown) => boolean;
	onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
	random?: () => number;
};

/**
 * Delay before the attempt that follows failed attempt number `attempt` (1-based).
 * With jitter the delay is drawn uniformly from [0, computed].
 */
export function backoffDelay(
	policy: RetryPolicy,
	attempt: number,
	random: () => number = Math.random,
): number {
	const exponential =
		policy.baseDelayMs * policy.multiplier ** Math.max(0, attempt - 1);
	const capped = Math.min(policy.maxDelayMs, exponential);
	return policy.jitter ? Math.round(capped * random()) : capped;
}

/**
 * Runs `operation` until it succeeds, a non-retryable error is thrown, or the
 * policy runs out of attempts. Non-retryable errors are rethrown as they are;
 * running out of attempts throws RetryExhaustedError carrying the last cause.
 */
export async function withRetry<T>(
	operation: (attempt: number) => Promise<T>,
	options: RetryOptions,
): Promise<T> {
	const {
		policy,
		sleep: wait = sleep,
		isRetryable = isRetryableError,
		onRetry,
		random,
	} = options;
	const maxAttempts = Math.max(1, policy.maxAttempts);

	for (let attempt = 1; ; attempt++) {
		try {
			return await operation(attempt);
		} catch (error) {
			if (!isRetryable(error)) throw error;
			if (attempt >= maxAttempts) {
				throw new RetryExhaustedError(attempt, error);
			}

			const delayMs = backoffDelay(policy, attempt, random);
			onRetry?.({ attempt, delayMs, error });
			await wait(delayMs);
		}
	}
}
