export class ConfigError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "ConfigError";
	}
}

export class AuthenticationError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "AuthenticationError";
	}
}

export class RetryExhaustedError extends Error {
	readonly attempts: number;

	constructor(attempts: number, cause: unknown) {
		super(`Gave up after ${attempts} attempt(s): ${describeError(cause)}`, {
			cause,
		});
		this.name = "RetryExhaustedError";
		this.attempts = attempts;
	}
}

export class FeedFetchError extends Error {
	constructor(actor: string, cause: unknown) {
		super(`Failed to fetch the feed of '${actor}': ${describeError(cause)}`, {
			cause,
		});
		this.name = "FeedFetchError";
	}
}

/** HTTP statuses worth another attempt. 1 and 2 are the XRPC client's codes for transport failures. */
const RETRYABLE_STATUSES = new Set([1, 2, 408, 425, 429]);

export function getErrorStatus(error: unknown): number | null {
	if (typeof error !== "object" || error === null || !("status" in error)) {
		return null;
	}
	return typeof error.status === "number" ? error.status : null;
}

export function isRetryableError(error: unknown): boolean {
	if (
		error instanceof ConfigError ||
		error instanceof AuthenticationError ||
		error instanceof RetryExhaustedError
	) {
		return false;
	}

	const status = getErrorStatus(error);
	if (status === null) {
		// No status means the request never got an answer.
		return true;
	}
	return RETRYABLE_STATUSES.has(status) || status >= 500;
}

export function describeError(error: unknown): string {
	const message = error instanceof Error ? error.message : String(error);
	const status = getErrorStatus(error);
	return status !== null && status > 2 ? `${message} (status ${status})` : message;
}
