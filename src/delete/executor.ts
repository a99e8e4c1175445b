import type { Logger } from "pino";
import { describeError } from "../errors.js";
import type { FeedService } from "../feed/types.js";
import { type RetryPolicy, type Sleep, withRetry } from "../utils/retry.js";

export const POST_COLLECTION = "app.bsky.feed.post";

export type DeleteOutcome = { ok: true } | { ok: false; error: unknown };

/** Last path segment of an at:// URI. */
export function extractRecordKey(uri: string): string {
	const segments = uri.split("/");
	return segments[segments.length - 1] ?? "";
}

/**
 * Deletes one post record, retrying per `retry`. Never throws: a failure is
 * returned so the caller can count it and move on to the next post.
 */
export async function deletePost(args: {
	service: FeedService;
	repo: string;
	uri: string;
	retry: RetryPolicy;
	log: Logger;
	sleep?: Sleep;
}): Promise<DeleteOutcome> {
	const { service, repo, uri, retry, log, sleep } = args;
	const rkey = extractRecordKey(uri);
	if (!rkey) {
		return { ok: false, error: new Error(`No record key in '${uri}'`) };
	}

	try {
		await withRetry(
			() => service.deleteRecord({ repo, collection: POST_COLLECTION, rkey }),
			{
				policy: retry,
				sleep,
				onRetry: ({ attempt, delayMs, error }) => {
					log.debug(
						`Delete of ${uri} attempt ${attempt} failed (${describeError(error)}), retrying in ${delayMs}ms`,
					);
				},
			},
		);
		return { ok: true };
	} catch (error) {
		return { ok: false, error };
	}
}
