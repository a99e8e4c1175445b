import type { Logger } from "pino";
import pc from "picocolors";
import { FeedFetchError, describeError } from "../errors.js";
import { type RetryPolicy, type Sleep, withRetry } from "../utils/retry.js";
import { decodeFeedItem } from "./decode.js";
import type { FeedPage, FeedService, Post } from "./types.js";

export const PAGE_SIZE = 50;

/**
 * Async generator over an author's feed, one page per request.
 * Each request is retried per `retry`; when retries run out the generator
 * throws FeedFetchError.
 */
export async function* listFeedPages(args: {
	service: FeedService;
	actor: string;
	retry: RetryPolicy;
	log: Logger;
	pageSize?: number;
	sleep?: Sleep;
}): AsyncGenerator<FeedPage> {
	const { service, actor, retry, log, sleep } = args;
	const pageSize = args.pageSize ?? PAGE_SIZE;
	let cursor: string | undefined;
	let pageNumber = 0;

	while (true) {
		pageNumber++;
		const requestCursor = cursor;
		let response: Awaited<ReturnType<FeedService["getAuthorFeed"]>>;
		try {
			response = await withRetry(
				() =>
					service.getAuthorFeed({
						actor,
						cursor: requestCursor,
						limit: pageSize,
					}),
				{
					policy: retry,
					sleep,
					onRetry: ({ attempt, delayMs, error }) => {
						log.debug(
							`Page ${pageNumber} attempt ${attempt} failed (${describeError(error)}), retrying in ${delayMs}ms`,
						);
					},
				},
			);
		} catch (error) {
			throw new FeedFetchError(actor, error);
		}

		const posts: Post[] = [];
		for (const item of response.feed) {
			const decoded = decodeFeedItem(item);
			if (decoded.ok) {
				posts.push(decoded.post);
			} else {
				log.warn(
					`Skipping undecodable feed item ${pc.cyan(decoded.uri ?? "(no uri)")}: ${decoded.reason}`,
				);
			}
		}

		const nextCursor = response.cursor || undefined;
		log.debug(
			`Fetched page ${pageNumber} (${posts.length} posts${nextCursor ? "" : ", last page"})`,
		);
		yield { posts, nextCursor };

		if (!nextCursor) return;
		cursor = nextCursor;
	}
}
