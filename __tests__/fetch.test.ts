import { describe, expect, it } from "vitest";
import { FeedFetchError } from "../src/errors.js";
import { listFeedPages } from "../src/feed/fetch.js";
import type { FeedPage } from "../src/feed/types.js";
import { DEFAULT_RETRY_POLICY } from "../src/utils/retry.js";
import {
	FakeFeedService,
	HttpStatusError,
	feedItem,
	linkedPages,
	noSleep,
	silentLog,
} from "./helpers/fake-feed.js";

async function collect(iterable: AsyncIterable<FeedPage>): Promise<FeedPage[]> {
	const pages: FeedPage[] = [];
	for await (const page of iterable) pages.push(page);
	return pages;
}

describe("listFeedPages", () => {
	it("follows cursors until a page comes back without one", async () => {
		const service = new FakeFeedService({
			pages: linkedPages([
				[feedItem({ rkey: "a", indexedAt: "2024-01-03T00:00:00Z" })],
				[feedItem({ rkey: "b", indexedAt: "2024-01-02T00:00:00Z" })],
				[feedItem({ rkey: "c", indexedAt: "2024-01-01T00:00:00Z" })],
			]),
		});

		const pages = await collect(
			listFeedPages({
				service,
				actor: "did:plc:tester",
				retry: DEFAULT_RETRY_POLICY,
				log: silentLog,
				sleep: noSleep,
			}),
		);

		expect(pages).toHaveLength(3);
		expect(pages.map((p) => p.nextCursor)).toEqual(["page-1", "page-2", undefined]);
		expect(service.feedCalls).toEqual([
			{ actor: "did:plc:tester", cursor: undefined, limit: 50 },
			{ actor: "did:plc:tester", cursor: "page-1", limit: 50 },
			{ actor: "did:plc:tester", cursor: "page-2", limit: 50 },
		]);
	});

	it("treats an empty cursor as the end", async () => {
		const service = new FakeFeedService({
			pages: [{ feed: [], cursor: "" }],
		});

		const pages = await collect(
			listFeedPages({
				service,
				actor: "me",
				retry: DEFAULT_RETRY_POLICY,
				log: silentLog,
			}),
		);

		expect(pages).toEqual([{ posts: [], nextCursor: undefined }]);
		expect(service.feedCalls).toHaveLength(1);
	});

	it("retries a failed page request", async () => {
		const service = new FakeFeedService({
			pages: linkedPages([[feedItem({ rkey: "a", indexedAt: "2024-01-01T00:00:00Z" })]]),
			feedFailures: [new HttpStatusError(503)],
		});

		const pages = await collect(
			listFeedPages({
				service,
				actor: "me",
				retry: DEFAULT_RETRY_POLICY,
				log: silentLog,
				sleep: noSleep,
			}),
		);

		expect(pages).toHaveLength(1);
		expect(service.feedCalls).toHaveLength(2);
	});

	it("throws FeedFetchError once retries run out", async () => {
		const service = new FakeFeedService({
			pages: linkedPages([[]]),
			feedFailures: [
				new HttpStatusError(500),
				new HttpStatusError(500),
				new HttpStatusError(500),
			],
		});

		await expect(
			collect(
				listFeedPages({
					service,
					actor: "me",
					retry: DEFAULT_RETRY_POLICY,
					log: silentLog,
					sleep: noSleep,
				}),
			),
		).rejects.toBeInstanceOf(FeedFetchError);
		expect(service.feedCalls).toHaveLength(3);
	});

	it("skips items it cannot decode and keeps the rest", async () => {
		const service = new FakeFeedService({
			pages: linkedPages([
				[
					feedItem({ rkey: "good", indexedAt: "2024-01-01T00:00:00Z" }),
					feedItem({ rkey: "bad", indexedAt: "garbage" }),
					{ unexpected: true },
				],
			]),
		});

		const pages = await collect(
			listFeedPages({
				service,
				actor: "me",
				retry: DEFAULT_RETRY_POLICY,
				log: silentLog,
			}),
		);

		expect(pages[0]?.posts.map((p) => p.uri)).toEqual([
			"at://did:plc:tester/app.bsky.feed.post/good",
		]);
	});

	it("uses the page size it is given", async () => {
		const service = new FakeFeedService({ pages: linkedPages([[]]) });

		await collect(
			listFeedPages({
				service,
				actor: "me",
				retry: DEFAULT_RETRY_POLICY,
				log: silentLog,
				pageSize: 10,
			}),
		);

		expect(service.feedCalls[0]?.limit).toBe(10);
	});
});
