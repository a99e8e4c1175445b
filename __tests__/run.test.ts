import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { readBackupEntries } from "../src/backup/ledger.js";
import { PostLog } from "../src/backup/post-log.js";
import { FeedFetchError } from "../src/errors.js";
import { buildFilterCriteria } from "../src/filter/criteria.js";
import { type RunOptions, type RunProgress, runPrune } from "../src/pipeline/run.js";
import { DEFAULT_RETRY_POLICY } from "../src/utils/retry.js";
import {
	FakeFeedService,
	HttpStatusError,
	NOW,
	daysAgo,
	feedItem,
	linkedPages,
	makeTempDir,
	noSleep,
	silentLog,
} from "./helpers/fake-feed.js";

let dir: string;
let cleanup: () => Promise<void>;

beforeEach(async () => {
	({ dir, cleanup } = await makeTempDir());
});

afterEach(async () => {
	vi.restoreAllMocks();
	await cleanup();
});

function options(overrides: Partial<RunOptions> = {}): RunOptions {
	return {
		actor: "did:plc:tester",
		repo: "did:plc:tester",
		criteria: buildFilterCriteria({ daysOld: 30, now: NOW }),
		preview: false,
		logFile: path.join(dir, "log.txt"),
		backupFile: path.join(dir, "backup.jsonl"),
		retry: DEFAULT_RETRY_POLICY,
		...overrides,
	};
}

const threePages = () =>
	linkedPages([
		[
			feedItem({ rkey: "new", text: "fresh", indexedAt: daysAgo(10) }),
			feedItem({ rkey: "old1", text: "first old", indexedAt: daysAgo(40) }),
		],
		[
			feedItem({ rkey: "reply", indexedAt: daysAgo(45), reply: true }),
			feedItem({ rkey: "old2", text: "second old", indexedAt: daysAgo(50) }),
		],
		[],
	]);

describe("runPrune", () => {
	it("backs up and deletes every matched post in feed order", async () => {
		const service = new FakeFeedService({ pages: threePages() });

		const result = await runPrune(options(), { service, log: silentLog, sleep: noSleep });

		expect(result).toEqual({ scanned: 150, matched: 2, deleted: 2, failed: 0 });
		expect(service.deleteCalls.map((c) => c.rkey)).toEqual(["old1", "old2"]);

		const { entries } = await readBackupEntries(path.join(dir, "backup.jsonl"));
		expect(entries.map((e) => e.uri)).toEqual([
			"at://did:plc:tester/app.bsky.feed.post/old1",
			"at://did:plc:tester/app.bsky.feed.post/old2",
		]);
		expect(await readFile(path.join(dir, "log.txt"), "utf8")).toBe(
			`${daysAgo(40).slice(0, 19).replace("T", " ")} UTC  first old\n---\n` +
				`${daysAgo(50).slice(0, 19).replace("T", " ")} UTC  second old\n---\n`,
		);
	});

	it("writes the backup entry before issuing the delete", async () => {
		const backupFile = path.join(dir, "backup.jsonl");
		const seenInBackup: boolean[] = [];
		const service = new FakeFeedService({ pages: threePages() });
		const originalDelete = service.deleteRecord.bind(service);
		service.deleteRecord = async (params) => {
			const { entries } = await readBackupEntries(backupFile);
			seenInBackup.push(entries.some((e) => e.uri.endsWith(`/${params.rkey}`)));
			await originalDelete(params);
		};

		await runPrune(options({ backupFile }), { service, log: silentLog });

		expect(seenInBackup).toEqual([true, true]);
	});

	it("counts a failed delete, keeps going, and keeps its backup", async () => {
		const service = new FakeFeedService({
			pages: threePages(),
			deleteFailures: {
				old1: [new HttpStatusError(500), new HttpStatusError(500), new HttpStatusError(500)],
			},
		});

		const result = await runPrune(options(), { service, log: silentLog, sleep: noSleep });

		expect(result).toEqual({ scanned: 150, matched: 2, deleted: 1, failed: 1 });
		expect(result.deleted + result.failed).toBe(result.matched);
		const { entries } = await readBackupEntries(path.join(dir, "backup.jsonl"));
		expect(entries).toHaveLength(2);
	});

	it("never backs up or deletes in preview mode", async () => {
		const service = new FakeFeedService({ pages: threePages() });

		const result = await runPrune(options({ preview: true }), {
			service,
			log: silentLog,
		});

		expect(result).toEqual({ scanned: 150, matched: 2, deleted: 0, failed: 0 });
		expect(service.deleteCalls).toEqual([]);
		expect(existsSync(path.join(dir, "backup.jsonl"))).toBe(false);
		expect(existsSync(path.join(dir, "log.txt"))).toBe(true);
	});

	it("writes no files when nothing matches", async () => {
		const service = new FakeFeedService({
			pages: linkedPages([[feedItem({ rkey: "new", indexedAt: daysAgo(1) })]]),
		});

		const result = await runPrune(options(), { service, log: silentLog });

		expect(result).toEqual({ scanned: 50, matched: 0, deleted: 0, failed: 0 });
		expect(existsSync(path.join(dir, "log.txt"))).toBe(false);
		expect(existsSync(path.join(dir, "backup.jsonl"))).toBe(false);
	});

	it("aborts before deleting anything when pagination fails", async () => {
		const pages = threePages();
		const service = new FakeFeedService({ pages });
		let calls = 0;
		const originalFetch = service.getAuthorFeed.bind(service);
		service.getAuthorFeed = async (params) => {
			calls++;
			if (calls > 1) throw new HttpStatusError(503);
			return originalFetch(params);
		};

		await expect(
			runPrune(options(), { service, log: silentLog, sleep: noSleep }),
		).rejects.toBeInstanceOf(FeedFetchError);
		expect(service.deleteCalls).toEqual([]);
		expect(existsSync(path.join(dir, "backup.jsonl"))).toBe(false);
	});

	it("reports progress for pages and posts", async () => {
		const events: string[] = [];
		const progress: RunProgress = {
			pageFetched: (pages) => events.push(`page ${pages}`),
			startPosts: (total, action) => events.push(`${action} ${total}`),
			postProcessed: (done) => events.push(`post ${done}`),
		};
		const service = new FakeFeedService({ pages: threePages() });

		await runPrune(options({ preview: true }), { service, log: silentLog, progress });

		expect(events).toEqual([
			"page 1",
			"page 2",
			"page 3",
			"previewing 2",
			"post 1",
			"post 2",
		]);
	});

	it("rethrows a processing failure rather than a failure to close the log", async () => {
		vi.spyOn(PostLog.prototype, "close").mockRejectedValue(new Error("close failed"));
		const progress: RunProgress = {
			pageFetched() {},
			startPosts() {},
			postProcessed() {
				throw new Error("progress failed");
			},
		};
		const service = new FakeFeedService({ pages: threePages() });

		await expect(
			runPrune(options({ preview: true }), { service, log: silentLog, progress }),
		).rejects.toThrow("progress failed");
	});

	it("reports a failure to close the log after a clean run", async () => {
		vi.spyOn(PostLog.prototype, "close").mockRejectedValue(new Error("close failed"));
		const service = new FakeFeedService({ pages: threePages() });

		await expect(
			runPrune(options({ preview: true }), { service, log: silentLog }),
		).rejects.toThrow("close failed");
	});

	it("includes replies when asked", async () => {
		const service = new FakeFeedService({ pages: threePages() });
		const criteria = buildFilterCriteria({ daysOld: 30, now: NOW, includeReplies: true });

		const result = await runPrune(options({ criteria, preview: true }), {
			service,
			log: silentLog,
		});

		expect(result.matched).toBe(3);
	});
});
