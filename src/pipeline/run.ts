import type { Logger } from "pino";
import pc from "picocolors";
import { BackupLedger, toBackupEntry } from "../backup/ledger.js";
import { PostLog } from "../backup/post-log.js";
import { deletePost } from "../delete/executor.js";
import { describeError } from "../errors.js";
import { PAGE_SIZE, listFeedPages } from "../feed/fetch.js";
import type { FeedService, Post } from "../feed/types.js";
import type { FilterCriteria } from "../filter/criteria.js";
import { findExclusion } from "../filter/match.js";
import type { RetryPolicy, Sleep } from "../utils/retry.js";
import { RunReport, type RunResult } from "./report.js";

export type PostAction = "previewing" | "deleting";

export interface RunProgress {
	pageFetched(pages: number): void;
	startPosts(total: number, action: PostAction): void;
	postProcessed(done: number): void;
}

export const silentProgress: RunProgress = {
	pageFetched() {},
	startPosts() {},
	postProcessed() {},
};

export type RunOptions = {
	/** Whose feed to read. */
	actor: string;
	/** Repository the delete calls target. */
	repo: string;
	criteria: FilterCriteria;
	preview: boolean;
	logFile: string;
	backupFile: string;
	retry: RetryPolicy;
	pageSize?: number;
};

export type RunDeps = {
	service: FeedService;
	log: Logger;
	progress?: RunProgress;
	sleep?: Sleep;
};

/**
 * Reads the whole feed, keeps the posts that pass the filters, then handles
 * each one in feed order: log line, and outside preview a backup entry
 * followed by the delete call.
 *
 * A pagination failure that survives its retries rejects before anything is
 * deleted. A failed delete is counted and the run moves on.
 */
export async function runPrune(
	options: RunOptions,
	deps: RunDeps,
): Promise<Readonly<RunResult>> {
	const { service, log, sleep } = deps;
	const progress = deps.progress ?? silentProgress;
	const pageSize = options.pageSize ?? PAGE_SIZE;
	const report = new RunReport();

	const matched = await collectMatches({ options, deps, pageSize, report });
	report.setMatched(matched.length);

	if (matched.length === 0) {
		log.info("No posts to delete or preview");
		return report.toResult();
	}

	log.info(`Writing details to ${pc.cyan(options.logFile)}`);
	const postLog = new PostLog(options.logFile);
	const ledger = options.preview ? null : new BackupLedger(options.backupFile);

	progress.startPosts(matched.length, options.preview ? "previewing" : "deleting");
	try {
		for (const [index, post] of matched.entries()) {
			await postLog.write(post);

			if (ledger) {
				await ledger.append(toBackupEntry(post));
				const outcome = await deletePost({
					service,
					repo: options.repo,
					uri: post.uri,
					retry: options.retry,
					log,
					sleep,
				});

				if (outcome.ok) {
					report.recordDeleted();
					log.debug(`Deleted ${pc.cyan(post.uri)}`);
				} else {
					report.recordFailed();
					log.warn(
						`Failed deleting ${pc.cyan(post.uri)}: ${describeError(outcome.error)}`,
					);
				}
			}

			progress.postProcessed(index + 1);
		}
	} catch (error) {
		for (const closeError of await closeAll([postLog, ledger])) {
			log.warn(`Failed closing an output file: ${describeError(closeError)}`);
		}
		throw error;
	}

	const closeErrors = await closeAll([postLog, ledger]);
	if (closeErrors.length > 0) throw closeErrors[0];

	return report.toResult();
}

/** Closes every file, even when one fails; resolves to the failures. */
async function closeAll(
	files: Array<{ close(): Promise<void> } | null>,
): Promise<unknown[]> {
	const results = await Promise.allSettled(files.map((file) => file?.close()));
	return results.flatMap((result) =>
		result.status === "rejected" ? [result.reason] : [],
	);
}

async function collectMatches(args: {
	options: RunOptions;
	deps: RunDeps;
	pageSize: number;
	report: RunReport;
}): Promise<Post[]> {
	const { options, deps, pageSize, report } = args;
	const progress = deps.progress ?? silentProgress;
	const matched: Post[] = [];
	let pages = 0;

	for await (const page of listFeedPages({
		service: deps.service,
		actor: options.actor,
		retry: options.retry,
		log: deps.log,
		pageSize,
		sleep: deps.sleep,
	})) {
		pages++;
		report.recordPage(pageSize);
		progress.pageFetched(pages);

		for (const post of page.posts) {
			const exclusion = findExclusion(post, options.criteria);
			if (exclusion) {
				deps.log.debug(`Skipping ${post.uri} ${pc.dim(`(${exclusion})`)}`);
				continue;
			}
			matched.push(post);
		}
	}

	return matched;
}
