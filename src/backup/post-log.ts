import type { Post } from "../feed/types.js";
import { AppendOnlyFile } from "../utils/append-file.js";
import { formatUtcSeconds } from "../utils/time.js";

export const DEFAULT_PREVIEW_LOG_FILE = "preview_log.txt";
export const DEFAULT_DELETE_LOG_FILE = "deleted_posts_log.txt";

export function defaultLogFile(preview: boolean): string {
	return preview ? DEFAULT_PREVIEW_LOG_FILE : DEFAULT_DELETE_LOG_FILE;
}

export function formatPostLogRecord(post: Post): string {
	const text = post.text.replace(/\r?\n/g, " ");
	return `${formatUtcSeconds(post.indexedAt)} UTC  ${text}\n---\n`;
}

/** Human-readable record of every matched post, previewed or deleted. */
export class PostLog {
	private readonly file: AppendOnlyFile;

	constructor(filePath: string) {
		this.file = new AppendOnlyFile(filePath);
	}

	async write(post: Post): Promise<void> {
		await this.file.append(formatPostLogRecord(post));
	}

	async close(): Promise<void> {
		await this.file.close();
	}
}
