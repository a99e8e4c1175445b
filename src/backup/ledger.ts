import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { Post } from "../feed/types.js";
import { AppendOnlyFile } from "../utils/append-file.js";

export const DEFAULT_BACKUP_FILE = "deleted_posts_backup.jsonl";

const backupEntrySchema = z.object({
	uri: z.string(),
	datetime: z.string(),
	post: z.record(z.string(), z.unknown()),
});

export type BackupEntry = z.infer<typeof backupEntrySchema>;

export function toBackupEntry(post: Post): BackupEntry {
	return {
		uri: post.uri,
		datetime: post.indexedAt.toISOString(),
		post: { ...post.raw },
	};
}

/**
 * Line-delimited JSON ledger of posts about to be deleted. One self-contained
 * object per line; an entry is on disk before `append` resolves.
 */
export class BackupLedger {
	private readonly file: AppendOnlyFile;
	private count = 0;

	constructor(filePath: string) {
		this.file = new AppendOnlyFile(filePath, { sync: true });
	}

	get entriesWritten(): number {
		return this.count;
	}

	async append(entry: BackupEntry): Promise<void> {
		await this.file.append(`${JSON.stringify(entry)}\n`);
		this.count++;
	}

	async close(): Promise<void> {
		await this.file.close();
	}
}

export type BackupReadResult = {
	entries: BackupEntry[];
	/** 1-based line numbers that were not valid entries. */
	invalidLines: number[];
};

/**
 * Reads a ledger back. A torn last line (a crash mid-write) is dropped
 * silently; any other bad line is reported in `invalidLines`.
 */
export async function readBackupEntries(
	filePath: string,
): Promise<BackupReadResult> {
	if (!existsSync(filePath)) {
		return { entries: [], invalidLines: [] };
	}

	const raw = await readFile(filePath, "utf8");
	const lines = raw.split("\n");
	const tornTail = !raw.endsWith("\n");
	const entries: BackupEntry[] = [];
	const invalidLines: number[] = [];

	lines.forEach((line, index) => {
		if (!line.trim()) return;
		const isLast = index === lines.length - 1;

		const parsed = backupEntrySchema.safeParse(safeJsonParse(line));
		if (parsed.success) {
			entries.push(parsed.data);
		} else if (!(isLast && tornTail)) {
			invalidLines.push(index + 1);
		}
	});

	return { entries, invalidLines };
}

function safeJsonParse(line: string): unknown {
	try {
		return JSON.parse(line);
	} catch {
		return undefined;
	}
}
