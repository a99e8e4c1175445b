import {
	type BackupReadResult,
	DEFAULT_BACKUP_FILE,
	readBackupEntries,
} from "../../backup/ledger.js";
import type { LocalContext } from "../../context.js";
import { parseUtcTimestamp } from "../../utils/time.js";

interface BackupCommandFlags {
	backupFile?: string;
}

export function formatBackupReport(
	filePath: string,
	result: BackupReadResult,
): string[] {
	const { entries, invalidLines } = result;
	if (entries.length === 0) {
		return [`No backed-up posts in ${filePath}`];
	}

	const times = entries
		.map((entry) => parseUtcTimestamp(entry.datetime))
		.filter((date): date is Date => date !== null)
		.map((date) => date.getTime());

	const lines = [`${entries.length} backed-up post(s) in ${filePath}`];
	if (times.length > 0) {
		lines.push(`Oldest: ${new Date(Math.min(...times)).toISOString()}`);
		lines.push(`Newest: ${new Date(Math.max(...times)).toISOString()}`);
	}
	if (invalidLines.length > 0) {
		lines.push(`Unreadable lines: ${invalidLines.join(", ")}`);
	}
	lines.push("");
	for (const entry of entries) {
		lines.push(`${entry.datetime}  ${entry.uri}`);
	}
	return lines;
}

export async function inspectBackup(
	this: LocalContext,
	flags: BackupCommandFlags,
): Promise<void> {
	const filePath = flags.backupFile ?? DEFAULT_BACKUP_FILE;
	const result = await readBackupEntries(filePath);
	this.process.stdout.write(`${formatBackupReport(filePath, result).join("\n")}\n`);
}
