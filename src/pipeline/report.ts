export type RunResult = {
	scanned: number;
	matched: number;
	deleted: number;
	failed: number;
};

export class RunReport {
	private scanned = 0;
	private matched = 0;
	private deleted = 0;
	private failed = 0;

	/** Counts a fetched page as full, whatever it actually held. */
	recordPage(pageSize: number): void {
		this.scanned += pageSize;
	}

	setMatched(count: number): void {
		this.matched = count;
	}

	recordDeleted(): void {
		this.deleted++;
	}

	recordFailed(): void {
		this.failed++;
	}

	toResult(): Readonly<RunResult> {
		return Object.freeze({
			scanned: this.scanned,
			matched: this.matched,
			deleted: this.deleted,
			failed: this.failed,
		});
	}
}

const RULE = "──────────────────────────────────────";

export function formatSummary(
	result: RunResult,
	options: { preview: boolean; logFile: string },
): string[] {
	const lines = [
		"",
		"── Summary ──────────────────────────",
		` Posts scanned   : ${result.scanned}`,
		` Posts matched   : ${result.matched}`,
	];
	if (!options.preview) {
		lines.push(` Posts deleted   : ${result.deleted}`);
		lines.push(` Delete failures : ${result.failed}`);
	}
	lines.push(` Log file        : ${options.logFile}`);
	lines.push(RULE);
	return lines;
}
