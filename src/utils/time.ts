const DAY_MS = 24 * 60 * 60 * 1000;

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const DATE_PARTS = /^(\d{4})-(\d{2})-(\d{2})/;
const TIME_WITH_OFFSET = /T.*(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;
const HOUR_OFFSET = /([+-]\d{2})$/;
const COMPACT_OFFSET = /([+-]\d{2})(\d{2})$/;

/**
 * Parses an ISO-8601 date or datetime into a UTC instant.
 * Values with an offset (`Z`, `±HH`, `±HHMM`, `±HH:MM`) are converted; values
 * without one are read as UTC. Returns null when the value is not a date,
 * including calendar dates that do not exist such as `2024-02-30`.
 */
export function parseUtcTimestamp(value: string): Date | null {
	let text = value.trim().replace(" ", "T");
	const parts = DATE_PARTS.exec(text);
	if (!parts || !isCalendarDate(parts)) return null;

	if (DATE_ONLY.test(text)) {
		text = `${text}T00:00:00Z`;
	} else if (TIME_WITH_OFFSET.test(text)) {
		text = text.replace(COMPACT_OFFSET, "$1:$2").replace(HOUR_OFFSET, "$1:00");
	} else {
		text = `${text}Z`;
	}

	const date = new Date(text);
	return Number.isNaN(date.getTime()) ? null : date;
}

function isCalendarDate(parts: RegExpExecArray): boolean {
	const year = Number(parts[1]);
	const month = Number(parts[2]);
	const day = Number(parts[3]);
	const probe = new Date(Date.UTC(year, month - 1, day));
	return (
		probe.getUTCFullYear() === year &&
		probe.getUTCMonth() === month - 1 &&
		probe.getUTCDate() === day
	);
}

export function subtractDays(from: Date, days: number): Date {
	return new Date(from.getTime() - days * DAY_MS);
}

/** `YYYY-MM-DD HH:MM:SS` in UTC. */
export function formatUtcSeconds(date: Date): string {
	return date.toISOString().slice(0, 19).replace("T", " ");
}
