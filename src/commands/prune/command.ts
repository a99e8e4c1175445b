import { buildCommand, numberParser } from "@stricli/core";
import { DEFAULT_BACKUP_FILE } from "../../backup/ledger.js";
import {
	DEFAULT_DELETE_LOG_FILE,
	DEFAULT_PREVIEW_LOG_FILE,
} from "../../backup/post-log.js";
import {
	DEFAULT_DAYS,
	DEFAULT_SERVICE_URL,
	SERVICE_ENV_VAR,
	TOKEN_ENV_VAR,
} from "../../config.js";

export const pruneCommand = buildCommand({
	loader: async () => {
		const { prune } = await import("./impl.js");
		return prune;
	},
	parameters: {
		flags: {
			handle: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Bluesky handle, e.g. yourname.bsky.social (prompted if missing)",
			},
			token: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: `App password; ${TOKEN_ENV_VAR} takes precedence (prompted if neither is set)`,
			},
			service: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: `PDS URL (default: ${SERVICE_ENV_VAR} or ${DEFAULT_SERVICE_URL})`,
			},
			config: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "YAML file with defaults for any of these options",
			},
			days: {
				kind: "parsed",
				parse: numberParser,
				optional: true,
				brief: `Only consider posts older than this many days (default: ${DEFAULT_DAYS})`,
			},
			preview: {
				kind: "boolean",
				optional: true,
				brief: "Only log what would be deleted (default); --no-preview deletes",
			},
			logFile: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: `Log file (default: ${DEFAULT_PREVIEW_LOG_FILE} or ${DEFAULT_DELETE_LOG_FILE})`,
			},
			match: {
				kind: "parsed",
				parse: String,
				variadic: true,
				optional: true,
				brief: "Only posts containing this text, or matching it with --regex (repeatable)",
			},
			regex: {
				kind: "boolean",
				optional: true,
				brief: "Read --match patterns as case-insensitive regular expressions",
			},
			after: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Only posts at or after this date (YYYY-MM-DD or ISO-8601)",
			},
			before: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Only posts at or before this date (YYYY-MM-DD or ISO-8601)",
			},
			backupFile: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: `JSONL backup of deleted posts (default: ${DEFAULT_BACKUP_FILE})`,
			},
			includeReplies: {
				kind: "boolean",
				optional: true,
				brief: "Include replies (default: exclude)",
			},
			excludeReplies: {
				kind: "boolean",
				optional: true,
				brief: "Exclude replies (the default)",
			},
			includeReposts: {
				kind: "boolean",
				optional: true,
				brief: "Include reposts (default: exclude)",
			},
			excludeReposts: {
				kind: "boolean",
				optional: true,
				brief: "Exclude reposts (the default)",
			},
			verbose: {
				kind: "boolean",
				default: false,
				brief: "Debug logging",
			},
			quiet: {
				kind: "boolean",
				default: false,
				brief: "Only log errors; page progress is hidden",
			},
		},
		aliases: {
			u: "handle",
			p: "token",
			d: "days",
			l: "logFile",
			m: "match",
		},
	},
	docs: {
		brief: "Back up and delete (or preview) posts older than N days",
		fullDescription: `Reads your whole author feed, selects posts older than --days that pass the date, type and text filters, and writes each one to the log file. With --no-preview every selected post is appended to the backup file and then deleted. Exits with 1 when any delete failed.\n\nFor automation, pass the app password through ${TOKEN_ENV_VAR} rather than --token.`,
	},
});
