import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { z } from "zod";
import { DEFAULT_BACKUP_FILE } from "./backup/ledger.js";
import { defaultLogFile } from "./backup/post-log.js";
import { ConfigError } from "./errors.js";
import { type FilterCriteria, buildFilterCriteria } from "./filter/criteria.js";
import { parseUtcTimestamp } from "./utils/time.js";

export const TOKEN_ENV_VAR = "SKYPRUNE_TOKEN";
export const SERVICE_ENV_VAR = "SKYPRUNE_SERVICE";
export const DEFAULT_DAYS = 30;
export const DEFAULT_SERVICE_URL = "https://bsky.social";

const dateBoundSchema = z.string().transform((value, ctx) => {
	const date = parseUtcTimestamp(value);
	if (!date) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message: `'${value}' is not a date (use YYYY-MM-DD or an ISO-8601 datetime)`,
		});
		return z.NEVER;
	}
	return date;
});

const fileConfigSchema = z
	.object({
		handle: z.string().min(1).optional(),
		service: z.string().url().optional(),
		/** Posts older than this many days qualify */
		days: z.coerce.number().int().nonnegative().optional(),
		match: z.array(z.string()).optional(),
		regex: z.boolean().optional(),
		after: z.string().optional(),
		before: z.string().optional(),
		includeReplies: z.boolean().optional(),
		includeReposts: z.boolean().optional(),
		logFile: z.string().min(1).optional(),
		backupFile: z.string().min(1).optional(),
	})
	.strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

const settingsSchema = z.object({
	service: z.string().url(),
	days: z.number().int().nonnegative(),
	after: dateBoundSchema.optional(),
	before: dateBoundSchema.optional(),
});

export interface PruneFlags {
	config?: string;
	handle?: string;
	token?: string;
	service?: string;
	days?: number;
	preview?: boolean;
	logFile?: string;
	match?: string[];
	regex?: boolean;
	after?: string;
	before?: string;
	backupFile?: string;
	includeReplies?: boolean;
	excludeReplies?: boolean;
	includeReposts?: boolean;
	excludeReposts?: boolean;
	verbose: boolean;
	quiet: boolean;
}

export type PruneSettings = {
	handle?: string;
	service: string;
	daysOld: number;
	preview: boolean;
	logFile: string;
	backupFile: string;
	criteria: FilterCriteria;
};

export async function loadConfig(configPath: string): Promise<FileConfig> {
	let rawText: string;
	try {
		rawText = await readFile(configPath, "utf8");
	} catch (error) {
		throw new ConfigError(`Cannot read config file ${configPath}`, {
			cause: error,
		});
	}

	const clean = rawText.replace(/^\uFEFF/, "");
	const parsed: unknown = parse(clean) ?? {};
	const result = fileConfigSchema.safeParse(parsed);
	if (!result.success) {
		throw new ConfigError(
			`Invalid config file ${configPath}: ${formatIssues(result.error)}`,
		);
	}
	return result.data;
}

/** Flags win over the config file, which wins over built-in defaults. */
export function resolveSettings(args: {
	flags: PruneFlags;
	file?: FileConfig;
	env?: NodeJS.ProcessEnv;
	now?: Date;
}): PruneSettings {
	const { flags, env = {} } = args;
	const file = args.file ?? {};

	const result = settingsSchema.safeParse({
		service:
			flags.service ??
			env[SERVICE_ENV_VAR] ??
			file.service ??
			DEFAULT_SERVICE_URL,
		days: flags.days ?? file.days ?? DEFAULT_DAYS,
		after: flags.after ?? file.after,
		before: flags.before ?? file.before,
	});
	if (!result.success) {
		throw new ConfigError(`Invalid options: ${formatIssues(result.error)}`);
	}

	const { service, days, after, before } = result.data;
	const preview = flags.preview ?? true;
	const criteria = buildFilterCriteria({
		daysOld: days,
		now: args.now,
		after,
		before,
		patterns: flags.match ?? file.match ?? [],
		useRegex: flags.regex ?? file.regex ?? false,
		includeReplies:
			includeFlag("replies", flags.includeReplies, flags.excludeReplies) ??
			file.includeReplies ??
			false,
		includeReposts:
			includeFlag("reposts", flags.includeReposts, flags.excludeReposts) ??
			file.includeReposts ??
			false,
	});

	return {
		handle: flags.handle ?? file.handle,
		service,
		daysOld: days,
		preview,
		logFile: flags.logFile ?? file.logFile ?? defaultLogFile(preview),
		backupFile: flags.backupFile ?? file.backupFile ?? DEFAULT_BACKUP_FILE,
		criteria,
	};
}

/** Folds `--include-<kind>` and its `--exclude-<kind>` spelling into one value. */
function includeFlag(
	kind: string,
	include: boolean | undefined,
	exclude: boolean | undefined,
): boolean | undefined {
	if (include !== undefined && exclude !== undefined && include === exclude) {
		throw new ConfigError(
			`--include-${kind} and --exclude-${kind} contradict each other`,
		);
	}
	return include ?? (exclude === undefined ? undefined : !exclude);
}

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) =>
			issue.path.length > 0
				? `${issue.path.join(".")}: ${issue.message}`
				: issue.message,
		)
		.join("; ");
}
