import type { Logger } from "pino";
import pc from "picocolors";
import { type PruneFlags, loadConfig, resolveSettings } from "../../config.js";
import type { LocalContext } from "../../context.js";
import { type Session, login } from "../../feed/agent.js";
import { formatSummary } from "../../pipeline/report.js";
import { runPrune } from "../../pipeline/run.js";
import { createLogger, resolveLogLevel } from "../../ui/logger.js";
import { StatusBar, type StatusOutput } from "../../ui/status-bar.js";
import { DEFAULT_RETRY_POLICY, type Sleep } from "../../utils/retry.js";
import { type Prompter, clackPrompter, resolveCredentials } from "./credentials.js";

export type PruneDeps = {
	env: NodeJS.ProcessEnv;
	stdout: StatusOutput;
	prompter: Prompter;
	login: (args: {
		serviceUrl: string;
		identifier: string;
		password: string;
	}) => Promise<Session>;
	isRoot?: boolean;
	log?: Logger;
	now?: Date;
	sleep?: Sleep;
};

/**
 * Resolves settings and credentials, logs in, runs the pipeline and prints
 * the summary. Resolves to the exit code: 1 when any delete failed.
 * Configuration, login and pagination failures reject.
 */
export async function executePrune(
	flags: PruneFlags,
	deps: PruneDeps,
): Promise<number> {
	const file = flags.config ? await loadConfig(flags.config) : undefined;
	const settings = resolveSettings({ flags, file, env: deps.env, now: deps.now });

	const statusBar = new StatusBar({ out: deps.stdout, showPages: !flags.quiet });
	const log =
		deps.log ??
		createLogger({
			level: resolveLogLevel({
				quiet: flags.quiet,
				verbose: flags.verbose,
				envLevel: deps.env.LOG_LEVEL,
			}),
			sink: statusBar,
		});

	if (deps.isRoot) {
		log.warn("It is not recommended to run this tool as root");
	}

	const credentials = await resolveCredentials({
		handle: settings.handle,
		token: flags.token,
		env: deps.env,
		prompter: deps.prompter,
		log,
	});
	const session = await deps.login({
		serviceUrl: settings.service,
		identifier: credentials.handle,
		password: credentials.password,
	});
	log.debug(`Logged in as ${pc.cyan(session.handle)} (${session.repo})`);

	log.info(
		`${settings.preview ? "Previewing" : "Deleting"} posts older than ${settings.daysOld} days`,
	);

	statusBar.start();
	let result: Awaited<ReturnType<typeof runPrune>>;
	try {
		result = await runPrune(
			{
				actor: session.repo,
				repo: session.repo,
				criteria: settings.criteria,
				preview: settings.preview,
				logFile: settings.logFile,
				backupFile: settings.backupFile,
				retry: DEFAULT_RETRY_POLICY,
			},
			{ service: session.service, log, progress: statusBar, sleep: deps.sleep },
		);
	} finally {
		statusBar.stop();
	}

	const summary = formatSummary(result, {
		preview: settings.preview,
		logFile: settings.logFile,
	});
	deps.stdout.write(`${summary.join("\n")}\n`);

	return result.failed > 0 ? 1 : 0;
}

export async function prune(this: LocalContext, flags: PruneFlags): Promise<void> {
	const { process } = this;
	const code = await executePrune(flags, {
		env: process.env,
		stdout: process.stdout,
		prompter: clackPrompter,
		login,
		isRoot: process.getuid?.() === 0,
	});
	if (code !== 0) {
		process.exitCode = code;
	}
}
