import pc from "picocolors";
import pino, { type LevelWithSilent, type Logger } from "pino";
import { prettyFactory } from "pino-pretty";
import { z } from "zod";

export type LogSink = {
	log(msg: string): void;
};

const levelSchema = z.enum([
	"trace",
	"debug",
	"info",
	"warn",
	"error",
	"fatal",
	"silent",
]);

/** --quiet beats --verbose; without either, LOG_LEVEL or info. */
export function resolveLogLevel(args: {
	quiet?: boolean;
	verbose?: boolean;
	envLevel?: string;
}): LevelWithSilent {
	if (args.quiet) return "error";
	if (args.verbose) return "debug";
	const fromEnv = levelSchema.safeParse(args.envLevel?.toLowerCase());
	return fromEnv.success ? fromEnv.data : "info";
}

const stdoutSink: LogSink = {
	log(msg) {
		process.stdout.write(msg);
	},
};

/**
 * One logger per run. Lines are prettified in-process and handed to `sink`,
 * which lets the status bar redraw itself below them.
 */
export function createLogger(args: {
	level: LevelWithSilent;
	sink?: LogSink;
}): Logger {
	const sink = args.sink ?? stdoutSink;
	const pretty = prettyFactory({
		colorize: pc.isColorSupported,
		translateTime: "HH:MM:ss",
		ignore: "pid,hostname",
		messageFormat: "{msg}",
		singleLine: true,
	});

	return pino(
		{ level: args.level },
		{
			write(line: string) {
				sink.log(pretty(line));
			},
		},
	);
}
