import { cancel, isCancel, password, text } from "@clack/prompts";
import type { Logger } from "pino";
import { TOKEN_ENV_VAR } from "../../config.js";
import { ConfigError } from "../../errors.js";

export interface Prompter {
	text(message: string): Promise<string>;
	password(message: string): Promise<string>;
}

function required(value: string | undefined): string | undefined {
	return value?.trim() ? undefined : "A value is required";
}

export const clackPrompter: Prompter = {
	async text(message) {
		const value = await text({ message, validate: required });
		if (isCancel(value)) {
			cancel("Cancelled");
			throw new ConfigError("Cancelled at the handle prompt");
		}
		return value.trim();
	},
	async password(message) {
		const value = await password({ message, validate: required });
		if (isCancel(value)) {
			cancel("Cancelled");
			throw new ConfigError("Cancelled at the password prompt");
		}
		return value.trim();
	},
};

export type Credentials = {
	handle: string;
	password: string;
};

/**
 * Handle: flag or config file, else prompt.
 * Password: environment variable, else --token, else prompt.
 */
export async function resolveCredentials(args: {
	handle?: string;
	token?: string;
	env: NodeJS.ProcessEnv;
	prompter: Prompter;
	log: Logger;
}): Promise<Credentials> {
	const { env, prompter, log } = args;
	const envToken = env[TOKEN_ENV_VAR]?.trim() || undefined;

	if (args.token && !envToken) {
		log.warn(
			`SECURITY: passing the app password via --token exposes it in your process list. For automation, set the ${TOKEN_ENV_VAR} environment variable instead.`,
		);
	}

	const handle = args.handle?.trim() || (await prompter.text("Bluesky handle"));
	const secret =
		envToken ||
		args.token?.trim() ||
		(await prompter.password("App password"));

	return { handle, password: secret };
}
