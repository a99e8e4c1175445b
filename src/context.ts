import type { CommandContext } from "@stricli/core";

// Commands read env and set exitCode, so they get the full Node process.
export interface LocalContext extends CommandContext {
	readonly process: NodeJS.Process;
}

export function buildContext(process: NodeJS.Process): LocalContext {
	return { process };
}
