#!/usr/bin/env node
import { buildApplication, buildRouteMap, run } from "@stricli/core";
import { backupCommand } from "./commands/backup/command.js";
import { pruneCommand } from "./commands/prune/command.js";
import { buildContext } from "./context.js";

const routes = buildRouteMap({
	routes: {
		prune: pruneCommand,
		backup: backupCommand,
	},
	defaultCommand: "prune",
	docs: {
		brief: "Delete or preview Bluesky posts older than N days, backing each one up first.",
	},
});

export const app = buildApplication(routes, {
	name: "skyprune",
	versionInfo: {
		currentVersion: "0.1.0",
	},
	scanner: {
		caseStyle: "allow-kebab-for-camel",
	},
});

await run(app, process.argv.slice(2), buildContext(process));
