import { buildCommand } from "@stricli/core";
import { DEFAULT_BACKUP_FILE } from "../../backup/ledger.js";

export const backupCommand = buildCommand({
	loader: async () => {
		const { inspectBackup } = await import("./impl.js");
		return inspectBackup;
	},
	parameters: {
		flags: {
			backupFile: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: `Backup file to read (default: ${DEFAULT_BACKUP_FILE})`,
			},
		},
	},
	docs: {
		brief: "List the posts recorded in a backup file",
	},
});
