import { type FileHandle, mkdir, open } from "node:fs/promises";
import path from "node:path";

/**
 * Append-only text file opened on first write. Each `append` resolves only
 * after the data has been handed to the OS, and with `sync` after it has
 * been flushed to disk.
 */
export class AppendOnlyFile {
	readonly filePath: string;
	private readonly sync: boolean;
	private handle: FileHandle | undefined;
	private closed = false;

	constructor(filePath: string, options?: { sync?: boolean }) {
		this.filePath = filePath;
		this.sync = options?.sync ?? false;
	}

	async append(text: string): Promise<void> {
		const handle = await this.ensureOpen();
		await handle.appendFile(text, "utf8");
		if (this.sync) {
			await handle.datasync();
		}
	}

	async close(): Promise<void> {
		this.closed = true;
		const handle = this.handle;
		this.handle = undefined;
		await handle?.close();
	}

	private async ensureOpen(): Promise<FileHandle> {
		if (this.closed) {
			throw new Error(`${this.filePath} is already closed`);
		}
		if (!this.handle) {
			await mkdir(path.dirname(path.resolve(this.filePath)), {
				recursive: true,
			});
			this.handle = await open(this.filePath, "a");
		}
		return this.handle;
	}
}
