import pc from "picocolors";
import type { PostAction, RunProgress } from "../pipeline/run.js";

export type StatusOutput = {
	write(chunk: string): unknown;
	columns?: number;
	isTTY?: boolean;
};

export class StatusBar implements RunProgress {
	// Line 1: pages fetched (until post processing starts)
	private pages = 0;
	private fetching = false;

	// Line 2: post processing progress
	private postAction: PostAction | undefined;
	private postsDone = 0;
	private postsTotal = 0;

	// Internals
	private frame = 0;
	private timer: ReturnType<typeof setInterval> | undefined;
	private spinners = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
	private isRunning = false;
	private lastRenderLines = 0;
	private readonly out: StatusOutput;
	private readonly showPages: boolean;

	constructor(options?: { out?: StatusOutput; showPages?: boolean }) {
		this.out = options?.out ?? process.stdout;
		this.showPages = options?.showPages ?? true;
	}

	start() {
		if (this.isRunning || !this.out.isTTY) return;
		this.isRunning = true;
		this.timer = setInterval(() => {
			this.render();
		}, 80);
	}

	stop() {
		if (this.timer) {
			clearInterval(this.timer);
			this.timer = undefined;
		}
		if (this.isRunning) {
			this.isRunning = false;
			this.clearRenderedBlock();
		}
	}

	pageFetched(pages: number) {
		this.pages = pages;
		this.fetching = true;
		this.render();
	}

	startPosts(total: number, action: PostAction) {
		this.fetching = false;
		this.postAction = action;
		this.postsTotal = total;
		this.postsDone = 0;
		this.render();
	}

	postProcessed(done: number) {
		this.postsDone = done;
		this.render();
	}

	log(msg: string) {
		this.clearRenderedBlock();
		this.out.write(msg);
		if (!msg.endsWith("\n")) {
			this.out.write("\n");
		}
		this.render();
	}

	private clearRenderedBlock() {
		if (!this.isRunning) return;
		if (this.lastRenderLines > 1) {
			this.out.write(`\x1b[${this.lastRenderLines - 1}A`);
		}
		this.out.write("\r\x1b[J");
		this.lastRenderLines = 0;
	}

	private render() {
		if (!this.isRunning) return;

		this.frame++;
		const spinner = pc.cyan(this.spinners[this.frame % this.spinners.length]);
		const cols = this.out.columns || 80;
		const lines: string[] = [];

		if (this.fetching && this.showPages) {
			const counts = `${pc.dim("(")}${pc.green(String(this.pages))} ${pc.dim(this.pages === 1 ? "page" : "pages")}${pc.dim(")")}`;
			lines.push(
				this.truncateToCols(`${spinner} ${pc.cyan("fetching")} ${counts}`, cols),
			);
		}

		if (this.postAction) {
			const counts = `${pc.dim("(")}${pc.green(String(this.postsDone))}${pc.dim("/")}${pc.dim(String(this.postsTotal))} ${pc.dim("posts")}${pc.dim(")")}`;
			lines.push(
				this.truncateToCols(
					`${spinner} ${pc.yellow(this.postAction)} ${counts}`,
					cols,
				),
			);
		}

		this.clearRenderedBlock();
		if (lines.length === 0) return;
		this.out.write(lines.join("\n"));
		this.lastRenderLines = lines.length;
	}

	private truncateToCols(str: string, cols: number): string {
		const visible = this.stripAnsi(str);
		if (visible.length <= cols) return str;
		return str.slice(0, Math.max(0, cols - 1));
	}

	private stripAnsi(str: string): string {
		return str.replace(
			// biome-ignore lint/suspicious/noControlCharactersInRegex: ANSI escape codes
			/[\u001b\u009b][[()#;?]*(?:[0-9]{1,4}(?:;[0-9]{0,4})*)?[0-9A-ORZcf-nqry=><]/g,
			"",
		);
	}
}
