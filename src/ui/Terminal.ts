/**
 * Line-based console surface used by the menu and the command handlers
 */

import { createInterface, type Interface } from "node:readline";
import { sleep } from "../utils";

/**
 * Visual tone of a printed line; how (or whether) it is coloured is up to the terminal
 */
export type Tone =
	| "plain"
	| "title"
	| "label"
	| "success"
	| "warning"
	| "error"
	| "dim";

export interface ITerminal {
	print(text: string, tone?: Tone): void;
	/**
	 * Ask for one line of input.
	 * Rejects with InterruptedError on Ctrl+C or when input ends.
	 */
	prompt(question: string): Promise<string>;
	/**
	 * Fixed post-action delay
	 */
	pause(ms: number): Promise<void>;
	clear(): void;
	close(): void;
}

export class InterruptedError extends Error {
	constructor() {
		super("Interrupted");
		this.name = "InterruptedError";
	}
}

/**
 * ANSI escape sequences
 */
const ANSI = {
	reset: "\x1b[0m",
	bold: "\x1b[1m",
	dim: "\x1b[2m",
	red: "\x1b[31m",
	green: "\x1b[32m",
	yellow: "\x1b[33m",
	cyan: "\x1b[36m",
	clearScreen: "\x1b[2J\x1b[H",
} as const;

const TONE_CODES: Record<Tone, string> = {
	plain: "",
	title: ANSI.bold + ANSI.green,
	label: ANSI.cyan,
	success: ANSI.green,
	warning: ANSI.yellow,
	error: ANSI.bold + ANSI.red,
	dim: ANSI.dim,
};

export interface ConsoleTerminalOptions {
	input?: NodeJS.ReadableStream;
	output?: NodeJS.WritableStream & { isTTY?: boolean };
	colors?: boolean;
	/**
	 * Called on Ctrl+C while no prompt is waiting (startup, network calls, pauses)
	 */
	onInterrupt?: () => void;
}

interface PendingPrompt {
	resolve(line: string): void;
	reject(error: Error): void;
}

/**
 * readline-backed terminal on stdin/stdout.
 * Lines that arrive while no prompt is waiting are queued, so typed-ahead
 * and piped input reach the next prompt in order.
 */
export class ConsoleTerminal implements ITerminal {
	private rl: Interface;
	private output: NodeJS.WritableStream & { isTTY?: boolean };
	private colors: boolean;
	private onInterrupt: (() => void) | null;
	private queued: string[] = [];
	private pending: PendingPrompt | null = null;
	private interrupted = false;
	private closed = false;

	constructor(options: ConsoleTerminalOptions = {}) {
		this.output = options.output ?? process.stdout;
		this.colors =
			options.colors ?? (Boolean(this.output.isTTY) && !process.env.NO_COLOR);
		this.onInterrupt = options.onInterrupt ?? null;
		this.rl = createInterface({
			input: options.input ?? process.stdin,
			output: this.output,
		});

		this.rl.on("line", (line: string) => this.receive(line));
		this.rl.on("SIGINT", () => this.interrupt());
		this.rl.on("close", () => {
			this.closed = true;
			this.rejectPending();
		});
	}

	private receive(line: string): void {
		const pending = this.pending;
		if (pending) {
			this.pending = null;
			pending.resolve(line);
		} else {
			this.queued.push(line);
		}
	}

	private rejectPending(): void {
		const pending = this.pending;
		if (pending) {
			this.pending = null;
			pending.reject(new InterruptedError());
		}
	}

	/**
	 * Ctrl+C: a waiting prompt rejects, otherwise the interrupt hook runs
	 */
	interrupt(): void {
		this.interrupted = true;
		if (this.pending) {
			this.rejectPending();
		} else {
			this.onInterrupt?.();
		}
	}

	isInterrupted(): boolean {
		return this.interrupted;
	}

	private paint(text: string, tone: Tone): string {
		const code = TONE_CODES[tone];
		return this.colors && code ? `${code}${text}${ANSI.reset}` : text;
	}

	print(text: string, tone: Tone = "plain"): void {
		this.output.write(`${this.paint(text, tone)}\n`);
	}

	prompt(question: string): Promise<string> {
		if (this.interrupted) {
			return Promise.reject(new InterruptedError());
		}

		const ahead = this.queued.shift();
		if (ahead !== undefined) {
			this.output.write(`${this.paint(question, "label")}\n`);
			return Promise.resolve(ahead);
		}

		if (this.closed) {
			return Promise.reject(new InterruptedError());
		}

		this.rl.setPrompt(this.paint(question, "label"));
		this.rl.prompt();
		return new Promise((resolve, reject) => {
			this.pending = { resolve, reject };
		});
	}

	pause(ms: number): Promise<void> {
		return sleep(ms);
	}

	clear(): void {
		if (this.output.isTTY) {
			this.output.write(ANSI.clearScreen);
		}
	}

	close(): void {
		this.rl.close();
	}
}
