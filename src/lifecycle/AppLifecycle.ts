import type { IAppLifecycle } from "../interfaces";
import type { ITerminal } from "../ui/Terminal";
import { getLogger, resetLogWriter } from "../utils";

const logger = getLogger("AppLifecycle");

/**
 * Application Lifecycle Manager
 * Manages signal handlers, cleanup, and shutdown
 */
export class AppLifecycle implements IAppLifecycle {
	private exiting = false;

	constructor(
		private terminal: ITerminal,
		private terminate: (code: number) => void = (code) => process.exit(code),
	) {}

	/**
	 * Ctrl+C at the prompt is handled by the terminal; these cover the rest
	 */
	setupSignalHandlers(): void {
		process.once("SIGTERM", () => this.exit(0));
		process.once("SIGHUP", () => this.exit(0));

		process.once("uncaughtException", (err) => {
			logger.error("Uncaught exception:", err);
			this.exit(1);
		});

		process.once("unhandledRejection", (reason) => {
			logger.error("Unhandled rejection:", reason);
			this.exit(1);
		});
	}

	exit(code: number): void {
		// Prevent double-exit
		if (this.exiting) return;
		this.exiting = true;

		logger.debug(`Exiting with status ${code}`);
		void this.cleanup()
			.catch((error: unknown) => {
				console.error("Cleanup failed:", error);
			})
			.finally(() => this.terminate(code));
	}

	interrupt(): void {
		if (this.exiting) return;
		this.terminal.print("");
		this.terminal.print("Program interrupted. Goodbye!", "title");
		this.exit(0);
	}

	async cleanup(): Promise<void> {
		this.terminal.close();
		await resetLogWriter();
	}
}
