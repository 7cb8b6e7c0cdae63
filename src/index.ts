// Load .env before any module reads the environment
import "dotenv/config";
import { MenuApp } from "./app";
import { bootstrap } from "./bootstrap";
import { APP_NAME } from "./config";
import { AppLifecycle } from "./lifecycle/AppLifecycle";
import { ErrorHandler } from "./services/ErrorHandler";
import { ConsoleTerminal } from "./ui/Terminal";
import { getLogger } from "./utils";

const logger = getLogger("Main");

/**
 * Main entry point
 */
async function main(): Promise<void> {
	// Ctrl+C while no prompt waits (sign-in, network calls) exits with status 0
	const terminal = new ConsoleTerminal({ onInterrupt: () => lifecycle.interrupt() });
	const lifecycle = new AppLifecycle(terminal);
	lifecycle.setupSignalHandlers();

	const errors = new ErrorHandler(terminal, (code) => lifecycle.exit(code));

	terminal.print(`Starting ${APP_NAME}...`, "title");

	try {
		const ctx = await bootstrap({ env: process.env, terminal, errors });
		if (!ctx) {
			// fatal error already reported, exit in progress
			return;
		}

		const ending = await new MenuApp(ctx).run();
		logger.info(`Menu closed (${ending})`);
		lifecycle.exit(0);
	} catch (error) {
		logger.error("Fatal error in main:", error);
		terminal.print(
			`Unexpected error: ${error instanceof Error ? error.message : String(error)}`,
			"error",
		);
		lifecycle.exit(1);
	}
}

main().catch((error: unknown) => {
	console.error(error);
	process.exit(1);
});
