/**
 * Startup: configuration, service wiring and authentication.
 * Failures here are fatal; everything after runs inside the menu loop.
 */

import { describeRequiredEnv, loadAppConfig } from "./config";
import {
	createServiceContainer,
	registerServices,
	TOKENS,
	type ServiceContainer,
} from "./container";
import type { CommandContext } from "./interfaces";
import { ErrorCategory, type ErrorHandler } from "./services/ErrorHandler";
import type { ITerminal } from "./ui/Terminal";
import { getLogger } from "./utils";

const logger = getLogger("Bootstrap");

export interface BootstrapOptions {
	env: NodeJS.ProcessEnv;
	terminal: ITerminal;
	errors: ErrorHandler;
	/**
	 * Override registrations (tests swap in fakes here)
	 */
	configure?: (container: ServiceContainer) => void;
}

/**
 * Returns the command context, or null after a fatal error has been reported
 */
export async function bootstrap(
	options: BootstrapOptions,
): Promise<CommandContext | null> {
	const { terminal, errors } = options;

	const loaded = loadAppConfig(options.env);
	if (!loaded.ok) {
		if (loaded.reason === "missing") {
			errors.fatal("Error: Spotify credentials not configured!", describeRequiredEnv());
		} else {
			errors.fatal("Error: Spotify configuration is invalid!", [
				...loaded.issues,
				...describeRequiredEnv(),
			]);
		}
		return null;
	}

	const container = createServiceContainer();
	registerServices(container, loaded.config);
	options.configure?.(container);

	try {
		await container.resolve(TOKENS.Auth).ensureAuthenticated();
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		errors.fatal(
			`Error authenticating with Spotify: ${message}`,
			[],
			ErrorCategory.AUTH,
		);
		return null;
	}

	logger.info("Authenticated, starting menu");

	return {
		client: container.resolve(TOKENS.SpotifyApi),
		terminal,
		errors,
	};
}
