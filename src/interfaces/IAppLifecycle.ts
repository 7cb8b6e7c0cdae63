/**
 * Application Lifecycle Interface
 * Manages signal handlers, cleanup, and shutdown
 */

export interface IAppLifecycle {
	/**
	 * Setup process signal handlers
	 */
	setupSignalHandlers(): void;

	/**
	 * Clean up and end the process with the given status
	 */
	exit(code: number): void;

	/**
	 * Ctrl+C outside a prompt: say goodbye and exit with status 0
	 */
	interrupt(): void;

	/**
	 * Cleanup resources
	 */
	cleanup(): Promise<void>;
}
