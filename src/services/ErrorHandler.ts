import type { ApiFailure, ApiFailureKind } from "../types";
import type { ITerminal } from "../ui/Terminal";
import { getLogger } from "../utils";

const logger = getLogger("ErrorHandler");

/**
 * Error severity levels
 */
export enum ErrorSeverity {
	/** Error - command failed, menu continues */
	ERROR = "error",
	/** Fatal - app must exit */
	FATAL = "fatal",
}

/**
 * Error categories for classification
 */
export enum ErrorCategory {
	/** Authentication errors (token expired, revoked, etc.) */
	AUTH = "auth",
	/** Network/API errors */
	NETWORK = "network",
	/** Response or configuration did not have the expected shape */
	VALIDATION = "validation",
	/** Startup configuration errors */
	CONFIG = "config",
	/** Unknown errors */
	UNKNOWN = "unknown",
}

/**
 * Error context for additional information
 */
export interface ErrorContext {
	category: ErrorCategory;
	severity: ErrorSeverity;
	operation?: string; // What was being attempted
	metadata?: Record<string, unknown>; // Additional context
	recoverable?: boolean; // Can the error be recovered from?
}

/**
 * Recovery strategy function
 */
type RecoveryStrategy = (error: Error, context: ErrorContext) => void;

const CATEGORY_BY_FAILURE: Record<ApiFailureKind, ErrorCategory> = {
	auth: ErrorCategory.AUTH,
	network: ErrorCategory.NETWORK,
	http: ErrorCategory.NETWORK,
	"rate-limited": ErrorCategory.NETWORK,
	malformed: ErrorCategory.VALIDATION,
};

/**
 * Centralized Error Handler
 * Logs every failure and reports it inline on the terminal; fatal errors end the process
 */
export class ErrorHandler {
	private recoveryStrategies: Map<ErrorCategory, RecoveryStrategy[]> =
		new Map();

	constructor(
		private terminal: ITerminal,
		private exit: (code: number) => void = (code) => process.exit(code),
	) {
		this.initializeDefaultStrategies();
	}

	private initializeDefaultStrategies(): void {
		// A rejected token will not fix itself within this session
		this.registerRecoveryStrategy(ErrorCategory.AUTH, (error) => {
			logger.warn("Auth error detected:", error.message);
			this.terminal.print(
				"Spotify rejected the session. Restart the player to sign in again.",
				"warning",
			);
		});
	}

	registerRecoveryStrategy(
		category: ErrorCategory,
		strategy: RecoveryStrategy,
	): void {
		const strategies = this.recoveryStrategies.get(category) ?? [];
		strategies.push(strategy);
		this.recoveryStrategies.set(category, strategies);
	}

	/**
	 * Log a command failure, print it inline and run recovery strategies
	 */
	handle(error: unknown, context: ErrorContext): void {
		const err = this.normalizeError(error);

		this.logError(err, context);
		this.terminal.print(`Error: ${err.message}`, "error");

		if (context.recoverable !== false) {
			this.executeRecoveryStrategies(err, context);
		}
	}

	/**
	 * Report a failed remote operation inside a command handler
	 */
	handleApiFailure(failure: ApiFailure, operation: string): void {
		this.handle(new Error(failure.message), {
			category: CATEGORY_BY_FAILURE[failure.kind],
			severity: ErrorSeverity.ERROR,
			operation,
			metadata: { kind: failure.kind, status: failure.status },
			recoverable: true,
		});
	}

	/**
	 * Report an exception that escaped a command handler; the menu keeps running
	 */
	handleUnexpected(error: unknown, operation: string): void {
		this.handle(error, {
			category: ErrorCategory.UNKNOWN,
			severity: ErrorSeverity.ERROR,
			operation,
			recoverable: true,
		});
	}

	/**
	 * Print the guidance lines and end the process with status 1
	 */
	fatal(message: string, guidance: string[] = [], category = ErrorCategory.CONFIG): void {
		this.logError(new Error(message), {
			category,
			severity: ErrorSeverity.FATAL,
			operation: "startup",
		});
		this.terminal.print(message, "error");
		for (const line of guidance) {
			this.terminal.print(line);
		}
		this.exit(1);
	}

	private normalizeError(error: unknown): Error {
		if (error instanceof Error) {
			return error;
		}
		return new Error(String(error));
	}

	private logError(error: Error, context: ErrorContext): void {
		const logMessage = `[${context.category}] ${context.operation || "Unknown operation"}: ${error.message}`;

		switch (context.severity) {
			case ErrorSeverity.ERROR:
				logger.error(logMessage, context.metadata);
				break;
			case ErrorSeverity.FATAL:
				logger.error(`FATAL: ${logMessage}`, context.metadata);
				break;
		}
	}

	private executeRecoveryStrategies(error: Error, context: ErrorContext): void {
		for (const strategy of this.recoveryStrategies.get(context.category) ?? []) {
			try {
				strategy(error, context);
			} catch (recoveryError) {
				logger.error("Recovery strategy failed:", recoveryError);
			}
		}
	}
}
