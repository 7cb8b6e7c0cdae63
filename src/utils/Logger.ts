/**
 * Logger Service
 * Centralized logging with levels, timestamps, contexts, and file persistence
 */

import { getLogWriter, type LogWriter } from "./LogWriter";
import { getLoggingConfig, LogLevel } from "../config/logging";

export { LogLevel } from "../config/logging";

export interface LoggerConfig {
	level: LogLevel;
	enableTimestamps: boolean;
	enableColors: boolean;
	enableFileLogging: boolean;
	enableConsoleLogging: boolean;
}

function defaultConfig(): LoggerConfig {
	const loggingConfig = getLoggingConfig();
	return {
		level: loggingConfig.level,
		enableTimestamps: true,
		enableColors: true,
		enableFileLogging: loggingConfig.fileLogging,
		enableConsoleLogging: loggingConfig.consoleLogging,
	};
}

/**
 * ANSI color codes for terminal output
 */
const colors = {
	reset: "\x1b[0m",
	dim: "\x1b[2m",
	red: "\x1b[31m",
	yellow: "\x1b[33m",
	blue: "\x1b[34m",
	cyan: "\x1b[36m",
	gray: "\x1b[90m",
};

/**
 * Logger class with support for different log levels and contexts
 */
export class Logger {
	private config: LoggerConfig;
	private context: string;
	private logWriter: LogWriter | null = null;

	constructor(context: string = "App", config: Partial<LoggerConfig> = {}) {
		this.context = context;
		this.config = { ...defaultConfig(), ...config };

		if (this.config.enableFileLogging) {
			this.logWriter = getLogWriter();
		}
	}

	/**
	 * Create a child logger with a different context
	 */
	child(context: string): Logger {
		return new Logger(context, this.config);
	}

	/**
	 * Format log message with timestamp and context (with colors for console)
	 */
	private format(
		level: string,
		message: string,
		color: string,
		data?: unknown,
	): string {
		const paint = (text: string, code: string) =>
			this.config.enableColors ? `${code}${text}${colors.reset}` : text;
		const parts: string[] = [];

		if (this.config.enableTimestamps) {
			const timestamp = new Date().toISOString().slice(11, 23);
			parts.push(paint(`[${timestamp}]`, colors.gray));
		}

		parts.push(paint(level.padEnd(5), color));
		parts.push(paint(`[${this.context}]`, colors.cyan));
		parts.push(message);

		if (data !== undefined) {
			const dataStr =
				typeof data === "object" ? JSON.stringify(data, null, 2) : String(data);
			parts.push(`\n${paint(dataStr, colors.dim)}`);
		}

		return parts.join(" ");
	}

	/**
	 * Format log message without colors for file logging
	 */
	private formatPlain(level: string, message: string, data?: unknown): string {
		const parts = [
			new Date().toISOString(),
			`[${level}]`,
			`[${this.context}]`,
			message,
		];

		if (data !== undefined) {
			parts.push(typeof data === "object" ? JSON.stringify(data) : String(data));
		}

		return parts.join(" ");
	}

	private log(
		level: LogLevel,
		levelStr: string,
		color: string,
		message: string,
		data?: unknown,
	): void {
		if (this.config.level > level) return;

		if (this.config.enableConsoleLogging) {
			const consoleMethod =
				level === LogLevel.ERROR
					? console.error
					: level === LogLevel.WARN
						? console.warn
						: console.log;
			consoleMethod(this.format(levelStr, message, color, data));
		}

		if (this.config.enableFileLogging && this.logWriter) {
			this.logWriter.write(this.formatPlain(levelStr, message, data));
		}
	}

	debug(message: string, data?: unknown): void {
		this.log(LogLevel.DEBUG, "DEBUG", colors.gray, message, data);
	}

	info(message: string, data?: unknown): void {
		this.log(LogLevel.INFO, "INFO", colors.blue, message, data);
	}

	warn(message: string, data?: unknown): void {
		this.log(LogLevel.WARN, "WARN", colors.yellow, message, data);
	}

	/**
	 * Error log; Error instances are expanded to name, message and stack
	 */
	error(message: string, error?: unknown): void {
		const errorData =
			error instanceof Error
				? { name: error.name, message: error.message, stack: error.stack }
				: error;

		this.log(LogLevel.ERROR, "ERROR", colors.red, message, errorData);
	}
}

let globalLogger: Logger | null = null;

/**
 * Get the global logger, or a child of it for the given context
 */
export function getLogger(context?: string): Logger {
	if (!globalLogger) {
		globalLogger = new Logger("App");
	}
	return context ? globalLogger.child(context) : globalLogger;
}
