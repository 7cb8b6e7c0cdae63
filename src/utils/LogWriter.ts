/**
 * LogWriter - Handles file-based logging with rotation and buffering
 *
 * Features:
 * - Buffered writes (one append per flush interval)
 * - Size-based log rotation
 * - Flush timer never keeps the process alive
 */

import { existsSync, mkdirSync, renameSync, statSync, unlinkSync } from "node:fs";
import { appendFile } from "node:fs/promises";
import { join } from "node:path";
import { getLoggingConfig } from "../config/logging";

export interface LogWriterConfig {
	/** Directory where log files are stored */
	logDir: string;
	/** Log file name */
	filename: string;
	/** Maximum size of a single log file in bytes */
	maxFileSize: number;
	/** Maximum number of rotated log files to keep */
	maxFiles: number;
	/** Interval in milliseconds to flush buffered logs */
	flushInterval: number;
	/** Whether logging is enabled */
	enabled: boolean;
}

function defaultConfig(): LogWriterConfig {
	const logging = getLoggingConfig();
	return {
		logDir: logging.logDir,
		filename: "playdeck.log",
		maxFileSize: logging.maxFileSize,
		maxFiles: logging.maxFiles,
		flushInterval: 1000,
		enabled: logging.fileLogging,
	};
}

export class LogWriter {
	private config: LogWriterConfig;
	private buffer: string[] = [];
	private currentSize = 0;
	private flushTimer: NodeJS.Timeout | null = null;
	private inFlight: Promise<void> | null = null;
	private initialized = false;

	constructor(config: Partial<LogWriterConfig> = {}) {
		this.config = { ...defaultConfig(), ...config };
		this.initialize();
	}

	/**
	 * Create the log directory and start the flush timer
	 */
	private initialize(): void {
		if (!this.config.enabled) {
			return;
		}

		try {
			if (!existsSync(this.config.logDir)) {
				mkdirSync(this.config.logDir, { recursive: true });
			}

			const logFile = this.getLogFilePath();
			if (existsSync(logFile)) {
				this.currentSize = statSync(logFile).size;
			}

			this.flushTimer = setInterval(() => {
				this.flush().catch((err: unknown) => {
					console.error("Log flush error:", err);
				});
			}, this.config.flushInterval);
			this.flushTimer.unref();

			this.initialized = true;
		} catch (error) {
			// File logging is optional; keep running without it
			console.error("Failed to initialize LogWriter:", error);
			this.config.enabled = false;
		}
	}

	getLogFilePath(): string {
		return join(this.config.logDir, this.config.filename);
	}

	private getRotatedLogFilePath(index: number): string {
		return join(this.config.logDir, `${this.config.filename}.${index}`);
	}

	/**
	 * Write a log line (adds to buffer)
	 */
	write(message: string): void {
		if (!this.config.enabled || !this.initialized) {
			return;
		}

		this.buffer.push(message.endsWith("\n") ? message : `${message}\n`);

		if (this.buffer.length > 100) {
			this.flush().catch((err: unknown) => {
				console.error("Log flush error:", err);
			});
		}
	}

	/**
	 * Flush buffered logs to disk
	 */
	async flush(): Promise<void> {
		// a write already on its way has taken its lines out of the buffer
		while (this.inFlight) {
			await this.inFlight;
		}

		if (!this.config.enabled || this.buffer.length === 0) {
			return;
		}

		this.inFlight = this.writeBuffer();
		try {
			await this.inFlight;
		} finally {
			this.inFlight = null;
		}
	}

	private async writeBuffer(): Promise<void> {
		const content = this.buffer.join("");
		this.buffer = [];

		try {
			await appendFile(this.getLogFilePath(), content, "utf-8");
			this.currentSize += Buffer.byteLength(content, "utf-8");

			if (this.currentSize >= this.config.maxFileSize) {
				this.rotate();
			}
		} catch (error) {
			console.error("Log flush failed:", error);
		}
	}

	/**
	 * Shift playdeck.log -> .1 -> .2 ..., dropping the oldest
	 */
	private rotate(): void {
		try {
			const oldest = this.getRotatedLogFilePath(this.config.maxFiles);
			if (existsSync(oldest)) {
				unlinkSync(oldest);
			}

			for (let i = this.config.maxFiles - 1; i > 0; i--) {
				const current = this.getRotatedLogFilePath(i);
				if (existsSync(current)) {
					renameSync(current, this.getRotatedLogFilePath(i + 1));
				}
			}

			const logFile = this.getLogFilePath();
			if (existsSync(logFile)) {
				renameSync(logFile, this.getRotatedLogFilePath(1));
			}

			this.currentSize = 0;
		} catch (error) {
			console.error("Log rotation failed:", error);
		}
	}

	/**
	 * Stop the flush timer and write what is left
	 */
	async shutdown(): Promise<void> {
		if (this.flushTimer) {
			clearInterval(this.flushTimer);
			this.flushTimer = null;
		}

		await this.flush();
	}

	getBufferSize(): number {
		return this.buffer.length;
	}

	getCurrentFileSize(): number {
		return this.currentSize;
	}
}

let instance: LogWriter | null = null;

export function getLogWriter(config?: Partial<LogWriterConfig>): LogWriter {
	if (!instance) {
		instance = new LogWriter(config);
	}
	return instance;
}

/**
 * Flush and drop the singleton
 */
export async function resetLogWriter(): Promise<void> {
	if (instance) {
		const current = instance;
		instance = null;
		await current.shutdown();
	}
}
