import { homedir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { getLoggingConfig, LogLevel, parseLogLevel } from "./logging";

describe("parseLogLevel", () => {
	it("accepts level names in any case", () => {
		expect(parseLogLevel("debug")).toBe(LogLevel.DEBUG);
		expect(parseLogLevel("WARN")).toBe(LogLevel.WARN);
		expect(parseLogLevel("None")).toBe(LogLevel.NONE);
	});

	it("falls back to INFO", () => {
		expect(parseLogLevel(undefined)).toBe(LogLevel.INFO);
		expect(parseLogLevel("verbose")).toBe(LogLevel.INFO);
	});
});

describe("getLoggingConfig", () => {
	it("logs to file only by default", () => {
		expect(getLoggingConfig({})).toEqual({
			level: LogLevel.INFO,
			fileLogging: true,
			consoleLogging: false,
			maxFileSize: 5 * 1024 * 1024,
			maxFiles: 5,
			logDir: join(homedir(), ".playdeck", "logs"),
		});
	});

	it("reads overrides from the environment", () => {
		const config = getLoggingConfig({
			PLAYDECK_LOG_LEVEL: "error",
			PLAYDECK_LOG_FILE: "false",
			PLAYDECK_LOG_CONSOLE: "true",
			PLAYDECK_LOG_DIR: "/tmp/playdeck-test-logs",
		});

		expect(config.level).toBe(LogLevel.ERROR);
		expect(config.fileLogging).toBe(false);
		expect(config.consoleLogging).toBe(true);
		expect(config.logDir).toBe("/tmp/playdeck-test-logs");
	});
});
