import { describe, expect, it, vi } from "vitest";
import { MemoryTerminal } from "../testing/fakes";
import { ErrorCategory, ErrorHandler } from "./ErrorHandler";

function setup() {
	const terminal = new MemoryTerminal();
	const exit = vi.fn((_code: number) => {});
	return { terminal, exit, errors: new ErrorHandler(terminal, exit) };
}

describe("ErrorHandler", () => {
	it("prints command failures inline and keeps running", () => {
		const { terminal, exit, errors } = setup();

		errors.handleApiFailure({ kind: "http", message: "API error 500: boom", status: 500 }, "search");

		expect(terminal.lines).toEqual([{ text: "Error: API error 500: boom", tone: "error" }]);
		expect(exit).not.toHaveBeenCalled();
	});

	it("normalizes thrown values", () => {
		const { terminal, errors } = setup();

		errors.handleUnexpected("plain string", "menu");

		expect(terminal.output).toEqual(["Error: plain string"]);
	});

	it("runs registered recovery strategies for the category", () => {
		const { errors } = setup();
		const strategy = vi.fn();
		errors.registerRecoveryStrategy(ErrorCategory.VALIDATION, strategy);

		errors.handleApiFailure({ kind: "malformed", message: "bad shape" }, "playlists");

		expect(strategy).toHaveBeenCalledTimes(1);
		expect(strategy.mock.calls[0][1]).toMatchObject({
			category: ErrorCategory.VALIDATION,
			operation: "playlists",
		});
	});

	it("survives a failing recovery strategy", () => {
		const { terminal, errors } = setup();
		errors.registerRecoveryStrategy(ErrorCategory.NETWORK, () => {
			throw new Error("strategy broke");
		});

		errors.handleApiFailure({ kind: "network", message: "offline" }, "next");

		expect(terminal.output).toEqual(["Error: offline"]);
	});

	it("prints the message and guidance then exits with status 1 on fatal errors", () => {
		const { terminal, exit, errors } = setup();

		errors.fatal("Startup failed", ["first hint", "second hint"]);

		expect(terminal.output).toEqual(["Startup failed", "first hint", "second hint"]);
		expect(exit).toHaveBeenCalledWith(1);
	});
});
