import { describe, expect, it, vi } from "vitest";
import { MenuApp } from "./app";
import { buildCommands, type CommandCallbacks } from "./commands/buildCommands";
import { SHORT_PAUSE_MS } from "./config/constants";
import { createTestContext } from "./testing/fakes";

const MENU = [
	"===== Spotify CLI Player =====",
	"1. Play/Pause",
	"2. Next Track",
	"3. Previous Track",
	"4. Search Track",
	"5. My Playlists",
	"6. Current Track Info",
	"7. Adjust Volume",
	"0. Exit",
];

function stubCallbacks(): CommandCallbacks {
	return {
		togglePlayback: vi.fn(async () => {}),
		nextTrack: vi.fn(async () => {}),
		previousTrack: vi.fn(async () => {}),
		searchTrack: vi.fn(async () => {}),
		listPlaylists: vi.fn(async () => {}),
		showCurrentTrack: vi.fn(async () => {}),
		adjustVolume: vi.fn(async () => {}),
	};
}

describe("MenuApp", () => {
	it("exits on 0", async () => {
		const { ctx, terminal } = createTestContext({ answers: ["0"] });

		const ending = await new MenuApp(ctx).run();

		expect(ending).toBe("exit");
		expect(terminal.output).toEqual([...MENU, "Exiting Spotify CLI Player. Goodbye!"]);
		expect(terminal.questions).toEqual(["Choose an option: "]);
		expect(terminal.clears).toBe(1);
	});

	it("rejects unknown options and redraws", async () => {
		const callbacks = stubCallbacks();
		const { ctx, terminal } = createTestContext({ answers: ["9", "0"] });

		await new MenuApp(ctx, buildCommands(callbacks)).run();

		expect(terminal.output).toEqual([
			...MENU,
			"Invalid option. Please try again.",
			...MENU,
			"Exiting Spotify CLI Player. Goodbye!",
		]);
		expect(terminal.pauses).toEqual([SHORT_PAUSE_MS]);
		for (const callback of Object.values(callbacks)) {
			expect(callback).not.toHaveBeenCalled();
		}
	});

	it("runs the chosen command then shows the menu again", async () => {
		const callbacks = stubCallbacks();
		const { ctx, terminal } = createTestContext({ answers: [" 2 ", "7", "0"] });

		const ending = await new MenuApp(ctx, buildCommands(callbacks)).run();

		expect(ending).toBe("exit");
		expect(callbacks.nextTrack).toHaveBeenCalledTimes(1);
		expect(callbacks.adjustVolume).toHaveBeenCalledTimes(1);
		expect(callbacks.togglePlayback).not.toHaveBeenCalled();
		expect(terminal.clears).toBe(3);
	});

	it("ends with a goodbye on interrupt", async () => {
		const { ctx, terminal } = createTestContext();

		const ending = await new MenuApp(ctx).run();

		expect(ending).toBe("interrupted");
		expect(terminal.output).toEqual([...MENU, "", "Program interrupted. Goodbye!"]);
	});

	it("treats an interrupt inside a command as the end of the session", async () => {
		// search prompts for a query, and the script has no answer for it
		const { ctx, client } = createTestContext({ answers: ["4"] });

		const ending = await new MenuApp(ctx).run();

		expect(ending).toBe("interrupted");
		expect(client.search).not.toHaveBeenCalled();
	});

	it("keeps the session alive when a command throws", async () => {
		const callbacks = stubCallbacks();
		callbacks.listPlaylists = vi.fn(async () => {
			throw new Error("boom");
		});
		const { ctx, terminal, exit } = createTestContext({ answers: ["5", "0"] });

		const ending = await new MenuApp(ctx, buildCommands(callbacks)).run();

		expect(ending).toBe("exit");
		expect(terminal.output).toContain("Error: boom");
		expect(exit).not.toHaveBeenCalled();
	});

	it("dispatches through the wired controllers", async () => {
		const { ctx, client, terminal } = createTestContext({ answers: ["3", "0"] });

		await new MenuApp(ctx).run();

		expect(client.previous).toHaveBeenCalledTimes(1);
		expect(terminal.output).toContain("Returned to previous track");
	});
});
