import { buildCommands, type MenuCommand } from "./commands/buildCommands";
import { APP_NAME, LONG_PAUSE_MS, SHORT_PAUSE_MS } from "./config";
import {
	LibraryController,
	NowPlayingController,
	PlaybackController,
	SearchController,
} from "./controllers";
import type { CommandContext } from "./interfaces";
import { InterruptedError } from "./ui/Terminal";
import { getLogger } from "./utils";

const logger = getLogger("App");

/**
 * How the menu loop ended
 */
export type MenuExit = "exit" | "interrupted";

/**
 * Wire each menu entry to its controller
 */
export function createMenuCommands(ctx: CommandContext): MenuCommand[] {
	const playback = new PlaybackController(ctx);
	const search = new SearchController(ctx);
	const library = new LibraryController(ctx);
	const nowPlaying = new NowPlayingController(ctx);

	return buildCommands({
		togglePlayback: () => playback.togglePlayback(),
		nextTrack: () => playback.nextTrack(),
		previousTrack: () => playback.previousTrack(),
		searchTrack: () => search.searchTrack(),
		listPlaylists: () => library.listPlaylists(),
		showCurrentTrack: () => nowPlaying.showCurrentTrack(),
		adjustVolume: () => playback.adjustVolume(),
	});
}

/**
 * Menu dispatcher
 * Single state: show the menu, read one option, run it, repeat.
 * Leaves on the exit command or an interrupt.
 */
export class MenuApp {
	constructor(
		private ctx: CommandContext,
		private commands: MenuCommand[] = createMenuCommands(ctx),
	) {}

	private renderMenu(): void {
		const { terminal } = this.ctx;
		terminal.clear();
		terminal.print(`===== ${APP_NAME} =====`, "title");
		// Exit is listed last whatever its key
		const ordered = [
			...this.commands.filter((command) => command.kind === "action"),
			...this.commands.filter((command) => command.kind === "exit"),
		];
		for (const command of ordered) {
			terminal.print(`${command.key}. ${command.label}`);
		}
	}

	async run(): Promise<MenuExit> {
		const { terminal, errors } = this.ctx;

		while (true) {
			this.renderMenu();

			let option: string;
			try {
				option = (await terminal.prompt("Choose an option: ")).trim();
			} catch (error) {
				return this.interruptedOr(error);
			}

			const command = this.commands.find((entry) => entry.key === option);
			if (!command) {
				terminal.print("Invalid option. Please try again.", "error");
				await terminal.pause(SHORT_PAUSE_MS);
				continue;
			}

			if (command.kind === "exit") {
				terminal.print(`Exiting ${APP_NAME}. Goodbye!`, "title");
				return "exit";
			}

			logger.debug(`Running "${command.label}"`);
			try {
				await command.action();
			} catch (error) {
				if (error instanceof InterruptedError) {
					return this.interruptedOr(error);
				}
				// Handlers report API failures themselves; this is a bug, keep the session alive
				errors.handleUnexpected(error, command.label);
				await terminal.pause(LONG_PAUSE_MS);
			}
		}
	}

	/**
	 * Ctrl+C or end of input ends the loop; anything else propagates
	 */
	private interruptedOr(error: unknown): MenuExit {
		if (!(error instanceof InterruptedError)) {
			throw error;
		}
		this.ctx.terminal.print("");
		this.ctx.terminal.print("Program interrupted. Goodbye!", "title");
		return "interrupted";
	}
}
