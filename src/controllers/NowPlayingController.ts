import { LONG_PAUSE_MS } from "../config/constants";
import type { CommandContext } from "../interfaces";
import {
	formatProgress,
	joinArtists,
	onOff,
	repeatLabel,
} from "../ui/format";

/**
 * Now Playing Controller
 * Shows the current track and waits for Enter
 */
export class NowPlayingController {
	constructor(private ctx: CommandContext) {}

	async showCurrentTrack(): Promise<void> {
		const { client, terminal, errors } = this.ctx;

		const playback = await client.getCurrentPlayback();
		if (!playback.ok) {
			errors.handleApiFailure(playback.error, "current track");
			await terminal.pause(LONG_PAUSE_MS);
			return;
		}

		const state = playback.data.kind === "active" ? playback.data.state : null;
		const track = state?.item;
		if (!state || !track) {
			terminal.print("No track currently playing.", "warning");
			await terminal.pause(LONG_PAUSE_MS);
			return;
		}

		terminal.print("Now Playing:", "title");
		terminal.print(`Track: ${track.name}`);
		terminal.print(`Artist: ${joinArtists(track.artistNames)}`);
		terminal.print(`Album: ${track.albumName}`);
		terminal.print(`Progress: ${formatProgress(state.progressMs, track.durationMs)}`);
		terminal.print(`Shuffle: ${onOff(state.shuffle)}`);
		terminal.print(`Repeat: ${repeatLabel(state.repeatMode)}`);

		terminal.print("");
		await terminal.prompt("Press Enter to return to menu...");
	}
}
