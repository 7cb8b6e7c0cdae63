import { LONG_PAUSE_MS, SHORT_PAUSE_MS } from "../config/constants";
import type { CommandContext, IPlaybackController } from "../interfaces";
import { parseVolume } from "../ui/input";
import { getLogger } from "../utils";

const logger = getLogger("PlaybackController");

/**
 * Playback Controller
 * Play/pause, next/previous and volume
 */
export class PlaybackController implements IPlaybackController {
	constructor(private ctx: CommandContext) {}

	/**
	 * Pause when something is playing; otherwise (paused, or no active device) start playback
	 */
	async togglePlayback(): Promise<void> {
		const { client, terminal, errors } = this.ctx;

		const playback = await client.getCurrentPlayback();
		if (!playback.ok) {
			errors.handleApiFailure(playback.error, "toggle playback");
			await terminal.pause(SHORT_PAUSE_MS);
			return;
		}

		const playing =
			playback.data.kind === "active" && playback.data.state.isPlaying;
		logger.debug(`Toggling playback (playing=${playing}, device=${playback.data.kind})`);

		const result = playing ? await client.pause() : await client.play();
		if (!result.ok) {
			errors.handleApiFailure(result.error, playing ? "pause" : "play");
		} else if (playing) {
			terminal.print("Playback paused", "warning");
		} else {
			terminal.print("Playback started", "success");
		}

		await terminal.pause(SHORT_PAUSE_MS);
	}

	async nextTrack(): Promise<void> {
		const { client, terminal, errors } = this.ctx;

		const result = await client.next();
		if (result.ok) {
			terminal.print("Skipped to next track", "success");
		} else {
			errors.handleApiFailure(result.error, "next track");
		}

		await terminal.pause(SHORT_PAUSE_MS);
	}

	async previousTrack(): Promise<void> {
		const { client, terminal, errors } = this.ctx;

		const result = await client.previous();
		if (result.ok) {
			terminal.print("Returned to previous track", "success");
		} else {
			errors.handleApiFailure(result.error, "previous track");
		}

		await terminal.pause(SHORT_PAUSE_MS);
	}

	/**
	 * Show the device volume and set a new one; invalid input makes no call
	 */
	async adjustVolume(): Promise<void> {
		const { client, terminal, errors } = this.ctx;

		const playback = await client.getCurrentPlayback();
		if (!playback.ok) {
			errors.handleApiFailure(playback.error, "read volume");
			await terminal.pause(LONG_PAUSE_MS);
			return;
		}

		if (playback.data.kind === "inactive") {
			terminal.print("No active device found.", "warning");
			await terminal.pause(LONG_PAUSE_MS);
			return;
		}

		const { volumePercent } = playback.data.state.device;
		terminal.print(
			`Current volume: ${volumePercent === null ? "unknown" : `${volumePercent}%`}`,
		);

		const volume = parseVolume(await terminal.prompt("Enter new volume (0-100): "));
		if (volume === null) {
			terminal.print("Invalid value. Volume must be between 0 and 100.", "warning");
			await terminal.pause(SHORT_PAUSE_MS);
			return;
		}

		const result = await client.setVolume(volume);
		if (!result.ok) {
			errors.handleApiFailure(result.error, "set volume");
			await terminal.pause(LONG_PAUSE_MS);
			return;
		}

		terminal.print(`Volume adjusted to ${volume}%`, "success");
		await terminal.pause(SHORT_PAUSE_MS);
	}
}
