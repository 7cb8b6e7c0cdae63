import { API_LIMITS, LONG_PAUSE_MS } from "../config/constants";
import type { CommandContext } from "../interfaces";
import { renderTrackTable } from "../ui/format";
import { getLogger } from "../utils";
import { chooseFromTable } from "./selection";

const logger = getLogger("SearchController");

/**
 * Search Controller
 * Finds tracks and plays the one the user picks
 */
export class SearchController {
	constructor(private ctx: CommandContext) {}

	async searchTrack(): Promise<void> {
		const { client, terminal, errors } = this.ctx;

		const query = (await terminal.prompt("Enter track name or artist: ")).trim();
		if (!query) {
			return;
		}

		terminal.print("Searching...", "dim");
		const results = await client.search(query, API_LIMITS.SEARCH_RESULTS);
		if (!results.ok) {
			errors.handleApiFailure(results.error, "search");
			await terminal.pause(LONG_PAUSE_MS);
			return;
		}

		const tracks = results.data;
		logger.debug(`Search "${query}" returned ${tracks.length} tracks`);

		if (tracks.length === 0) {
			terminal.print("No tracks found.", "warning");
			await terminal.pause(LONG_PAUSE_MS);
			return;
		}

		const track = await chooseFromTable(
			terminal,
			renderTrackTable(query, tracks),
			tracks,
			"track",
		);
		if (!track) {
			return;
		}

		// Replace the current queue with just this track
		const result = await client.startPlaybackByUris([track.uri]);
		if (!result.ok) {
			errors.handleApiFailure(result.error, "play track");
		} else {
			terminal.print(`Now playing: ${track.name}`, "success");
		}

		await terminal.pause(LONG_PAUSE_MS);
	}
}
