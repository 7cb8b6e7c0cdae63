import { LONG_PAUSE_MS } from "../config/constants";
import type { CommandContext } from "../interfaces";
import { renderPlaylistTable } from "../ui/format";
import { chooseFromTable } from "./selection";

/**
 * Library Controller
 * Lists the user's playlists and plays one by context
 */
export class LibraryController {
	constructor(private ctx: CommandContext) {}

	async listPlaylists(): Promise<void> {
		const { client, terminal, errors } = this.ctx;

		terminal.print("Loading playlists...", "dim");
		const listing = await client.listUserPlaylists();
		if (!listing.ok) {
			errors.handleApiFailure(listing.error, "list playlists");
			await terminal.pause(LONG_PAUSE_MS);
			return;
		}

		const playlists = listing.data;
		if (playlists.length === 0) {
			terminal.print("No playlists found.", "warning");
			await terminal.pause(LONG_PAUSE_MS);
			return;
		}

		const playlist = await chooseFromTable(
			terminal,
			renderPlaylistTable(playlists),
			playlists,
			"playlist",
		);
		if (!playlist) {
			return;
		}

		const result = await client.startPlaybackByContext(playlist.uri);
		if (!result.ok) {
			errors.handleApiFailure(result.error, "play playlist");
		} else {
			terminal.print(`Now playing playlist: ${playlist.name}`, "success");
		}

		await terminal.pause(LONG_PAUSE_MS);
	}
}
