import { describe, expect, it } from "vitest";
import { createTestContext, failed, makePlaylist, ok } from "../testing/fakes";
import { LibraryController } from "./LibraryController";

describe("LibraryController", () => {
	it("plays the chosen playlist by context", async () => {
		const { ctx, client, terminal } = createTestContext({
			answers: ["1"],
			client: {
				listUserPlaylists: async () =>
					ok([
						makePlaylist({ name: "Road", trackCount: 7, uri: "spotify:playlist:road" }),
						makePlaylist({ name: "Focus Flow", trackCount: 120 }),
					]),
			},
		});

		await new LibraryController(ctx).listPlaylists();

		expect(client.startPlaybackByContext).toHaveBeenCalledWith("spotify:playlist:road");
		expect(terminal.questions).toEqual([
			"Choose a playlist to play (1-2) or 0 to go back: ",
		]);
		expect(terminal.output).toEqual([
			"Loading playlists...",
			"Your Playlists",
			"#  Name        Tracks",
			"-  ----------  ------",
			"1  Road        7",
			"2  Focus Flow  120",
			"Now playing playlist: Road",
		]);
	});

	it("reports an empty library", async () => {
		const { ctx, terminal } = createTestContext();

		await new LibraryController(ctx).listPlaylists();

		expect(terminal.output).toEqual(["Loading playlists...", "No playlists found."]);
		expect(terminal.questions).toEqual([]);
	});

	it("goes back on 0", async () => {
		const { ctx, client } = createTestContext({
			answers: ["0"],
			client: { listUserPlaylists: async () => ok([makePlaylist()]) },
		});

		await new LibraryController(ctx).listPlaylists();

		expect(client.startPlaybackByContext).not.toHaveBeenCalled();
	});

	it("reports a malformed listing", async () => {
		const { ctx, terminal } = createTestContext({
			client: {
				listUserPlaylists: async () =>
					failed("malformed", "Malformed response from playlists at items.0.uri: Required"),
			},
		});

		await new LibraryController(ctx).listPlaylists();

		expect(terminal.output).toEqual([
			"Loading playlists...",
			"Error: Malformed response from playlists at items.0.uri: Required",
		]);
	});
});
