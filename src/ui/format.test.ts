import { describe, expect, it } from "vitest";
import { makeTrack } from "../testing/fakes";
import {
	formatDuration,
	formatPercent,
	formatProgress,
	joinArtists,
	onOff,
	renderPlaylistTable,
	renderTable,
	renderTrackTable,
	repeatLabel,
} from "./format";

describe("formatDuration", () => {
	it("renders minutes and zero-padded seconds", () => {
		expect(formatDuration(65_000)).toBe("1:05");
		expect(formatDuration(200_000)).toBe("3:20");
		expect(formatDuration(0)).toBe("0:00");
	});

	it("drops partial seconds", () => {
		expect(formatDuration(59_999)).toBe("0:59");
	});

	it("keeps counting minutes past the hour", () => {
		expect(formatDuration(3_725_000)).toBe("62:05");
	});
});

describe("formatPercent", () => {
	it("uses one decimal", () => {
		expect(formatPercent(65_000, 200_000)).toBe("32.5");
		expect(formatPercent(0, 200_000)).toBe("0.0");
		expect(formatPercent(200_000, 200_000)).toBe("100.0");
	});

	it("reports zero for zero-length tracks", () => {
		expect(formatPercent(1_000, 0)).toBe("0.0");
	});
});

describe("formatProgress", () => {
	it("combines position, length and percentage", () => {
		expect(formatProgress(65_000, 200_000)).toBe("1:05/3:20 (32.5%)");
	});
});

describe("labels", () => {
	it("maps repeat modes", () => {
		expect(repeatLabel("off")).toBe("Off");
		expect(repeatLabel("track")).toBe("Track");
		expect(repeatLabel("context")).toBe("Playlist/Album");
	});

	it("maps shuffle", () => {
		expect(onOff(true)).toBe("On");
		expect(onOff(false)).toBe("Off");
	});

	it("joins artist names", () => {
		expect(joinArtists(["A", "B", "C"])).toBe("A, B, C");
		expect(joinArtists([])).toBe("");
	});
});

describe("renderTable", () => {
	it("pads columns to the widest cell", () => {
		expect(
			renderPlaylistTable([
				{ name: "Road", trackCount: 7, uri: "spotify:playlist:a" },
				{ name: "Focus Flow", trackCount: 120, uri: "spotify:playlist:b" },
			]),
		).toEqual([
			"Your Playlists",
			"#  Name        Tracks",
			"-  ----------  ------",
			"1  Road        7",
			"2  Focus Flow  120",
		]);
	});

	it("truncates long cells", () => {
		const long = "a".repeat(45);
		const [, , , row] = renderTable("T", ["X"], [[long]]);
		expect(row).toBe(`${"a".repeat(39)}…`);
	});

	it("titles search results with the query", () => {
		const lines = renderTrackTable("harbour", [
			makeTrack({ name: "One", artistNames: ["A", "B"], albumName: "Alb" }),
		]);
		expect(lines).toEqual([
			"Results for 'harbour'",
			"#  Name  Artist  Album",
			"-  ----  ------  -----",
			"1  One   A, B    Alb",
		]);
	});
});
