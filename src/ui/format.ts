/**
 * Pure rendering helpers: records in, display strings out
 */

import type { Playlist, RepeatState, Track } from "../types";

const MAX_CELL_WIDTH = 40;

/**
 * m:ss from milliseconds; whole seconds only, no rounding
 */
export function formatDuration(ms: number): string {
	const totalSeconds = Math.floor(ms / 1000);
	const minutes = Math.floor(totalSeconds / 60);
	const seconds = totalSeconds % 60;
	return `${minutes}:${seconds.toString().padStart(2, "0")}`;
}

/**
 * Progress as a percentage with one decimal, "0.0" for zero-length tracks
 */
export function formatPercent(progressMs: number, durationMs: number): string {
	if (durationMs <= 0) return "0.0";
	return ((progressMs / durationMs) * 100).toFixed(1);
}

/**
 * "1:05/3:20 (32.5%)"
 */
export function formatProgress(progressMs: number, durationMs: number): string {
	return `${formatDuration(progressMs)}/${formatDuration(durationMs)} (${formatPercent(progressMs, durationMs)}%)`;
}

export function joinArtists(artistNames: readonly string[]): string {
	return artistNames.join(", ");
}

export function repeatLabel(mode: RepeatState): string {
	switch (mode) {
		case "off":
			return "Off";
		case "track":
			return "Track";
		case "context":
			return "Playlist/Album";
	}
}

export function onOff(value: boolean): string {
	return value ? "On" : "Off";
}

function truncate(text: string, width: number): string {
	return text.length > width ? `${text.slice(0, width - 1)}…` : text;
}

/**
 * Plain-text table: title, header, rule, then one line per row.
 * Columns are separated by two spaces and trailing padding is trimmed.
 */
export function renderTable(
	title: string,
	headers: readonly string[],
	rows: readonly (readonly string[])[],
): string[] {
	const cells = rows.map((row) => row.map((cell) => truncate(cell, MAX_CELL_WIDTH)));
	const widths = headers.map((header, col) =>
		Math.max(header.length, ...cells.map((row) => (row[col] ?? "").length)),
	);

	const line = (values: readonly string[]) =>
		values
			.map((value, col) => value.padEnd(widths[col] ?? 0))
			.join("  ")
			.trimEnd();

	return [
		title,
		line(headers),
		widths.map((width) => "-".repeat(width)).join("  "),
		...cells.map(line),
	];
}

export function trackRows(tracks: readonly Track[]): string[][] {
	return tracks.map((track, i) => [
		String(i + 1),
		track.name,
		joinArtists(track.artistNames),
		track.albumName,
	]);
}

export function playlistRows(playlists: readonly Playlist[]): string[][] {
	return playlists.map((playlist, i) => [
		String(i + 1),
		playlist.name,
		String(playlist.trackCount),
	]);
}

export function renderTrackTable(query: string, tracks: readonly Track[]): string[] {
	return renderTable(
		`Results for '${query}'`,
		["#", "Name", "Artist", "Album"],
		trackRows(tracks),
	);
}

export function renderPlaylistTable(playlists: readonly Playlist[]): string[] {
	return renderTable("Your Playlists", ["#", "Name", "Tracks"], playlistRows(playlists));
}
