import type { RepeatState } from "./spotify";

export type { RepeatState } from "./spotify";

/**
 * Track information
 */
export interface Track {
	name: string;
	artistNames: string[];
	albumName: string;
	durationMs: number;
	uri: string;
}

/**
 * Playlist summary (first page of the user's playlists)
 */
export interface Playlist {
	name: string;
	trackCount: number;
	uri: string;
}

/**
 * Device the playback is running on
 */
export interface PlaybackDevice {
	name: string;
	/** null when the device does not report a volume */
	volumePercent: number | null;
}

/**
 * Snapshot of the player while a device is active
 */
export interface PlaybackState {
	isPlaying: boolean;
	progressMs: number;
	shuffle: boolean;
	repeatMode: RepeatState;
	device: PlaybackDevice;
	/** null between tracks, or when something other than a track plays */
	item: Track | null;
}

/**
 * "inactive" means the service reports no active device at all,
 * which is distinct from an active device that is paused.
 */
export type PlaybackSnapshot =
	| { kind: "inactive" }
	| { kind: "active"; state: PlaybackState };

export type ApiFailureKind =
	| "auth"
	| "network"
	| "http"
	| "rate-limited"
	| "malformed";

export interface ApiFailure {
	kind: ApiFailureKind;
	message: string;
	status?: number;
}

/**
 * Outcome of a remote operation
 */
export type ApiResult<T> =
	| { ok: true; data: T }
	| { ok: false; error: ApiFailure };
