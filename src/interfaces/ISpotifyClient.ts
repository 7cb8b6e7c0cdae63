/**
 * Spotify Client Interface
 * Remote operations the command handlers rely on. Every call resolves to an
 * ApiResult; none of them reject.
 */

import type {
	ApiResult,
	PlaybackSnapshot,
	Playlist,
	Track,
} from "../types";
import type { StoredCredentials } from "../types/spotify";

export interface ISpotifyClient {
	/**
	 * Current player state, or "inactive" when no device is active
	 */
	getCurrentPlayback(): Promise<ApiResult<PlaybackSnapshot>>;

	/**
	 * Resume playback on the active device
	 */
	play(): Promise<ApiResult<void>>;

	pause(): Promise<ApiResult<void>>;

	next(): Promise<ApiResult<void>>;

	previous(): Promise<ApiResult<void>>;

	/**
	 * Track search, capped at `limit` results
	 */
	search(query: string, limit: number): Promise<ApiResult<Track[]>>;

	/**
	 * @param percent - integer in [0, 100]
	 */
	setVolume(percent: number): Promise<ApiResult<void>>;

	/**
	 * First page of the current user's playlists
	 */
	listUserPlaylists(): Promise<ApiResult<Playlist[]>>;

	/**
	 * Replace the queue with exactly these tracks
	 */
	startPlaybackByUris(uris: string[]): Promise<ApiResult<void>>;

	/**
	 * Play a playlist or album by its context URI
	 */
	startPlaybackByContext(contextUri: string): Promise<ApiResult<void>>;
}

export interface IAccessTokenProvider {
	getValidAccessToken(): Promise<string>;
}

/**
 * Token source that can also run the startup sign-in
 */
export interface IAuthenticator extends IAccessTokenProvider {
	ensureAuthenticated(): Promise<StoredCredentials>;
}
