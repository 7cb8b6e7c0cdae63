/**
 * Playback Controller Interface
 * Transport commands and volume
 */

export interface IPlaybackController {
	/**
	 * Pause if playing, otherwise start playback
	 */
	togglePlayback(): Promise<void>;

	nextTrack(): Promise<void>;

	previousTrack(): Promise<void>;

	/**
	 * Show the current volume and prompt for a new one
	 */
	adjustVolume(): Promise<void>;
}
