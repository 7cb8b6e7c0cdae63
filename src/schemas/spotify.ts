/**
 * Zod schemas for Spotify API response validation
 * Only the fields the player reads are required; everything else passes through.
 */

import { z } from "zod";
import type {
	PlaybackSnapshot,
	Playlist,
	Track,
} from "../types";
import { getLogger } from "../utils";

const logger = getLogger("Validation");

// ============================================================================
// OAuth
// ============================================================================

export const TokenResponseSchema = z.object({
	access_token: z.string().min(1),
	token_type: z.string(),
	expires_in: z.number(),
	refresh_token: z.string().optional(),
	scope: z.string().optional(),
});

// ============================================================================
// Track
// ============================================================================

export const SimplifiedArtistSchema = z
	.object({
		name: z.string(),
	})
	.passthrough();

export const SpotifyTrackSchema = z
	.object({
		name: z.string(),
		uri: z.string(),
		duration_ms: z.number().int().min(0),
		artists: z.array(SimplifiedArtistSchema),
		album: z
			.object({
				name: z.string(),
			})
			.passthrough(),
	})
	.passthrough();

// ============================================================================
// Playlist
// ============================================================================

export const SpotifyPlaylistSchema = z
	.object({
		name: z.string(),
		uri: z.string(),
		tracks: z
			.object({
				total: z.number().int().min(0),
			})
			.passthrough(),
	})
	.passthrough();

// ============================================================================
// Paginated Responses
// ============================================================================

export const PageSchema = <T extends z.ZodTypeAny>(itemSchema: T) =>
	z
		.object({
			// Spotify occasionally returns null entries for unavailable items
			items: z.array(itemSchema.nullable()),
			total: z.number().optional(),
		})
		.passthrough();

export const SearchResultsSchema = z
	.object({
		tracks: PageSchema(SpotifyTrackSchema),
	})
	.passthrough();

export const PaginatedPlaylistsSchema = PageSchema(SpotifyPlaylistSchema);

// ============================================================================
// Playback State
// ============================================================================

export const PlaybackStateSchema = z
	.object({
		is_playing: z.boolean(),
		progress_ms: z.number().nullable(),
		shuffle_state: z.boolean(),
		repeat_state: z.enum(["off", "track", "context"]),
		device: z
			.object({
				name: z.string(),
				volume_percent: z.number().min(0).max(100).nullable(),
			})
			.passthrough(),
		// Episodes and ads do not match the track shape; treat them as "no track"
		item: SpotifyTrackSchema.nullable().catch(null),
	})
	.passthrough();

// ============================================================================
// Type exports (inferred from schemas)
// ============================================================================

export type ValidatedSpotifyTrack = z.infer<typeof SpotifyTrackSchema>;
export type ValidatedSpotifyPlaylist = z.infer<typeof SpotifyPlaylistSchema>;
export type ValidatedPlaybackState = z.infer<typeof PlaybackStateSchema>;

// ============================================================================
// Helper: Safe Parse with Error Logging
// ============================================================================

export type Validation<T> =
	| { success: true; data: T }
	| { success: false; message: string };

export function safeValidate<S extends z.ZodTypeAny>(
	schema: S,
	data: unknown,
	context: string,
): Validation<z.output<S>> {
	const result = schema.safeParse(data);

	if (!result.success) {
		logger.warn(`${context}: response did not match schema`, result.error.issues);
		const first = result.error.issues[0];
		const where = first && first.path.length > 0 ? ` at ${first.path.join(".")}` : "";
		return {
			success: false,
			message: `Malformed response from ${context}${where}: ${first?.message ?? "invalid data"}`,
		};
	}

	return { success: true, data: result.data };
}

// ============================================================================
// Mapping to domain records
// ============================================================================

export function toTrack(track: ValidatedSpotifyTrack): Track {
	return {
		name: track.name,
		artistNames: track.artists.map((artist) => artist.name),
		albumName: track.album.name,
		durationMs: track.duration_ms,
		uri: track.uri,
	};
}

export function toPlaylist(playlist: ValidatedSpotifyPlaylist): Playlist {
	return {
		name: playlist.name,
		trackCount: playlist.tracks.total,
		uri: playlist.uri,
	};
}

export function toPlaybackSnapshot(
	state: ValidatedPlaybackState,
): PlaybackSnapshot {
	return {
		kind: "active",
		state: {
			isPlaying: state.is_playing,
			progressMs: state.progress_ms ?? 0,
			shuffle: state.shuffle_state,
			repeatMode: state.repeat_state,
			device: {
				name: state.device.name,
				volumePercent: state.device.volume_percent,
			},
			item: state.item ? toTrack(state.item) : null,
		},
	};
}

/**
 * Drop the null placeholders Spotify puts in pages
 */
export function presentItems<T>(items: (T | null)[]): T[] {
	return items.filter((item): item is T => item !== null);
}
