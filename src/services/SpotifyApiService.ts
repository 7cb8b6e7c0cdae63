/**
 * Spotify Web API Service
 * Playback, search and playlist calls. Responses are validated with Zod and
 * every outcome is returned as an ApiResult instead of being thrown.
 */

import type { z } from "zod";
import {
	API_LIMITS,
	DEFAULT_RATE_LIMIT_RETRY_SECONDS,
	HTTP_STATUS,
	SPOTIFY_API_BASE,
} from "../config/constants";
import type { IAccessTokenProvider, ISpotifyClient } from "../interfaces";
import {
	PaginatedPlaylistsSchema,
	PlaybackStateSchema,
	presentItems,
	SearchResultsSchema,
	safeValidate,
	toPlaybackSnapshot,
	toPlaylist,
	toTrack,
} from "../schemas/spotify";
import type {
	ApiFailure,
	ApiResult,
	PlaybackSnapshot,
	Playlist,
	Track,
} from "../types";
import type { StartPlaybackBody } from "../types/spotify";
import { getLogger } from "../utils";

const logger = getLogger("SpotifyApiService");

/**
 * Raw response of a request: no body (204), parsed JSON, or a body that is not JSON
 */
type RawResponse =
	| { kind: "empty" }
	| { kind: "json"; body: unknown }
	| { kind: "text" };

function fail<T>(error: ApiFailure): ApiResult<T> {
	return { ok: false, error };
}

function notJson<T>(context: string): ApiResult<T> {
	return fail({
		kind: "malformed",
		message: `Malformed response from ${context}: body is not JSON`,
	});
}

export class SpotifyApiService implements ISpotifyClient {
	private readonly fetchImpl: typeof fetch;

	constructor(
		private tokens: IAccessTokenProvider,
		fetchImpl?: typeof fetch,
	) {
		this.fetchImpl = fetchImpl ?? fetch;
	}

	/**
	 * Make an authenticated API request
	 */
	private async request(
		endpoint: string,
		options: RequestInit = {},
	): Promise<ApiResult<RawResponse>> {
		let token: string;
		try {
			token = await this.tokens.getValidAccessToken();
		} catch (error) {
			return fail({
				kind: "auth",
				message: error instanceof Error ? error.message : String(error),
			});
		}

		let response: Response;
		try {
			response = await this.fetchImpl(`${SPOTIFY_API_BASE}${endpoint}`, {
				...options,
				headers: {
					Authorization: `Bearer ${token}`,
					"Content-Type": "application/json",
					...options.headers,
				},
			});
		} catch (error) {
			logger.warn(`Network error on ${endpoint}`, String(error));
			return fail({
				kind: "network",
				message: error instanceof Error ? error.message : String(error),
			});
		}

		if (response.status === HTTP_STATUS.RATE_LIMITED) {
			// the body is never read; release the connection
			await response.body?.cancel();
			const header = Number.parseInt(response.headers.get("Retry-After") ?? "", 10);
			const retryAfter = Number.isNaN(header)
				? DEFAULT_RATE_LIMIT_RETRY_SECONDS
				: header;
			return fail({
				kind: "rate-limited",
				status: response.status,
				message: `Rate limited. Retry after ${retryAfter} seconds.`,
			});
		}

		if (!response.ok) {
			const message = await this.readErrorMessage(response);
			return fail({
				kind: response.status === HTTP_STATUS.UNAUTHORIZED ? "auth" : "http",
				status: response.status,
				message: `API error ${response.status}: ${message}`,
			});
		}

		// Player commands answer 204, or 200 with an empty or non-JSON body
		const text = await response.text();
		if (response.status === HTTP_STATUS.NO_CONTENT || text.trim() === "") {
			return { ok: true, data: { kind: "empty" } };
		}

		let body: unknown;
		try {
			body = JSON.parse(text);
		} catch {
			return { ok: true, data: { kind: "text" } };
		}
		return { ok: true, data: { kind: "json", body } };
	}

	/**
	 * Spotify errors look like { error: { status, message } }; fall back to the raw text
	 */
	private async readErrorMessage(response: Response): Promise<string> {
		const text = await response.text();
		try {
			const parsed: unknown = JSON.parse(text);
			if (
				typeof parsed === "object" &&
				parsed !== null &&
				"error" in parsed &&
				typeof parsed.error === "object" &&
				parsed.error !== null &&
				"message" in parsed.error &&
				typeof parsed.error.message === "string"
			) {
				return parsed.error.message;
			}
		} catch {
			// not JSON
		}
		return text || response.statusText;
	}

	/**
	 * Request that expects a JSON body matching the schema
	 */
	private async requestJson<S extends z.ZodTypeAny>(
		endpoint: string,
		schema: S,
		context: string,
	): Promise<ApiResult<z.output<S>>> {
		const result = await this.request(endpoint);
		if (!result.ok) return result;

		if (result.data.kind === "empty") {
			return fail({
				kind: "malformed",
				message: `Malformed response from ${context}: empty body`,
			});
		}
		if (result.data.kind === "text") {
			return notJson(context);
		}

		const validated = safeValidate(schema, result.data.body, context);
		if (!validated.success) {
			return fail({ kind: "malformed", message: validated.message });
		}
		return { ok: true, data: validated.data };
	}

	/**
	 * Request whose body is ignored
	 */
	private async command(
		endpoint: string,
		method: "PUT" | "POST",
		body?: StartPlaybackBody,
	): Promise<ApiResult<void>> {
		const result = await this.request(endpoint, {
			method,
			body: body ? JSON.stringify(body) : undefined,
		});
		if (!result.ok) return result;
		return { ok: true, data: undefined };
	}

	// ─────────────────────────────────────────────────────────────
	// Playback State
	// ─────────────────────────────────────────────────────────────

	async getCurrentPlayback(): Promise<ApiResult<PlaybackSnapshot>> {
		const result = await this.request("/me/player");
		if (!result.ok) return result;

		// 204 means there is no active device
		if (result.data.kind === "empty") {
			return { ok: true, data: { kind: "inactive" } };
		}
		if (result.data.kind === "text") {
			return notJson("/me/player");
		}

		const validated = safeValidate(
			PlaybackStateSchema,
			result.data.body,
			"/me/player",
		);
		if (!validated.success) {
			return fail({ kind: "malformed", message: validated.message });
		}
		return { ok: true, data: toPlaybackSnapshot(validated.data) };
	}

	// ─────────────────────────────────────────────────────────────
	// Playback Control
	// ─────────────────────────────────────────────────────────────

	play(): Promise<ApiResult<void>> {
		return this.command("/me/player/play", "PUT");
	}

	pause(): Promise<ApiResult<void>> {
		return this.command("/me/player/pause", "PUT");
	}

	next(): Promise<ApiResult<void>> {
		return this.command("/me/player/next", "POST");
	}

	previous(): Promise<ApiResult<void>> {
		return this.command("/me/player/previous", "POST");
	}

	setVolume(percent: number): Promise<ApiResult<void>> {
		const params = new URLSearchParams({ volume_percent: String(percent) });
		return this.command(`/me/player/volume?${params}`, "PUT");
	}

	startPlaybackByUris(uris: string[]): Promise<ApiResult<void>> {
		return this.command("/me/player/play", "PUT", { uris });
	}

	startPlaybackByContext(contextUri: string): Promise<ApiResult<void>> {
		return this.command("/me/player/play", "PUT", { context_uri: contextUri });
	}

	// ─────────────────────────────────────────────────────────────
	// Search & Library
	// ─────────────────────────────────────────────────────────────

	async search(
		query: string,
		limit: number = API_LIMITS.SEARCH_RESULTS,
	): Promise<ApiResult<Track[]>> {
		const params = new URLSearchParams({
			q: query,
			type: "track",
			limit: limit.toString(),
		});

		const result = await this.requestJson(
			`/search?${params}`,
			SearchResultsSchema,
			"search",
		);
		if (!result.ok) return result;

		return {
			ok: true,
			data: presentItems(result.data.tracks.items).map(toTrack),
		};
	}

	async listUserPlaylists(): Promise<ApiResult<Playlist[]>> {
		const params = new URLSearchParams({
			limit: API_LIMITS.PLAYLISTS.toString(),
		});

		const result = await this.requestJson(
			`/me/playlists?${params}`,
			PaginatedPlaylistsSchema,
			"playlists",
		);
		if (!result.ok) return result;

		return {
			ok: true,
			data: presentItems(result.data.items).map(toPlaylist),
		};
	}
}
