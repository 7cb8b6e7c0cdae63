/**
 * Spotify API Types
 */

/**
 * OAuth2 tokens returned from Spotify
 */
export interface SpotifyTokens {
	access_token: string;
	token_type: string;
	expires_in: number;
	refresh_token?: string;
	scope?: string;
}

/**
 * Stored credentials with expiration timestamp
 */
export interface StoredCredentials {
	client_id: string;
	access_token: string;
	refresh_token: string;
	expires_at: number; // Unix timestamp in milliseconds
	scope: string;
}

/**
 * Auth configuration
 */
export interface AuthConfig {
	clientId: string;
	clientSecret: string;
	redirectUri: string;
	scopes: readonly string[];
}

export type RepeatState = "off" | "track" | "context";

/**
 * Body of PUT /me/player/play
 */
export interface StartPlaybackBody {
	uris?: string[];
	context_uri?: string;
}
