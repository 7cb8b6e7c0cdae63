/**
 * Application name
 */
export const APP_NAME = "Spotify CLI Player";

/**
 * Pauses after an action so the result stays readable before the menu redraws
 */
export const SHORT_PAUSE_MS = 1000;
export const LONG_PAUSE_MS = 2000;

/**
 * Authentication constants
 */
export const AUTH_TIMEOUT_MS = 5 * 60 * 1000; // 5 minutes auth timeout
export const TOKEN_REFRESH_BUFFER_MS = 5 * 60 * 1000; // Refresh token 5 min before expiry
export const DEFAULT_CALLBACK_PORT = 8888;
export const DEFAULT_REDIRECT_URI = `http://127.0.0.1:${DEFAULT_CALLBACK_PORT}/callback`;
export const STATE_BYTES = 16;

export const SPOTIFY_AUTH_URL = "https://accounts.spotify.com/authorize";
export const SPOTIFY_TOKEN_URL = "https://accounts.spotify.com/api/token";

/**
 * Scopes requested at login
 */
export const SPOTIFY_SCOPES = [
	"user-read-playback-state",
	"user-modify-playback-state",
	"user-read-currently-playing",
	"playlist-read-private",
] as const;

/**
 * API constants
 */
export const SPOTIFY_API_BASE = "https://api.spotify.com/v1";
export const DEFAULT_RATE_LIMIT_RETRY_SECONDS = 5;

/**
 * Result caps (first page only, no pagination)
 */
export const API_LIMITS = {
	SEARCH_RESULTS: 10,
	PLAYLISTS: 10,
} as const;

export const VOLUME_RANGE = { MIN: 0, MAX: 100 } as const;

/**
 * HTTP Status Codes
 */
export const HTTP_STATUS = {
	NO_CONTENT: 204,
	UNAUTHORIZED: 401,
	RATE_LIMITED: 429,
} as const;

/**
 * Environment variable names
 */
export const ENV_VARS = {
	CLIENT_ID: "SPOTIFY_CLIENT_ID",
	CLIENT_SECRET: "SPOTIFY_CLIENT_SECRET",
	REDIRECT_URI: "SPOTIFY_REDIRECT_URI",
} as const;
