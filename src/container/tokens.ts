/**
 * Dependency Injection Tokens
 * Use symbols to uniquely identify services for injection
 */

import type { IAuthenticator, ISpotifyClient } from "../interfaces";
import type { ConfigService } from "../services/ConfigService";
import type { Token } from "./ServiceContainer";

function token<T>(description: string): Token<T> {
	return { key: Symbol(description) };
}

export const TOKENS = {
	// Storage
	Config: token<ConfigService>("ConfigService"),

	// Authentication & API
	Auth: token<IAuthenticator>("AuthService"),
	SpotifyApi: token<ISpotifyClient>("SpotifyApiService"),
} as const;
