/**
 * Service Registration
 * Registers all services with the DI container
 */

import { SPOTIFY_SCOPES } from "../config/constants";
import type { AppConfig } from "../config/env";
import { AuthService } from "../services/AuthService";
import { getConfigService } from "../services/ConfigService";
import { SpotifyApiService } from "../services/SpotifyApiService";
import { getLogger } from "../utils";
import type { ServiceContainer } from "./ServiceContainer";
import { TOKENS } from "./tokens";

const logger = getLogger("ServiceRegistration");

/**
 * Register all services with the DI container
 */
export function registerServices(
	container: ServiceContainer,
	config: AppConfig,
): void {
	logger.debug("Registering services with DI container...");

	// Storage (no dependencies)
	container.singleton(TOKENS.Config, () => getConfigService());

	// Authentication & API (depend on storage)
	container.singleton(
		TOKENS.Auth,
		() =>
			new AuthService(
				{
					clientId: config.clientId,
					clientSecret: config.clientSecret,
					redirectUri: config.redirectUri,
					scopes: SPOTIFY_SCOPES,
				},
				container.resolve(TOKENS.Config),
			),
	);
	container.singleton(
		TOKENS.SpotifyApi,
		() => new SpotifyApiService(container.resolve(TOKENS.Auth)),
	);

	logger.debug("Service registration complete");
}
