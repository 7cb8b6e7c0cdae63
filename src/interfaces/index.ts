/**
 * Interfaces module
 * Exports all controller and service interfaces
 */

export type { IPlaybackController } from "./IPlaybackController";
export type { IAppLifecycle } from "./IAppLifecycle";
export type {
	ISpotifyClient,
	IAccessTokenProvider,
	IAuthenticator,
} from "./ISpotifyClient";
export type { CommandContext } from "./ICommandContext";
