/**
 * Everything a command handler needs, passed in explicitly at construction
 */

import type { ErrorHandler } from "../services/ErrorHandler";
import type { ITerminal } from "../ui/Terminal";
import type { ISpotifyClient } from "./ISpotifyClient";

export interface CommandContext {
	client: ISpotifyClient;
	terminal: ITerminal;
	errors: ErrorHandler;
}
