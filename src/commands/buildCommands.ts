/**
 * A menu entry: the key typed at the prompt and what it runs
 */
export type MenuCommand =
	| {
			key: string;
			label: string;
			kind: "action";
			action: () => Promise<void>;
	  }
	| {
			key: string;
			label: string;
			kind: "exit";
	  };

/**
 * Callbacks required by command definitions
 * Commands are pure - they call these callbacks to perform actions
 */
export interface CommandCallbacks {
	togglePlayback: () => Promise<void>;
	nextTrack: () => Promise<void>;
	previousTrack: () => Promise<void>;
	searchTrack: () => Promise<void>;
	listPlaylists: () => Promise<void>;
	showCurrentTrack: () => Promise<void>;
	adjustVolume: () => Promise<void>;
}

/**
 * Build the menu, in display order
 *
 * @param callbacks - Action callbacks to execute commands
 */
export function buildCommands(callbacks: CommandCallbacks): MenuCommand[] {
	return [
		{ key: "1", label: "Play/Pause", kind: "action", action: callbacks.togglePlayback },
		{ key: "2", label: "Next Track", kind: "action", action: callbacks.nextTrack },
		{ key: "3", label: "Previous Track", kind: "action", action: callbacks.previousTrack },
		{ key: "4", label: "Search Track", kind: "action", action: callbacks.searchTrack },
		{ key: "5", label: "My Playlists", kind: "action", action: callbacks.listPlaylists },
		{
			key: "6",
			label: "Current Track Info",
			kind: "action",
			action: callbacks.showCurrentTrack,
		},
		{ key: "7", label: "Adjust Volume", kind: "action", action: callbacks.adjustVolume },
		{ key: "0", label: "Exit", kind: "exit" },
	];
}
