import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import type { StoredCredentials } from "../types/spotify";
import { getLogger } from "../utils";

const logger = getLogger("ConfigService");

const StoredCredentialsSchema = z.object({
	client_id: z.string().min(1),
	access_token: z.string().min(1),
	refresh_token: z.string().min(1),
	expires_at: z.number(),
	scope: z.string(),
});

/**
 * Credentials storage service
 * Manages ~/.config/playdeck/ directory
 */
export class ConfigService {
	private configDir: string;
	private credentialsPath: string;

	constructor(configDir?: string) {
		// Use XDG_CONFIG_HOME if available, otherwise ~/.config
		const configHome =
			process.env.XDG_CONFIG_HOME || join(homedir(), ".config");
		this.configDir = configDir ?? join(configHome, "playdeck");
		this.credentialsPath = join(this.configDir, "credentials.json");
	}

	private ensureConfigDir(): void {
		if (!existsSync(this.configDir)) {
			mkdirSync(this.configDir, { recursive: true, mode: 0o700 });
		}
	}

	/**
	 * Store credentials readable by the owner only
	 */
	saveCredentials(credentials: StoredCredentials): void {
		this.ensureConfigDir();
		writeFileSync(this.credentialsPath, JSON.stringify(credentials, null, 2), {
			mode: 0o600,
		});
	}

	/**
	 * Load stored credentials for the given client.
	 * Returns null when none exist, the file is unreadable, or they belong to another client.
	 */
	loadCredentials(clientId: string): StoredCredentials | null {
		if (!existsSync(this.credentialsPath)) {
			return null;
		}

		let raw: unknown;
		try {
			raw = JSON.parse(readFileSync(this.credentialsPath, "utf-8"));
		} catch (error) {
			logger.warn("Ignoring unreadable credentials file", String(error));
			return null;
		}

		const parsed = StoredCredentialsSchema.safeParse(raw);
		if (!parsed.success) {
			logger.warn("Ignoring credentials file with missing fields");
			return null;
		}

		if (parsed.data.client_id !== clientId) {
			logger.info("Stored credentials belong to another client id");
			return null;
		}

		return parsed.data;
	}
}

let configServiceInstance: ConfigService | null = null;

export function getConfigService(): ConfigService {
	if (!configServiceInstance) {
		configServiceInstance = new ConfigService();
	}
	return configServiceInstance;
}
