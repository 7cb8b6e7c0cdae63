import { randomBytes } from "node:crypto";
import { createServer, type Server } from "node:http";
import open from "open";
import {
	AUTH_TIMEOUT_MS,
	DEFAULT_CALLBACK_PORT,
	SPOTIFY_AUTH_URL,
	SPOTIFY_TOKEN_URL,
	STATE_BYTES,
	TOKEN_REFRESH_BUFFER_MS,
} from "../config/constants";
import { safeValidate, TokenResponseSchema } from "../schemas/spotify";
import type {
	AuthConfig,
	SpotifyTokens,
	StoredCredentials,
} from "../types/spotify";
import { getLogger } from "../utils";
import type { IAuthenticator } from "../interfaces";
import type { ConfigService } from "./ConfigService";

const logger = getLogger("AuthService");

export interface AuthServiceOptions {
	fetchImpl?: typeof fetch;
	openBrowser?: (url: string) => Promise<unknown>;
	now?: () => number;
}

/**
 * Spotify OAuth2 Authentication Service
 * Authorization Code flow for a confidential client (client secret on the token endpoint)
 */
export class AuthService implements IAuthenticator {
	private server: Server | null = null;
	private credentials: StoredCredentials | null = null;
	private readonly fetchImpl: typeof fetch;
	private readonly openBrowser: (url: string) => Promise<unknown>;
	private readonly now: () => number;

	constructor(
		private config: AuthConfig,
		private configService: ConfigService,
		options: AuthServiceOptions = {},
	) {
		this.fetchImpl = options.fetchImpl ?? fetch;
		this.openBrowser = options.openBrowser ?? ((url) => open(url));
		this.now = options.now ?? Date.now;
	}

	/**
	 * Build the authorization URL
	 */
	buildAuthUrl(state: string): string {
		const params = new URLSearchParams({
			client_id: this.config.clientId,
			response_type: "code",
			redirect_uri: this.config.redirectUri,
			state,
			scope: this.config.scopes.join(" "),
		});

		return `${SPOTIFY_AUTH_URL}?${params.toString()}`;
	}

	/**
	 * POST to the token endpoint with client credentials in the Basic header
	 */
	private async requestTokens(
		body: URLSearchParams,
		action: string,
	): Promise<SpotifyTokens> {
		const basic = Buffer.from(
			`${this.config.clientId}:${this.config.clientSecret}`,
		).toString("base64");

		const response = await this.fetchImpl(SPOTIFY_TOKEN_URL, {
			method: "POST",
			headers: {
				Authorization: `Basic ${basic}`,
				"Content-Type": "application/x-www-form-urlencoded",
			},
			body: body.toString(),
		});

		if (!response.ok) {
			const error = await response.text();
			throw new Error(`${action} failed: ${response.status} - ${error}`);
		}

		const validated = safeValidate(
			TokenResponseSchema,
			await response.json(),
			"token endpoint",
		);
		if (!validated.success) {
			throw new Error(validated.message);
		}
		return validated.data;
	}

	private storeTokens(
		tokens: SpotifyTokens,
		previousRefreshToken?: string,
	): StoredCredentials {
		const refreshToken = tokens.refresh_token ?? previousRefreshToken;
		if (!refreshToken) {
			throw new Error("Token response did not include a refresh token");
		}

		const credentials: StoredCredentials = {
			client_id: this.config.clientId,
			access_token: tokens.access_token,
			refresh_token: refreshToken,
			expires_at: this.now() + tokens.expires_in * 1000,
			scope: tokens.scope ?? this.config.scopes.join(" "),
		};

		this.configService.saveCredentials(credentials);
		this.credentials = credentials;
		return credentials;
	}

	/**
	 * Exchange authorization code for tokens
	 */
	async exchangeCodeForTokens(code: string): Promise<StoredCredentials> {
		const tokens = await this.requestTokens(
			new URLSearchParams({
				grant_type: "authorization_code",
				code,
				redirect_uri: this.config.redirectUri,
			}),
			"Token exchange",
		);
		return this.storeTokens(tokens);
	}

	/**
	 * Refresh an expired access token; Spotify may omit a new refresh token
	 */
	async refreshAccessToken(refreshToken: string): Promise<StoredCredentials> {
		logger.debug("Refreshing access token");
		const tokens = await this.requestTokens(
			new URLSearchParams({
				grant_type: "refresh_token",
				refresh_token: refreshToken,
			}),
			"Token refresh",
		);
		return this.storeTokens(tokens, refreshToken);
	}

	/**
	 * Start the OAuth2 login flow
	 * Opens browser and waits for callback
	 */
	login(): Promise<StoredCredentials> {
		return new Promise((resolve, reject) => {
			const state = randomBytes(STATE_BYTES).toString("hex");

			const redirectUrl = new URL(this.config.redirectUri);
			const port = parseInt(redirectUrl.port, 10) || DEFAULT_CALLBACK_PORT;
			const callbackPath = redirectUrl.pathname;

			const timeout = setTimeout(() => {
				this.cleanup();
				reject(new Error("Authentication timed out"));
			}, AUTH_TIMEOUT_MS);

			const finish = (error: Error | null, credentials?: StoredCredentials) => {
				clearTimeout(timeout);
				this.cleanup();
				if (credentials) {
					resolve(credentials);
				} else {
					reject(error ?? new Error("Authentication failed"));
				}
			};

			this.server = createServer((req, res) => {
				const url = new URL(req.url ?? "/", `http://127.0.0.1:${port}`);

				if (url.pathname !== callbackPath) {
					res.writeHead(404);
					res.end("Not found");
					return;
				}

				const code = url.searchParams.get("code");
				const error = url.searchParams.get("error");
				res.writeHead(200, { "Content-Type": "text/html" });

				if (error) {
					res.end(resultPage(false, error));
					finish(new Error(`Authorization denied: ${error}`));
					return;
				}

				if (url.searchParams.get("state") !== state) {
					res.end(resultPage(false, "State mismatch"));
					finish(new Error("State mismatch"));
					return;
				}

				if (!code) {
					res.end(resultPage(false, "No authorization code received"));
					finish(new Error("No authorization code"));
					return;
				}

				this.exchangeCodeForTokens(code).then(
					(credentials) => {
						res.end(resultPage(true));
						finish(null, credentials);
					},
					(err: unknown) => {
						const failure = err instanceof Error ? err : new Error(String(err));
						res.end(resultPage(false, failure.message));
						finish(failure);
					},
				);
			});

			this.server.on("error", (err) => {
				finish(new Error(`Failed to start callback server: ${err.message}`));
			});

			this.server.listen(port, redirectUrl.hostname, () => {
				const authUrl = this.buildAuthUrl(state);

				console.log("\nSpotify Authentication Required\n");
				console.log("Opening your browser to login with Spotify...\n");
				console.log("If the browser doesn't open, visit this URL:\n");
				console.log(authUrl);
				console.log("\nWaiting for authentication...\n");

				this.openBrowser(authUrl).catch((err: unknown) => {
					logger.warn("Could not open browser", String(err));
					console.log(
						"(Could not open browser automatically - please open the URL above)",
					);
				});
			});
		});
	}

	/**
	 * Make sure usable credentials exist: reuse, refresh, or log in
	 */
	async ensureAuthenticated(): Promise<StoredCredentials> {
		const stored = this.configService.loadCredentials(this.config.clientId);

		if (stored && !this.isExpiring(stored)) {
			logger.debug("Using stored credentials");
			this.credentials = stored;
			return stored;
		}

		if (stored) {
			try {
				return await this.refreshAccessToken(stored.refresh_token);
			} catch (error) {
				logger.warn("Stored refresh token rejected, logging in again", String(error));
			}
		}

		return this.login();
	}

	/**
	 * Get a valid access token, refreshing if necessary
	 */
	async getValidAccessToken(): Promise<string> {
		const credentials =
			this.credentials ?? this.configService.loadCredentials(this.config.clientId);

		if (!credentials) {
			throw new Error("Not authenticated. Please login first.");
		}

		if (this.isExpiring(credentials)) {
			const refreshed = await this.refreshAccessToken(credentials.refresh_token);
			return refreshed.access_token;
		}

		this.credentials = credentials;
		return credentials.access_token;
	}

	private isExpiring(credentials: StoredCredentials): boolean {
		return credentials.expires_at <= this.now() + TOKEN_REFRESH_BUFFER_MS;
	}

	private cleanup(): void {
		if (this.server) {
			this.server.close();
			this.server = null;
		}
	}
}

function escapeHtml(text: string): string {
	return text
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;")
		.replace(/"/g, "&quot;")
		.replace(/'/g, "&#39;");
}

/**
 * Page shown in the browser after the callback
 */
function resultPage(success: boolean, error?: string): string {
	const title = success ? "Authentication Successful" : "Authentication Failed";
	const detail = success
		? "<p>You can close this window and return to the terminal.</p>"
		: `<p>Something went wrong during authentication.</p><p><code>${escapeHtml(error ?? "")}</code></p>`;

	return `<!DOCTYPE html>
<html>
<head><title>playdeck - ${title}</title></head>
<body style="font-family: sans-serif; text-align: center; padding-top: 20vh;">
  <h1 style="color: ${success ? "#1DB954" : "#e74c3c"};">${title}</h1>
  ${detail}
</body>
</html>`;
}
