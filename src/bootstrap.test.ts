import { describe, expect, it, vi } from "vitest";
import { bootstrap } from "./bootstrap";
import { TOKENS } from "./container";
import type { IAuthenticator } from "./interfaces";
import { ErrorHandler } from "./services/ErrorHandler";
import { MemoryTerminal } from "./testing/fakes";
import type { StoredCredentials } from "./types/spotify";

const env = {
	SPOTIFY_CLIENT_ID: "test-client",
	SPOTIFY_CLIENT_SECRET: "test-secret",
};

const credentials: StoredCredentials = {
	client_id: "test-client",
	access_token: "test-access",
	refresh_token: "test-refresh",
	expires_at: Number.MAX_SAFE_INTEGER,
	scope: "",
};

function setup() {
	const terminal = new MemoryTerminal();
	const exit = vi.fn((_code: number) => {});
	const errors = new ErrorHandler(terminal, exit);
	return { terminal, exit, errors };
}

function fakeAuth(ensureAuthenticated: () => Promise<StoredCredentials>): IAuthenticator {
	return {
		ensureAuthenticated: vi.fn(ensureAuthenticated),
		getValidAccessToken: async () => "test-access",
	};
}

describe("bootstrap", () => {
	it("exits with status 1 and lists the variables when credentials are missing", async () => {
		const { terminal, exit, errors } = setup();

		const ctx = await bootstrap({ env: {}, terminal, errors });

		expect(ctx).toBeNull();
		expect(exit).toHaveBeenCalledWith(1);
		expect(terminal.output).toEqual([
			"Error: Spotify credentials not configured!",
			"Please set the following environment variables:",
			"  - SPOTIFY_CLIENT_ID",
			"  - SPOTIFY_CLIENT_SECRET",
			"  - SPOTIFY_REDIRECT_URI (optional, default: http://127.0.0.1:8888/callback)",
		]);
	});

	it("names an invalid redirect URI under its own heading", async () => {
		const { terminal, exit, errors } = setup();

		await bootstrap({
			env: { ...env, SPOTIFY_REDIRECT_URI: "not a url" },
			terminal,
			errors,
		});

		expect(exit).toHaveBeenCalledWith(1);
		expect(terminal.output.slice(0, 2)).toEqual([
			"Error: Spotify configuration is invalid!",
			"SPOTIFY_REDIRECT_URI: Invalid url",
		]);
	});

	it("signs in and hands back a context", async () => {
		const { terminal, exit, errors } = setup();
		const auth = fakeAuth(async () => credentials);

		const ctx = await bootstrap({
			env,
			terminal,
			errors,
			configure: (container) => container.singleton(TOKENS.Auth, () => auth),
		});

		expect(auth.ensureAuthenticated).toHaveBeenCalledTimes(1);
		expect(exit).not.toHaveBeenCalled();
		expect(ctx?.terminal).toBe(terminal);
		expect(ctx?.errors).toBe(errors);
		expect(typeof ctx?.client.getCurrentPlayback).toBe("function");
	});

	it("exits with status 1 when sign-in fails", async () => {
		const { terminal, exit, errors } = setup();

		const ctx = await bootstrap({
			env,
			terminal,
			errors,
			configure: (container) =>
				container.singleton(TOKENS.Auth, () =>
					fakeAuth(async () => {
						throw new Error("Authorization denied: access_denied");
					}),
				),
		});

		expect(ctx).toBeNull();
		expect(exit).toHaveBeenCalledWith(1);
		expect(terminal.output).toEqual([
			"Error authenticating with Spotify: Authorization denied: access_denied",
		]);
	});
});
