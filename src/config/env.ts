/**
 * Startup configuration read from the environment (and `.env`, loaded in index.ts)
 */

import { z } from "zod";
import { DEFAULT_REDIRECT_URI, ENV_VARS } from "./constants";

export interface AppConfig {
	clientId: string;
	clientSecret: string;
	redirectUri: string;
}

export type AppConfigResult =
	| { ok: true; config: AppConfig }
	| { ok: false; reason: "missing" }
	| { ok: false; reason: "invalid"; issues: string[] };

// Blank values count as unset
const optionalString = z
	.string()
	.trim()
	.optional()
	.transform((value) => (value ? value : undefined));

const EnvSchema = z.object({
	[ENV_VARS.CLIENT_ID]: optionalString,
	[ENV_VARS.CLIENT_SECRET]: optionalString,
	[ENV_VARS.REDIRECT_URI]: optionalString.pipe(z.string().url().optional()),
});

export function loadAppConfig(
	env: NodeJS.ProcessEnv = process.env,
): AppConfigResult {
	const parsed = EnvSchema.safeParse(env);
	if (!parsed.success) {
		return {
			ok: false,
			reason: "invalid",
			issues: parsed.error.issues.map(
				(issue) => `${issue.path.join(".")}: ${issue.message}`,
			),
		};
	}

	const values = parsed.data;
	const clientId = values[ENV_VARS.CLIENT_ID];
	const clientSecret = values[ENV_VARS.CLIENT_SECRET];

	if (!clientId || !clientSecret) {
		return { ok: false, reason: "missing" };
	}

	return {
		ok: true,
		config: {
			clientId,
			clientSecret,
			redirectUri: values[ENV_VARS.REDIRECT_URI] ?? DEFAULT_REDIRECT_URI,
		},
	};
}

/**
 * Lines printed when startup configuration is unusable
 */
export function describeRequiredEnv(): string[] {
	return [
		"Please set the following environment variables:",
		`  - ${ENV_VARS.CLIENT_ID}`,
		`  - ${ENV_VARS.CLIENT_SECRET}`,
		`  - ${ENV_VARS.REDIRECT_URI} (optional, default: ${DEFAULT_REDIRECT_URI})`,
	];
}
