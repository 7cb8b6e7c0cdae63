import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["src/**/*.test.ts"],
		environment: "node",
		env: {
			PLAYDECK_LOG_FILE: "false",
			PLAYDECK_LOG_CONSOLE: "false",
		},
	},
});
