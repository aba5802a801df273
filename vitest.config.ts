import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		watch: false,
		fileParallelism: true,
		include: ["tests/**/*.test.ts"],
		exclude: ["node_modules"],
		setupFiles: ["./tests/setup.ts"],
	},
	resolve: {
		alias: {
			"httpdouble": fileURLToPath(new URL("./packages/core/src", import.meta.url)),
			"@httpdouble/protocol-ws": fileURLToPath(new URL("./packages/protocol-ws/src", import.meta.url)),
		},
	},
});
