import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const root = fileURLToPath(new URL(".", import.meta.url));

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
			flowcheck: resolve(root, "./packages/core/src/index.ts"),
			"@flowcheck/adapter-kafka": resolve(root, "./packages/adapter-kafka/src/index.ts"),
		},
	},
});
