import path from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
	resolve: {
		alias: [
			{ find: /^#cli\/(.*)$/, replacement: path.resolve("src/cli/$1") },
			{
				find: /^#commands\/(.*)$/,
				replacement: path.resolve("src/commands/$1"),
			},
			{ find: /^#config\/(.*)$/, replacement: path.resolve("src/config/$1") },
			{ find: /^#config$/, replacement: path.resolve("src/config/index") },
			{ find: /^#core\/(.*)$/, replacement: path.resolve("src/$1") },
			{ find: /^#git\/(.*)$/, replacement: path.resolve("src/git/$1") },
		],
	},
	test: {
		environment: "node",
		include: ["tests/**/*.test.ts"],
		restoreMocks: true,
	},
});
