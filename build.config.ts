import path from "node:path";
import { defineBuildConfig } from "unbuild";

export default defineBuildConfig({
	entries: [
		{ input: "src/cli/index", name: "cli" },
		{ input: "src/index", name: "index" },
	],
	declaration: true,
	clean: true,
	sourcemap: true,
	rollup: {
		emitCJS: false,
		alias: {
			entries: [
				{
					find: /^#cli\/(.*)$/,
					replacement: path.resolve("src/cli/$1"),
				},
				{
					find: /^#commands\/(.*)$/,
					replacement: path.resolve("src/commands/$1"),
				},
				{
					find: /^#config\/(.*)$/,
					replacement: path.resolve("src/config/$1"),
				},
				{
					find: "#config",
					replacement: path.resolve("src/config/index"),
				},
				{
					find: /^#core\/(.*)$/,
					replacement: path.resolve("src/$1"),
				},
				{
					find: /^#git\/(.*)$/,
					replacement: path.resolve("src/git/$1"),
				},
			],
		},
		esbuild: {
			minify: true,
		},
	},
});
