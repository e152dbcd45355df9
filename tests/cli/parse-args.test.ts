import { describe, expect, it } from "vitest";

import { parseArgs } from "../../src/cli/parse-args";

const argv = (...args: string[]) => ["node", "bare-sync", ...args];

describe("parseArgs", () => {
	it("defaults to the fetch action", () => {
		const parsed = parseArgs(
			argv("--local-repo", "/srv/app.git", "--remote-repo", "git@host:app.git"),
		);

		expect(parsed.command.action).toBe("fetch");
		expect(parsed.command.options).toEqual({
			config: undefined,
			localRepo: "/srv/app.git",
			remoteRepo: "git@host:app.git",
			statusFile: undefined,
			timeoutMs: undefined,
			invalidRepository: "skip",
			silent: false,
			verbose: false,
		});
	});

	it("reads the metric action and the status file", () => {
		const parsed = parseArgs(argv("metric", "--status-file", "status.json"));

		expect(parsed.command.action).toBe("metric");
		expect(parsed.command.options.statusFile).toBe("status.json");
	});

	it("accepts the short config flag", () => {
		expect(parseArgs(argv("-c", "sync.yml")).command.options.config).toBe(
			"sync.yml",
		);
	});

	it("maps --abort-on-invalid to the abort policy", () => {
		expect(
			parseArgs(argv("--abort-on-invalid")).command.options.invalidRepository,
		).toBe("abort");
	});

	it("parses the timeout as a number", () => {
		expect(parseArgs(argv("--timeout-ms", "5000")).command.options.timeoutMs).toBe(
			5000,
		);
	});

	it("rejects an invalid timeout", () => {
		expect(() => parseArgs(argv("--timeout-ms", "0"))).toThrow(
			"--timeout-ms must be a positive number.",
		);
	});

	it("rejects unknown actions", () => {
		expect(() => parseArgs(argv("push"))).toThrow(
			"Unknown action 'push'. Expected one of: fetch, metric.",
		);
	});

	it("rejects extra positionals", () => {
		expect(() => parseArgs(argv("fetch", "extra"))).toThrow(
			"Unexpected arguments: extra.",
		);
	});

	it("returns only the command and the help and version flags", () => {
		expect(Object.keys(parseArgs(argv("metric"))).sort()).toEqual([
			"command",
			"help",
			"version",
		]);
	});

	it("flags help without validating the action", () => {
		const parsed = parseArgs(argv("bogus", "--help"));

		expect(parsed.help).toBe(true);
	});
});
