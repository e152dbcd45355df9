import process from "node:process";

import cac from "cac";
import { ACTIONS, type Action, type CliCommand, type CliOptions } from "./types";

export type ParsedArgs = {
	command: CliCommand;
	help: boolean;
	version: boolean;
};

const isAction = (value: string): value is Action =>
	(ACTIONS as readonly string[]).includes(value);

const toOptionalString = (value: unknown) =>
	value === undefined || value === null || value === true || value === false
		? undefined
		: String(value);

const resolveAction = (positionals: string[]): Action => {
	if (positionals.length > 1) {
		throw new Error(`Unexpected arguments: ${positionals.slice(1).join(" ")}.`);
	}
	const [action = "fetch"] = positionals;
	if (!isAction(action)) {
		throw new Error(
			`Unknown action '${action}'. Expected one of: ${ACTIONS.join(", ")}.`,
		);
	}
	return action;
};

const buildOptions = (raw: Record<string, unknown>): CliOptions => {
	const options: CliOptions = {
		config: toOptionalString(raw.config),
		localRepo: toOptionalString(raw.localRepo),
		remoteRepo: toOptionalString(raw.remoteRepo),
		statusFile: toOptionalString(raw.statusFile),
		timeoutMs: raw.timeoutMs !== undefined ? Number(raw.timeoutMs) : undefined,
		invalidRepository: raw.abortOnInvalid ? "abort" : "skip",
		silent: Boolean(raw.silent),
		verbose: Boolean(raw.verbose),
	};

	if (
		options.timeoutMs !== undefined &&
		(!Number.isFinite(options.timeoutMs) || options.timeoutMs < 1)
	) {
		throw new Error("--timeout-ms must be a positive number.");
	}

	return options;
};

const buildCommand = (action: Action, options: CliOptions): CliCommand => {
	switch (action) {
		case "fetch":
			return { action: "fetch", options };
		case "metric":
			return { action: "metric", options };
	}
};

export const parseArgs = (argv = process.argv): ParsedArgs => {
	const cli = cac("bare-sync");

	cli
		.option("-c, --config <path>", "Path to YAML config (overrides flags)")
		.option("--local-repo <path>", "Local bare repository")
		.option("--remote-repo <url>", "Remote repository URL")
		.option("--status-file <path>", "Status file to write or read")
		.option("--timeout-ms <n>", "Timeout per git command in milliseconds")
		.option("--abort-on-invalid", "Stop at the first invalid repository")
		.option("--silent", "Suppress non-error output")
		.option("--verbose", "Print git commands and their output")
		.option("-h, --help", "Show help")
		.option("-v, --version", "Show version");

	const result = cli.parse(argv, { run: false });
	const help = Boolean(result.options.help);
	const version = Boolean(result.options.version);
	const options = buildOptions(result.options);
	const action =
		help || version ? "fetch" : resolveAction(result.args.map(String));
	return {
		command: buildCommand(action, options),
		help,
		version,
	};
};
