import process from "node:process";

import type { FetchCommandDeps } from "#commands/fetch";
import { getErrorMessage } from "#core/errors";
import { ExitCode } from "./exit-code";
import { parseArgs } from "./parse-args";
import type { CliCommand } from "./types";
import { setSilentMode, ui } from "./ui";

export const CLI_NAME = "bare-sync";

const HELP_TEXT = `
Usage: ${CLI_NAME} [fetch|metric] [options]

Actions:
  fetch   Point each bare repository at its remote and mirror its branches (default)
  metric  Print the status file written by the last fetch

Options:
  -c, --config <path>    YAML config; the flags below are ignored
  --local-repo <path>    Local bare repository (without --config)
  --remote-repo <url>    Remote repository URL (without --config)
  --status-file <path>   Status file to write or read (without --config)
  --timeout-ms <n>       Timeout per git command in milliseconds
  --abort-on-invalid     Stop at the first invalid repository
  --silent               Suppress non-error output
  --verbose              Print git commands and their output
  -h, --help             Show help
  -v, --version          Show version
`;

const printHelp = () => {
	process.stdout.write(HELP_TEXT.trimStart());
};

const runCommand = async (command: CliCommand, deps: FetchCommandDeps) => {
	const { resolveRunPlan } = await import("#core/run-plan");
	const plan = await resolveRunPlan(command.action, command.options);
	if (command.action === "metric") {
		const { runMetric } = await import("#commands/metric");
		if (!plan.statusFile) {
			throw new Error("No status file configured.");
		}
		await runMetric({ statusFile: plan.statusFile });
		return;
	}
	const { printFetchSummary, runFetch } = await import("#commands/fetch");
	const result = await runFetch(
		{
			plan,
			invalidRepository: command.options.invalidRepository,
			timeoutMs: command.options.timeoutMs,
			verbose: command.options.verbose,
		},
		deps,
	);
	printFetchSummary(result);
};

/**
 * Run the CLI against `argv` and resolve with the exit code. Every error is
 * printed on stderr and maps to `ExitCode.FatalError`.
 */
export const run = async (
	argv: string[] = process.argv,
	deps: FetchCommandDeps = {},
): Promise<ExitCode> => {
	try {
		const parsed = parseArgs(argv);
		setSilentMode(parsed.command.options.silent);

		if (parsed.help) {
			printHelp();
			return ExitCode.Success;
		}
		if (parsed.version) {
			const { loadToolVersion } = await import("#core/version");
			process.stdout.write(`${await loadToolVersion()}\n`);
			return ExitCode.Success;
		}

		await runCommand(parsed.command, deps);
		return ExitCode.Success;
	} catch (error) {
		ui.error(getErrorMessage(error));
		return ExitCode.FatalError;
	}
};

/**
 * The main entry point of the CLI
 */
export async function main(): Promise<void> {
	process.on("uncaughtException", errorHandler);
	process.on("unhandledRejection", errorHandler);
	process.exitCode = await run(process.argv);
}

function errorHandler(error: unknown): void {
	ui.error(getErrorMessage(error));
	process.exit(ExitCode.FatalError);
}
