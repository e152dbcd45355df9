import { ExecaError, execa } from "execa";

import { buildGitEnv, resolveGitCommand } from "#git/git-env";
import type { GitOutcome } from "#git/types";

export const DEFAULT_TIMEOUT_MS = 120000; // 120 seconds (2 minutes)

export type GitLogger = (message: string) => void;

export type GitExecOptions = {
	cwd?: string;
	timeoutMs?: number;
	env?: NodeJS.ProcessEnv;
	cancelSignal?: AbortSignal;
	logger?: GitLogger;
};

const forwardOutput = (
	streams: Array<NodeJS.ReadableStream | null | undefined>,
	commandLabel: string,
	logger?: GitLogger,
) => {
	if (!logger) {
		return;
	}
	for (const stream of streams) {
		if (!stream) continue;
		stream.on("data", (chunk: unknown) => {
			const text =
				chunk instanceof Buffer ? chunk.toString("utf8") : String(chunk);
			for (const line of text.split(/\r?\n/)) {
				if (!line) continue;
				logger(`${commandLabel} | ${line}`);
			}
		});
	}
};

export const describeGitError = (
	error: ExecaError,
	commandLabel: string,
	timeoutMs: number,
) => {
	if (error.timedOut) {
		return `${commandLabel} timed out after ${timeoutMs}ms.`;
	}
	if (error.isCanceled) {
		return `${commandLabel} was cancelled.`;
	}
	const stderr = typeof error.stderr === "string" ? error.stderr.trim() : "";
	return stderr || error.shortMessage;
};

/**
 * Run git and capture stdout. A non-zero exit, a timeout or a missing git
 * binary come back as a `failed` outcome with the git error text.
 */
export const runGit = async (
	args: string[],
	options: GitExecOptions = {},
): Promise<GitOutcome<string>> => {
	const command = resolveGitCommand();
	const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
	const commandLabel = `git ${args.join(" ")}`;
	options.logger?.(commandLabel);
	try {
		const subprocess = execa(command, args, {
			cwd: options.cwd,
			timeout: timeoutMs,
			maxBuffer: 10 * 1024 * 1024,
			stdout: "pipe",
			stderr: "pipe",
			env: buildGitEnv(options.env),
			cancelSignal: options.cancelSignal,
		});
		forwardOutput(
			[subprocess.stdout, subprocess.stderr],
			commandLabel,
			options.logger,
		);
		const result = await subprocess;
		return { kind: "ok", value: result.stdout };
	} catch (error) {
		if (error instanceof ExecaError) {
			return {
				kind: "failed",
				message: describeGitError(error, commandLabel, timeoutMs),
			};
		}
		throw error;
	}
};
