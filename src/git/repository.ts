import path from "node:path";

import { type GitLogger, runGit } from "#git/exec";
import {
	classifyCreateFailure,
	classifyFetchFailure,
	parseRemoteList,
} from "#git/remotes";
import type {
	FetchRefsOptions,
	GitClient,
	GitOutcome,
	GitRemote,
	GitRepository,
} from "#git/types";

export type GitClientOptions = {
	timeoutMs?: number;
	logger?: GitLogger;
};

const createRepositoryHandle = (
	repoPath: string,
	options: GitClientOptions,
): GitRepository => {
	const controller = new AbortController();
	const git = (args: string[]) =>
		runGit(["-C", repoPath, ...args], {
			timeoutMs: options.timeoutMs,
			logger: options.logger,
			cancelSignal: controller.signal,
		});

	return {
		path: repoPath,
		listRemotes: async (): Promise<GitOutcome<GitRemote[]>> => {
			const result = await git(["remote", "-v"]);
			if (result.kind !== "ok") {
				return result;
			}
			return { kind: "ok", value: parseRemoteList(result.value) };
		},
		createRemote: async (name: string, url: string): Promise<GitOutcome> => {
			const result = await git(["remote", "add", name, url]);
			if (result.kind !== "ok") {
				return classifyCreateFailure(result.message);
			}
			return { kind: "ok", value: undefined };
		},
		deleteRemote: async (name: string): Promise<GitOutcome> => {
			const result = await git(["remote", "remove", name]);
			if (result.kind !== "ok") {
				return result;
			}
			return { kind: "ok", value: undefined };
		},
		fetch: async (
			remote: string,
			refspec: string,
			fetchOptions: FetchRefsOptions,
		): Promise<GitOutcome> => {
			const args = ["fetch", ...(fetchOptions.prune ? ["--prune"] : [])];
			const result = await git([...args, remote, refspec]);
			if (result.kind !== "ok") {
				return classifyFetchFailure(result.message);
			}
			return { kind: "ok", value: undefined };
		},
		close: async () => {
			controller.abort();
		},
	};
};

/**
 * Open the repository at `repoPath`. Discovery is capped at the parent
 * directory, so a plain directory nested inside another repository is
 * reported as `not-a-repository`.
 */
export const openRepository = async (
	repoPath: string,
	options: GitClientOptions = {},
): Promise<GitOutcome<GitRepository>> => {
	const resolvedPath = path.resolve(repoPath);
	const probe = await runGit(["-C", resolvedPath, "rev-parse", "--git-dir"], {
		timeoutMs: options.timeoutMs,
		logger: options.logger,
		env: { GIT_CEILING_DIRECTORIES: path.dirname(resolvedPath) },
	});
	if (probe.kind !== "ok") {
		return { kind: "not-a-repository", message: probe.message };
	}
	return {
		kind: "ok",
		value: createRepositoryHandle(resolvedPath, options),
	};
};

export const createGitClient = (options: GitClientOptions = {}): GitClient => ({
	open: (repoPath: string) => openRepository(repoPath, options),
});
