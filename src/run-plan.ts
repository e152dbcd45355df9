import path from "node:path";

import type { Action, CliOptions } from "./cli/types";
import { loadConfig } from "#config";
import { isDirectory } from "./paths";
import type { RepoTarget } from "./repo-target";

export type RunPlan = {
	source: "config" | "cli";
	targets: RepoTarget[];
	remotePrefix?: string;
	statusFile?: string;
};

const resolveCliPlan = async (
	action: Action,
	options: CliOptions,
): Promise<RunPlan> => {
	const statusFile = options.statusFile
		? path.resolve(options.statusFile)
		: undefined;
	if (action === "metric") {
		if (!statusFile) {
			throw new Error(
				"Needs --status-file when run without a configuration file and action 'metric'.",
			);
		}
		return { source: "cli", targets: [], statusFile };
	}
	if (!options.localRepo || !options.remoteRepo) {
		throw new Error(
			"Needs --local-repo and --remote-repo when run without a configuration file.",
		);
	}
	const localPath = path.resolve(options.localRepo);
	if (!(await isDirectory(localPath))) {
		throw new Error(
			`Directory not found or permission denied for git repository: ${localPath}`,
		);
	}
	return {
		source: "cli",
		targets: [{ localPath, remoteUrl: options.remoteRepo }],
		statusFile,
	};
};

/**
 * Resolve what a run works on. A config file wins over every other flag and
 * is validated completely, even for `metric`.
 */
export const resolveRunPlan = async (
	action: Action,
	options: CliOptions,
): Promise<RunPlan> => {
	if (!options.config) {
		return resolveCliPlan(action, options);
	}
	const config = await loadConfig(options.config);
	return {
		source: "config",
		targets: config.targets,
		remotePrefix: config.remotePrefix,
		statusFile: config.statusFile,
	};
};
