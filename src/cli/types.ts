import type { InvalidRepositoryPolicy } from "../batch";

export const ACTIONS = ["fetch", "metric"] as const;

export type Action = (typeof ACTIONS)[number];

export type CliOptions = {
	config?: string;
	localRepo?: string;
	remoteRepo?: string;
	statusFile?: string;
	timeoutMs?: number;
	invalidRepository: InvalidRepositoryPolicy;
	silent: boolean;
	verbose: boolean;
};

export type CliCommand =
	| { action: "fetch"; options: CliOptions }
	| { action: "metric"; options: CliOptions };
