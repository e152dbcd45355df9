import pc from "picocolors";

import {
	type BatchDeps,
	type BatchResult,
	type InvalidRepositoryPolicy,
	runBatch,
} from "#core/batch";
import { symbols, ui } from "#cli/ui";
import { getErrorMessage } from "#core/errors";
import { redactRepoUrl } from "#git/redact";
import { createGitClient } from "#git/repository";
import type { RunPlan } from "#core/run-plan";
import { writeStatusFile } from "#core/status-file";

export type FetchCommandOptions = {
	plan: RunPlan;
	invalidRepository: InvalidRepositoryPolicy;
	timeoutMs?: number;
	verbose: boolean;
};

export type FetchCommandDeps = Partial<BatchDeps> & {
	writeStatusFile?: typeof writeStatusFile;
};

export type FetchCommandResult = BatchResult & {
	statusFile: string | null;
	statusWritten: boolean;
};

const STATUS_LABELS = {
	"invalid-repository": "invalid repository",
	"reconcile-failed": "remote not configured",
	"fetch-failed": "fetch failed",
} as const;

export const runFetch = async (
	options: FetchCommandOptions,
	deps: FetchCommandDeps = {},
): Promise<FetchCommandResult> => {
	const git =
		deps.git ??
		createGitClient({
			timeoutMs: options.timeoutMs,
			logger: options.verbose ? ui.debug : undefined,
		});
	const result = await runBatch(
		{
			targets: options.plan.targets,
			remotePrefix: options.plan.remotePrefix,
			invalidRepository: options.invalidRepository,
			hooks: {
				onStart: (target) =>
					ui.step("Fetching", target.label, redactRepoUrl(target.remoteUrl)),
				onResult: (entry) => {
					if (entry.status === "synced") {
						ui.item(symbols.success, entry.label);
						return;
					}
					ui.item(symbols.error, entry.label, STATUS_LABELS[entry.status]);
				},
				onDiagnostic: ui.error,
			},
		},
		{ ...deps, git },
	);

	const statusFile = options.plan.statusFile ?? null;
	let statusWritten = false;
	if (statusFile) {
		const write = deps.writeStatusFile ?? writeStatusFile;
		try {
			await write(statusFile, result.report);
			statusWritten = true;
		} catch (error) {
			// Write failures do not change the exit code
			ui.error(getErrorMessage(error));
		}
	}
	return { ...result, statusFile, statusWritten };
};

export const printFetchSummary = (result: FetchCommandResult) => {
	const synced = result.results.filter(
		(entry) => entry.status === "synced",
	).length;
	const total = result.results.length;
	const icon = synced === total ? symbols.success : symbols.warn;
	ui.line(
		`${icon} Synced ${synced} of ${total} repositor${total === 1 ? "y" : "ies"}`,
	);
	if (result.aborted) {
		ui.line(`${symbols.warn} Stopped at the first invalid repository`);
	}
	if (result.statusFile && result.statusWritten) {
		ui.line(`${symbols.info} Wrote ${pc.gray(ui.path(result.statusFile))}`);
	}
};
