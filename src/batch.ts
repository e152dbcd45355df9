import { fetchRemote } from "./fetch-remote";
import { redactRepoUrl } from "./git/redact";
import type { GitClient } from "./git/types";
import { reconcileRemote } from "./reconcile";
import {
	buildStatusLabel,
	type RepoTarget,
	resolveRemoteUrl,
} from "./repo-target";

export type InvalidRepositoryPolicy = "skip" | "abort";

export type FetchOutcome = 0 | 1;

export type StatusMap = Record<string, FetchOutcome>;

export type StatusReport = {
	updated_at: number;
	statuses: StatusMap;
};

export type EntryStatus =
	| "synced"
	| "invalid-repository"
	| "reconcile-failed"
	| "fetch-failed";

export type EntryResult = {
	label: string;
	localPath: string;
	remoteUrl: string;
	status: EntryStatus;
	message?: string;
};

export type BatchHooks = {
	onStart?: (target: RepoTarget & { label: string }) => void;
	onResult?: (result: EntryResult) => void;
	onDiagnostic?: (message: string) => void;
};

export type RunBatchParams = {
	targets: RepoTarget[];
	/** Prepended to every target URL (config mode). */
	remotePrefix?: string;
	invalidRepository?: InvalidRepositoryPolicy;
	hooks?: BatchHooks;
};

export type BatchDeps = {
	git: GitClient;
	reconcileRemote?: typeof reconcileRemote;
	fetchRemote?: typeof fetchRemote;
	now?: () => number;
};

export type BatchResult = {
	report: StatusReport;
	results: EntryResult[];
	aborted: boolean;
};

const unixSeconds = () => Math.floor(Date.now() / 1000);

export const recordOutcome = (statuses: StatusMap, result: EntryResult) => {
	statuses[result.label] = result.status === "synced" ? 1 : 0;
};

const processTarget = async (
	target: RepoTarget,
	label: string,
	deps: BatchDeps,
	hooks: BatchHooks,
): Promise<EntryResult> => {
	const base = {
		label,
		localPath: target.localPath,
		remoteUrl: target.remoteUrl,
	};
	const opened = await deps.git.open(target.localPath);
	if (opened.kind !== "ok") {
		const message = `Invalid repository ${target.localPath}`;
		hooks.onDiagnostic?.(message);
		return { ...base, status: "invalid-repository", message };
	}

	const repo = opened.value;
	try {
		const reconcile = deps.reconcileRemote ?? reconcileRemote;
		const reconciled = await reconcile(repo, target.remoteUrl);
		if (reconciled.kind !== "ok") {
			hooks.onDiagnostic?.(reconciled.message);
			hooks.onDiagnostic?.(
				`Failed while creating remote for repository ${redactRepoUrl(target.remoteUrl)}. Skipping`,
			);
			return {
				...base,
				status: "reconcile-failed",
				message: reconciled.message,
			};
		}

		const fetch = deps.fetchRemote ?? fetchRemote;
		const fetched = await fetch(repo, reconciled.remote);
		if (fetched.kind !== "ok") {
			hooks.onDiagnostic?.(fetched.message);
			return { ...base, status: "fetch-failed", message: fetched.message };
		}
		return { ...base, status: "synced" };
	} finally {
		await repo.close();
	}
};

/**
 * Reconcile and fetch every target in order, one at a time.
 *
 * A failure only marks its own entry. An invalid repository is recorded as
 * failed and skipped, unless `invalidRepository` is `abort`, in which case the
 * remaining targets are left untouched and unrecorded. When two repositories
 * map to the same status label the later outcome wins.
 */
export const runBatch = async (
	params: RunBatchParams,
	deps: BatchDeps,
): Promise<BatchResult> => {
	const hooks = params.hooks ?? {};
	const policy = params.invalidRepository ?? "skip";
	const statuses: StatusMap = {};
	const results: EntryResult[] = [];
	const labelOwners = new Map<string, string>();
	let aborted = false;

	for (const entry of params.targets) {
		const target = {
			localPath: entry.localPath,
			remoteUrl: resolveRemoteUrl(entry.remoteUrl, params.remotePrefix),
		};
		const label = buildStatusLabel(target.localPath, target.remoteUrl);
		hooks.onStart?.({ ...target, label });
		const result = await processTarget(target, label, deps, hooks);
		if (result.status === "invalid-repository" && policy === "abort") {
			aborted = true;
			break;
		}
		const owner = labelOwners.get(label);
		if (owner !== undefined && owner !== target.localPath) {
			hooks.onDiagnostic?.(
				`Repositories ${owner} and ${target.localPath} share the status label '${label}'. Keeping the outcome of ${target.localPath}.`,
			);
		}
		labelOwners.set(label, target.localPath);
		recordOutcome(statuses, result);
		results.push(result);
		hooks.onResult?.(result);
	}

	const now = deps.now ?? unixSeconds;
	return {
		report: { updated_at: now(), statuses },
		results,
		aborted,
	};
};
