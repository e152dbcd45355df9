export {
	type BatchDeps,
	type BatchHooks,
	type BatchResult,
	type EntryResult,
	type EntryStatus,
	type FetchOutcome,
	type InvalidRepositoryPolicy,
	type RunBatchParams,
	recordOutcome,
	runBatch,
	type StatusMap,
	type StatusReport,
} from "./batch";
export {
	type BareSyncConfig,
	loadConfig,
	type ResolvedConfig,
	validateConfig,
} from "./config/index";
export {
	type FetchRemoteResult,
	fetchRemote,
	MIRROR_REFSPEC,
} from "./fetch-remote";
export {
	createGitClient,
	type GitClientOptions,
	openRepository,
} from "./git/repository";
export type {
	GitClient,
	GitFailure,
	GitOutcome,
	GitRemote,
	GitRepository,
} from "./git/types";
export {
	ORIGIN_REMOTE,
	type ReconcileResult,
	reconcileRemote,
} from "./reconcile";
export {
	buildStatusLabel,
	type RepoTarget,
	resolveRemoteUrl,
} from "./repo-target";
export { readStatusFile, writeStatusFile } from "./status-file";
