export type GitRemote = {
	name: string;
	url: string;
};

export type GitFailureKind =
	| "not-a-repository"
	| "already-exists"
	| "unreachable"
	| "failed";

export type GitFailure = {
	kind: GitFailureKind;
	message: string;
};

/**
 * Result of a single git call. Failures carry the raw git error text.
 */
export type GitOutcome<T = undefined> = { kind: "ok"; value: T } | GitFailure;

export type FetchRefsOptions = {
	prune: boolean;
};

export interface GitRepository {
	readonly path: string;
	listRemotes(): Promise<GitOutcome<GitRemote[]>>;
	createRemote(name: string, url: string): Promise<GitOutcome>;
	deleteRemote(name: string): Promise<GitOutcome>;
	fetch(
		remote: string,
		refspec: string,
		options: FetchRefsOptions,
	): Promise<GitOutcome>;
	/** Releases the handle and cancels any git process still running for it. */
	close(): Promise<void>;
}

export interface GitClient {
	open(repoPath: string): Promise<GitOutcome<GitRepository>>;
}
