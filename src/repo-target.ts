import path from "node:path";

export type RepoTarget = {
	/** Absolute path of the local bare repository. */
	localPath: string;
	/** Full remote URL, or the per-entry suffix when a shared prefix applies. */
	remoteUrl: string;
};

export const resolveRemoteUrl = (remoteUrl: string, prefix?: string) =>
	prefix ? `${prefix}${remoteUrl}` : remoteUrl;

/**
 * Status key for a repository: base directory name plus everything after the
 * last ':' of the remote URL, so local paths stay out of the status file.
 */
export const buildStatusLabel = (localPath: string, remoteUrl: string) => {
	const suffix = remoteUrl.slice(remoteUrl.lastIndexOf(":") + 1);
	return `${path.basename(localPath)}:${suffix}`;
};

/**
 * Later entries for the same path replace the URL but keep the first
 * position.
 */
export const dedupeTargets = (targets: RepoTarget[]): RepoTarget[] => {
	const byPath = new Map<string, string>();
	for (const target of targets) {
		byPath.set(target.localPath, target.remoteUrl);
	}
	return Array.from(byPath, ([localPath, remoteUrl]) => ({
		localPath,
		remoteUrl,
	}));
};
