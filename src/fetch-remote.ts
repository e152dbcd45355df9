import { redactRepoUrl } from "#git/redact";
import type { GitRemote, GitRepository } from "#git/types";

// Force-update every branch and drop the ones deleted upstream
export const MIRROR_REFSPEC = "+refs/heads/*:refs/heads/*";

export type FetchRemoteResult =
	| { kind: "ok" }
	| { kind: "failed"; message: string };

export const fetchRemote = async (
	repo: GitRepository,
	remote: GitRemote,
): Promise<FetchRemoteResult> => {
	const fetched = await repo.fetch(remote.name, MIRROR_REFSPEC, {
		prune: true,
	});
	switch (fetched.kind) {
		case "ok":
			return { kind: "ok" };
		case "unreachable":
			return {
				kind: "failed",
				message: `Could not read from remote repository: ${redactRepoUrl(remote.url)}`,
			};
		case "already-exists":
		case "not-a-repository":
		case "failed":
			return { kind: "failed", message: fetched.message };
	}
};
