import type { GitRemote, GitRepository } from "#git/types";

export const ORIGIN_REMOTE = "origin";

// A stale `origin` is removed and recreated at most this many times
const MAX_RECREATE_RETRIES = 1;

export type ReconcileResult =
	| { kind: "ok"; remote: GitRemote; changed: boolean }
	| { kind: "ambiguous"; remotes: GitRemote[]; message: string }
	| { kind: "failed"; message: string };

const createOrigin = async (
	repo: GitRepository,
	desiredUrl: string,
): Promise<ReconcileResult> => {
	for (let attempt = 0; attempt <= MAX_RECREATE_RETRIES; attempt += 1) {
		const created = await repo.createRemote(ORIGIN_REMOTE, desiredUrl);
		switch (created.kind) {
			case "ok":
				return {
					kind: "ok",
					remote: { name: ORIGIN_REMOTE, url: desiredUrl },
					changed: true,
				};
			case "already-exists": {
				if (attempt === MAX_RECREATE_RETRIES) {
					return {
						kind: "failed",
						message: `Remote ${ORIGIN_REMOTE} of ${repo.path} still exists after recreating it: ${created.message}`,
					};
				}
				const removed = await repo.deleteRemote(ORIGIN_REMOTE);
				if (removed.kind !== "ok") {
					return { kind: "failed", message: removed.message };
				}
				break;
			}
			case "not-a-repository":
			case "unreachable":
			case "failed":
				return { kind: "failed", message: created.message };
		}
	}
	return {
		kind: "failed",
		message: `Unable to create remote ${ORIGIN_REMOTE} for ${repo.path}.`,
	};
};

/**
 * Make `repo` carry exactly one remote pointing at `desiredUrl`.
 *
 * A repository that already has that single remote is left alone. More than
 * one remote is never touched: the caller gets `ambiguous` and has to sort it
 * out by hand. Nothing is rolled back when a later step fails.
 */
export const reconcileRemote = async (
	repo: GitRepository,
	desiredUrl: string,
): Promise<ReconcileResult> => {
	const listed = await repo.listRemotes();
	if (listed.kind !== "ok") {
		return { kind: "failed", message: listed.message };
	}
	const remotes = listed.value;
	if (remotes.length > 1) {
		return {
			kind: "ambiguous",
			remotes,
			message: `Unexpected amount of remotes (${remotes.length}) in repository ${repo.path}. You need to solve the conflict on your own.`,
		};
	}

	const [current] = remotes;
	if (current?.url === desiredUrl) {
		return { kind: "ok", remote: current, changed: false };
	}

	// A sole remote under another name would survive next to the new origin
	if (current && current.name !== ORIGIN_REMOTE) {
		const removed = await repo.deleteRemote(current.name);
		if (removed.kind !== "ok") {
			return { kind: "failed", message: removed.message };
		}
	}

	return createOrigin(repo, desiredUrl);
};
