import type { GitFailure, GitRemote } from "#git/types";

const REMOTE_LINE_RE = /^(\S+)\s+(.+?)\s+\((fetch|push)\)$/;

const ALREADY_EXISTS_RE = /remote \S+ already exists/i;

// Auth failures and missing repositories keep their own git error text
const UNREACHABLE_PATTERNS = [
	"Could not read from remote repository",
	"Could not resolve host",
];

/**
 * Parse `git remote -v` output into remotes with their fetch URL, in the
 * order git lists them.
 */
export const parseRemoteList = (stdout: string): GitRemote[] => {
	const remotes = new Map<string, string>();
	for (const line of stdout.split(/\r?\n/)) {
		const match = line.trim().match(REMOTE_LINE_RE);
		if (!match) continue;
		const [, name, url, direction] = match;
		if (direction === "fetch" && !remotes.has(name)) {
			remotes.set(name, url);
		}
	}
	return Array.from(remotes, ([name, url]) => ({ name, url }));
};

export const isAlreadyExistsError = (message: string) =>
	ALREADY_EXISTS_RE.test(message);

export const isUnreachableError = (message: string) =>
	UNREACHABLE_PATTERNS.some((pattern) => message.includes(pattern));

export const classifyCreateFailure = (message: string): GitFailure =>
	isAlreadyExistsError(message)
		? { kind: "already-exists", message }
		: { kind: "failed", message };

export const classifyFetchFailure = (message: string): GitFailure =>
	isUnreachableError(message)
		? { kind: "unreachable", message }
		: { kind: "failed", message };
