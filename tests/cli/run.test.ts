import { access, mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { run } from "../../src/cli/index";
import { createFakeGitClient, createFakeRepoState } from "../helpers/fake-git";

const argv = (...args: string[]) => ["node", "bare-sync", ...args];

const exists = async (target: string) => {
	try {
		await access(target);
		return true;
	} catch {
		return false;
	}
};

describe("run", () => {
	let dir: string;
	let stdout: string[];
	let stderr: string[];

	beforeEach(async () => {
		dir = await mkdtemp(path.join(tmpdir(), "bare-sync-cli-"));
		stdout = [];
		stderr = [];
		vi.spyOn(process.stdout, "write").mockImplementation((chunk) => {
			stdout.push(String(chunk));
			return true;
		});
		vi.spyOn(process.stderr, "write").mockImplementation((chunk) => {
			stderr.push(String(chunk));
			return true;
		});
	});

	afterEach(async () => {
		vi.restoreAllMocks();
		await rm(dir, { recursive: true, force: true });
	});

	it("fetches every configured repository and writes the status file", async () => {
		const repoPath = path.join(dir, "r", "team", "app");
		await mkdir(repoPath, { recursive: true });
		const configPath = path.join(dir, "sync.yml");
		await writeFile(
			configPath,
			[
				`repo_root: ${path.join(dir, "r")}`,
				"remote_user: git",
				"remote_server: host",
				"repos:",
				"  team:",
				"    - app: team/app.git",
				"metrics: status.json",
				"",
			].join("\n"),
			"utf8",
		);
		const app = createFakeRepoState();
		const { client } = createFakeGitClient({ [repoPath]: app });

		const code = await run(argv("fetch", "--config", configPath), {
			git: client,
			now: () => 1700000000,
		});

		expect(code).toBe(0);
		expect(app.remotes).toEqual([
			{ name: "origin", url: "git@host:team/app.git" },
		]);
		const status = JSON.parse(
			await readFile(path.join(dir, "status.json"), "utf8"),
		);
		expect(status).toEqual({
			updated_at: 1700000000,
			statuses: { "app:team/app.git": 1 },
		});
		expect(stderr).toEqual([]);
	});

	it("still exits 0 when a repository fails", async () => {
		const repoPath = path.join(dir, "app");
		await mkdir(repoPath);
		const statusPath = path.join(dir, "status.json");
		const { client } = createFakeGitClient({
			[repoPath]: createFakeRepoState({
				fetchFailure: { kind: "failed", message: "fatal: boom" },
			}),
		});

		const code = await run(
			argv(
				"--local-repo",
				repoPath,
				"--remote-repo",
				"git@host:team/app.git",
				"--status-file",
				statusPath,
			),
			{ git: client, now: () => 42 },
		);

		expect(code).toBe(0);
		expect(JSON.parse(await readFile(statusPath, "utf8"))).toEqual({
			updated_at: 42,
			statuses: { "app:team/app.git": 0 },
		});
		expect(stderr.join("")).toContain("fatal: boom");
	});

	it("exits 1 without a status file when the local repository is not a directory", async () => {
		const statusPath = path.join(dir, "status.json");
		const { client, opened } = createFakeGitClient({});

		const code = await run(
			argv(
				"--local-repo",
				path.join(dir, "missing"),
				"--remote-repo",
				"git@host:team/app.git",
				"--status-file",
				statusPath,
			),
			{ git: client },
		);

		expect(code).toBe(1);
		expect(opened).toEqual([]);
		expect(await exists(statusPath)).toBe(false);
		expect(stderr.join("")).toContain(
			`Directory not found or permission denied for git repository: ${path.join(dir, "missing")}`,
		);
	});

	it("exits 1 when required flags are missing", async () => {
		const code = await run(argv("--local-repo", dir));

		expect(code).toBe(1);
		expect(stderr.join("")).toContain(
			"Needs --local-repo and --remote-repo when run without a configuration file.",
		);
	});

	it("exits 1 for a metric run without a status file", async () => {
		const statusPath = path.join(dir, "missing.json");

		const code = await run(argv("metric", "--status-file", statusPath));

		expect(code).toBe(1);
		expect(stdout).toEqual([]);
		expect(stderr.join("")).toContain(
			`Failed to read status file at ${statusPath}: file not found`,
		);
	});

	it("prints the status file verbatim for metric", async () => {
		const statusPath = path.join(dir, "status.json");
		const content = '{\n  "updated_at": 1,\n  "statuses": {}\n}\n';
		await writeFile(statusPath, content, "utf8");

		const code = await run(argv("metric", "--status-file", statusPath));

		expect(code).toBe(0);
		expect(stdout).toEqual([content]);
	});

	it("exits 1 on a config that fails validation", async () => {
		const configPath = path.join(dir, "sync.yml");
		await writeFile(configPath, "repo_root: /r\n", "utf8");

		const code = await run(argv("--config", configPath));

		expect(code).toBe(1);
		expect(stderr.join("")).toContain("Missing config field 'remote_user'.");
	});

	it("reports an unwritable status file without failing the run", async () => {
		const repoPath = path.join(dir, "app");
		await mkdir(repoPath);
		const statusPath = path.join(dir, "no-such-dir", "status.json");
		const { client } = createFakeGitClient({
			[repoPath]: createFakeRepoState(),
		});

		const code = await run(
			argv(
				"--local-repo",
				repoPath,
				"--remote-repo",
				"git@host:app.git",
				"--status-file",
				statusPath,
			),
			{ git: client },
		);

		expect(code).toBe(0);
		expect(stderr.join("")).toContain(
			`Failed to write status file at ${statusPath}: file not found`,
		);
	});

	it("prints nothing but errors in silent mode", async () => {
		const repoPath = path.join(dir, "app");
		await mkdir(repoPath);
		const { client } = createFakeGitClient({
			[repoPath]: createFakeRepoState(),
		});

		const code = await run(
			argv(
				"--silent",
				"--local-repo",
				repoPath,
				"--remote-repo",
				"git@host:app.git",
			),
			{ git: client },
		);

		expect(code).toBe(0);
		expect(stdout).toEqual([]);
	});
});
