import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
	readStatusFile,
	serializeStatusReport,
	writeStatusFile,
} from "../src/status-file";

describe("status file", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(path.join(tmpdir(), "bare-sync-status-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("writes the report as indented json", async () => {
		const statusPath = path.join(dir, "status.json");

		await writeStatusFile(statusPath, {
			updated_at: 1700000000,
			statuses: { "app:team/app.git": 1, "lib:team/lib.git": 0 },
		});

		expect(await readFile(statusPath, "utf8")).toBe(
			[
				"{",
				'  "updated_at": 1700000000,',
				'  "statuses": {',
				'    "app:team/app.git": 1,',
				'    "lib:team/lib.git": 0',
				"  }",
				"}",
				"",
			].join("\n"),
		);
	});

	it("overwrites previous content instead of merging", async () => {
		const statusPath = path.join(dir, "status.json");
		await writeStatusFile(statusPath, {
			updated_at: 1,
			statuses: { "old:old.git": 1 },
		});

		await writeStatusFile(statusPath, {
			updated_at: 2,
			statuses: { "new:new.git": 0 },
		});

		expect(JSON.parse(await readFile(statusPath, "utf8"))).toEqual({
			updated_at: 2,
			statuses: { "new:new.git": 0 },
		});
	});

	it("reads the file verbatim", async () => {
		const statusPath = path.join(dir, "status.json");
		await writeFile(statusPath, "not json at all", "utf8");

		expect(await readStatusFile(statusPath)).toBe("not json at all");
	});

	it("names the path when the file is missing", async () => {
		const statusPath = path.join(dir, "missing.json");

		await expect(readStatusFile(statusPath)).rejects.toThrow(
			`Failed to read status file at ${statusPath}: file not found`,
		);
	});

	it("names the path when the file cannot be written", async () => {
		const statusPath = path.join(dir, "no-such-dir", "status.json");

		await expect(
			writeStatusFile(statusPath, { updated_at: 1, statuses: {} }),
		).rejects.toThrow(
			`Failed to write status file at ${statusPath}: file not found`,
		);
	});

	it("serializes with a trailing newline", () => {
		expect(serializeStatusReport({ updated_at: 5, statuses: {} })).toBe(
			'{\n  "updated_at": 5,\n  "statuses": {}\n}\n',
		);
	});
});
