import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import * as z from "zod";

import type { BareSyncConfig, RepoGroup, RepoMapping } from "#config/schema";
import { ConfigSchema } from "#config/schema";
import { describeFsError, getErrorMessage } from "#core/errors";
import { isDirectory, resolveFrom } from "#core/paths";
import { dedupeTargets, type RepoTarget } from "#core/repo-target";

export type { BareSyncConfig, RepoGroup, RepoMapping };

export type ResolvedConfig = {
	configPath: string;
	repoRoot: string;
	remotePrefix: string;
	targets: RepoTarget[];
	statusFile: string;
};

const isMissingField = (issue: z.ZodIssue) =>
	issue.code === z.ZodIssueCode.invalid_type &&
	issue.received === z.ZodParsedType.undefined;

export const parseConfigText = (raw: string): unknown => {
	try {
		return parseYaml(raw);
	} catch (error) {
		throw new Error(
			`Got error while parsing configuration file.\n${getErrorMessage(error)}`,
		);
	}
};

export const validateConfig = (input: unknown): BareSyncConfig => {
	if (typeof input !== "object" || input === null || Array.isArray(input)) {
		throw new Error("Config must be a YAML mapping.");
	}
	const parsed = ConfigSchema.safeParse(input);
	if (!parsed.success) {
		const missing = parsed.error.issues.find(isMissingField);
		if (missing) {
			throw new Error(`Missing config field '${missing.path.join(".")}'.`);
		}
		const details = parsed.error.issues
			.map((issue) => `${issue.path.join(".") || "config"} ${issue.message}`)
			.join("; ");
		throw new Error(`Config does not match schema: ${details}.`);
	}
	return parsed.data;
};

export const buildRemotePrefix = (config: BareSyncConfig) =>
	`${config.remote_user}@${config.remote_server}:`;

/**
 * Expand `repos` into targets. Every directory on the way (repo root, group,
 * repository) has to exist.
 */
export const resolveConfigTargets = async (
	config: BareSyncConfig,
	repoRoot: string,
): Promise<RepoTarget[]> => {
	if (!(await isDirectory(repoRoot))) {
		throw new Error(
			`Directory not found or permission denied from config field repo_root: ${repoRoot}`,
		);
	}
	const targets: RepoTarget[] = [];
	for (const [groupKey, group] of Object.entries(config.repos)) {
		if (group === null) continue;
		const groupDir = path.join(repoRoot, groupKey);
		if (!(await isDirectory(groupDir))) {
			throw new Error(
				`Directory not found or permission denied from config field repos -> ${groupKey}: ${groupDir}`,
			);
		}
		for (const mapping of group) {
			for (const [localSubpath, remoteSuffix] of Object.entries(mapping)) {
				const repoDir = path.join(groupDir, localSubpath);
				if (!(await isDirectory(repoDir))) {
					throw new Error(
						`Directory not found or permission denied for git repository: ${repoDir}`,
					);
				}
				targets.push({ localPath: repoDir, remoteUrl: remoteSuffix });
			}
		}
	}
	return dedupeTargets(targets);
};

export const loadConfig = async (
	configPath: string,
): Promise<ResolvedConfig> => {
	const resolvedPath = path.resolve(configPath);
	let raw: string;
	try {
		raw = await readFile(resolvedPath, "utf8");
	} catch (error) {
		throw new Error(
			`Failed to read config at ${resolvedPath}: ${describeFsError(error)}`,
		);
	}
	const config = validateConfig(parseConfigText(raw));
	const repoRoot = resolveFrom(resolvedPath, config.repo_root);
	const remotePrefix = buildRemotePrefix(config);
	const targets = await resolveConfigTargets(config, repoRoot);
	return {
		configPath: resolvedPath,
		repoRoot,
		remotePrefix,
		targets,
		statusFile: resolveFrom(resolvedPath, config.metrics),
	};
};
