import * as z from "zod";

const nonEmpty = z.string().trim().min(1);

// One `- <local_subpath>: <remote_suffix>` list item
export const RepoMappingSchema = z.record(nonEmpty, nonEmpty);

export const RepoGroupSchema = z.array(RepoMappingSchema).nullable();

export const ConfigSchema = z.object({
	repo_root: nonEmpty,
	remote_user: nonEmpty,
	remote_server: nonEmpty,
	repos: z.record(nonEmpty, RepoGroupSchema),
	metrics: nonEmpty,
});

export type RepoMapping = z.infer<typeof RepoMappingSchema>;
export type RepoGroup = z.infer<typeof RepoGroupSchema>;
export type BareSyncConfig = z.infer<typeof ConfigSchema>;
