import { readFile, writeFile } from "node:fs/promises";

import type { StatusReport } from "./batch";
import { describeFsError } from "./errors";

export const serializeStatusReport = (report: StatusReport) =>
	`${JSON.stringify(report, null, 2)}\n`;

/**
 * Overwrite the status file with `report`. Earlier content is never merged.
 */
export const writeStatusFile = async (
	statusPath: string,
	report: StatusReport,
) => {
	try {
		await writeFile(statusPath, serializeStatusReport(report), "utf8");
	} catch (error) {
		throw new Error(
			`Failed to write status file at ${statusPath}: ${describeFsError(error)}`,
		);
	}
};

/**
 * Raw status file content, exactly as written.
 */
export const readStatusFile = async (statusPath: string) => {
	try {
		return await readFile(statusPath, "utf8");
	} catch (error) {
		throw new Error(
			`Failed to read status file at ${statusPath}: ${describeFsError(error)}`,
		);
	}
};
