import { stat } from "node:fs/promises";
import path from "node:path";

export const toPosixPath = (value: string) => value.replace(/\\/g, "/");

export const resolveFrom = (baseFile: string, target: string) =>
	path.resolve(path.dirname(baseFile), target);

/**
 * True when `target` exists and is a directory. Unreadable paths count as
 * missing.
 */
export const isDirectory = async (target: string): Promise<boolean> => {
	try {
		return (await stat(target)).isDirectory();
	} catch {
		return false;
	}
};
