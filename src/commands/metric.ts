import { readStatusFile } from "#core/status-file";

export type MetricCommandOptions = {
	statusFile: string;
};

/**
 * Print the status file verbatim for a metrics collector.
 */
export const runMetric = async (options: MetricCommandOptions) => {
	const content = await readStatusFile(options.statusFile);
	process.stdout.write(content.endsWith("\n") ? content : `${content}\n`);
	return content;
};
