/**
 * CLI exit codes. Usage and configuration errors share the fatal code.
 *
 * @see https://nodejs.org/api/process.html#process_exit_codes
 */
export const ExitCode = {
	Success: 0,
	FatalError: 1,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];
