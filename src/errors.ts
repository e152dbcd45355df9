export type ErrnoException = NodeJS.ErrnoException;

export const isErrnoException = (error: unknown): error is ErrnoException =>
	typeof error === "object" &&
	error !== null &&
	"code" in error &&
	(typeof (error as ErrnoException).code === "string" ||
		(error as ErrnoException).code === undefined);

export const getErrnoCode = (error: unknown): string | undefined =>
	isErrnoException(error) && typeof error.code === "string"
		? error.code
		: undefined;

export const getErrorMessage = (error: unknown) =>
	error instanceof Error ? error.message : String(error);

const ERRNO_DESCRIPTIONS: Record<string, string> = {
	ENOENT: "file not found",
	EACCES: "permission denied",
	EPERM: "permission denied",
	EISDIR: "is a directory",
	ENOTDIR: "not a directory",
};

/**
 * Short reason for a filesystem error, falling back to the error message.
 */
export const describeFsError = (error: unknown) => {
	const code = getErrnoCode(error);
	return (code && ERRNO_DESCRIPTIONS[code]) || getErrorMessage(error);
};
