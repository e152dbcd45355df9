const HTTP_CREDENTIAL_RE = /^(https?:\/\/)([^@/]+)@/i;
const SSH_PASSWORD_RE = /^(ssh:\/\/[^@/:]+):[^@/]+@/i;

export const redactRepoUrl = (repo: string) => {
	// Redact any credentials before @ in HTTP(S) URLs
	const redacted = repo.replace(HTTP_CREDENTIAL_RE, "$1***@");
	// ssh://user:password@ keeps the user, drops the password
	return redacted.replace(SSH_PASSWORD_RE, "$1:*****@");
};
