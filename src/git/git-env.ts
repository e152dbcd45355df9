const resolveGitCommand = (): string => {
	// Allow tests and wrappers to override git command path
	const override = process.env.BARE_SYNC_GIT_COMMAND;
	if (override) {
		return override;
	}
	return "git";
};

const buildGitEnv = (overrides: NodeJS.ProcessEnv = {}): NodeJS.ProcessEnv => {
	const pathValue = process.env.PATH ?? process.env.Path;
	return {
		...process.env,
		...(pathValue ? { PATH: pathValue, Path: pathValue } : {}),
		SSH_AUTH_SOCK: process.env.SSH_AUTH_SOCK,
		SSH_AGENT_PID: process.env.SSH_AGENT_PID,
		GIT_TERMINAL_PROMPT: "0",
		...(process.platform === "win32" ? {} : { GIT_ASKPASS: "/bin/false" }),
		...overrides,
	};
};

export { buildGitEnv, resolveGitCommand };
