import path from "node:path";
import pc from "picocolors";
import { toPosixPath } from "../paths";

export const symbols = {
	error: pc.red("✖"),
	success: pc.green("✔"),
	info: pc.blue("ℹ"),
	warn: pc.yellow("⚠"),
};

let _silentMode = false;

export const setSilentMode = (silent: boolean) => {
	_silentMode = silent;
};

export const ui = {
	// Formatters
	path: (value: string) => {
		const rel = path.relative(process.cwd(), value);
		const selected = rel.length < value.length ? rel : value;
		return toPosixPath(selected);
	},

	// Components
	line: (text: string = "") => {
		if (_silentMode) return;
		process.stdout.write(`${text}\n`);
	},

	item: (icon: string, label: string, details?: string) => {
		if (_silentMode) return;
		const partLabel = pc.bold(label);
		const partDetails = details ? pc.gray(details) : "";
		const text = `  ${icon} ${partLabel} ${partDetails}`.trimEnd();
		process.stdout.write(`${text}\n`);
	},

	step: (action: string, subject: string, details?: string) => {
		if (_silentMode) return;
		const icon = pc.cyan("→");
		process.stdout.write(
			`  ${icon} ${action} ${pc.bold(subject)}${details ? ` ${pc.dim(details)}` : ""}\n`,
		);
	},

	debug: (text: string) => {
		if (_silentMode) return;
		process.stdout.write(`${pc.dim(text)}\n`);
	},

	// Errors are never silenced
	error: (message: string) => {
		process.stderr.write(`${symbols.error} ${message}\n`);
	},
};
