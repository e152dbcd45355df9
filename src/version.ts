import { readFile } from "node:fs/promises";

export const loadToolVersion = async () => {
	const raw = await readFile(
		new URL("../package.json", import.meta.url),
		"utf8",
	);
	const parsed: unknown = JSON.parse(raw);
	if (
		typeof parsed === "object" &&
		parsed !== null &&
		"version" in parsed &&
		typeof parsed.version === "string"
	) {
		return parsed.version;
	}
	return "0.0.0";
};
