export class ShellSyntaxError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ShellSyntaxError";
	}
}

/**
 * Splits a command line into words the way a POSIX shell would, honoring
 * single quotes, double quotes and backslash escapes. Globs, variables and
 * substitutions are left as literal text.
 */
export function splitShellWords(line: string): string[] {
	const words: string[] = [];
	let current = "";
	let inWord = false;
	let quote: "'" | '"' | null = null;

	for (let i = 0; i < line.length; i++) {
		const ch = line[i];

		if (quote === "'") {
			if (ch === "'") quote = null;
			else current += ch;
			continue;
		}

		if (quote === '"') {
			if (ch === '"') {
				quote = null;
			} else if (ch === "\\" && i + 1 < line.length && '"\\$`\n'.includes(line[i + 1])) {
				current += line[++i];
			} else {
				current += ch;
			}
			continue;
		}

		if (ch === "'" || ch === '"') {
			quote = ch;
			inWord = true;
			continue;
		}
		if (ch === "\\") {
			if (i + 1 >= line.length) {
				throw new ShellSyntaxError("No escaped character");
			}
			current += line[++i];
			inWord = true;
			continue;
		}
		if (/\s/.test(ch)) {
			if (inWord) {
				words.push(current);
				current = "";
				inWord = false;
			}
			continue;
		}
		current += ch;
		inWord = true;
	}

	if (quote) {
		throw new ShellSyntaxError("No closing quotation");
	}
	if (inWord) words.push(current);
	return words;
}
