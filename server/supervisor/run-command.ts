import { AppError } from "../errors";

export interface ParsedCommand {
	command: string;
	args: string[];
}

/**
 * Split a run command into argv without a shell. Whitespace separates
 * words; single and double quotes group them, and a backslash escapes the
 * next character outside single quotes.
 */
export function parseRunCommand(line: string): ParsedCommand {
	const words: string[] = [];
	let current = "";
	let inWord = false;
	let quote: "'" | '"' | null = null;

	for (let i = 0; i < line.length; i++) {
		const ch = line.charAt(i);

		if (quote) {
			if (ch === quote) {
				quote = null;
			} else if (ch === "\\" && quote === '"' && i + 1 < line.length) {
				i += 1;
				current += line.charAt(i);
			} else {
				current += ch;
			}
			continue;
		}

		if (ch === "'" || ch === '"') {
			quote = ch;
			inWord = true;
		} else if (ch === "\\" && i + 1 < line.length) {
			i += 1;
			current += line.charAt(i);
			inWord = true;
		} else if (/\s/.test(ch)) {
			if (inWord) {
				words.push(current);
				current = "";
				inWord = false;
			}
		} else {
			current += ch;
			inWord = true;
		}
	}

	if (quote) {
		throw new AppError("INVALID_COMMAND", "Run command has an unterminated quote");
	}
	if (inWord) {
		words.push(current);
	}

	const [command, ...args] = words;
	if (!command) {
		throw new AppError("INVALID_COMMAND", "Run command is empty");
	}
	if (command.includes("\0") || args.some((arg) => arg.includes("\0"))) {
		throw new AppError("INVALID_COMMAND", "Run command contains a NUL byte");
	}
	return { command, args };
}
