import { mkdir, open } from "node:fs/promises";
import { join } from "node:path";
import { errnoCode } from "../errors";

const LOG_FILE_NAME = "output.log";
const DEFAULT_CHUNK_SIZE = 64 * 1024;
const NEWLINE = 0x0a;
const DEFAULT_TAIL_LINES = 30;

export type LogTail =
	| { kind: "absent" }
	| { kind: "empty" }
	| {
			kind: "lines";
			lines: string[];
			text: string;
			/** UTF-8 size of `text`, for callers working against a size limit */
			byteLength: number;
	  };

/**
 * Per-project combined output log: `<logsDir>/<name>/output.log`.
 * Runs append to the same file; nothing here rotates or caps it.
 */
export class LogSink {
	constructor(
		readonly logsDir: string,
		private readonly chunkSize = DEFAULT_CHUNK_SIZE,
	) {}

	dirFor(name: string): string {
		return join(this.logsDir, name);
	}

	fileFor(name: string): string {
		return join(this.dirFor(name), LOG_FILE_NAME);
	}

	async ensureDir(name: string): Promise<string> {
		const dir = this.dirFor(name);
		await mkdir(dir, { recursive: true });
		return dir;
	}

	/**
	 * Last `count` lines in file order. Reads fixed-size chunks backwards
	 * from the end until enough newlines have been seen, so the cost follows
	 * the size of the tail and not of the file.
	 */
	async tail(name: string, count: number): Promise<LogTail> {
		const wanted = Number.isFinite(count)
			? Math.max(1, Math.floor(count))
			: DEFAULT_TAIL_LINES;

		let handle: Awaited<ReturnType<typeof open>>;
		try {
			handle = await open(this.fileFor(name), "r");
		} catch (err: unknown) {
			if (errnoCode(err) === "ENOENT") {
				return { kind: "absent" };
			}
			throw err;
		}

		try {
			const { size } = await handle.stat();
			if (size === 0) {
				return { kind: "empty" };
			}

			const chunks: Buffer[] = [];
			let position = size;
			let newlines = 0;
			while (position > 0 && newlines <= wanted) {
				const length = Math.min(this.chunkSize, position);
				position -= length;
				const buffer = Buffer.alloc(length);
				const { bytesRead } = await handle.read(buffer, 0, length, position);
				const chunk = buffer.subarray(0, bytesRead);
				for (const byte of chunk) {
					if (byte === NEWLINE) newlines += 1;
				}
				chunks.unshift(chunk);
			}

			// Splitting happens on whole bytes of "\n", which never occur
			// inside a multi-byte UTF-8 sequence.
			let content = Buffer.concat(chunks).toString("utf-8");
			if (content.endsWith("\n")) {
				content = content.slice(0, -1);
			}
			const lines = content
				.split("\n")
				.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line))
				.slice(-wanted);
			const text = lines.join("\n");
			if (text === "") {
				return { kind: "empty" };
			}
			return {
				kind: "lines",
				lines,
				text,
				byteLength: Buffer.byteLength(text, "utf-8"),
			};
		} finally {
			await handle.close();
		}
	}
}

const TRUNCATION_MARKER = "\n\n... (truncated)";

/**
 * Keep the last `limit` UTF-16 code units of `text`, moving the cut forward
 * rather than splitting a surrogate pair.
 */
export function truncateForTransport(
	text: string,
	limit: number,
): { text: string; truncated: boolean } {
	if (text.length <= limit) {
		return { text, truncated: false };
	}
	let cut = text.length - limit;
	const code = text.charCodeAt(cut);
	if (code >= 0xdc00 && code <= 0xdfff) {
		cut += 1;
	}
	return { text: text.slice(cut) + TRUNCATION_MARKER, truncated: true };
}
