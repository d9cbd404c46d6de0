import pino, { type Logger } from "pino";
import type { LogLevel } from "./config";

export function createLogger(level: LogLevel): Logger {
	return pino({
		name: "project-hoster",
		level,
		base: { pid: process.pid },
		timestamp: pino.stdTimeFunctions.isoTime,
	});
}
