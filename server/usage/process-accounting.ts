import { execFile } from "node:child_process";
import { readFile } from "node:fs/promises";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

/** Linux USER_HZ; fixed at 100 on every mainstream architecture */
const CLOCK_TICKS_PER_SECOND = 100;
const PS_TIMEOUT_MS = 5_000;

/** Raw OS accounting for one process */
export interface ProcessAccounting {
	/** User plus system CPU time consumed so far */
	cpuSeconds: number;
	/** Wall-clock time since the OS-reported process start */
	elapsedSeconds: number;
	/** Resident set size */
	rssBytes: number;
}

export type ProcessProbe = (pid: number) => Promise<ProcessAccounting>;

export interface ProcStatTimes {
	utimeTicks: number;
	stimeTicks: number;
	startTicks: number;
}

function toNumber(value: string | undefined, field: string): number {
	const parsed = Number(value);
	if (value === undefined || !Number.isFinite(parsed)) {
		throw new Error(`Unreadable ${field}: ${value ?? "missing"}`);
	}
	return parsed;
}

/**
 * Fields 14, 15 and 22 of /proc/<pid>/stat. The command name (field 2) is
 * parenthesised and may itself contain spaces or parentheses, so fields are
 * counted from the last ")".
 */
export function parseProcStat(stat: string): ProcStatTimes {
	const close = stat.lastIndexOf(")");
	if (close === -1) {
		throw new Error("Unreadable /proc stat line");
	}
	// rest[0] is field 3 (state)
	const rest = stat.slice(close + 2).trim().split(/\s+/);
	return {
		utimeTicks: toNumber(rest[11], "utime"),
		stimeTicks: toNumber(rest[12], "stime"),
		startTicks: toNumber(rest[19], "starttime"),
	};
}

/** VmRSS line of /proc/<pid>/status, in bytes */
export function parseStatusRss(status: string): number {
	const match = /^VmRSS:\s+(\d+)\s+kB$/m.exec(status);
	// Kernel threads and zombies have no VmRSS line
	return match ? toNumber(match[1], "VmRSS") * 1024 : 0;
}

/**
 * `ps` durations: `[[dd-]hh:]mm:ss[.ff]` (etime, and time on Linux) or
 * `m:ss.ff` (time on BSD and macOS).
 */
export function parsePsDuration(value: string): number {
	const trimmed = value.trim();
	const dash = trimmed.indexOf("-");
	const days = dash === -1 ? 0 : toNumber(trimmed.slice(0, dash), "days");
	const clock = dash === -1 ? trimmed : trimmed.slice(dash + 1);
	const parts = clock.split(":").reverse();
	if (parts.length < 2 || parts.length > 3) {
		throw new Error(`Unreadable duration: ${value}`);
	}
	const seconds = toNumber(parts[0], "seconds");
	const minutes = toNumber(parts[1], "minutes");
	const hours = parts[2] === undefined ? 0 : toNumber(parts[2], "hours");
	return ((days * 24 + hours) * 60 + minutes) * 60 + seconds;
}

export const procfsProbe: ProcessProbe = async (pid) => {
	const [stat, status, uptime] = await Promise.all([
		readFile(`/proc/${pid}/stat`, "utf-8"),
		readFile(`/proc/${pid}/status`, "utf-8"),
		readFile("/proc/uptime", "utf-8"),
	]);
	const times = parseProcStat(stat);
	const systemUptime = toNumber(uptime.trim().split(/\s+/)[0], "uptime");
	return {
		cpuSeconds:
			(times.utimeTicks + times.stimeTicks) / CLOCK_TICKS_PER_SECOND,
		elapsedSeconds: Math.max(
			0,
			systemUptime - times.startTicks / CLOCK_TICKS_PER_SECOND,
		),
		rssBytes: parseStatusRss(status),
	};
};

export const psProbe: ProcessProbe = async (pid) => {
	const { stdout } = await execFileAsync(
		"ps",
		["-o", "etime=,time=,rss=", "-p", String(pid)],
		{ timeout: PS_TIMEOUT_MS },
	);
	const [etime, time, rss] = stdout.trim().split(/\s+/);
	if (etime === undefined || time === undefined || rss === undefined) {
		throw new Error(`No ps output for pid ${pid}`);
	}
	return {
		cpuSeconds: parsePsDuration(time),
		elapsedSeconds: parsePsDuration(etime),
		rssBytes: toNumber(rss, "rss") * 1024,
	};
};

export const defaultProcessProbe: ProcessProbe =
	process.platform === "linux" ? procfsProbe : psProbe;
