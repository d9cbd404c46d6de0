import type { LogTail } from "../../logs/log-sink";
import { truncateForTransport } from "../../logs/log-sink";
import type { ProjectStatusReport } from "../../supervisor/supervisor";
import { formatUptime, type UsageReading } from "../../usage/resource-sampler";

export function renderStatus(report: ProjectStatusReport): string {
	switch (report.state) {
		case "not-found":
			return "Not found";
		case "running":
			return `Running (PID: ${report.pid})`;
		case "stopped":
			return "Stopped";
	}
}

export function renderLogs(
	tail: LogTail,
	transportLimit: number,
): { text: string; truncated: boolean } {
	switch (tail.kind) {
		case "absent":
			return { text: "No logs found", truncated: false };
		case "empty":
			return { text: "Logs are empty", truncated: false };
		case "lines":
			return truncateForTransport(tail.text, transportLimit);
	}
}

const BYTES_PER_MB = 1024 * 1024;

export function renderUsage(reading: UsageReading): string {
	if (reading.kind === "probe-failed") {
		return `Unable to get usage info: ${reading.reason}`;
	}
	const { cpuPercent, memoryBytes, uptimeSeconds } = reading.sample;
	return [
		`CPU: ${cpuPercent.toFixed(1)}%`,
		`Memory: ${(memoryBytes / BYTES_PER_MB).toFixed(1)} MB`,
		`Uptime: ${formatUptime(uptimeSeconds)}`,
	].join("\n");
}
