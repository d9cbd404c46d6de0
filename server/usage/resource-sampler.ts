import { errorMessage } from "../errors";
import type { ProcessAccounting, ProcessProbe } from "./process-accounting";

export interface UsageSample {
	/**
	 * Lifetime average: CPU time consumed divided by wall-clock time since
	 * the process started, as a percentage of one core. Exceeds 100 when the
	 * process keeps several cores busy.
	 */
	cpuPercent: number;
	memoryBytes: number;
	uptimeSeconds: number;
}

export type UsageReading =
	| { kind: "sampled"; sample: UsageSample }
	| { kind: "probe-failed"; reason: string };

export function computeUsage(accounting: ProcessAccounting): UsageSample {
	const { cpuSeconds, elapsedSeconds, rssBytes } = accounting;
	const cpuPercent =
		elapsedSeconds > 0 ? (cpuSeconds / elapsedSeconds) * 100 : 0;
	return {
		cpuPercent,
		memoryBytes: rssBytes,
		uptimeSeconds: elapsedSeconds,
	};
}

/** Whole hours and minutes, e.g. `26h 5m` */
export function formatUptime(seconds: number): string {
	const total = Math.max(0, Math.floor(seconds));
	const hours = Math.floor(total / 3600);
	const minutes = Math.floor((total % 3600) / 60);
	return `${hours}h ${minutes}m`;
}

/**
 * Samples OS accounting for a pid. A process that exits between the
 * caller's liveness check and the read comes back as `probe-failed`.
 */
export class ResourceSampler {
	constructor(private readonly probe: ProcessProbe) {}

	async sample(pid: number): Promise<UsageReading> {
		try {
			const accounting = await this.probe(pid);
			return { kind: "sampled", sample: computeUsage(accounting) };
		} catch (error: unknown) {
			return { kind: "probe-failed", reason: errorMessage(error) };
		}
	}
}
