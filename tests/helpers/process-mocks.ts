import { vi } from "vitest";
import type {
	ManagedProcess,
	ProcessExit,
	SpawnProcess,
	SpawnRequest,
} from "../../server/supervisor/managed-process";

export interface FakeProcessBehavior {
	/** Stay alive after SIGTERM; only SIGKILL ends the process */
	ignoreSigterm?: boolean;
}

export class FakeProcess implements ManagedProcess {
	readonly exited: Promise<ProcessExit>;
	readonly signals: NodeJS.Signals[] = [];
	private alive = true;
	private resolveExit: (exit: ProcessExit) => void = () => {};

	constructor(
		readonly pid: number,
		private readonly behavior: FakeProcessBehavior = {},
	) {
		this.exited = new Promise<ProcessExit>((resolve) => {
			this.resolveExit = resolve;
		});
	}

	isAlive(): boolean {
		return this.alive;
	}

	kill(signal: NodeJS.Signals): void {
		this.signals.push(signal);
		if (signal === "SIGTERM" && this.behavior.ignoreSigterm) {
			return;
		}
		this.exit({ code: null, signal });
	}

	/** Simulate the child ending on its own */
	exit(exit: ProcessExit = { code: 0, signal: null }): void {
		if (!this.alive) return;
		this.alive = false;
		this.resolveExit(exit);
	}
}

export interface FakeSpawner {
	spawn: ReturnType<typeof vi.fn<SpawnProcess>>;
	spawned: FakeProcess[];
	requests: SpawnRequest[];
	behavior: FakeProcessBehavior;
}

export function createFakeSpawner(firstPid = 1000): FakeSpawner {
	const spawned: FakeProcess[] = [];
	const requests: SpawnRequest[] = [];
	const behavior: FakeProcessBehavior = {};
	const spawn = vi.fn<SpawnProcess>(async (request) => {
		requests.push(request);
		const proc = new FakeProcess(firstPid + spawned.length, { ...behavior });
		spawned.push(proc);
		return proc;
	});
	return { spawn, spawned, requests, behavior };
}
