import { type ChildProcess, spawn } from "node:child_process";
import { open } from "node:fs/promises";
import { AppError, errnoCode, errorMessage } from "../errors";

export interface ProcessExit {
	code: number | null;
	signal: NodeJS.Signals | null;
}

/**
 * Owned handle to a launched child. Liveness is answered from the handle
 * itself, never from a bare pid the OS may since have reused.
 */
export interface ManagedProcess {
	readonly pid: number;
	/** Resolves once the child has exited and been reaped */
	readonly exited: Promise<ProcessExit>;
	isAlive(): boolean;
	kill(signal: NodeJS.Signals): void;
}

export interface SpawnRequest {
	command: string;
	args: string[];
	cwd: string;
	/** Combined stdout+stderr is appended here */
	logFile: string;
	/** Errors the child reports after launch, such as a failed kill */
	onError?: (error: Error) => void;
}

export type SpawnProcess = (request: SpawnRequest) => Promise<ManagedProcess>;

class ChildProcessHandle implements ManagedProcess {
	readonly exited: Promise<ProcessExit>;
	private exit: ProcessExit | null = null;

	constructor(
		private readonly child: ChildProcess,
		readonly pid: number,
		exited: Promise<ProcessExit>,
	) {
		this.exited = exited.then((exit) => {
			this.exit = exit;
			return exit;
		});
	}

	isAlive(): boolean {
		return (
			this.exit === null &&
			this.child.exitCode === null &&
			this.child.signalCode === null
		);
	}

	kill(signal: NodeJS.Signals): void {
		if (!this.isAlive()) {
			return;
		}
		this.child.kill(signal);
	}
}

function describeLaunchError(command: string, error: unknown): string {
	switch (errnoCode(error)) {
		case "ENOENT":
			return `Command not found: ${command}`;
		case "EACCES":
			return `Permission denied: ${command}`;
		default:
			return `Could not launch ${command}: ${errorMessage(error)}`;
	}
}

/**
 * Launch a child with its output appended to a log file. Resolves once the
 * OS has created the process; rejects with LAUNCH_FAILED when it could not
 * be created (missing binary, bad permissions, missing cwd).
 */
export const spawnManagedProcess: SpawnProcess = async (request) => {
	let logHandle: Awaited<ReturnType<typeof open>>;
	try {
		logHandle = await open(request.logFile, "a");
	} catch (error: unknown) {
		throw new AppError(
			"LAUNCH_FAILED",
			`Could not open log file ${request.logFile}: ${errorMessage(error)}`,
			error,
		);
	}

	try {
		const child = spawn(request.command, request.args, {
			cwd: request.cwd,
			stdio: ["ignore", logHandle.fd, logHandle.fd],
		});

		const exited = new Promise<ProcessExit>((resolve) => {
			child.once("exit", (code, signal) => resolve({ code, signal }));
		});

		const pid = await new Promise<number>((resolve, reject) => {
			const onError = (error: Error) => {
				child.off("spawn", onSpawn);
				reject(error);
			};
			const onSpawn = () => {
				child.off("error", onError);
				if (child.pid === undefined) {
					reject(new Error("process has no pid"));
					return;
				}
				resolve(child.pid);
			};
			child.once("error", onError);
			child.once("spawn", onSpawn);
		}).catch((error: unknown) => {
			throw new AppError(
				"LAUNCH_FAILED",
				describeLaunchError(request.command, error),
				error,
			);
		});

		child.on("error", (error) => request.onError?.(error));

		return new ChildProcessHandle(child, pid, exited);
	} finally {
		await logHandle.close();
	}
};
