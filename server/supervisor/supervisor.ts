import { rm, stat } from "node:fs/promises";
import { setTimeout as delay } from "node:timers/promises";
import type { Logger } from "pino";
import { KeyedLock } from "../concurrency/keyed-lock";
import { AppError, errorMessage, isAppError, toAppError } from "../errors";
import type { DependencyInstaller } from "../install/dependency-installer";
import type { LogSink, LogTail } from "../logs/log-sink";
import type { ProjectStore } from "../projects/project-store";
import type { ProjectMetadata } from "../projects/project-types";
import type { ResourceSampler, UsageReading } from "../usage/resource-sampler";
import {
	type ManagedProcess,
	type SpawnProcess,
	spawnManagedProcess,
} from "./managed-process";
import { ProcessTable } from "./process-table";
import { parseRunCommand } from "./run-command";

export interface SupervisorOptions {
	/** Wait after SIGTERM before escalating to SIGKILL */
	stopGraceMs: number;
	/** Pause between the stop and start halves of a restart */
	restartDelayMs: number;
}

export interface SupervisorDeps {
	spawn: SpawnProcess;
	removeDir: (path: string) => Promise<void>;
	sleep: (ms: number) => Promise<void>;
}

export interface SupervisorComponents {
	projects: ProjectStore;
	logs: LogSink;
	sampler: ResourceSampler;
	installer: DependencyInstaller;
	logger: Logger;
}

export type ProjectStatusReport =
	| { state: "not-found" }
	| { state: "running"; pid: number }
	| { state: "stopped" };

export interface StopResult {
	pid: number;
	/** The child ignored SIGTERM for the whole grace period */
	forced: boolean;
}

const DEFAULT_DEPS: SupervisorDeps = {
	spawn: spawnManagedProcess,
	removeDir: (path) => rm(path, { recursive: true, force: true }),
	sleep: (ms) => delay(ms),
};

/**
 * Owns the project name -> child process mapping.
 *
 * Each operation takes the project's lock before checking preconditions
 * and holds it until the transition is committed to the process table and
 * the project store. Liveness is probed on the handle at every entry point;
 * a dead child found there is evicted and its metadata reset to stopped.
 */
export class Supervisor {
	private readonly table = new ProcessTable();
	private readonly locks = new KeyedLock();
	private readonly deps: SupervisorDeps;
	private readonly projects: ProjectStore;
	private readonly logs: LogSink;
	private readonly sampler: ResourceSampler;
	private readonly installer: DependencyInstaller;
	private readonly logger: Logger;

	constructor(
		components: SupervisorComponents,
		private readonly options: SupervisorOptions,
		deps?: Partial<SupervisorDeps>,
	) {
		this.projects = components.projects;
		this.logs = components.logs;
		this.sampler = components.sampler;
		this.installer = components.installer;
		this.logger = components.logger;
		this.deps = { ...DEFAULT_DEPS, ...deps };
	}

	async create(name: string): Promise<ProjectMetadata> {
		return this.locks.runExclusive(name, async () => {
			const project = await this.projects.create(name);
			this.logger.info({ project: name, path: project.path }, "project created");
			return project;
		});
	}

	list(): string[] {
		return this.projects.list();
	}

	exists(name: string): boolean {
		return this.projects.exists(name);
	}

	async start(name: string): Promise<{ pid: number }> {
		return this.locks.runExclusive(name, () => this.startLocked(name));
	}

	async stop(name: string): Promise<StopResult> {
		return this.locks.runExclusive(name, () => this.stopLocked(name));
	}

	/** Stop (a project that was not running is fine), pause, start. */
	async restart(name: string): Promise<{ pid: number }> {
		return this.locks.runExclusive(name, async () => {
			try {
				await this.stopLocked(name);
			} catch (error: unknown) {
				if (!isAppError(error) || error.code !== "NOT_RUNNING") {
					throw error;
				}
			}
			await this.deps.sleep(this.options.restartDelayMs);
			return this.startLocked(name);
		});
	}

	async status(name: string): Promise<ProjectStatusReport> {
		return this.locks.runExclusive(name, async () => {
			const project = this.projects.find(name);
			if (!project) {
				return { state: "not-found" };
			}

			const live = await this.observe(project);
			if (!live) {
				return { state: "stopped" };
			}
			if (project.status !== "running" || project.pid !== live.pid) {
				await this.persistRunning(name, live.pid);
			}
			return { state: "running", pid: live.pid };
		});
	}

	/** Tail of the project's combined output log. */
	async logTail(name: string, count: number): Promise<LogTail> {
		this.projects.get(name);
		try {
			return await this.logs.tail(name, count);
		} catch (error: unknown) {
			throw toAppError(error, "LOG_READ_FAILED", "Error reading logs");
		}
	}

	async usage(name: string): Promise<UsageReading> {
		return this.locks.runExclusive(name, async () => {
			const project = this.projects.get(name);
			const live = await this.observe(project);
			if (!live) {
				throw new AppError("NOT_RUNNING", "Project is not running");
			}
			return this.sampler.sample(live.pid);
		});
	}

	async installDependencies(name: string): Promise<void> {
		return this.locks.runExclusive(name, async () => {
			const project = this.projects.get(name);
			try {
				await this.installer.install(name, project.path);
			} catch (error: unknown) {
				throw toAppError(error, "INSTALL_FAILED", "Error installing dependencies");
			}
		});
	}

	async setRunCommand(name: string, command: string): Promise<ProjectMetadata> {
		return this.locks.runExclusive(name, async () => {
			const trimmed = command.trim();
			parseRunCommand(trimmed);
			const project = await this.projects.update(name, (draft) => {
				draft.run_command = trimmed;
			});
			this.logger.info({ project: name, runCommand: trimmed }, "run command updated");
			return project;
		});
	}

	/**
	 * Stop if running, then remove the project directory, the log directory
	 * and the metadata entry, in that order.
	 *
	 * Best effort across the two directories: when the project directory
	 * cannot be removed nothing else happens (DELETE_FAILED); when only the
	 * log directory cannot be removed the entry is still dropped and the
	 * leftover is reported (PARTIAL_DELETE_FAILURE).
	 */
	async delete(name: string): Promise<void> {
		return this.locks.runExclusive(name, async () => {
			const project = this.projects.get(name);

			if (this.table.get(name)) {
				try {
					await this.stopLocked(name);
				} catch (error: unknown) {
					const appError = toAppError(error, "DELETE_FAILED", "Stop failed");
					if (appError.code !== "NOT_RUNNING") {
						throw new AppError(
							appError.code,
							`Unable to stop project before deletion: ${appError.message}`,
							error,
						);
					}
				}
			}

			if (!this.projects.isManagedPath(name, project.path)) {
				throw new AppError(
					"DELETE_FAILED",
					`Refusing to remove ${project.path}: outside the projects directory`,
				);
			}

			try {
				await this.deps.removeDir(project.path);
			} catch (error: unknown) {
				throw new AppError(
					"DELETE_FAILED",
					`Error deleting project: ${errorMessage(error)}`,
					error,
				);
			}

			let logFailure: unknown = null;
			try {
				await this.deps.removeDir(this.logs.dirFor(name));
			} catch (error: unknown) {
				logFailure = error;
			}

			await this.projects.delete(name);
			this.logger.info({ project: name }, "project deleted");

			if (logFailure !== null) {
				this.logger.warn(
					{ project: name, err: logFailure },
					"log directory left behind",
				);
				throw new AppError(
					"PARTIAL_DELETE_FAILURE",
					`Project '${name}' deleted, but its log directory could not be removed: ${errorMessage(logFailure)}`,
					logFailure,
				);
			}
		});
	}

	/** Stop every supervised child; used on host shutdown. */
	async shutdownAll(): Promise<void> {
		const names = this.table.names();
		const results = await Promise.allSettled(
			names.map((name) => this.stop(name)),
		);
		results.forEach((result, index) => {
			if (
				result.status === "rejected" &&
				!(isAppError(result.reason) && result.reason.code === "NOT_RUNNING")
			) {
				this.logger.error(
					{ project: names[index], err: result.reason },
					"failed to stop project during shutdown",
				);
			}
		});
	}

	private async startLocked(name: string): Promise<{ pid: number }> {
		const project = this.projects.get(name);

		const live = await this.observe(project);
		if (live) {
			throw new AppError(
				"ALREADY_RUNNING",
				`Project is already running (PID: ${live.pid})`,
			);
		}

		const { command, args } = parseRunCommand(project.run_command);
		await this.assertDirectory(project.path);

		let logFile: string;
		try {
			await this.logs.ensureDir(name);
			logFile = this.logs.fileFor(name);
		} catch (error: unknown) {
			throw toAppError(error, "LAUNCH_FAILED", "Could not create log directory");
		}

		let child: ManagedProcess;
		try {
			child = await this.deps.spawn({
				command,
				args,
				cwd: project.path,
				logFile,
				onError: (error) =>
					this.logger.warn({ project: name, err: error }, "child process error"),
			});
		} catch (error: unknown) {
			const appError = toAppError(error, "LAUNCH_FAILED", "Could not launch");
			this.logger.warn({ project: name, err: appError.message }, "launch failed");
			throw appError;
		}

		this.table.add(name, child);
		this.watchExit(name, child);
		this.logger.info({ project: name, pid: child.pid, command }, "project started");

		await this.persistRunning(name, child.pid);
		return { pid: child.pid };
	}

	private async stopLocked(name: string): Promise<StopResult> {
		const project = this.projects.get(name);
		const live = await this.observe(project);
		if (!live) {
			throw new AppError("NOT_RUNNING", "Project is not running");
		}

		const forced = await this.terminate(name, live);
		this.table.remove(name);
		this.logger.info({ project: name, pid: live.pid, forced }, "project stopped");

		await this.persistStopped(name);
		return { pid: live.pid, forced };
	}

	/**
	 * SIGTERM, wait up to the grace period, then SIGKILL and wait for the
	 * exit unconditionally. Returns whether the kill was needed.
	 */
	private async terminate(name: string, child: ManagedProcess): Promise<boolean> {
		child.kill("SIGTERM");

		let timer: ReturnType<typeof setTimeout> | undefined;
		const graceElapsed = new Promise<boolean>((resolve) => {
			timer = setTimeout(() => resolve(false), this.options.stopGraceMs);
		});
		const exitedInTime = await Promise.race([
			child.exited.then(() => true),
			graceElapsed,
		]);
		clearTimeout(timer);
		if (exitedInTime) {
			return false;
		}

		this.logger.warn(
			{ project: name, pid: child.pid, graceMs: this.options.stopGraceMs },
			"process ignored SIGTERM, sending SIGKILL",
		);
		child.kill("SIGKILL");
		await child.exited;
		return true;
	}

	/**
	 * Live handle for the project, or null. A dead entry is evicted and
	 * metadata still claiming "running" is reset to stopped.
	 */
	private async observe(project: ProjectMetadata): Promise<ManagedProcess | null> {
		const entry = this.table.get(project.name);
		if (entry?.process.isAlive()) {
			return entry.process;
		}

		if (entry) {
			this.table.remove(project.name);
			this.logger.info(
				{ project: project.name, pid: entry.process.pid },
				"process exited on its own; marking stopped",
			);
		}
		if (project.status === "running") {
			await this.persistStopped(project.name);
		}
		return null;
	}

	private async assertDirectory(path: string): Promise<void> {
		try {
			const info = await stat(path);
			if (info.isDirectory()) {
				return;
			}
		} catch (error: unknown) {
			throw new AppError(
				"LAUNCH_FAILED",
				`Project directory is missing: ${path}`,
				error,
			);
		}
		throw new AppError("LAUNCH_FAILED", `Not a directory: ${path}`);
	}

	private watchExit(name: string, child: ManagedProcess): void {
		void child.exited.then((exit) => {
			this.logger.info(
				{ project: name, pid: child.pid, code: exit.code, signal: exit.signal },
				"process exited",
			);
		});
	}

	private async persistRunning(name: string, pid: number): Promise<void> {
		await this.persist(name, (draft) => {
			draft.status = "running";
			draft.pid = pid;
		});
	}

	private async persistStopped(name: string): Promise<void> {
		await this.persist(name, (draft) => {
			draft.status = "stopped";
			delete draft.pid;
		});
	}

	private async persist(
		name: string,
		mutator: (draft: ProjectMetadata) => void,
	): Promise<void> {
		try {
			await this.projects.update(name, mutator);
		} catch (error: unknown) {
			const appError = toAppError(error, "PERSISTENCE_FAILED", "Could not save project state");
			this.logger.error(
				{ project: name, err: appError.message },
				"project state not persisted; store may disagree with running processes",
			);
			throw appError;
		}
	}
}
