import type {
	ErrorKind,
	LogsView,
	OperationFailure,
	OperationResult,
	StatusView,
	UsageView,
} from "../../../shared/types";
import { toAppError } from "../../errors";
import type { Supervisor } from "../../supervisor/supervisor";
import { renderLogs, renderStatus, renderUsage } from "./project-text";

/**
 * What a front end (HTTP routes, a chat bot) calls on the host. Every method
 * resolves; failures come back as `{ ok: false, kind, detail }`.
 */
export interface ProjectService {
	create(name: string): Promise<OperationResult<{ name: string }>>;
	list(): Promise<string[]>;
	start(name: string): Promise<OperationResult<{ pid: number }>>;
	stop(name: string): Promise<OperationResult>;
	restart(name: string): Promise<OperationResult<{ pid: number }>>;
	status(name: string): Promise<StatusView>;
	logs(name: string, count?: number): Promise<LogsView>;
	usage(name: string): Promise<UsageView>;
	installDependencies(name: string): Promise<OperationResult>;
	setRunCommand(name: string, command: string): Promise<OperationResult>;
	delete(name: string): Promise<OperationResult>;
}

export interface ProjectServiceOptions {
	logTailLines: number;
	transportLimit: number;
}

type SupervisorLike = Pick<
	Supervisor,
	| "create"
	| "list"
	| "start"
	| "stop"
	| "restart"
	| "status"
	| "logTail"
	| "usage"
	| "installDependencies"
	| "setRunCommand"
	| "delete"
>;

function failure(error: unknown, fallback: ErrorKind): OperationFailure {
	const appError = toAppError(error, fallback, "Error");
	return { ok: false, kind: appError.code, detail: appError.message };
}

class SupervisorProjectService implements ProjectService {
	constructor(
		private readonly supervisor: SupervisorLike,
		private readonly options: ProjectServiceOptions,
	) {}

	async create(name: string): Promise<OperationResult<{ name: string }>> {
		try {
			const project = await this.supervisor.create(name);
			return {
				ok: true,
				name: project.name,
				detail: `Project '${project.name}' created`,
			};
		} catch (error: unknown) {
			return failure(error, "PERSISTENCE_FAILED");
		}
	}

	async list(): Promise<string[]> {
		return this.supervisor.list();
	}

	async start(name: string): Promise<OperationResult<{ pid: number }>> {
		try {
			const { pid } = await this.supervisor.start(name);
			return { ok: true, pid, detail: `Project started with PID ${pid}` };
		} catch (error: unknown) {
			return failure(error, "LAUNCH_FAILED");
		}
	}

	async stop(name: string): Promise<OperationResult> {
		try {
			const { forced } = await this.supervisor.stop(name);
			return {
				ok: true,
				detail: forced
					? "Project did not exit in time and was killed"
					: "Project stopped successfully",
			};
		} catch (error: unknown) {
			return failure(error, "PERSISTENCE_FAILED");
		}
	}

	async restart(name: string): Promise<OperationResult<{ pid: number }>> {
		try {
			const { pid } = await this.supervisor.restart(name);
			return { ok: true, pid, detail: `Project restarted with PID ${pid}` };
		} catch (error: unknown) {
			return failure(error, "LAUNCH_FAILED");
		}
	}

	async status(name: string): Promise<StatusView> {
		try {
			const report = await this.supervisor.status(name);
			return {
				state: report.state,
				...(report.state === "running" ? { pid: report.pid } : {}),
				text: renderStatus(report),
			};
		} catch (error: unknown) {
			const { detail } = failure(error, "PERSISTENCE_FAILED");
			return { state: "unknown", text: `Status unknown: ${detail}` };
		}
	}

	async logs(name: string, count?: number): Promise<LogsView> {
		try {
			const lines =
				count !== undefined && Number.isFinite(count) && count >= 1
					? Math.floor(count)
					: this.options.logTailLines;
			const tail = await this.supervisor.logTail(name, lines);
			const rendered = renderLogs(tail, this.options.transportLimit);
			return { kind: tail.kind, ...rendered };
		} catch (error: unknown) {
			const { kind, detail } = failure(error, "LOG_READ_FAILED");
			return {
				kind: kind === "NOT_FOUND" ? "not-found" : "read-failed",
				text: kind === "NOT_FOUND" ? "Project not found" : detail,
				truncated: false,
			};
		}
	}

	async usage(name: string): Promise<UsageView> {
		try {
			const reading = await this.supervisor.usage(name);
			if (reading.kind === "probe-failed") {
				return { kind: "probe-failed", text: renderUsage(reading) };
			}
			return {
				kind: "sampled",
				text: renderUsage(reading),
				...reading.sample,
			};
		} catch (error: unknown) {
			const { kind, detail } = failure(error, "PROBE_FAILED");
			if (kind === "NOT_FOUND") {
				return { kind: "not-found", text: "Project not found" };
			}
			if (kind === "NOT_RUNNING") {
				return { kind: "not-running", text: "Project is not running" };
			}
			return { kind: "probe-failed", text: detail };
		}
	}

	async installDependencies(name: string): Promise<OperationResult> {
		try {
			await this.supervisor.installDependencies(name);
			return { ok: true, detail: "Dependencies installed successfully" };
		} catch (error: unknown) {
			return failure(error, "INSTALL_FAILED");
		}
	}

	async setRunCommand(name: string, command: string): Promise<OperationResult> {
		try {
			const project = await this.supervisor.setRunCommand(name, command);
			return {
				ok: true,
				detail: `Run command updated to: ${project.run_command}`,
			};
		} catch (error: unknown) {
			return failure(error, "PERSISTENCE_FAILED");
		}
	}

	async delete(name: string): Promise<OperationResult> {
		try {
			await this.supervisor.delete(name);
			return { ok: true, detail: `Project '${name}' deleted successfully.` };
		} catch (error: unknown) {
			return failure(error, "DELETE_FAILED");
		}
	}
}

export function createProjectService(
	supervisor: SupervisorLike,
	options: ProjectServiceOptions,
): ProjectService {
	return new SupervisorProjectService(supervisor, options);
}
