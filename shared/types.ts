/**
 * Types shared between the host and its front ends (HTTP clients, chat bots).
 */

/** Failure kinds a supervisory operation can report */
export type ErrorKind =
	| "NOT_FOUND"
	| "ALREADY_EXISTS"
	| "INVALID_NAME"
	| "ALREADY_RUNNING"
	| "NOT_RUNNING"
	| "INVALID_COMMAND"
	| "LAUNCH_FAILED"
	| "TIMED_OUT"
	| "PERSISTENCE_FAILED"
	| "PARTIAL_DELETE_FAILURE"
	| "DELETE_FAILED"
	| "NO_MANIFEST"
	| "INSTALL_FAILED"
	| "PROBE_FAILED"
	| "LOG_READ_FAILED"
	| "INVALID_REQUEST";

export interface OperationFailure {
	ok: false;
	kind: ErrorKind;
	detail: string;
}

/**
 * Outcome of a collaborator-facing operation: a definite success or failure,
 * each with a short human-readable detail.
 */
export type OperationResult<T extends object = Record<never, never>> =
	| ({ ok: true; detail: string } & T)
	| OperationFailure;

/** "unknown" when the observation could not be persisted */
export type ProjectState = "not-found" | "running" | "stopped" | "unknown";

export interface StatusView {
	state: ProjectState;
	pid?: number;
	text: string;
}

export type LogsViewKind =
	| "not-found"
	| "absent"
	| "empty"
	| "lines"
	| "read-failed";

export interface LogsView {
	kind: LogsViewKind;
	text: string;
	truncated: boolean;
}

export type UsageViewKind =
	| "not-found"
	| "not-running"
	| "probe-failed"
	| "sampled";

export interface UsageView {
	kind: UsageViewKind;
	text: string;
	cpuPercent?: number;
	memoryBytes?: number;
	uptimeSeconds?: number;
}
