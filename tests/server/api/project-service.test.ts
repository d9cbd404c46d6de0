import { describe, expect, it, vi } from "vitest";
import {
	createProjectService,
	type ProjectService,
} from "../../../server/api/projects/project-service";
import { AppError } from "../../../server/errors";
import type { ProjectMetadata } from "../../../server/projects/project-types";
import type { Supervisor } from "../../../server/supervisor/supervisor";

function metadata(overrides: Partial<ProjectMetadata> = {}): ProjectMetadata {
	return {
		name: "alpha",
		path: "/srv/hoster/projects/alpha",
		run_command: "node index.js",
		created_at: "2026-01-05T10:00:00.000Z",
		status: "stopped",
		...overrides,
	};
}

function createSupervisorMock() {
	const mocks = {
		create: vi.fn<Supervisor["create"]>().mockResolvedValue(metadata()),
		list: vi.fn<Supervisor["list"]>().mockReturnValue(["alpha", "beta"]),
		start: vi.fn<Supervisor["start"]>().mockResolvedValue({ pid: 4242 }),
		stop: vi
			.fn<Supervisor["stop"]>()
			.mockResolvedValue({ pid: 4242, forced: false }),
		restart: vi.fn<Supervisor["restart"]>().mockResolvedValue({ pid: 4343 }),
		status: vi
			.fn<Supervisor["status"]>()
			.mockResolvedValue({ state: "running", pid: 4242 }),
		logTail: vi.fn<Supervisor["logTail"]>().mockResolvedValue({ kind: "absent" }),
		usage: vi.fn<Supervisor["usage"]>().mockResolvedValue({
			kind: "sampled",
			sample: { cpuPercent: 12.345, memoryBytes: 52_428_800, uptimeSeconds: 3_720 },
		}),
		installDependencies: vi
			.fn<Supervisor["installDependencies"]>()
			.mockResolvedValue(undefined),
		setRunCommand: vi
			.fn<Supervisor["setRunCommand"]>()
			.mockResolvedValue(metadata({ run_command: "ruby main.rb" })),
		delete: vi.fn<Supervisor["delete"]>().mockResolvedValue(undefined),
	};
	return mocks;
}

function createService(limit = 4_000): {
	service: ProjectService;
	mocks: ReturnType<typeof createSupervisorMock>;
} {
	const mocks = createSupervisorMock();
	const service = createProjectService(mocks, {
		logTailLines: 30,
		transportLimit: limit,
	});
	return { service, mocks };
}

describe("ProjectService", () => {
	it("reports successful lifecycle operations", async () => {
		const { service } = createService();

		await expect(service.create("alpha")).resolves.toEqual({
			ok: true,
			name: "alpha",
			detail: "Project 'alpha' created",
		});
		await expect(service.list()).resolves.toEqual(["alpha", "beta"]);
		await expect(service.start("alpha")).resolves.toEqual({
			ok: true,
			pid: 4242,
			detail: "Project started with PID 4242",
		});
		await expect(service.stop("alpha")).resolves.toEqual({
			ok: true,
			detail: "Project stopped successfully",
		});
		await expect(service.restart("alpha")).resolves.toEqual({
			ok: true,
			pid: 4343,
			detail: "Project restarted with PID 4343",
		});
		await expect(service.installDependencies("alpha")).resolves.toEqual({
			ok: true,
			detail: "Dependencies installed successfully",
		});
		await expect(
			service.setRunCommand("alpha", "ruby main.rb"),
		).resolves.toEqual({
			ok: true,
			detail: "Run command updated to: ruby main.rb",
		});
		await expect(service.delete("alpha")).resolves.toEqual({
			ok: true,
			detail: "Project 'alpha' deleted successfully.",
		});
	});

	it("says when a stop had to kill the project", async () => {
		const { service, mocks } = createService();
		mocks.stop.mockResolvedValueOnce({ pid: 4242, forced: true });

		await expect(service.stop("alpha")).resolves.toEqual({
			ok: true,
			detail: "Project did not exit in time and was killed",
		});
	});

	it("returns the error kind and message of an AppError", async () => {
		const { service, mocks } = createService();
		mocks.start.mockRejectedValueOnce(
			new AppError("ALREADY_RUNNING", "Project is already running (PID: 4242)"),
		);

		await expect(service.start("alpha")).resolves.toEqual({
			ok: false,
			kind: "ALREADY_RUNNING",
			detail: "Project is already running (PID: 4242)",
		});
	});

	it("wraps unexpected failures under the operation's kind", async () => {
		const { service, mocks } = createService();
		mocks.delete.mockRejectedValueOnce(new Error("disk on fire"));

		await expect(service.delete("alpha")).resolves.toEqual({
			ok: false,
			kind: "DELETE_FAILED",
			detail: "Error: disk on fire",
		});
	});

	it("renders status text", async () => {
		const { service, mocks } = createService();

		await expect(service.status("alpha")).resolves.toEqual({
			state: "running",
			pid: 4242,
			text: "Running (PID: 4242)",
		});

		mocks.status.mockResolvedValueOnce({ state: "stopped" });
		await expect(service.status("alpha")).resolves.toEqual({
			state: "stopped",
			text: "Stopped",
		});

		mocks.status.mockResolvedValueOnce({ state: "not-found" });
		await expect(service.status("ghost")).resolves.toEqual({
			state: "not-found",
			text: "Not found",
		});

		mocks.status.mockRejectedValueOnce(
			new AppError("PERSISTENCE_FAILED", "Could not write store"),
		);
		await expect(service.status("alpha")).resolves.toEqual({
			state: "unknown",
			text: "Status unknown: Could not write store",
		});
	});

	it("renders log tails and passes the default line count", async () => {
		const { service, mocks } = createService();

		await expect(service.logs("alpha")).resolves.toEqual({
			kind: "absent",
			text: "No logs found",
			truncated: false,
		});
		expect(mocks.logTail).toHaveBeenCalledWith("alpha", 30);

		mocks.logTail.mockResolvedValueOnce({ kind: "empty" });
		await expect(service.logs("alpha", 5)).resolves.toEqual({
			kind: "empty",
			text: "Logs are empty",
			truncated: false,
		});
		expect(mocks.logTail).toHaveBeenLastCalledWith("alpha", 5);

		mocks.logTail.mockResolvedValueOnce({
			kind: "lines",
			lines: ["booting", "ready"],
			text: "booting\nready",
			byteLength: 13,
		});
		await expect(service.logs("alpha")).resolves.toEqual({
			kind: "lines",
			text: "booting\nready",
			truncated: false,
		});
	});

	it("uses the default line count for a count that is not a positive number", async () => {
		const { service, mocks } = createService();

		await service.logs("alpha", Number.NaN);
		await service.logs("alpha", 0);
		await service.logs("alpha", 7.9);

		expect(mocks.logTail.mock.calls).toEqual([
			["alpha", 30],
			["alpha", 30],
			["alpha", 7],
		]);
	});

	it("truncates long log text to the transport limit", async () => {
		const { service, mocks } = createService(100);
		const text = "x".repeat(150);
		mocks.logTail.mockResolvedValueOnce({
			kind: "lines",
			lines: [text],
			text,
			byteLength: 150,
		});

		await expect(service.logs("alpha")).resolves.toEqual({
			kind: "lines",
			text: `${"x".repeat(100)}\n\n... (truncated)`,
			truncated: true,
		});
	});

	it("maps log read failures", async () => {
		const { service, mocks } = createService();
		mocks.logTail.mockRejectedValueOnce(
			new AppError("NOT_FOUND", "Project not found"),
		);
		await expect(service.logs("ghost")).resolves.toEqual({
			kind: "not-found",
			text: "Project not found",
			truncated: false,
		});

		mocks.logTail.mockRejectedValueOnce(
			new AppError("LOG_READ_FAILED", "Error reading logs: EACCES"),
		);
		await expect(service.logs("alpha")).resolves.toEqual({
			kind: "read-failed",
			text: "Error reading logs: EACCES",
			truncated: false,
		});
	});

	it("renders usage", async () => {
		const { service, mocks } = createService();

		await expect(service.usage("alpha")).resolves.toEqual({
			kind: "sampled",
			text: "CPU: 12.3%\nMemory: 50.0 MB\nUptime: 1h 2m",
			cpuPercent: 12.345,
			memoryBytes: 52_428_800,
			uptimeSeconds: 3_720,
		});

		mocks.usage.mockResolvedValueOnce({
			kind: "probe-failed",
			reason: "process 4242 vanished",
		});
		await expect(service.usage("alpha")).resolves.toEqual({
			kind: "probe-failed",
			text: "Unable to get usage info: process 4242 vanished",
		});

		mocks.usage.mockRejectedValueOnce(
			new AppError("NOT_RUNNING", "Project is not running"),
		);
		await expect(service.usage("alpha")).resolves.toEqual({
			kind: "not-running",
			text: "Project is not running",
		});

		mocks.usage.mockRejectedValueOnce(
			new AppError("NOT_FOUND", "Project not found"),
		);
		await expect(service.usage("ghost")).resolves.toEqual({
			kind: "not-found",
			text: "Project not found",
		});
	});
});
