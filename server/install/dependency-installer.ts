import { spawn } from "node:child_process";
import { stat } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "pino";
import { AppError, errnoCode, errorMessage } from "../errors";
import { parseRunCommand } from "../supervisor/run-command";

const STDERR_CAPTURE_LIMIT = 64 * 1024;

export interface InstallRequest {
	command: string;
	args: string[];
	cwd: string;
	timeoutMs: number;
}

export type InstallOutcome =
	| { kind: "ok" }
	| { kind: "failed"; exitCode: number | null; stderr: string }
	| { kind: "timed-out"; stderr: string };

export type RunInstall = (request: InstallRequest) => Promise<InstallOutcome>;

export interface DependencyInstallerOptions {
	/** Install command line, run inside the project directory */
	command: string;
	/** File that must exist in the project directory */
	manifestFile: string;
	timeoutMs: number;
}

/**
 * One-shot install subprocess with captured stderr. On timeout the child
 * is killed and the result is reported as soon as it has exited, without
 * waiting for grandchildren that may still hold the pipes open.
 */
export const runInstallCommand: RunInstall = (request) =>
	new Promise<InstallOutcome>((resolve) => {
		let stderr = "";
		let settled = false;
		let timedOut = false;

		const finish = (outcome: InstallOutcome) => {
			if (settled) return;
			settled = true;
			clearTimeout(timer);
			resolve(outcome);
		};

		const child = spawn(request.command, request.args, {
			cwd: request.cwd,
			stdio: ["ignore", "ignore", "pipe"],
		});

		child.stderr?.setEncoding("utf-8");
		child.stderr?.on("data", (chunk: string) => {
			stderr += chunk;
			if (stderr.length > STDERR_CAPTURE_LIMIT) {
				stderr = stderr.slice(-STDERR_CAPTURE_LIMIT);
			}
		});

		const timer = setTimeout(() => {
			timedOut = true;
			child.kill("SIGKILL");
		}, request.timeoutMs);

		child.once("error", (error) => {
			finish({
				kind: "failed",
				exitCode: null,
				stderr: errnoCode(error) === "ENOENT"
					? `Command not found: ${request.command}`
					: errorMessage(error),
			});
		});
		child.once("exit", () => {
			if (timedOut) {
				finish({ kind: "timed-out", stderr });
			}
		});
		child.once("close", (code) => {
			if (timedOut) {
				finish({ kind: "timed-out", stderr });
			} else if (code === 0) {
				finish({ kind: "ok" });
			} else {
				finish({ kind: "failed", exitCode: code, stderr });
			}
		});
	});

export class DependencyInstaller {
	constructor(
		private readonly options: DependencyInstallerOptions,
		private readonly logger: Logger,
		private readonly run: RunInstall = runInstallCommand,
	) {}

	/** Throws NO_MANIFEST, INSTALL_FAILED or TIMED_OUT. */
	async install(projectName: string, projectPath: string): Promise<void> {
		const manifest = join(projectPath, this.options.manifestFile);
		try {
			const info = await stat(manifest);
			if (!info.isFile()) {
				throw new AppError(
					"NO_MANIFEST",
					`${this.options.manifestFile} not found`,
				);
			}
		} catch (err: unknown) {
			if (err instanceof AppError) throw err;
			throw new AppError(
				"NO_MANIFEST",
				`${this.options.manifestFile} not found`,
				err,
			);
		}

		const { command, args } = parseRunCommand(this.options.command);
		const started = Date.now();
		const outcome = await this.run({
			command,
			args,
			cwd: projectPath,
			timeoutMs: this.options.timeoutMs,
		});
		const durationMs = Date.now() - started;

		switch (outcome.kind) {
			case "ok":
				this.logger.info({ project: projectName, durationMs }, "dependencies installed");
				return;
			case "timed-out":
				this.logger.warn(
					{ project: projectName, timeoutMs: this.options.timeoutMs },
					"dependency install timed out",
				);
				throw new AppError(
					"TIMED_OUT",
					`Installation timed out after ${Math.round(this.options.timeoutMs / 1000)}s`,
				);
			case "failed":
				this.logger.warn(
					{ project: projectName, exitCode: outcome.exitCode },
					"dependency install failed",
				);
				throw new AppError(
					"INSTALL_FAILED",
					`Error installing dependencies:\n${outcome.stderr.trim()}`,
				);
		}
	}
}
