import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { z } from "zod";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const millis = (fallback: number) =>
	z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z.object({
	PORT: z.coerce.number().int().min(1).max(65535).default(3000),
	HOST: z.string().min(1).default("127.0.0.1"),
	HOSTER_HOME: z.string().min(1).default(join(homedir(), ".project-hoster")),
	HOSTER_DEFAULT_RUN_COMMAND: z.string().trim().min(1).default("node index.js"),
	HOSTER_STOP_GRACE_MS: millis(10_000),
	HOSTER_RESTART_DELAY_MS: millis(2_000),
	HOSTER_INSTALL_COMMAND: z
		.string()
		.trim()
		.min(1)
		.default("npm install --no-audit --no-fund"),
	HOSTER_MANIFEST_FILE: z.string().trim().min(1).default("package.json"),
	HOSTER_INSTALL_TIMEOUT_MS: millis(300_000),
	HOSTER_LOG_TAIL_LINES: z.coerce.number().int().min(1).max(10_000).default(30),
	HOSTER_TRANSPORT_LIMIT: z.coerce.number().int().min(100).default(4_000),
	LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface HostConfig {
	port: number;
	host: string;
	logLevel: LogLevel;
	/** Root holding projects/ and logs/ */
	homeDir: string;
	projectsDir: string;
	logsDir: string;
	/** The project store document */
	storeFile: string;
	defaultRunCommand: string;
	stopGraceMs: number;
	restartDelayMs: number;
	installCommand: string;
	manifestFile: string;
	installTimeoutMs: number;
	logTailLines: number;
	/** Largest text (UTF-16 code units) handed to a front end */
	transportLimit: number;
}

export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): HostConfig {
	const parsed = envSchema.safeParse(env);
	if (!parsed.success) {
		const problems = parsed.error.issues
			.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
			.join("; ");
		throw new ConfigError(`Invalid configuration: ${problems}`);
	}

	const vars = parsed.data;
	const homeDir = resolve(vars.HOSTER_HOME);
	const projectsDir = join(homeDir, "projects");
	return {
		port: vars.PORT,
		host: vars.HOST,
		logLevel: vars.LOG_LEVEL,
		homeDir,
		projectsDir,
		logsDir: join(homeDir, "logs"),
		storeFile: join(projectsDir, "projects.json"),
		defaultRunCommand: vars.HOSTER_DEFAULT_RUN_COMMAND,
		stopGraceMs: vars.HOSTER_STOP_GRACE_MS,
		restartDelayMs: vars.HOSTER_RESTART_DELAY_MS,
		installCommand: vars.HOSTER_INSTALL_COMMAND,
		manifestFile: vars.HOSTER_MANIFEST_FILE,
		installTimeoutMs: vars.HOSTER_INSTALL_TIMEOUT_MS,
		logTailLines: vars.HOSTER_LOG_TAIL_LINES,
		transportLimit: vars.HOSTER_TRANSPORT_LIMIT,
	};
}
