import Fastify, { type FastifyBaseLogger, type FastifyInstance } from "fastify";
import type { Logger } from "pino";
import {
	createProjectService,
	type ProjectService,
} from "./api/projects/project-service";
import { registerProjectRoutes } from "./api/projects/routes";
import { type HostConfig, loadConfig } from "./config";
import { DependencyInstaller } from "./install/dependency-installer";
import { LogSink } from "./logs/log-sink";
import { ProjectStore } from "./projects/project-store";
import {
	type ProjectCollection,
	projectCollectionSchema,
} from "./projects/project-types";
import { JsonStore } from "./store/json-store";
import { Supervisor } from "./supervisor/supervisor";
import { defaultProcessProbe } from "./usage/process-accounting";
import { ResourceSampler } from "./usage/resource-sampler";

export interface Host {
	config: HostConfig;
	supervisor: Supervisor;
	projectService: ProjectService;
}

/** Wire store, log sink, sampler, installer and supervisor from config. */
export async function createHost(
	logger: Logger,
	config: HostConfig = loadConfig(),
): Promise<Host> {
	const store = new JsonStore<ProjectCollection>(
		{ filePath: config.storeFile },
		projectCollectionSchema,
		() => ({}),
	);
	const projects = new ProjectStore(store, {
		projectsDir: config.projectsDir,
		defaultRunCommand: config.defaultRunCommand,
	});
	await projects.load();

	const supervisor = new Supervisor(
		{
			projects,
			logs: new LogSink(config.logsDir),
			sampler: new ResourceSampler(defaultProcessProbe),
			installer: new DependencyInstaller(
				{
					command: config.installCommand,
					manifestFile: config.manifestFile,
					timeoutMs: config.installTimeoutMs,
				},
				logger.child({ component: "installer" }),
			),
			logger: logger.child({ component: "supervisor" }),
		},
		{
			stopGraceMs: config.stopGraceMs,
			restartDelayMs: config.restartDelayMs,
		},
	);

	const projectService = createProjectService(supervisor, {
		logTailLines: config.logTailLines,
		transportLimit: config.transportLimit,
	});

	return { config, supervisor, projectService };
}

export async function createServer(
	logger: Logger,
	projectService: ProjectService,
): Promise<FastifyInstance> {
	const loggerInstance: FastifyBaseLogger = logger;
	const app = Fastify({ loggerInstance });
	await registerProjectRoutes(app, { projectService });
	return app;
}
