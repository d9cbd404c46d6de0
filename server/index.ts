import { createHost, createServer } from "./app";
import { loadConfig } from "./config";
import { createLogger } from "./logger";

async function main() {
	const config = loadConfig();
	const logger = createLogger(config.logLevel);
	const { supervisor, projectService } = await createHost(logger, config);
	const app = await createServer(logger, projectService);

	await app.listen({ port: config.port, host: config.host });
	logger.info(
		{ home: config.homeDir, projects: supervisor.list().length },
		`Project hoster running at http://${config.host}:${config.port}`,
	);

	let shuttingDown = false;
	const shutdown = async (signal: string) => {
		if (shuttingDown) {
			return;
		}
		shuttingDown = true;
		logger.info({ signal }, "shutting down, stopping running projects");
		try {
			await supervisor.shutdownAll();
			await app.close();
			process.exit(0);
		} catch (error) {
			logger.error({ err: error }, "shutdown failed");
			process.exit(1);
		}
	};

	process.on("SIGINT", () => {
		void shutdown("SIGINT");
	});
	process.on("SIGTERM", () => {
		void shutdown("SIGTERM");
	});
}

main().catch((err) => {
	console.error("Failed to start server:", err);
	process.exit(1);
});
