import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";
import type { ErrorKind, OperationResult } from "../../../shared/types";
import type { ProjectService } from "./project-service";

export interface ProjectRoutesDeps {
	projectService: ProjectService;
}

const HTTP_STATUS_BY_KIND: Record<ErrorKind, number> = {
	NOT_FOUND: 404,
	ALREADY_EXISTS: 409,
	INVALID_NAME: 400,
	ALREADY_RUNNING: 409,
	NOT_RUNNING: 409,
	INVALID_COMMAND: 400,
	LAUNCH_FAILED: 500,
	TIMED_OUT: 504,
	PERSISTENCE_FAILED: 500,
	PARTIAL_DELETE_FAILURE: 500,
	DELETE_FAILED: 500,
	NO_MANIFEST: 422,
	INSTALL_FAILED: 422,
	PROBE_FAILED: 503,
	LOG_READ_FAILED: 500,
	INVALID_REQUEST: 400,
};

const nameParamsSchema = z.object({ name: z.string().min(1) });
const createBodySchema = z.object({ name: z.string().trim().min(1) });
const runCommandBodySchema = z.object({ command: z.string() });
const logsQuerySchema = z.object({
	lines: z.coerce.number().int().min(1).max(10_000).optional(),
});

function sendInvalid(reply: FastifyReply, error: z.ZodError): FastifyReply {
	const issue = error.issues[0];
	return reply.code(400).send({
		code: "INVALID_REQUEST",
		message: issue ? `${issue.path.join(".") || "request"}: ${issue.message}` : "Invalid request",
	});
}

function sendResult(
	reply: FastifyReply,
	result: OperationResult<object>,
	successCode = 200,
): FastifyReply {
	if (!result.ok) {
		return reply
			.code(HTTP_STATUS_BY_KIND[result.kind])
			.send({ code: result.kind, message: result.detail });
	}
	return reply.code(successCode).send(result);
}

export async function registerProjectRoutes(
	app: FastifyInstance,
	deps: ProjectRoutesDeps,
): Promise<void> {
	const { projectService } = deps;

	app.get("/api/projects", async (_req, reply) => {
		return reply.send({ projects: await projectService.list() });
	});

	app.post("/api/projects", async (req, reply) => {
		const body = createBodySchema.safeParse(req.body);
		if (!body.success) return sendInvalid(reply, body.error);
		return sendResult(reply, await projectService.create(body.data.name), 201);
	});

	const lifecycle = ["start", "stop", "restart", "install"] as const;
	for (const action of lifecycle) {
		app.post(`/api/projects/:name/${action}`, async (req, reply) => {
			const params = nameParamsSchema.safeParse(req.params);
			if (!params.success) return sendInvalid(reply, params.error);
			const { name } = params.data;
			switch (action) {
				case "start":
					return sendResult(reply, await projectService.start(name));
				case "stop":
					return sendResult(reply, await projectService.stop(name));
				case "restart":
					return sendResult(reply, await projectService.restart(name));
				case "install":
					return sendResult(
						reply,
						await projectService.installDependencies(name),
					);
			}
		});
	}

	app.get("/api/projects/:name/status", async (req, reply) => {
		const params = nameParamsSchema.safeParse(req.params);
		if (!params.success) return sendInvalid(reply, params.error);
		const view = await projectService.status(params.data.name);
		const code =
			view.state === "not-found" ? 404 : view.state === "unknown" ? 500 : 200;
		return reply.code(code).send(view);
	});

	app.get("/api/projects/:name/logs", async (req, reply) => {
		const params = nameParamsSchema.safeParse(req.params);
		if (!params.success) return sendInvalid(reply, params.error);
		const query = logsQuerySchema.safeParse(req.query);
		if (!query.success) return sendInvalid(reply, query.error);
		const view = await projectService.logs(params.data.name, query.data.lines);
		const code =
			view.kind === "not-found" ? 404 : view.kind === "read-failed" ? 500 : 200;
		return reply.code(code).send(view);
	});

	app.get("/api/projects/:name/usage", async (req, reply) => {
		const params = nameParamsSchema.safeParse(req.params);
		if (!params.success) return sendInvalid(reply, params.error);
		const view = await projectService.usage(params.data.name);
		return reply.code(view.kind === "not-found" ? 404 : 200).send(view);
	});

	app.put("/api/projects/:name/run-command", async (req, reply) => {
		const params = nameParamsSchema.safeParse(req.params);
		if (!params.success) return sendInvalid(reply, params.error);
		const body = runCommandBodySchema.safeParse(req.body);
		if (!body.success) return sendInvalid(reply, body.error);
		return sendResult(
			reply,
			await projectService.setRunCommand(params.data.name, body.data.command),
		);
	});

	app.delete("/api/projects/:name", async (req, reply) => {
		const params = nameParamsSchema.safeParse(req.params);
		if (!params.success) return sendInvalid(reply, params.error);
		return sendResult(reply, await projectService.delete(params.data.name));
	});
}
