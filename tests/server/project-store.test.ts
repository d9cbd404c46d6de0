import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { AppError } from "../../server/errors";
import type { ProjectStore } from "../../server/projects/project-store";
import type { ProjectCollection } from "../../server/projects/project-types";
import type { JsonStore } from "../../server/store/json-store";
import { createProjectStore } from "../helpers/host-fixtures";

describe("ProjectStore", () => {
	let store: JsonStore<ProjectCollection>;
	let projectStore: ProjectStore;
	let tempDir: string;
	let projectsDir: string;
	let filePath: string;

	beforeEach(async () => {
		tempDir = mkdtempSync(join(tmpdir(), "hoster-test-"));
		projectsDir = join(tempDir, "projects");
		filePath = join(projectsDir, "projects.json");
		({ store, projects: projectStore } = createProjectStore(
			filePath,
			projectsDir,
		));
		await projectStore.load();
	});

	afterEach(() => {
		rmSync(tempDir, { recursive: true, force: true });
		vi.restoreAllMocks();
	});

	it("create makes the directory and persists default metadata", async () => {
		const project = await projectStore.create("my-bot");

		expect(project).toEqual({
			name: "my-bot",
			path: join(projectsDir, "my-bot"),
			run_command: "node index.js",
			created_at: project.created_at,
			status: "stopped",
		});
		expect(new Date(project.created_at).toISOString()).toBe(project.created_at);
		expect(existsSync(project.path)).toBe(true);

		const onDisk = JSON.parse(readFileSync(filePath, "utf-8"));
		expect(onDisk).toEqual({ version: 1, data: { "my-bot": project } });
	});

	it("lists projects in creation order", async () => {
		await projectStore.create("project-alpha");
		await projectStore.create("project-beta");

		expect(projectStore.list()).toEqual(["project-alpha", "project-beta"]);
	});

	it("accepts names shared with Object.prototype members", async () => {
		await projectStore.create("constructor");
		await projectStore.create("toString");

		expect(projectStore.list()).toEqual(["constructor", "toString"]);
		expect(projectStore.get("toString").path).toBe(join(projectsDir, "toString"));

		const reloaded = createProjectStore(filePath, projectsDir).projects;
		await reloaded.load();
		expect(reloaded.exists("constructor")).toBe(true);
		expect(reloaded.exists("valueOf")).toBe(false);
	});

	it.each([
		"",
		"has space",
		"../escape",
		"dots.not.allowed",
		"a".repeat(65),
		"__proto__",
	])(
		"rejects invalid name %j",
		async (name) => {
			await expect(projectStore.create(name)).rejects.toMatchObject({
				code: "INVALID_NAME",
			});
			expect(projectStore.list()).toEqual([]);
		},
	);

	it("rejects a duplicate name", async () => {
		await projectStore.create("my-bot");

		await expect(projectStore.create("my-bot")).rejects.toThrow(
			/already exists/i,
		);
		expect(projectStore.list()).toEqual(["my-bot"]);
	});

	it("get throws NOT_FOUND; find and exists do not", async () => {
		expect(projectStore.exists("ghost")).toBe(false);
		expect(projectStore.find("ghost")).toBeUndefined();
		expect(() => projectStore.get("ghost")).toThrow(AppError);
		expect(projectStore.exists("toString")).toBe(false);
	});

	it("update keeps identity fields and drops pid when stopped", async () => {
		const created = await projectStore.create("my-bot");
		await projectStore.update("my-bot", (draft) => {
			draft.status = "running";
			draft.pid = 999;
		});

		const stopped = await projectStore.update("my-bot", (draft) => {
			draft.status = "stopped";
			draft.name = "renamed";
			draft.created_at = "1970-01-01T00:00:00.000Z";
		});

		expect(stopped).toEqual({ ...created });
		expect(projectStore.get("my-bot")).not.toHaveProperty("pid");
	});

	it("returned metadata is a copy", async () => {
		await projectStore.create("my-bot");

		const copy = projectStore.get("my-bot");
		copy.run_command = "rm -rf /";

		expect(projectStore.get("my-bot").run_command).toBe("node index.js");
	});

	it("delete removes the entry and persists", async () => {
		await projectStore.create("my-bot");
		await projectStore.delete("my-bot");

		expect(projectStore.exists("my-bot")).toBe(false);
		await expect(store.read()).resolves.toEqual({});
		await expect(projectStore.delete("my-bot")).rejects.toMatchObject({
			code: "NOT_FOUND",
		});
	});

	it("leaves memory untouched when the write fails", async () => {
		await projectStore.create("my-bot");
		vi.spyOn(store, "write").mockRejectedValueOnce(
			new AppError("PERSISTENCE_FAILED", "disk full"),
		);

		await expect(
			projectStore.update("my-bot", (draft) => {
				draft.run_command = "node other.js";
			}),
		).rejects.toMatchObject({ code: "PERSISTENCE_FAILED" });

		expect(projectStore.get("my-bot").run_command).toBe("node index.js");
	});

	it("serializes concurrent mutations without losing writes", async () => {
		const names = Array.from({ length: 10 }, (_, i) => `bot-${i}`);

		await Promise.all(names.map((name) => projectStore.create(name)));

		const reloaded = createProjectStore(filePath, projectsDir).projects;
		await reloaded.load();
		expect([...reloaded.list()].sort()).toEqual([...names].sort());
	});

	it("isManagedPath accepts only the project's own directory", async () => {
		const project = await projectStore.create("my-bot");

		expect(projectStore.isManagedPath("my-bot", project.path)).toBe(true);
		expect(projectStore.isManagedPath("my-bot", projectsDir)).toBe(false);
		expect(projectStore.isManagedPath("my-bot", tempDir)).toBe(false);
		expect(projectStore.isManagedPath("my-bot", join(projectsDir, "other"))).toBe(
			false,
		);
	});
});
