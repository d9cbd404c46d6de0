import { mkdir } from "node:fs/promises";
import { relative, resolve } from "node:path";
import { Mutex } from "../concurrency/keyed-lock";
import { AppError, errorMessage } from "../errors";
import type { JsonStore } from "../store/json-store";
import {
	isValidProjectName,
	type ProjectCollection,
	type ProjectMetadata,
} from "./project-types";

export interface ProjectStoreOptions {
	/** Directory holding one sub-directory per project */
	projectsDir: string;
	/** run_command given to new projects */
	defaultRunCommand: string;
}

/**
 * Durable name -> metadata map.
 *
 * Every mutation runs under one write lock: copy the collection, apply the
 * change, write the whole document, and only then swap the copy in. A failed
 * write leaves the in-memory view matching what is on disk.
 */
export class ProjectStore {
	private projects: ProjectCollection = {};
	private readonly writeLock = new Mutex();

	constructor(
		public readonly store: JsonStore<ProjectCollection>,
		private readonly options: ProjectStoreOptions,
	) {}

	/** Replace the in-memory view with the document on disk. */
	async load(): Promise<void> {
		await this.writeLock.runExclusive(async () => {
			this.projects = await this.store.read();
		});
	}

	/** Add project and create its directory. */
	async create(name: string): Promise<ProjectMetadata> {
		if (!isValidProjectName(name)) {
			throw new AppError(
				"INVALID_NAME",
				"Invalid project name. Use only letters, numbers, hyphens, and underscores.",
			);
		}

		return this.mutate(async (draft) => {
			if (Object.hasOwn(draft, name)) {
				throw new AppError(
					"ALREADY_EXISTS",
					`Project '${name}' already exists`,
				);
			}

			const path = resolve(this.options.projectsDir, name);
			try {
				await mkdir(path, { recursive: true });
			} catch (err: unknown) {
				throw new AppError(
					"PERSISTENCE_FAILED",
					`Could not create project directory ${path}: ${errorMessage(err)}`,
					err,
				);
			}

			const project: ProjectMetadata = {
				name,
				path,
				run_command: this.options.defaultRunCommand,
				created_at: new Date().toISOString(),
				status: "stopped",
			};
			draft[name] = project;
			return { ...project };
		});
	}

	exists(name: string): boolean {
		return Object.hasOwn(this.projects, name);
	}

	/** Copy of the metadata, or undefined for an unknown name */
	find(name: string): ProjectMetadata | undefined {
		const project = this.exists(name) ? this.projects[name] : undefined;
		return project ? { ...project } : undefined;
	}

	get(name: string): ProjectMetadata {
		const project = this.find(name);
		if (!project) {
			throw new AppError("NOT_FOUND", "Project not found");
		}
		return project;
	}

	/** The path a project of this name is created at, and nothing else */
	isManagedPath(name: string, path: string): boolean {
		const expected = resolve(this.options.projectsDir, name);
		const rel = relative(this.options.projectsDir, path);
		return (
			resolve(path) === expected &&
			rel !== "" &&
			!rel.startsWith("..")
		);
	}

	/** Names ordered by creation time. */
	list(): string[] {
		return Object.values(this.projects)
			.sort((a, b) => a.created_at.localeCompare(b.created_at))
			.map((project) => project.name);
	}

	/**
	 * Apply a change to one project and persist. The mutator edits a copy;
	 * `name`, `path` and `created_at` are restored after it runs.
	 */
	async update(
		name: string,
		mutator: (project: ProjectMetadata) => void,
	): Promise<ProjectMetadata> {
		return this.mutate(async (draft) => {
			const current = Object.hasOwn(draft, name) ? draft[name] : undefined;
			if (!current) {
				throw new AppError("NOT_FOUND", "Project not found");
			}
			const next: ProjectMetadata = { ...current };
			mutator(next);
			next.name = current.name;
			next.path = current.path;
			next.created_at = current.created_at;
			if (next.status === "stopped") {
				delete next.pid;
			}
			draft[name] = next;
			return { ...next };
		});
	}

	async delete(name: string): Promise<void> {
		await this.mutate(async (draft) => {
			if (!Object.hasOwn(draft, name)) {
				throw new AppError("NOT_FOUND", "Project not found");
			}
			delete draft[name];
		});
	}

	private mutate<T>(
		change: (draft: ProjectCollection) => Promise<T>,
	): Promise<T> {
		return this.writeLock.runExclusive(async () => {
			const draft = structuredClone(this.projects);
			const result = await change(draft);
			await this.store.write(draft);
			this.projects = draft;
			return result;
		});
	}
}
