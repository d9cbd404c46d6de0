import { z } from "zod";

export type ProjectStatus = "stopped" | "running";

/**
 * Durable metadata for one hosted project, stored with the field names of
 * the on-disk document.
 *
 * Used by: project-store, supervisor, project-service
 */
export interface ProjectMetadata {
	/** Unique identifier and directory name; immutable */
	name: string;
	/** Absolute project directory */
	path: string;
	/** Command line used to launch the project */
	run_command: string;
	/** ISO 8601, set once on create */
	created_at: string;
	/** Last known coarse state; the process table is authoritative */
	status: ProjectStatus;
	/** Present only while status is "running" */
	pid?: number;
}

export type ProjectCollection = Record<string, ProjectMetadata>;

export const projectMetadataSchema = z.object({
	name: z.string().min(1),
	path: z.string().min(1),
	run_command: z.string(),
	created_at: z.string(),
	status: z.enum(["stopped", "running"]),
	pid: z.number().int().positive().optional(),
});

export const projectCollectionSchema = z.record(projectMetadataSchema);

const PROJECT_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;
const MAX_PROJECT_NAME_LENGTH = 64;
/** Would set the prototype of the collection instead of adding a key */
const RESERVED_PROJECT_NAMES = new Set(["__proto__"]);

/** Letters, digits, hyphens and underscores; also safe as a directory name. */
export function isValidProjectName(name: string): boolean {
	return (
		name.length > 0 &&
		name.length <= MAX_PROJECT_NAME_LENGTH &&
		PROJECT_NAME_PATTERN.test(name) &&
		!RESERVED_PROJECT_NAMES.has(name)
	);
}
