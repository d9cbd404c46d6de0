import type { StoreConfig, VersionedFile } from "./store-types";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z, type ZodType, type ZodTypeDef } from "zod";
import { AppError, errnoCode, errorMessage } from "../errors";

const STORE_VERSION = 1;

const envelopeSchema = z.object({
	version: z.number().int(),
	data: z.unknown(),
});

/**
 * Single JSON document on disk, rewritten in full on every write.
 * Writes go to a temp file first and are renamed over the target, so a
 * reader never sees a half-written document.
 */
export class JsonStore<T> {
	private readonly config: StoreConfig;
	private readonly schema: ZodType<T, ZodTypeDef, unknown>;
	private readonly defaultData: () => T;

	constructor(
		config: StoreConfig,
		schema: ZodType<T, ZodTypeDef, unknown>,
		defaultData: () => T,
	) {
		this.config = config;
		this.schema = schema;
		this.defaultData = defaultData;
	}

	/**
	 * Returns the stored data, or the default when the file does not exist.
	 * A file that exists but cannot be read or parsed is an error: silently
	 * starting from an empty collection would lose every project.
	 */
	async read(): Promise<T> {
		let raw: string;
		try {
			raw = await readFile(this.config.filePath, "utf-8");
		} catch (err: unknown) {
			if (errnoCode(err) === "ENOENT") {
				return this.defaultData();
			}
			throw new AppError(
				"PERSISTENCE_FAILED",
				`Could not read ${this.config.filePath}: ${errorMessage(err)}`,
				err,
			);
		}

		let parsed: unknown;
		try {
			parsed = JSON.parse(raw);
		} catch (err: unknown) {
			throw new AppError(
				"PERSISTENCE_FAILED",
				`Corrupt store file ${this.config.filePath}: ${errorMessage(err)}`,
				err,
			);
		}

		const envelope = envelopeSchema.safeParse(parsed);
		if (!envelope.success) {
			throw new AppError(
				"PERSISTENCE_FAILED",
				`Unexpected store layout in ${this.config.filePath}`,
			);
		}
		const data = this.schema.safeParse(envelope.data.data);
		if (!data.success) {
			const issue = data.error.issues[0];
			throw new AppError(
				"PERSISTENCE_FAILED",
				`Invalid record in ${this.config.filePath}: ${issue ? `${issue.path.join(".")} ${issue.message}` : "unknown"}`,
			);
		}
		return data.data;
	}

	async write(data: T): Promise<void> {
		try {
			await this.atomicWrite(data);
		} catch (err: unknown) {
			throw new AppError(
				"PERSISTENCE_FAILED",
				`Could not write ${this.config.filePath}: ${errorMessage(err)}`,
				err,
			);
		}
	}

	private async atomicWrite(data: T): Promise<void> {
		const dir = dirname(this.config.filePath);
		await mkdir(dir, { recursive: true });
		const tmpPath = `${this.config.filePath}.tmp`;
		const versioned: VersionedFile<T> = { version: STORE_VERSION, data };
		await writeFile(tmpPath, JSON.stringify(versioned, null, 2), "utf-8");
		await rename(tmpPath, this.config.filePath);
	}
}
