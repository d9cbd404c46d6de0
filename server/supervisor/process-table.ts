import type { ManagedProcess } from "./managed-process";

export interface ProcessEntry {
	name: string;
	process: ManagedProcess;
}

/**
 * In-memory name -> live process handle. Holds at most one entry per
 * project; the supervisor only touches an entry while holding that
 * project's lock.
 */
export class ProcessTable {
	private readonly entries = new Map<string, ProcessEntry>();

	get(name: string): ProcessEntry | undefined {
		return this.entries.get(name);
	}

	add(name: string, process: ManagedProcess): ProcessEntry {
		if (this.entries.get(name)?.process.isAlive()) {
			throw new Error(`Live process already registered for ${name}`);
		}
		const entry: ProcessEntry = { name, process };
		this.entries.set(name, entry);
		return entry;
	}

	remove(name: string): ProcessEntry | undefined {
		const entry = this.entries.get(name);
		this.entries.delete(name);
		return entry;
	}

	names(): string[] {
		return [...this.entries.keys()];
	}
}
