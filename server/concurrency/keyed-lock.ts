/**
 * Promise-chained mutual exclusion. Tasks queued on the same mutex run one at
 * a time in arrival order; the lock is released on every exit path.
 */
export class Mutex {
	private tail: Promise<void> = Promise.resolve();

	async runExclusive<T>(task: () => Promise<T>): Promise<T> {
		const previous = this.tail;
		let release: () => void = () => {};
		this.tail = new Promise<void>((resolve) => {
			release = resolve;
		});

		await previous;
		try {
			return await task();
		} finally {
			release();
		}
	}
}

/**
 * One mutex per key, created on first use and kept for the life of the
 * process. Work on different keys never waits on each other.
 */
export class KeyedLock {
	private readonly locks = new Map<string, Mutex>();

	runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
		return this.lockFor(key).runExclusive(task);
	}

	private lockFor(key: string): Mutex {
		const existing = this.locks.get(key);
		if (existing) {
			return existing;
		}
		const mutex = new Mutex();
		this.locks.set(key, mutex);
		return mutex;
	}
}
