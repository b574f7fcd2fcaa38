/**
 * Async locks
 * ===========
 *
 * Mutex       - one holder at a time, waiters served in arrival order
 * KeyedMutex  - one Mutex per key, idle keys are released
 */

export class Mutex {
	private tail: Promise<void> = Promise.resolve();
	private holders = 0;

	/**
	 * Run fn once every earlier caller has finished
	 */
	async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
		let release: () => void = () => {};
		const previous = this.tail;
		this.tail = new Promise<void>((resolve) => {
			release = resolve;
		});
		this.holders++;

		try {
			await previous;
			return await fn();
		} finally {
			this.holders--;
			release();
		}
	}

	/**
	 * True while a caller holds or waits for the lock
	 */
	isLocked(): boolean {
		return this.holders > 0;
	}
}

export class KeyedMutex {
	private readonly locks = new Map<string, Mutex>();

	async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
		let lock = this.locks.get(key);
		if (!lock) {
			lock = new Mutex();
			this.locks.set(key, lock);
		}

		try {
			return await lock.runExclusive(fn);
		} finally {
			if (!lock.isLocked() && this.locks.get(key) === lock) {
				this.locks.delete(key);
			}
		}
	}

	isLocked(key: string): boolean {
		return this.locks.get(key)?.isLocked() ?? false;
	}

	/** Number of keys currently held or awaited */
	size(): number {
		return this.locks.size;
	}
}
