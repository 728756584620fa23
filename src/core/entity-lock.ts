/**
 * Per-key async mutex. Callers for the same key run one after another;
 * different keys do not wait on each other.
 */
export class KeyedMutex {
	private tails: Map<string, Promise<void>> = new Map();

	async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
		const previous = this.tails.get(key) ?? Promise.resolve();
		let release: () => void = () => {};
		const current = new Promise<void>((resolve) => {
			release = resolve;
		});
		const tail = previous.then(() => current);
		this.tails.set(key, tail);

		await previous;
		try {
			return await task();
		} finally {
			release();
			if (this.tails.get(key) === tail) {
				this.tails.delete(key);
			}
		}
	}

	get size(): number {
		return this.tails.size;
	}
}
