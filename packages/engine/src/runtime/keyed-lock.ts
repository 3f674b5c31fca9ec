/**
 * Serializes async work per key. Work on different keys runs concurrently;
 * work on the same key runs in call order, one at a time.
 */
export class KeyedLock {
	private readonly tails = new Map<string, Promise<void>>();

	async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
		const previous = this.tails.get(key) ?? Promise.resolve();
		let release: () => void = () => {};
		const current = new Promise<void>((resolve) => {
			release = resolve;
		});
		const tail = previous.then(() => current);
		this.tails.set(key, tail);

		await previous;
		try {
			return await fn();
		} finally {
			release();
			if (this.tails.get(key) === tail) {
				this.tails.delete(key);
			}
		}
	}

	isLocked(key: string): boolean {
		return this.tails.has(key);
	}
}
