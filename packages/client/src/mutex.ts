/**
 * Promise-chain mutex. Callers run strictly one after another in the order
 * they called `runExclusive`.
 */
export class Mutex {
	private tail: Promise<void> = Promise.resolve();

	async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
		const previous = this.tail;
		let release: () => void = () => {};
		this.tail = new Promise<void>((resolve) => {
			release = resolve;
		});

		await previous;
		try {
			return await fn();
		} finally {
			release();
		}
	}
}
