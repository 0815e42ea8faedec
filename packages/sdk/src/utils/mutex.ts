/**
 * FIFO async mutex serializing operations against shared state.
 */
export class Mutex {
	private queue: Array<() => void> = [];
	private locked = false;

	async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
		await this.acquire();
		try {
			return await fn();
		} finally {
			this.release();
		}
	}

	private acquire(): Promise<void> {
		return new Promise<void>((resolve) => {
			const tryAcquire = () => {
				if (!this.locked) {
					this.locked = true;
					resolve();
				} else {
					this.queue.push(tryAcquire);
				}
			};
			tryAcquire();
		});
	}

	private release(): void {
		this.locked = false;
		const next = this.queue.shift();
		if (next) next();
	}
}
