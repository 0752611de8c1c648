// src/unifi/request-gate.ts

/**
 * Runs async tasks strictly one after another, in the order they were
 * submitted. A rejected task does not stall the tasks queued behind it.
 */
export class RequestGate {
	private tail: Promise<void> = Promise.resolve();
	private waiting = 0;

	public run<T>(task: () => Promise<T>): Promise<T> {
		this.waiting += 1;

		const result = this.tail.then(async () => {
			this.waiting -= 1;
			return task();
		});

		this.tail = result.then(
			() => undefined,
			() => undefined,
		);

		return result;
	}

	/** Tasks submitted but not yet started. */
	public get pending(): number {
		return this.waiting;
	}
}
