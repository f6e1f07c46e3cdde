/**
 * Bounded, ordered log of texts published during this process.
 *
 * Owned by the dispatch orchestrator and handed to the prompt builder by
 * reference. Oldest entries are evicted first.
 */
export class ActivityHistory {
	private readonly items: string[] = [];

	constructor(
		private readonly limit = 10,
		initial: readonly string[] = [],
	) {
		if (!Number.isInteger(limit) || limit < 1) {
			throw new Error(`history limit must be a positive integer (got ${limit})`);
		}
		for (const text of initial) this.record(text);
	}

	record(text: string): void {
		this.items.push(text);
		if (this.items.length > this.limit) {
			this.items.splice(0, this.items.length - this.limit);
		}
	}

	entries(): readonly string[] {
		return this.items;
	}

	get size(): number {
		return this.items.length;
	}
}
