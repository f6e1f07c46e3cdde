/** Uniform source on [0, 1). Injected so tests can replay a fixed sequence. */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * Deterministic source cycling through the given values.
 */
export function sequenceRandom(values: readonly number[]): RandomSource {
	if (values.length === 0) throw new Error("sequenceRandom needs at least one value");
	let index = 0;
	return () => {
		const value = values[index % values.length];
		index++;
		return value;
	};
}

function randomIndex(random: RandomSource, length: number): number {
	return Math.min(Math.floor(random() * length), length - 1);
}

export function pickOne<T>(items: readonly T[], random: RandomSource): T | undefined {
	if (items.length === 0) return undefined;
	return items[randomIndex(random, items.length)];
}

/**
 * Partial Fisher-Yates: `count` distinct items in draw order.
 */
export function sampleWithoutReplacement<T>(
	items: readonly T[],
	count: number,
	random: RandomSource,
): T[] {
	const pool = [...items];
	const take = Math.min(count, pool.length);
	for (let i = 0; i < take; i++) {
		const j = i + randomIndex(random, pool.length - i);
		[pool[i], pool[j]] = [pool[j], pool[i]];
	}
	return pool.slice(0, take);
}
