import { describe, expect, it } from "vitest";

import { pickOne, sampleWithoutReplacement, sequenceRandom } from "../../src/content/random.js";

describe("sequenceRandom", () => {
	it("cycles through its values", () => {
		const random = sequenceRandom([0.1, 0.9]);
		expect([random(), random(), random()]).toEqual([0.1, 0.9, 0.1]);
	});

	it("rejects an empty sequence", () => {
		expect(() => sequenceRandom([])).toThrow("sequenceRandom needs at least one value");
	});
});

describe("pickOne", () => {
	it("maps the draw onto an index", () => {
		expect(pickOne(["a", "b", "c"], () => 0)).toBe("a");
		expect(pickOne(["a", "b", "c"], () => 0.5)).toBe("b");
		expect(pickOne(["a", "b", "c"], () => 0.99)).toBe("c");
	});

	it("returns undefined for an empty list", () => {
		expect(pickOne([], () => 0.5)).toBeUndefined();
	});
});

describe("sampleWithoutReplacement", () => {
	it("draws distinct items in draw order", () => {
		// i=0: j=0+floor(0.99*4)=3 → [d,b,c,a]; i=1: j=1+floor(0*3)=1 → [d,b,c,a]
		const sample = sampleWithoutReplacement(["a", "b", "c", "d"], 2, sequenceRandom([0.99, 0]));
		expect(sample).toEqual(["d", "b"]);
	});

	it("caps the sample at the population size", () => {
		const sample = sampleWithoutReplacement(["a", "b"], 10, () => 0);
		expect(sample).toEqual(["a", "b"]);
	});

	it("leaves the input untouched", () => {
		const items = ["a", "b", "c"];
		sampleWithoutReplacement(items, 3, () => 0.99);
		expect(items).toEqual(["a", "b", "c"]);
	});
});
