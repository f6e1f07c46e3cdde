import { describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
}));

import type { GenerateResult, TextGenerator } from "../../src/content/ai-client.js";
import { hardTruncate, LengthEnforcer, PLATFORM_CHAR_LIMIT } from "../../src/content/length.js";

function generatorReturning(result: GenerateResult | Error) {
	const generate = vi.fn<TextGenerator["generate"]>(async () => {
		if (result instanceof Error) throw result;
		return result;
	});
	return { generator: { generate }, generate };
}

describe("hardTruncate", () => {
	it("keeps limit - 3 characters and appends an ellipsis", () => {
		expect(hardTruncate("A".repeat(300))).toBe(`${"A".repeat(277)}...`);
	});

	it("counts astral characters once", () => {
		expect(hardTruncate("😀".repeat(10), 5)).toBe("😀😀...");
	});
});

describe("LengthEnforcer", () => {
	it("returns text within the limit unchanged without calling the model", async () => {
		const { generator, generate } = generatorReturning({ ok: true, text: "unused" });
		const enforcer = new LengthEnforcer(generator);
		const text = "B".repeat(PLATFORM_CHAR_LIMIT);

		expect(await enforcer.enforce(text)).toBe(text);
		expect(generate).not.toHaveBeenCalled();
	});

	it("uses the resummarized text when it fits", async () => {
		const { generator, generate } = generatorReturning({ ok: true, text: "Short version." });
		const enforcer = new LengthEnforcer(generator);
		const long = "A".repeat(300);

		expect(await enforcer.enforce(long)).toBe("Short version.");
		expect(generate).toHaveBeenCalledWith(
			`Summarize the following text to be well under 280 characters for a tweet. Keep the original tone and key message.\n\nTEXT:\n---\n${long}`,
			{ raw: true },
		);
	});

	it("truncates when the model fails", async () => {
		const { generator } = generatorReturning({ ok: false, reason: "timeout", error: "slow" });
		const result = await new LengthEnforcer(generator).enforce("A".repeat(300));

		expect(result).toBe(`${"A".repeat(277)}...`);
		expect(result).toHaveLength(280);
	});

	it("truncates when the resummary is still too long", async () => {
		const { generator } = generatorReturning({ ok: true, text: "C".repeat(281) });
		expect(await new LengthEnforcer(generator).enforce("A".repeat(300))).toBe(
			`${"A".repeat(277)}...`,
		);
	});

	it("truncates when the model throws", async () => {
		const { generator } = generatorReturning(new Error("boom"));
		expect(await new LengthEnforcer(generator).enforce("A".repeat(300))).toBe(
			`${"A".repeat(277)}...`,
		);
	});

	it("is idempotent on its own output", async () => {
		const { generator, generate } = generatorReturning({ ok: false, reason: "empty", error: "x" });
		const enforcer = new LengthEnforcer(generator);

		const once = await enforcer.enforce("A".repeat(300));
		const twice = await enforcer.enforce(once);

		expect(twice).toBe(once);
		expect(generate).toHaveBeenCalledTimes(1);
	});
});
